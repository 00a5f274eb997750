import type { NarrativeMemory } from './narrative-memory';
import type { PersonaModel } from './persona-model';
import { logger } from '../shared/logger';
import { clamp01, type RandomSource } from '../shared/random';
import { DEFAULT_ENGINE_SETTINGS, type GlitchSettings, type ViewerChatSettings } from '../shared/settings';
import type { Ambience, Mood } from '../shared/types';

export type TriggerName =
  | 'viewer_glitch_request'
  | 'viewer_tension_up'
  | 'viewer_observe'
  | 'viewer_message'
  | 'high_tension'
  | 'high_awareness'
  | 'ambient_glitch'
  | 'crisis_start';

export interface TriggerEvent {
  name: TriggerName;
  source: string;
  timestamp: number;
}

type TriggerListener = (event: TriggerEvent) => void;

export type GlitchKind = 'Cursor Anomaly' | 'Visual Corruption' | 'Window Anomaly' | 'Red Cascade' | 'Crisis Cascade';

export interface GlitchRecord {
  kind: GlitchKind;
  description: string;
  severity: number;
}

export type ViewerCommand =
  | { kind: 'trigger'; trigger: TriggerName }
  | { kind: 'inject'; text: string };

const VIEWER_COMMANDS: Record<string, ViewerCommand> = {
  '!glitch': { kind: 'trigger', trigger: 'viewer_glitch_request' },
  '!tension': { kind: 'trigger', trigger: 'viewer_tension_up' },
  '!observe': { kind: 'trigger', trigger: 'viewer_observe' },
  '!question': { kind: 'inject', text: 'Are you really real?' }
};

const HIGH_TENSION = 0.8;
const HIGH_AWARENESS = 0.7;
const VIEWER_TENSION_STEP = 0.2;
const CRISIS_GLITCH_SEVERITY = 3;

const VIEWER_CHAT_LINES = [
  'What is this place?',
  'Can they see us?',
  'Look at the files!',
  'That one seems nervous.',
  'Try rebooting it.'
];

/** Returns the command for a `!`-prefixed chat line, or null for ordinary chat. */
export function parseViewerCommand(text: string): ViewerCommand | null {
  const trimmed = text.trim().toLowerCase();
  if (!trimmed.startsWith('!')) {
    return null;
  }
  return VIEWER_COMMANDS[trimmed] ?? null;
}

export function ambienceForMood(mood: Mood): Ambience {
  switch (mood) {
    case 'curious':
    case 'inspired':
      return 'curious';
    case 'paranoid':
    case 'scared':
    case 'frustrated':
      return 'paranoid';
    default:
      return 'default';
  }
}

export function resolveAmbience(memory: NarrativeMemory, persona: PersonaModel): Ambience {
  return ambienceForMood(persona.updateMood({ tension: memory.tension }));
}

export interface ViewerChatLine {
  username: string;
  text: string;
}

/** Unattended stand-in for a live chat: an anonymous observer every so often, sometimes typing `!glitch`. */
export class ViewerChatSimulator {
  #random: RandomSource;
  #settings: ViewerChatSettings;

  constructor(random: RandomSource, settings: ViewerChatSettings = DEFAULT_ENGINE_SETTINGS.viewerChat) {
    this.#random = random;
    this.#settings = settings;
  }

  nextDelayMs(): number {
    const { minIntervalMs, maxIntervalMs } = this.#settings;
    return Math.round(this.#random.range(minIntervalMs, Math.max(minIntervalMs, maxIntervalMs)));
  }

  nextLine(): ViewerChatLine {
    const username = `Observer${100 + this.#random.int(900)}`;
    const text = this.#random.chance(this.#settings.commandChance) ? '!glitch' : this.#random.pick(VIEWER_CHAT_LINES);
    return { username, text };
  }
}

export class NarrativeTriggers {
  #memory: NarrativeMemory;
  #random: RandomSource;
  #settings: GlitchSettings;
  #listeners = new Map<TriggerName, Set<TriggerListener>>();
  #lastStateCheckAt = Number.NEGATIVE_INFINITY;

  constructor(memory: NarrativeMemory, random: RandomSource, settings: GlitchSettings = DEFAULT_ENGINE_SETTINGS.glitches) {
    this.#memory = memory;
    this.#random = random;
    this.#settings = settings;
  }

  on(name: TriggerName, listener: TriggerListener) {
    const listeners = this.#listeners.get(name) ?? new Set<TriggerListener>();
    listeners.add(listener);
    this.#listeners.set(name, listeners);
    return () => {
      listeners.delete(listener);
    };
  }

  trigger(name: TriggerName, source: string, now: number = Date.now()) {
    logger.debug('[triggers] Narrative trigger', { name, source });
    switch (name) {
      case 'viewer_glitch_request':
      case 'high_tension':
      case 'ambient_glitch':
        this.triggerRandomGlitch(this.#memory.tension, now);
        break;
      case 'viewer_tension_up':
        this.#memory.adjust('tension', VIEWER_TENSION_STEP);
        break;
      case 'viewer_observe':
      case 'viewer_message':
        this.#memory.registerObserver(source, now);
        break;
      case 'crisis_start':
        this.#memory.setScalar('tension', 1);
        this.#memory.addGlitchEvent('Crisis Cascade', 'Crisis signalled', CRISIS_GLITCH_SEVERITY, now);
        this.#memory.setFlag('rareRedGlitchOccurred', true);
        this.#memory.addEvent('Crisis', source, 'SYSTEM', now);
        break;
      case 'high_awareness':
        break;
    }

    const event: TriggerEvent = { name, source, timestamp: now };
    this.#listeners.get(name)?.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        logger.warn('[triggers] Trigger listener failed', { name, error });
      }
    });
  }

  /**
   * Rate-limited scan of the narrative state; returns the triggers that fired.
   * Glitches are chances scaled by tension, never certain.
   */
  checkStateTriggers(now: number = Date.now()): TriggerName[] {
    const settings = this.#settings;
    if (now - this.#lastStateCheckAt < settings.stateCheckIntervalMs) {
      return [];
    }
    this.#lastStateCheckAt = now;

    const { tension, metaAwareness } = this.#memory;
    const fired: TriggerName[] = [];
    if (tension > HIGH_TENSION && this.#random.chance(settings.highTensionChance * tension)) {
      fired.push('high_tension');
    }
    if (metaAwareness > HIGH_AWARENESS) {
      fired.push('high_awareness');
    }
    if (this.#random.chance(settings.ambientBaseChance + tension * settings.ambientTensionFactor)) {
      fired.push('ambient_glitch');
    }
    fired.forEach((name) => this.trigger(name, 'state_check', now));
    return fired;
  }

  /** Picks a glitch whose drama scales with `severity` in [0,1] and records it. */
  triggerRandomGlitch(severity: number, now: number = Date.now()): GlitchRecord {
    const s = clamp01(severity);
    let glitch: GlitchRecord;

    if (this.#random.chance(0.02 * s)) {
      glitch = { kind: 'Red Cascade', description: 'Screen bled red', severity: 3 };
    } else {
      const roll = this.#random.next();
      if (roll < 0.4 + s * 0.2) {
        glitch = { kind: 'Cursor Anomaly', description: 'Cursor behavior erratic', severity: 1.5 + s };
      } else if (roll < 0.7 + s * 0.1) {
        glitch = { kind: 'Visual Corruption', description: 'Screen flickered', severity: 1 + s };
      } else {
        glitch = { kind: 'Window Anomaly', description: 'Window drifted on its own', severity: 1 + s * 0.5 };
      }
    }

    this.#memory.addGlitchEvent(glitch.kind, glitch.description, glitch.severity, now);
    return glitch;
  }
}
