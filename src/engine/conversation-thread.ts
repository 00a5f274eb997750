import type { PersonaModel } from './persona-model';
import type { Topic } from './topic-graph';
import { logger } from '../shared/logger';
import { clamp01 } from '../shared/random';
import { DEFAULT_ENGINE_SETTINGS, type ThreadSettings } from '../shared/settings';
import { THREAD_PHASES, type Intent, type ThreadPhase, type ThreadStatus } from '../shared/types';

const MAX_RETAINED_CLOSED_THREADS = 16;

export const PHASE_PACING_MULTIPLIER: Record<ThreadPhase, number> = {
  introduction: 1.1,
  development: 1.0,
  complication: 0.8,
  climax: 0.5,
  resolution: 1.0
};

const PHASE_INTENT: Record<ThreadPhase, Intent> = {
  introduction: 'question',
  development: 'theory',
  complication: 'challenge',
  climax: 'fear',
  resolution: 'statement'
};

export interface ThreadMessage {
  speaker: string;
  text: string;
}

export interface PhaseIntentOptions {
  includeQuestion?: boolean;
}

export class ConversationThread {
  readonly id: string;
  readonly topic: Topic;
  readonly participants: string[];
  lastSpeaker: string | null = null;
  lastSpokeAt = new Map<string, number>();
  turnCount = 0;
  lastActivityAt: number;
  allowInterruption = true;
  /** Thread-local tension and cohesion, blended into the global narrative after each message. */
  tension = 0.3;
  cohesion = 0.5;
  #phaseIndex = 0;
  #status: ThreadStatus = 'active';
  #messagesInPhase = 0;
  #hasClimaxed = false;
  #urgent = false;
  #history: string[] = [];
  #settings: ThreadSettings;

  constructor(
    id: string,
    topic: Topic,
    participants: string[],
    now: number = Date.now(),
    settings: ThreadSettings = DEFAULT_ENGINE_SETTINGS.threads
  ) {
    this.id = id;
    this.topic = topic;
    this.participants = [...participants];
    this.lastActivityAt = now;
    this.#settings = settings;
  }

  get phase(): ThreadPhase {
    return THREAD_PHASES[this.#phaseIndex];
  }

  get status(): ThreadStatus {
    return this.#status;
  }

  get messagesInPhase() {
    return this.#messagesInPhase;
  }

  get hasClimaxed() {
    return this.#hasClimaxed;
  }

  get history(): readonly string[] {
    return this.#history;
  }

  /**
   * Status never returns to active, and closed is terminal. Returns whether the
   * transition was applied.
   */
  setStatus(next: ThreadStatus): boolean {
    if (next === this.#status) {
      return true;
    }
    if (this.#status === 'closed' || next === 'active') {
      logger.debug('[threads] Rejected status transition', { id: this.id, from: this.#status, to: next });
      return false;
    }
    this.#status = next;
    return true;
  }

  registerMessage(message: ThreadMessage, now: number = Date.now()) {
    this.lastSpeaker = message.speaker;
    this.lastSpokeAt.set(message.speaker, now);
    this.turnCount += 1;
    this.#messagesInPhase += 1;
    this.lastActivityAt = now;

    this.#history.push(message.text);
    while (this.#history.length > this.#settings.historySize) {
      this.#history.shift();
    }

    this.#updatePhase();
  }

  /** True once after the thread enters climax. */
  consumeUrgency(): boolean {
    const urgent = this.#urgent;
    this.#urgent = false;
    return urgent;
  }

  getPhaseAppropriateIntent(persona?: PersonaModel, options: PhaseIntentOptions = {}): Intent {
    const intent = PHASE_INTENT[this.phase];
    if (intent !== 'question') {
      return intent;
    }
    const includeQuestion = options.includeQuestion ?? true;
    if (!includeQuestion || (persona && persona.preferredIntentWeight('question') < 1)) {
      return 'statement';
    }
    return intent;
  }

  pacingMultiplier(): number {
    return PHASE_PACING_MULTIPLIER[this.phase];
  }

  adjustTension(delta: number) {
    this.tension = clamp01(this.tension + delta);
  }

  adjustCohesion(delta: number) {
    this.cohesion = clamp01(this.cohesion + delta);
  }

  #updatePhase() {
    if (this.#messagesInPhase <= this.#settings.messagesPerPhase) {
      return;
    }
    this.#messagesInPhase = 0;
    if (this.#phaseIndex < THREAD_PHASES.length - 1) {
      this.#phaseIndex += 1;
      logger.debug('[threads] Thread advanced phase', { id: this.id, phase: this.phase });
      if (this.phase === 'climax') {
        this.#hasClimaxed = true;
        this.#urgent = true;
        this.allowInterruption = false;
        if (this.#status === 'active') {
          this.setStatus('escalating');
        }
      } else if (this.phase === 'resolution') {
        this.allowInterruption = true;
      }
      return;
    }
    this.setStatus('stale');
  }
}

export class ThreadRegistry {
  #threads = new Map<string, ConversationThread>();
  #counter = 0;
  #settings: ThreadSettings;

  constructor(settings: ThreadSettings = DEFAULT_ENGINE_SETTINGS.threads) {
    this.#settings = settings;
  }

  start(topic: Topic, participants: string[], now: number = Date.now()): ConversationThread {
    const id = `thread_${this.#counter}`;
    this.#counter += 1;
    const thread = new ConversationThread(id, topic, participants, now, this.#settings);
    this.#threads.set(id, thread);
    this.#trimClosed();
    logger.debug('[threads] Thread started', { id, topic: topic.core, participants });
    return thread;
  }

  close(id: string) {
    this.#threads.get(id)?.setStatus('closed');
  }

  closeAll() {
    this.#threads.forEach((thread) => thread.setStatus('closed'));
  }

  /** Closes active threads idle for longer than `maxIdleMs`; returns their ids. */
  pruneStale(now: number = Date.now(), maxIdleMs: number = this.#settings.staleAfterMs): string[] {
    const closed: string[] = [];
    this.#threads.forEach((thread) => {
      if (thread.status === 'active' && now - thread.lastActivityAt > maxIdleMs) {
        thread.setStatus('closed');
        closed.push(thread.id);
      }
    });
    return closed;
  }

  /** First thread that is active or escalating. */
  getActive(): ConversationThread | null {
    for (const thread of this.#threads.values()) {
      if (thread.status === 'active' || thread.status === 'escalating') {
        return thread;
      }
    }
    return null;
  }

  getAllActive(): ConversationThread[] {
    return Array.from(this.#threads.values()).filter((thread) => thread.status === 'active');
  }

  get(id: string): ConversationThread | undefined {
    return this.#threads.get(id);
  }

  #trimClosed() {
    const closed = Array.from(this.#threads.values()).filter((thread) => thread.status === 'closed');
    const excess = closed.length - MAX_RETAINED_CLOSED_THREADS;
    closed.slice(0, Math.max(0, excess)).forEach((thread) => this.#threads.delete(thread.id));
  }
}
