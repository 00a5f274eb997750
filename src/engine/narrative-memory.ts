import { logger } from '../shared/logger';
import { clamp01, type RandomSource } from '../shared/random';
import { DEFAULT_ENGINE_SETTINGS, type MemorySettings } from '../shared/settings';
import { THREAT_KINDS, type NarrativeEvent, type ThreatKind } from '../shared/types';

const NOTABLE_EVENT_TYPES = new Set(['Glitch', 'Overseer', 'Threat Threshold', 'Observer']);
const CONCEPT_RETAIN_IMPORTANCE = 0.7;
const DIRECT_PING_WARNINGS = 4;

export type NarrativeScalar = 'tension' | 'paranoia' | 'metaAwareness' | 'cohesion';

const BASELINE: Record<NarrativeScalar, number> = {
  tension: 0.1,
  paranoia: 0,
  metaAwareness: 0,
  cohesion: 0.5
};

export interface NarrativeFlags {
  charactersSuspectSimulation: boolean;
  rareRedGlitchOccurred: boolean;
  observerDetected: boolean;
  systemCompromised: boolean;
  protocolLeaked: boolean;
  suspectsOverseer: boolean;
  deepDiscussion: boolean;
  overseerDirectPing: boolean;
}

export interface ConceptRecord {
  mentions: number;
  importance: number;
  introducedBy: string;
}

export interface Rumor {
  text: string;
  source: string;
  strength: number;
  credibility: number;
  decay: number;
}

export interface OverseerRollState {
  threatSum: number;
  loopCount: number;
  /** Glitches inside the escalation window, not the lifetime count. */
  recentGlitches: number;
  recentWarnings: number;
  rareRedGlitchOccurred: boolean;
  metaAwareness: number;
  observerDetected: boolean;
}

export interface NarrativeSnapshot {
  loopCount: number;
  glitchCount: number;
  overseerWarnings: number;
  tension: number;
  paranoia: number;
  metaAwareness: number;
  cohesion: number;
  flags: NarrativeFlags;
  threats: Record<ThreatKind, number>;
  observers: string[];
  concepts: number;
  rumors: number;
}

function createFlags(): NarrativeFlags {
  return {
    charactersSuspectSimulation: false,
    rareRedGlitchOccurred: false,
    observerDetected: false,
    systemCompromised: false,
    protocolLeaked: false,
    suspectsOverseer: false,
    deepDiscussion: false,
    overseerDirectPing: false
  };
}

function dropBefore(times: number[], cutoff: number) {
  while (times.length > 0 && times[0] < cutoff) {
    times.shift();
  }
}

function createThreats(): Record<ThreatKind, number> {
  return {
    reality_questioning: 0,
    surveillance: 0,
    system_integrity: 0,
    exposure: 0,
    memory_corruption: 0
  };
}

/**
 * Multiplicative hazard for an overseer interruption. Non-decreasing in every
 * input, capped at `overseerMaxChance`.
 */
export function computeOverseerChance(
  state: OverseerRollState,
  settings: MemorySettings = DEFAULT_ENGINE_SETTINGS.memory
): number {
  const escalation = state.loopCount + state.recentGlitches + state.recentWarnings;
  let chance =
    settings.overseerBaseChance *
    (1 + Math.max(0, state.threatSum)) *
    (1 + settings.overseerHazardFactor * escalation);
  if (state.rareRedGlitchOccurred) {
    chance += 0.05;
  }
  if (state.metaAwareness > 0.7) {
    chance += 0.03;
  }
  if (state.observerDetected) {
    chance += 0.02;
  }
  return Math.min(settings.overseerMaxChance, chance);
}

export class NarrativeMemory {
  #settings: MemorySettings;
  #loopCount = 1;
  #glitchCount = 0;
  #overseerWarnings = 0;
  #scalars: Record<NarrativeScalar, number> = { tension: 0, paranoia: 0, metaAwareness: 0, cohesion: 0.5 };
  #flags: NarrativeFlags = createFlags();
  #threats: Record<ThreatKind, number> = createThreats();
  #firedThreats = new Set<ThreatKind>();
  #history: NarrativeEvent[] = [];
  #concepts = new Map<string, ConceptRecord>();
  #rumors: Rumor[] = [];
  #observers = new Set<string>();
  #glitchTimes: number[] = [];
  #warningTimes: number[] = [];
  #lastOverseerAt: number;

  constructor(settings: MemorySettings = DEFAULT_ENGINE_SETTINGS.memory, now: number = Date.now()) {
    this.#settings = settings;
    this.#lastOverseerAt = now;
  }

  get loopCount() {
    return this.#loopCount;
  }

  get glitchCount() {
    return this.#glitchCount;
  }

  get overseerWarnings() {
    return this.#overseerWarnings;
  }

  get tension() {
    return this.#scalars.tension;
  }

  get paranoia() {
    return this.#scalars.paranoia;
  }

  get metaAwareness() {
    return this.#scalars.metaAwareness;
  }

  get cohesion() {
    return this.#scalars.cohesion;
  }

  get flags(): Readonly<NarrativeFlags> {
    return this.#flags;
  }

  get observerCount() {
    return this.#observers.size;
  }

  get lastOverseerAt() {
    return this.#lastOverseerAt;
  }

  setScalar(key: NarrativeScalar, value: number) {
    this.#scalars[key] = clamp01(value);
  }

  adjust(key: NarrativeScalar, delta: number) {
    this.#scalars[key] = clamp01(this.#scalars[key] + delta);
  }

  setFlag(flag: keyof NarrativeFlags, value: boolean) {
    this.#flags[flag] = value;
  }

  addEvent(type: string, value: string, actor = 'SYSTEM', now: number = Date.now()) {
    this.#history.push({ type, value, actor, timestamp: now, loop: this.#loopCount });
    while (this.#history.length > this.#settings.maxHistory) {
      this.#history.shift();
    }
  }

  getHistory(limit?: number): NarrativeEvent[] {
    const events = limit === undefined ? this.#history : this.#history.slice(-Math.max(0, limit));
    return events.map((event) => ({ ...event }));
  }

  latestNotableEvent(): NarrativeEvent | undefined {
    for (let index = this.#history.length - 1; index >= 0; index -= 1) {
      const event = this.#history[index];
      if (NOTABLE_EVENT_TYPES.has(event.type)) {
        return { ...event };
      }
    }
    return undefined;
  }

  addGlitchEvent(type: string, description: string, severity: number, now: number = Date.now()) {
    this.#glitchCount += 1;
    this.#glitchTimes.push(now);
    dropBefore(this.#glitchTimes, now - this.#settings.escalationWindowMs);
    this.addEvent('Glitch', `${type}: ${description}`, 'GLITCH', now);
    this.adjust('tension', Math.max(0, severity) * 0.05);

    if (type.toLowerCase().includes('red') || severity > 2.5) {
      this.#flags.rareRedGlitchOccurred = true;
      this.adjust('paranoia', 0.1);
    }
  }

  getThreatLevel(kind: ThreatKind): number {
    return this.#threats[kind];
  }

  threatSum(): number {
    return THREAT_KINDS.reduce((sum, kind) => sum + this.#threats[kind], 0);
  }

  updateThreatLevel(kind: ThreatKind, delta: number, now: number = Date.now()) {
    const previous = this.#threats[kind];
    const next = clamp01(previous + delta);
    this.#threats[kind] = next;

    const threshold = this.#settings.threatThreshold;
    if (previous < threshold && next >= threshold && !this.#firedThreats.has(kind)) {
      this.#firedThreats.add(kind);
      this.#respondToThreat(kind, now);
    }
  }

  /** Eases every threat level down by `amount`; crossed thresholds stay fired until reset. */
  decayThreats(amount: number = this.#settings.threatDecayPerTick) {
    THREAT_KINDS.forEach((kind) => {
      this.#threats[kind] = clamp01(this.#threats[kind] - amount);
    });
  }

  incrementOverseerWarnings(now: number = Date.now()) {
    this.#overseerWarnings += 1;
    this.#warningTimes.push(now);
    dropBefore(this.#warningTimes, now - this.#settings.escalationWindowMs);
    if (this.#overseerWarnings > DIRECT_PING_WARNINGS) {
      this.#flags.overseerDirectPing = true;
    }
  }

  overseerRollState(now: number = Date.now()): OverseerRollState {
    const cutoff = now - this.#settings.escalationWindowMs;
    dropBefore(this.#glitchTimes, cutoff);
    dropBefore(this.#warningTimes, cutoff);
    return {
      threatSum: this.threatSum(),
      loopCount: this.#loopCount,
      recentGlitches: this.#glitchTimes.length,
      recentWarnings: this.#warningTimes.length,
      rareRedGlitchOccurred: this.#flags.rareRedGlitchOccurred,
      metaAwareness: this.#scalars.metaAwareness,
      observerDetected: this.#flags.observerDetected
    };
  }

  shouldInjectOverseer(random: RandomSource, now: number = Date.now()): boolean {
    if (now - this.#lastOverseerAt < this.#settings.overseerCooldownMs) {
      return false;
    }
    const chance = computeOverseerChance(this.overseerRollState(now), this.#settings);
    if (random.next() >= chance) {
      return false;
    }
    this.#lastOverseerAt = now;
    this.incrementOverseerWarnings(now);
    this.addEvent('Overseer', `Warning ${this.#overseerWarnings}`, 'OVERSEER', now);
    logger.info('[memory] Overseer injection', { warnings: this.#overseerWarnings, chance });
    return true;
  }

  resetOverseerCooldown(now: number = Date.now()) {
    this.#lastOverseerAt = now;
  }

  rememberConcept(concept: string, introducedBy: string, importance = 0.3) {
    const key = concept.trim().toLowerCase();
    if (!key) {
      return;
    }
    const existing = this.#concepts.get(key);
    if (existing) {
      existing.mentions += 1;
      existing.importance = clamp01(Math.max(existing.importance, importance) + 0.05);
      return;
    }
    this.#concepts.set(key, { mentions: 1, importance: clamp01(importance), introducedBy });
    if (this.#concepts.size > this.#settings.maxConcepts) {
      this.#evictConcept();
    }
  }

  hasConcept(concept: string): boolean {
    return this.#concepts.has(concept.trim().toLowerCase());
  }

  getConcept(concept: string): ConceptRecord | undefined {
    const record = this.#concepts.get(concept.trim().toLowerCase());
    return record ? { ...record } : undefined;
  }

  addRumor(text: string, source: string, strength = 0.6, credibility = 0.5) {
    const existing = this.#rumors.find((rumor) => rumor.text === text);
    if (existing) {
      existing.strength = clamp01(existing.strength + strength * 0.5);
      return;
    }
    this.#rumors.push({
      text,
      source,
      strength: clamp01(strength),
      credibility: clamp01(credibility),
      decay: this.#settings.rumorDecayPerTick
    });
    if (this.#rumors.length > this.#settings.maxRumors) {
      this.#rumors.sort((a, b) => b.strength - a.strength);
      this.#rumors.length = this.#settings.maxRumors;
    }
  }

  decayRumors() {
    this.#rumors.forEach((rumor) => {
      rumor.strength = clamp01(rumor.strength - rumor.decay);
    });
    this.#rumors = this.#rumors.filter((rumor) => rumor.strength > 0);
  }

  hasActiveRumor(fragment: string): boolean {
    const lower = fragment.toLowerCase();
    return this.#rumors.some((rumor) => rumor.strength > 0 && rumor.text.toLowerCase().includes(lower));
  }

  listRumors(): Rumor[] {
    return this.#rumors.map((rumor) => ({ ...rumor }));
  }

  registerObserver(name: string, now: number = Date.now()) {
    this.#flags.observerDetected = true;
    if (!this.#observers.has(name)) {
      this.#observers.add(name);
      this.addEvent('Observer', name, 'VIEWER', now);
    }
  }

  /** Exponential blend of a thread's local tension and cohesion into the global scalars. */
  blendConversation(threadTension: number, threadCohesion: number, rate: number = this.#settings.conversationBlendRate) {
    const { tension, cohesion } = this.#scalars;
    this.setScalar('tension', tension + (clamp01(threadTension) - tension) * rate);
    this.setScalar('cohesion', cohesion + (clamp01(threadCohesion) - cohesion) * rate);
  }

  decayTowardBaseline(rate: number = this.#settings.baselineDecayRate) {
    (['tension', 'paranoia', 'cohesion'] as const).forEach((key) => {
      const current = this.#scalars[key];
      this.setScalar(key, current + (BASELINE[key] - current) * rate);
    });
  }

  reset(now: number = Date.now()) {
    this.addEvent('System Reset', `Ending Loop ${this.#loopCount}`, 'SYSTEM', now);
    this.#loopCount += 1;
    this.addEvent('System Reset', `Beginning Loop ${this.#loopCount}`, 'SYSTEM', now);

    this.#glitchCount = 0;
    this.#overseerWarnings = 0;
    this.#glitchTimes = [];
    this.#warningTimes = [];
    this.#flags.rareRedGlitchOccurred = false;
    this.#flags.systemCompromised = false;
    this.#flags.observerDetected = false;
    this.#flags.deepDiscussion = false;
    this.#flags.overseerDirectPing = false;
    this.#flags.suspectsOverseer = false;
    this.#observers.clear();
    this.#rumors = [];
    this.#firedThreats.clear();

    this.#scalars.tension = clamp01(this.#scalars.tension * 0.3);
    this.#scalars.paranoia = clamp01(this.#scalars.paranoia * 0.5);
    this.#scalars.metaAwareness = clamp01(this.#scalars.metaAwareness * 0.9 + 0.05);

    THREAT_KINDS.forEach((kind) => {
      this.#threats[kind] = clamp01(this.#threats[kind] * 0.5);
    });

    for (const [key, record] of this.#concepts.entries()) {
      if (record.importance < CONCEPT_RETAIN_IMPORTANCE) {
        this.#concepts.delete(key);
      }
    }

    logger.info('[memory] Loop reset', { loop: this.#loopCount });
  }

  snapshot(): NarrativeSnapshot {
    return {
      loopCount: this.#loopCount,
      glitchCount: this.#glitchCount,
      overseerWarnings: this.#overseerWarnings,
      tension: this.#scalars.tension,
      paranoia: this.#scalars.paranoia,
      metaAwareness: this.#scalars.metaAwareness,
      cohesion: this.#scalars.cohesion,
      flags: { ...this.#flags },
      threats: { ...this.#threats },
      observers: Array.from(this.#observers),
      concepts: this.#concepts.size,
      rumors: this.#rumors.length
    };
  }

  debugLines(): string[] {
    const s = this.#scalars;
    const activeFlags = Object.entries(this.#flags)
      .filter(([, value]) => value)
      .map(([flag]) => flag);
    const threats = THREAT_KINDS.map((kind) => `${kind}=${this.#threats[kind].toFixed(2)}`).join(' ');
    return [
      `loop ${this.#loopCount} | glitches ${this.#glitchCount} | warnings ${this.#overseerWarnings}`,
      `tension ${s.tension.toFixed(2)} | paranoia ${s.paranoia.toFixed(2)} | meta ${s.metaAwareness.toFixed(
        2
      )} | cohesion ${s.cohesion.toFixed(2)}`,
      `threats ${threats}`,
      `flags ${activeFlags.length > 0 ? activeFlags.join(', ') : 'none'}`,
      `concepts ${this.#concepts.size} | rumors ${this.#rumors.length} | observers ${this.#observers.size}`
    ];
  }

  #respondToThreat(kind: ThreatKind, now: number) {
    this.addEvent('Threat Threshold', kind, 'SYSTEM', now);
    switch (kind) {
      case 'reality_questioning':
        this.#flags.charactersSuspectSimulation = true;
        this.adjust('metaAwareness', 0.1);
        break;
      case 'surveillance':
        this.#flags.suspectsOverseer = true;
        break;
      case 'system_integrity':
        this.#flags.systemCompromised = true;
        break;
      case 'exposure':
        this.#flags.protocolLeaked = true;
        break;
      case 'memory_corruption':
        this.adjust('paranoia', 0.05);
        break;
    }
    logger.info('[memory] Threat threshold crossed', { kind });
  }

  #evictConcept() {
    let victim: string | undefined;
    let lowest = Number.POSITIVE_INFINITY;
    for (const [key, record] of this.#concepts.entries()) {
      if (record.importance < lowest) {
        lowest = record.importance;
        victim = key;
      }
    }
    if (victim !== undefined) {
      this.#concepts.delete(victim);
    }
  }
}
