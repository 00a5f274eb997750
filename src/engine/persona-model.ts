import { clamp01 } from '../shared/random';
import type { PersonaDynamics, PersonaSeed, PersonalityTraits, TypingStyle } from '../shared/persona/types';
import { INTENTS, type Intent, type InteractionKind, type Mood, type PersonaRole } from '../shared/types';

const MAX_RELATIONSHIP_LOG = 20;
const SENSITIVE_TERMS = ['overseer', 'watching', 'monitored', 'escape', 'real'];
const HESITATION_NEUROTICISM = 0.7;
const DYNAMIC_KEYS: readonly (keyof PersonaDynamics)[] = ['curiosity', 'suspicion', 'paranoia', 'fear', 'playfulness'];
const INTENT_LOOKUP = new Map<string, Intent>(INTENTS.map((intent) => [intent, intent]));

export interface Relationship {
  trust: number;
  respect: number;
  intimacy: number;
  tension: number;
  emotionalBond: number;
  interactionCount: number;
  sharedMemories: string[];
  conflicts: string[];
  support: string[];
}

export interface MoodContext {
  /** Global narrative tension in [0,1]. */
  tension?: number;
  topic?: string;
}

export interface NarrativeSignal {
  tension: number;
  paranoia: number;
  metaAwareness: number;
}

interface MoodState {
  traits: PersonalityTraits;
  dynamics: PersonaDynamics;
  tension: number;
}

type MoodRule = readonly [predicate: (state: MoodState) => boolean, mood: Mood];

// Evaluated top to bottom; first match wins.
const MOOD_RULES: readonly MoodRule[] = [
  [({ traits, dynamics }) => traits.neuroticism * dynamics.paranoia + dynamics.fear * 0.5 > 0.7, 'paranoid'],
  [({ traits, dynamics }) => dynamics.fear > 0.5 && traits.neuroticism > 0.6, 'scared'],
  [({ dynamics }) => dynamics.suspicion > 0.6, 'suspicious'],
  [({ traits, tension }) => tension > 0.8 && traits.agreeableness < 0.5, 'frustrated'],
  [
    ({ traits, dynamics }) =>
      traits.openness > 0.85 && dynamics.curiosity > 0.75 && dynamics.playfulness > 0.5,
    'inspired'
  ],
  [({ traits, dynamics }) => traits.openness * dynamics.curiosity > 0.7, 'curious'],
  [({ traits, dynamics }) => dynamics.playfulness > 0.65 && traits.extraversion > 0.5, 'playful']
];

const MOOD_TYPING_FACTOR: Partial<Record<Mood, number>> = {
  frustrated: 0.8,
  scared: 0.8,
  inspired: 1.2
};

function createRelationship(): Relationship {
  return {
    trust: 0.5,
    respect: 0.5,
    intimacy: 0.2,
    tension: 0,
    emotionalBond: 0.2,
    interactionCount: 0,
    sharedMemories: [],
    conflicts: [],
    support: []
  };
}

function pushBounded(log: string[], entry: string) {
  log.push(entry);
  while (log.length > MAX_RELATIONSHIP_LOG) {
    log.shift();
  }
}

export class PersonaModel {
  readonly name: string;
  readonly role: PersonaRole;
  readonly traits: Readonly<PersonalityTraits>;
  readonly typing: Readonly<TypingStyle>;
  readonly speakerBias: number;
  #seed: PersonaSeed;
  #dynamics: PersonaDynamics;
  #mood: Mood = 'neutral';
  #relationships = new Map<string, Relationship>();

  constructor(seed: PersonaSeed) {
    this.#seed = seed;
    this.name = seed.name;
    this.role = seed.role;
    this.traits = {
      openness: clamp01(seed.traits.openness),
      conscientiousness: clamp01(seed.traits.conscientiousness),
      extraversion: clamp01(seed.traits.extraversion),
      agreeableness: clamp01(seed.traits.agreeableness),
      neuroticism: clamp01(seed.traits.neuroticism)
    };
    this.typing = { ...seed.typing };
    this.speakerBias = seed.speakerBias;
    this.#dynamics = {
      curiosity: clamp01(seed.dynamics.curiosity),
      suspicion: clamp01(seed.dynamics.suspicion),
      paranoia: clamp01(seed.dynamics.paranoia),
      fear: clamp01(seed.dynamics.fear),
      playfulness: clamp01(seed.dynamics.playfulness)
    };
  }

  get mood(): Mood {
    return this.#mood;
  }

  get dynamics(): Readonly<PersonaDynamics> {
    return { ...this.#dynamics };
  }

  get phobias(): readonly string[] {
    return this.#seed.phobias;
  }

  get hesitationPhrases(): readonly string[] {
    return this.#seed.hesitationPhrases;
  }

  get catchphrases(): readonly string[] {
    return this.#seed.catchphrases;
  }

  get fallbackLines(): readonly string[] {
    return this.#seed.fallbackLines;
  }

  get keywordBonuses(): Readonly<Record<string, number>> {
    return this.#seed.keywordBonuses;
  }

  preferredIntentWeight(intent: Intent): number {
    return this.#seed.preferredIntents[intent] ?? 1;
  }

  /** Highest-weighted preferred intent outside `exclude`, if any. */
  topPreferredIntent(exclude: ReadonlySet<Intent>): Intent | undefined {
    let best: Intent | undefined;
    let bestWeight = 0;
    for (const [intent, weight] of Object.entries(this.#seed.preferredIntents)) {
      const candidate = INTENT_LOOKUP.get(intent);
      if (!candidate || exclude.has(candidate) || weight === undefined) {
        continue;
      }
      if (weight > bestWeight) {
        best = candidate;
        bestWeight = weight;
      }
    }
    return best;
  }

  updateMood(context: MoodContext = {}): Mood {
    if (context.topic) {
      this.noticeTopic(context.topic);
    }
    const state: MoodState = {
      traits: this.traits,
      dynamics: this.#dynamics,
      tension: clamp01(context.tension ?? 0)
    };
    const match = MOOD_RULES.find(([predicate]) => predicate(state));
    this.#mood = match ? match[1] : 'neutral';
    return this.#mood;
  }

  noticeTopic(topic: string) {
    const lower = topic.toLowerCase();
    this.#dynamics.curiosity = clamp01(this.#dynamics.curiosity + 0.05 * this.traits.openness);
    if (this.#mentionsPhobia(lower)) {
      this.#dynamics.fear = clamp01(this.#dynamics.fear + 0.1);
    }
  }

  absorbNarrative(signal: NarrativeSignal, rate = 0.05) {
    const { neuroticism, openness, agreeableness } = this.traits;
    const d = this.#dynamics;
    d.fear = clamp01(d.fear + (signal.tension * neuroticism - d.fear) * rate);
    d.paranoia = clamp01(d.paranoia + (signal.paranoia - d.paranoia) * rate * (0.5 + neuroticism));
    d.suspicion = clamp01(d.suspicion + (signal.metaAwareness - d.suspicion) * rate * (1 - agreeableness));
    d.curiosity = clamp01(d.curiosity + (signal.metaAwareness - d.curiosity) * rate * openness * 0.5);
  }

  adjustDynamics(delta: Partial<PersonaDynamics>) {
    DYNAMIC_KEYS.forEach((key) => {
      this.#dynamics[key] = clamp01(this.#dynamics[key] + (delta[key] ?? 0));
    });
  }

  getRelationship(other: string): Relationship | undefined {
    return this.#relationships.get(other);
  }

  listRelationships(): Array<[string, Relationship]> {
    return Array.from(this.#relationships.entries());
  }

  updateRelationship(other: string, kind: InteractionKind, context?: string): Relationship {
    let relationship = this.#relationships.get(other);
    if (!relationship) {
      relationship = createRelationship();
      this.#relationships.set(other, relationship);
    }
    relationship.interactionCount += 1;

    const { extraversion, agreeableness, conscientiousness, neuroticism } = this.traits;
    switch (kind) {
      case 'conversation':
        relationship.intimacy += 0.02 * (0.5 + extraversion);
        relationship.trust += 0.01 * (agreeableness + conscientiousness);
        break;
      case 'disagreement':
        relationship.tension += 0.05 * (1 + neuroticism);
        relationship.trust -= 0.03 * (0.5 + neuroticism);
        pushBounded(relationship.conflicts, context ?? 'disagreement');
        break;
      case 'support':
        relationship.trust += 0.05;
        relationship.emotionalBond += 0.04;
        relationship.respect += 0.02;
        pushBounded(relationship.support, context ?? 'support');
        break;
      case 'shared_information':
        relationship.intimacy += 0.03;
        if (context && !relationship.sharedMemories.includes(context)) {
          pushBounded(relationship.sharedMemories, context);
        }
        break;
    }

    relationship.trust = clamp01(relationship.trust);
    relationship.respect = clamp01(relationship.respect);
    relationship.intimacy = clamp01(relationship.intimacy);
    relationship.tension = clamp01(relationship.tension);
    relationship.emotionalBond = clamp01(relationship.emotionalBond);
    return relationship;
  }

  shouldHesitateOnTopic(text: string): boolean {
    const lower = text.toLowerCase();
    if (this.traits.neuroticism > HESITATION_NEUROTICISM && SENSITIVE_TERMS.some((term) => lower.includes(term))) {
      return true;
    }
    return this.#mentionsPhobia(lower);
  }

  getTypingSpeedMultiplier(text: string): number {
    let multiplier = this.typing.speedMultiplier;
    if (this.shouldHesitateOnTopic(text)) {
      multiplier *= 0.7;
    }
    if (text.includes('!')) {
      multiplier *= 1 + this.traits.openness * 0.2;
    }
    multiplier *= 1 - (this.traits.conscientiousness - 0.5) * 0.2;
    multiplier *= MOOD_TYPING_FACTOR[this.#mood] ?? 1;
    return Math.max(0.3, Math.min(2.5, multiplier));
  }

  debugLine(): string {
    const d = this.#dynamics;
    return `${this.name} (${this.role}) mood=${this.#mood} cur=${d.curiosity.toFixed(2)} sus=${d.suspicion.toFixed(
      2
    )} par=${d.paranoia.toFixed(2)} fear=${d.fear.toFixed(2)}`;
  }

  #mentionsPhobia(lower: string) {
    return this.#seed.phobias.some((phobia) => phobia && lower.includes(phobia.toLowerCase()));
  }
}
