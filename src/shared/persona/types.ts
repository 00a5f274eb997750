import type { Intent, PersonaRole } from '../types';

export interface PersonalityTraits {
  openness: number;
  conscientiousness: number;
  extraversion: number;
  agreeableness: number;
  neuroticism: number;
}

export interface PersonaDynamics {
  curiosity: number;
  suspicion: number;
  paranoia: number;
  fear: number;
  playfulness: number;
}

export interface TypingStyle {
  speedMultiplier: number;
  typoRate: number;
  hesitationRate: number;
  deletesAndRetypes: boolean;
}

export interface PersonaSeed {
  /** Display name; also the key other personas use for relationships. */
  name: string;
  role: PersonaRole;
  traits: PersonalityTraits;
  dynamics: PersonaDynamics;
  typing: TypingStyle;
  /** Lower-case fragments that make this persona hesitate and raise fear. */
  phobias: string[];
  hesitationPhrases: string[];
  catchphrases: string[];
  /** Relative weights when this persona picks an intent (default 1). */
  preferredIntents: Partial<Record<Intent, number>>;
  /** Template keyword multipliers applied during line selection. */
  keywordBonuses: Record<string, number>;
  /** Fixed multiplier in the speaker lottery. */
  speakerBias: number;
  /** Lines used when template rendering fails. */
  fallbackLines: string[];
}
