export interface PacingSettings {
  baseIntervalMs: number;
  minIntervalMs: number;
  maxIntervalMs: number;
  /** Elapsed time after which a message is forced regardless of pacing. */
  hardCeilingMs: number;
  highTension: number;
  lowTension: number;
  highTensionScale: number;
  lowTensionScale: number;
  crisisScale: number;
  /** Tension above which every tick bypasses pacing. */
  forceTension: number;
}

export interface ThreadSettings {
  messagesPerPhase: number;
  maxTurns: number;
  resolutionMessagesBeforeRotation: number;
  /** Thread-local tension under which a climaxed, resolving thread is retired. */
  resolvingTensionFloor: number;
  staleAfterMs: number;
  historySize: number;
}

export interface ReplySettings {
  recentLineWindow: number;
  recentIntentWindow: number;
  duplicateOverlapThreshold: number;
  maxGenerationAttempts: number;
  hesitationChance: number;
  catchphraseChance: number;
}

export interface MemorySettings {
  maxHistory: number;
  maxConcepts: number;
  maxRumors: number;
  threatThreshold: number;
  overseerBaseChance: number;
  overseerCooldownMs: number;
  overseerHazardFactor: number;
  overseerMaxChance: number;
  rumorDecayPerTick: number;
  conversationBlendRate: number;
  baselineDecayRate: number;
  /** Subtracted from every threat level after each persona message. */
  threatDecayPerTick: number;
  /** Glitches and warnings older than this stop feeding the overseer hazard. */
  escalationWindowMs: number;
}

export interface TopicSettings {
  escalateChance: number;
  forbiddenChance: number;
  rumorChance: number;
  glitchSourceChance: number;
  /** Per-message mutation chance is `mutationBaseChance + tension * mutationTensionFactor`. */
  mutationBaseChance: number;
  mutationTensionFactor: number;
}

export interface GlitchSettings {
  stateCheckIntervalMs: number;
  /** Per state check, `ambientBaseChance + tension * ambientTensionFactor`. */
  ambientBaseChance: number;
  ambientTensionFactor: number;
  /** Above the high-tension mark a glitch fires with `highTensionChance * tension`. */
  highTensionChance: number;
}

export interface ViewerChatSettings {
  enabled: boolean;
  minIntervalMs: number;
  maxIntervalMs: number;
  commandChance: number;
}

export interface SelectionSettings {
  leadInclusionChance: number;
  thirdParticipantChance: number;
  recentSpeakerWindowMs: number;
  recencyRelaxMs: number;
  repeatSpeakerPenalty: number;
  strictRepeatSpeakerPenalty: number;
  temperamentConstant: number;
}

export interface EngineSettings {
  /** Seed for the engine's random source; omitted means a fresh seed per run. */
  seed?: string;
  developerMode: boolean;
  /** When false the question intent is removed from every pool and bias. */
  includeQuestionIntent: boolean;
  rosterVariant: string;
  pacing: PacingSettings;
  threads: ThreadSettings;
  replies: ReplySettings;
  memory: MemorySettings;
  topics: TopicSettings;
  selection: SelectionSettings;
  glitches: GlitchSettings;
  viewerChat: ViewerChatSettings;
}

type SettingsSection = 'pacing' | 'threads' | 'replies' | 'memory' | 'topics' | 'selection' | 'glitches' | 'viewerChat';

export type SettingsOverrides = Partial<Omit<EngineSettings, SettingsSection>> & {
  pacing?: Partial<PacingSettings>;
  threads?: Partial<ThreadSettings>;
  replies?: Partial<ReplySettings>;
  memory?: Partial<MemorySettings>;
  topics?: Partial<TopicSettings>;
  selection?: Partial<SelectionSettings>;
  glitches?: Partial<GlitchSettings>;
  viewerChat?: Partial<ViewerChatSettings>;
};

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  developerMode: false,
  includeQuestionIntent: true,
  rosterVariant: 'core-four',
  pacing: {
    baseIntervalMs: 4_000,
    minIntervalMs: 1_200,
    maxIntervalMs: 9_000,
    hardCeilingMs: 12_000,
    highTension: 0.7,
    lowTension: 0.3,
    highTensionScale: 0.7,
    lowTensionScale: 1.3,
    crisisScale: 0.5,
    forceTension: 0.9
  },
  threads: {
    messagesPerPhase: 5,
    maxTurns: 40,
    resolutionMessagesBeforeRotation: 2,
    resolvingTensionFloor: 0.25,
    staleAfterMs: 120_000,
    historySize: 30
  },
  replies: {
    recentLineWindow: 12,
    recentIntentWindow: 6,
    duplicateOverlapThreshold: 0.7,
    maxGenerationAttempts: 5,
    hesitationChance: 0.3,
    catchphraseChance: 0.08
  },
  memory: {
    maxHistory: 100,
    maxConcepts: 50,
    maxRumors: 8,
    threatThreshold: 0.7,
    overseerBaseChance: 0.015,
    overseerCooldownMs: 45_000,
    overseerHazardFactor: 0.05,
    overseerMaxChance: 0.9,
    rumorDecayPerTick: 0.02,
    conversationBlendRate: 0.15,
    baselineDecayRate: 0.06,
    threatDecayPerTick: 0.01,
    escalationWindowMs: 600_000
  },
  topics: {
    escalateChance: 0.3,
    forbiddenChance: 0.1,
    rumorChance: 0.13,
    glitchSourceChance: 0.08,
    mutationBaseChance: 0.05,
    mutationTensionFactor: 0.1
  },
  selection: {
    leadInclusionChance: 0.95,
    thirdParticipantChance: 0.2,
    recentSpeakerWindowMs: 3_000,
    recencyRelaxMs: 15_000,
    repeatSpeakerPenalty: 0.3,
    strictRepeatSpeakerPenalty: 0.05,
    temperamentConstant: 0.5
  },
  glitches: {
    stateCheckIntervalMs: 2_500,
    ambientBaseChance: 0.005,
    ambientTensionFactor: 0.02,
    highTensionChance: 0.15
  },
  viewerChat: {
    enabled: false,
    minIntervalMs: 30_000,
    maxIntervalMs: 120_000,
    commandChance: 0.2
  }
};

export function resolveSettings(overrides: SettingsOverrides = {}): EngineSettings {
  const base = DEFAULT_ENGINE_SETTINGS;
  return {
    ...base,
    ...overrides,
    pacing: { ...base.pacing, ...overrides.pacing },
    threads: { ...base.threads, ...overrides.threads },
    replies: { ...base.replies, ...overrides.replies },
    memory: { ...base.memory, ...overrides.memory },
    topics: { ...base.topics, ...overrides.topics },
    selection: { ...base.selection, ...overrides.selection },
    glitches: { ...base.glitches, ...overrides.glitches },
    viewerChat: { ...base.viewerChat, ...overrides.viewerChat }
  };
}
