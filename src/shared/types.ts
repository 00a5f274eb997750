export type Intent =
  | 'statement'
  | 'theory'
  | 'challenge'
  | 'fear'
  | 'observation'
  | 'meta'
  | 'question'
  | 'agreement';

export const INTENTS: readonly Intent[] = [
  'statement',
  'theory',
  'challenge',
  'fear',
  'observation',
  'meta',
  'question',
  'agreement'
];

export const QUESTION_LIKE_INTENTS: ReadonlySet<Intent> = new Set<Intent>(['question']);

export type Mood =
  | 'neutral'
  | 'curious'
  | 'suspicious'
  | 'paranoid'
  | 'playful'
  | 'frustrated'
  | 'inspired'
  | 'scared';

export type PersonaRole = 'lead' | 'anxious' | 'skeptic' | 'dreamer';

export type InteractionKind = 'conversation' | 'disagreement' | 'support' | 'shared_information';

export type TopicStatus = 'neutral' | 'controversial' | 'forbidden' | 'solved' | 'mutating';

export type ThreadPhase = 'introduction' | 'development' | 'complication' | 'climax' | 'resolution';

export const THREAD_PHASES: readonly ThreadPhase[] = [
  'introduction',
  'development',
  'complication',
  'climax',
  'resolution'
];

export type ThreadStatus = 'active' | 'escalating' | 'interrupted' | 'stale' | 'closed';

export type ThreatKind =
  | 'reality_questioning'
  | 'surveillance'
  | 'system_integrity'
  | 'exposure'
  | 'memory_corruption';

export const THREAT_KINDS: readonly ThreatKind[] = [
  'reality_questioning',
  'surveillance',
  'system_integrity',
  'exposure',
  'memory_corruption'
];

export type MessageKind = 'dialogue' | 'overseer' | 'user';

export interface TypingHint {
  /** Multiplier on the presentation layer's base character delay (higher is faster). */
  speedMultiplier: number;
  hesitate: boolean;
}

export interface DialogueMessage {
  id: string;
  speaker: string;
  text: string;
  kind: MessageKind;
  intent?: Intent;
  threadId?: string;
  topic?: string;
  createdAt: number;
  typing?: TypingHint;
}

export interface NarrativeEvent {
  type: string;
  value: string;
  actor: string;
  timestamp: number;
  loop: number;
}

export type Ambience = 'default' | 'curious' | 'paranoid';

export interface DirectorMetrics {
  produced: number;
  forcedEmissions: number;
  skippedByPacing: number;
  skippedNoSpeaker: number;
  overseerInjections: number;
  userMessages: number;
  fallbackLines: number;
  duplicateRetries: number;
  staleByRepetition: number;
  threadsStarted: number;
}

export interface DirectorSnapshot {
  activeThreadId: string | null;
  topic: string | null;
  phase: ThreadPhase | null;
  status: ThreadStatus | null;
  turnCount: number;
  participants: string[];
  threadTension: number;
  threadCohesion: number;
  crisisMode: boolean;
  queuedUserMessages: number;
  nextDelayMs: number;
  metrics: DirectorMetrics;
}
