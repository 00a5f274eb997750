import { ThreadRegistry, type ConversationThread } from './conversation-thread';
import { analyzeMessage } from './message-analyzer';
import { NarrativeMemory } from './narrative-memory';
import { NarrativeTriggers, parseViewerCommand, resolveAmbience } from './narrative-triggers';
import type { PersonaModel } from './persona-model';
import { PersonaRegistry } from './personas';
import { ReplyGenerator, TemplateRenderError, type ReplyContext, type ReplyDraft } from './reply-generator';
import { TopicGraph, type Topic } from './topic-graph';
import { logger } from '../shared/logger';
import { createRandom, pickWeighted, type RandomSource } from '../shared/random';
import {
  resolveSettings,
  type EngineSettings,
  type SelectionSettings,
  type SettingsOverrides
} from '../shared/settings';
import {
  INTENTS,
  type Ambience,
  type DialogueMessage,
  type DirectorMetrics,
  type DirectorSnapshot,
  type Intent,
  type InteractionKind,
  type Mood,
  type NarrativeEvent,
  type ThreatKind
} from '../shared/types';

const OVERSEER_SPEAKER = 'OVERSEER';
const MAX_QUEUED_USER_MESSAGES = 20;
const PHASE_INTENT_BONUS = 2.5;
const PHASE_AFFINITY_BONUS = 1.3;
const RUMOR_SPREAD_CHANCE = 0.3;
const RECENT_SPEAKER_FACTOR = 0.1;

const MOOD_INTENT_BOOSTS: Partial<Record<Mood, Partial<Record<Intent, number>>>> = {
  scared: { fear: 2 },
  paranoid: { fear: 1.5, challenge: 1.5 },
  curious: { question: 1.5, theory: 1.5 },
  suspicious: { challenge: 1.5, observation: 1.2 },
  inspired: { theory: 1.5, meta: 1.5 },
  playful: { agreement: 1.3 },
  frustrated: { challenge: 2 }
};

const TOPIC_THREATS: Array<{ pattern: RegExp; kind: ThreatKind; delta: number }> = [
  { pattern: /leak|exposure/, kind: 'exposure', delta: 0.03 },
  { pattern: /memory|forgot|vanishing/, kind: 'memory_corruption', delta: 0.03 },
  { pattern: /overseer|observer|watch/, kind: 'surveillance', delta: 0.03 },
  { pattern: /corrupt|glitch|cascade|anomaly/, kind: 'system_integrity', delta: 0.02 },
  { pattern: /loop|mirror|identity|reset/, kind: 'reality_questioning', delta: 0.02 }
];

interface QueuedUserMessage {
  username: string;
  text: string;
  receivedAt: number;
}

export interface DirectorOptions {
  settings?: SettingsOverrides;
  random?: RandomSource;
  clock?: () => number;
  personas?: PersonaRegistry;
  topics?: TopicGraph;
  memory?: NarrativeMemory;
  threads?: ThreadRegistry;
  replies?: ReplyGenerator;
  triggers?: NarrativeTriggers;
}

function createMetrics(): DirectorMetrics {
  return {
    produced: 0,
    forcedEmissions: 0,
    skippedByPacing: 0,
    skippedNoSpeaker: 0,
    overseerInjections: 0,
    userMessages: 0,
    fallbackLines: 0,
    duplicateRetries: 0,
    staleByRepetition: 0,
    threadsStarted: 0
  };
}

/** Speaker weight factor for time since the persona last spoke in the thread. */
export function recencyFactor(sinceMs: number, selection: SelectionSettings): number {
  if (sinceMs < selection.recentSpeakerWindowMs) {
    return RECENT_SPEAKER_FACTOR;
  }
  if (sinceMs < selection.recencyRelaxMs) {
    const span = selection.recencyRelaxMs - selection.recentSpeakerWindowMs;
    return RECENT_SPEAKER_FACTOR + ((1 - RECENT_SPEAKER_FACTOR) * (sinceMs - selection.recentSpeakerWindowMs)) / span;
  }
  return 1;
}

function describeEvent(event: NarrativeEvent | undefined): string | undefined {
  if (!event) {
    return undefined;
  }
  switch (event.type) {
    case 'Glitch':
      return `the ${event.value.split(':')[0].trim().toLowerCase()}`;
    case 'Overseer':
      return 'the overseer warning';
    case 'Observer':
      return 'the observer showing up';
    case 'Threat Threshold':
      return `the ${event.value.replace(/_/g, ' ')} spike`;
    default:
      return undefined;
  }
}

export class DialogueDirector {
  readonly settings: EngineSettings;
  readonly personas: PersonaRegistry;
  readonly topics: TopicGraph;
  readonly memory: NarrativeMemory;
  readonly threads: ThreadRegistry;
  readonly replies: ReplyGenerator;
  readonly triggers: NarrativeTriggers;
  #random: RandomSource;
  #clock: () => number;
  #queue: QueuedUserMessage[] = [];
  #pendingResponse = false;
  #crisisMode = false;
  #currentThreadId: string | null = null;
  #escalatedTopic: Topic | null = null;
  #lastMessageAt: number;
  #lastActivityAt: number;
  #messageCounter = 0;
  #metrics: DirectorMetrics = createMetrics();

  constructor(options: DirectorOptions = {}) {
    this.settings = resolveSettings(options.settings);
    this.#clock = options.clock ?? (() => Date.now());
    this.#random = options.random ?? createRandom(this.settings.seed);
    const now = this.#clock();

    this.personas = options.personas ?? PersonaRegistry.fromVariant(this.settings.rosterVariant);
    this.topics = options.topics ?? new TopicGraph(this.#random, this.settings.topics, now);
    this.memory = options.memory ?? new NarrativeMemory(this.settings.memory, now);
    this.threads = options.threads ?? new ThreadRegistry(this.settings.threads);
    this.replies =
      options.replies ??
      new ReplyGenerator({
        random: this.#random,
        settings: this.settings.replies,
        includeQuestionIntent: this.settings.includeQuestionIntent
      });
    this.triggers = options.triggers ?? new NarrativeTriggers(this.memory, this.#random, this.settings.glitches);

    this.#lastMessageAt = now;
    this.#lastActivityAt = now;
  }

  get crisisMode() {
    return this.#crisisMode;
  }

  get metrics(): DirectorMetrics {
    return { ...this.#metrics };
  }

  enqueueUserMessage(username: string, text: string): boolean {
    const name = username.trim();
    const body = text.trim();
    if (!name || !body) {
      return false;
    }
    if (this.#queue.length >= MAX_QUEUED_USER_MESSAGES) {
      logger.warn('[director] User message queue full; dropping oldest');
      this.#queue.shift();
    }
    this.#queue.push({ username: name, text: body, receivedAt: this.#clock() });
    return true;
  }

  reportExternalActivity(now: number = this.#clock()) {
    this.#lastActivityAt = now;
  }

  notifyCrisisMode(enabled: boolean, now: number = this.#clock()) {
    if (enabled === this.#crisisMode) {
      return;
    }
    this.#crisisMode = enabled;
    logger.info('[director] Crisis mode changed', { enabled });
    if (enabled) {
      this.triggers.trigger('crisis_start', 'presentation', now);
    }
  }

  forceSessionReset(now: number = this.#clock()) {
    this.memory.reset(now);
    this.threads.closeAll();
    this.#currentThreadId = null;
    this.#escalatedTopic = null;
    this.#pendingResponse = false;
    this.#lastMessageAt = now;
    logger.info('[director] Session reset', { loop: this.memory.loopCount });
  }

  produceNextMessage(now: number = this.#clock()): DialogueMessage | null {
    const queued = this.#queue.shift();
    if (queued) {
      return this.#processUserMessage(queued, now);
    }

    if (this.memory.shouldInjectOverseer(this.#random, now)) {
      return this.#emitOverseer(now);
    }

    const current = this.#currentThread();
    const urgent = current?.consumeUrgency() ?? false;
    const idleMs = now - Math.max(this.#lastMessageAt, this.#lastActivityAt);
    const forced =
      this.#pendingResponse ||
      urgent ||
      this.memory.tension > this.settings.pacing.forceTension ||
      idleMs > this.settings.pacing.hardCeilingMs;

    if (!forced && now - this.#lastMessageAt < this.#computeIntervalMs(current)) {
      this.#metrics.skippedByPacing += 1;
      return null;
    }
    if (forced) {
      this.#metrics.forcedEmissions += 1;
    }

    this.triggers.checkStateTriggers(now);

    const thread = this.#ensureThread(now);
    const speaker = this.#selectSpeaker(thread, now);
    if (!speaker) {
      this.#metrics.skippedNoSpeaker += 1;
      return null;
    }

    const draft = this.#generate(thread, speaker);
    if (!draft) {
      return null;
    }
    return this.#emitDialogue(thread, speaker, draft, now);
  }

  getNextDelayMs(now: number = this.#clock()): number {
    if (this.#queue.length > 0 || this.#pendingResponse) {
      return 0;
    }
    const interval = this.#computeIntervalMs(this.#currentThread());
    return Math.max(0, this.#lastMessageAt + interval - now);
  }

  getAmbience(): Ambience {
    const focus = this.personas.byRole('lead') ?? this.personas.list()[0];
    return focus ? resolveAmbience(this.memory, focus) : 'default';
  }

  getDebugSnapshot(now: number = this.#clock()): DirectorSnapshot {
    const thread = this.#currentThread();
    return {
      activeThreadId: thread?.id ?? null,
      topic: thread ? thread.topic.displayName() : null,
      phase: thread?.phase ?? null,
      status: thread?.status ?? null,
      turnCount: thread?.turnCount ?? 0,
      participants: thread ? [...thread.participants] : [],
      threadTension: thread?.tension ?? 0,
      threadCohesion: thread?.cohesion ?? 0,
      crisisMode: this.#crisisMode,
      queuedUserMessages: this.#queue.length,
      nextDelayMs: this.getNextDelayMs(now),
      metrics: this.metrics
    };
  }

  getDebugLines(now: number = this.#clock()): string[] {
    const snapshot = this.getDebugSnapshot(now);
    const threadLine = snapshot.activeThreadId
      ? `thread ${snapshot.activeThreadId} | ${snapshot.topic} | ${snapshot.phase} | ${snapshot.status} | turns ${snapshot.turnCount}`
      : 'thread none';
    return [
      `director | crisis ${snapshot.crisisMode} | queued ${snapshot.queuedUserMessages} | next ${snapshot.nextDelayMs}ms`,
      threadLine,
      ...this.memory.debugLines(),
      ...this.personas.list().map((persona) => persona.debugLine())
    ];
  }

  getNarrativeHistory(limit?: number): NarrativeEvent[] {
    return this.memory.getHistory(limit);
  }

  #currentThread(): ConversationThread | null {
    if (this.#currentThreadId) {
      const thread = this.threads.get(this.#currentThreadId);
      if (thread) {
        return thread;
      }
    }
    return this.threads.getActive();
  }

  #computeIntervalMs(thread: ConversationThread | null): number {
    const pacing = this.settings.pacing;
    let interval = pacing.baseIntervalMs * (thread?.pacingMultiplier() ?? 1);
    const tension = this.memory.tension;
    if (tension > pacing.highTension) {
      interval *= pacing.highTensionScale;
    } else if (tension < pacing.lowTension) {
      interval *= pacing.lowTensionScale;
    }
    if (this.#crisisMode) {
      interval *= pacing.crisisScale;
    }
    return Math.round(Math.max(pacing.minIntervalMs, Math.min(pacing.maxIntervalMs, interval)));
  }

  #processUserMessage(queued: QueuedUserMessage, now: number): DialogueMessage {
    this.#metrics.userMessages += 1;
    const command = parseViewerCommand(queued.text);
    if (command?.kind === 'trigger') {
      this.triggers.trigger(command.trigger, queued.username, now);
    }
    const text = command?.kind === 'inject' ? command.text : queued.text;

    this.triggers.trigger('viewer_message', queued.username, now);
    if (!command) {
      analyzeMessage(text).keywords.forEach((keyword) => this.memory.rememberConcept(keyword, queued.username));
    }
    this.memory.addEvent('Viewer', `${queued.username}: ${text}`, queued.username, now);

    this.#pendingResponse = true;
    this.#lastMessageAt = now;
    return {
      id: this.#nextMessageId(),
      speaker: queued.username,
      text,
      kind: 'user',
      createdAt: now
    };
  }

  #emitOverseer(now: number): DialogueMessage {
    const thread = this.#currentThread();
    const text = this.replies.renderOverseerLine({
      topic: thread?.topic.displayName(),
      loop: this.memory.loopCount,
      warnings: this.memory.overseerWarnings
    });

    if (thread && thread.status !== 'closed') {
      thread.setStatus('interrupted');
    }
    this.memory.adjust('tension', 0.1);
    this.memory.adjust('paranoia', 0.05);
    this.personas.list().forEach((persona) => {
      persona.adjustDynamics({ fear: 0.1 * persona.traits.neuroticism, suspicion: 0.05 });
    });

    this.#metrics.overseerInjections += 1;
    this.#lastMessageAt = now;
    return {
      id: this.#nextMessageId(),
      speaker: OVERSEER_SPEAKER,
      text,
      kind: 'overseer',
      threadId: thread?.id,
      createdAt: now
    };
  }

  #rotationReason(thread: ConversationThread): string | null {
    const limits = this.settings.threads;
    if (thread.status !== 'active' && thread.status !== 'escalating') {
      return `status ${thread.status}`;
    }
    if (thread.phase === 'resolution' && thread.messagesInPhase >= limits.resolutionMessagesBeforeRotation) {
      return 'resolved';
    }
    if (thread.turnCount >= limits.maxTurns) {
      return 'turn ceiling';
    }
    if (thread.hasClimaxed && thread.phase === 'resolution' && thread.tension < limits.resolvingTensionFloor) {
      return 'climaxed and cooling';
    }
    return null;
  }

  #ensureThread(now: number): ConversationThread {
    this.threads.pruneStale(now);
    const current = this.#currentThread();
    if (current) {
      const reason = this.#rotationReason(current);
      if (!reason) {
        this.#currentThreadId = current.id;
        return current;
      }
      logger.debug('[director] Rotating thread', { id: current.id, reason });
      this.threads.close(current.id);
    }

    const participants = this.#selectParticipants();
    const topic = this.#selectTopic(now, current?.topic);
    const thread = this.threads.start(
      topic,
      participants.map((persona) => persona.name),
      now
    );
    thread.tension = this.memory.tension;
    thread.cohesion = this.memory.cohesion;
    participants.forEach((persona) => persona.updateMood({ tension: this.memory.tension, topic: topic.core }));

    this.#currentThreadId = thread.id;
    this.#metrics.threadsStarted += 1;
    this.memory.addEvent('Thread', `${thread.id}: ${topic.displayName()}`, 'DIRECTOR', now);
    if (this.settings.developerMode) {
      logger.debug('[director] Thread started', { id: thread.id, topic: topic.core, participants: thread.participants });
    }
    return thread;
  }

  #selectParticipants(): PersonaModel[] {
    const selection = this.settings.selection;
    const all = this.personas.list();
    const chosen: PersonaModel[] = [];
    const lead = this.personas.byRole('lead');
    if (lead && this.#random.chance(selection.leadInclusionChance)) {
      chosen.push(lead);
    }

    const remaining = () => all.filter((persona) => !chosen.includes(persona));
    const affinity = this.#affinityPersona(remaining());
    if (affinity) {
      chosen.push(affinity);
    }
    while (chosen.length < 2 && remaining().length > 0) {
      chosen.push(this.#random.pick(remaining()));
    }
    if (remaining().length > 0 && this.#random.chance(selection.thirdParticipantChance)) {
      chosen.push(this.#random.pick(remaining()));
    }
    return chosen;
  }

  #affinityPersona(candidates: PersonaModel[]): PersonaModel | undefined {
    const byRole = (role: PersonaModel['role']) => candidates.find((persona) => persona.role === role);
    if (this.memory.overseerWarnings >= 2) {
      return byRole('anxious');
    }
    if (this.memory.flags.observerDetected) {
      return byRole('skeptic');
    }
    if (this.memory.metaAwareness > 0.5) {
      return byRole('dreamer');
    }
    return undefined;
  }

  /** Narrative state first; an escalation left by a mutation outranks only the tension and random picks. */
  #selectTopic(now: number, previous?: Topic): Topic {
    const memory = this.memory;
    const escalated = this.#escalatedTopic;
    this.#escalatedTopic = null;
    let topic: Topic;
    if (memory.flags.rareRedGlitchOccurred) {
      topic = this.topics.getOrCreate('red cascade', now);
    } else if (memory.overseerWarnings >= 3) {
      topic = this.topics.getOrCreate('overseer warning', now);
    } else if (memory.flags.observerDetected) {
      const count = memory.observerCount;
      topic = this.topics.getOrCreate(count === 1 ? 'the observer' : `${count} observers`, now);
    } else if (memory.hasActiveRumor('protocol') || memory.flags.protocolLeaked) {
      topic = this.topics.getOrCreate('protocol leak', now);
    } else if (escalated) {
      topic = escalated;
    } else if (memory.tension > 0.6) {
      topic = this.topics.getControversialOrForbidden();
    } else {
      topic = this.topics.getRandom();
    }

    if (previous && topic.core === previous.core) {
      topic = this.topics.getRelated(topic);
    }
    return topic;
  }

  #selectSpeaker(thread: ConversationThread, now: number): PersonaModel | undefined {
    const selection = this.settings.selection;
    const entries = thread.participants.flatMap((name) => {
      const persona = this.personas.get(name);
      if (!persona) {
        return [];
      }
      const lastSpokeAt = thread.lastSpokeAt.get(name);
      const recency = recencyFactor(
        lastSpokeAt === undefined ? Number.POSITIVE_INFINITY : now - lastSpokeAt,
        selection
      );

      const phaseIntent = thread.getPhaseAppropriateIntent(persona, {
        includeQuestion: this.settings.includeQuestionIntent
      });
      const phaseAffinity = persona.preferredIntentWeight(phaseIntent) > 1 ? PHASE_AFFINITY_BONUS : 1;

      let repeat = 1;
      if (thread.lastSpeaker === name) {
        repeat = thread.allowInterruption ? selection.repeatSpeakerPenalty : selection.strictRepeatSpeakerPenalty;
      }

      const { playfulness, curiosity } = persona.dynamics;
      const weight =
        recency *
        persona.speakerBias *
        phaseAffinity *
        this.#narrativeSpeakerBonus(persona) *
        repeat *
        (playfulness + curiosity + selection.temperamentConstant);
      return [{ item: persona, weight }];
    });
    return pickWeighted(this.#random, entries);
  }

  #narrativeSpeakerBonus(persona: PersonaModel): number {
    const memory = this.memory;
    let bonus = 1;
    if (persona.role === 'anxious' && memory.overseerWarnings >= 2) {
      bonus *= 1.5;
    }
    if (persona.role === 'skeptic' && memory.flags.observerDetected) {
      bonus *= 1.3;
    }
    if (persona.role === 'dreamer' && memory.metaAwareness > 0.5) {
      bonus *= 1.3;
    }
    if (persona.role === 'lead' && memory.flags.rareRedGlitchOccurred) {
      bonus *= 1.2;
    }
    return bonus;
  }

  #chooseIntent(thread: ConversationThread, persona: PersonaModel, exclude: ReadonlySet<Intent>): Intent {
    const phaseIntent = thread.getPhaseAppropriateIntent(persona, {
      includeQuestion: this.settings.includeQuestionIntent
    });
    const boosts = MOOD_INTENT_BOOSTS[persona.mood] ?? {};
    const entries = INTENTS.filter(
      (intent) => (this.settings.includeQuestionIntent || intent !== 'question') && !exclude.has(intent)
    ).map((intent) => {
      let weight = persona.preferredIntentWeight(intent) * (boosts[intent] ?? 1);
      if (intent === phaseIntent) {
        weight *= PHASE_INTENT_BONUS;
      }
      if (intent === 'meta') {
        weight *= 1 + this.memory.metaAwareness * 2;
      }
      if (intent === 'agreement') {
        weight *= 0.5 + thread.cohesion;
      }
      return { item: intent, weight };
    });
    return pickWeighted(this.#random, entries) ?? phaseIntent;
  }

  #replyContext(thread: ConversationThread, speaker: PersonaModel): ReplyContext {
    const related = this.topics.relatedCores(thread.topic.core);
    return {
      topic: thread.topic.displayName(),
      from: thread.lastSpeaker && thread.lastSpeaker !== speaker.name ? thread.lastSpeaker : undefined,
      event: describeEvent(this.memory.latestNotableEvent()),
      related: related.length > 0 ? this.#random.pick(related) : undefined,
      loop: this.memory.loopCount
    };
  }

  #generate(thread: ConversationThread, speaker: PersonaModel): ReplyDraft | null {
    const attempts = this.settings.replies.maxGenerationAttempts;
    const context = this.#replyContext(thread, speaker);
    const tried = new Set<Intent>();

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      const intent = this.#chooseIntent(thread, speaker, tried);
      let draft: ReplyDraft | null;
      try {
        draft = this.replies.compose({ intent, persona: speaker, thread, context });
      } catch (error) {
        if (!(error instanceof TemplateRenderError)) {
          throw error;
        }
        logger.warn('[director] Template render failed; using fallback line', {
          speaker: speaker.name,
          template: error.template
        });
        return this.#fallbackDraft(speaker, intent);
      }

      if (draft && !draft.exhausted) {
        return draft;
      }
      this.#metrics.duplicateRetries += 1;
      tried.add(draft?.intent ?? intent);
    }

    thread.setStatus('stale');
    this.#metrics.staleByRepetition += 1;
    logger.info('[director] Generation exhausted; thread marked stale', { id: thread.id, speaker: speaker.name });
    return null;
  }

  #fallbackDraft(speaker: PersonaModel, intent: Intent): ReplyDraft | null {
    if (speaker.fallbackLines.length === 0) {
      return null;
    }
    this.#metrics.fallbackLines += 1;
    const line = this.#random.pick(speaker.fallbackLines);
    return { speaker: speaker.name, intent, baseText: line, text: line, template: '', exhausted: false };
  }

  #emitDialogue(
    thread: ConversationThread,
    speaker: PersonaModel,
    draft: ReplyDraft,
    now: number
  ): DialogueMessage {
    const previousSpeaker = thread.lastSpeaker;
    this.replies.commit(draft);
    thread.registerMessage({ speaker: speaker.name, text: draft.text }, now);
    thread.topic.markDiscussed(speaker.name, now);
    if (draft.intent === 'challenge') {
      thread.topic.markDoubted(speaker.name);
    }
    this.memory.addEvent('Dialogue', `${speaker.name}: ${draft.text}`, speaker.name, now);

    this.#applyDynamics(thread, speaker, draft, previousSpeaker, now);

    this.#pendingResponse = false;
    this.#lastMessageAt = now;
    this.#metrics.produced += 1;

    const message: DialogueMessage = {
      id: this.#nextMessageId(),
      speaker: speaker.name,
      text: draft.text,
      kind: 'dialogue',
      intent: draft.intent,
      threadId: thread.id,
      topic: thread.topic.displayName(),
      createdAt: now,
      typing: {
        speedMultiplier: speaker.getTypingSpeedMultiplier(draft.text),
        hesitate: speaker.shouldHesitateOnTopic(draft.text)
      }
    };
    if (this.settings.developerMode) {
      logger.debug('[director] Message produced', { speaker: message.speaker, intent: message.intent, thread: thread.id });
    }
    return message;
  }

  #applyDynamics(
    thread: ConversationThread,
    speaker: PersonaModel,
    draft: ReplyDraft,
    previousSpeaker: string | null,
    now: number
  ) {
    const memory = this.memory;
    const signals = analyzeMessage(draft.text);
    const { disagreement, agreement, meta, urgency } = signals.counts;

    thread.adjustTension(0.04 * disagreement - 0.03 * agreement + 0.05 * urgency);
    thread.adjustCohesion(0.04 * agreement - 0.05 * disagreement);
    if (meta > 0) {
      memory.setFlag('deepDiscussion', true);
      memory.adjust('metaAwareness', 0.02 * meta);
      memory.updateThreatLevel('reality_questioning', 0.02 * meta, now);
    }

    switch (draft.intent) {
      case 'fear':
        memory.updateThreatLevel('surveillance', 0.02, now);
        memory.adjust('paranoia', 0.01);
        break;
      case 'meta':
        memory.updateThreatLevel('reality_questioning', 0.02, now);
        break;
      case 'observation':
        memory.updateThreatLevel('system_integrity', thread.topic.isGlitchSource ? 0.03 : 0.01, now);
        break;
      default:
        break;
    }

    const core = thread.topic.core.toLowerCase();
    TOPIC_THREATS.forEach(({ pattern, kind, delta }) => {
      if (pattern.test(core)) {
        memory.updateThreatLevel(kind, delta, now);
      }
    });

    if (thread.topic.isRumor && this.#random.chance(RUMOR_SPREAD_CHANCE)) {
      memory.addRumor(`${thread.topic.core} is real`, speaker.name);
    }
    memory.decayRumors();
    memory.rememberConcept(thread.topic.core, speaker.name);

    memory.blendConversation(thread.tension, thread.cohesion);
    memory.decayTowardBaseline();
    memory.decayThreats();

    if (previousSpeaker && previousSpeaker !== speaker.name) {
      const kind = this.#interactionKind(draft.intent, disagreement, agreement);
      speaker.updateRelationship(previousSpeaker, kind, thread.topic.core);
      this.personas.get(previousSpeaker)?.updateRelationship(speaker.name, kind, thread.topic.core);
    }

    const { mutationBaseChance, mutationTensionFactor } = this.settings.topics;
    if (this.#random.chance(mutationBaseChance + memory.tension * mutationTensionFactor)) {
      const next = this.topics.mutate(thread.topic, speaker.name);
      if (next !== thread.topic) {
        this.#escalatedTopic = next;
        memory.addEvent('Topic Escalation', `${thread.topic.core} -> ${next.core}`, speaker.name, now);
      }
    }

    const signal = { tension: memory.tension, paranoia: memory.paranoia, metaAwareness: memory.metaAwareness };
    this.personas.list().forEach((persona) => {
      persona.absorbNarrative(signal);
      persona.updateMood({ tension: memory.tension });
    });
  }

  #interactionKind(intent: Intent, disagreement: number, agreement: number): InteractionKind {
    if (intent === 'challenge' || disagreement > agreement) {
      return 'disagreement';
    }
    if (intent === 'agreement') {
      return 'support';
    }
    if (intent === 'observation') {
      return 'shared_information';
    }
    return 'conversation';
  }

  #nextMessageId(): string {
    this.#messageCounter += 1;
    return `msg_${this.#messageCounter}`;
  }
}
