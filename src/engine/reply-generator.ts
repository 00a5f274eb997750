import templateFile from './reply-templates.json';
import type { ConversationThread } from './conversation-thread';
import type { PersonaModel } from './persona-model';
import { isNearDuplicateOf } from './text-similarity';
import { logger } from '../shared/logger';
import { pickWeighted, type RandomSource } from '../shared/random';
import { DEFAULT_ENGINE_SETTINGS, type ReplySettings } from '../shared/settings';
import { QUESTION_LIKE_INTENTS, type Intent } from '../shared/types';

const TEMPLATE_TOKENS = ['topic', 'from', 'event', 'related', 'loop', 'warnings'] as const;

export type TemplateToken = (typeof TEMPLATE_TOKENS)[number];

const TOKEN_PATTERN = /\{([^{}]*)\}/g;

const TOKEN_FILLERS: Record<TemplateToken, string> = {
  topic: 'this',
  from: 'someone',
  event: 'the last glitch',
  related: 'the other thing',
  loop: 'this',
  warnings: 'several'
};

const THEORY_VOCABULARY = /\b(maybe|what if|hypothesis|theory|believe|pattern|suppose)\b/;
const FEAR_VOCABULARY = /\b(scared|afraid|terrified|dangerous|hide|careful|dark)\b/;
const CHALLENGE_VOCABULARY = /\b(no|wrong|prove|proof|flawed|doubt|stop)\b/;

export interface TemplateLibrary {
  shared: Partial<Record<Intent, string[]>>;
  characters: Record<string, Partial<Record<Intent, string[]>>>;
  reply: string[];
  overseer: string[];
}

export class TemplateRenderError extends Error {
  readonly template: string;

  constructor(message: string, template: string) {
    super(message);
    this.name = 'TemplateRenderError';
    this.template = template;
  }
}

function isTemplateToken(value: string): value is TemplateToken {
  return TEMPLATE_TOKENS.some((token) => token === value);
}

export type TemplateValues = Partial<Record<TemplateToken, string>>;

export function renderTemplate(template: string, values: TemplateValues): string {
  if (/[{}]/.test(template.replace(TOKEN_PATTERN, ''))) {
    throw new TemplateRenderError('[replies] Unbalanced braces in template', template);
  }
  const rendered = template.replace(TOKEN_PATTERN, (_match, token: string) => {
    if (!isTemplateToken(token)) {
      throw new TemplateRenderError(`[replies] Unknown template token {${token}}`, template);
    }
    const value = values[token];
    return value && value.trim() ? value : TOKEN_FILLERS[token];
  });
  return rendered.charAt(0).toUpperCase() + rendered.slice(1);
}

function libraryTemplates(library: TemplateLibrary): string[] {
  const fromPools = (pools: Partial<Record<Intent, string[]>>) => Object.values(pools).flatMap((pool) => pool ?? []);
  return [
    ...fromPools(library.shared),
    ...Object.values(library.characters).flatMap(fromPools),
    ...library.reply,
    ...library.overseer
  ];
}

const DEFAULT_LIBRARY: TemplateLibrary = templateFile;
libraryTemplates(DEFAULT_LIBRARY).forEach((template) => {
  try {
    renderTemplate(template, {});
  } catch (error) {
    throw new Error(`[replies] reply-templates.json is malformed: ${template}`, { cause: error });
  }
});

export interface ReplyContext {
  /** Display name of the thread topic. */
  topic?: string;
  from?: string;
  event?: string;
  related?: string;
  loop?: number;
}

export interface ReplyRequest {
  intent: Intent;
  persona: PersonaModel;
  thread?: ConversationThread | null;
  context?: ReplyContext;
}

export interface ReplyDraft {
  speaker: string;
  intent: Intent;
  /** Rendered line before hesitation or catch-phrase decoration. */
  baseText: string;
  text: string;
  template: string;
  /** True when every candidate was a near-duplicate and the unfiltered pool was used. */
  exhausted: boolean;
}

export interface OverseerContext {
  topic?: string;
  loop: number;
  warnings: number;
}

export interface ReplyGeneratorOptions {
  random: RandomSource;
  settings?: ReplySettings;
  includeQuestionIntent?: boolean;
  templates?: TemplateLibrary;
}

export class ReplyGenerator {
  #random: RandomSource;
  #settings: ReplySettings;
  #includeQuestionIntent: boolean;
  #library: TemplateLibrary;
  #recentLines: string[] = [];
  #recentIntents: Intent[] = [];

  constructor(options: ReplyGeneratorOptions) {
    this.#random = options.random;
    this.#settings = options.settings ?? DEFAULT_ENGINE_SETTINGS.replies;
    this.#includeQuestionIntent = options.includeQuestionIntent ?? true;
    this.#library = options.templates ?? DEFAULT_LIBRARY;
  }

  get recentLines(): readonly string[] {
    return this.#recentLines;
  }

  get recentIntents(): readonly Intent[] {
    return this.#recentIntents;
  }

  resolveIntent(requested: Intent, persona: PersonaModel): Intent {
    if (!this.#includeQuestionIntent && QUESTION_LIKE_INTENTS.has(requested)) {
      return persona.topPreferredIntent(QUESTION_LIKE_INTENTS) ?? 'statement';
    }
    if (!QUESTION_LIKE_INTENTS.has(requested)) {
      return requested;
    }
    const lastTwo = this.#recentIntents.slice(-2);
    if (lastTwo.length === 2 && lastTwo.every((intent) => QUESTION_LIKE_INTENTS.has(intent))) {
      const substitute = persona.topPreferredIntent(QUESTION_LIKE_INTENTS) ?? 'statement';
      logger.debug('[replies] Interrogative loop guard substituted intent', {
        speaker: persona.name,
        requested,
        substitute
      });
      return substitute;
    }
    return requested;
  }

  templatesFor(intent: Intent, speaker: string): string[] {
    const characterPool = this.#library.characters[speaker]?.[intent];
    if (characterPool && characterPool.length > 0) {
      return characterPool;
    }
    const sharedPool = this.#library.shared[intent];
    if (sharedPool && sharedPool.length > 0) {
      return sharedPool;
    }
    return this.#library.reply;
  }

  isNearDuplicate(text: string, extra: readonly string[] = []): boolean {
    const threshold = this.#settings.duplicateOverlapThreshold;
    return isNearDuplicateOf(text, this.#recentLines, threshold) || isNearDuplicateOf(text, extra, threshold);
  }

  /** Selects and renders a line without recording it. Throws TemplateRenderError for a malformed template. */
  compose(request: ReplyRequest): ReplyDraft | null {
    const { persona } = request;
    const intent = this.resolveIntent(request.intent, persona);
    const pool = this.templatesFor(intent, persona.name);
    if (pool.length === 0) {
      return null;
    }

    const values = this.#contextValues(request.context);
    const rendered = pool.map((template) => ({ template, text: renderTemplate(template, values) }));
    const threadHistory = request.thread?.history ?? [];
    const fresh = rendered.filter((candidate) => !this.isNearDuplicate(candidate.text, threadHistory));
    const exhausted = fresh.length === 0;
    const candidates = exhausted ? rendered : fresh;

    const choice = pickWeighted(
      this.#random,
      candidates.map((candidate) => ({ item: candidate, weight: this.#weigh(candidate.text, persona) }))
    );
    if (!choice) {
      return null;
    }

    return {
      speaker: persona.name,
      intent,
      baseText: choice.text,
      text: this.#decorate(choice.text, persona),
      template: choice.template,
      exhausted
    };
  }

  commit(draft: ReplyDraft) {
    this.#recentLines.push(draft.baseText);
    while (this.#recentLines.length > this.#settings.recentLineWindow) {
      this.#recentLines.shift();
    }
    this.#recentIntents.push(draft.intent);
    while (this.#recentIntents.length > this.#settings.recentIntentWindow) {
      this.#recentIntents.shift();
    }
  }

  generate(request: ReplyRequest): ReplyDraft | null {
    const draft = this.compose(request);
    if (draft) {
      this.commit(draft);
    }
    return draft;
  }

  renderOverseerLine(context: OverseerContext): string {
    const pool = this.#library.overseer;
    if (pool.length === 0) {
      return 'OVERSEER: ...';
    }
    return renderTemplate(this.#random.pick(pool), {
      topic: context.topic,
      loop: String(context.loop),
      warnings: String(context.warnings)
    });
  }

  #contextValues(context: ReplyContext = {}): TemplateValues {
    return {
      topic: context.topic,
      from: context.from,
      event: context.event,
      related: context.related,
      loop: context.loop === undefined ? undefined : String(context.loop)
    };
  }

  #weigh(text: string, persona: PersonaModel): number {
    const lower = text.toLowerCase();
    const { openness, neuroticism, agreeableness } = persona.traits;
    let weight = 1;
    if (openness > 0.7 && THEORY_VOCABULARY.test(lower)) {
      weight *= 1 + openness;
    }
    if (neuroticism > 0.6 && FEAR_VOCABULARY.test(lower)) {
      weight *= 1 + neuroticism;
    }
    if (agreeableness < 0.4 && CHALLENGE_VOCABULARY.test(lower)) {
      weight *= 1.5;
    }
    Object.entries(persona.keywordBonuses).forEach(([keyword, bonus]) => {
      if (lower.includes(keyword.toLowerCase())) {
        weight *= bonus;
      }
    });
    return weight;
  }

  #decorate(text: string, persona: PersonaModel): string {
    const hesitationChance = this.#settings.hesitationChance * persona.traits.neuroticism;
    if (persona.hesitationPhrases.length > 0 && this.#random.chance(hesitationChance)) {
      const phrase = this.#random.pick(persona.hesitationPhrases).trim();
      return `${phrase} ${text}`;
    }
    if (persona.catchphrases.length > 0 && this.#random.chance(this.#settings.catchphraseChance)) {
      return `${text} ${this.#random.pick(persona.catchphrases)}`;
    }
    return text;
  }
}
