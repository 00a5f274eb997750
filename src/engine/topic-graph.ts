import topicSeed from './topic-seed.json';
import { logger } from '../shared/logger';
import type { RandomSource } from '../shared/random';
import { DEFAULT_ENGINE_SETTINGS, type TopicSettings } from '../shared/settings';
import type { TopicStatus } from '../shared/types';

interface TopicSeedShape {
  cores: string[];
  mutations: string[];
  related: string[][];
}

const parsed: TopicSeedShape = topicSeed;
if (
  parsed.cores.length === 0 ||
  parsed.mutations.some((template) => !template.includes('{0}')) ||
  parsed.related.some((pair) => pair.length !== 2)
) {
  throw new Error('[topics] topic-seed.json is empty or malformed');
}

export const SEED_TOPIC_CORES: readonly string[] = [...parsed.cores];

export class Topic {
  readonly core: string;
  variant: string;
  status: TopicStatus;
  discussionCount = 0;
  readonly createdAt: number;
  lastDiscussedAt: number;
  readonly believers = new Set<string>();
  readonly doubters = new Set<string>();
  readonly forbiddenBy = new Set<string>();
  isRumor = false;
  isGlitchSource = false;

  constructor(core: string, now: number = Date.now()) {
    this.core = core;
    this.variant = core;
    this.status = 'neutral';
    this.createdAt = now;
    this.lastDiscussedAt = now;
  }

  markDiscussed(persona: string, now: number = Date.now()) {
    this.discussionCount += 1;
    this.lastDiscussedAt = now;
    this.believers.add(persona);
  }

  markDoubted(persona: string) {
    this.doubters.add(persona);
  }

  markForbidden(persona: string) {
    this.forbiddenBy.add(persona);
    this.status = 'forbidden';
  }

  displayName(): string {
    if (this.status === 'forbidden') {
      return '[REDACTED]';
    }
    if (this.variant && this.variant !== this.core) {
      return this.variant;
    }
    return this.core;
  }
}

export class TopicGraph {
  #topics = new Map<string, Topic>();
  #related = new Map<string, string[]>();
  #random: RandomSource;
  #settings: TopicSettings;

  constructor(random: RandomSource, settings: TopicSettings = DEFAULT_ENGINE_SETTINGS.topics, now: number = Date.now()) {
    this.#random = random;
    this.#settings = settings;
    parsed.cores.forEach((core) => this.getOrCreate(core, now));
    parsed.related.forEach(([a, b]) => this.addRelation(a, b));
  }

  addRelation(a: string, b: string) {
    if (a === b) {
      return;
    }
    const left = this.#related.get(a) ?? [];
    const right = this.#related.get(b) ?? [];
    if (!left.includes(b)) {
      left.push(b);
    }
    if (!right.includes(a)) {
      right.push(a);
    }
    this.#related.set(a, left);
    this.#related.set(b, right);
  }

  getOrCreate(core: string, now: number = Date.now()): Topic {
    let topic = this.#topics.get(core);
    if (!topic) {
      topic = new Topic(core, now);
      this.#topics.set(core, topic);
    }
    return topic;
  }

  get(core: string): Topic | undefined {
    return this.#topics.get(core);
  }

  getRandom(): Topic {
    return this.getOrCreate(this.#random.pick(SEED_TOPIC_CORES));
  }

  getRelated(topic: Topic): Topic {
    const options = this.#related.get(topic.core);
    if (!options || options.length === 0) {
      return this.getRandom();
    }
    return this.getOrCreate(this.#random.pick(options));
  }

  relatedCores(core: string): readonly string[] {
    return this.#related.get(core) ?? [];
  }

  /**
   * Escalates to a related topic, or rewrites the display variant in place and
   * rolls the status and flag changes independently. A forbidding roll is
   * credited to `actor`.
   */
  mutate(topic: Topic, actor = 'SYSTEM'): Topic {
    if (this.#random.chance(this.#settings.escalateChance)) {
      return this.getRelated(topic);
    }

    const template = this.#random.pick(parsed.mutations);
    topic.variant = template.replace('{0}', topic.core);

    if (this.#random.chance(this.#settings.forbiddenChance)) {
      topic.markForbidden(actor);
    } else if (topic.status === 'mutating') {
      topic.status = 'controversial';
    } else if (topic.status === 'neutral' || topic.status === 'solved') {
      topic.status = 'mutating';
    }
    if (this.#random.chance(this.#settings.rumorChance)) {
      topic.isRumor = true;
    }
    if (this.#random.chance(this.#settings.glitchSourceChance)) {
      topic.isGlitchSource = true;
    }

    logger.debug('[topics] Topic mutated', { core: topic.core, variant: topic.variant, status: topic.status });
    return topic;
  }

  getControversialOrForbidden(): Topic {
    const matches = this.list().filter(
      (topic) => topic.status === 'controversial' || topic.status === 'forbidden'
    );
    if (matches.length > 0) {
      return this.#random.pick(matches);
    }
    const topic = this.getRandom();
    topic.status = 'controversial';
    return topic;
  }

  markRumor(core: string, by?: string): Topic {
    const topic = this.getOrCreate(core);
    topic.isRumor = true;
    if (by) {
      topic.believers.add(by);
    }
    return topic;
  }

  list(): Topic[] {
    return Array.from(this.#topics.values());
  }

  debugLines(): string[] {
    return this.list().map(
      (topic) =>
        `${topic.displayName()} | ${topic.status} | rumor: ${topic.isRumor} | discussed: ${topic.discussionCount}`
    );
  }
}
