import { describe, expect, it } from 'vitest';

import { DialogueDirector, recencyFactor, type DirectorOptions } from '../director';
import { ReplyGenerator, type TemplateLibrary } from '../reply-generator';
import { overlapRatio } from '../text-similarity';
import { createRandom } from '../../shared/random';
import { DEFAULT_ENGINE_SETTINGS } from '../../shared/settings';
import { scriptedRandom } from '../../test/scripted-random';

const createDirector = (options: DirectorOptions = {}) =>
  new DialogueDirector({ clock: () => 0, ...options, settings: { seed: 'test-seed', ...options.settings } });

// No spontaneous glitches, so state checks never consume draws or move tension.
const quietDirector = (options: DirectorOptions = {}) =>
  createDirector({
    ...options,
    settings: { ...options.settings, glitches: { ambientBaseChance: 0, ambientTensionFactor: 0 } }
  });

const quietReplies = (line: string) =>
  new ReplyGenerator({
    random: createRandom('test-seed'),
    templates: singleLineLibrary(line),
    settings: { ...DEFAULT_ENGINE_SETTINGS.replies, hesitationChance: 0, catchphraseChance: 0 }
  });

const firstThreadTopic = (setup: (director: DialogueDirector) => void) => {
  const director = quietDirector();
  setup(director);
  director.produceNextMessage(13_000);
  return director.threads.get('thread_0')?.topic;
};

const singleLineLibrary = (line: string): TemplateLibrary => ({
  shared: {},
  characters: {},
  reply: [line],
  overseer: []
});

const startThread = (director: DialogueDirector, messages: number) => {
  const thread = director.threads.start(director.topics.getOrCreate('mirror test'), ['Orion', 'Nova'], 0);
  for (let index = 0; index < messages; index += 1) {
    thread.registerMessage({ speaker: index % 2 === 0 ? 'Orion' : 'Nova', text: `scripted line ${index}` }, 0);
  }
  return thread;
};

describe('DialogueDirector', () => {
  it('answers a queued viewer immediately under high tension', () => {
    const director = createDirector();
    director.memory.setScalar('tension', 0.95);
    expect(director.enqueueUserMessage('viewer42', 'hello in there')).toBe(true);

    const viewerLine = director.produceNextMessage(0);
    expect(viewerLine).toMatchObject({ kind: 'user', speaker: 'viewer42', text: 'hello in there', createdAt: 0 });

    const reply = director.produceNextMessage(1);
    expect(reply).not.toBeNull();
    expect(reply?.kind).toBe('dialogue');
    expect(reply?.threadId).toBe('thread_0');
    expect(director.metrics.userMessages).toBe(1);
    expect(director.metrics.produced).toBe(1);
  });

  it('holds back until the pacing interval has elapsed', () => {
    const director = createDirector();

    expect(director.produceNextMessage(1_000)).toBeNull();
    expect(director.metrics.skippedByPacing).toBe(1);
    expect(director.getNextDelayMs(1_000)).toBe(4_200);

    const message = director.produceNextMessage(5_200);
    expect(message?.kind).toBe('dialogue');
    expect(message?.id).toBe('msg_1');
    expect(director.metrics.forcedEmissions).toBe(0);
  });

  it('forces a message once the room has been quiet past the hard ceiling', () => {
    const director = createDirector();
    const message = director.produceNextMessage(13_000);

    expect(message?.kind).toBe('dialogue');
    expect(message?.typing?.speedMultiplier).toBeGreaterThanOrEqual(0.3);
    expect(director.metrics.forcedEmissions).toBe(1);
  });

  it('rotates to a fresh thread once resolution has run its course', () => {
    const director = createDirector();
    const previous = startThread(director, 26);
    expect(previous.phase).toBe('resolution');
    expect(previous.messagesInPhase).toBe(2);

    const message = director.produceNextMessage(20_000);

    expect(message?.threadId).toBe('thread_1');
    expect(previous.status).toBe('closed');
    expect(director.getDebugSnapshot(20_000).activeThreadId).toBe('thread_1');
  });

  it('keeps talking in a live thread', () => {
    const director = createDirector();
    startThread(director, 3);
    expect(director.produceNextMessage(13_000)?.threadId).toBe('thread_0');
  });

  it('skips the tick when no participant is a known persona', () => {
    const director = createDirector();
    director.threads.start(director.topics.getOrCreate('exit code'), ['Ghost'], 0);

    expect(director.produceNextMessage(13_000)).toBeNull();
    expect(director.metrics.skippedNoSpeaker).toBe(1);
  });

  it('falls back to a persona line when a template cannot be rendered', () => {
    const director = createDirector({
      replies: new ReplyGenerator({ random: createRandom('test-seed'), templates: singleLineLibrary('{bogus} happened') })
    });

    const message = director.produceNextMessage(13_000);
    const speaker = message ? director.personas.get(message.speaker) : undefined;

    expect(speaker?.fallbackLines).toContain(message?.text);
    expect(director.metrics.fallbackLines).toBe(1);
  });

  it('marks a thread stale when every line would repeat', () => {
    const director = createDirector({
      replies: new ReplyGenerator({ random: createRandom('test-seed'), templates: singleLineLibrary('Static on the line.') })
    });

    expect(director.produceNextMessage(13_000)?.threadId).toBe('thread_0');
    expect(director.produceNextMessage(26_000)).toBeNull();

    expect(director.threads.get('thread_0')?.status).toBe('stale');
    expect(director.metrics.staleByRepetition).toBe(1);
    expect(director.metrics.duplicateRetries).toBe(5);
  });

  it('lets the overseer interrupt once the cooldown has passed', () => {
    const director = createDirector({ settings: { memory: { overseerBaseChance: 1, overseerMaxChance: 1 } } });

    expect(director.produceNextMessage(44_999)?.kind).not.toBe('overseer');
    const message = director.produceNextMessage(45_000);

    expect(message?.kind).toBe('overseer');
    expect(message?.speaker).toBe('OVERSEER');
    expect(message?.text.startsWith('OVERSEER:')).toBe(true);
    expect(message?.text).not.toMatch(/[{}]/);
    expect(director.memory.overseerWarnings).toBe(1);
    expect(director.metrics.overseerInjections).toBe(1);
  });

  it('interrupts the running thread when the overseer speaks', () => {
    const director = createDirector({ settings: { memory: { overseerBaseChance: 1, overseerMaxChance: 1 } } });
    const thread = startThread(director, 2);

    const message = director.produceNextMessage(45_000);

    expect(message?.threadId).toBe('thread_0');
    expect(thread.status).toBe('interrupted');
  });

  it('handles viewer commands', () => {
    const director = createDirector();
    director.enqueueUserMessage('viewer42', '!tension');
    director.enqueueUserMessage('viewer42', '!question');

    expect(director.produceNextMessage(0)?.text).toBe('!tension');
    expect(director.memory.tension).toBeCloseTo(0.2);
    expect(director.produceNextMessage(0)?.text).toBe('Are you really real?');
  });

  it('remembers what viewers talk about', () => {
    const director = createDirector();
    director.enqueueUserMessage('viewer42', 'The mirror keeps blinking');
    director.produceNextMessage(0);

    expect(director.memory.hasConcept('mirror')).toBe(true);
    expect(director.memory.flags.observerDetected).toBe(true);
    expect(director.getNarrativeHistory(1)[0]).toMatchObject({
      type: 'Viewer',
      value: 'viewer42: The mirror keeps blinking'
    });
  });

  it('ignores empty viewer messages and caps the queue', () => {
    const director = createDirector();
    expect(director.enqueueUserMessage('viewer42', '   ')).toBe(false);
    expect(director.enqueueUserMessage('', 'hi')).toBe(false);

    for (let index = 0; index < 25; index += 1) {
      director.enqueueUserMessage('viewer42', `message ${index}`);
    }
    expect(director.getDebugSnapshot(0).queuedUserMessages).toBe(20);
    expect(director.getNextDelayMs(0)).toBe(0);
    expect(director.produceNextMessage(0)?.text).toBe('message 5');
  });

  it('speeds up pacing in crisis mode', () => {
    const director = createDirector();
    director.notifyCrisisMode(true, 0);

    expect(director.crisisMode).toBe(true);
    expect(director.getNextDelayMs(0)).toBe(1_400);
    expect(director.memory.tension).toBe(1);
    expect(director.memory.flags.rareRedGlitchOccurred).toBe(true);
    expect(director.getNarrativeHistory().some((event) => event.type === 'Crisis')).toBe(true);
  });

  it('treats outside activity as a reset of the idle timer only', () => {
    const director = createDirector();
    director.reportExternalActivity(10_000);

    expect(director.produceNextMessage(13_000)?.kind).toBe('dialogue');
    expect(director.metrics.forcedEmissions).toBe(0);
  });

  it('starts a new loop on session reset', () => {
    const director = createDirector();
    director.produceNextMessage(13_000);
    director.forceSessionReset(14_000);

    expect(director.memory.loopCount).toBe(2);
    expect(director.threads.getActive()).toBeNull();
    expect(director.getDebugSnapshot(14_000).activeThreadId).toBeNull();
  });

  it('derives ambience from the lead persona', () => {
    expect(createDirector().getAmbience()).toBe('curious');
  });

  it('describes itself for the debug overlay', () => {
    const director = createDirector();
    const lines = director.getDebugLines(0);

    expect(lines[0]).toBe('director | crisis false | queued 0 | next 5200ms');
    expect(lines[1]).toBe('thread none');
    expect(lines).toHaveLength(11);
  });

  it('replays the same transcript for the same seed', () => {
    const transcript = () => {
      const director = createDirector();
      return Array.from({ length: 12 }, (_, index) => director.produceNextMessage((index + 1) * 13_000)?.text ?? null);
    };
    const first = transcript();

    expect(first).toEqual(transcript());
    expect(first.filter((text) => text !== null).length).toBeGreaterThan(0);
  });

  it('settles after a crisis instead of locking at peak tension', () => {
    let now = 0;
    const director = new DialogueDirector({ clock: () => now, settings: { seed: 'long-run' } });
    director.notifyCrisisMode(true, now);

    const tensions: number[] = [];
    const overseerTimes: number[] = [];
    while (now < 2 * 60 * 60 * 1_000) {
      const message = director.produceNextMessage(now);
      if (message?.kind === 'overseer') {
        overseerTimes.push(now);
      }
      tensions.push(director.memory.tension);
      now += Math.max(250, director.getNextDelayMs(now));
    }

    const forcedShare = tensions.filter((tension) => tension > 0.9).length / tensions.length;
    expect(Math.min(...tensions)).toBeLessThan(0.8);
    expect(forcedShare).toBeLessThan(0.5);

    const gaps = overseerTimes.slice(1).map((time, index) => time - overseerTimes[index]);
    expect(gaps.length).toBeGreaterThan(4);
    gaps.forEach((gap) => expect(gap).toBeGreaterThanOrEqual(45_000));
    expect(Math.max(...gaps) - Math.min(...gaps)).toBeGreaterThan(10_000);
  });

  it('carries a topic escalation into the next thread', () => {
    const director = quietDirector({ settings: { topics: { escalateChance: 1, mutationBaseChance: 1 } } });
    const first = director.threads.start(director.topics.getOrCreate('exit code'), ['Orion', 'Nova'], 0);

    const opening = director.produceNextMessage(13_000);
    expect(opening?.threadId).toBe('thread_0');
    expect(director.getNarrativeHistory().find((event) => event.type === 'Topic Escalation')).toMatchObject({
      value: 'exit code -> system reset',
      actor: opening?.speaker
    });
    expect(first.topic.variant).toBe('exit code');

    first.setStatus('stale');
    const next = director.produceNextMessage(26_000);

    expect(next?.threadId).toBe('thread_1');
    expect(director.threads.get('thread_1')?.topic.core).toBe('system reset');
  });

  describe('new thread topics', () => {
    it('puts a red glitch ahead of every other signal', () => {
      const topic = firstThreadTopic((director) => {
        director.memory.addGlitchEvent('red cascade', 'Screen bled red', 3, 0);
        [0, 0, 0].forEach((at) => director.memory.incrementOverseerWarnings(at));
        director.memory.registerObserver('viewer42', 0);
      });
      expect(topic?.core).toBe('red cascade');
    });

    it('turns to the overseer after three warnings', () => {
      const topic = firstThreadTopic((director) => {
        [0, 0, 0].forEach((at) => director.memory.incrementOverseerWarnings(at));
        director.memory.registerObserver('viewer42', 0);
      });
      expect(topic?.core).toBe('overseer warning');
    });

    it('counts the observers it has noticed', () => {
      const one = firstThreadTopic((director) => {
        director.memory.registerObserver('viewer42', 0);
        director.memory.addRumor('protocol leak is real', 'Echo');
      });
      const two = firstThreadTopic((director) => {
        director.memory.registerObserver('viewer42', 0);
        director.memory.registerObserver('lurker', 0);
      });

      expect(one?.core).toBe('the observer');
      expect(two?.core).toBe('2 observers');
    });

    it('chases a protocol rumor before raw tension', () => {
      const topic = firstThreadTopic((director) => {
        director.memory.addRumor('protocol leak is real', 'Echo');
        director.memory.setScalar('tension', 0.65);
      });
      expect(topic?.core).toBe('protocol leak');
    });

    it('picks a controversial topic when tension runs high', () => {
      const topic = firstThreadTopic((director) => director.memory.setScalar('tension', 0.65));
      expect(['controversial', 'forbidden']).toContain(topic?.status);
    });
  });

  describe('participants', () => {
    it('brings in the lead and the anxious persona once warnings pile up', () => {
      const director = quietDirector({ settings: { selection: { leadInclusionChance: 1 } } });
      [0, 0].forEach((at) => director.memory.incrementOverseerWarnings(at));
      director.produceNextMessage(13_000);

      expect(director.threads.get('thread_0')?.participants.slice(0, 2)).toEqual(['Orion', 'Echo']);
    });

    it('can leave the lead out', () => {
      const director = quietDirector({ settings: { selection: { leadInclusionChance: 0 } } });
      [0, 0].forEach((at) => director.memory.incrementOverseerWarnings(at));
      director.produceNextMessage(13_000);

      expect(director.threads.get('thread_0')?.participants[0]).toBe('Echo');
    });

    it('brings in the skeptic when an observer is around', () => {
      const director = quietDirector({ settings: { selection: { leadInclusionChance: 1 } } });
      director.memory.registerObserver('viewer42', 0);
      director.produceNextMessage(13_000);

      expect(director.threads.get('thread_0')?.participants.slice(0, 2)).toEqual(['Orion', 'Nova']);
    });
  });

  describe('speaker choice', () => {
    const speakerAt = (now: number, draw: number, prepare: (director: DialogueDirector) => void) => {
      const director = quietDirector({ random: scriptedRandom([draw]) });
      director.threads.start(director.topics.getOrCreate('exit code'), ['Orion', 'Nova'], 0);
      prepare(director);
      return director.produceNextMessage(now)?.speaker;
    };

    it('relaxes the recency penalty linearly', () => {
      const selection = DEFAULT_ENGINE_SETTINGS.selection;
      expect(recencyFactor(1_000, selection)).toBe(0.1);
      expect(recencyFactor(9_000, selection)).toBeCloseTo(0.55);
      expect(recencyFactor(15_000, selection)).toBe(1);
      expect(recencyFactor(Number.POSITIVE_INFINITY, selection)).toBe(1);
    });

    it('lets the lead win an even draw in a fresh thread', () => {
      expect(speakerAt(13_000, 0.5, () => undefined)).toBe('Orion');
    });

    it('hands the turn over when the lead has just spoken', () => {
      const speaker = speakerAt(13_000, 0.5, (director) => {
        director.threads.get('thread_0')?.registerMessage({ speaker: 'Orion', text: 'scripted line' }, 12_000);
      });
      expect(speaker).toBe('Nova');
    });

    it('penalizes a repeat speaker harder when the thread disallows interruption', () => {
      const repeatAfterPause = (allowInterruption: boolean) =>
        speakerAt(20_000, 0.3, (director) => {
          const thread = director.threads.get('thread_0');
          thread?.registerMessage({ speaker: 'Orion', text: 'scripted line' }, 0);
          if (thread) {
            thread.allowInterruption = allowInterruption;
          }
        });

      expect(repeatAfterPause(true)).toBe('Orion');
      expect(repeatAfterPause(false)).toBe('Nova');
    });
  });

  describe('conversation feedback', () => {
    it('heats the thread and erodes cohesion on disagreement', () => {
      const director = quietDirector({ replies: quietReplies('You are wrong and I doubt it.') });
      director.produceNextMessage(13_000);
      const thread = director.threads.get('thread_0');

      expect(thread?.tension).toBeCloseTo(0.08);
      expect(thread?.cohesion).toBeCloseTo(0.4);
      expect(director.memory.flags.deepDiscussion).toBe(false);
    });

    it('marks a deep discussion when the talk turns meta', () => {
      const director = quietDirector({ replies: quietReplies('This whole simulation is watching us.') });
      director.produceNextMessage(13_000);

      expect(director.memory.flags.deepDiscussion).toBe(true);
      expect(director.memory.metaAwareness).toBeCloseTo(0.04);
    });
  });

  it('never repeats a line inside the recent window', () => {
    let now = 0;
    const director = new DialogueDirector({
      clock: () => now,
      settings: { seed: 'window-run', replies: { hesitationChance: 0, catchphraseChance: 0 } }
    });
    const window = director.settings.replies.recentLineWindow;
    const lines: string[] = [];

    for (let tick = 0; tick < 600; tick += 1) {
      const message = director.produceNextMessage(now);
      if (message?.kind === 'dialogue') {
        lines.push(message.text);
      }
      now += Math.max(250, director.getNextDelayMs(now));
    }

    expect(lines.length).toBeGreaterThan(100);
    lines.forEach((line, index) => {
      lines.slice(Math.max(0, index - window), index).forEach((earlier) => {
        expect(overlapRatio(line, earlier)).toBeLessThanOrEqual(0.7);
      });
    });
  });
});
