import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ViewerChatSimulator } from '../narrative-triggers';
import { DialogueSession } from '../session';
import { DEFAULT_ENGINE_SETTINGS } from '../../shared/settings';
import type { DialogueMessage } from '../../shared/types';
import { scriptedRandom } from '../../test/scripted-random';

const message = (overrides: Partial<DialogueMessage> = {}): DialogueMessage => ({
  id: 'msg_1',
  speaker: 'Nova',
  text: 'Prove it.',
  kind: 'dialogue',
  createdAt: 0,
  ...overrides
});

const createDirector = (next: () => DialogueMessage | null = () => message(), delayMs = 1_000) => ({
  produceNextMessage: vi.fn(next),
  getNextDelayMs: vi.fn(() => delayMs),
  enqueueUserMessage: vi.fn(() => true)
});

describe('DialogueSession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks immediately and then waits for the director delay', () => {
    const director = createDirector();
    const session = new DialogueSession(director);
    const listener = vi.fn();
    session.onMessage(listener);

    session.start();
    vi.advanceTimersByTime(0);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(message());

    vi.advanceTimersByTime(999);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(2);

    session.stop();
    vi.advanceTimersByTime(10_000);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(2);
    expect(session.running).toBe(false);
  });

  it('waits for the typing animation when it outlasts the director delay', () => {
    const typed = message({ text: 'x'.repeat(40), typing: { speedMultiplier: 1, hesitate: false } });
    const director = createDirector(() => typed, 0);
    const session = new DialogueSession(director);

    session.start();
    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(1_799);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(2);
    session.stop();
  });

  it('never spins faster than the minimum delay', () => {
    const director = createDirector(() => null, 0);
    const session = new DialogueSession(director, { minDelayMs: 500 });

    session.start();
    vi.advanceTimersByTime(1_000);
    expect(director.produceNextMessage).toHaveBeenCalledTimes(3);
    session.stop();
  });

  it('keeps running when a tick or a listener throws', () => {
    let calls = 0;
    const director = createDirector(() => {
      calls += 1;
      if (calls === 1) {
        throw new Error('director exploded');
      }
      return message();
    });
    const session = new DialogueSession(director, { minDelayMs: 100 });
    const broken = vi.fn(() => {
      throw new Error('listener exploded');
    });
    const healthy = vi.fn();
    session.onMessage(broken);
    session.onMessage(healthy);

    session.start();
    vi.advanceTimersByTime(0);
    expect(healthy).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1_000);
    expect(broken).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
    session.stop();
  });

  it('derives typing time from text length and speed', () => {
    const session = new DialogueSession(createDirector());

    expect(session.typingDurationMs(message({ text: 'abcd', typing: { speedMultiplier: 2, hesitate: false } }))).toBe(90);
    expect(session.typingDurationMs(message({ text: 'abcd', typing: { speedMultiplier: 0, hesitate: false } }))).toBe(1_800);
    expect(session.typingDurationMs(message())).toBe(0);
    expect(session.typingDurationMs(null)).toBe(0);
  });

  it('feeds simulated viewer chat into the director while running', () => {
    const director = createDirector(() => null, 10_000);
    const viewerChat = new ViewerChatSimulator(scriptedRandom([0]), DEFAULT_ENGINE_SETTINGS.viewerChat);
    const session = new DialogueSession(director, { viewerChat });

    session.start();
    vi.advanceTimersByTime(29_999);
    expect(director.enqueueUserMessage).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(director.enqueueUserMessage).toHaveBeenCalledWith('Observer100', '!glitch');

    vi.advanceTimersByTime(30_000);
    expect(director.enqueueUserMessage).toHaveBeenCalledTimes(2);

    session.stop();
    vi.advanceTimersByTime(120_000);
    expect(director.enqueueUserMessage).toHaveBeenCalledTimes(2);
  });

  it('stops notifying after unsubscribe', () => {
    const director = createDirector();
    const session = new DialogueSession(director);
    const listener = vi.fn();
    const unsubscribe = session.onMessage(listener);
    unsubscribe();

    session.start();
    vi.advanceTimersByTime(0);
    expect(listener).not.toHaveBeenCalled();
    session.stop();
  });
});
