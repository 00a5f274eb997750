import type { DialogueDirector } from './director';
import type { ViewerChatSimulator } from './narrative-triggers';
import { logger } from '../shared/logger';
import type { DialogueMessage } from '../shared/types';

export type SessionDirector = Pick<DialogueDirector, 'produceNextMessage' | 'getNextDelayMs' | 'enqueueUserMessage'>;

type MessageListener = (message: DialogueMessage) => void;

export interface DialogueSessionOptions {
  /** Floor between ticks so an always-due director cannot spin. */
  minDelayMs?: number;
  /** Presentation-layer delay per character at typing speed 1. */
  baseCharDelayMs?: number;
  /** Feeds simulated viewer lines into the director while the session runs. */
  viewerChat?: ViewerChatSimulator;
}

const DEFAULT_MIN_DELAY_MS = 250;
const DEFAULT_CHAR_DELAY_MS = 45;

export class DialogueSession {
  #director: SessionDirector;
  #listeners = new Set<MessageListener>();
  #timer: ReturnType<typeof setTimeout> | null = null;
  #chatTimer: ReturnType<typeof setTimeout> | null = null;
  #running = false;
  #minDelayMs: number;
  #baseCharDelayMs: number;
  #viewerChat: ViewerChatSimulator | undefined;

  constructor(director: SessionDirector, options: DialogueSessionOptions = {}) {
    this.#director = director;
    this.#minDelayMs = options.minDelayMs ?? DEFAULT_MIN_DELAY_MS;
    this.#baseCharDelayMs = options.baseCharDelayMs ?? DEFAULT_CHAR_DELAY_MS;
    this.#viewerChat = options.viewerChat;
  }

  get running() {
    return this.#running;
  }

  onMessage(listener: MessageListener) {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  start() {
    if (this.#running) {
      return;
    }
    this.#running = true;
    logger.info('[session] Dialogue session started');
    this.#schedule(0);
    this.#scheduleChat();
  }

  stop() {
    this.#running = false;
    if (this.#timer !== null) {
      clearTimeout(this.#timer);
      this.#timer = null;
    }
    if (this.#chatTimer !== null) {
      clearTimeout(this.#chatTimer);
      this.#chatTimer = null;
    }
    logger.info('[session] Dialogue session stopped');
  }

  typingDurationMs(message: DialogueMessage | null): number {
    if (!message?.typing) {
      return 0;
    }
    const speed = Math.max(0.1, message.typing.speedMultiplier);
    return Math.round((message.text.length * this.#baseCharDelayMs) / speed);
  }

  #schedule(delayMs: number) {
    this.#timer = setTimeout(() => this.#tick(), delayMs);
  }

  #scheduleChat() {
    const chat = this.#viewerChat;
    if (!chat) {
      return;
    }
    this.#chatTimer = setTimeout(() => {
      this.#chatTimer = null;
      if (!this.#running) {
        return;
      }
      const line = chat.nextLine();
      try {
        this.#director.enqueueUserMessage(line.username, line.text);
      } catch (error) {
        logger.error('[session] Simulated viewer line failed', error);
      }
      this.#scheduleChat();
    }, chat.nextDelayMs());
  }

  #tick() {
    this.#timer = null;
    if (!this.#running) {
      return;
    }

    let message: DialogueMessage | null = null;
    try {
      message = this.#director.produceNextMessage();
      if (message) {
        this.#emit(message);
      }
    } catch (error) {
      logger.error('[session] Tick failed', error);
    }

    if (!this.#running) {
      return;
    }
    let delay = this.#minDelayMs;
    try {
      delay = Math.max(this.#minDelayMs, this.#director.getNextDelayMs(), this.typingDurationMs(message));
    } catch (error) {
      logger.error('[session] Failed to compute next delay', error);
    }
    this.#schedule(delay);
  }

  #emit(message: DialogueMessage) {
    this.#listeners.forEach((listener) => {
      try {
        listener(message);
      } catch (error) {
        logger.warn('[session] Message listener failed', error);
      }
    });
  }
}
