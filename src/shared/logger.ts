export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: unknown;
  timestamp: number;
}

type Listener = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  #level: LogLevel = 'info';
  #listeners = new Set<Listener>();

  setLevel(level: LogLevel) {
    this.#level = level;
  }

  getLevel(): LogLevel {
    return this.#level;
  }

  addListener(listener: Listener) {
    this.#listeners.add(listener);
    return () => this.removeListener(listener);
  }

  removeListener(listener: Listener) {
    this.#listeners.delete(listener);
  }

  debug(message: string, data?: unknown) {
    this.#log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.#log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.#log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.#log('error', message, data);
  }

  #log(level: LogRecord['level'], message: string, data?: unknown) {
    const timestamp = Date.now();
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.#level]) {
      const prefix = `[${new Date(timestamp).toISOString()}][${level.toUpperCase()}]`;
      // Diagnostics go to stderr so transcripts on stdout stay clean.
      // eslint-disable-next-line no-console
      console.error(`${prefix} ${message}`, data ?? '');
    }

    this.#listeners.forEach((listener) => listener({ level, message, data, timestamp }));
  }
}

export const logger = new Logger();
