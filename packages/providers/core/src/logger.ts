import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ name, level });
}

/** Discards everything; the default when a component is built without a logger. */
export const silentLogger: Logger = pino({ level: 'silent' });
