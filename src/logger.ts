import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'detl', level });
}

/** Logger that discards everything; the default for library callers. */
export const silentLogger: Logger = pino({ level: 'silent' });
