import { destination, pino, type Logger } from 'pino';
import type { LogLevel } from './env.js';

export type { Logger };

export function createLogger(
  opts: { level?: LogLevel; name?: string; toStderr?: boolean } = {}
): Logger {
  const options = {
    name: opts.name ?? 'dutystack',
    level: opts.level ?? 'info',
    base: null,
  };
  // stdout stays free for command output
  return opts.toStderr ? pino(options, destination(2)) : pino(options);
}

/** Logger that drops everything; the engine default when callers pass none. */
export const silentLogger: Logger = pino({ level: 'silent' });
