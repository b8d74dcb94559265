import type { LogLevel } from './types.js';

/**
 * Minimal logging surface the engine depends on.
 * Any object with these methods can be injected (tests pass a recorder).
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger with level prefixes.
 * All output goes to stderr so stdout stays reserved for rendered content.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: LogLevel, prefix: string) => (message: string) => {
    if (LEVEL_ORDER[at] >= threshold) {
      console.error(`[${prefix}] ${message}`);
    }
  };

  return {
    debug: emit('debug', 'DEBUG'),
    info: emit('info', 'INFO'),
    warn: emit('warn', 'WARN'),
    error: emit('error', 'ERROR'),
  };
}

export const silentLogger: Logger = createLogger('silent');

