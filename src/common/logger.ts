/**
 * Logger contract
 *
 * Modules never import pino directly; they take a Logger so tests can pass
 * vi.fn() mocks. A pino instance satisfies the contract as-is.
 */

import { pino } from 'pino';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface RootLogger extends Logger {
  child: (bindings: { component: string }) => Logger;
}

export function createLogger(level: LogLevel = 'info'): RootLogger {
  return pino({
    name: 'brightness-scheduler',
    level,
  });
}

/**
 * Console fallback, used before configuration has been read.
 */
export const consoleLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};
