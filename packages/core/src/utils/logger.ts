import type { Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[pgsession] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[pgsession] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[pgsession] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[pgsession] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Plain description of a thrown value for structured log arguments.
 */
export function describeError(error: unknown): { kind: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { kind: error.name, message: error.message, stack: error.stack };
  }
  return { kind: typeof error, message: String(error) };
}
