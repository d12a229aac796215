import type { Logger } from '../types/index.js';

/**
 * Obalí logger tak, aby každá zpráva nesla prefix `[name]`.
 */
export function createScopedLogger(name: string, base: Logger = console): Logger {
  const prefix = `[${name}]`;
  return {
    debug: (message, ...args) => base.debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => base.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => base.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => base.error(`${prefix} ${message}`, ...args)
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
