/**
 * Minimal logging seam. Lines are prefixed with a bracketed tag, the way
 * every host-facing message in this codebase is.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/** A logger writing `[tag] message` lines to the console. */
export function createConsoleLogger(tag: string): Logger {
  return {
    info: (message) => console.info(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};
