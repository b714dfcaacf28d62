/**
 * Console logger with a `[Perception:<scope>]` tag.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/** Debug lines are written only when verbose; warnings always */
export function createLogger(scope: string, verbose = false): Logger {
  const tag = `[Perception:${scope}]`;
  return {
    debug(message, ...details) {
      if (verbose) console.debug(`${tag} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${tag} ${message}`, ...details);
    },
  };
}
