/**
 * Scoped console logging.
 *
 * Every component takes a Logger so tests can record output instead of
 * writing to the console.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger that tags each line with `[Reposnap:<scope>]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[Reposnap:${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
