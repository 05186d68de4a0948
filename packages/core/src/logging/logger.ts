/**
 * Logger interface injected into the engine and the config loader.
 */

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Logger that drops everything; the engine default
 */
export const silentLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};

/**
 * Create a logger that writes prefixed lines to the console
 */
export function createConsoleLogger(prefix = '[logmsglint]', verbose = false): Logger {
  return {
    error: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    info: (message) => console.log(`${prefix} ${message}`),
    debug: (message) => {
      if (verbose) {
        console.log(`${prefix} ${message}`);
      }
    },
  };
}
