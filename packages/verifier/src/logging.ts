/**
 * Logger handles.
 *
 * Every component takes a logger at construction instead of writing to a
 * shared global.
 */

import * as core from "@actions/core";

/** Logger interface for verification diagnostic output. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/** Default logger that writes to console. */
export const consoleLogger: Logger = {
  debug: (m) => console.debug(m),
  info: (m) => console.info(m),
  warning: (m) => console.warn(m),
  error: (m) => console.error(m),
};

/**
 * Logger that emits GitHub Actions workflow commands, so warnings and errors
 * are annotated on the run summary.
 */
export const actionsLogger: Logger = {
  debug: (m) => core.debug(m),
  info: (m) => core.info(m),
  warning: (m) => core.warning(m),
  error: (m) => core.error(m),
};

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warning: () => {},
  error: () => {},
};
