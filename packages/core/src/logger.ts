/**
 * Logger contract
 * Core code never writes to the console directly; the CLI injects its
 * file logger and the API server a prefixed console logger.
 */

export interface Logger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Console logger with a fixed prefix, e.g. "[pagewright-api]"
 */
export function createConsoleLogger(prefix: string, options: { debug?: boolean } = {}): Logger {
  const format = (message: string) => `${prefix} ${message}`;
  return {
    info: (message, data) =>
      data === undefined ? console.log(format(message)) : console.log(format(message), data),
    warn: (message, data) =>
      data === undefined ? console.warn(format(message)) : console.warn(format(message), data),
    error: (message, data) =>
      data === undefined ? console.error(format(message)) : console.error(format(message), data),
    debug: (message, data) => {
      if (!options.debug) return;
      if (data === undefined) console.debug(format(message));
      else console.debug(format(message), data);
    },
  };
}
