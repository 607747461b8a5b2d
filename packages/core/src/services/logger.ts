/**
 * Logger contract shared by the adapter and the CLI.
 */

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

function withData(msg: string, data?: Record<string, unknown>): string {
  return data ? `${msg} ${JSON.stringify(data)}` : msg;
}

/**
 * Plain console logger, used when no logger is supplied
 */
export const consoleLogger: Logger = {
  debug: (msg, data) => console.debug(withData(msg, data)),
  info: (msg, data) => console.log(withData(msg, data)),
  warn: (msg, data) => console.warn(withData(msg, data)),
  error: (msg, data) => console.error(withData(msg, data)),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
