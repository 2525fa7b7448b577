/**
 * Simple logger interface for the chat proxy.
 * @packageDocumentation
 */

export interface Logger {
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

export const defaultLogger: Logger = {
  info: (msg, ...args) => console.log(`[chat-proxy] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[chat-proxy] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[chat-proxy] ${msg}`, ...args),
  debug: () => {},
};

/**
 * Console logger that also prints debug lines when verbose.
 */
export function createLogger(verbose = false): Logger {
  if (!verbose) return defaultLogger;
  return {
    ...defaultLogger,
    debug: (msg, ...args) => console.log(`[chat-proxy] ${msg}`, ...args),
  };
}
