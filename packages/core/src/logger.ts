/**
 * Console logging helpers.
 * Processes call installTimestampLogging() once at startup; components
 * log through a tagged logger so lines read "[tag] message".
 */

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let timestampsInstalled = false;

/**
 * Install timestamp logging by overriding console methods.
 * Subsequent console.log/error/warn calls are prefixed with an ISO 8601
 * timestamp. Calling it again is a no-op.
 */
export function installTimestampLogging(): void {
  if (timestampsInstalled) return;
  timestampsInstalled = true;

  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  console.log = (...args: unknown[]) => {
    originalLog(`[${new Date().toISOString()}]`, ...args);
  };
  console.error = (...args: unknown[]) => {
    originalError(`[${new Date().toISOString()}]`, ...args);
  };
  console.warn = (...args: unknown[]) => {
    originalWarn(`[${new Date().toISOString()}]`, ...args);
  };
}

/**
 * Create a logger whose lines carry a component tag.
 * Resolves console methods at call time so spies and the timestamp
 * override both apply.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message, ...details) => console.log(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}

/** Logger that drops everything (tests) */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
