export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = "[deploy-marker]";

/**
 * Console-backed logger. Every level writes to stderr so stdout stays
 * reserved for `name=value` outputs.
 */
export function createLogger(prefix: string = PREFIX): Logger {
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} warning: ${message}`),
    error: (message) => console.error(`${prefix} error: ${message}`),
  };
}
