/**
 * Minimal logger handed to a game explicitly; there is no global print
 * switch.
 */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger prefixing every line with `[tag]`.
 */
export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message, ...details) => console.log(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}

const ignore = (): void => undefined;

export const silentLogger: Logger = {
  info: ignore,
  warn: ignore,
  error: ignore,
};
