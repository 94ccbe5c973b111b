/**
 * Sink for the clients' diagnostics: a debug line per request and response,
 * a warning per failed call. Anything with these four methods fits, pino and
 * winston included.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// Default when no logger is passed.
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

type Level = keyof Logger;

function toStderr(level: Level) {
  const tag = `[${level.toUpperCase()}]`;
  return (message: string, data?: Record<string, unknown>): void => {
    console.error(`${tag} ${message}`, data ?? "");
  };
}

/**
 * What `vatify --verbose` uses. Goes to stderr so that stdout carries only
 * command output.
 */
export const consoleLogger: Logger = {
  debug: toStderr("debug"),
  info: toStderr("info"),
  warn: toStderr("warn"),
  error: toStderr("error"),
};
