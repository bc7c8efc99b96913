export type Logger = {
  info: (message: string, payload?: unknown) => void;
  warn: (message: string, payload?: unknown) => void;
  error: (message: string, payload?: unknown) => void;
};

type LogLevel = keyof Logger;

const noop = () => undefined;

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop
};

const tagged =
  (target: Logger, level: LogLevel, scope: string) =>
  (message: string, payload?: unknown) => {
    if (payload === undefined) {
      target[level](`[${scope}] ${message}`);
      return;
    }
    target[level](`[${scope}] ${message}`, payload);
  };

/**
 * Prefixes every message with `[scope]`. Defaults to the console; pass
 * another logger to route pipeline output elsewhere.
 */
export const createLogger = (scope: string, target: Logger = console): Logger => ({
  info: tagged(target, "info", scope),
  warn: tagged(target, "warn", scope),
  error: tagged(target, "error", scope)
});
