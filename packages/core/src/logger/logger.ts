/** Ordered from most to least verbose. */
export const LOG_LEVEL_NAMES = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevelConfig = (typeof LOG_LEVEL_NAMES)[number];

export type LogLevel = Exclude<LogLevelConfig, "silent">;

export function isLogLevel(value: unknown): value is LogLevelConfig {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Same threshold, with `scope` appended to the line prefix. */
  child(scope: string): Logger;
}

/**
 * Leveled logger writing `[Paykit LEVEL scope] message` lines to stderr.
 * Stdout stays free for command output.
 */
export function createLogger(level: LogLevelConfig, scope?: string): Logger {
  const threshold = LOG_LEVEL_NAMES.indexOf(level);
  const suffix = scope ? ` ${scope}` : "";

  function write(logLevel: LogLevel, msg: string): void {
    if (LOG_LEVEL_NAMES.indexOf(logLevel) < threshold) return;
    process.stderr.write(`[Paykit ${logLevel.toUpperCase()}${suffix}] ${msg}\n`);
  }

  return {
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg) => write("error", msg),
    child: (name) => createLogger(level, scope ? `${scope}:${name}` : name),
  };
}
