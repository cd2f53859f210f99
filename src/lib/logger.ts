/**
 * Scoped console logging.
 *
 * Messages are prefixed with `[scope]` and filtered by a global minimum
 * level. Hosts call `configureLogger` once at startup (or `initLogger` to
 * read the level from `TOAST_LOG_LEVEL`).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerConfig {
  level: LogLevel;
}

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_LEVEL: LogLevel = "warn";

let currentLevel: LogLevel = DEFAULT_LEVEL;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(levelRank, value);
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  currentLevel = config.level ?? DEFAULT_LEVEL;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Reads the level from `TOAST_LOG_LEVEL` when running under Node.
 * Unknown values keep the default.
 */
export function initLogger(env: Record<string, string | undefined> = readEnv()): void {
  const level = env.TOAST_LOG_LEVEL;
  configureLogger({ level: isLogLevel(level) ? level : DEFAULT_LEVEL });
}

function readEnv(): Record<string, string | undefined> {
  return typeof process !== "undefined" ? process.env : {};
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return levelRank[level] >= levelRank[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
