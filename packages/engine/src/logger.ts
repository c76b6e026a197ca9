/**
 * Tagged console logger.
 *
 * Every line is prefixed with `[Tag]`. The threshold is read from
 * LINEWORK_LOG_LEVEL on first use and can be changed with setLogLevel().
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = typeof process !== "undefined" ? process.env.LINEWORK_LOG_LEVEL : undefined;
  if (raw) {
    const normalized = raw.trim().toLowerCase();
    if (isLogLevel(normalized)) return normalized;
  }
  return "info";
}

let threshold: LogLevel | null = null;

export function getLogLevel(): LogLevel {
  if (threshold === null) {
    threshold = levelFromEnv();
  }
  return threshold;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

export class Logger {
  private constructor(readonly tag: string) {}

  static create(tag: string): Logger {
    return new Logger(tag);
  }

  debug(message: string, ...details: unknown[]): void {
    if (enabled("debug")) console.debug(`[${this.tag}] ${message}`, ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (enabled("info")) console.log(`[${this.tag}] ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (enabled("warn")) console.warn(`[${this.tag}] ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (enabled("error")) console.error(`[${this.tag}] ${message}`, ...details);
  }
}
