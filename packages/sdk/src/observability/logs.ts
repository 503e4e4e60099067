/**
 * Structured logging for engine operations
 * All logs go to stderr; stdout is reserved for command output.
 * Secret values are never passed to the logger, only names, counts and sizes.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [field: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "warn") {
    this.#minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...fields,
    };

    console.error(JSON.stringify(entry));
  }

  debug(event: string, fields?: Record<string, unknown>): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: Record<string, unknown>): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: Record<string, unknown>): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: Record<string, unknown>): void {
    this.log("error", event, fields);
  }
}

/**
 * Resolve the initial level from SPLITSECRET_LOG_LEVEL (default: warn)
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.SPLITSECRET_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}

export const logger = new Logger(levelFromEnv());
