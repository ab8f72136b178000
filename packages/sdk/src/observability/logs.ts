/**
 * Structured logging for key generation
 *
 * Lines look like `[ts] [WARN] [keygen.document.skipped] "expr" field=a.b message {details}`.
 * The minimum level comes from KEYGEN_LOG_LEVEL (default "info"); KEYGEN_DEBUG=1 lowers it to
 * "debug".
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Key expression the event concerns */
  expression?: string;
  /** Formatted field path the event concerns */
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the minimum level from the environment
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.KEYGEN_DEBUG === "1") {
    return "debug";
  }

  const level = env.KEYGEN_LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : "info";
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Render an entry as a single console line
   */
  format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

    if (entry.expression !== undefined) {
      parts.push(JSON.stringify(entry.expression));
    }

    if (entry.field) {
      parts.push(`field=${entry.field}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    return parts.join(" ");
  }

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.shouldLog(level)) return;

    const line = this.format({
      ...data,
      timestamp: new Date().toISOString(),
      level,
      event,
    });

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger(resolveLogLevel());
