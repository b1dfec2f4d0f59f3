/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Child loggers follow their parent's level */
  parent?: Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) return "";
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly parent: Logger | undefined;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "liveness";
    this.parent = config.parent;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.getLevel());
  }

  private stamp(): string {
    return new Date().toISOString();
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) {
      console.error(`${this.stamp()} [${this.prefix}] ERROR:`, message, formatMeta(meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.stamp()} [${this.prefix}] WARN:`, message, formatMeta(meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) {
      // stderr keeps stdout free for the JSON run summary
      process.stderr.write(
        `${this.stamp()} [${this.prefix}] INFO: ${message} ${formatMeta(meta)}\n`,
      );
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(
        `${this.stamp()} [${this.prefix}] DEBUG: ${message} ${formatMeta(meta)}\n`,
      );
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  child(component: string): Logger {
    return new Logger({ level: this.level, prefix: `${this.prefix}:${component}`, parent: this });
  }
}

const envLevel = (process.env.LOG_LEVEL ?? "").toLowerCase();

// Default logger instance
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : "info",
});

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
