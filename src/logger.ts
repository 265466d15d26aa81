export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(prefix: string): Logger;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type ConsoleWriter = (message: string, ...rest: unknown[]) => void;

// Console-backed logger with level filtering; children share the level and extend the prefix.
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel = "info",
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", console.debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", console.log, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", console.warn, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.minLevel > LOG_LEVEL_ORDER.error) {
      return;
    }
    const parts: unknown[] = [];
    if (error !== undefined) parts.push(error);
    if (context) parts.push(context);
    console.error(`[${this.prefix}] ${message}`, ...parts);
  }

  child(prefix: string): Logger {
    return new ConsoleLogger(`${this.prefix}:${prefix}`, this.level);
  }

  private write(level: LogLevel, writer: ConsoleWriter, message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LOG_LEVEL_ORDER[level]) {
      return;
    }
    if (context) {
      writer(`[${this.prefix}] ${message}`, context);
    } else {
      writer(`[${this.prefix}] ${message}`);
    }
  }
}

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);
