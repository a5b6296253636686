/**
 * Leveled console logger used by the compiler phases.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private level: LogLevel;
  private context: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "warn";
    this.context = options.context ?? "SQL";
  }

  private format(message: string): string {
    return `[${this.context}] ${message}`;
  }

  private shouldLog(level: Exclude<LogLevel, "silent">): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format(message));
    }
  }

  info(message: string): void {
    if (this.shouldLog("info")) {
      console.log(this.format(message));
    }
  }

  warn(message: string): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format(message));
    }
  }

  error(message: string): void {
    if (this.shouldLog("error")) {
      console.error(this.format(message));
    }
  }

  /**
   * Create a logger for a sub-phase sharing this logger's level
   */
  child(context: string): Logger {
    return new Logger({ level: this.level, context });
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
