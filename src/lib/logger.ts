import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Plain-text log file, appended to alongside console output */
  file?: string | null;
}

/** State shared between a logger and all of its children */
interface SinkState {
  level: LogLevel;
  file: string | null;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Leveled logger with colored console output and an optional file sink
 */
export class Logger {
  private prefix: string = "";

  constructor(private readonly sink: SinkState = { level: "info", file: null }) {}

  /**
   * Configure the logger (applies to every child as well)
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.sink.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
    if (config.file !== undefined) {
      if (config.file !== null) {
        mkdirSync(dirname(config.file), { recursive: true });
      }
      this.sink.file = config.file;
    }
  }

  get level(): LogLevel {
    return this.sink.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.sink.level];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  private writeFile(level: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    if (this.sink.file === null) return;
    const extra = args.length > 0 ? ` ${args.map((arg) => String(arg)).join(" ")}` : "";
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${this.format(message)}${extra}\n`;
    try {
      appendFileSync(this.sink.file, line);
    } catch (error) {
      // Fall back to console only; the analysis must not stop over a log file.
      this.sink.file = null;
      console.error(chalk.red(`Log file disabled: ${error instanceof Error ? error.message : String(error)}`));
    }
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
      this.writeFile("debug", message, args);
    }
  }

  /**
   * Info level logging (default color)
   */
  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.format(message), ...args);
      this.writeFile("info", message, args);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
      this.writeFile("warn", message, args);
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
      this.writeFile("error", message, args);
    }
  }

  /**
   * Success message (green)
   */
  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(chalk.green(this.format(message)), ...args);
      this.writeFile("info", message, args);
    }
  }

  /**
   * Create a child logger with a prefix, sharing level and file sink
   */
  child(prefix: string): Logger {
    const child = new Logger(this.sink);
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
