import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  includeTimestamp?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly includeTimestamp: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope;
    this.includeTimestamp = options.includeTimestamp ?? true;
  }

  /**
   * Logger sharing this logger's level, with `[scope]` prepended to every line
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      includeTimestamp: this.includeTimestamp,
    });
  }

  info(msg: string): void {
    if (!this.enabled("info")) return;
    console.log(chalk.cyan("[INFO]"), this.format(msg));
  }

  warn(msg: string): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), this.format(msg));
  }

  error(msg: string, err?: Error): void {
    if (!this.enabled("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      this.format(msg),
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.enabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), this.format(msg));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private format(msg: string): string {
    const parts: string[] = [];
    if (this.includeTimestamp) parts.push(chalk.gray(new Date().toISOString()));
    if (this.scope) parts.push(`[${this.scope}]`);
    parts.push(msg);
    return parts.join(" ");
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/**
 * Format a rupee amount with two decimals for audit lines
 */
export function formatAmount(value: number): string {
  return value.toFixed(2);
}
