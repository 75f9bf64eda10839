import type { Logger, LogLevel } from "../../src/utils/logger.util";

export interface LogLine {
  level: LogLevel;
  msg: string;
}

/**
 * Logger that keeps every line for assertions
 */
export class RecordingLogger implements Logger {
  readonly lines: LogLine[] = [];

  info(msg: string): void {
    this.lines.push({ level: "info", msg });
  }

  warn(msg: string): void {
    this.lines.push({ level: "warn", msg });
  }

  error(msg: string): void {
    this.lines.push({ level: "error", msg });
  }

  debug(msg: string): void {
    this.lines.push({ level: "debug", msg });
  }

  messages(level: LogLevel): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.msg);
  }
}
