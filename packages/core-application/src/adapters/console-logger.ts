import type { LogContext, Logger, LogLevel } from "../ports/logger";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly prefix = "[vc-reconcile]"
  ) {}

  private enabled(level: LogLevel) {
    return ORDER[level] >= ORDER[this.level];
  }

  private format(message: string) {
    return `${this.prefix} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled("debug")) console.debug(this.format(message), context ?? "");
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled("info")) console.info(this.format(message), context ?? "");
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled("warn")) console.warn(this.format(message), context ?? "");
  }

  error(message: string, context?: LogContext): void {
    if (this.enabled("error")) console.error(this.format(message), context ?? "");
  }
}
