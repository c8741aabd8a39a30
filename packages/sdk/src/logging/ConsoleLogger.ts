import type { Logger, LogLevel } from "./Logger.js";

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type ConsoleLoggerOptions = {
  prefix?: string;
  /** Most verbose level written; anything chattier is dropped. */
  level?: LogLevel;
};

export class ConsoleLogger implements Logger {
  readonly prefix: string;
  readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "harvestkit";
    this.level = options.level ?? "info";
  }

  error(message: string, ...meta: unknown[]): void {
    this.log("error", message, ...meta);
  }
  warn(message: string, ...meta: unknown[]): void {
    this.log("warn", message, ...meta);
  }
  info(message: string, ...meta: unknown[]): void {
    this.log("info", message, ...meta);
  }
  debug(message: string, ...meta: unknown[]): void {
    this.log("debug", message, ...meta);
  }

  log(level: LogLevel, message: string, ...meta: unknown[]): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) return;
    const line = `[${this.prefix}] ${level.toUpperCase()}: ${message}`;
    switch (level) {
      case "error":
        console.error(line, ...meta);
        break;
      case "warn":
        console.warn(line, ...meta);
        break;
      case "info":
        console.info(line, ...meta);
        break;
      case "debug":
        console.debug(line, ...meta);
        break;
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const prefix = [
      this.prefix,
      ...Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`),
    ].join(" ");
    return new ConsoleLogger({ prefix, level: this.level });
  }
}
