import { InvalidArgumentError } from "../errors.js";
import { ConsoleLogger } from "./ConsoleLogger.js";
import type { Logger, LogLevel } from "./Logger.js";
import { NullLogger } from "./NullLogger.js";

function isLogLevel(v: string): v is LogLevel {
  return v === "error" || v === "warn" || v === "info" || v === "debug";
}

/**
 * Builds a logger from `HARVESTKIT_LOG_LEVEL`. Unset or "silent" logs nothing.
 */
export function resolveLogger(env: Record<string, string | undefined> = process.env): Logger {
  const level = env.HARVESTKIT_LOG_LEVEL?.trim().toLowerCase();
  if (!level || level === "silent") return new NullLogger();
  if (!isLogLevel(level)) throw new InvalidArgumentError(`Unknown log level: ${JSON.stringify(level)}`);
  return new ConsoleLogger({ level });
}
