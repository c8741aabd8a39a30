export type { Logger, LogLevel } from "./Logger.js";
export { ConsoleLogger, type ConsoleLoggerOptions } from "./ConsoleLogger.js";
export { NullLogger } from "./NullLogger.js";
export { resolveLogger } from "./resolveLogger.js";
