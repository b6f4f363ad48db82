// Error classes
export {
  AnalyzerError,
  ConfigError,
  PluginNotFoundError,
  PluginAmbiguousError,
  PackageError,
  AnalysisAbortedError,
  PluginTimeoutError,
  ReportError,
  errorMessage,
} from "./errors.js";

// Result type and utilities
export { ok, err, tryCatch } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger, isLogLevel, LOG_LEVEL_NAMES } from "./logger.js";
export type { LogLevel } from "./logger.js";
