/**
 * Base error class for all analyzer errors
 */
export class AnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AnalyzerError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or the completion report
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * No plugin is registered under the requested name
 */
export class PluginNotFoundError extends AnalyzerError {
  constructor(
    public readonly kind: "package" | "auxiliary",
    public readonly pluginName: string
  ) {
    super(`No ${kind} registered under "${pluginName}"`, "PLUGIN_NOT_FOUND", { kind, pluginName });
    this.name = "PluginNotFoundError";
  }
}

/**
 * A plugin name resolves to zero or several eligible implementations
 */
export class PluginAmbiguousError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PLUGIN_AMBIGUOUS", context);
    this.name = "PluginAmbiguousError";
  }
}

/**
 * Raised by analysis packages to signal an operational failure.
 * The supervisor reports it distinctly from unexpected faults.
 */
export class PackageError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PACKAGE_ERROR", context);
    this.name = "PackageError";
  }
}

/**
 * A plugin callback did not settle within its time limit
 */
export class PluginTimeoutError extends AnalyzerError {
  constructor(
    public readonly callback: string,
    public readonly limitMs: number
  ) {
    super(`${callback}() did not complete within ${limitMs} ms`, "PLUGIN_TIMEOUT", { callback, limitMs });
    this.name = "PluginTimeoutError";
  }
}

/**
 * Fatal condition that ends the analysis before the polling loop
 */
export class AnalysisAbortedError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ANALYSIS_ABORTED", context);
    this.name = "AnalysisAbortedError";
  }
}

/**
 * The completion report could not be delivered to the host
 */
export class ReportError extends AnalyzerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "REPORT_ERROR", context);
    this.name = "ReportError";
  }
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
