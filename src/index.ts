/**
 * guest-analyzer - in-guest supervisor for dynamic malware analysis
 *
 * @packageDocumentation
 */

// Orchestration core
export {
  VERSION,
  SUPERVISOR_STATES,
  PluginRegistry,
  createPluginRegistry,
  parseOptions,
  contain,
  bindCallback,
  implementsCallback,
  ExecutionSupervisor,
  createSupervisor,
  DEFAULT_POLL_INTERVAL_MS,
  CompletionReporter,
  XmlRpcTransport,
  createReporter,
  encodeCompleteCall,
  sanitizeXmlText,
  DEFAULT_HOST_URL,
  Analyzer,
  createAnalyzer,
  INTERRUPTED_MESSAGE,
} from "./core/index.js";

export type {
  OptionsMap,
  MaybePromise,
  AnalysisPackage,
  AuxiliaryModule,
  PackageFactory,
  AuxiliaryFactory,
  NamedAuxiliary,
  SupervisorState,
  TerminationReason,
  RunSummary,
  OutcomeRecord,
  PluginModule,
  PluginLoadReport,
  ContainedOutcome,
  PluginSubject,
  SupervisorConfig,
  CompletionTransport,
  XmlRpcTransportConfig,
  AnalyzerOptions,
} from "./core/index.js";

// Configuration
export {
  AnalysisConfigSchema,
  SettingsSchema,
  parseAnalysisConfig,
  loadAnalysisConfig,
  resolveTarget,
  resolveSettings,
  choosePackage,
  selectPackageName,
} from "./config/index.js";

export type { AnalysisConfig, Category, Settings, SettingsOverrides } from "./config/index.js";

// Built-in plugins
export {
  registerBuiltins,
  ProcessPackage,
  ExecutePackage,
  ScriptPackage,
  BrowserPackage,
  CommandCapture,
  LogcatCapture,
  ProcessListSnapshot,
} from "./plugins/index.js";

export type { BuiltinContext, LaunchCommand, CaptureConfig } from "./plugins/index.js";

// Library utilities
export {
  // Errors
  AnalyzerError,
  ConfigError,
  PluginNotFoundError,
  PluginAmbiguousError,
  PackageError,
  AnalysisAbortedError,
  PluginTimeoutError,
  ReportError,
  errorMessage,
  // Result utilities
  ok,
  err,
  tryCatch,
  // Logger
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
