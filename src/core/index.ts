/**
 * Orchestration core
 *
 * - registry    - Explicit plugin registration and loading
 * - options     - Package option parsing
 * - containment - Fault containment around plugin callbacks
 * - supervisor  - Bounded polling loop and lifecycle state machine
 * - reporter    - One-shot completion report to the host
 * - analyzer    - Outermost scope tying a run to its report
 */

export const VERSION = "0.3.0";

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
} from "./types.js";
export { SUPERVISOR_STATES } from "./types.js";

export { PluginRegistry, createPluginRegistry } from "./registry.js";
export type { PluginModule, PluginLoadReport } from "./registry.js";

export { parseOptions } from "./options.js";

export { contain, bindCallback, implementsCallback } from "./containment.js";
export type { ContainedOutcome, PluginSubject } from "./containment.js";

export { ExecutionSupervisor, createSupervisor, DEFAULT_POLL_INTERVAL_MS } from "./supervisor.js";
export type { SupervisorConfig } from "./supervisor.js";

export {
  CompletionReporter,
  XmlRpcTransport,
  createReporter,
  encodeCompleteCall,
  sanitizeXmlText,
  DEFAULT_HOST_URL,
} from "./reporter.js";
export type { CompletionTransport, XmlRpcTransportConfig } from "./reporter.js";

export { Analyzer, createAnalyzer, INTERRUPTED_MESSAGE } from "./analyzer.js";
export type { AnalyzerOptions } from "./analyzer.js";
