/**
 * Orchestration core types
 */

/** Parsed `key=value` analysis options handed to the package */
export type OptionsMap = Record<string, string>;

/** Value a plugin callback may return, synchronously or not */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Analysis package (driver): knows how to launch and monitor the target.
 *
 * Every callback is optional; a package lacking `start` cannot run and aborts
 * the analysis, while a missing `check` or `finish` is only logged.
 */
export interface AnalysisPackage {
  /** Launch the target. Return value is informational only. */
  start?(target: string): MaybePromise<boolean>;
  /** Polled once per iteration; `false` requests termination */
  check?(): MaybePromise<boolean>;
  /** Final operations before shutdown */
  finish?(): MaybePromise<void>;
}

/**
 * Auxiliary module: best-effort capture running alongside the package.
 * Does its own background work; the supervisor only calls start and stop.
 */
export interface AuxiliaryModule {
  start?(): MaybePromise<void>;
  stop?(): MaybePromise<void>;
}

export type PackageFactory = (options: OptionsMap) => AnalysisPackage;
export type AuxiliaryFactory = () => AuxiliaryModule;

/** Auxiliary instance tagged with the name it was registered under */
export interface NamedAuxiliary {
  name: string;
  module: AuxiliaryModule;
}

/** Supervisor lifecycle states */
export const SUPERVISOR_STATES = [
  "SELECTING",
  "STARTING_AUXILIARIES",
  "DRIVER_STARTING",
  "POLLING",
  "STOPPING",
  "REPORTING",
  "DONE",
  "ABORTED",
] as const;

export type SupervisorState = typeof SUPERVISOR_STATES[number];

/** Why the polling loop ended */
export type TerminationReason = "timeout" | "package-terminated";

/** Summary of a run that reached DONE */
export interface RunSummary {
  /** Package that drove the analysis */
  packageName: string;
  /** Value of the iteration counter when the loop ended */
  iterations: number;
  /** Why polling stopped */
  reason: TerminationReason;
  /** Auxiliaries whose start succeeded */
  startedAuxiliaries: string[];
  /** Auxiliaries whose start was missing or failed */
  failedAuxiliaries: string[];
  /** Duration in milliseconds */
  durationMs: number;
}

/** The single record sent back to the host */
export interface OutcomeRecord {
  success: boolean;
  /** Empty on success */
  errorMessage: string;
  /** Directory holding the analysis results inside the guest */
  resultsPath: string;
}
