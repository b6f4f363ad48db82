/**
 * Execution supervisor
 *
 * Drives one analysis run: selects the package, starts auxiliaries, starts
 * the package, polls it until the deadline or until it asks to stop, then
 * shuts everything down. Only selection and package start can abort a run;
 * every other plugin fault is logged and absorbed.
 */

import { setTimeout as delay } from "timers/promises";

import { AnalysisAbortedError, PackageError, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";

import { bindCallback, contain, type PluginSubject } from "./containment.js";
import { parseOptions } from "./options.js";
import type { PluginRegistry } from "./registry.js";
import type {
  AnalysisPackage,
  AuxiliaryModule,
  RunSummary,
  SupervisorState,
  TerminationReason,
} from "./types.js";

/** Interval between two polls of the package */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

/** Longest wait on a start, finish or auxiliary callback */
export const DEFAULT_CALLBACK_TIMEOUT_MS = 60000;

const TRANSITIONS: Record<SupervisorState, readonly SupervisorState[]> = {
  SELECTING: ["STARTING_AUXILIARIES", "ABORTED"],
  STARTING_AUXILIARIES: ["DRIVER_STARTING"],
  DRIVER_STARTING: ["POLLING", "ABORTED"],
  POLLING: ["STOPPING"],
  STOPPING: ["REPORTING"],
  REPORTING: ["DONE"],
  DONE: [],
  ABORTED: ["REPORTING"],
};

export interface SupervisorConfig {
  /** Registry holding the package and the auxiliary modules */
  registry: PluginRegistry;
  /** Name of the package to drive */
  packageName: string;
  /** File path or URL handed to the package's start */
  target: string;
  /** Number of iterations before the analysis is stopped */
  timeout: number;
  /** Raw `key=value,...` options for the package */
  options?: string | null;
  pollIntervalMs?: number;
  /**
   * Longest wait on any single plugin callback. `check()` is further bounded
   * by what is left of the analysis deadline (`timeout` × `pollIntervalMs`).
   */
  callbackTimeoutMs?: number;
  /** Suspension between polls; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Auxiliary module with the outcome of its start, for symmetric shutdown */
interface AuxiliaryEntry {
  name: string;
  module: AuxiliaryModule;
  started: boolean;
}

export class ExecutionSupervisor {
  private currentState: SupervisorState = "SELECTING";
  private readonly visited: SupervisorState[] = ["SELECTING"];
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly pollIntervalMs: number;
  private readonly callbackTimeoutMs: number;

  constructor(private readonly config: SupervisorConfig) {
    if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
      throw new RangeError(`Timeout must be a positive integer, got ${config.timeout}`);
    }
    this.log = (config.logger ?? rootLogger).child("[supervisor]");
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.callbackTimeoutMs = config.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
    this.sleep = config.sleep ?? ((ms) => delay(ms));
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  /** States entered so far, in order */
  get history(): readonly SupervisorState[] {
    return this.visited;
  }

  /**
   * Run the analysis up to the REPORTING state.
   * Rejects with AnalysisAbortedError when selection or package start fails;
   * a fault while polling is rethrown once the plugins are shut down.
   */
  async run(): Promise<RunSummary> {
    const startTime = Date.now();
    const { packageName } = this.config;
    const pkg = this.selectPackage();

    this.transition("STARTING_AUXILIARIES");
    const auxiliaries = await this.startAuxiliaries();

    this.transition("DRIVER_STARTING");
    await this.startPackage(pkg, auxiliaries);

    this.transition("POLLING");
    let polled: { iterations: number; reason: TerminationReason };
    try {
      polled = await this.poll(pkg);
    } catch (error) {
      // Faults outside any plugin callback still shut the plugins down.
      this.log.error(`Polling failed: ${errorMessage(error)}`);
      this.transition("STOPPING");
      await this.shutdown(pkg, auxiliaries);
      this.transition("REPORTING");
      throw error;
    }
    const { iterations, reason } = polled;

    this.transition("STOPPING");
    await this.shutdown(pkg, auxiliaries);

    this.transition("REPORTING");
    return {
      packageName,
      iterations,
      reason,
      startedAuxiliaries: auxiliaries.filter((entry) => entry.started).map((entry) => entry.name),
      failedAuxiliaries: auxiliaries.filter((entry) => !entry.started).map((entry) => entry.name),
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Move an aborted run on to reporting its failure
   */
  beginReporting(): void {
    this.transition("REPORTING");
  }

  /**
   * Mark the run finished once its outcome has been reported
   */
  complete(): void {
    this.transition("DONE");
  }

  private transition(next: SupervisorState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid supervisor transition ${this.currentState} -> ${next}`);
    }
    this.log.debug(`${this.currentState} -> ${next}`);
    this.currentState = next;
    this.visited.push(next);
  }

  private abort(message: string, cause?: unknown): never {
    this.transition("ABORTED");
    throw new AnalysisAbortedError(message, {
      packageName: this.config.packageName,
      ...(cause !== undefined ? { cause: errorMessage(cause) } : {}),
    });
  }

  private selectPackage(): AnalysisPackage {
    const { packageName, registry } = this.config;
    const options = parseOptions(this.config.options, this.log);

    try {
      const pkg = registry.createPackage(packageName, options);
      this.log.info(`Selected analysis package "${packageName}"`);
      return pkg;
    } catch (error) {
      return this.abort(`Unable to select package "${packageName}": ${errorMessage(error)}`, error);
    }
  }

  private async startAuxiliaries(): Promise<AuxiliaryEntry[]> {
    const entries: AuxiliaryEntry[] = [];

    for (const { name, module } of this.config.registry.createAuxiliaries()) {
      const subject: PluginSubject = { kind: "auxiliary", name };
      const outcome = await contain(
        subject,
        "start",
        bindCallback(module, module.start),
        this.log,
        this.callbackTimeoutMs
      );
      const started = outcome.status === "ok";
      if (started) {
        this.log.info(`Started auxiliary module ${name}`);
      }
      entries.push({ name, module, started });
    }

    return entries;
  }

  private async startPackage(pkg: AnalysisPackage, auxiliaries: AuxiliaryEntry[]): Promise<void> {
    const { packageName, target } = this.config;
    const start = bindCallback(pkg, pkg.start);
    const outcome = await contain(
      { kind: "package", name: packageName },
      "start",
      start && (() => start(target)),
      this.log,
      this.callbackTimeoutMs
    );

    if (outcome.status === "ok") {
      return;
    }

    // Capture modules may already be running; do not leave them behind.
    await this.stopAuxiliaries(auxiliaries);

    if (outcome.status === "missing") {
      return this.abort(`The package "${packageName}" doesn't contain a start function.`);
    }
    if (outcome.error instanceof PackageError) {
      return this.abort(
        `The package "${packageName}" start function raised an error: ${outcome.error.message}`,
        outcome.error
      );
    }
    return this.abort(
      `The package "${packageName}" start function encountered an unhandled exception: ${errorMessage(outcome.error)}`,
      outcome.error
    );
  }

  private async poll(pkg: AnalysisPackage): Promise<{ iterations: number; reason: TerminationReason }> {
    const { packageName, timeout } = this.config;
    const subject: PluginSubject = { kind: "package", name: packageName };
    const check = bindCallback(pkg, pkg.check);

    if (check === undefined) {
      this.log.warn(`The package "${packageName}" does not implement check(), running until timeout`);
    }

    const deadline = Date.now() + timeout * this.pollIntervalMs;
    let counter = 0;
    for (;;) {
      counter += 1;
      if (counter >= timeout) {
        this.log.info("Analysis timeout hit, terminating analysis");
        return { iterations: counter, reason: "timeout" };
      }

      if (check !== undefined) {
        // A raised or timed-out check counts as "keep going".
        const remaining = Math.max(deadline - Date.now(), 0);
        const outcome = await contain(subject, "check", check, this.log, Math.min(remaining, this.callbackTimeoutMs));
        if (outcome.status === "ok" && !outcome.value) {
          this.log.info("The analysis package requested the termination of the analysis");
          return { iterations: counter, reason: "package-terminated" };
        }
      }

      await this.sleep(this.pollIntervalMs);
    }
  }

  private async shutdown(pkg: AnalysisPackage, auxiliaries: AuxiliaryEntry[]): Promise<void> {
    await contain(
      { kind: "package", name: this.config.packageName },
      "finish",
      bindCallback(pkg, pkg.finish),
      this.log,
      this.callbackTimeoutMs
    );
    await this.stopAuxiliaries(auxiliaries);
  }

  /**
   * Stop every started auxiliary once; one failure never skips the rest
   */
  private async stopAuxiliaries(auxiliaries: AuxiliaryEntry[]): Promise<void> {
    for (const entry of auxiliaries) {
      if (!entry.started) continue;
      const outcome = await contain(
        { kind: "auxiliary", name: entry.name },
        "stop",
        bindCallback(entry.module, entry.module.stop),
        this.log,
        this.callbackTimeoutMs
      );
      if (outcome.status === "ok") {
        this.log.debug(`Stopped auxiliary module ${entry.name}`);
      }
    }
  }
}

/**
 * Create a supervisor for a single run
 */
export function createSupervisor(config: SupervisorConfig): ExecutionSupervisor {
  return new ExecutionSupervisor(config);
}
