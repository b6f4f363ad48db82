/**
 * Analyzer
 *
 * Outermost scope of a run. Whatever happens between loading the
 * configuration and shutting the plugins down, exactly one outcome is handed
 * to the completion reporter.
 */

import { mkdir } from "fs/promises";

import { resolveTarget } from "../config/loader.js";
import { selectPackageName } from "../config/packages.js";
import type { AnalysisConfig } from "../config/schema.js";
import { AnalysisAbortedError, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";

import type { PluginRegistry } from "./registry.js";
import type { CompletionReporter } from "./reporter.js";
import { createSupervisor, type ExecutionSupervisor } from "./supervisor.js";
import type { OutcomeRecord, RunSummary } from "./types.js";

export const INTERRUPTED_MESSAGE = "Keyboard Interrupt";

export interface AnalyzerOptions {
  /** Produces the analysis configuration; failures are reported like any other */
  loadConfig: () => AnalysisConfig | Promise<AnalysisConfig>;
  registry: PluginRegistry;
  reporter: CompletionReporter;
  /** Results directory, created up front and reported to the host */
  resultsDir: string;
  /** Directory holding the staged submission */
  stagingDir: string;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class Analyzer {
  private supervisor: ExecutionSupervisor | null = null;
  private lastSummary: RunSummary | null = null;
  private readonly log: Logger;

  constructor(private readonly options: AnalyzerOptions) {
    this.log = options.logger ?? rootLogger;
  }

  /** Summary of the last run that completed the polling loop */
  get summary(): RunSummary | null {
    return this.lastSummary;
  }

  /** Supervisor of the current run, once the package has been named */
  get currentSupervisor(): ExecutionSupervisor | null {
    return this.supervisor;
  }

  /**
   * Run the analysis and report its outcome.
   * Rejects only when the report itself cannot be delivered.
   */
  async run(): Promise<OutcomeRecord> {
    let success = false;
    let error = "";

    try {
      this.lastSummary = await this.execute();
      success = true;
    } catch (thrown) {
      error = errorMessage(thrown);
      this.log.error(error);
    }

    const outcome: OutcomeRecord = {
      success,
      errorMessage: error,
      resultsPath: this.options.resultsDir,
    };

    const supervisor = this.supervisor;
    if (supervisor?.state === "ABORTED") {
      supervisor.beginReporting();
    }

    const delivered = await this.options.reporter.report(outcome);
    if (delivered && supervisor?.state === "REPORTING") {
      supervisor.complete();
    }
    return outcome;
  }

  /**
   * Report an interrupted run, unless an outcome was already reported
   */
  async interrupt(): Promise<boolean> {
    if (this.options.reporter.reported) {
      return false;
    }
    this.log.warn("Analysis interrupted");
    return this.fail(INTERRUPTED_MESSAGE);
  }

  /**
   * Report a fault raised outside the run's control flow (an uncaught
   * exception or rejection), unless an outcome was already reported
   */
  async crash(error: unknown): Promise<boolean> {
    if (this.options.reporter.reported) {
      return false;
    }
    const message = errorMessage(error);
    this.log.error(`Uncaught fault: ${message}`);
    return this.fail(message);
  }

  private fail(message: string): Promise<boolean> {
    return this.options.reporter.report({
      success: false,
      errorMessage: message,
      resultsPath: this.options.resultsDir,
    });
  }

  private async execute(): Promise<RunSummary> {
    const { registry, resultsDir, stagingDir } = this.options;
    const config = await this.options.loadConfig();

    await mkdir(resultsDir, { recursive: true });
    const target = resolveTarget(config, stagingDir);

    this.log.info(`Starting analyzer from: ${process.cwd()}`);
    this.log.info(`Storing results at: ${resultsDir}`);
    this.log.info(`Target is: ${target}`);

    let packageName = config.package;
    if (packageName === undefined) {
      this.log.info("No analysis package specified, trying to detect it automatically");
      packageName = selectPackageName(config);
      if (packageName === undefined) {
        throw new AnalysisAbortedError(
          `No valid package available for file type: ${config.fileType ?? config.fileName ?? "unknown"}`,
          { fileType: config.fileType, fileName: config.fileName }
        );
      }
      this.log.info(`Automatically selected analysis package "${packageName}"`);
    }

    this.supervisor = createSupervisor({
      registry,
      packageName,
      target,
      timeout: config.timeout,
      options: config.options,
      pollIntervalMs: this.options.pollIntervalMs,
      sleep: this.options.sleep,
      logger: this.log,
    });

    return this.supervisor.run();
  }
}

export function createAnalyzer(options: AnalyzerOptions): Analyzer {
  return new Analyzer(options);
}
