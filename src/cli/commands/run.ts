/**
 * Run command - Perform one analysis and report it to the host
 */

import { join } from "path";

import type { Command } from "commander";

import { loadAnalysisConfig, resolveSettings, DEFAULT_RESULTS_DIR, type SettingsOverrides } from "../../config/loader.js";
import type { Settings } from "../../config/schema.js";
import { createAnalyzer, type Analyzer } from "../../core/analyzer.js";
import { createPluginRegistry, type PluginRegistry } from "../../core/registry.js";
import {
  CompletionReporter,
  DEFAULT_HOST_URL,
  XmlRpcTransport,
  type CompletionTransport,
} from "../../core/reporter.js";
import { errorMessage, logger } from "../../lib/index.js";
import { registerBuiltins } from "../../plugins/index.js";
import { formatOutcome, formatWarning } from "../formatters.js";

import { stringOption, verbosityLevel } from "./options.js";

export const LOG_FILE = "analysis.log";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** The host could not be told about the outcome */
export const EXIT_REPORT_FAILED = 2;
export const EXIT_INTERRUPTED = 130;

export interface RunDependencies {
  /** Replaces the XML-RPC transport */
  transport?: CompletionTransport;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
  /** Ends the process after a guard has reported */
  exit?: (code: number) => void;
}

export interface PreparedRun {
  analyzer: Analyzer;
  registry: PluginRegistry;
  settings: Settings;
}

/**
 * Resolve settings, initialize logging and build the analyzer around the
 * built-in plugins. External plugins are loaded later, by `executeRun`,
 * once the run guards are in place.
 */
export function prepareRun(overrides: SettingsOverrides, deps: RunDependencies = {}): PreparedRun {
  const settings = resolveSettings(overrides, deps.env);

  logger.configure({ level: settings.logLevel });
  try {
    logger.configure({ file: join(settings.resultsDir, LOG_FILE) });
  } catch (error) {
    console.warn(formatWarning(`Logging to console only: ${errorMessage(error)}`));
  }

  const registry = registerBuiltins(createPluginRegistry(), { resultsDir: settings.resultsDir });
  const transport = deps.transport ?? new XmlRpcTransport({ url: settings.hostUrl });
  const analyzer = createAnalyzer({
    loadConfig: () => loadAnalysisConfig(settings.configPath),
    registry,
    reporter: new CompletionReporter(transport),
    resultsDir: settings.resultsDir,
    stagingDir: settings.stagingDir,
    pollIntervalMs: settings.pollIntervalMs,
    sleep: deps.sleep,
  });

  return { analyzer, registry, settings };
}

export interface RunGuards {
  /** SIGINT / SIGTERM */
  onSignal: () => void;
  /** Uncaught exception or unhandled rejection */
  onFault: (error: unknown) => void;
}

/**
 * Handlers reporting an interruption or a stray fault through the analyzer's
 * one-shot reporter, then ending the process with `exit`
 */
export function createRunGuards(analyzer: Analyzer, exit: (code: number) => void): RunGuards {
  return {
    onSignal: () => {
      void analyzer.interrupt().then(
        () => exit(EXIT_INTERRUPTED),
        () => exit(EXIT_REPORT_FAILED)
      );
    },
    onFault: (error) => {
      void analyzer.crash(error).then(
        () => exit(EXIT_FAILURE),
        () => exit(EXIT_REPORT_FAILED)
      );
    },
  };
}

/**
 * Install the run guards on the process; returns their removal
 */
export function installRunGuards(
  analyzer: Analyzer,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  const { onSignal, onFault } = createRunGuards(analyzer, exit);
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  process.on("uncaughtException", onFault);
  process.on("unhandledRejection", onFault);

  return () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    process.off("uncaughtException", onFault);
    process.off("unhandledRejection", onFault);
  };
}

/**
 * Run one analysis end to end and return the process exit code
 */
export async function executeRun(overrides: SettingsOverrides, deps: RunDependencies = {}): Promise<number> {
  let prepared: PreparedRun;
  try {
    prepared = prepareRun(overrides, deps);
  } catch (error) {
    // Settings are unusable, but the host still has to hear about it.
    logger.error(errorMessage(error));
    const reporter = new CompletionReporter(
      deps.transport ?? new XmlRpcTransport({ url: overrides.host ?? DEFAULT_HOST_URL })
    );
    try {
      await reporter.report({
        success: false,
        errorMessage: errorMessage(error),
        resultsPath: overrides.results ?? DEFAULT_RESULTS_DIR,
      });
    } catch {
      return EXIT_REPORT_FAILED;
    }
    return EXIT_FAILURE;
  }

  const { analyzer, registry, settings } = prepared;
  const removeGuards = installRunGuards(analyzer, deps.exit);

  try {
    if (settings.pluginsDir !== undefined) {
      const report = await registry.loadPlugins(settings.pluginsDir);
      logger.debug(`Loaded ${report.loaded.length} plugin module(s), skipped ${report.skipped.length}`);
    }

    const outcome = await analyzer.run();
    console.log(formatOutcome(outcome, analyzer.summary));
    return outcome.success ? EXIT_SUCCESS : EXIT_FAILURE;
  } catch {
    // Delivery failure, already logged by the reporter
    return EXIT_REPORT_FAILED;
  } finally {
    removeGuards();
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run one analysis and report the outcome to the host")
    .option("-c, --config <path>", "Analysis configuration file (YAML or JSON)")
    .option("--host <url>", "Agent endpoint receiving the completion report")
    .option("--results <dir>", "Results directory")
    .option("--staging <dir>", "Directory holding the staged submission")
    .option("--plugins <dir>", "Directory of additional plugin modules")
    .option("--poll-interval <ms>", "Milliseconds between two package checks")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (options: Record<string, unknown>) => {
      const exitCode = await executeRun({
        config: stringOption(options, "config"),
        host: stringOption(options, "host"),
        results: stringOption(options, "results"),
        staging: stringOption(options, "staging"),
        plugins: stringOption(options, "plugins"),
        pollInterval: stringOption(options, "pollInterval"),
        logLevel: verbosityLevel(options),
      });
      process.exit(exitCode);
    });
}
