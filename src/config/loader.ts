/**
 * Configuration loading
 *
 * Reads the analysis configuration (YAML or JSON) and resolves the
 * analyzer's runtime settings from defaults, environment and CLI flags.
 */

import { readFile } from "fs/promises";
import { basename, join, resolve } from "path";

import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";

import { DEFAULT_HOST_URL } from "../core/reporter.js";
import { ConfigError, errorMessage } from "../lib/errors.js";

import {
  AnalysisConfigSchema,
  SettingsSchema,
  type AnalysisConfig,
  type Settings,
} from "./schema.js";

export const DEFAULT_CONFIG_FILE = "analysis.yaml";
export const DEFAULT_RESULTS_DIR = "/data/local/tmp/analysis";
export const DEFAULT_STAGING_DIR = "/data/local/tmp";

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate an already-parsed configuration object
 */
export function parseAnalysisConfig(data: unknown, source = "analysis configuration"): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, {
      source,
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return Object.freeze(result.data);
}

/**
 * Load and validate the analysis configuration file
 */
export async function loadAnalysisConfig(path: string): Promise<AnalysisConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Unable to read analysis configuration ${path}: ${errorMessage(error)}`, { path });
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Unable to parse analysis configuration ${path}: ${errorMessage(error)}`, { path });
  }

  return parseAnalysisConfig(data, path);
}

/**
 * Where the package should find the target: staged file path or URL
 */
export function resolveTarget(config: AnalysisConfig, stagingDir: string): string {
  if (config.category === "url") {
    return config.target;
  }
  return join(stagingDir, config.fileName ?? basename(config.target));
}

/** Flags given on the command line; all optional */
export interface SettingsOverrides {
  config?: string;
  host?: string;
  results?: string;
  staging?: string;
  plugins?: string;
  pollInterval?: string | number;
  logLevel?: string;
}

/**
 * Resolve runtime settings. Precedence: flags, then environment, then defaults.
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const candidate = {
    configPath: resolve(overrides.config ?? env["ANALYZER_CONFIG"] ?? DEFAULT_CONFIG_FILE),
    hostUrl: overrides.host ?? env["ANALYZER_HOST_URL"] ?? DEFAULT_HOST_URL,
    resultsDir: overrides.results ?? env["ANALYZER_RESULTS_DIR"] ?? DEFAULT_RESULTS_DIR,
    stagingDir: overrides.staging ?? env["ANALYZER_STAGING_DIR"] ?? DEFAULT_STAGING_DIR,
    pluginsDir: overrides.plugins ?? env["ANALYZER_PLUGINS_DIR"],
    pollIntervalMs: overrides.pollInterval ?? env["ANALYZER_POLL_INTERVAL_MS"] ?? 1000,
    logLevel: overrides.logLevel ?? env["ANALYZER_LOG_LEVEL"] ?? "info",
  };

  const result = SettingsSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(`Invalid analyzer settings: ${formatIssues(result.error)}`);
  }
  return result.data;
}
