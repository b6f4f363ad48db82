import chalk from "chalk";

import type { OutcomeRecord, RunSummary } from "../core/types.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

export function isValidOutputFormat(format: string): format is OutputFormat {
  return format === "terminal" || format === "json";
}

export interface PluginListing {
  packages: string[];
  auxiliaries: string[];
}

/**
 * Format registered plugins
 */
export function formatPluginList(listing: PluginListing, format: OutputFormat = "terminal"): string {
  if (format === "json") {
    return JSON.stringify(listing, null, 2);
  }

  const lines: string[] = [];
  lines.push(chalk.bold.underline(`Analysis packages (${listing.packages.length}):`));
  for (const name of listing.packages) {
    lines.push(`  ${name}`);
  }
  lines.push("");
  lines.push(chalk.bold.underline(`Auxiliary modules (${listing.auxiliaries.length}):`));
  if (listing.auxiliaries.length === 0) {
    lines.push(chalk.gray("  none"));
  }
  for (const name of listing.auxiliaries) {
    lines.push(`  ${name}`);
  }
  return lines.join("\n");
}

/**
 * Format the final outcome of a run for the terminal
 */
export function formatOutcome(outcome: OutcomeRecord, summary: RunSummary | null): string {
  const lines: string[] = [];

  if (outcome.success) {
    lines.push(formatSuccess("Analysis completed"));
  } else {
    lines.push(chalk.red(`✗ Analysis failed: ${outcome.errorMessage}`));
  }

  if (summary !== null) {
    const reason = summary.reason === "timeout" ? "timeout" : "package requested termination";
    lines.push(`  Package:     ${summary.packageName}`);
    lines.push(`  Iterations:  ${summary.iterations} (${reason})`);
    lines.push(`  Auxiliaries: ${summary.startedAuxiliaries.join(", ") || "none"}`);
    if (summary.failedAuxiliaries.length > 0) {
      lines.push(chalk.yellow(`  Not started: ${summary.failedAuxiliaries.join(", ")}`));
    }
    lines.push(`  Duration:    ${(summary.durationMs / 1000).toFixed(1)}s`);
  }
  lines.push(`  Results:     ${outcome.resultsPath}`);

  return lines.join("\n");
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
