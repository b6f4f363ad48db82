/**
 * Plugins command - List the packages and auxiliary modules available
 */

import type { Command } from "commander";

import { DEFAULT_RESULTS_DIR } from "../../config/loader.js";
import { createPluginRegistry } from "../../core/registry.js";
import { logger } from "../../lib/index.js";
import { registerBuiltins } from "../../plugins/index.js";
import { formatError, formatPluginList, isValidOutputFormat, type PluginListing } from "../formatters.js";

import { stringOption, verbosityLevel } from "./options.js";

/**
 * Built-in plugins plus those loaded from `pluginsDir`
 */
export async function listPlugins(pluginsDir?: string): Promise<PluginListing> {
  const registry = registerBuiltins(createPluginRegistry(), { resultsDir: DEFAULT_RESULTS_DIR });
  if (pluginsDir !== undefined) {
    await registry.loadPlugins(pluginsDir);
  }
  return {
    packages: registry.packageNames(),
    auxiliaries: registry.auxiliaryNames(),
  };
}

export function registerPluginsCommand(program: Command): void {
  program
    .command("plugins")
    .description("List available analysis packages and auxiliary modules")
    .option("--plugins <dir>", "Directory of additional plugin modules")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("-v, --verbose", "Verbose output")
    .action(async (options: Record<string, unknown>) => {
      const level = verbosityLevel(options);
      if (level !== undefined) {
        logger.configure({ level });
      }

      const format = stringOption(options, "output") ?? "terminal";
      if (!isValidOutputFormat(format)) {
        console.error(formatError(new Error(`Invalid output format: ${format}. Use: terminal, json`)));
        process.exit(1);
      }

      const listing = await listPlugins(stringOption(options, "plugins"));
      console.log(formatPluginList(listing, format));
    });
}
