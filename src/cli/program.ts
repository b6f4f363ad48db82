/**
 * Command-line program definition
 *
 * Commands:
 * - run     - Perform the analysis described by the configuration file
 * - plugins - List available analysis packages and auxiliary modules
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerPluginsCommand } from "./commands/plugins.js";
import { registerRunCommand } from "./commands/run.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("guest-analyzer")
    .description("In-guest supervisor for dynamic malware analysis")
    .version(VERSION);

  registerRunCommand(program);
  registerPluginsCommand(program);

  return program;
}
