/**
 * Base for packages that analyze a target by running it as a process
 */

import type { ChildProcess } from "child_process";

import type { AnalysisPackage, OptionsMap } from "../../core/types.js";
import { PackageError, errorMessage } from "../../lib/errors.js";
import { isRunning, launchProcess, terminateProcess } from "../process.js";

export interface LaunchCommand {
  command: string;
  args: string[];
}

/**
 * Runs the target and reports termination once the process exits.
 *
 * Options:
 * - `arguments`: whitespace-separated arguments appended to the command line
 * - `free=yes`: keep polling after the process exits and leave it running
 */
export abstract class ProcessPackage implements AnalysisPackage {
  protected process: ChildProcess | null = null;

  constructor(protected readonly options: OptionsMap = {}) {}

  /** Command line that launches `target` */
  protected abstract launchCommand(target: string): LaunchCommand | Promise<LaunchCommand>;

  protected get extraArguments(): string[] {
    const raw = this.options["arguments"] ?? "";
    return raw.split(/\s+/).filter((arg) => arg.length > 0);
  }

  protected get free(): boolean {
    return this.options["free"] === "yes";
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  async start(target: string): Promise<boolean> {
    const { command, args } = await this.launchCommand(target);
    try {
      this.process = await launchProcess(command, args);
    } catch (error) {
      throw new PackageError(`Unable to launch ${command}: ${errorMessage(error)}`, { command, args });
    }
    return true;
  }

  check(): boolean {
    if (this.free || this.process === null) {
      return true;
    }
    return isRunning(this.process);
  }

  async finish(): Promise<void> {
    if (this.free || this.process === null) {
      return;
    }
    await terminateProcess(this.process);
  }
}
