import { chmod } from "fs/promises";

import type { OptionsMap } from "../../core/types.js";
import { PackageError, errorMessage } from "../../lib/errors.js";

import { ProcessPackage, type LaunchCommand } from "./process-package.js";

/**
 * Runs the submitted file directly (native executables)
 */
export class ExecutePackage extends ProcessPackage {
  protected async launchCommand(target: string): Promise<LaunchCommand> {
    try {
      await chmod(target, 0o755);
    } catch (error) {
      throw new PackageError(`Unable to make ${target} executable: ${errorMessage(error)}`, { target });
    }
    return { command: target, args: this.extraArguments };
  }
}

/**
 * Runs the submitted file through an interpreter
 */
export class ScriptPackage extends ProcessPackage {
  constructor(
    private readonly defaultInterpreter: string,
    options: OptionsMap = {}
  ) {
    super(options);
  }

  /** `interpreter=<path>` overrides the default */
  get interpreter(): string {
    return this.options["interpreter"] ?? this.defaultInterpreter;
  }

  protected launchCommand(target: string): LaunchCommand {
    return { command: this.interpreter, args: [target, ...this.extraArguments] };
  }
}
