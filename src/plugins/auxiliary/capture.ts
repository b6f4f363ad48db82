/**
 * Auxiliary that streams a long-running command's output into a results file
 */

import type { ChildProcess } from "child_process";
import { createWriteStream, type WriteStream } from "fs";
import { mkdir } from "fs/promises";
import { dirname } from "path";

import type { AuxiliaryModule } from "../../core/types.js";
import { errorMessage } from "../../lib/errors.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";
import { launchProcess, terminateProcess } from "../process.js";

export interface CaptureConfig {
  command: string;
  args: string[];
  /** File receiving stdout and stderr */
  outputPath: string;
  logger?: Logger;
}

export class CommandCapture implements AuxiliaryModule {
  private process: ChildProcess | null = null;
  private output: WriteStream | null = null;

  private readonly log: Logger;

  constructor(private readonly config: CaptureConfig) {
    this.log = config.logger ?? rootLogger;
  }

  get outputPath(): string {
    return this.config.outputPath;
  }

  get running(): boolean {
    return this.process !== null;
  }

  async start(): Promise<void> {
    await mkdir(dirname(this.config.outputPath), { recursive: true });
    const output = createWriteStream(this.config.outputPath, { flags: "a" });
    output.on("error", (error) => {
      this.log.warn(`Unable to write capture output ${this.config.outputPath}: ${errorMessage(error)}`);
    });

    let proc: ChildProcess;
    try {
      proc = await launchProcess(this.config.command, this.config.args, {
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      output.end();
      throw error;
    }

    proc.stdout?.pipe(output, { end: false });
    proc.stderr?.pipe(output, { end: false });
    this.process = proc;
    this.output = output;
  }

  async stop(): Promise<void> {
    if (this.process !== null) {
      await terminateProcess(this.process);
      this.process = null;
    }

    const output = this.output;
    if (output !== null) {
      this.output = null;
      if (!output.destroyed) {
        await new Promise<void>((resolve) => output.end(() => resolve()));
      }
    }
  }
}
