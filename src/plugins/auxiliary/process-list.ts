import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

import type { AuxiliaryModule } from "../../core/types.js";
import { runCommand } from "../process.js";

/**
 * Snapshots the process table when the analysis starts and when it stops
 */
export class ProcessListSnapshot implements AuxiliaryModule {
  private readonly logsDir: string;

  constructor(
    resultsDir: string,
    private readonly command: string[] = ["ps", "-A"]
  ) {
    this.logsDir = join(resultsDir, "logs");
  }

  async start(): Promise<void> {
    await this.snapshot("ps_start.txt");
  }

  async stop(): Promise<void> {
    await this.snapshot("ps_stop.txt");
  }

  private async snapshot(fileName: string): Promise<void> {
    const [command, ...args] = this.command;
    if (command === undefined) {
      throw new Error("No process listing command configured");
    }

    const result = await runCommand(command, args, { timeout: 10000 });
    if (result.exitCode !== 0) {
      throw new Error(`${command} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }

    await mkdir(this.logsDir, { recursive: true });
    await writeFile(join(this.logsDir, fileName), result.stdout);
  }
}
