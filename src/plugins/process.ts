/**
 * Child process helpers shared by the built-in plugins
 */

import { spawn, type ChildProcess, type SpawnOptions } from "child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Execute a command to completion and capture its output
 */
export function runCommand(
  command: string,
  args: string[],
  options: { timeout?: number } = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const proc = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    proc.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = options.timeout ?? 30000;
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, timeout);

    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: code ?? 1,
        timedOut,
      });
    });

    proc.on("error", (err) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr: stderr + "\n" + err.message,
        exitCode: 1,
        timedOut: false,
      });
    });
  });
}

/**
 * Spawn a long-running process; resolves once it has started, rejects if it
 * cannot be started at all
 */
export function launchProcess(command: string, args: string[], options: SpawnOptions = {}): Promise<ChildProcess> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: "ignore", ...options });
    proc.once("spawn", () => resolve(proc));
    proc.once("error", reject);
  });
}

export function isRunning(proc: ChildProcess): boolean {
  return proc.exitCode === null && proc.signalCode === null;
}

/**
 * Send SIGTERM and wait for exit, escalating to SIGKILL after `graceMs`
 */
export function terminateProcess(proc: ChildProcess, graceMs = 5000): Promise<void> {
  if (!isRunning(proc)) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const timer = setTimeout(() => proc.kill("SIGKILL"), graceMs);
    proc.once("exit", () => {
      clearTimeout(timer);
      resolve();
    });
    proc.kill("SIGTERM");
  });
}
