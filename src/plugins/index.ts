/**
 * Built-in analysis packages and auxiliary modules
 */

import type { PluginRegistry } from "../core/registry.js";

import { LogcatCapture } from "./auxiliary/logcat.js";
import { ProcessListSnapshot } from "./auxiliary/process-list.js";
import { BrowserPackage } from "./packages/browser.js";
import { ExecutePackage, ScriptPackage } from "./packages/execute.js";

export interface BuiltinContext {
  /** Results directory auxiliaries write into */
  resultsDir: string;
}

/**
 * Register every built-in plugin into `registry`
 */
export function registerBuiltins(registry: PluginRegistry, context: BuiltinContext): PluginRegistry {
  return registry
    .registerPackage("execute", (options) => new ExecutePackage(options))
    .registerPackage("shell", (options) => new ScriptPackage("sh", options))
    .registerPackage("python", (options) => new ScriptPackage("python3", options))
    .registerPackage("default_browser", (options) => new BrowserPackage(options))
    .registerAuxiliary("logcat", () => new LogcatCapture(context.resultsDir))
    .registerAuxiliary("process_list", () => new ProcessListSnapshot(context.resultsDir));
}

export { ProcessPackage } from "./packages/process-package.js";
export type { LaunchCommand } from "./packages/process-package.js";
export { ExecutePackage, ScriptPackage } from "./packages/execute.js";
export { BrowserPackage } from "./packages/browser.js";
export { CommandCapture } from "./auxiliary/capture.js";
export type { CaptureConfig } from "./auxiliary/capture.js";
export { LogcatCapture } from "./auxiliary/logcat.js";
export { ProcessListSnapshot } from "./auxiliary/process-list.js";
export { runCommand, launchProcess, isRunning, terminateProcess } from "./process.js";
export type { CommandResult } from "./process.js";
