/**
 * Helpers for reading commander option bags
 */

import type { LogLevel } from "../../lib/logger.js";

export function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Log level from --verbose / --quiet, or undefined to keep the default
 */
export function verbosityLevel(options: Record<string, unknown>): LogLevel | undefined {
  if (options["quiet"]) return "error";
  if (options["verbose"]) return "debug";
  return undefined;
}
