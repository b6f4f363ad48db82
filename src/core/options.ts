/**
 * Analysis options parser
 *
 * Packages can be given options in the form:
 *   option1=value1,option2=value2,option3=value3
 * No escaping, no nesting. Malformed entries are dropped with a warning.
 */

import { logger as rootLogger, type Logger } from "../lib/logger.js";

import type { OptionsMap } from "./types.js";

export function parseOptions(raw: string | null | undefined, log: Logger = rootLogger): OptionsMap {
  const options: OptionsMap = {};
  if (raw === null || raw === undefined) {
    return options;
  }

  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return options;
  }

  for (const field of trimmed.split(",")) {
    const parts = field.trim().split("=");
    if (parts.length !== 2) {
      const reason = parts.length < 2 ? "missing '='" : "more than one '='";
      log.warn(`Failed parsing option (${field}): ${reason}`);
      continue;
    }

    const [key, value] = parts;
    if (key === undefined || value === undefined) continue;
    options[key.trim()] = value.trim();
  }

  return options;
}
