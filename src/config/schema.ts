/**
 * Analysis configuration schemas
 *
 * The agent drops an analysis configuration next to the analyzer before it
 * is launched. Keys are snake_case on disk and camelCase in code.
 */

import { z } from "zod";

export const CATEGORIES = ["file", "url"] as const;

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

/** Blank strings and YAML nulls both mean "not provided" */
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  });

/**
 * Configuration file as written by the agent
 */
export const RawAnalysisConfigSchema = z.object({
  category: CategorySchema,
  target: z.string().min(1, "target cannot be empty"),
  file_name: optionalText,
  file_type: optionalText,
  package: optionalText,
  options: optionalText,
  timeout: z.coerce.number().int().positive(),
  id: optionalText,
  clock: optionalText,
  enforce_timeout: z.boolean().optional(),
});

export type RawAnalysisConfig = z.input<typeof RawAnalysisConfigSchema>;

/**
 * Validated configuration, camelCased
 */
export const AnalysisConfigSchema = RawAnalysisConfigSchema.transform((raw) => ({
  category: raw.category,
  target: raw.target,
  fileName: raw.file_name,
  fileType: raw.file_type,
  package: raw.package,
  options: raw.options,
  timeout: raw.timeout,
  id: raw.id,
  clock: raw.clock,
  enforceTimeout: raw.enforce_timeout ?? false,
}));

export type AnalysisConfig = Readonly<z.output<typeof AnalysisConfigSchema>>;

/**
 * Runtime settings of the analyzer itself
 */
export const SettingsSchema = z.object({
  /** Path of the analysis configuration file */
  configPath: z.string().min(1),
  /** Agent endpoint receiving the completion report */
  hostUrl: z.string().url(),
  /** Directory holding the results, reported to the host */
  resultsDir: z.string().min(1),
  /** Directory the agent stages submitted files into */
  stagingDir: z.string().min(1),
  /** Directory of extra plugin modules */
  pluginsDir: z.string().min(1).optional(),
  pollIntervalMs: z.coerce.number().int().nonnegative(),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export type Settings = z.infer<typeof SettingsSchema>;
