export {
  CATEGORIES,
  CategorySchema,
  RawAnalysisConfigSchema,
  AnalysisConfigSchema,
  SettingsSchema,
} from "./schema.js";
export type { Category, RawAnalysisConfig, AnalysisConfig, Settings } from "./schema.js";

export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_RESULTS_DIR,
  DEFAULT_STAGING_DIR,
  parseAnalysisConfig,
  loadAnalysisConfig,
  resolveTarget,
  resolveSettings,
} from "./loader.js";
export type { SettingsOverrides } from "./loader.js";

export { URL_PACKAGE, choosePackage, selectPackageName } from "./packages.js";
