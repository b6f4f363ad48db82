/**
 * Default package selection
 *
 * When a submission names no package, one is picked from the file type
 * (as reported by `file(1)` on the host) or, failing that, the file name.
 */

import { extname } from "path";

import type { AnalysisConfig } from "./schema.js";

/** Package used for URL submissions */
export const URL_PACKAGE = "default_browser";

interface PackageRule {
  package: string;
  /** Substrings looked up in the file type, case-insensitively */
  fileTypes: string[];
  /** File extensions, lower case with leading dot */
  extensions: string[];
}

const PACKAGE_RULES: PackageRule[] = [
  { package: "execute", fileTypes: ["elf"], extensions: [".elf", ".bin"] },
  { package: "shell", fileTypes: ["shell script"], extensions: [".sh"] },
  { package: "python", fileTypes: ["python script"], extensions: [".py"] },
  { package: URL_PACKAGE, fileTypes: ["html document"], extensions: [".html", ".htm"] },
];

/**
 * Pick a package for a file, or `undefined` when nothing fits
 */
export function choosePackage(fileType: string | undefined, fileName: string | undefined): string | undefined {
  const type = fileType?.toLowerCase() ?? "";
  const extension = fileName ? extname(fileName).toLowerCase() : "";

  for (const rule of PACKAGE_RULES) {
    if (type.length > 0 && rule.fileTypes.some((needle) => type.includes(needle))) {
      return rule.package;
    }
  }

  for (const rule of PACKAGE_RULES) {
    if (extension.length > 0 && rule.extensions.includes(extension)) {
      return rule.package;
    }
  }

  return undefined;
}

/**
 * Package for this submission: the one requested, else a detected default
 */
export function selectPackageName(config: AnalysisConfig): string | undefined {
  if (config.package !== undefined) {
    return config.package;
  }
  if (config.category === "url") {
    return URL_PACKAGE;
  }
  return choosePackage(config.fileType, config.fileName ?? config.target);
}
