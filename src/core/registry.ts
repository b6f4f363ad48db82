/**
 * Plugin registry
 *
 * Explicit name → factory mapping for analysis packages and auxiliary
 * modules. One registry is built per run and handed to the supervisor.
 */

import type { Dirent } from "fs";
import { readdir } from "fs/promises";
import { extname, join } from "path";
import { pathToFileURL } from "url";

import { PluginAmbiguousError, PluginNotFoundError, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { tryCatch } from "../lib/result.js";

import { implementsCallback } from "./containment.js";
import type {
  AnalysisPackage,
  AuxiliaryFactory,
  NamedAuxiliary,
  OptionsMap,
  PackageFactory,
} from "./types.js";

const PACKAGE_CALLBACKS = ["start", "check", "finish"] as const;
const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

/**
 * Shape of an external plugin module
 */
export interface PluginModule {
  register(registry: PluginRegistry): void | Promise<void>;
}

/** Outcome of loading a plugin directory */
export interface PluginLoadReport {
  loaded: string[];
  skipped: string[];
}

export class PluginRegistry {
  private readonly packages = new Map<string, PackageFactory>();
  private readonly auxiliaries = new Map<string, AuxiliaryFactory>();
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child("[registry]");
  }

  /**
   * Register an analysis package. Names must be unique.
   */
  registerPackage(name: string, factory: PackageFactory): this {
    if (this.packages.has(name)) {
      throw new PluginAmbiguousError(`Package "${name}" is already registered`, { kind: "package", name });
    }
    this.packages.set(name, factory);
    return this;
  }

  /**
   * Register an auxiliary module. Names must be unique.
   */
  registerAuxiliary(name: string, factory: AuxiliaryFactory): this {
    if (this.auxiliaries.has(name)) {
      throw new PluginAmbiguousError(`Auxiliary module "${name}" is already registered`, { kind: "auxiliary", name });
    }
    this.auxiliaries.set(name, factory);
    return this;
  }

  hasPackage(name: string): boolean {
    return this.packages.has(name);
  }

  packageNames(): string[] {
    return [...this.packages.keys()];
  }

  auxiliaryNames(): string[] {
    return [...this.auxiliaries.keys()];
  }

  /**
   * Look up the factory registered under `name`
   */
  resolvePackage(name: string): PackageFactory {
    const factory = this.packages.get(name);
    if (factory === undefined) {
      throw new PluginNotFoundError("package", name);
    }
    return factory;
  }

  /**
   * Resolve and construct a package.
   * Construction errors propagate; an instance exposing none of the package
   * callbacks is rejected as not eligible.
   */
  createPackage(name: string, options: OptionsMap): AnalysisPackage {
    const factory = this.resolvePackage(name);
    const instance = factory(options);

    const eligible = PACKAGE_CALLBACKS.some((callback) => implementsCallback(instance, callback));
    if (!eligible) {
      throw new PluginAmbiguousError(
        `Package "${name}" yielded no eligible implementation (expected one of ${PACKAGE_CALLBACKS.join(", ")})`,
        { kind: "package", name }
      );
    }

    return instance;
  }

  /**
   * Construct every registered auxiliary module, in registration order.
   * A module that fails to construct is skipped.
   */
  createAuxiliaries(): NamedAuxiliary[] {
    const modules: NamedAuxiliary[] = [];

    for (const [name, factory] of this.auxiliaries) {
      const created = tryCatch(factory);
      if (created.success) {
        modules.push({ name, module: created.data });
      } else {
        this.log.warn(`Unable to load the auxiliary module "${name}": ${created.error.message}`);
      }
    }

    return modules;
  }

  /**
   * Import every plugin module in `directory` and let it register itself.
   * Modules that fail to import or register are skipped.
   */
  async loadPlugins(directory: string): Promise<PluginLoadReport> {
    const report: PluginLoadReport = { loaded: [], skipped: [] };

    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.log.warn(`Plugin directory ${directory} is not readable: ${errorMessage(error)}`);
      return report;
    }

    const files = entries
      .filter((entry) => entry.isFile() && PLUGIN_EXTENSIONS.has(extname(entry.name)))
      .map((entry) => entry.name)
      .sort();

    for (const file of files) {
      const path = join(directory, file);
      try {
        const loaded: unknown = await import(pathToFileURL(path).href);
        if (!isPluginModule(loaded)) {
          this.log.warn(`Plugin module ${file} does not export a register function`);
          report.skipped.push(file);
          continue;
        }
        await loaded.register(this);
        this.log.debug(`Loaded plugin module ${file}`);
        report.loaded.push(file);
      } catch (error) {
        this.log.warn(`Unable to import the plugin module "${file}": ${errorMessage(error)}`);
        report.skipped.push(file);
      }
    }

    return report;
  }
}

function isPluginModule(value: unknown): value is PluginModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "register" in value &&
    typeof value.register === "function"
  );
}

/**
 * Create an empty registry
 */
export function createPluginRegistry(log?: Logger): PluginRegistry {
  return new PluginRegistry(log);
}
