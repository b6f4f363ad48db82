import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_REPORT_FAILED,
  EXIT_SUCCESS,
  LOG_FILE,
  createRunGuards,
  executeRun,
  installRunGuards,
  prepareRun,
} from "@/cli/commands/run.js";
import { INTERRUPTED_MESSAGE } from "@/core/analyzer.js";
import type { CompletionTransport } from "@/core/reporter.js";
import type { OutcomeRecord } from "@/core/types.js";
import { logger } from "@/lib/logger.js";

describe("run command", () => {
  let workDir: string;
  let resultsDir: string;
  let stagingDir: string;
  let configPath: string;
  let delivered: OutcomeRecord[];
  let transport: CompletionTransport;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "analyzer-cli-"));
    resultsDir = join(workDir, "results");
    stagingDir = join(workDir, "staging");
    configPath = join(workDir, "analysis.yaml");
    await mkdir(stagingDir);

    delivered = [];
    transport = {
      complete: async (outcome) => {
        delivered.push(outcome);
      },
    };
    env = {
      ANALYZER_CONFIG: configPath,
      ANALYZER_RESULTS_DIR: resultsDir,
      ANALYZER_STAGING_DIR: stagingDir,
      ANALYZER_LOG_LEVEL: "silent",
    };

    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    delete process.env.ANALYZER_TEST_GUARDS;
    logger.configure({ file: null, level: "info" });
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  it("registers the built-in plugins", async () => {
    const { registry, settings } = prepareRun({}, { env, transport });

    expect(settings.configPath).toBe(configPath);
    expect(registry.packageNames()).toContain("shell");
    expect(registry.auxiliaryNames()).toEqual(["logcat", "process_list"]);
  });

  it("runs a staged script and reports success", async () => {
    await writeFile(join(stagingDir, "sample.sh"), "exit 0\n");
    await writeFile(
      configPath,
      ["category: file", "target: /upload/3f2a", "file_name: sample.sh", "package: shell", "timeout: 2", ""].join("\n")
    );

    const exitCode = await executeRun({}, { env, transport, sleep: async () => undefined });

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(delivered).toEqual([{ success: true, errorMessage: "", resultsPath: resultsDir }]);
  });

  it("reports an unknown package and exits with failure", async () => {
    await writeFile(configPath, "category: file\ntarget: sample.bin\npackage: does_not_exist\ntimeout: 2\n");

    const exitCode = await executeRun({ logLevel: "warn" }, { env, transport });

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(delivered).toHaveLength(1);
    expect(delivered[0]?.errorMessage).toBe(
      'Unable to select package "does_not_exist": No package registered under "does_not_exist"'
    );

    const log = await readFile(join(resultsDir, LOG_FILE), "utf-8");
    expect(log).toContain('[ERROR] Unable to select package "does_not_exist"');
  });

  it("reports a missing configuration file", async () => {
    const exitCode = await executeRun({}, { env, transport });

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(delivered[0]?.errorMessage).toContain(`Unable to read analysis configuration ${configPath}`);
  });

  it("still reports when the settings are invalid", async () => {
    const exitCode = await executeRun(
      { results: "/results" },
      { env: { ...env, ANALYZER_LOG_LEVEL: "loud" }, transport }
    );

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(delivered).toHaveLength(1);
    expect(delivered[0]?.resultsPath).toBe("/results");
    expect(delivered[0]?.errorMessage).toContain("Invalid analyzer settings: logLevel:");
  });

  it("exits with a distinct code when the host cannot be reached", async () => {
    await writeFile(configPath, "category: file\ntarget: sample.bin\npackage: does_not_exist\ntimeout: 2\n");
    const unreachable: CompletionTransport = {
      complete: async () => {
        throw new Error("connection refused");
      },
    };

    await expect(executeRun({}, { env, transport: unreachable })).resolves.toBe(EXIT_REPORT_FAILED);
  });

  it("loads plugins with the run guards already installed", async () => {
    const pluginsDir = join(workDir, "plugins");
    await mkdir(pluginsDir);
    await writeFile(
      join(pluginsDir, "guards.mjs"),
      [
        "export function register() {",
        '  process.env.ANALYZER_TEST_GUARDS = String(process.listenerCount("uncaughtException"));',
        "}",
        "",
      ].join("\n")
    );
    const before = process.listenerCount("uncaughtException");

    await executeRun({ plugins: pluginsDir }, { env, transport });

    expect(process.env.ANALYZER_TEST_GUARDS).toBe(String(before + 1));
    expect(process.listenerCount("uncaughtException")).toBe(before);
  });

  describe("run guards", () => {
    function prepared() {
      return prepareRun({}, { env, transport });
    }

    it("reports an interruption and exits with the interrupted code", async () => {
      const exit = vi.fn();
      const { analyzer, settings } = prepared();

      createRunGuards(analyzer, exit).onSignal();

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(EXIT_INTERRUPTED));
      expect(delivered).toEqual([
        { success: false, errorMessage: INTERRUPTED_MESSAGE, resultsPath: settings.resultsDir },
      ]);
    });

    it("reports an uncaught fault and exits with failure", async () => {
      const exit = vi.fn();
      const { analyzer } = prepared();

      createRunGuards(analyzer, exit).onFault(new Error("EISDIR: illegal operation on a directory, write"));

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(EXIT_FAILURE));
      expect(delivered).toEqual([
        {
          success: false,
          errorMessage: "EISDIR: illegal operation on a directory, write",
          resultsPath: resultsDir,
        },
      ]);
    });

    it("exits with the delivery code when the fault cannot be reported", async () => {
      const exit = vi.fn();
      transport = {
        complete: async () => {
          throw new Error("connection refused");
        },
      };
      const { analyzer } = prepared();

      createRunGuards(analyzer, exit).onFault("stray rejection");

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(EXIT_REPORT_FAILED));
    });

    it("installs and removes the process listeners", () => {
      const events = ["SIGINT", "SIGTERM", "uncaughtException", "unhandledRejection"] as const;
      const before = events.map((event) => process.listenerCount(event));

      const remove = installRunGuards(prepared().analyzer, vi.fn());
      expect(events.map((event) => process.listenerCount(event))).toEqual(before.map((count) => count + 1));

      remove();
      expect(events.map((event) => process.listenerCount(event))).toEqual(before);
    });
  });
});
