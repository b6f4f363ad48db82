import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, afterEach } from "vitest";

import { listPlugins } from "@/cli/commands/plugins.js";
import { stringOption, verbosityLevel } from "@/cli/commands/options.js";
import { createProgram } from "@/cli/program.js";
import { VERSION } from "@/core/index.js";

describe("createProgram", () => {
  it("registers the run and plugins commands", () => {
    const program = createProgram();

    expect(program.name()).toBe("guest-analyzer");
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(["run", "plugins"]);
  });

  it("exposes the run options", () => {
    const run = createProgram().commands.find((command) => command.name() === "run");
    const flags = run?.options.map((option) => option.long);

    expect(flags).toEqual([
      "--config",
      "--host",
      "--results",
      "--staging",
      "--plugins",
      "--poll-interval",
      "--verbose",
      "--quiet",
    ]);
  });
});

describe("option helpers", () => {
  it("reads non-empty strings only", () => {
    expect(stringOption({ host: "http://10.0.2.2:8000" }, "host")).toBe("http://10.0.2.2:8000");
    expect(stringOption({ host: "" }, "host")).toBeUndefined();
    expect(stringOption({ verbose: true }, "verbose")).toBeUndefined();
  });

  it("maps verbosity flags to log levels", () => {
    expect(verbosityLevel({ quiet: true, verbose: true })).toBe("error");
    expect(verbosityLevel({ verbose: true })).toBe("debug");
    expect(verbosityLevel({})).toBeUndefined();
  });
});

describe("listPlugins", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("lists the built-in plugins", async () => {
    await expect(listPlugins()).resolves.toEqual({
      packages: ["execute", "shell", "python", "default_browser"],
      auxiliaries: ["logcat", "process_list"],
    });
  });

  it("includes plugins from a directory", async () => {
    dir = await mkdtemp(join(tmpdir(), "analyzer-list-"));
    await writeFile(
      join(dir, "extra.mjs"),
      'export function register(registry) { registry.registerAuxiliary("screenshots", () => ({})); }\n'
    );

    const listing = await listPlugins(dir);

    expect(listing.auxiliaries).toEqual(["logcat", "process_list", "screenshots"]);
  });
});
