import { mkdir, mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { Logger } from "@/lib/logger.js";
import { CommandCapture, LogcatCapture, ProcessListSnapshot } from "@/plugins/index.js";

describe("auxiliary modules", () => {
  let resultsDir: string;

  beforeEach(async () => {
    resultsDir = await mkdtemp(join(tmpdir(), "analyzer-aux-"));
  });

  afterEach(async () => {
    await rm(resultsDir, { recursive: true, force: true });
  });

  describe("ProcessListSnapshot", () => {
    it("writes a snapshot on start and on stop", async () => {
      const snapshot = new ProcessListSnapshot(resultsDir, [process.execPath, "-e", "console.log('PID NAME')"]);

      await snapshot.start();
      await snapshot.stop();

      await expect(readFile(join(resultsDir, "logs", "ps_start.txt"), "utf-8")).resolves.toBe("PID NAME\n");
      await expect(readFile(join(resultsDir, "logs", "ps_stop.txt"), "utf-8")).resolves.toBe("PID NAME\n");
    });

    it("fails when the listing command fails", async () => {
      const snapshot = new ProcessListSnapshot(resultsDir, [process.execPath, "-e", "process.exit(3)"]);
      await expect(snapshot.start()).rejects.toThrow(`${process.execPath} exited with code 3`);
    });

    it("fails without a command", async () => {
      await expect(new ProcessListSnapshot(resultsDir, []).start()).rejects.toThrow(
        "No process listing command configured"
      );
    });
  });

  describe("CommandCapture", () => {
    it("streams command output into the results file until stopped", async () => {
      const outputPath = join(resultsDir, "logs", "capture.txt");
      const capture = new CommandCapture({
        command: process.execPath,
        args: ["-e", "console.log('first line'); setInterval(() => undefined, 1000);"],
        outputPath,
      });

      await capture.start();
      expect(capture.running).toBe(true);

      await vi.waitFor(
        async () => expect(await readFile(outputPath, "utf-8")).toBe("first line\n"),
        { timeout: 5000, interval: 20 }
      );

      await capture.stop();
      expect(capture.running).toBe(false);
    });

    it("logs an output file it cannot write instead of faulting", async () => {
      const outputPath = join(resultsDir, "logs", "logcat.txt");
      await mkdir(outputPath, { recursive: true });
      const log = new Logger();
      const warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);
      const capture = new CommandCapture({
        command: process.execPath,
        args: ["-e", "setInterval(() => console.log('tick'), 20);"],
        outputPath,
        logger: log,
      });

      await capture.start();
      await vi.waitFor(() => expect(warn).toHaveBeenCalled(), { timeout: 5000, interval: 20 });

      expect(warn.mock.calls[0]?.[0]).toContain(`Unable to write capture output ${outputPath}: EISDIR`);
      await capture.stop();
      expect(capture.running).toBe(false);
    });

    it("fails to start when the command does not exist", async () => {
      const outputPath = join(resultsDir, "logs", "missing.txt");
      const capture = new CommandCapture({ command: "/nonexistent/logger", args: [], outputPath });

      await expect(capture.start()).rejects.toThrow("ENOENT");
      expect(capture.running).toBe(false);
      await capture.stop();
    });
  });

  describe("LogcatCapture", () => {
    it("writes under the results logs directory", () => {
      expect(new LogcatCapture("/results").outputPath).toBe("/results/logs/logcat.txt");
    });
  });
});
