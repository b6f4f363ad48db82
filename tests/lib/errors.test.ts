import { describe, it, expect } from "vitest";
import {
  AnalyzerError,
  ConfigError,
  PluginNotFoundError,
  PluginAmbiguousError,
  PackageError,
  AnalysisAbortedError,
  ReportError,
  errorMessage,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("AnalyzerError", () => {
    it("should create a basic error", () => {
      const error = new AnalyzerError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("AnalyzerError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AnalyzerError);
    });

    it("should include context when provided", () => {
      const context = { key: "value" };
      const error = new AnalyzerError("Test message", "TEST_CODE", context);
      expect(error.context).toBe(context);
    });

    it("should have proper stack trace", () => {
      const error = new AnalyzerError("Test message", "TEST_CODE");
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new AnalyzerError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "AnalyzerError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ConfigError", () => {
    it("should create a config error", () => {
      const error = new ConfigError("Invalid config");
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error).toBeInstanceOf(AnalyzerError);
    });

    it("should include context when provided", () => {
      const error = new ConfigError("Missing config", { path: "analysis.yaml" });
      expect(error.context).toEqual({ path: "analysis.yaml" });
    });
  });

  describe("PluginNotFoundError", () => {
    it("names the missing plugin", () => {
      const error = new PluginNotFoundError("package", "does_not_exist");
      expect(error.message).toBe('No package registered under "does_not_exist"');
      expect(error.code).toBe("PLUGIN_NOT_FOUND");
      expect(error.pluginName).toBe("does_not_exist");
      expect(error.kind).toBe("package");
      expect(error.context).toEqual({ kind: "package", pluginName: "does_not_exist" });
    });
  });

  describe("PluginAmbiguousError", () => {
    it("should create an ambiguity error", () => {
      const error = new PluginAmbiguousError("twice");
      expect(error.name).toBe("PluginAmbiguousError");
      expect(error.code).toBe("PLUGIN_AMBIGUOUS");
    });
  });

  describe("PackageError", () => {
    it("is distinguishable from other analyzer errors", () => {
      const error = new PackageError("target missing");
      expect(error).toBeInstanceOf(PackageError);
      expect(error).toBeInstanceOf(AnalyzerError);
      expect(error.code).toBe("PACKAGE_ERROR");
      expect(new AnalysisAbortedError("x")).not.toBeInstanceOf(PackageError);
    });
  });

  describe("AnalysisAbortedError and ReportError", () => {
    it("carry their codes", () => {
      expect(new AnalysisAbortedError("stop").code).toBe("ANALYSIS_ABORTED");
      expect(new ReportError("unreachable").code).toBe("REPORT_ERROR");
      expect(new ReportError("unreachable").name).toBe("ReportError");
    });
  });

  describe("errorMessage", () => {
    it("uses the message of errors", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    it("stringifies other thrown values", () => {
      expect(errorMessage("plain")).toBe("plain");
      expect(errorMessage(42)).toBe("42");
      expect(errorMessage(undefined)).toBe("undefined");
    });
  });
});
