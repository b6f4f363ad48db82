import { describe, it, expect, beforeEach, vi, type MockInstance } from "vitest";

import { parseOptions } from "@/core/options.js";
import { Logger } from "@/lib/logger.js";

describe("parseOptions", () => {
  let log: Logger;
  let warn: MockInstance<Logger["warn"]>;

  beforeEach(() => {
    log = new Logger();
    warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);
  });

  it("parses comma-separated pairs and trims whitespace", () => {
    expect(parseOptions("a=1, b = 2 ,bad", log)).toEqual({ a: "1", b: "2" });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Failed parsing option (bad): missing '='");
  });

  it("drops pairs with more than one '='", () => {
    expect(parseOptions("url=http://x/?a=b,free=yes", log)).toEqual({ free: "yes" });
    expect(warn).toHaveBeenCalledWith("Failed parsing option (url=http://x/?a=b): more than one '='");
  });

  it("returns an empty map for absent or blank input", () => {
    expect(parseOptions(undefined, log)).toEqual({});
    expect(parseOptions(null, log)).toEqual({});
    expect(parseOptions("   ", log)).toEqual({});
    expect(warn).not.toHaveBeenCalled();
  });

  it("keeps empty values", () => {
    expect(parseOptions("arguments=", log)).toEqual({ arguments: "" });
  });

  it("lets the last duplicate key win", () => {
    expect(parseOptions("a=1,a=2", log)).toEqual({ a: "2" });
  });

  it("warns about empty tokens from stray commas", () => {
    expect(parseOptions("a=1,", log)).toEqual({ a: "1" });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
