import { describe, it, expect } from "vitest";
import { loadConfig, parseIntStrict, resolveEncodeOptions } from "../src/config.js";
import { InvalidOptionsError } from "../src/errors.js";

describe("resolveEncodeOptions", () => {
  it("fills in defaults", () => {
    expect(resolveEncodeOptions()).toEqual({ lineMax: 10, totalMax: 30, maxAttempts: 100 });
  });

  it("keeps explicit values", () => {
    expect(resolveEncodeOptions({ lineMax: 4, totalMax: 8, maxAttempts: 0 })).toEqual({
      lineMax: 4,
      totalMax: 8,
      maxAttempts: 0,
    });
  });

  it("rejects a zero line width", () => {
    expect(() => resolveEncodeOptions({ lineMax: 0 })).toThrow(
      "lineMax must be an integer >= 1, got 0"
    );
  });

  it("rejects fractional capacity", () => {
    expect(() => resolveEncodeOptions({ totalMax: 7.5 })).toThrow(InvalidOptionsError);
  });
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      lineMax: 10,
      totalMax: 30,
      maxAttempts: 100,
      logLevel: "warn",
    });
  });

  it("reads sizes and log level from the environment", () => {
    expect(
      loadConfig({
        TOKENGRID_LINE_MAX: "6",
        TOKENGRID_TOTAL_MAX: "24",
        TOKENGRID_MAX_ATTEMPTS: "",
        TOKENGRID_LOG_LEVEL: "debug",
      })
    ).toEqual({ lineMax: 6, totalMax: 24, maxAttempts: 100, logLevel: "debug" });
  });

  it("rejects non-numeric sizes", () => {
    expect(() => loadConfig({ TOKENGRID_LINE_MAX: "six" })).toThrow(
      'TOKENGRID_LINE_MAX must be an integer, got "six"'
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ TOKENGRID_LOG_LEVEL: "loud" })).toThrow(InvalidOptionsError);
  });
});

describe("parseIntStrict", () => {
  it("parses whole numbers", () => {
    expect(parseIntStrict("--line-max", " 7 ")).toBe(7);
    expect(parseIntStrict("--line-max", "-2")).toBe(-2);
  });

  it("rejects anything else", () => {
    expect(() => parseIntStrict("--line-max", "3.5")).toThrow(InvalidOptionsError);
    expect(() => parseIntStrict("--line-max", "")).toThrow(InvalidOptionsError);
  });
});
