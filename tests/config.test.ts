import { describe, it, expect } from "vitest";
import { loadSpcConfig, parseLogLevel } from "../src/shared/config.js";
import { SpcError } from "../src/shared/errors.js";

describe("parseLogLevel", () => {
  it("prefers the CLI argument over the environment", () => {
    expect(parseLogLevel("debug", "info")).toBe("debug");
    expect(parseLogLevel(undefined, "INFO")).toBe("info");
  });

  it("falls back to silent", () => {
    expect(parseLogLevel()).toBe("silent");
    expect(parseLogLevel("verbose")).toBe("silent");
  });
});

describe("loadSpcConfig", () => {
  it("uses built-in defaults with an empty environment", () => {
    expect(loadSpcConfig({}, {})).toEqual({
      groupCountLimit: undefined,
      sigmaMultiple: 3,
      rounding: undefined,
      logLevel: "silent",
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadSpcConfig(
      {},
      {
        SPC_GROUP_COUNT_LIMIT: "50",
        SPC_SIGMA_MULTIPLE: "2.5",
        SPC_ROUNDING_SCALE: "3",
        SPC_ROUNDING_MODE: "half-even",
        SPC_LOG_LEVEL: "debug",
      },
    );
    expect(config).toEqual({
      groupCountLimit: 50,
      sigmaMultiple: 2.5,
      rounding: { scale: 3, mode: "HALF_EVEN" },
      logLevel: "debug",
    });
  });

  it("defaults the rounding mode to HALF_UP", () => {
    expect(loadSpcConfig({}, { SPC_ROUNDING_SCALE: "2" }).rounding).toEqual({ scale: 2, mode: "HALF_UP" });
  });

  it("treats 'none' as an unbounded history", () => {
    expect(loadSpcConfig({}, { SPC_GROUP_COUNT_LIMIT: "none" }).groupCountLimit).toBeUndefined();
  });

  it("lets explicit overrides win, including an explicit undefined", () => {
    const env = { SPC_GROUP_COUNT_LIMIT: "50", SPC_ROUNDING_SCALE: "2", SPC_SIGMA_MULTIPLE: "2" };
    const config = loadSpcConfig({ groupCountLimit: 10, rounding: undefined, sigmaMultiple: 3, logLevel: "info" }, env);
    expect(config.groupCountLimit).toBe(10);
    expect(config.rounding).toBeUndefined();
    expect(config.sigmaMultiple).toBe(3);
    expect(config.logLevel).toBe("info");
  });

  it("rejects malformed values with INVALID_CONFIGURATION", () => {
    const bad = [
      { SPC_GROUP_COUNT_LIMIT: "lots" },
      { SPC_GROUP_COUNT_LIMIT: "0" },
      { SPC_GROUP_COUNT_LIMIT: "2.5" },
      { SPC_SIGMA_MULTIPLE: "-1" },
      { SPC_ROUNDING_SCALE: "2", SPC_ROUNDING_MODE: "bankers" },
      { SPC_ROUNDING_SCALE: "-2" },
    ];
    for (const env of bad) {
      let caught: unknown;
      try {
        loadSpcConfig({}, env);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(SpcError);
      expect(caught instanceof SpcError && caught.code).toBe("INVALID_CONFIGURATION");
    }
  });
});
