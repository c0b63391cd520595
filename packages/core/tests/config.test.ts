import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfigFromEnv,
  loadLoggingConfig,
  resolveEngineConfig
} from "../src/index";

describe("resolveEngineConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(resolveEngineConfig()).toEqual({
      weights: { technical: 0.4, experience: 0.25, project: 0.2, tool: 0.15 },
      strengthThreshold: 70,
      weaknessThreshold: 50,
      recommendationCount: 5,
      experienceCeilingYears: 2,
      projectCeilingCount: 3
    });
  });

  it("merges partial weights over the base", () => {
    const config = resolveEngineConfig({ weights: { tool: 0.5 }, recommendationCount: 3 });

    expect(config.weights).toEqual({ technical: 0.4, experience: 0.25, project: 0.2, tool: 0.5 });
    expect(config.recommendationCount).toBe(3);
    expect(DEFAULT_ENGINE_CONFIG.weights.tool).toBe(0.15);
  });

  it("accepts zero weights and leaves them to the scoring engine", () => {
    const config = resolveEngineConfig({
      weights: { technical: 0, experience: 0, project: 0, tool: 0 }
    });

    expect(config.weights.technical).toBe(0);
  });

  it("rejects out-of-range values with the failing field", () => {
    try {
      resolveEngineConfig({ strengthThreshold: 120 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        issues: [expect.stringMatching(/^strengthThreshold:/)]
      });
    }

    expect(() => resolveEngineConfig({ recommendationCount: 1.5 })).toThrow(ConfigError);
    expect(() => resolveEngineConfig({ experienceCeilingYears: 0 })).toThrow(ConfigError);
  });

  it("requires the weakness threshold to stay below the strength threshold", () => {
    expect(() => resolveEngineConfig({ weaknessThreshold: 80 })).toThrow(
      "weaknessThreshold must not exceed strengthThreshold"
    );
  });
});

describe("loadEngineConfigFromEnv", () => {
  it("reads prefixed variables and ignores blanks", () => {
    expect(
      loadEngineConfigFromEnv({
        SKILL_READINESS_WEIGHT_TOOL: "0.5",
        SKILL_READINESS_RECOMMENDATION_COUNT: "3",
        SKILL_READINESS_STRENGTH_THRESHOLD: "  ",
        UNRELATED: "value"
      })
    ).toEqual({ weights: { tool: 0.5 }, recommendationCount: 3 });
    expect(loadEngineConfigFromEnv({})).toEqual({});
  });

  it("rejects non-numeric values", () => {
    expect(() => loadEngineConfigFromEnv({ SKILL_READINESS_WEIGHT_TECHNICAL: "heavy" })).toThrow(
      ConfigError
    );
  });
});

describe("loadLoggingConfig", () => {
  it("defaults to info and silences test runs", () => {
    expect(loadLoggingConfig({})).toEqual({ level: "info", silent: false });
    expect(loadLoggingConfig({ NODE_ENV: "test", SKILL_READINESS_LOG_LEVEL: "debug" })).toEqual({
      level: "debug",
      silent: true
    });
  });

  it("rejects unknown levels", () => {
    expect(() => loadLoggingConfig({ SKILL_READINESS_LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
