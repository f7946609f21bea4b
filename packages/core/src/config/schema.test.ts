import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import { DEFAULT_ENGINE_CONFIG } from "./constants";
import { loadEngineConfigFromEnv, resolveEngineConfig } from "./schema";

describe("resolveEngineConfig", () => {
  it("returns a copy of the defaults without updates", () => {
    const config = resolveEngineConfig();
    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(config).not.toBe(DEFAULT_ENGINE_CONFIG);
  });

  it("merges updates over a base", () => {
    const base = resolveEngineConfig({ masteryThreshold: 1 });
    expect(resolveEngineConfig({ shortlistSize: 4 }, base)).toMatchObject({
      masteryThreshold: 1,
      shortlistSize: 4,
      quadraturePoints: 41
    });
  });

  it("reports every invalid field", () => {
    try {
      resolveEngineConfig({ priorStd: 0, rankingRetries: 3 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: "configuration",
        issues: [
          "priorStd: Number must be greater than 0",
          "rankingRetries: Number must be less than or equal to 1"
        ]
      });
    }
  });

  it("rejects an empty ability range", () => {
    expect(() => resolveEngineConfig({ thetaMin: 2, thetaMax: 2 })).toThrow(
      "Invalid engine configuration: thetaMin: thetaMin must be lower than thetaMax"
    );
  });
});

describe("loadEngineConfigFromEnv", () => {
  it("reads numeric overrides and ignores blanks", () => {
    const config = loadEngineConfigFromEnv({
      PRACTICE_MASTERY_THRESHOLD: " 0.8 ",
      PRACTICE_SHORTLIST_SIZE: "",
      PRACTICE_RANKING_TIMEOUT_MS: "2000"
    });
    expect(config.masteryThreshold).toBe(0.8);
    expect(config.shortlistSize).toBe(10);
    expect(config.rankingTimeoutMs).toBe(2000);
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadEngineConfigFromEnv({ PRACTICE_PRIOR_STD: "wide" })).toThrow(
      'Invalid engine environment: PRACTICE_PRIOR_STD: "wide" is not a number'
    );
  });

  it("validates the merged result", () => {
    expect(() => loadEngineConfigFromEnv({ PRACTICE_QUADRATURE_POINTS: "1.5" })).toThrow(
      ConfigurationError
    );
  });
});
