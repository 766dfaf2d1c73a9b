/**
 * Scoring Configuration Tests
 */

import { describe, it, expect } from "@jest/globals";
import {
  DEFAULT_SCORING_CONFIG,
  getReferenceYear,
  resolveScoringConfig,
  validateComponentWeights,
} from "../../../server/config/scoring-config";
import { AppConfigError } from "../../../shared/errors";

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the action to throw");
}

describe("resolveScoringConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    const config = resolveScoringConfig();

    expect(config).toEqual(DEFAULT_SCORING_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.componentWeights)).toBe(true);
  });

  it("applies overrides on top of the defaults", () => {
    const config = resolveScoringConfig({ semanticBoostFactor: 1.5, referenceYear: 2024 });

    expect(config.semanticBoostFactor).toBe(1.5);
    expect(config.referenceYear).toBe(2024);
    expect(config.chunkWindowWords).toBe(200);
  });

  it("rejects weights that do not sum to 1", () => {
    const error = captureError(() =>
      resolveScoringConfig({
        componentWeights: { technicalSkill: 0.4, semantic: 0.3, experience: 0.2, education: 0.05 },
      }),
    );

    expect(error).toBeInstanceOf(AppConfigError);
    expect(error).toMatchObject({ code: "CONFIG_ERROR", setting: "componentWeights", statusCode: 500 });
  });

  it("rejects an overlap that is not below the window", () => {
    expect(captureError(() => resolveScoringConfig({ chunkWindowWords: 50, chunkOverlapWords: 50 }))).toMatchObject({
      code: "CONFIG_ERROR",
      setting: "chunkOverlapWords",
    });
  });

  it("rejects out-of-range values with the offending setting", () => {
    expect(captureError(() => resolveScoringConfig({ semanticBoostFactor: -1 }))).toMatchObject({
      code: "CONFIG_ERROR",
      setting: "semanticBoostFactor",
    });
  });

  it("rejects keyword weights that do not sum to 1", () => {
    expect(() => resolveScoringConfig({ requiredSkillWeight: 0.7 })).toThrow(AppConfigError);
  });
});

describe("validateComponentWeights", () => {
  it("tolerates floating-point rounding", () => {
    expect(() =>
      validateComponentWeights({ technicalSkill: 0.1, semantic: 0.2, experience: 0.3, education: 0.4 }),
    ).not.toThrow();
  });
});

describe("getReferenceYear", () => {
  it("prefers the configured year", () => {
    expect(getReferenceYear({ referenceYear: 2020 })).toBe(2020);
    expect(getReferenceYear({})).toBe(new Date().getUTCFullYear());
  });
});
