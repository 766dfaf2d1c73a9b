/**
 * Scoring Configuration
 *
 * Single source of truth for every calibration constant used by the matching
 * engine. The constants are empirical: the semantic boost compensates for raw
 * cosine similarity sitting low relative to human judgement, the weights and
 * thresholds were tuned on reviewed resume/role pairs.
 *
 * Configuration is always passed explicitly into the engine; nothing here is
 * read from module state at scoring time.
 */

import { z } from "zod";
import { AppConfigError } from "../../shared/errors";
import type { ComponentWeights, ScoringConfigOverrides } from "../../shared/schema";

export interface ScoringConfig {
  /** Words per chunk window */
  readonly chunkWindowWords: number;
  /** Words shared by consecutive chunk windows */
  readonly chunkOverlapWords: number;
  /** Multiplier applied to raw cosine similarity before clamping */
  readonly semanticBoostFactor: number;
  readonly componentWeights: ComponentWeights;
  /** Missing required skills needed to trigger the keyword penalty */
  readonly missingSkillPenaltyThreshold: number;
  readonly missingSkillPenaltyAmount: number;
  readonly crossDomainSemanticThreshold: number;
  readonly crossDomainKeywordThreshold: number;
  readonly crossDomainBonus: number;
  readonly requiredSkillWeight: number;
  readonly preferredSkillWeight: number;
  /** Best candidate chunks averaged into the raw semantic signal */
  readonly semanticTopK: number;
  /** Chunks reported in the breakdown for explanation */
  readonly topMatchCount: number;
  readonly experienceMaxShortfallYears: number;
  /** Education credit when the candidate is one tier below the requirement */
  readonly educationOneTierCredit: number;
  /** Year used for open-ended date ranges ("2019 - present"); current UTC year when omitted */
  readonly referenceYear?: number;
}

// ===== DEFAULTS =====

export const DEFAULT_COMPONENT_WEIGHTS: ComponentWeights = Object.freeze({
  technicalSkill: 0.40,
  semantic: 0.30,
  experience: 0.20,
  education: 0.10,
});

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
  chunkWindowWords: 200,
  chunkOverlapWords: 75,
  semanticBoostFactor: 1.8,
  componentWeights: DEFAULT_COMPONENT_WEIGHTS,
  missingSkillPenaltyThreshold: 3,
  missingSkillPenaltyAmount: 0.15,
  crossDomainSemanticThreshold: 0.4,
  crossDomainKeywordThreshold: 0.5,
  crossDomainBonus: 0.05,
  requiredSkillWeight: 0.8,
  preferredSkillWeight: 0.2,
  semanticTopK: 1,
  topMatchCount: 5,
  experienceMaxShortfallYears: 5,
  educationOneTierCredit: 0.5,
});

const WEIGHT_SUM_TOLERANCE = 1e-6;

// ===== SCHEMA =====

const unitInterval = z.number().min(0).max(1);

const componentWeightsSchema = z.object({
  technicalSkill: unitInterval,
  semantic: unitInterval,
  experience: unitInterval,
  education: unitInterval,
});

const scoringConfigSchema = z.object({
  chunkWindowWords: z.number().int().min(1).default(DEFAULT_SCORING_CONFIG.chunkWindowWords),
  chunkOverlapWords: z.number().int().min(0).default(DEFAULT_SCORING_CONFIG.chunkOverlapWords),
  semanticBoostFactor: z.number().positive().default(DEFAULT_SCORING_CONFIG.semanticBoostFactor),
  componentWeights: componentWeightsSchema.default(DEFAULT_COMPONENT_WEIGHTS),
  missingSkillPenaltyThreshold: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_SCORING_CONFIG.missingSkillPenaltyThreshold),
  missingSkillPenaltyAmount: unitInterval.default(DEFAULT_SCORING_CONFIG.missingSkillPenaltyAmount),
  crossDomainSemanticThreshold: z
    .number()
    .min(0)
    .default(DEFAULT_SCORING_CONFIG.crossDomainSemanticThreshold),
  // A threshold above 1 makes the bonus independent of keyword overlap.
  crossDomainKeywordThreshold: z
    .number()
    .min(0)
    .default(DEFAULT_SCORING_CONFIG.crossDomainKeywordThreshold),
  crossDomainBonus: unitInterval.default(DEFAULT_SCORING_CONFIG.crossDomainBonus),
  requiredSkillWeight: unitInterval.default(DEFAULT_SCORING_CONFIG.requiredSkillWeight),
  preferredSkillWeight: unitInterval.default(DEFAULT_SCORING_CONFIG.preferredSkillWeight),
  semanticTopK: z.number().int().min(1).default(DEFAULT_SCORING_CONFIG.semanticTopK),
  topMatchCount: z.number().int().min(0).default(DEFAULT_SCORING_CONFIG.topMatchCount),
  experienceMaxShortfallYears: z
    .number()
    .positive()
    .default(DEFAULT_SCORING_CONFIG.experienceMaxShortfallYears),
  educationOneTierCredit: unitInterval.default(DEFAULT_SCORING_CONFIG.educationOneTierCredit),
  referenceYear: z.number().int().min(1900).max(2200).optional(),
});

// ===== VALIDATION =====

export function sumWeights(weights: ComponentWeights): number {
  return weights.technicalSkill + weights.semantic + weights.experience + weights.education;
}

/**
 * Throws when the component weights do not sum to 1.0
 */
export function validateComponentWeights(weights: ComponentWeights): void {
  const sum = sumWeights(weights);
  if (Math.abs(sum - 1.0) > WEIGHT_SUM_TOLERANCE) {
    throw AppConfigError.weightsDoNotSumToOne(sum);
  }
}

/**
 * Throws when chunk windows could not advance through the text
 */
export function validateChunking(windowSizeWords: number, overlapWords: number): void {
  if (!Number.isInteger(windowSizeWords) || windowSizeWords < 1) {
    throw AppConfigError.invalidSetting("chunkWindowWords", "must be a positive integer");
  }
  if (!Number.isInteger(overlapWords) || overlapWords < 0) {
    throw AppConfigError.invalidSetting("chunkOverlapWords", "must be a non-negative integer");
  }
  if (overlapWords >= windowSizeWords) {
    throw AppConfigError.overlapNotBelowWindow(windowSizeWords, overlapWords);
  }
}

/**
 * Merges overrides onto the defaults and validates the result.
 * Every structural problem surfaces as an AppConfigError.
 */
export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  const parsed = scoringConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const [first] = parsed.error.errors;
    const setting = first ? first.path.join(".") : "scoringConfig";
    throw new AppConfigError(
      `Invalid setting '${setting}': ${first ? first.message : "invalid value"}`,
      setting,
      {
        issues: parsed.error.errors.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      },
    );
  }

  const config = parsed.data;
  validateComponentWeights(config.componentWeights);
  validateChunking(config.chunkWindowWords, config.chunkOverlapWords);

  const keywordWeightSum = config.requiredSkillWeight + config.preferredSkillWeight;
  if (Math.abs(keywordWeightSum - 1.0) > WEIGHT_SUM_TOLERANCE) {
    throw AppConfigError.invalidSetting(
      "requiredSkillWeight",
      `required and preferred skill weights must sum to 1.0, got ${keywordWeightSum}`,
    );
  }

  return Object.freeze({
    ...config,
    componentWeights: Object.freeze({ ...config.componentWeights }),
  });
}

/**
 * Year used for open-ended date ranges
 */
export function getReferenceYear(config: Pick<ScoringConfig, "referenceYear">): number {
  return config.referenceYear ?? new Date().getUTCFullYear();
}
