/**
 * Hybrid Score Combiner
 *
 * Folds the four sub-scores into one composite:
 *   weighted sum → cross-domain bonus → clamp to [0, 1]
 *
 * The missing-skill penalty is applied upstream to the technical-skill
 * sub-score and the semantic boost to the semantic sub-score; both arrive here
 * as adjustments tagged with their stage so the breakdown stays complete
 * without counting them twice.
 */

import type {
  ChunkSimilarity,
  ComponentWeights,
  MatchCategory,
  ScoreAdjustment,
  ScoreBreakdown,
  SkillSummary,
  SubScores,
} from "../../shared/schema";
import type { ScoringConfig } from "../config/scoring-config";
import { logger } from "./logger";
import { clamp01 } from "./score-utils";

export type CombineOptions = Pick<
  ScoringConfig,
  | "componentWeights"
  | "crossDomainSemanticThreshold"
  | "crossDomainKeywordThreshold"
  | "crossDomainBonus"
>;

export interface CombineContext {
  readonly skills?: SkillSummary;
  readonly topMatches?: readonly ChunkSimilarity[];
  /** Adjustments already folded into a sub-score upstream */
  readonly adjustments?: readonly ScoreAdjustment[];
}

// ===== MATCH CATEGORIES =====

export const MATCH_CATEGORY_THRESHOLDS = {
  /** Strong candidate, interview */
  EXCELLENT: 0.75,
  /** Solid candidate, review */
  GOOD: 0.6,
  /** Gaps exist */
  MODERATE: 0.45,
} as const;

const RECOMMENDATIONS: Readonly<Record<MatchCategory, string>> = {
  excellent: "Strong candidate - Recommend immediate interview",
  good: "Solid candidate - Review in detail",
  moderate: "Some gaps exist - Consider with reservations",
  low: "Significant gaps - May not be suitable",
};

const EMPTY_SKILLS: SkillSummary = Object.freeze({
  matched: [],
  missingRequired: [],
  missingPreferred: [],
});

// ===== COMBINATION =====

function clampSubScores(subScores: SubScores): SubScores {
  return {
    technicalSkill: clamp01(subScores.technicalSkill),
    semantic: clamp01(subScores.semantic),
    experience: clamp01(subScores.experience),
    education: clamp01(subScores.education),
  };
}

export function computeWeightedSum(subScores: SubScores, weights: ComponentWeights): number {
  return (
    weights.technicalSkill * subScores.technicalSkill +
    weights.semantic * subScores.semantic +
    weights.experience * subScores.experience +
    weights.education * subScores.education
  );
}

/**
 * A candidate whose text reads like the role but shares few of its listed
 * skills often comes from an adjacent field.
 */
export function crossDomainAdjustment(
  subScores: SubScores,
  options: Pick<CombineOptions, "crossDomainSemanticThreshold" | "crossDomainKeywordThreshold" | "crossDomainBonus">,
): ScoreAdjustment | null {
  if (
    subScores.semantic > options.crossDomainSemanticThreshold &&
    subScores.technicalSkill < options.crossDomainKeywordThreshold
  ) {
    return {
      reason: "cross_domain_bonus",
      stage: "composite",
      delta: options.crossDomainBonus,
      description: `Semantic score ${subScores.semantic.toFixed(3)} above ${options.crossDomainSemanticThreshold} with technical skill score ${subScores.technicalSkill.toFixed(3)} below ${options.crossDomainKeywordThreshold}`,
    };
  }
  return null;
}

function sumCompositeDeltas(adjustments: readonly ScoreAdjustment[]): number {
  return adjustments
    .filter((adjustment) => adjustment.stage === "composite")
    .reduce((sum, adjustment) => sum + adjustment.delta, 0);
}

export function combineScores(
  subScores: SubScores,
  options: CombineOptions,
  context: CombineContext = {},
): ScoreBreakdown {
  const clamped = clampSubScores(subScores);
  const weights = options.componentWeights;
  const weightedSum = computeWeightedSum(clamped, weights);

  const adjustments: ScoreAdjustment[] = [...(context.adjustments ?? [])];
  const bonus = crossDomainAdjustment(clamped, options);
  if (bonus) {
    adjustments.push(bonus);
  }

  const compositeScore = clamp01(weightedSum + sumCompositeDeltas(adjustments));

  logger.debug(
    { subScores: clamped, weightedSum, crossDomainBonus: bonus !== null, compositeScore },
    "Composite score computed",
  );

  return {
    subScores: clamped,
    weights: { ...weights },
    weightedSum,
    adjustments,
    skills: context.skills ?? EMPTY_SKILLS,
    topMatches: context.topMatches ?? [],
    compositeScore,
  };
}

/**
 * Rebuilds the composite from the breakdown alone
 */
export function recomputeCompositeScore(breakdown: Pick<ScoreBreakdown, "subScores" | "weights" | "adjustments">): number {
  const weightedSum = computeWeightedSum(breakdown.subScores, breakdown.weights);
  return clamp01(weightedSum + sumCompositeDeltas(breakdown.adjustments));
}

export function classifyMatch(score: number): { category: MatchCategory; recommendation: string } {
  const category: MatchCategory =
    score >= MATCH_CATEGORY_THRESHOLDS.EXCELLENT
      ? "excellent"
      : score >= MATCH_CATEGORY_THRESHOLDS.GOOD
        ? "good"
        : score >= MATCH_CATEGORY_THRESHOLDS.MODERATE
          ? "moderate"
          : "low";
  return { category, recommendation: RECOMMENDATIONS[category] };
}
