import { z } from "zod";

// ===== DOCUMENTS =====

export type DocumentRole = "candidate" | "target-role";

export interface MatchDocument {
  readonly text: string;
  readonly role: DocumentRole;
}

export interface Chunk {
  readonly text: string;
  /** Character offset of the first word of the chunk in the source text */
  readonly startOffset: number;
  /** Character offset one past the last word of the chunk */
  readonly endOffset: number;
}

// ===== SKILLS =====

export interface SkillSet {
  readonly required: readonly string[];
  readonly preferred: readonly string[];
}

export interface SkillPenalty {
  readonly missingRequiredCount: number;
  readonly threshold: number;
  /** Amount actually subtracted, at most the configured penalty */
  readonly applied: number;
}

export interface SkillMatchResult {
  readonly roleSkills: SkillSet;
  readonly candidateSkills: readonly string[];
  readonly matched: readonly string[];
  readonly missingRequired: readonly string[];
  readonly missingPreferred: readonly string[];
  /** Weighted required/preferred coverage before the missing-skill penalty */
  readonly rawKeywordScore: number;
  readonly keywordScore: number;
  readonly penalty: SkillPenalty | null;
}

// ===== SCORES =====

export interface SubScores {
  readonly technicalSkill: number;
  readonly semantic: number;
  readonly experience: number;
  readonly education: number;
}

export type ComponentWeights = SubScores;

export type AdjustmentStage = "semantic" | "technical_skill" | "composite";

export type AdjustmentReason =
  | "semantic_boost"
  | "missing_required_skills"
  | "cross_domain_bonus";

export interface ScoreAdjustment {
  readonly reason: AdjustmentReason;
  /**
   * Where the delta was applied. Only `composite` entries are added to the
   * weighted sum; the others are already part of the named sub-score.
   */
  readonly stage: AdjustmentStage;
  readonly delta: number;
  readonly description: string;
}

export interface ChunkSimilarity {
  readonly chunk: Chunk;
  readonly chunkIndex: number;
  /** Raw cosine similarity, before the boost */
  readonly similarity: number;
}

export interface SkillSummary {
  readonly matched: readonly string[];
  readonly missingRequired: readonly string[];
  readonly missingPreferred: readonly string[];
}

export interface ScoreBreakdown {
  readonly subScores: SubScores;
  readonly weights: ComponentWeights;
  readonly weightedSum: number;
  readonly adjustments: readonly ScoreAdjustment[];
  readonly skills: SkillSummary;
  readonly topMatches: readonly ChunkSimilarity[];
  readonly compositeScore: number;
}

export interface MatchResult {
  readonly breakdown: ScoreBreakdown;
  readonly compositeScore: number;
}

export type MatchCategory = "excellent" | "good" | "moderate" | "low";

// ===== API REQUEST SCHEMAS =====

const componentWeightsInputSchema = z
  .object({
    technicalSkill: z.number(),
    semantic: z.number(),
    experience: z.number(),
    education: z.number(),
  })
  .strict();

/**
 * Per-request scoring overrides. Range and invariant checks live in
 * `resolveScoringConfig`, which reports them as configuration errors.
 */
export const scoringConfigOverridesSchema = z
  .object({
    chunkWindowWords: z.number(),
    chunkOverlapWords: z.number(),
    semanticBoostFactor: z.number(),
    componentWeights: componentWeightsInputSchema,
    missingSkillPenaltyThreshold: z.number(),
    missingSkillPenaltyAmount: z.number(),
    crossDomainSemanticThreshold: z.number(),
    crossDomainKeywordThreshold: z.number(),
    crossDomainBonus: z.number(),
    requiredSkillWeight: z.number(),
    preferredSkillWeight: z.number(),
    semanticTopK: z.number(),
    topMatchCount: z.number(),
    experienceMaxShortfallYears: z.number(),
    educationOneTierCredit: z.number(),
    referenceYear: z.number(),
  })
  .strict()
  .partial();

export const matchRequestSchema = z.object({
  candidateText: z.string(),
  roleText: z.string(),
  config: scoringConfigOverridesSchema.optional(),
  explain: z.boolean().default(false),
});

export const rankRequestSchema = z.object({
  roleText: z.string(),
  candidates: z
    .array(
      z.object({
        id: z.string().min(1),
        text: z.string(),
      }),
    )
    .min(1, "At least one candidate is required")
    .max(50, "At most 50 candidates can be ranked per request"),
  config: scoringConfigOverridesSchema.optional(),
});

export type ScoringConfigOverrides = z.infer<typeof scoringConfigOverridesSchema>;
export type MatchRequest = z.infer<typeof matchRequestSchema>;
export type RankRequest = z.infer<typeof rankRequestSchema>;
