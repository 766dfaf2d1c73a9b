/**
 * Match Engine
 *
 * Entry points of the hybrid matcher. `scoreMatch` runs the whole pipeline for
 * one candidate/role pair:
 *
 * 1. resolve and validate the configuration
 * 2. validate both documents
 * 3. chunk both documents and embed every chunk with one provider call
 * 4. skill, semantic, experience and education sub-scores
 * 5. combine into a frozen result with its full breakdown
 *
 * Nothing here holds state between calls; the vocabulary, the providers and
 * the configuration are passed in.
 */

import type {
  ChunkSimilarity,
  DocumentRole,
  MatchCategory,
  MatchDocument,
  MatchResult,
  ScoreAdjustment,
  ScoreBreakdown,
  ScoringConfigOverrides,
  SkillMatchResult,
} from "../../shared/schema";
import { AppEmptyInputError, AppProviderError, AppValidationError } from "../../shared/errors";
import { fromPromise, isSuccess, type ProviderError } from "../../shared/result-types";
import { resolveScoringConfig, type ScoringConfig } from "../config/scoring-config";
import { chunkText } from "./chunker";
import { embedDocuments, type EmbeddingProvider } from "./embeddings";
import { scoreEducation } from "./education-matcher";
import { scoreExperience } from "./experience-matcher";
import { buildExplanationInput, type ExplanationProvider } from "./explanation";
import { classifyMatch, combineScores } from "./hybrid-scorer";
import { logger } from "./logger";
import { scoreSemanticSimilarity } from "./semantic-scorer";
import { matchSkills } from "./skill-processor";
import type { SkillVocabulary } from "./skill-vocabulary";

export interface MatchEngineDeps {
  readonly vocabulary: SkillVocabulary;
  readonly embeddingProvider: EmbeddingProvider;
}

export interface CandidateInput {
  readonly id: string;
  readonly text: string;
}

export interface RankedCandidate {
  readonly id: string;
  /** 1-based position in the ranking */
  readonly rank: number;
  readonly compositeScore: number;
  readonly category: MatchCategory;
  /** Opening of the candidate's best matching section */
  readonly matchReason: string;
  readonly result: MatchResult;
}

export interface ExplanationOutcome {
  readonly result: MatchResult;
  readonly explanation: string | null;
  readonly error: ProviderError | null;
}

const MATCH_REASON_MAX_CHARS = 200;

// ===== VALIDATION =====

function validateDocument(document: MatchDocument, field: string, expectedRole: DocumentRole): void {
  if (document.role !== expectedRole) {
    throw AppValidationError.wrongDocumentRole(field, expectedRole, document.role);
  }
  if (document.text.trim() === "") {
    throw AppEmptyInputError.forDocument(expectedRole);
  }
}

// ===== FREEZING =====

function freezeTopMatches(topMatches: readonly ChunkSimilarity[]): readonly ChunkSimilarity[] {
  return Object.freeze(
    topMatches.map((match) => Object.freeze({ ...match, chunk: Object.freeze({ ...match.chunk }) })),
  );
}

function freezeBreakdown(breakdown: ScoreBreakdown): ScoreBreakdown {
  return Object.freeze({
    subScores: Object.freeze({ ...breakdown.subScores }),
    weights: Object.freeze({ ...breakdown.weights }),
    weightedSum: breakdown.weightedSum,
    adjustments: Object.freeze(breakdown.adjustments.map((adjustment) => Object.freeze({ ...adjustment }))),
    skills: Object.freeze({
      matched: Object.freeze([...breakdown.skills.matched]),
      missingRequired: Object.freeze([...breakdown.skills.missingRequired]),
      missingPreferred: Object.freeze([...breakdown.skills.missingPreferred]),
    }),
    topMatches: freezeTopMatches(breakdown.topMatches),
    compositeScore: breakdown.compositeScore,
  });
}

function skillPenaltyAdjustment(skills: SkillMatchResult): ScoreAdjustment | null {
  if (!skills.penalty) {
    return null;
  }
  return {
    reason: "missing_required_skills",
    stage: "technical_skill",
    delta: -skills.penalty.applied,
    description: `${skills.penalty.missingRequiredCount} required skills missing (threshold ${skills.penalty.threshold})`,
  };
}

// ===== SCORING =====

async function scoreWithConfig(
  candidate: MatchDocument,
  role: MatchDocument,
  deps: MatchEngineDeps,
  config: ScoringConfig,
): Promise<MatchResult> {
  validateDocument(candidate, "candidate", "candidate");
  validateDocument(role, "role", "target-role");

  const candidateChunks = chunkText(candidate.text, config.chunkWindowWords, config.chunkOverlapWords);
  const roleChunks = chunkText(role.text, config.chunkWindowWords, config.chunkOverlapWords);

  const { candidateVectors, roleVectors } = await embedDocuments(
    deps.embeddingProvider,
    candidateChunks,
    roleChunks,
  );

  const skills = matchSkills(candidate.text, role.text, deps.vocabulary, config);
  const semantic = scoreSemanticSimilarity({ candidateChunks, candidateVectors, roleVectors }, config);
  const experience = scoreExperience(candidate.text, role.text, config);
  const education = scoreEducation(candidate.text, role.text, config);

  const adjustments: ScoreAdjustment[] = [semantic.adjustment];
  const penalty = skillPenaltyAdjustment(skills);
  if (penalty) {
    adjustments.push(penalty);
  }

  const breakdown = freezeBreakdown(
    combineScores(
      {
        technicalSkill: skills.keywordScore,
        semantic: semantic.score,
        experience: experience.score,
        education: education.score,
      },
      config,
      {
        skills: {
          matched: skills.matched,
          missingRequired: skills.missingRequired,
          missingPreferred: skills.missingPreferred,
        },
        topMatches: semantic.topMatches,
        adjustments,
      },
    ),
  );

  logger.info(
    {
      candidateChunks: candidateChunks.length,
      roleChunks: roleChunks.length,
      compositeScore: breakdown.compositeScore,
    },
    "Match scored",
  );

  return Object.freeze({ breakdown, compositeScore: breakdown.compositeScore });
}

/**
 * Scores one candidate document against one target-role document
 */
export async function scoreMatch(
  candidate: MatchDocument,
  role: MatchDocument,
  deps: MatchEngineDeps,
  overrides: ScoringConfigOverrides = {},
): Promise<MatchResult> {
  const config = resolveScoringConfig(overrides);
  return scoreWithConfig(candidate, role, deps, config);
}

function matchReason(result: MatchResult): string {
  const best = result.breakdown.topMatches[0];
  if (!best) {
    return "";
  }
  const text = best.chunk.text;
  return text.length > MATCH_REASON_MAX_CHARS ? `${text.slice(0, MATCH_REASON_MAX_CHARS)}...` : text;
}

/**
 * Scores every candidate against the role and orders them best first. Equal
 * scores keep input order.
 */
export async function rankCandidates(
  candidates: readonly CandidateInput[],
  role: MatchDocument,
  deps: MatchEngineDeps,
  overrides: ScoringConfigOverrides = {},
): Promise<RankedCandidate[]> {
  const config = resolveScoringConfig(overrides);

  const results = await Promise.all(
    candidates.map((candidate) =>
      scoreWithConfig({ text: candidate.text, role: "candidate" }, role, deps, config),
    ),
  );

  const ordered = candidates
    .map((candidate, index) => ({ candidate, index, result: results[index] }))
    .sort((a, b) => b.result.compositeScore - a.result.compositeScore || a.index - b.index);

  logger.info({ candidates: candidates.length }, "Candidates ranked");

  return ordered.map(({ candidate, result }, position) => ({
    id: candidate.id,
    rank: position + 1,
    compositeScore: result.compositeScore,
    category: classifyMatch(result.compositeScore).category,
    matchReason: matchReason(result),
    result,
  }));
}

/**
 * Asks the provider to narrate a computed result. Never throws: a provider
 * failure comes back as `error` next to the untouched result.
 */
export async function explainMatch(
  result: MatchResult,
  role: MatchDocument,
  provider: ExplanationProvider,
): Promise<ExplanationOutcome> {
  const input = buildExplanationInput(result, role.text);

  const outcome = await fromPromise(
    Promise.resolve().then(() => provider.explain(input)),
    (error) => AppProviderError.explanationFailure(provider.name, error),
  );

  if (isSuccess(outcome)) {
    return { result, explanation: outcome.data, error: null };
  }

  logger.warn(
    { provider: provider.name, error: outcome.error.originalError },
    "Explanation provider failed, returning the score without narrative",
  );
  return { result, explanation: null, error: outcome.error };
}
