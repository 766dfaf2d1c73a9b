/**
 * Semantic Similarity Scorer
 *
 * The role document is chunked like the candidate, its chunk vectors are
 * mean-pooled into one centroid, and every candidate chunk is compared with
 * that centroid. The raw signal is the mean of the best `semanticTopK` chunk
 * similarities; the reported sub-score is the raw signal times the boost
 * factor, clamped to [0, 1].
 */

import type { Chunk, ChunkSimilarity, ScoreAdjustment } from "../../shared/schema";
import { AppProviderError } from "../../shared/errors";
import type { ScoringConfig } from "../config/scoring-config";
import { cosineSimilarity, meanVector } from "./embeddings";
import { logger } from "./logger";
import { clamp01 } from "./score-utils";

export interface SemanticScoringInput {
  readonly candidateChunks: readonly Chunk[];
  readonly candidateVectors: readonly (readonly number[])[];
  readonly roleVectors: readonly (readonly number[])[];
}

export type SemanticScoringOptions = Pick<
  ScoringConfig,
  "semanticBoostFactor" | "semanticTopK" | "topMatchCount"
>;

export interface SemanticScoreResult {
  /** Boosted and clamped sub-score */
  readonly score: number;
  readonly rawScore: number;
  readonly topMatches: readonly ChunkSimilarity[];
  readonly adjustment: ScoreAdjustment;
}

/**
 * Orders by similarity, highest first. Equal similarities keep chunk order.
 */
export function rankChunkSimilarities(similarities: readonly ChunkSimilarity[]): ChunkSimilarity[] {
  return [...similarities].sort((a, b) => {
    if (b.similarity !== a.similarity) {
      return b.similarity - a.similarity;
    }
    return a.chunkIndex - b.chunkIndex;
  });
}

export function scoreSemanticSimilarity(
  input: SemanticScoringInput,
  options: SemanticScoringOptions,
): SemanticScoreResult {
  const { candidateChunks, candidateVectors, roleVectors } = input;

  if (candidateVectors.length !== candidateChunks.length) {
    throw AppProviderError.embeddingCountMismatch(
      "embedding",
      candidateChunks.length,
      candidateVectors.length,
    );
  }

  const centroid = meanVector(roleVectors);
  const similarities = candidateChunks.map(
    (chunk, chunkIndex): ChunkSimilarity => ({
      chunk,
      chunkIndex,
      similarity: centroid.length === 0 ? 0 : cosineSimilarity(candidateVectors[chunkIndex], centroid),
    }),
  );

  const ranked = rankChunkSimilarities(similarities);
  const best = ranked.slice(0, options.semanticTopK);
  const rawScore =
    best.length === 0
      ? 0
      : clamp01(best.reduce((sum, item) => sum + item.similarity, 0) / best.length);
  const score = clamp01(rawScore * options.semanticBoostFactor);

  logger.debug(
    {
      candidateChunks: candidateChunks.length,
      roleChunks: roleVectors.length,
      rawScore,
      score,
    },
    "Semantic similarity computed",
  );

  return {
    score,
    rawScore,
    topMatches: ranked.slice(0, options.topMatchCount),
    adjustment: {
      reason: "semantic_boost",
      stage: "semantic",
      delta: score - rawScore,
      description: `Raw similarity ${rawScore.toFixed(3)} boosted by ${options.semanticBoostFactor} and clamped to ${score.toFixed(3)}`,
    },
  };
}
