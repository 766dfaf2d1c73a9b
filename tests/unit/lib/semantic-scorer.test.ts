/**
 * Semantic Similarity Scorer Tests
 */

import { describe, it, expect } from "@jest/globals";
import { chunkText } from "../../../server/lib/chunker";
import { rankChunkSimilarities, scoreSemanticSimilarity } from "../../../server/lib/semantic-scorer";
import { DEFAULT_SCORING_CONFIG } from "../../../server/config/scoring-config";
import { AppProviderError } from "../../../shared/errors";

// Candidate chunks: "alpha beta" | "gamma delta"; role chunks: "red green" | "blue white"
const candidateChunks = chunkText("alpha beta gamma delta", 2, 0);
const candidateVectors = [
  [1, 0, 0],
  [0, 1, 0],
];
const roleVectors = [
  [1, 0, 1],
  [0, 0, 1],
];

describe("scoreSemanticSimilarity", () => {
  it("compares every candidate chunk with the mean of the role chunk vectors", () => {
    const result = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors, roleVectors },
      DEFAULT_SCORING_CONFIG,
    );

    // Role centroid is [0.5, 0, 1]; the first chunk scores 0.5 / sqrt(1.25)
    expect(result.rawScore).toBeCloseTo(0.4472135955, 9);
    expect(result.score).toBeCloseTo(0.8049844719, 9);
    expect(result.topMatches.map((match) => [match.chunk.text, match.chunkIndex])).toEqual([
      ["alpha beta", 0],
      ["gamma delta", 1],
    ]);
    expect(result.topMatches[1].similarity).toBe(0);
  });

  it("reports the boost as a semantic-stage adjustment", () => {
    const { adjustment, score, rawScore } = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors, roleVectors },
      DEFAULT_SCORING_CONFIG,
    );

    expect(adjustment.reason).toBe("semantic_boost");
    expect(adjustment.stage).toBe("semantic");
    expect(adjustment.delta).toBeCloseTo(score - rawScore, 12);
  });

  it("averages the best chunks when asked for more than one", () => {
    const result = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors, roleVectors },
      { ...DEFAULT_SCORING_CONFIG, semanticTopK: 2 },
    );

    expect(result.rawScore).toBeCloseTo(0.2236067977, 9);
    expect(result.score).toBeCloseTo(0.4024922359, 9);
  });

  it("clamps the boosted score to 1", () => {
    const result = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors: [[1, 0, 0], [1, 0, 0]], roleVectors: [[1, 0, 0]] },
      DEFAULT_SCORING_CONFIG,
    );

    expect(result.rawScore).toBeCloseTo(1, 12);
    expect(result.score).toBe(1);
  });

  it("limits the reported matches", () => {
    const result = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors, roleVectors },
      { ...DEFAULT_SCORING_CONFIG, topMatchCount: 1 },
    );

    expect(result.topMatches).toHaveLength(1);
  });

  it("scores zero when nothing points the same way", () => {
    const result = scoreSemanticSimilarity(
      { candidateChunks, candidateVectors: [[0, 0, 0], [0, 0, 0]], roleVectors },
      DEFAULT_SCORING_CONFIG,
    );

    expect(result.rawScore).toBe(0);
    expect(result.score).toBe(0);
  });

  it("rejects a vector count that does not match the chunks", () => {
    expect(() =>
      scoreSemanticSimilarity(
        { candidateChunks, candidateVectors: [[1, 0, 0]], roleVectors },
        DEFAULT_SCORING_CONFIG,
      ),
    ).toThrow(AppProviderError);
  });
});

describe("rankChunkSimilarities", () => {
  it("breaks ties by chunk order", () => {
    const chunk = { text: "x", startOffset: 0, endOffset: 1 };
    const ranked = rankChunkSimilarities([
      { chunk, chunkIndex: 0, similarity: 0.2 },
      { chunk, chunkIndex: 1, similarity: 0.7 },
      { chunk, chunkIndex: 2, similarity: 0.2 },
      { chunk, chunkIndex: 3, similarity: 0.7 },
    ]);

    expect(ranked.map((item) => item.chunkIndex)).toEqual([1, 3, 0, 2]);
  });
});
