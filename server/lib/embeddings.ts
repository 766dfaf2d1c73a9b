import type { Chunk } from "../../shared/schema";
import { AppProviderError } from "../../shared/errors";
import { logger } from "./logger";

/**
 * Turns texts into vectors. Must return exactly one vector per input text, in
 * input order. May answer synchronously or with a promise.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: readonly string[]): number[][] | Promise<number[][]>;
}

export interface DocumentEmbeddings {
  readonly candidateVectors: number[][];
  readonly roleVectors: number[][];
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    logger.error(
      { aLength: a.length, bLength: b.length },
      "Cosine similarity vector length mismatch",
    );
    throw AppProviderError.vectorDimensionMismatch(a.length, b.length);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  let validElements = 0;

  for (let i = 0; i < a.length; i++) {
    // Skip NaN or infinite components
    if (!Number.isFinite(a[i]) || !Number.isFinite(b[i])) {
      continue;
    }

    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
    validElements++;
  }

  if (validElements < a.length) {
    logger.warn(
      { skipped: a.length - validElements },
      "Non-finite components skipped in cosine similarity",
    );
  }

  // A zero vector carries no direction
  if (normA === 0 || normB === 0) {
    return 0;
  }

  const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  if (!Number.isFinite(similarity)) {
    return 0;
  }

  return Math.max(-1, Math.min(1, similarity));
}

/**
 * Component-wise mean of equally sized vectors
 */
export function meanVector(vectors: readonly (readonly number[])[]): number[] {
  if (vectors.length === 0) {
    return [];
  }

  const dimension = vectors[0].length;
  const sum = new Array<number>(dimension).fill(0);

  for (const vector of vectors) {
    if (vector.length !== dimension) {
      throw AppProviderError.vectorDimensionMismatch(dimension, vector.length);
    }
    for (let i = 0; i < dimension; i++) {
      if (Number.isFinite(vector[i])) {
        sum[i] += vector[i];
      }
    }
  }

  return sum.map((value) => value / vectors.length);
}

/**
 * Embeds the chunks of both documents with a single provider call and splits
 * the answer back into candidate and role vectors.
 */
export async function embedDocuments(
  provider: EmbeddingProvider,
  candidateChunks: readonly Chunk[],
  roleChunks: readonly Chunk[],
): Promise<DocumentEmbeddings> {
  const texts = [...candidateChunks, ...roleChunks].map((chunk) => chunk.text);

  let vectors: number[][];
  try {
    vectors = await provider.embed(texts);
  } catch (error) {
    if (error instanceof AppProviderError) {
      throw error;
    }
    logger.error(
      { provider: provider.name, error: error instanceof Error ? error.message : String(error) },
      "Embedding provider failed",
    );
    throw AppProviderError.embeddingFailure(provider.name, error);
  }

  if (!Array.isArray(vectors) || vectors.length !== texts.length) {
    const received = Array.isArray(vectors) ? vectors.length : 0;
    logger.error(
      { provider: provider.name, expected: texts.length, received },
      "Embedding provider returned the wrong number of vectors",
    );
    throw AppProviderError.embeddingCountMismatch(provider.name, texts.length, received);
  }

  logger.debug(
    {
      provider: provider.name,
      candidateChunks: candidateChunks.length,
      roleChunks: roleChunks.length,
    },
    "Documents embedded",
  );

  return {
    candidateVectors: vectors.slice(0, candidateChunks.length),
    roleVectors: vectors.slice(candidateChunks.length),
  };
}
