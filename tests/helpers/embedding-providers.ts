/**
 * In-process embedding providers for tests
 */

import type { EmbeddingProvider } from "../../server/lib/embeddings";

const HASH_DIMENSIONS = 32;

function fnv1a(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector: each lower-cased token adds 1 to a hashed dimension.
 * Text without letters or digits embeds to the zero vector.
 */
export function hashEmbedding(text: string): number[] {
  const vector = new Array<number>(HASH_DIMENSIONS).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[fnv1a(token) % HASH_DIMENSIONS] += 1;
  }
  return vector;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashing";
  readonly calls: string[][] = [];

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(hashEmbedding);
  }
}

/**
 * Answers synchronously from a fixed text → vector table
 */
export class TableEmbeddingProvider implements EmbeddingProvider {
  readonly name = "table";
  readonly calls: string[][] = [];

  constructor(private readonly table: Readonly<Record<string, number[]>>) {}

  embed(texts: readonly string[]): number[][] {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vector = this.table[text];
      if (!vector) {
        throw new Error(`No vector for "${text}"`);
      }
      return vector;
    });
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "failing";

  async embed(): Promise<number[][]> {
    throw new Error("upstream unavailable");
  }
}

/**
 * Drops the first vector of every answer
 */
export class ShortEmbeddingProvider implements EmbeddingProvider {
  readonly name = "short";

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.slice(1).map(hashEmbedding);
  }
}
