import OpenAI from "openai";
import { AppProviderError } from "../../shared/errors";
import type { EmbeddingProvider } from "./embeddings";
import { logger } from "./logger";

export const DEFAULT_OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_EMBEDDING_BATCH_SIZE = 96;

/**
 * The slice of the OpenAI client this provider talks to
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      encoding_format: "float";
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  apiKey?: string;
  model?: string;
  batchSize?: number;
  client?: OpenAIEmbeddingsClient;
}

/**
 * Embedding provider backed by the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  private readonly client: OpenAIEmbeddingsClient;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbeddingProviderOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE);
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);

      let response: { data: Array<{ embedding: number[]; index: number }> };
      try {
        response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          encoding_format: "float",
        });
      } catch (error) {
        logger.error(
          {
            model: this.model,
            batchStart: start,
            batchSize: batch.length,
            error: error instanceof Error ? error.message : String(error),
          },
          "Error generating OpenAI embeddings",
        );
        throw AppProviderError.embeddingFailure(this.name, error);
      }

      if (response.data.length !== batch.length) {
        throw AppProviderError.embeddingCountMismatch(this.name, batch.length, response.data.length);
      }

      // The endpoint does not promise to answer in input order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }

    logger.debug({ model: this.model, texts: texts.length }, "OpenAI embeddings generated");
    return vectors;
  }
}
