/**
 * Environment Variable Validation
 *
 * Validates `process.env` once at startup and exposes a typed view of it.
 * Scoring overrides read from the environment are applied on top of the
 * scoring defaults and validated again by `resolveScoringConfig`.
 */

import { z } from "zod";
import { AppConfigError } from "../../shared/errors";
import { failure, success, type Result } from "../../shared/result-types";
import type { ScoringConfigOverrides } from "../../shared/schema";

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

export const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // Embeddings
  OPENAI_API_KEY: optionalNonEmpty,
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(96),

  // Explanations
  GROQ_API_KEY: optionalNonEmpty,
  GROQ_MODEL: z.string().default("llama-3.3-70b-versatile"),

  SKILL_VOCABULARY_PATH: optionalNonEmpty,

  // Scoring overrides; blank values leave the default in place
  SCORING_SEMANTIC_BOOST_FACTOR: optionalNonEmpty.pipe(z.coerce.number().positive().optional()),
  SCORING_CHUNK_WINDOW_WORDS: optionalNonEmpty.pipe(z.coerce.number().int().min(1).optional()),
  SCORING_CHUNK_OVERLAP_WORDS: optionalNonEmpty.pipe(z.coerce.number().int().min(0).optional()),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;

export function validateEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): Result<EnvironmentConfig, AppConfigError> {
  const parsed = EnvironmentSchema.safeParse(env);
  if (parsed.success) {
    return success(parsed.data);
  }

  const errors = parsed.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`);
  return failure(
    new AppConfigError(`Invalid environment: ${errors.join("; ")}`, "environment", { errors }),
  );
}

/**
 * Scoring overrides named in the environment. Unset variables leave the
 * default in place.
 */
export function scoringOverridesFromEnv(env: EnvironmentConfig): ScoringConfigOverrides {
  const overrides: ScoringConfigOverrides = {};
  if (env.SCORING_SEMANTIC_BOOST_FACTOR !== undefined) {
    overrides.semanticBoostFactor = env.SCORING_SEMANTIC_BOOST_FACTOR;
  }
  if (env.SCORING_CHUNK_WINDOW_WORDS !== undefined) {
    overrides.chunkWindowWords = env.SCORING_CHUNK_WINDOW_WORDS;
  }
  if (env.SCORING_CHUNK_OVERLAP_WORDS !== undefined) {
    overrides.chunkOverlapWords = env.SCORING_CHUNK_OVERLAP_WORDS;
  }
  return overrides;
}
