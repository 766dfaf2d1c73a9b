// Load environment variables first before any other imports
import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { scoringOverridesFromEnv, validateEnvironment } from "./config/env";
import { resolveScoringConfig } from "./config/scoring-config";
import { isFailure } from "../shared/result-types";
import type { EmbeddingProvider } from "./lib/embeddings";
import {
  GroqExplanationProvider,
  TemplateExplanationProvider,
  type ExplanationProvider,
} from "./lib/explanation";
import { logger } from "./lib/logger";
import { OpenAIEmbeddingProvider } from "./lib/openai-embeddings";
import { loadSkillVocabulary } from "./lib/skill-vocabulary";

function main(): void {
  const envResult = validateEnvironment();
  if (isFailure(envResult)) {
    logger.fatal({ details: envResult.error.details }, envResult.error.message);
    process.exit(1);
  }
  const env = envResult.data;

  if (!env.OPENAI_API_KEY) {
    logger.fatal("OPENAI_API_KEY is required for embeddings");
    process.exit(1);
  }

  const scoringConfig = resolveScoringConfig(scoringOverridesFromEnv(env));
  const vocabulary = loadSkillVocabulary(env.SKILL_VOCABULARY_PATH);

  const embeddingProvider: EmbeddingProvider = new OpenAIEmbeddingProvider({
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_EMBEDDING_MODEL,
    batchSize: env.EMBEDDING_BATCH_SIZE,
  });

  const explanationProvider: ExplanationProvider = env.GROQ_API_KEY
    ? new GroqExplanationProvider({ apiKey: env.GROQ_API_KEY, model: env.GROQ_MODEL })
    : new TemplateExplanationProvider();

  const app = createApp({ vocabulary, embeddingProvider, explanationProvider, scoringConfig });

  const server = app.listen(env.PORT, "0.0.0.0", () => {
    logger.info(
      {
        port: env.PORT,
        environment: env.NODE_ENV,
        embeddingProvider: embeddingProvider.name,
        explanationProvider: explanationProvider.name,
        skills: vocabulary.size,
      },
      "Server started",
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      logger.info("HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (error) {
  logger.fatal({ err: error }, "Failed to start application");
  process.exit(1);
}
