import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import type { ScoringConfig } from "./config/scoring-config";
import type { EmbeddingProvider } from "./lib/embeddings";
import type { ExplanationProvider } from "./lib/explanation";
import { logger } from "./lib/logger";
import type { SkillVocabulary } from "./lib/skill-vocabulary";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { createHealthRouter } from "./routes/health";
import { createMatchRouter } from "./routes/match";

export interface AppDeps {
  readonly vocabulary: SkillVocabulary;
  readonly embeddingProvider: EmbeddingProvider;
  readonly explanationProvider: ExplanationProvider;
  readonly scoringConfig: ScoringConfig;
}

const JSON_BODY_LIMIT = "2mb";

/**
 * Builds the HTTP app. Every collaborator is passed in so tests can run the
 * real routes against in-process providers.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        "Request completed",
      );
    });
    next();
  });

  app.use(
    "/api",
    createHealthRouter({
      vocabulary: deps.vocabulary,
      embeddingProviderName: deps.embeddingProvider.name,
      explanationProviderName: deps.explanationProvider.name,
    }),
  );
  app.use("/api", createMatchRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
