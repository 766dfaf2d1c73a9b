/**
 * Health Routes
 */

import { Router, type Request, type Response } from "express";
import type { SkillVocabulary } from "../lib/skill-vocabulary";

export interface HealthRouteDeps {
  readonly vocabulary: SkillVocabulary;
  readonly embeddingProviderName: string;
  readonly explanationProviderName: string;
}

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  // Basic health check endpoint - Fast response for load balancers
  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        status: "ok",
        vocabularySize: deps.vocabulary.size,
        embeddingProvider: deps.embeddingProviderName,
        explanationProvider: deps.explanationProviderName,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
