/**
 * Match Routes
 * Scores one candidate against a role, or ranks several candidates
 */

import { Router } from "express";
import {
  matchRequestSchema,
  rankRequestSchema,
  type MatchRequest,
  type RankRequest,
} from "../../shared/schema";
import type { ScoringConfig } from "../config/scoring-config";
import type { EmbeddingProvider } from "../lib/embeddings";
import type { ExplanationProvider } from "../lib/explanation";
import { logger } from "../lib/logger";
import { explainMatch, rankCandidates, scoreMatch } from "../lib/match-engine";
import { buildMatchReport } from "../lib/match-report";
import type { SkillVocabulary } from "../lib/skill-vocabulary";
import { asyncHandler } from "../middleware/error-handler";
import { validateRequest } from "../middleware/validation";

export interface MatchRouteDeps {
  readonly vocabulary: SkillVocabulary;
  readonly embeddingProvider: EmbeddingProvider;
  readonly explanationProvider: ExplanationProvider;
  /** Server-wide scoring settings; request overrides apply on top */
  readonly scoringConfig: ScoringConfig;
}

export function createMatchRouter(deps: MatchRouteDeps): Router {
  const router = Router();
  const engineDeps = { vocabulary: deps.vocabulary, embeddingProvider: deps.embeddingProvider };

  router.post(
    "/match",
    asyncHandler(async (req, res) => {
      const body: MatchRequest = validateRequest(matchRequestSchema, req.body);
      const role = { text: body.roleText, role: "target-role" as const };

      const result = await scoreMatch(
        { text: body.candidateText, role: "candidate" },
        role,
        engineDeps,
        { ...deps.scoringConfig, ...body.config },
      );

      const explanation = body.explain
        ? await explainMatch(result, role, deps.explanationProvider)
        : null;

      logger.info(
        { compositeScore: result.compositeScore, explained: explanation !== null },
        "Match request completed",
      );

      res.json({ success: true, data: buildMatchReport(result, explanation) });
    }),
  );

  router.post(
    "/rank",
    asyncHandler(async (req, res) => {
      const body: RankRequest = validateRequest(rankRequestSchema, req.body);

      const rankings = await rankCandidates(
        body.candidates,
        { text: body.roleText, role: "target-role" },
        engineDeps,
        { ...deps.scoringConfig, ...body.config },
      );

      logger.info({ candidates: rankings.length }, "Rank request completed");

      res.json({ success: true, data: { rankings } });
    }),
  );

  return router;
}
