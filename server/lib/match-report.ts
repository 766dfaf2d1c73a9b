import type { MatchCategory, MatchResult } from "../../shared/schema";
import type { ExplanationOutcome } from "./match-engine";
import {
  getImprovementSuggestions,
  parseExplanationSections,
  type ExplanationSections,
} from "./explanation";
import { classifyMatch } from "./hybrid-scorer";

export interface MatchReport {
  readonly result: MatchResult;
  readonly compositeScore: number;
  readonly category: MatchCategory;
  readonly recommendation: string;
  readonly improvementSuggestions: string[];
  /** Present when an explanation was requested and the provider answered */
  readonly explanation: ExplanationSections | null;
  readonly explanationError: string | null;
}

/**
 * Packages a result and its optional narrative for display
 */
export function buildMatchReport(
  result: MatchResult,
  explanation: ExplanationOutcome | null = null,
): MatchReport {
  const { category, recommendation } = classifyMatch(result.compositeScore);
  const { skills } = result.breakdown;

  return {
    result,
    compositeScore: result.compositeScore,
    category,
    recommendation,
    improvementSuggestions: getImprovementSuggestions(
      skills.missingRequired,
      skills.matched,
      skills.missingPreferred,
    ),
    explanation:
      explanation?.explanation != null ? parseExplanationSections(explanation.explanation) : null,
    explanationError: explanation?.error?.message ?? null,
  };
}
