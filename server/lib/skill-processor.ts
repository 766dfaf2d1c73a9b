/**
 * Skill Processor
 *
 * Deterministic skill extraction against the controlled vocabulary and the
 * keyword signal derived from it:
 * - role skills are split into required and preferred by section
 * - candidate skills are every vocabulary mention in the candidate text
 * - the keyword score weights required coverage over preferred coverage and
 *   takes a flat penalty once too many required skills are missing
 */

import type { SkillMatchResult, SkillPenalty, SkillSet } from "../../shared/schema";
import type { ScoringConfig } from "../config/scoring-config";
import { logger } from "./logger";
import { classifyLines, type ClassifiedLine } from "./requirement-sections";
import { clamp01, sortedUnique } from "./score-utils";
import type { SkillVocabulary } from "./skill-vocabulary";

export type KeywordScoringOptions = Pick<
  ScoringConfig,
  | "requiredSkillWeight"
  | "preferredSkillWeight"
  | "missingSkillPenaltyThreshold"
  | "missingSkillPenaltyAmount"
>;

// ==================== EXTRACTION ====================

/**
 * Canonical names of every vocabulary skill mentioned in the text
 */
export function findSkillMentions(text: string, vocabulary: SkillVocabulary): string[] {
  if (text.trim() === "") {
    return [];
  }

  const found = vocabulary.entries
    .filter((entry) => entry.patterns.some((pattern) => pattern.test(text)))
    .map((entry) => entry.canonical);

  return sortedUnique(found);
}

function classifyRoleLines(text: string): ClassifiedLine[] {
  try {
    return classifyLines(text);
  } catch (error) {
    // Without sections every line counts as required
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Section classification failed, treating the whole role as required",
    );
    return text.split(/\r?\n/).map((line, index): ClassifiedLine => ({
      text: line,
      lineNumber: index + 1,
      isHeading: false,
      state: { kind: "unclassified" },
      level: "required",
    }));
  }
}

/**
 * Extracts the skills of a document, separated into required and preferred.
 * A skill mentioned in both kinds of section is required.
 */
export function extractSkills(text: string, vocabulary: SkillVocabulary): SkillSet {
  const required = new Set<string>();
  const preferred = new Set<string>();

  for (const line of classifyRoleLines(text)) {
    if (line.level === "ignored") {
      continue;
    }
    const target = line.level === "required" ? required : preferred;
    for (const skill of findSkillMentions(line.text, vocabulary)) {
      target.add(skill);
    }
  }

  return {
    required: sortedUnique(required),
    preferred: sortedUnique(Array.from(preferred).filter((skill) => !required.has(skill))),
  };
}

// ==================== SCORING ====================

function coverage(matched: number, total: number): number {
  return total === 0 ? 1.0 : matched / total;
}

/**
 * Weighted required/preferred coverage. A side with no skills counts as fully
 * covered.
 */
export function computeKeywordScore(
  requiredMatched: number,
  requiredTotal: number,
  preferredMatched: number,
  preferredTotal: number,
  options: Pick<KeywordScoringOptions, "requiredSkillWeight" | "preferredSkillWeight">,
): number {
  return clamp01(
    options.requiredSkillWeight * coverage(requiredMatched, requiredTotal) +
      options.preferredSkillWeight * coverage(preferredMatched, preferredTotal),
  );
}

/**
 * Subtracts the configured penalty once the missing required count reaches
 * the threshold. The score never drops below 0.
 */
export function applyMissingSkillPenalty(
  rawScore: number,
  missingRequiredCount: number,
  options: Pick<KeywordScoringOptions, "missingSkillPenaltyThreshold" | "missingSkillPenaltyAmount">,
): { score: number; penalty: SkillPenalty | null } {
  if (missingRequiredCount < options.missingSkillPenaltyThreshold) {
    return { score: rawScore, penalty: null };
  }

  const applied = Math.min(options.missingSkillPenaltyAmount, rawScore);
  return {
    score: Math.max(0, rawScore - applied),
    penalty: {
      missingRequiredCount,
      threshold: options.missingSkillPenaltyThreshold,
      applied,
    },
  };
}

/**
 * Compares candidate skills with the role's required and preferred skills
 */
export function matchSkills(
  candidateText: string,
  roleText: string,
  vocabulary: SkillVocabulary,
  options: KeywordScoringOptions,
): SkillMatchResult {
  const roleSkills = extractSkills(roleText, vocabulary);
  const candidateSkills = findSkillMentions(candidateText, vocabulary);
  const candidateSet = new Set(candidateSkills);

  const matchedRequired = roleSkills.required.filter((skill) => candidateSet.has(skill));
  const matchedPreferred = roleSkills.preferred.filter((skill) => candidateSet.has(skill));
  const missingRequired = roleSkills.required.filter((skill) => !candidateSet.has(skill));
  const missingPreferred = roleSkills.preferred.filter((skill) => !candidateSet.has(skill));

  const rawKeywordScore = computeKeywordScore(
    matchedRequired.length,
    roleSkills.required.length,
    matchedPreferred.length,
    roleSkills.preferred.length,
    options,
  );
  const { score, penalty } = applyMissingSkillPenalty(
    rawKeywordScore,
    missingRequired.length,
    options,
  );

  logger.debug(
    {
      required: roleSkills.required.length,
      preferred: roleSkills.preferred.length,
      matched: matchedRequired.length + matchedPreferred.length,
      missingRequired: missingRequired.length,
      rawKeywordScore,
      keywordScore: score,
    },
    "Skill match computed",
  );

  return {
    roleSkills,
    candidateSkills,
    matched: sortedUnique([...matchedRequired, ...matchedPreferred]),
    missingRequired,
    missingPreferred,
    rawKeywordScore,
    keywordScore: score,
    penalty,
  };
}
