/**
 * Education Matcher
 *
 * Degrees sit on an ordinal scale. The role's requirement is the lowest degree
 * its requirement lines accept; the candidate's level is the highest degree
 * they mention. Each tier of shortfall costs `1 - educationOneTierCredit`.
 */

import type { ScoringConfig } from "../config/scoring-config";
import { logger } from "./logger";
import { classifyLines } from "./requirement-sections";
import { clamp01 } from "./score-utils";

export type DegreeName = "high_school" | "associate" | "bachelor" | "master" | "doctorate";

export const DEGREE_LEVELS: Readonly<Record<DegreeName, number>> = Object.freeze({
  high_school: 1,
  associate: 2,
  bachelor: 3,
  master: 4,
  doctorate: 5,
});

export type EducationMatchOptions = Pick<ScoringConfig, "educationOneTierCredit">;

export interface EducationMatchResult {
  readonly score: number;
  readonly requiredLevel: number | null;
  readonly requiredDegree: DegreeName | null;
  readonly candidateLevel: number | null;
  readonly candidateDegree: DegreeName | null;
  readonly neutral: boolean;
}

function degreePattern(source: string): RegExp {
  return new RegExp(`(?<![a-z0-9])(?:${source})(?![a-z0-9])`, "i");
}

// Bare abbreviations such as "ms" or "ba" are too ambiguous to count
const DEGREE_PATTERNS: ReadonlyArray<readonly [DegreeName, RegExp]> = [
  ["doctorate", degreePattern("ph\\.?\\s?d\\.?|doctorate|doctoral|doctor of")],
  [
    "master",
    degreePattern("master['’]?s|masters|master of|m\\.sc\\.?|msc|m\\.s\\.|mba|m\\.eng\\.?|m\\.a\\."),
  ],
  [
    "bachelor",
    degreePattern(
      "bachelor['’]?s?|bachelor of|b\\.sc\\.?|bsc|b\\.s\\.|b\\.a\\.|b\\.tech|btech|b\\.e\\.|undergraduate degree",
    ),
  ],
  ["associate", degreePattern("associate['’]?s? degree|associate of (?:arts|science|applied science)")],
  ["high_school", degreePattern("high school|secondary school|ged")],
];

/**
 * Every degree mentioned in a piece of text
 */
export function findDegrees(text: string): DegreeName[] {
  return DEGREE_PATTERNS.filter(([, pattern]) => pattern.test(text)).map(([degree]) => degree);
}

function lowest(degrees: readonly DegreeName[]): DegreeName | null {
  return degrees.reduce<DegreeName | null>(
    (best, degree) => (best === null || DEGREE_LEVELS[degree] < DEGREE_LEVELS[best] ? degree : best),
    null,
  );
}

function highest(degrees: readonly DegreeName[]): DegreeName | null {
  return degrees.reduce<DegreeName | null>(
    (best, degree) => (best === null || DEGREE_LEVELS[degree] > DEGREE_LEVELS[best] ? degree : best),
    null,
  );
}

/**
 * Lowest degree on required lines, or on preferred lines when no required
 * line names one. "Bachelor's or Master's" accepts a bachelor's.
 */
export function extractRequiredDegree(roleText: string): DegreeName | null {
  const required: DegreeName[] = [];
  const preferred: DegreeName[] = [];

  for (const line of classifyLines(roleText)) {
    if (line.level === "ignored") {
      continue;
    }
    const target = line.level === "required" ? required : preferred;
    target.push(...findDegrees(line.text));
  }

  return lowest(required) ?? lowest(preferred);
}

export function extractCandidateDegree(candidateText: string): DegreeName | null {
  return highest(findDegrees(candidateText));
}

export function calculateEducationScore(
  candidateLevel: number,
  requiredLevel: number,
  oneTierCredit: number,
): number {
  const gap = Math.max(0, requiredLevel - candidateLevel);
  return clamp01(1 - gap * (1 - oneTierCredit));
}

export function scoreEducation(
  candidateText: string,
  roleText: string,
  options: EducationMatchOptions,
): EducationMatchResult {
  try {
    const requiredDegree = extractRequiredDegree(roleText);
    const candidateDegree = extractCandidateDegree(candidateText);
    const requiredLevel = requiredDegree === null ? null : DEGREE_LEVELS[requiredDegree];
    const candidateLevel = candidateDegree === null ? null : DEGREE_LEVELS[candidateDegree];

    if (requiredLevel === null || candidateLevel === null) {
      logger.debug({ requiredDegree, candidateDegree }, "Education not comparable, using neutral score");
      return {
        score: 1.0,
        requiredLevel,
        requiredDegree,
        candidateLevel,
        candidateDegree,
        neutral: true,
      };
    }

    const score = calculateEducationScore(candidateLevel, requiredLevel, options.educationOneTierCredit);
    logger.debug({ requiredDegree, candidateDegree, score }, "Education match computed");

    return { score, requiredLevel, requiredDegree, candidateLevel, candidateDegree, neutral: false };
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Education matching failed, using neutral score",
    );
    return {
      score: 1.0,
      requiredLevel: null,
      requiredDegree: null,
      candidateLevel: null,
      candidateDegree: null,
      neutral: true,
    };
  }
}
