/**
 * Experience Matcher
 *
 * Compares the years of experience a role asks for with the years a candidate
 * shows, either stated outright ("6 years of experience") or implied by date
 * ranges in the work history ("2018 - 2021", "Mar 2019 – present").
 */

import { getReferenceYear, type ScoringConfig } from "../config/scoring-config";
import { findDegrees } from "./education-matcher";
import { logger } from "./logger";
import { classifyLines, parseHeading } from "./requirement-sections";
import { clamp01 } from "./score-utils";

export type ExperienceMatchOptions = Pick<
  ScoringConfig,
  "experienceMaxShortfallYears" | "referenceYear"
>;

export interface ExperienceMatchResult {
  readonly score: number;
  /** Years the role asks for, null when the role states none */
  readonly requiredYears: number | null;
  /** Years the candidate shows, null when none could be found */
  readonly candidateYears: number | null;
  readonly shortfallYears: number;
  /** True when the score is the neutral 1.0 because a figure was missing */
  readonly neutral: boolean;
}

export interface YearSpan {
  readonly start: number;
  readonly end: number;
}

// "5+ years", "3-5 years", "3 to 5 yrs". Ranges take the lower bound.
const ROLE_YEARS = "(\\d{1,2})\\s*\\+?(?:\\s*(?:-|–|to)\\s*\\d{1,2})?\\s*\\+?\\s*(?:years?|yrs?)";

// Figures count only next to an experience cue: "years of", "at least", "experience:"
const ROLE_YEARS_PATTERNS = [
  new RegExp(
    `(?<![\\d.])${ROLE_YEARS}\\s+(?:of|in|with|working|experience|background|professional|hands[\\s-]on|industry|relevant)(?![a-z])`,
    "gi",
  ),
  new RegExp(`(?:minimum(?:\\s+of)?|at\\s+least)\\s+${ROLE_YEARS}(?![a-z])`, "gi"),
  new RegExp(`experience:\\s*${ROLE_YEARS}(?![a-z])`, "gi"),
];

const CANDIDATE_YEARS_PATTERNS = [
  /(?<![\d.])(\d{1,2}(?:\.\d+)?)\s*\+?\s*(?:years?|yrs?)\s*(?:of\s+)?(?:[a-z-]+\s+){0,2}?experience/gi,
  /experience:\s*(\d{1,2}(?:\.\d+)?)\s*\+?\s*(?:years?|yrs?)/gi,
  /(?<![\d.])(\d{1,2}(?:\.\d+)?)\s*\+?\s*(?:years?|yrs?)\s+(?:working|background)/gi,
];

const MONTH = "(?:[a-z]{3,9}\\.?\\s+)?";
const DATE_RANGE_PATTERN = new RegExp(
  `(?<!\\d)((?:19|20)\\d{2})\\s*(?:-|–|—|to|until)\\s*${MONTH}((?:19|20)\\d{2}|present|current|now|today)(?![\\da-z])`,
  "gi",
);

function collectNumbers(text: string, pattern: RegExp): number[] {
  const values: number[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = Number.parseFloat(match[1]);
    if (Number.isFinite(value)) {
      values.push(value);
    }
  }
  return values;
}

function maxOrNull(values: readonly number[]): number | null {
  return values.length === 0 ? null : Math.max(...values);
}

/**
 * Years the role asks for: the largest figure on required lines, or on
 * preferred lines when no required line names one
 */
export function extractRequiredYears(roleText: string): number | null {
  const required: number[] = [];
  const preferred: number[] = [];

  for (const line of classifyLines(roleText)) {
    if (line.level === "ignored") {
      continue;
    }
    const target = line.level === "required" ? required : preferred;
    target.push(...ROLE_YEARS_PATTERNS.flatMap((pattern) => collectNumbers(line.text, pattern)));
  }

  return maxOrNull(required) ?? maxOrNull(preferred);
}

export function extractDateSpans(text: string, referenceYear: number): YearSpan[] {
  const spans: YearSpan[] = [];
  for (const match of text.matchAll(DATE_RANGE_PATTERN)) {
    const start = Number.parseInt(match[1], 10);
    const end = /^\d+$/.test(match[2]) ? Number.parseInt(match[2], 10) : referenceYear;
    if (end >= start && start <= referenceYear) {
      spans.push({ start, end: Math.min(end, referenceYear) });
    }
  }
  return spans;
}

/**
 * Total years covered by the spans, counting overlapping periods once
 */
export function mergeSpanYears(spans: readonly YearSpan[]): number {
  const sorted = [...spans].sort((a, b) => a.start - b.start || a.end - b.end);
  let total = 0;
  let current: YearSpan | null = null;

  for (const span of sorted) {
    if (current === null) {
      current = span;
    } else if (span.start <= current.end) {
      current = { start: current.start, end: Math.max(current.end, span.end) };
    } else {
      total += current.end - current.start;
      current = span;
    }
  }

  return current === null ? total : total + current.end - current.start;
}

const EDUCATION_HEADING_PATTERN = /(?<![a-z])(?:education|academic|degrees?|schooling)(?![a-z])/i;

/**
 * The resume without its degree lines and education sections
 */
export function workHistoryText(candidateText: string): string {
  const kept: string[] = [];
  let inEducation = false;

  for (const line of candidateText.split(/\r?\n/)) {
    const heading = parseHeading(line);
    if (heading !== null) {
      inEducation = EDUCATION_HEADING_PATTERN.test(heading);
    }
    if (!inEducation && findDegrees(line).length === 0) {
      kept.push(line);
    }
  }

  return kept.join("\n");
}

/**
 * Years the candidate shows: the larger of the stated figures and the merged
 * work-history date ranges
 */
export function extractCandidateYears(candidateText: string, referenceYear: number): number | null {
  const stated = CANDIDATE_YEARS_PATTERNS.flatMap((pattern) => collectNumbers(candidateText, pattern));
  const spans = extractDateSpans(workHistoryText(candidateText), referenceYear);
  const fromRanges = spans.length === 0 ? [] : [mergeSpanYears(spans)];
  return maxOrNull([...stated, ...fromRanges]);
}

export function calculateExperienceScore(
  candidateYears: number,
  requiredYears: number,
  maxShortfallYears: number,
): number {
  const shortfall = Math.max(0, requiredYears - candidateYears);
  return clamp01(1 - shortfall / maxShortfallYears);
}

function neutralResult(
  requiredYears: number | null,
  candidateYears: number | null,
): ExperienceMatchResult {
  return { score: 1.0, requiredYears, candidateYears, shortfallYears: 0, neutral: true };
}

export function scoreExperience(
  candidateText: string,
  roleText: string,
  options: ExperienceMatchOptions,
): ExperienceMatchResult {
  try {
    const referenceYear = getReferenceYear(options);
    const requiredYears = extractRequiredYears(roleText);
    const candidateYears = extractCandidateYears(candidateText, referenceYear);

    if (requiredYears === null || requiredYears <= 0 || candidateYears === null) {
      logger.debug({ requiredYears, candidateYears }, "Experience not comparable, using neutral score");
      return neutralResult(requiredYears, candidateYears);
    }

    const score = calculateExperienceScore(
      candidateYears,
      requiredYears,
      options.experienceMaxShortfallYears,
    );
    logger.debug({ requiredYears, candidateYears, score }, "Experience match computed");

    return {
      score,
      requiredYears,
      candidateYears,
      shortfallYears: Math.max(0, requiredYears - candidateYears),
      neutral: false,
    };
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Experience matching failed, using neutral score",
    );
    return neutralResult(null, null);
  }
}
