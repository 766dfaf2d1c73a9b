/**
 * Skill Vocabulary
 *
 * Controlled vocabulary of canonical skills and the surface forms that count as
 * a mention of each. Built once at startup, frozen, and passed explicitly into
 * every extraction call.
 */

import fs from "fs";
import { z } from "zod";
import { AppConfigError } from "../../shared/errors";
import { logger } from "./logger";
import { compareStrings } from "./score-utils";
import bundledVocabulary from "../data/skill-vocabulary.json";

export interface SkillEntry {
  /** Normalized skill name reported in results */
  readonly canonical: string;
  /** Every surface form that counts as a mention, lower-cased */
  readonly aliases: readonly string[];
  readonly patterns: readonly RegExp[];
}

export interface SkillVocabulary {
  readonly entries: readonly SkillEntry[];
  readonly size: number;
}

const vocabularySchema = z.record(
  z.string().trim().min(1),
  z.array(z.string().trim().min(1)).min(1, "each skill needs at least one surface form"),
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive pattern for one surface form. A mention may not touch a
 * letter or digit on either side, which keeps "java" out of "javascript" while
 * still matching forms such as "c++" or "ci/cd" that end in a symbol.
 */
export function buildAliasPattern(alias: string): RegExp {
  const body = alias
    .toLowerCase()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("\\s+");
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, "i");
}

/**
 * Validates a canonical → surface forms mapping and compiles it
 */
export function createSkillVocabulary(source: unknown): SkillVocabulary {
  const parsed = vocabularySchema.safeParse(source);
  if (!parsed.success) {
    const [first] = parsed.error.errors;
    throw AppConfigError.invalidSetting(
      "skillVocabulary",
      first ? `${first.path.join(".")}: ${first.message}` : "invalid vocabulary",
    );
  }

  const entries = Object.entries(parsed.data)
    .map(([canonical, aliases]): SkillEntry => {
      const normalizedAliases = Array.from(new Set(aliases.map((alias) => alias.toLowerCase())));
      return Object.freeze({
        canonical: canonical.toLowerCase(),
        aliases: Object.freeze(normalizedAliases),
        patterns: Object.freeze(normalizedAliases.map(buildAliasPattern)),
      });
    })
    .sort((a, b) => compareStrings(a.canonical, b.canonical));

  return Object.freeze({
    entries: Object.freeze(entries),
    size: entries.length,
  });
}

/**
 * Loads the vocabulary from a JSON file, or the bundled one when no path is given
 */
export function loadSkillVocabulary(filePath?: string): SkillVocabulary {
  if (!filePath) {
    const vocabulary = createSkillVocabulary(bundledVocabulary);
    logger.info({ skills: vocabulary.size }, "Loaded bundled skill vocabulary");
    return vocabulary;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw AppConfigError.invalidSetting(
      "SKILL_VOCABULARY_PATH",
      `could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const vocabulary = createSkillVocabulary(raw);
  logger.info({ skills: vocabulary.size, filePath }, "Loaded skill vocabulary");
  return vocabulary;
}
