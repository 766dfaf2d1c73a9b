/**
 * Skill Processor Tests
 */

import { describe, it, expect } from "@jest/globals";
import {
  applyMissingSkillPenalty,
  computeKeywordScore,
  extractSkills,
  findSkillMentions,
  matchSkills,
} from "../../../server/lib/skill-processor";
import { DEFAULT_SCORING_CONFIG } from "../../../server/config/scoring-config";
import { createTestVocabulary } from "../../helpers/vocabulary";

const vocabulary = createTestVocabulary();
const options = DEFAULT_SCORING_CONFIG;

const dataEngineerRole = [
  "Senior Data Engineer",
  "Requirements:",
  "- Python and SQL",
  "- Kafka is a plus",
  "Nice to have:",
  "- Scala",
  "Benefits:",
  "- Free Docker training",
].join("\n");

describe("findSkillMentions", () => {
  it("returns sorted canonical names", () => {
    expect(findSkillMentions("Built services in Java and JavaScript on Node.js", vocabulary)).toEqual([
      "java",
      "javascript",
      "node.js",
    ]);
  });

  it("does not find a skill inside a longer word", () => {
    expect(findSkillMentions("JavaScript developer", vocabulary)).toEqual(["javascript"]);
  });

  it("maps aliases to their canonical skill", () => {
    expect(findSkillMentions("Strong CPP, Apache Kafka and Amazon Web Services", vocabulary)).toEqual([
      "aws",
      "c++",
      "kafka",
    ]);
  });

  it("returns nothing for blank text", () => {
    expect(findSkillMentions("  ", vocabulary)).toEqual([]);
  });
});

describe("extractSkills", () => {
  it("separates required from preferred and skips ignored sections", () => {
    expect(extractSkills(dataEngineerRole, vocabulary)).toEqual({
      required: ["python", "sql"],
      preferred: ["kafka", "scala"],
    });
  });

  it("keeps a skill listed in both kinds of section as required", () => {
    const role = "Requirements:\n- Python\nPreferred:\n- Python and Docker";

    expect(extractSkills(role, vocabulary)).toEqual({ required: ["python"], preferred: ["docker"] });
  });

  it("keeps bare upper-case skill lines in their section", () => {
    const role = "Requirements:\n- Python\nNice to have:\nAWS\n- Docker";

    expect(extractSkills(role, vocabulary)).toEqual({ required: ["python"], preferred: ["aws", "docker"] });
  });

  it("treats a role without headings as all required", () => {
    expect(extractSkills("We use Python, SQL and AWS every day", vocabulary)).toEqual({
      required: ["aws", "python", "sql"],
      preferred: [],
    });
  });
});

describe("computeKeywordScore", () => {
  it("weights required coverage over preferred coverage", () => {
    expect(computeKeywordScore(2, 4, 1, 2, options)).toBeCloseTo(0.5, 10);
    expect(computeKeywordScore(4, 4, 0, 2, options)).toBeCloseTo(0.8, 10);
  });

  it("counts a side with no skills as fully covered", () => {
    expect(computeKeywordScore(0, 0, 0, 0, options)).toBeCloseTo(1, 10);
    expect(computeKeywordScore(1, 2, 0, 0, options)).toBeCloseTo(0.6, 10);
  });
});

describe("applyMissingSkillPenalty", () => {
  it("does nothing below the threshold", () => {
    expect(applyMissingSkillPenalty(0.5, 2, options)).toEqual({ score: 0.5, penalty: null });
  });

  it("subtracts the penalty at the threshold", () => {
    const { score, penalty } = applyMissingSkillPenalty(0.5, 3, options);

    expect(score).toBeCloseTo(0.35, 10);
    expect(penalty).toEqual({ missingRequiredCount: 3, threshold: 3, applied: 0.15 });
  });

  it("never goes below zero and reports what was applied", () => {
    const { score, penalty } = applyMissingSkillPenalty(0.1, 4, options);

    expect(score).toBe(0);
    expect(penalty?.applied).toBe(0.1);
  });
});

describe("matchSkills", () => {
  it("reports matched and missing skills", () => {
    const result = matchSkills("I use Python and Kafka daily", dataEngineerRole, vocabulary, options);

    expect(result.matched).toEqual(["kafka", "python"]);
    expect(result.missingRequired).toEqual(["sql"]);
    expect(result.missingPreferred).toEqual(["scala"]);
    expect(result.candidateSkills).toEqual(["kafka", "python"]);
    expect(result.rawKeywordScore).toBeCloseTo(0.5, 10);
    expect(result.keywordScore).toBeCloseTo(0.5, 10);
    expect(result.penalty).toBeNull();
  });

  it("reduces the score in proportion to one missing required skill without a penalty", () => {
    const result = matchSkills("Python developer", "Requirements:\n- Python\n- SQL", vocabulary, options);

    expect(result.missingRequired).toEqual(["sql"]);
    expect(result.keywordScore).toBeCloseTo(0.6, 10);
    expect(result.penalty).toBeNull();
  });

  it("subtracts exactly the penalty when three required skills are missing", () => {
    const role = "Requirements:\n- Python, SQL, Kafka, Docker";
    const result = matchSkills("Python developer", role, vocabulary, options);

    expect(result.missingRequired).toEqual(["docker", "kafka", "sql"]);
    expect(result.rawKeywordScore).toBeCloseTo(0.4, 10);
    expect(result.keywordScore).toBeCloseTo(0.25, 10);
    expect(result.penalty?.applied).toBe(0.15);
  });

  it("floors the penalized score at zero", () => {
    const role = "Requirements:\n- Python, SQL, Kafka, Docker\nPreferred:\n- Scala";
    const result = matchSkills("Java developer", role, vocabulary, options);

    expect(result.rawKeywordScore).toBe(0);
    expect(result.keywordScore).toBe(0);
    expect(result.penalty?.applied).toBe(0);
  });
});
