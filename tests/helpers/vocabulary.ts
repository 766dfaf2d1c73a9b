import { createSkillVocabulary, type SkillVocabulary } from "../../server/lib/skill-vocabulary";

/**
 * Small vocabulary with predictable entries for matcher tests
 */
export function createTestVocabulary(): SkillVocabulary {
  return createSkillVocabulary({
    python: ["python"],
    sql: ["sql"],
    kafka: ["kafka", "apache kafka"],
    docker: ["docker"],
    "c++": ["c++", "cpp"],
    java: ["java"],
    javascript: ["javascript"],
    "node.js": ["node.js", "nodejs"],
    scala: ["scala"],
    aws: ["aws", "amazon web services"],
    "machine learning": ["machine learning"],
  });
}
