/**
 * Narrative explanations of a computed match.
 *
 * Explanation never feeds back into a score. Providers receive a summary of an
 * already frozen result and return prose in four labelled sections that
 * `parseExplanationSections` splits for display.
 */

import Groq from "groq-sdk";
import type { MatchCategory, MatchResult, SubScores } from "../../shared/schema";
import { classifyMatch } from "./hybrid-scorer";
import { logger } from "./logger";

export interface ExplanationInput {
  readonly compositeScore: number;
  readonly category: MatchCategory;
  readonly subScores: SubScores;
  readonly matchedSkills: readonly string[];
  readonly missingSkills: readonly string[];
  /** Best matching candidate sections, best first */
  readonly topSections: readonly string[];
  readonly roleExcerpt: string;
}

export interface ExplanationProvider {
  readonly name: string;
  explain(input: ExplanationInput): string | Promise<string>;
}

export interface ExplanationSections {
  readonly explanation: string;
  readonly strengths: string[];
  readonly gaps: string[];
  readonly suggestions: string[];
}

const MAX_TOP_SECTIONS = 3;
const MAX_ROLE_EXCERPT_CHARS = 1000;
const MAX_LISTED_SKILLS = 10;

function formatPercent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function listOr(values: readonly string[], fallback: string): string {
  return values.length > 0 ? values.slice(0, MAX_LISTED_SKILLS).join(", ") : fallback;
}

export function buildExplanationInput(result: MatchResult, roleText: string): ExplanationInput {
  const { breakdown } = result;
  return {
    compositeScore: result.compositeScore,
    category: classifyMatch(result.compositeScore).category,
    subScores: breakdown.subScores,
    matchedSkills: breakdown.skills.matched,
    missingSkills: breakdown.skills.missingRequired,
    topSections: breakdown.topMatches.slice(0, MAX_TOP_SECTIONS).map((match) => match.chunk.text),
    roleExcerpt: roleText.slice(0, MAX_ROLE_EXCERPT_CHARS),
  };
}

// ===== PROMPT =====

export function buildExplanationPrompt(input: ExplanationInput): string {
  return `You are an expert technical recruiter analyzing a resume-job match.

JOB REQUIREMENTS:
${input.roleExcerpt}

TOP MATCHING RESUME SECTIONS:
${input.topSections.join("\n\n---\n\n")}

MATCH DATA:
- Overall Score: ${formatPercent(input.compositeScore)}
- Technical Skills: ${formatPercent(input.subScores.technicalSkill)}
- Semantic Similarity: ${formatPercent(input.subScores.semantic)}
- Experience: ${formatPercent(input.subScores.experience)}
- Education: ${formatPercent(input.subScores.education)}
- Matched Skills: ${listOr(input.matchedSkills, "None found")}
- Missing Skills: ${listOr(input.missingSkills, "None")}

Provide a concise analysis in this EXACT format:

EXPLANATION:
[2-3 sentences explaining why this candidate matches or doesn't match]

STRENGTHS:
- [Key strength 1]
- [Key strength 2]
- [Key strength 3]

GAPS:
- [Gap 1]
- [Gap 2]

SUGGESTIONS:
- [Actionable suggestion 1]
- [Actionable suggestion 2]

Keep it professional, specific, and actionable.`;
}

// ===== PROVIDERS =====

export interface ChatCompletionRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Sends one user prompt and returns the reply text
 */
export interface ChatClient {
  complete(request: ChatCompletionRequest): Promise<string | null>;
}

export function createGroqChatClient(apiKey: string): ChatClient {
  const groq = new Groq({ apiKey });
  return {
    async complete(request) {
      const response = await groq.chat.completions.create({
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        stream: false,
      });
      return response.choices[0]?.message?.content ?? null;
    },
  };
}

export const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile";

export interface GroqExplanationProviderOptions {
  apiKey?: string;
  model?: string;
  client?: ChatClient;
}

export class GroqExplanationProvider implements ExplanationProvider {
  readonly name = "groq";
  private readonly client: ChatClient;
  private readonly model: string;

  constructor(options: GroqExplanationProviderOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = createGroqChatClient(options.apiKey);
    } else {
      throw new Error("GroqExplanationProvider needs an API key or a client");
    }
    this.model = options.model ?? DEFAULT_GROQ_MODEL;
  }

  async explain(input: ExplanationInput): Promise<string> {
    const content = await this.client.complete({
      model: this.model,
      prompt: buildExplanationPrompt(input),
      // Focused, repeatable prose
      temperature: 0.3,
      maxTokens: 500,
    });

    if (!content || content.trim() === "") {
      throw new Error("No response content from Groq API");
    }

    logger.debug({ model: this.model, length: content.length }, "Groq explanation generated");
    return content;
  }
}

/**
 * Deterministic explanation built from the match data alone, used when no
 * language model is configured
 */
export class TemplateExplanationProvider implements ExplanationProvider {
  readonly name = "template";

  explain(input: ExplanationInput): string {
    const matched = input.matchedSkills;
    const missing = input.missingSkills;

    const strengths = [
      matched.length > 0 ? `Matches ${matched.length} role skills` : "Some relevant experience found",
      `Semantic similarity of ${formatPercent(input.subScores.semantic)} with the role`,
      input.subScores.experience >= 1 ? "Experience meets the stated requirement" : "Relevant work history",
    ];
    const gaps = [
      missing.length > 0
        ? `Missing ${missing.length} key skills: ${missing.slice(0, 5).join(", ")}`
        : "Some skills need verification",
      "Consider adding more specific technical details",
    ];

    return [
      "EXPLANATION:",
      `This candidate has a ${formatPercent(input.compositeScore)} match based on semantic analysis and keyword matching.`,
      "",
      "STRENGTHS:",
      ...strengths.map((item) => `- ${item}`),
      "",
      "GAPS:",
      ...gaps.map((item) => `- ${item}`),
      "",
      "SUGGESTIONS:",
      "- Highlight specific tools and technologies used",
      "- Quantify achievements with numbers and metrics",
      "- Add relevant certifications if available",
    ].join("\n");
  }
}

// ===== PARSING =====

type SectionName = "explanation" | "strengths" | "gaps" | "suggestions";

const SECTION_LABELS: ReadonlyArray<readonly [string, SectionName]> = [
  ["EXPLANATION:", "explanation"],
  ["STRENGTHS:", "strengths"],
  ["GAPS:", "gaps"],
  ["SUGGESTIONS:", "suggestions"],
];

/**
 * Splits provider prose into its labelled sections. Keeps at most three
 * strengths, two gaps and three suggestions.
 */
export function parseExplanationSections(text: string): ExplanationSections {
  let explanation = "";
  const strengths: string[] = [];
  const gaps: string[] = [];
  const suggestions: string[] = [];
  let current: SectionName | null = null;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    const label = SECTION_LABELS.find(([prefix]) => line.startsWith(prefix));

    if (label) {
      current = label[1];
      if (current === "explanation") {
        explanation = line.slice(label[0].length).trim();
      }
    } else if (line.startsWith("-") || line.startsWith("•")) {
      const item = line.replace(/^[-•]+/, "").trim();
      if (current === "strengths") {
        strengths.push(item);
      } else if (current === "gaps") {
        gaps.push(item);
      } else if (current === "suggestions") {
        suggestions.push(item);
      }
    } else if (current === "explanation" && line !== "") {
      explanation = explanation === "" ? line : `${explanation} ${line}`;
    }
  }

  return {
    explanation: explanation || text.slice(0, 200),
    strengths: strengths.slice(0, 3),
    gaps: gaps.slice(0, 2),
    suggestions: suggestions.slice(0, 3),
  };
}

// ===== SUGGESTIONS =====

const CLOUD_PLATFORMS = ["aws", "azure", "gcp"];

/**
 * Concrete next steps for the candidate, from the skills they are missing.
 * The python and cloud hints only follow from missing required skills.
 */
export function getImprovementSuggestions(
  missingRequired: readonly string[],
  matchedSkills: readonly string[],
  missingPreferred: readonly string[] = [],
): string[] {
  const suggestions: string[] = [];
  const missing = [...missingRequired, ...missingPreferred];

  if (missing.length > 0) {
    suggestions.push(`Add these key skills to your resume: ${missing.slice(0, 5).join(", ")}`);
  }

  if (matchedSkills.length < 5) {
    suggestions.push("Expand your technical skills section with more specific tools and frameworks");
  }

  if (missingRequired.includes("python")) {
    suggestions.push("Python is required - add Python projects to your experience section");
  }

  if (CLOUD_PLATFORMS.some((platform) => missingRequired.includes(platform))) {
    suggestions.push("Consider getting cloud platform experience (AWS/Azure/GCP)");
  }

  if (suggestions.length === 0) {
    suggestions.push("Strong skill match! Consider highlighting achievements and impact in your experience");
  }

  return suggestions;
}
