/**
 * Requirement Section Classifier
 *
 * Walks a role document line by line and tags every line as required,
 * preferred or ignored. The walk is a small state machine whose states are the
 * variants of `SectionState`; headings move between states, content lines take
 * the level of the current state. Anything the classifier cannot place is
 * treated as required.
 */

export type SectionState =
  | { readonly kind: "unclassified" }
  | { readonly kind: "under_required_heading"; readonly heading: string }
  | { readonly kind: "under_preferred_heading"; readonly heading: string }
  | { readonly kind: "under_ignored_heading"; readonly heading: string };

export type RequirementLevel = "required" | "preferred" | "ignored";

export interface ClassifiedLine {
  readonly text: string;
  readonly lineNumber: number;
  readonly isHeading: boolean;
  readonly state: SectionState;
  readonly level: RequirementLevel;
}

export const INITIAL_SECTION_STATE: SectionState = Object.freeze({ kind: "unclassified" });

function phrase(source: string): RegExp {
  return new RegExp(`(?<![a-z])(?:${source})(?![a-z])`, "i");
}

// Company boilerplate whose skill mentions are not requirements
const IGNORED_HEADING_MARKERS = [
  phrase("about (?:us|the company|the team)"),
  phrase("who we are"),
  phrase("our (?:mission|values|culture|story)"),
  phrase("benefits"),
  phrase("perks"),
  phrase("compensation"),
  phrase("salary"),
  phrase("what we offer"),
  phrase("equal (?:employment )?opportunity"),
  phrase("how to apply"),
  phrase("application process"),
];

const PREFERRED_HEADING_MARKERS = [
  phrase("preferred"),
  phrase("nice[\\s-]to[\\s-]haves?"),
  phrase("bonus(?: points)?"),
  phrase("desired"),
  phrase("desirable"),
  phrase("good[\\s-]to[\\s-]have"),
  phrase("a plus"),
  phrase("pluses"),
  phrase("optional"),
];

const REQUIRED_HEADING_MARKERS = [
  phrase("required"),
  phrase("requirements?"),
  phrase("must[\\s-]haves?"),
  phrase("qualifications?"),
  phrase("minimum"),
  phrase("what you(?:'ll| will)? need"),
  phrase("essential"),
  phrase("mandatory"),
];

// Qualifiers that mark a single content line without opening a section
const INLINE_REQUIRED_MARKERS = [
  phrase("required"),
  phrase("must[\\s-]have"),
  phrase("mandatory"),
  phrase("essential"),
];

const INLINE_PREFERRED_MARKERS = [
  phrase("preferred"),
  phrase("nice[\\s-]to[\\s-]have"),
  phrase("a plus"),
  phrase("bonus"),
  phrase("desired"),
  phrase("desirable"),
  phrase("good[\\s-]to[\\s-]have"),
];

const BULLET_PATTERN = /^(?:[-*•·▪]|\d+[.)])\s+/;
const MARKDOWN_HEADING_PATTERN = /^#{1,6}\s+(.+)$/;
const COLON_HEADING_PATTERN = /^([^:]+):(?!\/\/)/;

const MAX_COLON_HEADING_WORDS = 6;
const MAX_BARE_HEADING_WORDS = 4;
const MAX_UPPERCASE_HEADING_WORDS = 6;

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

function wordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

function hasHeadingMarker(text: string): boolean {
  return (
    matchesAny(text, IGNORED_HEADING_MARKERS) ||
    matchesAny(text, PREFERRED_HEADING_MARKERS) ||
    matchesAny(text, REQUIRED_HEADING_MARKERS)
  );
}

interface HeadingMatch {
  readonly text: string;
  /** Markdown or colon headings; bare upper-case lines are not explicit */
  readonly explicit: boolean;
}

function detectHeading(line: string): HeadingMatch | null {
  const trimmed = line.trim();
  if (trimmed === "") {
    return null;
  }

  const markdown = MARKDOWN_HEADING_PATTERN.exec(trimmed);
  if (markdown) {
    return { text: markdown[1].trim(), explicit: true };
  }

  // Bullets are content, even when they contain a colon
  if (BULLET_PATTERN.test(trimmed)) {
    return null;
  }

  const colon = COLON_HEADING_PATTERN.exec(trimmed);
  if (colon && wordCount(colon[1]) <= MAX_COLON_HEADING_WORDS) {
    return { text: colon[1].trim(), explicit: true };
  }

  const words = wordCount(trimmed);
  if (words <= MAX_BARE_HEADING_WORDS && hasHeadingMarker(trimmed)) {
    return { text: trimmed, explicit: false };
  }

  if (
    words <= MAX_UPPERCASE_HEADING_WORDS &&
    /[A-Z]/.test(trimmed) &&
    trimmed === trimmed.toUpperCase()
  ) {
    return { text: trimmed, explicit: false };
  }

  return null;
}

/**
 * Returns the heading text when the line reads as a section heading
 */
export function parseHeading(line: string): string | null {
  return detectHeading(line)?.text ?? null;
}

/**
 * State entered after a heading. Preferred markers win over required ones so
 * "Preferred Qualifications" opens a preferred section.
 */
export function stateForHeading(heading: string): SectionState {
  if (matchesAny(heading, IGNORED_HEADING_MARKERS)) {
    return { kind: "under_ignored_heading", heading };
  }
  if (matchesAny(heading, PREFERRED_HEADING_MARKERS)) {
    return { kind: "under_preferred_heading", heading };
  }
  if (matchesAny(heading, REQUIRED_HEADING_MARKERS)) {
    return { kind: "under_required_heading", heading };
  }
  return INITIAL_SECTION_STATE;
}

export function levelForState(state: SectionState): RequirementLevel {
  switch (state.kind) {
    case "under_ignored_heading":
      return "ignored";
    case "under_preferred_heading":
      return "preferred";
    case "under_required_heading":
    case "unclassified":
      return "required";
  }
}

function levelForContentLine(line: string, state: SectionState): RequirementLevel {
  const sectionLevel = levelForState(state);
  if (sectionLevel === "ignored") {
    return sectionLevel;
  }
  if (matchesAny(line, INLINE_REQUIRED_MARKERS)) {
    return "required";
  }
  if (matchesAny(line, INLINE_PREFERRED_MARKERS)) {
    return "preferred";
  }
  return sectionLevel;
}

/**
 * Tags every non-empty line of a role document with its requirement level
 */
export function classifyLines(text: string): ClassifiedLine[] {
  const classified: ClassifiedLine[] = [];
  let state: SectionState = INITIAL_SECTION_STATE;

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }

    const heading = detectHeading(line);
    const headingState = heading ? stateForHeading(heading.text) : INITIAL_SECTION_STATE;
    // A bare upper-case line naming no section ("AWS", "SQL, GCP") is content
    if (heading && (heading.explicit || headingState.kind !== "unclassified")) {
      state = headingState;
      classified.push({
        text: line,
        lineNumber: index + 1,
        isHeading: true,
        state,
        // "Experience: Kafka is a plus" keeps its inline qualifier
        level: state.kind === "unclassified" ? levelForContentLine(line, state) : levelForState(state),
      });
      return;
    }

    classified.push({
      text: line,
      lineNumber: index + 1,
      isHeading: false,
      state,
      level: levelForContentLine(line, state),
    });
  });

  return classified;
}
