/**
 * Requirement Section Classifier Tests
 */

import { describe, it, expect } from "@jest/globals";
import {
  classifyLines,
  levelForState,
  parseHeading,
  stateForHeading,
} from "../../../server/lib/requirement-sections";

describe("parseHeading", () => {
  it("recognises markdown headings", () => {
    expect(parseHeading("## Requirements")).toBe("Requirements");
  });

  it("recognises short lines ending in a colon", () => {
    expect(parseHeading("Nice to have:")).toBe("Nice to have");
    expect(parseHeading("Experience: Kafka is a plus")).toBe("Experience");
  });

  it("recognises short marker lines and upper-case lines", () => {
    expect(parseHeading("Nice to have")).toBe("Nice to have");
    expect(parseHeading("ABOUT US")).toBe("ABOUT US");
  });

  it("treats bullets, urls and prose as content", () => {
    expect(parseHeading("- Python: 3 years")).toBeNull();
    expect(parseHeading("See https://example.com for details")).toBeNull();
    expect(parseHeading("We build data tools for hospitals")).toBeNull();
    expect(parseHeading("   ")).toBeNull();
  });
});

describe("stateForHeading", () => {
  it("checks preferred markers before required ones", () => {
    expect(stateForHeading("Preferred Qualifications").kind).toBe("under_preferred_heading");
  });

  it("maps headings to their sections", () => {
    expect(stateForHeading("Requirements").kind).toBe("under_required_heading");
    expect(stateForHeading("Benefits").kind).toBe("under_ignored_heading");
    expect(stateForHeading("Responsibilities").kind).toBe("unclassified");
  });

  it("treats unclassified lines as required", () => {
    expect(levelForState({ kind: "unclassified" })).toBe("required");
  });
});

describe("classifyLines", () => {
  const role = [
    "Senior Data Engineer",
    "Requirements:",
    "- Python and SQL",
    "- Kafka is a plus",
    "",
    "Nice to have:",
    "- Scala",
    "Benefits:",
    "- Free Docker training",
  ].join("\n");

  it("tags each non-empty line with its level", () => {
    const lines = classifyLines(role);

    expect(lines.map((line) => line.level)).toEqual([
      "required",
      "required",
      "required",
      "preferred",
      "preferred",
      "preferred",
      "ignored",
      "ignored",
    ]);
    expect(lines.map((line) => line.lineNumber)).toEqual([1, 2, 3, 4, 6, 7, 8, 9]);
    expect(lines[1].isHeading).toBe(true);
    expect(lines[2].isHeading).toBe(false);
  });

  it("keeps an inline qualifier on a line whose heading is not a section", () => {
    const [line] = classifyLines("Experience: Kafka is a plus");

    expect(line.state.kind).toBe("unclassified");
    expect(line.level).toBe("preferred");
  });

  it("treats an upper-case line naming no section as content", () => {
    const lines = classifyLines("Nice to have:\nSQL, AWS\n- Docker");

    expect(lines.map((line) => [line.isHeading, line.level])).toEqual([
      [true, "preferred"],
      [false, "preferred"],
      [false, "preferred"],
    ]);
    expect(lines[2].state.kind).toBe("under_preferred_heading");
  });

  it("still opens a section from an upper-case marker line", () => {
    const lines = classifyLines("Requirements:\n- Python\nNICE TO HAVE\n- Scala");

    expect(lines[2].isHeading).toBe(true);
    expect(lines[3].level).toBe("preferred");
  });

  it("lets an unrecognised heading close the previous section", () => {
    const lines = classifyLines("Nice to have:\n- Scala\nResponsibilities:\n- Python");

    expect(lines[3].state.kind).toBe("unclassified");
    expect(lines[3].level).toBe("required");
  });
});
