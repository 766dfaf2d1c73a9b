/**
 * Chunker Tests
 */

import { describe, it, expect } from "@jest/globals";
import { chunkText, countWords } from "../../../server/lib/chunker";
import { AppConfigError } from "../../../shared/errors";

const tenWords = "w0 w1 w2 w3 w4 w5 w6 w7 w8 w9";

describe("chunkText", () => {
  it("returns no chunks for empty or whitespace-only text", () => {
    expect(chunkText("", 200, 75)).toEqual([]);
    expect(chunkText("   \n\t  ", 200, 75)).toEqual([]);
  });

  it("returns one chunk spanning all words when the text is shorter than a window", () => {
    expect(chunkText("  a b c  ", 5, 2)).toEqual([{ text: "a b c", startOffset: 2, endOffset: 7 }]);
  });

  it("advances by window minus overlap and stops at the last word", () => {
    const chunks = chunkText(tenWords, 4, 1);

    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "w0 w1 w2 w3",
      "w3 w4 w5 w6",
      "w6 w7 w8 w9",
    ]);
  });

  it("keeps the original spacing between the offsets", () => {
    const text = "alpha  beta\ngamma delta";
    const chunks = chunkText(text, 2, 1);

    expect(chunks).toEqual([
      { text: "alpha  beta", startOffset: 0, endOffset: 11 },
      { text: "beta\ngamma", startOffset: 7, endOffset: 17 },
      { text: "gamma delta", startOffset: 12, endOffset: 23 },
    ]);
    for (const chunk of chunks) {
      expect(text.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.text);
    }
  });

  it("covers every word and overlaps consecutive chunks by exactly the overlap", () => {
    const words = Array.from({ length: 23 }, (_, i) => `word${i}`);
    const chunks = chunkText(words.join(" "), 5, 2);
    const chunkWords = chunks.map((chunk) => chunk.text.split(" "));

    expect(new Set(chunkWords.flat())).toEqual(new Set(words));
    expect(chunks[0].startOffset).toBe(0);
    expect(chunks[chunks.length - 1].endOffset).toBe(words.join(" ").length);

    for (let i = 1; i < chunkWords.length; i++) {
      expect(chunkWords[i].slice(0, 2)).toEqual(chunkWords[i - 1].slice(-2));
    }
  });

  it("works with zero overlap", () => {
    expect(chunkText("a b c d e", 2, 0).map((chunk) => chunk.text)).toEqual(["a b", "c d", "e"]);
  });

  it("rejects an overlap that is not smaller than the window", () => {
    expect(() => chunkText(tenWords, 3, 3)).toThrow(AppConfigError);
    expect(() => chunkText(tenWords, 3, 5)).toThrow("must be smaller than the chunk window");
  });

  it("rejects windows and overlaps that are not whole counts", () => {
    expect(() => chunkText(tenWords, 0, 0)).toThrow(AppConfigError);
    expect(() => chunkText(tenWords, 2.5, 1)).toThrow(AppConfigError);
    expect(() => chunkText(tenWords, 4, -1)).toThrow(AppConfigError);
  });

  it("validates the configuration even for empty text", () => {
    expect(() => chunkText("", 3, 3)).toThrow(AppConfigError);
  });
});

describe("countWords", () => {
  it("counts runs of non-whitespace", () => {
    expect(countWords("  c++ and  node.js!\n")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});
