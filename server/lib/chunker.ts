import type { Chunk } from "../../shared/schema";
import { validateChunking } from "../config/scoring-config";

const WORD_PATTERN = /\S+/g;

interface WordSpan {
  start: number;
  end: number;
}

function findWords(text: string): WordSpan[] {
  const words: WordSpan[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0;
    words.push({ start, end: start + match[0].length });
  }
  return words;
}

/**
 * Splits text into overlapping windows of whole words.
 *
 * Consecutive chunks share exactly `overlapWords` words. Offsets point into the
 * original text, so `text.slice(chunk.startOffset, chunk.endOffset)` is the
 * chunk's text with its original spacing.
 */
export function chunkText(
  text: string,
  windowSizeWords: number,
  overlapWords: number,
): Chunk[] {
  validateChunking(windowSizeWords, overlapWords);

  const words = findWords(text);
  if (words.length === 0) {
    return [];
  }

  const step = windowSizeWords - overlapWords;
  const chunks: Chunk[] = [];

  for (let start = 0; ; start += step) {
    const end = Math.min(start + windowSizeWords, words.length);
    const startOffset = words[start].start;
    const endOffset = words[end - 1].end;

    chunks.push({
      text: text.slice(startOffset, endOffset),
      startOffset,
      endOffset,
    });

    // Stop once the window reaches the final word; a further window would
    // only repeat words already covered.
    if (end === words.length) {
      break;
    }
  }

  return chunks;
}

/**
 * Number of words in a chunk (or any text), counted the way the chunker does
 */
export function countWords(text: string): number {
  return findWords(text).length;
}
