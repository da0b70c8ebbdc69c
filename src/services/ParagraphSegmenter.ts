/**
 * Blank-line paragraphs with offsets into the source text.
 *
 * Candidates come from splitting on "\n\n" and trimming. Each kept
 * candidate is located again in the original text from a cursor that
 * only moves forward; a candidate that cannot be located is dropped.
 */

import { SEGMENTER_DEFAULTS } from "../config/constants";
import type { ParagraphSpan } from "./ArgumentAnalysis.types";

/** Count words in a string (split on whitespace, filter empties) */
export function countWords(text: string): number {
  const t = text.trim();
  if (!t) return 0;
  return t.split(/\s+/).length;
}

/** Collapse every whitespace run to a single space */
export function normalizeWhitespace(text: string): string {
  return text.trim().split(/\s+/).join(" ");
}

/**
 * Paragraph candidates in text order: trimmed, non-empty, and at least
 * MIN_PARAGRAPH_WORDS words long.
 */
export function splitIntoParagraphs(text: string): string[] {
  return text
    .split(SEGMENTER_DEFAULTS.PARAGRAPH_SEPARATOR)
    .map((p) => p.trim())
    .filter((p) => p.length > 0 && countWords(p) >= SEGMENTER_DEFAULTS.MIN_PARAGRAPH_WORDS);
}

/**
 * Split `text` into paragraphs and recover each one's [startPos, endPos).
 *
 * The exact trimmed paragraph is searched first, then its
 * whitespace-normalized form. endPos covers whichever string matched.
 */
export function segmentParagraphs(text: string): ParagraphSpan[] {
  const spans: ParagraphSpan[] = [];
  let cursor = 0;

  for (const paragraph of splitIntoParagraphs(text)) {
    let match = paragraph;
    let start = text.indexOf(match, cursor);

    if (start === -1) {
      match = normalizeWhitespace(paragraph);
      start = text.indexOf(match, cursor);
      if (start === -1) continue;
    }

    const end = start + match.length;
    spans.push(
      Object.freeze({
        index: spans.length,
        text: paragraph,
        startPos: start,
        endPos: end,
        wordCount: countWords(paragraph),
      })
    );
    cursor = end;
  }

  return spans;
}
