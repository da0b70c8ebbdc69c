/**
 * OffsetAligner: Gives every token a [start, end) range in the source text.
 *
 * Tag sources do not always report character offsets (multi-word tokens,
 * retokenized contractions). Missing ranges are recovered with a
 * left-to-right literal search that never moves backwards, so a repeated
 * token cannot match an earlier occurrence.
 */

import type { AlignedToken, Token, TokenOffset } from "./ArgumentAnalysis.types";

function hasOffsets(token: Token): token is Token & { charStart: number; charEnd: number } {
  return (
    typeof token.charStart === "number" &&
    typeof token.charEnd === "number" &&
    Number.isFinite(token.charStart) &&
    Number.isFinite(token.charEnd)
  );
}

/**
 * Resolve an offset for every token, parallel to `tokens`.
 *
 * Tokens that carry offsets keep them and move the cursor to their end.
 * A token without offsets is searched for from the cursor; when the
 * search fails (normalization differences) it is placed at the cursor.
 */
export function alignOffsets(tokens: readonly Token[], text: string): TokenOffset[] {
  if (tokens.every(hasOffsets)) {
    return tokens.map((t) => ({ start: t.charStart, end: t.charEnd }));
  }

  const offsets: TokenOffset[] = [];
  let cursor = 0;

  for (const token of tokens) {
    if (hasOffsets(token)) {
      offsets.push({ start: token.charStart, end: token.charEnd });
      cursor = token.charEnd;
      continue;
    }

    const found = text.indexOf(token.text, cursor);
    const start = found === -1 ? cursor : found;
    const end = start + token.text.length;
    offsets.push({ start, end });
    cursor = end;
  }

  return offsets;
}

export function alignTokens(tokens: readonly Token[], text: string): AlignedToken[] {
  const offsets = alignOffsets(tokens, text);
  return tokens.map((token, i) => ({
    text: token.text,
    pos: token.pos,
    start: offsets[i].start,
    end: offsets[i].end,
  }));
}
