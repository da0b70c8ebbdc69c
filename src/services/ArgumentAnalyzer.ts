/**
 * ArgumentAnalyzer: The full pipeline over one tagged text.
 *
 * align offsets → extract components → segment paragraphs → score paragraphs
 *
 * Pure functions, no runtime and no network. The tag source is called by
 * ArgumentAnalysisService; this module only consumes its output.
 */

import { ANALYZER_VERSION } from "../config/constants";
import { alignTokens } from "./OffsetAligner";
import { extractComponents } from "./ComponentExtractor";
import { segmentParagraphs } from "./ParagraphSegmenter";
import { scoreParagraph } from "./ParagraphScorer";
import type {
  ArgumentAnalysis,
  ExtractedComponents,
  Paragraph,
  PlaceableComponent,
  TaggedText,
} from "./ArgumentAnalysis.types";

export type {
  ArgumentAnalysis,
  Component,
  Paragraph,
  TaggedText,
  Token,
} from "./ArgumentAnalysis.types";

export const EMPTY_COMPONENTS: ExtractedComponents = Object.freeze({
  premises: Object.freeze([]),
  conclusions: Object.freeze([]),
});

/** Components of a tagged text, with offsets resolved against `text` */
export function extractFromTaggedText(text: string, tagged: TaggedText): ExtractedComponents {
  if (tagged.tokens.length === 0 && tagged.labels.length === 0) {
    return EMPTY_COMPONENTS;
  }
  return extractComponents(alignTokens(tagged.tokens, text), tagged.labels);
}

export function analyzeParagraphs(
  text: string,
  premises: readonly PlaceableComponent[],
  conclusions: readonly PlaceableComponent[]
): Paragraph[] {
  return segmentParagraphs(text).map((span) => scoreParagraph(span, premises, conclusions));
}

/** Build the analysis record from components that were already extracted. */
export function buildAnalysis(text: string, components: ExtractedComponents): ArgumentAnalysis {
  const paragraphs = analyzeParagraphs(text, components.premises, components.conclusions);

  return Object.freeze({
    text,
    premises: components.premises,
    conclusions: components.conclusions,
    paragraphs: Object.freeze(paragraphs),
    totalPremises: components.premises.length,
    totalConclusions: components.conclusions.length,
    analyzedAt: new Date().toISOString(),
    analyzerVersion: ANALYZER_VERSION,
  });
}

/**
 * Analyze a text from the tag source's output.
 * An empty token list yields no components; paragraphs are still scored.
 */
export function analyzeTaggedText(text: string, tagged: TaggedText): ArgumentAnalysis {
  return buildAnalysis(text, extractFromTaggedText(text, tagged));
}
