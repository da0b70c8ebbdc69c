/**
 * Argumentative strength of one paragraph.
 *
 * Deterministic heuristic over component counts, density and length.
 * No randomness, no model calls.
 */

import {
  RECOMMENDATION_LIMITS,
  SCORING,
  STRENGTH_THRESHOLDS,
  WEAKEST_CATEGORY,
} from "../config/constants";
import type {
  Paragraph,
  ParagraphSpan,
  PlaceableComponent,
  RecommendationKind,
  StrengthCategory,
} from "./ArgumentAnalysis.types";

export const RECOMMENDATION_MESSAGES: Readonly<Record<RecommendationKind, string>> = {
  "add-supporting-premises": "Añade premisas que sustenten tus afirmaciones",
  "add-synthesizing-conclusion": "Incluye conclusiones que sinteticen las ideas",
  "make-concise-or-add-argumentation":
    "Considera hacer el párrafo más conciso o añadir más argumentación",
  "split-paragraph": "Párrafo extenso, considera dividirlo para mayor claridad",
};

export interface StrengthResult {
  score: number;
  category: StrengthCategory;
}

export interface Recommendation {
  kind: RecommendationKind;
  message: string;
}

function hasValidOffsets(
  c: PlaceableComponent
): c is PlaceableComponent & { startPos: number; endPos: number } {
  return (
    typeof c.startPos === "number" &&
    typeof c.endPos === "number" &&
    Number.isFinite(c.startPos) &&
    Number.isFinite(c.endPos)
  );
}

/**
 * Whether a component belongs to a paragraph: its midpoint lies in
 * [startPos, endPos). Components without offsets fall back to text containment.
 */
export function isInParagraph(span: ParagraphSpan, component: PlaceableComponent): boolean {
  if (hasValidOffsets(component)) {
    const center = (component.startPos + component.endPos) / 2;
    return span.startPos <= center && center < span.endPos;
  }
  return span.text.includes(component.text);
}

export function countComponentsInParagraph(
  span: ParagraphSpan,
  components: readonly PlaceableComponent[]
): number {
  return components.filter((c) => isInParagraph(span, c)).length;
}

export function computeDensity(componentCount: number, wordCount: number): number {
  return wordCount > 0 ? componentCount / wordCount : 0;
}

export function categorize(score: number): StrengthCategory {
  for (const { min, category } of STRENGTH_THRESHOLDS) {
    if (score >= min) return category;
  }
  return WEAKEST_CATEGORY;
}

export function calculateStrength(
  premisesCount: number,
  conclusionsCount: number,
  wordCount: number,
  density: number
): StrengthResult {
  let score = premisesCount * SCORING.PREMISE_WEIGHT + conclusionsCount * SCORING.CONCLUSION_WEIGHT;

  if (density > SCORING.DENSITY_BONUS_THRESHOLD) {
    score += SCORING.DENSITY_BONUS;
  }

  if (premisesCount > 0 && conclusionsCount > 0) {
    score += SCORING.BALANCE_BONUS;
  }

  // Long paragraphs with no argumentation at all lose points
  if (premisesCount + conclusionsCount === 0) {
    score -= Math.floor(wordCount / SCORING.EMPTY_PENALTY_WORDS) * SCORING.EMPTY_PENALTY;
  }

  score = Math.max(SCORING.MIN_SCORE, Math.min(SCORING.MAX_SCORE, score));

  return { score, category: categorize(score) };
}

/** First matching rule wins; null when the paragraph needs nothing. */
export function generateRecommendation(
  premisesCount: number,
  conclusionsCount: number,
  density: number,
  wordCount: number
): Recommendation | null {
  let kind: RecommendationKind | null = null;

  if (premisesCount === 0) {
    kind = "add-supporting-premises";
  } else if (conclusionsCount === 0) {
    kind = "add-synthesizing-conclusion";
  } else if (density < RECOMMENDATION_LIMITS.LOW_DENSITY) {
    kind = "make-concise-or-add-argumentation";
  } else if (wordCount > RECOMMENDATION_LIMITS.LONG_PARAGRAPH_WORDS) {
    kind = "split-paragraph";
  }

  return kind ? { kind, message: RECOMMENDATION_MESSAGES[kind] } : null;
}

export function scoreParagraph(
  span: ParagraphSpan,
  premises: readonly PlaceableComponent[],
  conclusions: readonly PlaceableComponent[]
): Paragraph {
  const premisesCount = countComponentsInParagraph(span, premises);
  const conclusionsCount = countComponentsInParagraph(span, conclusions);
  const density = computeDensity(premisesCount + conclusionsCount, span.wordCount);
  const { score, category } = calculateStrength(premisesCount, conclusionsCount, span.wordCount, density);
  const recommendation = generateRecommendation(premisesCount, conclusionsCount, density, span.wordCount);

  return Object.freeze({
    index: span.index,
    text: span.text,
    startPos: span.startPos,
    endPos: span.endPos,
    wordCount: span.wordCount,
    premisesCount,
    conclusionsCount,
    density,
    strengthScore: score,
    strengthCategory: category,
    recommendation: recommendation?.message ?? null,
    recommendationKind: recommendation?.kind ?? null,
  });
}
