/**
 * Value types shared by the analysis pipeline.
 * Everything here is built once per analysis call and never mutated.
 */

/** One token as produced by the tag source. Offsets may be missing. */
export interface Token {
  text: string;
  pos: string;
  charStart?: number | null;
  charEnd?: number | null;
}

/** Half-open character range [start, end) into the source text */
export interface TokenOffset {
  readonly start: number;
  readonly end: number;
}

export interface AlignedToken extends TokenOffset {
  readonly text: string;
  readonly pos: string;
}

/** Tokens plus the parallel label sequence returned by the tagger */
export interface TaggedText {
  tokens: readonly Token[];
  labels: readonly string[];
}

export type Label = "B-P" | "I-P" | "B-C" | "I-C" | "O";

export type ComponentKind = "premise" | "conclusion";

export interface Component {
  readonly kind: ComponentKind;
  /** Space-joined token texts; not always an exact substring of the source */
  readonly text: string;
  readonly tokens: readonly string[];
  readonly startPos: number;
  readonly endPos: number;
  /** 0-based rank among components of the same kind */
  readonly sequenceOrder: number;
}

export interface ExtractedComponents {
  readonly premises: readonly Component[];
  readonly conclusions: readonly Component[];
}

/**
 * Anything the scorer can place inside a paragraph. Components coming
 * back from storage may have lost their offsets.
 */
export interface PlaceableComponent {
  readonly text: string;
  readonly startPos?: number | null;
  readonly endPos?: number | null;
}

export interface ParagraphSpan {
  readonly index: number;       // 0-based among emitted paragraphs
  readonly text: string;        // trimmed paragraph text
  readonly startPos: number;    // char offset
  readonly endPos: number;      // char offset end (exclusive)
  readonly wordCount: number;
}

export type StrengthCategory = "muy fuerte" | "fuerte" | "moderada" | "débil";

export type RecommendationKind =
  | "add-supporting-premises"
  | "add-synthesizing-conclusion"
  | "make-concise-or-add-argumentation"
  | "split-paragraph";

export interface Paragraph extends ParagraphSpan {
  readonly premisesCount: number;
  readonly conclusionsCount: number;
  readonly density: number;
  readonly strengthScore: number;
  readonly strengthCategory: StrengthCategory;
  readonly recommendation: string | null;
  readonly recommendationKind: RecommendationKind | null;
}

export interface ArgumentAnalysis {
  readonly text: string;
  readonly premises: readonly Component[];
  readonly conclusions: readonly Component[];
  readonly paragraphs: readonly Paragraph[];
  readonly totalPremises: number;
  readonly totalConclusions: number;
  readonly analyzedAt: string;       // ISO timestamp
  readonly analyzerVersion: string;
}

/** Language-model suggestion for one component */
export interface ArgumentSuggestion {
  readonly componentKind: ComponentKind;
  readonly originalText: string;
  readonly suggestion: string;
  readonly explanation: string;
  readonly applied: boolean;
}
