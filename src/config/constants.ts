/**
 * Centralized constants for plugin-argumenta
 */

export const TAGGER_DEFAULTS = {
  TIMEOUT_MS: 20_000,
  LANGUAGE: "es",
  TAG_PATH: "/tag",
  HEALTH_PATH: "/health",
  USER_AGENT: "plugin-argumenta/0.1",
} as const;

export const SEGMENTER_DEFAULTS = {
  /** Blank-line boundary between paragraph candidates */
  PARAGRAPH_SEPARATOR: "\n\n",
  /** Candidates with fewer words are not paragraphs */
  MIN_PARAGRAPH_WORDS: 10,
} as const;

export const SCORING = {
  PREMISE_WEIGHT: 15,
  CONCLUSION_WEIGHT: 20,
  /** Bonus when density is strictly above DENSITY_BONUS_THRESHOLD */
  DENSITY_BONUS: 20,
  DENSITY_BONUS_THRESHOLD: 0.15,
  /** Bonus for paragraphs holding both premises and conclusions */
  BALANCE_BONUS: 10,
  /** Penalty per EMPTY_PENALTY_WORDS words in a paragraph without components */
  EMPTY_PENALTY: 5,
  EMPTY_PENALTY_WORDS: 50,
  MIN_SCORE: 0,
  MAX_SCORE: 100,
} as const;

/** Lower score bound of each category, checked in order */
export const STRENGTH_THRESHOLDS = [
  { min: 70, category: "muy fuerte" },
  { min: 50, category: "fuerte" },
  { min: 30, category: "moderada" },
] as const;

export const WEAKEST_CATEGORY = "débil";

export const RECOMMENDATION_LIMITS = {
  LOW_DENSITY: 0.1,
  LONG_PARAGRAPH_WORDS: 150,
} as const;

export const SUGGESTION_DEFAULTS = {
  MAX_TOKENS: 150,
  RECOMMENDATIONS_MAX_TOKENS: 400,
  TEMPERATURE: 0.7,
} as const;

export const ANALYZER_VERSION = "1.0";

/** Digits kept for density on the wire */
export const DENSITY_DECIMALS = 3;
