import type { Plugin, IAgentRuntime } from "@elizaos/core";

import { loadAnalysisSettings } from "./config/AnalysisSettings";
import { createLogger } from "./utils/logger";

import { HttpService } from "./services/httpService";
import { ArgumentAnalysisService } from "./services/ArgumentAnalysisService";
import { SuggestionService } from "./services/SuggestionService";

import { AnalyzeArgumentAction } from "./actions/analyzeArgumentAction";
import { SuggestImprovementsAction } from "./actions/suggestImprovementsAction";

import { taggerStatusProvider } from "./providers/taggerStatusProvider";

const log = createLogger({ component: "plugin" });

/**
 * Plugin initialization. Reports the effective configuration; the tagger
 * itself is probed when ArgumentAnalysisService starts.
 */
async function initPlugin(_config: Record<string, string>, runtime: IAgentRuntime): Promise<void> {
  const settings = loadAnalysisSettings(runtime);
  log.info("Plugin loaded", {
    tagger: settings.taggerUrl ?? "none",
    language: settings.language,
    suggestions: settings.suggestionsEnabled,
  });
  if (!settings.taggerUrl) {
    log.warn("ARGUMENTA_TAGGER_URL is not set; ANALYZE_ARGUMENT will report the tagger as unavailable");
  }
}

export const argumentaPlugin: Plugin = {
  name: "plugin-argumenta",
  description:
    "Argumenta - argument mining for agents. " +
    "Extracts premises and conclusions from argumentative text, rates the strength of each paragraph, " +
    "and suggests improvements using the agent's language model.",
  init: initPlugin,
  services: [HttpService, ArgumentAnalysisService, SuggestionService],
  actions: [AnalyzeArgumentAction, SuggestImprovementsAction],
  providers: [taggerStatusProvider],
};

export default argumentaPlugin;

// ============================================================================
// RE-EXPORTS (for external consumers)
// ============================================================================

// Analysis core
export { alignOffsets, alignTokens } from "./services/OffsetAligner";
export { extractComponents, extractComponentTexts, normalizeLabel } from "./services/ComponentExtractor";
export { segmentParagraphs, splitIntoParagraphs, countWords } from "./services/ParagraphSegmenter";
export {
  calculateStrength,
  generateRecommendation,
  scoreParagraph,
  RECOMMENDATION_MESSAGES,
} from "./services/ParagraphScorer";
export { analyzeTaggedText, buildAnalysis, EMPTY_COMPONENTS } from "./services/ArgumentAnalyzer";

export type {
  Token,
  TaggedText,
  Label,
  ComponentKind,
  Component,
  ExtractedComponents,
  ParagraphSpan,
  Paragraph,
  StrengthCategory,
  RecommendationKind,
  ArgumentAnalysis,
  ArgumentSuggestion,
} from "./services/ArgumentAnalysis.types";

// Services
export { HttpService, type RequestOptions } from "./services/httpService";
export {
  TaggerClient,
  parseTaggerResponse,
  type TagSource,
  type JsonTransport,
  type TaggerClientOptions,
} from "./services/TaggerClient";
export { ArgumentAnalysisService, type ArgumentAnalysisServiceOptions } from "./services/ArgumentAnalysisService";
export { SuggestionService, FALLBACK_RECOMMENDATIONS } from "./services/SuggestionService";

// Wire format
export {
  serializeAnalysis,
  serializeComponent,
  serializeParagraph,
  serializeSuggestion,
  formatAnalysisSummary,
  type SerializedAnalysis,
  type SerializedComponent,
  type SerializedParagraph,
  type SerializedSuggestion,
} from "./serialization/analysisSerializer";

// Configuration
export {
  loadAnalysisSettings,
  mergeSettings,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  type ArgumentaSettings,
} from "./config/AnalysisSettings";

// Error types
export {
  ArgumentaError,
  ArgumentaNetworkError,
  ArgumentaValidationError,
  MisalignedSequenceError,
  InvalidLabelSequenceError,
  ErrorCode,
  wrapError,
  isArgumentaError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry } from "./utils/logger";
export { withRetry, RetryPresets, type RetryConfig } from "./utils/retry";
