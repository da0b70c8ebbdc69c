import type { Action, ActionResult, IAgentRuntime, Memory } from "@elizaos/core";
import { ArgumentaNetworkError, ArgumentaValidationError } from "../errors";
import { serializeAnalysis } from "../serialization/analysisSerializer";
import { SuggestionService } from "../services/SuggestionService";
import { createLogger } from "../utils/logger";
import { extractArgumentText, getAnalysisService, replyWithError } from "./analyzeArgumentAction";

const log = createLogger({ action: "SUGGEST_ARGUMENT_IMPROVEMENTS" });

export const SuggestImprovementsAction: Action = {
  name: "SUGGEST_ARGUMENT_IMPROVEMENTS",
  description:
    "Analyze an argumentative text and suggest how to strengthen each premise and conclusion.",
  similes: [
    "IMPROVE_ARGUMENT",
    "ARGUMENT_RECOMMENDATIONS",
    "STRENGTHEN_ARGUMENT",
    "MEJORAR_ARGUMENTO",
  ],
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "¿Cómo puedo mejorar este argumento? Todos los estudiantes leen, así que aprobarán." },
      },
      {
        name: "{{name2}}",
        content: {
          text: "Aporta datos que muestren cuántos estudiantes leen con regularidad...",
          actions: ["SUGGEST_ARGUMENT_IMPROVEMENTS"],
        },
      },
    ],
  ],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = message.content.text ?? "";
    return /\b(improve|strengthen|suggest\w*|recommend\w*|mejora\w*|recomienda\w*|sugerencia\w*)\b/i.test(text);
  },

  handler: async (runtime, message, _state, _options, callback): Promise<ActionResult> => {
    try {
      const text = extractArgumentText(message.content);
      if (!text) throw ArgumentaValidationError.missingText({ operation: "SUGGEST_ARGUMENT_IMPROVEMENTS" });

      const analysisSvc = getAnalysisService(runtime);
      const analysis = await analysisSvc.analyze(text);
      if (!analysisSvc.isReady()) {
        throw ArgumentaNetworkError.taggerUnavailable({ operation: "SUGGEST_ARGUMENT_IMPROVEMENTS" });
      }

      const suggestionSvc =
        runtime.getService<SuggestionService>(SuggestionService.serviceType) ??
        new SuggestionService(runtime, analysisSvc.getSettings());

      const suggestions = await suggestionSvc.suggestForComponents(analysis.premises, analysis.conclusions);
      const recommendations = await suggestionSvc.generateRecommendations(
        analysis.premises.map((c) => c.text),
        analysis.conclusions.map((c) => c.text)
      );

      if (callback) {
        await callback({ text: recommendations, actions: ["SUGGEST_ARGUMENT_IMPROVEMENTS"] });
      }
      return {
        success: true,
        text: recommendations,
        values: { suggestionCount: suggestions.length },
        data: {
          recommendations,
          analysis: serializeAnalysis(analysis, suggestions),
        },
      };
    } catch (error) {
      log.error("Suggestion generation failed", {}, error);
      return replyWithError(error, "SUGGEST_ARGUMENT_IMPROVEMENTS", callback);
    }
  },
};
