import type { Action, ActionResult, Content, HandlerCallback, IAgentRuntime, Memory } from "@elizaos/core";
import { ArgumentaNetworkError, ArgumentaValidationError, isArgumentaError } from "../errors";
import { formatAnalysisSummary, serializeAnalysis } from "../serialization/analysisSerializer";
import { ArgumentAnalysisService } from "../services/ArgumentAnalysisService";
import { createLogger } from "../utils/logger";

const log = createLogger({ action: "ANALYZE_ARGUMENT" });

/**
 * The text to analyze: an explicit `argumentText` field, else whatever
 * follows the first colon, else the whole message. Trimmed; "" when empty.
 */
export function extractArgumentText(content: Content): string {
  if (typeof content.argumentText === "string") {
    return content.argumentText.trim();
  }
  const text = (content.text ?? "").trim();
  const colon = text.indexOf(":");
  if (colon !== -1) {
    const after = text.slice(colon + 1).trim();
    if (after.length > 0) return after;
  }
  return text;
}

export function getAnalysisService(runtime: IAgentRuntime): ArgumentAnalysisService {
  const svc = runtime.getService<ArgumentAnalysisService>(ArgumentAnalysisService.serviceType);
  if (!svc) {
    throw ArgumentaNetworkError.taggerUnavailable({ operation: "getAnalysisService" });
  }
  return svc;
}

/** Reply through the callback (if any) and build the failure result. */
export async function replyWithError(
  error: unknown,
  actionName: string,
  callback: HandlerCallback | undefined
): Promise<ActionResult> {
  const text = isArgumentaError(error)
    ? error.toUserMessage()
    : "Argument analysis failed unexpectedly.";
  if (callback) {
    await callback({ text, actions: [actionName] });
  }
  return {
    success: false,
    text,
    error: error instanceof Error ? error : new Error(String(error)),
  };
}

export const AnalyzeArgumentAction: Action = {
  name: "ANALYZE_ARGUMENT",
  description:
    "Identify the premises and conclusions in an argumentative text and rate the strength of each paragraph.",
  similes: [
    "ANALYZE_ARGUMENTS",
    "EXTRACT_PREMISES",
    "FIND_CONCLUSIONS",
    "ANALIZAR_ARGUMENTO",
    "ARGUMENT_STRENGTH",
  ],
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "Analiza este argumento: El cielo está nublado, por lo tanto lloverá." },
      },
      {
        name: "{{name2}}",
        content: {
          text: "Análisis del texto:\n\nPremisas identificadas:\n1. El cielo está nublado\n\nConclusiones identificadas:\n1. lloverá",
          actions: ["ANALYZE_ARGUMENT"],
        },
      },
    ],
  ],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = message.content.text ?? "";
    return /\b(analy[sz]e|anali[sz]a\w*|argument\w*|premis\w*|conclusi\w*)\b/i.test(text);
  },

  handler: async (runtime, message, _state, _options, callback): Promise<ActionResult> => {
    try {
      const text = extractArgumentText(message.content);
      if (!text) throw ArgumentaValidationError.missingText({ operation: "ANALYZE_ARGUMENT" });

      const svc = getAnalysisService(runtime);
      const analysis = await svc.analyze(text);
      if (!svc.isReady()) {
        throw ArgumentaNetworkError.taggerUnavailable({ operation: "ANALYZE_ARGUMENT" });
      }

      const reply = formatAnalysisSummary(analysis);
      if (callback) {
        await callback({ text: reply, actions: ["ANALYZE_ARGUMENT"] });
      }
      return {
        success: true,
        text: reply,
        values: {
          totalPremises: analysis.totalPremises,
          totalConclusions: analysis.totalConclusions,
        },
        data: { analysis: serializeAnalysis(analysis) },
      };
    } catch (error) {
      log.error("Argument analysis failed", {}, error);
      return replyWithError(error, "ANALYZE_ARGUMENT", callback);
    }
  },
};
