import { ModelType, Service, type IAgentRuntime } from "@elizaos/core";

import { loadAnalysisSettings, type ArgumentaSettings } from "../config/AnalysisSettings";
import { SUGGESTION_DEFAULTS } from "../config/constants";
import { ArgumentaError, ErrorCode } from "../errors";
import { createLogger } from "../utils/logger";
import type { ArgumentSuggestion, Component, ComponentKind } from "./ArgumentAnalysis.types";

const log = createLogger({ service: "SuggestionService" });

const SYSTEM_PROMPT =
  "Eres un experto en argumentación académica. Responde de forma clara y concisa.";

const KIND_PROMPT_LABEL: Record<ComponentKind, string> = {
  premise: "PREMISA",
  conclusion: "CONCLUSIÓN",
};

const SUGGESTION_TITLES: Record<ComponentKind, string> = {
  premise: "Fortalece esta premisa",
  conclusion: "Mejora esta conclusión",
};

export const FALLBACK_RECOMMENDATIONS =
  "Recomendaciones para mejorar tu argumento:\n\n" +
  "1. Fortalece las premisas con más evidencia\n" +
  "2. Clarifica la conexión lógica\n" +
  "3. Considera contrargumentos";

export function buildComponentPrompt(kind: ComponentKind, text: string): string {
  return (
    `${SYSTEM_PROMPT}\n\n` +
    `Analiza esta ${KIND_PROMPT_LABEL[kind]}:\n\n"${text}"\n\n` +
    "Proporciona UNA sugerencia específica y práctica para mejorarla. " +
    "Sé conciso y directo (máximo 2 oraciones)."
  );
}

export function buildRecommendationsPrompt(premises: readonly string[], conclusions: readonly string[]): string {
  const sections = [
    SYSTEM_PROMPT,
    "A continuación verás premisas y conclusiones extraídas de un texto. " +
      "Para cada una escribe exactamente una sugerencia clara y aplicable, " +
      "en un párrafo propio, sin títulos ni numeración.",
  ];
  if (premises.length > 0) {
    sections.push("Premisas:\n" + premises.map((p) => `- ${p}`).join("\n"));
  }
  if (conclusions.length > 0) {
    sections.push("Conclusiones:\n" + conclusions.map((c) => `- ${c}`).join("\n"));
  }
  sections.push("Ahora, genera las sugerencias solicitadas.");
  return sections.join("\n\n");
}

/**
 * SuggestionService
 * - Asks the runtime's small text model for improvement suggestions.
 * - Per-component failures are logged and skipped; recommendations fall
 *   back to a fixed text when the model is unavailable or disabled.
 */
export class SuggestionService extends Service {
  static readonly serviceType = "argument_suggestions";

  override capabilityDescription =
    "Generates improvement suggestions for extracted premises and conclusions using the agent's language model.";

  private readonly settings: ArgumentaSettings;

  static async start(runtime: IAgentRuntime): Promise<SuggestionService> {
    return new SuggestionService(runtime);
  }

  constructor(runtime: IAgentRuntime, settings?: ArgumentaSettings) {
    super(runtime);
    this.settings = settings ?? loadAnalysisSettings(runtime);
  }

  override async stop(): Promise<void> {
    // stateless
  }

  isEnabled(): boolean {
    return this.settings.suggestionsEnabled;
  }

  private async complete(prompt: string, maxTokens: number): Promise<string> {
    let result: unknown;
    try {
      result = await this.runtime.useModel(ModelType.TEXT_SMALL, {
        prompt,
        maxTokens,
        temperature: SUGGESTION_DEFAULTS.TEMPERATURE,
      });
    } catch (error) {
      throw new ArgumentaError("Language model call failed", ErrorCode.MODEL_CALL_FAILED, {
        operation: "suggestions.complete",
      }, { cause: error instanceof Error ? error : new Error(String(error)) });
    }

    if (typeof result !== "string" || result.trim() === "") {
      throw new ArgumentaError("Language model returned no text", ErrorCode.MODEL_CALL_FAILED, {
        operation: "suggestions.complete",
      });
    }
    return result.trim();
  }

  async suggestForComponent(component: Component): Promise<ArgumentSuggestion> {
    const explanation = await this.complete(
      buildComponentPrompt(component.kind, component.text),
      this.settings.maxSuggestionTokens
    );
    return Object.freeze({
      componentKind: component.kind,
      originalText: component.text,
      suggestion: SUGGESTION_TITLES[component.kind],
      explanation,
      applied: false,
    });
  }

  /** One suggestion per component, premises first. Failed calls are skipped. */
  async suggestForComponents(
    premises: readonly Component[],
    conclusions: readonly Component[]
  ): Promise<ArgumentSuggestion[]> {
    if (!this.isEnabled()) return [];

    const suggestions: ArgumentSuggestion[] = [];
    for (const component of [...premises, ...conclusions]) {
      try {
        suggestions.push(await this.suggestForComponent(component));
      } catch (error) {
        log.warn("Skipping suggestion for component", {
          kind: component.kind,
          sequenceOrder: component.sequenceOrder,
        }, error);
      }
    }
    return suggestions;
  }

  async generateRecommendations(
    premises: readonly string[],
    conclusions: readonly string[]
  ): Promise<string> {
    if (!this.isEnabled() || (premises.length === 0 && conclusions.length === 0)) {
      return FALLBACK_RECOMMENDATIONS;
    }

    try {
      return await this.complete(
        buildRecommendationsPrompt(premises, conclusions),
        SUGGESTION_DEFAULTS.RECOMMENDATIONS_MAX_TOKENS
      );
    } catch (error) {
      log.warn("Falling back to default recommendations", {}, error);
      return FALLBACK_RECOMMENDATIONS;
    }
  }
}
