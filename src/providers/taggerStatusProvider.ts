import type { IAgentRuntime, Memory, Provider, ProviderResult, State } from "@elizaos/core";
import { ArgumentAnalysisService } from "../services/ArgumentAnalysisService";

/**
 * TaggerStatusProvider
 *
 * Lets the agent know whether it can analyze arguments right now, so it
 * does not promise an analysis the tagger cannot deliver.
 */
export const taggerStatusProvider: Provider = {
  name: "ARGUMENT_TAGGER_STATUS",
  description: "Whether argument component extraction is currently available.",
  position: -5,

  async get(runtime: IAgentRuntime, _message: Memory, _state: State): Promise<ProviderResult> {
    const svc = runtime.getService<ArgumentAnalysisService>(ArgumentAnalysisService.serviceType);
    const ready = svc?.isReady() ?? false;

    return {
      text: ready
        ? "You can analyze argumentative texts (premises, conclusions, paragraph strength) with ANALYZE_ARGUMENT."
        : "Argument analysis is currently unavailable: the tagging service is not configured or not reachable.",
      values: { argumentTaggerReady: ready },
      data: { ready, language: svc?.getSettings().language ?? null },
    };
  },
};
