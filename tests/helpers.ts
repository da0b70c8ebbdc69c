import { vi } from "vitest";
import type { IAgentRuntime, Memory } from "@elizaos/core";
import type { Component, TaggedText } from "../src/services/ArgumentAnalysis.types";
import type { TagSource } from "../src/services/TaggerClient";

export const SAMPLE_TEXT = "El cielo es azul luego llueve sobre toda la ciudad hoy";

/** Word-level labels the fake tagger assigns; every other word is O */
export const SAMPLE_LABELS: Record<string, string> = {
  cielo: "B-P",
  es: "I-P",
  luego: "B-C",
};

type ModelParams = { prompt: string; maxTokens?: number; temperature?: number };

export interface MockRuntimeOptions {
  settings?: Record<string, unknown>;
  characterSettings?: Record<string, unknown>;
  services?: Record<string, unknown>;
  useModel?: (modelType: string, params: ModelParams) => Promise<unknown>;
}

export function createMockRuntime(opts: MockRuntimeOptions = {}) {
  const services = opts.services ?? {};
  const getSetting = vi.fn((key: string) => opts.settings?.[key] ?? null);
  const getService = vi.fn((type: string) => services[type] ?? null);
  const modelImpl =
    opts.useModel ?? (async (_type: string, _params: ModelParams): Promise<unknown> => "Sugerencia de prueba.");
  const useModel = vi.fn(modelImpl);

  const runtime = {
    agentId: "test-agent-id",
    character: { name: "Tester", bio: [], settings: opts.characterSettings ?? {} },
    getSetting,
    getService,
    useModel,
  } as unknown as IAgentRuntime;

  return { runtime, services, getSetting, getService, useModel };
}

export function createMessage(text: string, extras: Record<string, unknown> = {}): Memory {
  return {
    content: { text, ...extras },
    entityId: "test-entity",
    roomId: "test-room",
  } as unknown as Memory;
}

/** Whitespace tokens without offsets, labelled from SAMPLE_LABELS */
export function tagWords(text: string): TaggedText {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  return {
    tokens: words.map((w) => ({ text: w, pos: "X" })),
    labels: words.map((w) => SAMPLE_LABELS[w] ?? "O"),
  };
}

export function createFakeTagSource(healthy = true) {
  const healthCheck = vi.fn(async () => healthy);
  const tag = vi.fn(async (text: string) => tagWords(text));
  const source: TagSource = { healthCheck, tag };
  return { source, healthCheck, tag };
}

export function component(kind: Component["kind"], text: string, startPos: number, sequenceOrder = 0): Component {
  return {
    kind,
    text,
    tokens: text.split(" "),
    startPos,
    endPos: startPos + text.length,
    sequenceOrder,
  };
}
