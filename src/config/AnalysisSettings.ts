import type { IAgentRuntime } from "@elizaos/core";
import { SUGGESTION_DEFAULTS, TAGGER_DEFAULTS } from "./constants";

export interface ArgumentaSettings {
  /** Base URL of the tagging service; analysis stays unavailable without it */
  taggerUrl: string | null;
  taggerTimeoutMs: number;
  language: string;
  suggestionsEnabled: boolean;
  maxSuggestionTokens: number;
}

export const DEFAULT_SETTINGS: ArgumentaSettings = {
  taggerUrl: null,
  taggerTimeoutMs: TAGGER_DEFAULTS.TIMEOUT_MS,
  language: TAGGER_DEFAULTS.LANGUAGE,
  suggestionsEnabled: true,
  maxSuggestionTokens: SUGGESTION_DEFAULTS.MAX_TOKENS,
};

/** Runtime setting keys, highest priority */
export const SETTING_KEYS = {
  taggerUrl: "ARGUMENTA_TAGGER_URL",
  taggerTimeoutMs: "ARGUMENTA_TAGGER_TIMEOUT_MS",
  language: "ARGUMENTA_LANGUAGE",
  suggestionsEnabled: "ARGUMENTA_SUGGESTIONS_ENABLED",
  maxSuggestionTokens: "ARGUMENTA_MAX_SUGGESTION_TOKENS",
} as const satisfies Record<keyof ArgumentaSettings, string>;

type RawSettings = Partial<Record<keyof ArgumentaSettings, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPositiveNumber(value: unknown): number | undefined {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? n : undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const v = value.trim().toLowerCase();
    if (v === "true" || v === "1" || v === "yes") return true;
    if (v === "false" || v === "0" || v === "no") return false;
  }
  return undefined;
}

function toNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * mergeSettings()
 * Overlays raw values on `base`. Values of the wrong shape are ignored,
 * so a bad entry falls back to whatever was there before.
 */
export function mergeSettings(base: ArgumentaSettings, raw: RawSettings = {}): ArgumentaSettings {
  const url = toNonEmptyString(raw.taggerUrl);
  return {
    taggerUrl: url ? url.replace(/\/+$/, "") : base.taggerUrl,
    taggerTimeoutMs: toPositiveNumber(raw.taggerTimeoutMs) ?? base.taggerTimeoutMs,
    language: toNonEmptyString(raw.language) ?? base.language,
    suggestionsEnabled: toBoolean(raw.suggestionsEnabled) ?? base.suggestionsEnabled,
    maxSuggestionTokens:
      toPositiveNumber(raw.maxSuggestionTokens) ?? base.maxSuggestionTokens,
  };
}

/**
 * loadAnalysisSettings()
 * defaults < character.settings.argumenta < runtime settings (env / secrets)
 */
export function loadAnalysisSettings(
  runtime: Pick<IAgentRuntime, "getSetting" | "character">
): ArgumentaSettings {
  const charSettings = runtime.character?.settings;
  const fromCharacter: RawSettings =
    isRecord(charSettings) && isRecord(charSettings.argumenta) ? charSettings.argumenta : {};

  const read = (key: string): unknown => {
    const value: unknown = runtime.getSetting(key);
    return value ?? undefined;
  };
  const fromRuntime: RawSettings = {
    taggerUrl: read(SETTING_KEYS.taggerUrl),
    taggerTimeoutMs: read(SETTING_KEYS.taggerTimeoutMs),
    language: read(SETTING_KEYS.language),
    suggestionsEnabled: read(SETTING_KEYS.suggestionsEnabled),
    maxSuggestionTokens: read(SETTING_KEYS.maxSuggestionTokens),
  };

  return mergeSettings(mergeSettings(DEFAULT_SETTINGS, fromCharacter), fromRuntime);
}
