/**
 * Client for the sequence-labeling service that tokenizes a
 * text and assigns a BIO label to every token.
 *
 *   GET  {baseUrl}/health
 *   POST {baseUrl}/tag   {"text", "language"}
 *     → {"tokens": [{"text", "pos", "start_char"?, "end_char"?}], "labels": [...]}
 *
 * The response is checked here, at the boundary; the analysis core trusts
 * the TaggedText it receives.
 */

import { TAGGER_DEFAULTS } from "../config/constants";
import {
  ArgumentaValidationError,
  InvalidLabelSequenceError,
  MisalignedSequenceError,
} from "../errors";
import { createLogger } from "../utils/logger";
import { RetryPresets, withRetry, type RetryConfig } from "../utils/retry";
import type { TaggedText, Token } from "./ArgumentAnalysis.types";
import type { RequestOptions } from "./httpService";

const log = createLogger({ component: "TaggerClient" });

/** The part of HttpService the client needs */
export interface JsonTransport {
  ping(url: string, opts?: RequestOptions): Promise<boolean>;
  postJson(url: string, body: unknown, opts?: RequestOptions): Promise<unknown>;
}

/** Anything that can turn a text into tokens and labels */
export interface TagSource {
  healthCheck(): Promise<boolean>;
  tag(text: string): Promise<TaggedText>;
}

export interface TaggerClientOptions {
  baseUrl: string;
  language?: string;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readOffset(raw: Record<string, unknown>, key: string, position: number): number | null {
  const value = raw[key];
  if (value === undefined || value === null) return null;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  throw ArgumentaValidationError.invalidFormat(`tokens[${position}].${key}`, "a non-negative integer or null", value, {
    operation: "tagger.parse",
  });
}

function parseToken(raw: unknown, position: number): Token {
  if (!isRecord(raw) || typeof raw.text !== "string") {
    throw ArgumentaValidationError.invalidFormat(`tokens[${position}]`, "an object with a string text", raw, {
      operation: "tagger.parse",
    });
  }
  return {
    text: raw.text,
    pos: typeof raw.pos === "string" ? raw.pos : "X",
    charStart: readOffset(raw, "start_char", position),
    charEnd: readOffset(raw, "end_char", position),
  };
}

function parseLabels(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    throw InvalidLabelSequenceError.notAnArray(raw, { operation: "tagger.parse" });
  }
  return raw.map((label: unknown, i) => {
    if (typeof label !== "string") {
      throw InvalidLabelSequenceError.nonStringLabel(i, label, { operation: "tagger.parse" });
    }
    return label;
  });
}

/**
 * Check a raw /tag response and convert it to a TaggedText.
 * Throws on malformed payloads and on token/label count mismatch.
 */
export function parseTaggerResponse(payload: unknown): TaggedText {
  if (!isRecord(payload)) {
    throw ArgumentaValidationError.invalidFormat("response", "a JSON object", payload, {
      operation: "tagger.parse",
    });
  }
  if (!Array.isArray(payload.tokens)) {
    throw ArgumentaValidationError.invalidFormat("tokens", "an array", payload.tokens, {
      operation: "tagger.parse",
    });
  }

  const tokens = payload.tokens.map((t: unknown, i) => parseToken(t, i));
  const labels = parseLabels(payload.labels);

  if (tokens.length !== labels.length) {
    throw new MisalignedSequenceError(tokens.length, labels.length, { operation: "tagger.parse" });
  }

  return { tokens, labels };
}

export class TaggerClient implements TagSource {
  private readonly baseUrl: string;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryConfig>;

  constructor(private readonly transport: JsonTransport, opts: TaggerClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.language = opts.language ?? TAGGER_DEFAULTS.LANGUAGE;
    this.timeoutMs = opts.timeoutMs ?? TAGGER_DEFAULTS.TIMEOUT_MS;
    this.retry = opts.retry ?? RetryPresets.standard;
  }

  get endpoint(): string {
    return this.baseUrl;
  }

  /** True when the service answers its health route; never throws. */
  async healthCheck(): Promise<boolean> {
    const url = `${this.baseUrl}${TAGGER_DEFAULTS.HEALTH_PATH}`;
    try {
      return await withRetry(
        () => this.transport.ping(url, { timeoutMs: this.timeoutMs }),
        { ...RetryPresets.quick, initialDelayMs: this.retry.initialDelayMs ?? RetryPresets.quick.initialDelayMs },
        "tagger.healthCheck"
      );
    } catch (error) {
      log.warn("Tagger health check failed", { url }, error);
      return false;
    }
  }

  async tag(text: string): Promise<TaggedText> {
    const url = `${this.baseUrl}${TAGGER_DEFAULTS.TAG_PATH}`;
    const payload = await withRetry(
      () => this.transport.postJson(url, { text, language: this.language }, { timeoutMs: this.timeoutMs }),
      this.retry,
      "tagger.tag"
    );
    const tagged = parseTaggerResponse(payload);
    log.debug("Tagged text", { chars: text.length, tokens: tagged.tokens.length });
    return tagged;
  }
}
