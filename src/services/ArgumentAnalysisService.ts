import { Service, type IAgentRuntime } from "@elizaos/core";

import { loadAnalysisSettings, type ArgumentaSettings } from "../config/AnalysisSettings";
import { createLogger } from "../utils/logger";
import {
  EMPTY_COMPONENTS,
  buildAnalysis,
  extractFromTaggedText,
} from "./ArgumentAnalyzer";
import type { ArgumentAnalysis, ExtractedComponents } from "./ArgumentAnalysis.types";
import { HttpService } from "./httpService";
import { TaggerClient, type TagSource } from "./TaggerClient";

const log = createLogger({ service: "ArgumentAnalysisService" });

export interface ArgumentAnalysisServiceOptions {
  /** Use this tag source instead of building a TaggerClient from settings */
  tagSource?: TagSource;
  settings?: ArgumentaSettings;
}

/**
 * ArgumentAnalysisService
 * - Owns the tag source for one agent runtime (one instance per process).
 * - ensureInitialized() is idempotent: concurrent callers share a single
 *   in-flight attempt; a failed attempt leaves the service not ready and
 *   the next call tries again.
 * - While not ready, every analysis returns empty component lists.
 */
export class ArgumentAnalysisService extends Service {
  static readonly serviceType = "argument_analysis";

  override capabilityDescription =
    "Extracts premises and conclusions from argumentative text and scores paragraph strength.";

  private readonly settings: ArgumentaSettings;
  private tagSource: TagSource | null;
  private ready = false;
  private initPromise: Promise<boolean> | null = null;
  /** Bumped by stop(); an initialization started before it is discarded. */
  private generation = 0;

  /** Required by ElizaOS core (service registration). */
  static async start(runtime: IAgentRuntime): Promise<ArgumentAnalysisService> {
    const svc = new ArgumentAnalysisService(runtime);
    await svc.ensureInitialized();
    return svc;
  }

  constructor(runtime: IAgentRuntime, opts: ArgumentAnalysisServiceOptions = {}) {
    super(runtime);
    this.settings = opts.settings ?? loadAnalysisSettings(runtime);
    this.tagSource = opts.tagSource ?? null;
  }

  override async stop(): Promise<void> {
    this.generation += 1;
    this.ready = false;
    this.initPromise = null;
  }

  getSettings(): ArgumentaSettings {
    return this.settings;
  }

  isReady(): boolean {
    return this.ready;
  }

  ensureInitialized(): Promise<boolean> {
    if (this.ready) return Promise.resolve(true);
    if (!this.initPromise) {
      const attempt: Promise<boolean> = this.initialize(this.generation).finally(() => {
        if (this.initPromise === attempt) this.initPromise = null;
      });
      this.initPromise = attempt;
    }
    return this.initPromise;
  }

  private async initialize(generation: number): Promise<boolean> {
    const source = this.tagSource ?? this.buildTagSource();
    if (!source) {
      log.warn("No tagger configured; argument analysis unavailable", {
        setting: "ARGUMENTA_TAGGER_URL",
      });
      return false;
    }
    this.tagSource = source;

    const healthy = await source.healthCheck();
    if (generation !== this.generation) {
      log.debug("Discarding tagger health check that finished after stop()");
      return false;
    }
    this.ready = healthy;
    if (this.ready) {
      log.info("Argument tagger ready", { language: this.settings.language });
    } else {
      log.warn("Argument tagger not reachable; will retry on next request");
    }
    return this.ready;
  }

  private buildTagSource(): TagSource | null {
    if (!this.settings.taggerUrl) return null;
    const http =
      this.runtime.getService<HttpService>(HttpService.serviceType) ??
      new HttpService(this.runtime, { timeoutMs: this.settings.taggerTimeoutMs });
    return new TaggerClient(http, {
      baseUrl: this.settings.taggerUrl,
      language: this.settings.language,
      timeoutMs: this.settings.taggerTimeoutMs,
    });
  }

  /**
   * Premises and conclusions of `text`, in text order.
   * `text` is expected trimmed and non-empty; callers validate it.
   */
  async extractComponents(text: string): Promise<ExtractedComponents> {
    await this.ensureInitialized();
    if (!this.ready || !this.tagSource) return EMPTY_COMPONENTS;

    const tagged = await this.tagSource.tag(text);
    return extractFromTaggedText(text, tagged);
  }

  async extractComponentTexts(text: string): Promise<{ premises: string[]; conclusions: string[] }> {
    const { premises, conclusions } = await this.extractComponents(text);
    return {
      premises: premises.map((c) => c.text),
      conclusions: conclusions.map((c) => c.text),
    };
  }

  /** Components plus paragraph strength for one text. */
  async analyze(text: string): Promise<ArgumentAnalysis> {
    const components = await this.extractComponents(text);
    const analysis = buildAnalysis(text, components);
    log.debug("Analysis complete", {
      premises: analysis.totalPremises,
      conclusions: analysis.totalConclusions,
      paragraphs: analysis.paragraphs.length,
    });
    return analysis;
  }
}
