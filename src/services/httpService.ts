import { Service, type IAgentRuntime } from "@elizaos/core";
import { TAGGER_DEFAULTS } from "../config/constants";
import { ArgumentaNetworkError, ArgumentaValidationError } from "../errors";

export interface RequestOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * HttpService
 * - JSON GET/POST with timeouts for the plugin's remote collaborators.
 * - Transport failures and timeouts surface as ArgumentaNetworkError so
 *   withRetry can decide; a body that is not JSON is an
 *   ArgumentaValidationError and is not retried.
 * - The timeout covers the whole exchange, body included.
 */
export class HttpService extends Service {
  static readonly serviceType = "argumenta_http";

  override capabilityDescription =
    "Sends JSON requests to the argument tagging service with timeouts and typed network errors.";

  private defaultTimeoutMs: number = TAGGER_DEFAULTS.TIMEOUT_MS;
  private readonly userAgent: string = TAGGER_DEFAULTS.USER_AGENT;

  static async start(runtime: IAgentRuntime): Promise<HttpService> {
    return new HttpService(runtime);
  }

  constructor(runtime?: IAgentRuntime, opts: { timeoutMs?: number } = {}) {
    super(runtime);
    if (typeof opts.timeoutMs === "number" && opts.timeoutMs > 0) {
      this.defaultTimeoutMs = opts.timeoutMs;
    }
  }

  override async stop(): Promise<void> {
    // fetch keeps no connections we own
  }

  private buildHeaders(extra?: Record<string, string>, withBody = false): Headers {
    const h = new Headers(extra ?? {});
    if (!h.has("user-agent")) h.set("user-agent", this.userAgent);
    if (!h.has("accept")) h.set("accept", "application/json");
    if (withBody && !h.has("content-type")) h.set("content-type", "application/json");
    return h;
  }

  /**
   * One exchange under a single deadline. The timer keeps running while
   * `read` consumes the body, so a stalled body times out like a stalled
   * connection.
   */
  private async request<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (res: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const deadline = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(ArgumentaNetworkError.timeout(url, timeoutMs, { operation: "http.request" })),
        { once: true }
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await Promise.race([this.exchange(url, init, controller.signal, read), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async exchange<T>(
    url: string,
    init: RequestInit,
    signal: AbortSignal,
    read: (res: Response) => Promise<T>
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetch(url, { ...init, signal });
    } catch (error) {
      throw ArgumentaNetworkError.connectionFailed(
        url,
        error instanceof Error ? error : new Error(String(error)),
        { operation: "http.request" }
      );
    }
    return read(res);
  }

  private async readJson(url: string, res: Response): Promise<unknown> {
    if (!res.ok) {
      await res.body?.cancel();
      throw ArgumentaNetworkError.httpStatus(url, res.status, res.statusText, {
        operation: "http.readJson",
      });
    }
    const raw = await res.text();
    try {
      return JSON.parse(raw);
    } catch {
      throw ArgumentaValidationError.invalidFormat("response body", "JSON", raw.slice(0, 200), {
        operation: "http.readJson",
        endpoint: url,
      });
    }
  }

  /** GET a URL; resolves true for any 2xx, false for other statuses. */
  async ping(url: string, opts: RequestOptions = {}): Promise<boolean> {
    return this.request(
      url,
      { method: "GET", headers: this.buildHeaders(opts.headers) },
      opts.timeoutMs ?? this.defaultTimeoutMs,
      async (res) => {
        await res.body?.cancel();
        return res.ok;
      }
    );
  }

  /** The body is JSON-encoded; the parsed response is returned unchecked. */
  async postJson(url: string, body: unknown, opts: RequestOptions = {}): Promise<unknown> {
    return this.request(
      url,
      {
        method: "POST",
        headers: this.buildHeaders(opts.headers, true),
        body: JSON.stringify(body),
      },
      opts.timeoutMs ?? this.defaultTimeoutMs,
      (res) => this.readJson(url, res)
    );
  }
}
