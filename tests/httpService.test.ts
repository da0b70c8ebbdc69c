import { describe, it, expect, vi, afterEach } from "vitest";
import { HttpService } from "../src/services/httpService";
import { ArgumentaNetworkError, ArgumentaValidationError, ErrorCode } from "../src/errors";

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("HttpService", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post a JSON body and parse the JSON reply", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ labels: ["O"] }));
    const http = new HttpService(undefined, { timeoutMs: 1000 });

    const result = await http.postJson("http://tagger.test/tag", { text: "hola", language: "es" });

    expect(result).toEqual({ labels: ["O"] });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://tagger.test/tag");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"text":"hola","language":"es"}');
    const headers = new Headers(init?.headers);
    expect(headers.get("content-type")).toBe("application/json");
    expect(headers.get("user-agent")).toBe("plugin-argumenta/0.1");
  });

  it("should keep caller headers", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({}));
    const http = new HttpService();

    await http.postJson(
      "http://tagger.test/tag",
      {},
      { headers: { accept: "text/plain", "content-type": "application/json; charset=utf-8" } }
    );

    const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
    expect(headers.get("accept")).toBe("text/plain");
    expect(headers.get("content-type")).toBe("application/json; charset=utf-8");
  });

  it("should raise a retryable error for 5xx replies", async () => {
    stubFetch(async () => jsonResponse({}, 503, "Service Unavailable"));
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.code).toBe(ErrorCode.TAGGER_HTTP_ERROR);
      expect(error.statusCode).toBe(503);
      expect(error.isRetryable).toBe(true);
    }
  });

  it("should raise a non-retryable error for 4xx replies", async () => {
    stubFetch(async () => jsonResponse({}, 422, "Unprocessable Entity"));
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.isRetryable).toBe(false);
      expect(error.message).toBe("HTTP 422 (Unprocessable Entity) from http://tagger.test/tag");
    }
  });

  it("should mark 429 as rate limited", async () => {
    stubFetch(async () => jsonResponse({}, 429, "Too Many Requests"));
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.code).toBe(ErrorCode.NETWORK_RATE_LIMITED);
      expect(error.isRetryable).toBe(true);
    }
  });

  it("should wrap connection failures", async () => {
    const cause = new TypeError("fetch failed");
    stubFetch(async () => {
      throw cause;
    });
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.code).toBe(ErrorCode.NETWORK_CONNECTION_FAILED);
      expect(error.cause).toBe(cause);
      expect(error.endpoint).toBe("http://tagger.test/tag");
    }
  });

  it("should abort slow requests", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}, { timeoutMs: 5 }));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.code).toBe(ErrorCode.NETWORK_TIMEOUT);
      expect(error.message).toBe("Request to http://tagger.test/tag timed out after 5ms");
    }
  });

  it("should time out when the body stalls after the headers", async () => {
    stubFetch(async () => new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 }));
    const http = new HttpService(undefined, { timeoutMs: 20 });

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaNetworkError);
    if (error instanceof ArgumentaNetworkError) {
      expect(error.code).toBe(ErrorCode.NETWORK_TIMEOUT);
      expect(error.isRetryable).toBe(true);
      expect(error.message).toBe("Request to http://tagger.test/tag timed out after 20ms");
    }
  });

  it("should reject a body that is not JSON without retrying", async () => {
    stubFetch(async () => new Response("<html>bad gateway</html>", { status: 200 }));
    const http = new HttpService();

    const error = await captureRejection(http.postJson("http://tagger.test/tag", {}));

    expect(error).toBeInstanceOf(ArgumentaValidationError);
    if (error instanceof ArgumentaValidationError) {
      expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_FORMAT);
      expect(error.field).toBe("response body");
      expect(error.value).toBe("<html>bad gateway</html>");
      expect(error.context.endpoint).toBe("http://tagger.test/tag");
      expect(error.isRetryable).toBe(false);
    }
  });

  it("should release the health response body", async () => {
    const cancel = vi.fn();
    stubFetch(async () => new Response(new ReadableStream<Uint8Array>({ cancel }), { status: 200 }));
    const http = new HttpService();

    await expect(http.ping("http://tagger.test/health")).resolves.toBe(true);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("should report health from the status without throwing", async () => {
    stubFetch(async () => jsonResponse({}, 500, "Internal Server Error"));
    const http = new HttpService();

    await expect(http.ping("http://tagger.test/health")).resolves.toBe(false);
  });
});
