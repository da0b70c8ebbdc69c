import { ArgumentaError, ErrorCode, type ErrorContext } from "./ArgumentaError";

/**
 * Error for failures talking to the tagging service or another remote collaborator.
 */
export class ArgumentaNetworkError extends ArgumentaError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    context: Partial<ErrorContext> & { statusCode?: number; endpoint?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "ArgumentaNetworkError";
    this.statusCode = context.statusCode;
    this.endpoint = context.endpoint;
  }

  static timeout(endpoint: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new ArgumentaNetworkError(
      `Request to ${endpoint} timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      { ...context, endpoint },
      { isRetryable: true }
    );
  }

  static connectionFailed(endpoint: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new ArgumentaNetworkError(
      `Failed to connect to ${endpoint}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      { ...context, endpoint },
      { cause, isRetryable: true }
    );
  }

  /**
   * 429 and 5xx are worth another attempt; other statuses are not.
   */
  static httpStatus(endpoint: string, statusCode: number, statusText: string, context: Partial<ErrorContext> = {}) {
    const rateLimited = statusCode === 429;
    return new ArgumentaNetworkError(
      `HTTP ${statusCode} (${statusText}) from ${endpoint}`,
      rateLimited ? ErrorCode.NETWORK_RATE_LIMITED : ErrorCode.TAGGER_HTTP_ERROR,
      { ...context, endpoint, statusCode },
      { isRetryable: rateLimited || statusCode >= 500 }
    );
  }

  static taggerUnavailable(context: Partial<ErrorContext> = {}) {
    return new ArgumentaNetworkError(
      "Argument tagger is not configured or not reachable",
      ErrorCode.TAGGER_UNAVAILABLE,
      context,
      { isRetryable: false }
    );
  }
}
