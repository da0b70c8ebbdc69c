/**
 * Base error class for all Argumenta plugin errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Network errors (2xxx)
  NETWORK_TIMEOUT = 2001,
  NETWORK_CONNECTION_FAILED = 2002,
  NETWORK_RATE_LIMITED = 2003,
  TAGGER_HTTP_ERROR = 2010,
  TAGGER_UNAVAILABLE = 2011,

  // Validation errors (4xxx)
  VALIDATION_MISSING_TEXT = 4001,
  VALIDATION_INVALID_FORMAT = 4004,

  // Sequence errors (41xx)
  SEQUENCE_MISALIGNED = 4101,
  SEQUENCE_INVALID_LABELS = 4102,

  // Model errors (5xxx)
  MODEL_CALL_FAILED = 5001,

  // General errors (9xxx)
  UNKNOWN = 9999,
}

export interface ErrorContext {
  operation: string;
  endpoint?: string;
  correlationId?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

export class ArgumentaError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "ArgumentaError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Message safe to show to the person chatting with the agent.
   */
  toUserMessage(): string {
    return this.message;
  }

  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.endpoint) parts.push(`Endpoint: ${this.context.endpoint}`);
    if (this.cause) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in ArgumentaError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): ArgumentaError {
  if (error instanceof ArgumentaError) {
    return new ArgumentaError(
      error.message,
      error.code,
      { ...error.context, ...context },
      { cause: error.cause, isRetryable: error.isRetryable }
    );
  }

  if (error instanceof Error) {
    return new ArgumentaError(error.message, code, context, { cause: error });
  }

  return new ArgumentaError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isArgumentaError(error: unknown): error is ArgumentaError {
  return error instanceof ArgumentaError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isArgumentaError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}
