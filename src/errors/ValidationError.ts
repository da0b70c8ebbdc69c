import { ArgumentaError, ErrorCode, type ErrorContext } from "./ArgumentaError";

/**
 * Error for input validation failures.
 */
export class ArgumentaValidationError extends ArgumentaError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ArgumentaValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingText(context: Partial<ErrorContext> = {}) {
    return new ArgumentaValidationError(
      "No text provided. Please include the argument you want analyzed.",
      ErrorCode.VALIDATION_MISSING_TEXT,
      { ...context, field: "text" }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new ArgumentaValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }
}
