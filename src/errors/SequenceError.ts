import { ArgumentaError, ErrorCode, type ErrorContext } from "./ArgumentaError";

/**
 * Token and label sequences from the tag source differ in length.
 * The extractor refuses to guess which side was truncated.
 */
export class MisalignedSequenceError extends ArgumentaError {
  public readonly tokenCount: number;
  public readonly labelCount: number;

  constructor(tokenCount: number, labelCount: number, context: Partial<ErrorContext> = {}) {
    super(
      `Tag source returned ${labelCount} labels for ${tokenCount} tokens`,
      ErrorCode.SEQUENCE_MISALIGNED,
      { ...context, tokenCount, labelCount },
      { isRetryable: false }
    );
    this.name = "MisalignedSequenceError";
    this.tokenCount = tokenCount;
    this.labelCount = labelCount;
  }
}

/**
 * The label sequence is not a sequence of strings.
 * Unknown label strings are not an error; they decode as outside.
 */
export class InvalidLabelSequenceError extends ArgumentaError {
  public readonly position?: number;

  constructor(message: string, context: Partial<ErrorContext> & { position?: number } = {}) {
    super(message, ErrorCode.SEQUENCE_INVALID_LABELS, context, { isRetryable: false });
    this.name = "InvalidLabelSequenceError";
    this.position = context.position;
  }

  static notAnArray(actual: unknown, context: Partial<ErrorContext> = {}) {
    return new InvalidLabelSequenceError(
      `Expected an array of labels, got ${actual === null ? "null" : typeof actual}`,
      context
    );
  }

  static nonStringLabel(position: number, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new InvalidLabelSequenceError(
      `Label at position ${position} is ${actual === null ? "null" : typeof actual}, expected a string`,
      { ...context, position }
    );
  }
}
