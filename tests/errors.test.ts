import { describe, it, expect } from "vitest";
import {
  ArgumentaError,
  ArgumentaNetworkError,
  ArgumentaValidationError,
  InvalidLabelSequenceError,
  MisalignedSequenceError,
  ErrorCode,
  wrapError,
  isArgumentaError,
  getErrorCode,
} from "../src/errors";

describe("ArgumentaError", () => {
  it("should create error with code and context", () => {
    const error = new ArgumentaError(
      "Test error",
      ErrorCode.MODEL_CALL_FAILED,
      { operation: "test", endpoint: "http://tagger.test" }
    );

    expect(error.message).toBe("Test error");
    expect(error.code).toBe(ErrorCode.MODEL_CALL_FAILED);
    expect(error.context.operation).toBe("test");
    expect(error.context.endpoint).toBe("http://tagger.test");
    expect(error.context.timestamp).toBe(error.timestamp);
    expect(error.isRetryable).toBe(false);
  });

  it("should default the operation", () => {
    expect(new ArgumentaError("Test").context.operation).toBe("unknown");
  });

  it("should serialize to JSON", () => {
    const cause = new Error("socket closed");
    const error = new ArgumentaError("Test", ErrorCode.UNKNOWN, { operation: "test" }, { cause });
    const json = error.toJSON();

    expect(json.name).toBe("ArgumentaError");
    expect(json.code).toBe(ErrorCode.UNKNOWN);
    expect(json.message).toBe("Test");
    expect(json.cause).toBe("socket closed");
  });

  it("should build a one-line log message", () => {
    const error = new ArgumentaError(
      "Request failed",
      ErrorCode.NETWORK_CONNECTION_FAILED,
      { operation: "tagger.tag", endpoint: "http://tagger.test/tag" },
      { cause: new Error("ECONNREFUSED") }
    );

    expect(error.toLogMessage()).toBe(
      "[ArgumentaError] | Code: 2002 | Op: tagger.tag | Request failed | Endpoint: http://tagger.test/tag | Cause: ECONNREFUSED"
    );
  });

  it("should create user-friendly message", () => {
    const error = new ArgumentaError("User visible message", ErrorCode.UNKNOWN);
    expect(error.toUserMessage()).toBe("User visible message");
  });
});

describe("ArgumentaNetworkError", () => {
  it("should create timeout error", () => {
    const error = ArgumentaNetworkError.timeout("http://tagger.test/tag", 5000);

    expect(error.code).toBe(ErrorCode.NETWORK_TIMEOUT);
    expect(error.isRetryable).toBe(true);
    expect(error.endpoint).toBe("http://tagger.test/tag");
  });

  it("should classify HTTP statuses", () => {
    expect(ArgumentaNetworkError.httpStatus("u", 429, "Too Many Requests").code).toBe(ErrorCode.NETWORK_RATE_LIMITED);
    expect(ArgumentaNetworkError.httpStatus("u", 502, "Bad Gateway").isRetryable).toBe(true);
    expect(ArgumentaNetworkError.httpStatus("u", 400, "Bad Request").isRetryable).toBe(false);
    expect(ArgumentaNetworkError.httpStatus("u", 400, "Bad Request").statusCode).toBe(400);
  });

  it("should create a non-retryable unavailable error", () => {
    const error = ArgumentaNetworkError.taggerUnavailable({ operation: "ANALYZE_ARGUMENT" });

    expect(error.code).toBe(ErrorCode.TAGGER_UNAVAILABLE);
    expect(error.isRetryable).toBe(false);
  });
});

describe("ArgumentaValidationError", () => {
  it("should create missing text error", () => {
    const error = ArgumentaValidationError.missingText();

    expect(error.code).toBe(ErrorCode.VALIDATION_MISSING_TEXT);
    expect(error.field).toBe("text");
    expect(error.isRetryable).toBe(false);
  });

  it("should create invalid format error", () => {
    const error = ArgumentaValidationError.invalidFormat("tokens", "an array", "nope");

    expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_FORMAT);
    expect(error.field).toBe("tokens");
    expect(error.value).toBe("nope");
  });

  it("should keep the caller's operation on a missing text error", () => {
    const error = ArgumentaValidationError.missingText({ operation: "analyzeArgument" });

    expect(error.code).toBe(ErrorCode.VALIDATION_MISSING_TEXT);
    expect(error.field).toBe("text");
    expect(error.context.operation).toBe("analyzeArgument");
  });
});

describe("sequence errors", () => {
  it("should carry both counts on a misaligned sequence", () => {
    const error = new MisalignedSequenceError(4, 3, { operation: "extractComponents" });

    expect(error.code).toBe(ErrorCode.SEQUENCE_MISALIGNED);
    expect(error.context.tokenCount).toBe(4);
    expect(error.context.labelCount).toBe(3);
    expect(error.isRetryable).toBe(false);
  });

  it("should describe null label sequences", () => {
    expect(InvalidLabelSequenceError.notAnArray(null).message).toBe("Expected an array of labels, got null");
    expect(InvalidLabelSequenceError.notAnArray(null).code).toBe(ErrorCode.SEQUENCE_INVALID_LABELS);
  });
});

describe("wrapError", () => {
  it("should wrap plain Error", () => {
    const original = new Error("Something went wrong");
    const wrapped = wrapError(original, ErrorCode.MODEL_CALL_FAILED, { operation: "test" });

    expect(wrapped).toBeInstanceOf(ArgumentaError);
    expect(wrapped.message).toBe("Something went wrong");
    expect(wrapped.code).toBe(ErrorCode.MODEL_CALL_FAILED);
    expect(wrapped.cause).toBe(original);
  });

  it("should wrap string error", () => {
    const wrapped = wrapError("String error", ErrorCode.UNKNOWN);

    expect(wrapped).toBeInstanceOf(ArgumentaError);
    expect(wrapped.message).toBe("String error");
  });

  it("should keep code and merge context of an ArgumentaError", () => {
    const original = new ArgumentaError("Original", ErrorCode.NETWORK_TIMEOUT, { operation: "a" }, { isRetryable: true });
    const wrapped = wrapError(original, ErrorCode.MODEL_CALL_FAILED, { correlationId: "req-1" });

    expect(wrapped.code).toBe(ErrorCode.NETWORK_TIMEOUT);
    expect(wrapped.isRetryable).toBe(true);
    expect(wrapped.context.operation).toBe("a");
    expect(wrapped.context.correlationId).toBe("req-1");
  });

  it("should describe values that are not errors", () => {
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("isArgumentaError", () => {
  it("should return true for ArgumentaError and subclasses", () => {
    expect(isArgumentaError(new ArgumentaError("Test", ErrorCode.UNKNOWN))).toBe(true);
    expect(isArgumentaError(new MisalignedSequenceError(1, 2))).toBe(true);
  });

  it("should return false for other errors", () => {
    expect(isArgumentaError(new Error("Regular error"))).toBe(false);
    expect(isArgumentaError("not an error")).toBe(false);
  });
});

describe("getErrorCode", () => {
  it("should return code from ArgumentaError", () => {
    expect(getErrorCode(ArgumentaValidationError.missingText())).toBe(ErrorCode.VALIDATION_MISSING_TEXT);
  });

  it("should return UNKNOWN for other errors", () => {
    expect(getErrorCode(new Error("x"))).toBe(ErrorCode.UNKNOWN);
  });
});
