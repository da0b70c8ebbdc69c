import { isArgumentaError, type ErrorCode } from "../errors";
import { logger } from "./logger";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Extra codes to retry even when the error itself is not flagged retryable */
  retryableErrors?: ErrorCode[];
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Run an async operation with exponential backoff.
 * Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  operationName = "operation"
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, Math.floor(cfg.maxAttempts));
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!shouldRetry(error, cfg.retryableErrors) || attempt >= maxAttempts) {
        logger.error(`${operationName} failed after ${attempt} attempt(s)`, {
          attempt,
          maxAttempts,
        }, error);
        throw error;
      }

      logger.warn(`${operationName} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts,
        delay,
      }, error);

      await sleep(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }
}

export function shouldRetry(error: unknown, retryableCodes?: ErrorCode[]): boolean {
  if (isArgumentaError(error)) {
    return error.isRetryable || (retryableCodes?.includes(error.code) ?? false);
  }

  // Plain errors: only the usual transient socket failures
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("temporarily unavailable")
    );
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const RetryPresets = {
  /** Health probes at startup */
  quick: {
    maxAttempts: 2,
    initialDelayMs: 500,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
  },

  /** Tagging requests */
  standard: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 10000,
    backoffMultiplier: 2,
  },
} satisfies Record<string, RetryConfig>;
