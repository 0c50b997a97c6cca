/**
 * Retry helpers shared by the embedding, vector-store and generation calls.
 *
 * Transient failures (rate limits, timeouts, 5xx, dropped connections) are
 * retried with exponential backoff and full jitter. Anything else is
 * rethrown on the first attempt.
 */
import { logger } from "@infra/logging/Logger";

const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const PERMANENT_INPUT_STATUSES = new Set([400, 413, 422]);

const RETRYABLE_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "APIConnectionTimeoutError",
  "APIConnectionError",
]);

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === "object" && key in value
    ? Reflect.get(value, key)
    : undefined;
}

export function errorStatus(error: unknown): number | undefined {
  const status =
    field(error, "status") ??
    field(error, "statusCode") ??
    field(field(error, "response"), "status");
  return typeof status === "number" ? status : undefined;
}

export function isRetryableError(error: unknown): boolean {
  const retryable = field(error, "retryable");
  if (typeof retryable === "boolean") {
    return retryable;
  }

  const code = field(error, "code") ?? field(field(error, "cause"), "code");
  if (code !== undefined && RETRYABLE_CODES.has(String(code))) {
    return true;
  }

  if (RETRYABLE_NAMES.has(String(field(error, "name")))) {
    return true;
  }

  const status = errorStatus(error);
  return typeof status === "number" && RETRYABLE_STATUSES.has(status);
}

/** The service rejected the input itself; resending it cannot succeed. */
export function isPermanentInputError(error: unknown): boolean {
  const status = errorStatus(error);
  return typeof status === "number" && PERMANENT_INPUT_STATUSES.has(status);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  operation: string;
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Full-jitter exponential backoff for the given 1-based retry number. */
export function backoffDelay(
  retry: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(
    options.maxDelayMs,
    options.baseDelayMs * 2 ** Math.max(0, retry - 1)
  );
  return Math.floor(random() * ceiling);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? delay;
  const random = options.random ?? Math.random;
  const attempts = options.maxRetries + 1;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    if (attempt > 1) {
      await sleep(backoffDelay(attempt - 1, options, random));
    }

    try {
      return await fn(attempt);
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryable(e) || attempt === attempts) {
        throw e;
      }

      logger.log("warn", "RETRY", {
        attempt,
        operation: options.operation,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${options.operation} failed after retries.`);
}
