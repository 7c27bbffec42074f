/**
 * Retry Utilities
 *
 * Azure API retry logic with exponential backoff and jitter, plus the
 * bounded fixed-delay retry used around guest-side downloads.
 */

import type { LabRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<LabRetryOptions>;

export const LAB_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "RetryableError",
  "Conflict",
  // Run Command refuses a second invocation while one is still executing.
  "OperationNotAllowed",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
  "run command extension execution is in progress",
];

// =============================================================================
// Error Inspection
// =============================================================================

function errorCode(error: object): string {
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("Code" in error && typeof error.Code === "string") return error.Code;
  return "";
}

function errorStatus(error: object): number {
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return 0;
}

function errorText(error: object): string {
  if ("message" in error && typeof error.message === "string") return error.message;
  return "";
}

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;

  const code = errorCode(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = errorStatus(error);
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = errorText(error).toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract the Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  if (!("headers" in error) || typeof error.headers !== "object" || error.headers === null) return null;

  const headers = error.headers;
  let retryAfter: unknown;
  if ("retry-after" in headers) retryAfter = headers["retry-after"];
  else if ("Retry-After" in headers) retryAfter = headers["Retry-After"];
  if (typeof retryAfter !== "string" || retryAfter === "") return null;

  // Either seconds or an HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute an Azure API call with exponential backoff retry.
 */
export async function withLabRetry<T>(
  fn: () => Promise<T>,
  options?: LabRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? LAB_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? LAB_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? LAB_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? LAB_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = retryAfterMs;
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}

export type FixedRetryOptions = {
  /** Total attempts, including the first. */
  attempts: number;
  /** Pause between attempts. */
  delayMs: number;
  /** Called after a failed attempt that will be retried. */
  onRetry?: (attempt: number, error: unknown) => void;
  /** No further attempt starts once this aborts; the last error is rethrown. */
  signal?: AbortSignal;
};

export type FixedRetryResult<T> = {
  value: T;
  attempts: number;
};

/**
 * Bounded retry with a constant pause between attempts.
 * Every error is retried; the last one is rethrown.
 */
export async function retryFixed<T>(
  fn: (attempt: number) => Promise<T>,
  options: FixedRetryOptions,
): Promise<FixedRetryResult<T>> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (attempt < attempts && !options.signal?.aborted) {
        options.onRetry?.(attempt, error);
        await sleep(options.delayMs, options.signal);
      }
      if (options.signal?.aborted) break;
    }
  }

  throw lastError;
}

/** Sleep that ends early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a single human-readable line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (typeof error !== "object") return String(error);

  const code = errorCode(error);
  const message = errorText(error) || "Unknown error";
  const statusCode = errorStatus(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
