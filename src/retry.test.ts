/**
 * Retry Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  shouldRetryAzureError,
  getAzureRetryAfterMs,
  withLabRetry,
  retryFixed,
  formatErrorMessage,
  AZURE_RETRYABLE_CODES,
} from "./retry.js";
import { LabError } from "./errors.js";

describe("shouldRetryAzureError", () => {
  it("returns false for null/undefined", () => {
    expect(shouldRetryAzureError(null)).toBe(false);
    expect(shouldRetryAzureError(undefined)).toBe(false);
  });

  it("retries known Azure error codes", () => {
    for (const code of AZURE_RETRYABLE_CODES) {
      expect(shouldRetryAzureError({ code })).toBe(true);
    }
  });

  it("retries HTTP 429 and 5xx", () => {
    expect(shouldRetryAzureError({ statusCode: 429 })).toBe(true);
    expect(shouldRetryAzureError({ statusCode: 500 })).toBe(true);
    expect(shouldRetryAzureError({ status: 503 })).toBe(true);
  });

  it("does not retry HTTP 4xx other than 429", () => {
    expect(shouldRetryAzureError({ statusCode: 400 })).toBe(false);
    expect(shouldRetryAzureError({ statusCode: 404 })).toBe(false);
  });

  it("retries a Run Command that is still busy", () => {
    expect(shouldRetryAzureError(new Error("Run command extension execution is in progress. Please wait"))).toBe(true);
  });

  it("does not retry validation failures", () => {
    expect(shouldRetryAzureError({ code: "InvalidParameter", message: "Invalid parameter" })).toBe(false);
  });
});

describe("getAzureRetryAfterMs", () => {
  it("returns null without headers", () => {
    expect(getAzureRetryAfterMs({})).toBe(null);
    expect(getAzureRetryAfterMs(null)).toBe(null);
  });

  it("reads seconds", () => {
    expect(getAzureRetryAfterMs({ headers: { "retry-after": "7" } })).toBe(7000);
    expect(getAzureRetryAfterMs({ headers: { "Retry-After": "2" } })).toBe(2000);
  });
});

describe("withLabRetry", () => {
  it("returns on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(withLabRetry(fn, { maxAttempts: 3, minDelayMs: 0, maxDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries retryable errors until success", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce({ statusCode: 503 })
      .mockResolvedValueOnce("recovered");
    await expect(withLabRetry(fn, { maxAttempts: 3, minDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 })).resolves.toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue({ statusCode: 400, message: "bad" });
    await expect(withLabRetry(fn, { maxAttempts: 3, minDelayMs: 0 })).rejects.toEqual({ statusCode: 400, message: "bad" });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("retryFixed", () => {
  it("reports the attempt that succeeded", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValueOnce("done");
    const onRetry = vi.fn();

    const result = await retryFixed(fn, { attempts: 3, delayMs: 0, onRetry });

    expect(result).toEqual({ value: "done", attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
  });

  it("rethrows the last error after the final attempt", async () => {
    let n = 0;
    const fn = async () => {
      n++;
      throw new Error(`failure ${n}`);
    };
    await expect(retryFixed(fn, { attempts: 2, delayMs: 0 })).rejects.toThrow("failure 2");
    expect(n).toBe(2);
  });

  it("starts no further attempt once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn<(attempt: number) => Promise<string>>(async (attempt) => {
      controller.abort();
      throw new Error(`failure ${attempt}`);
    });
    const onRetry = vi.fn();

    await expect(
      retryFixed(fn, { attempts: 5, delayMs: 60_000, onRetry, signal: controller.signal }),
    ).rejects.toThrow("failure 1");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it("always makes at least one attempt", async () => {
    const fn = vi.fn().mockResolvedValue(1);
    await retryFixed(fn, { attempts: 0, delayMs: 0 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("formatErrorMessage", () => {
  it("formats strings and nullish values", () => {
    expect(formatErrorMessage("plain")).toBe("plain");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
  });

  it("includes code and HTTP status", () => {
    expect(formatErrorMessage({ code: "Conflict", statusCode: 409, message: "busy" })).toBe("[Conflict] (HTTP 409) busy");
  });

  it("formats lab errors with their code", () => {
    expect(formatErrorMessage(new LabError("no subscription", "NO_SUBSCRIPTION"))).toBe("[NO_SUBSCRIPTION] no subscription");
  });
});
