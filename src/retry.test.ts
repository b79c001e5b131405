import { describe, it, expect, vi } from "vitest";
import { withRetry, isRetryable } from "./retry.js";
import { ExternalServiceError } from "./errors.js";

const noSleep = () => Promise.resolve();

describe("isRetryable", () => {
  it("honours an explicit retryable flag", () => {
    expect(isRetryable(new ExternalServiceError("llm", "rate limited"))).toBe(true);
    expect(isRetryable(new ExternalServiceError("llm", "bad request", { retryable: false }))).toBe(false);
  });

  it("classifies HTTP statuses", () => {
    expect(isRetryable({ status: 429 })).toBe(true);
    expect(isRetryable({ status: 503 })).toBe(true);
    expect(isRetryable({ status: 408 })).toBe(true);
    expect(isRetryable({ status: 400 })).toBe(false);
    expect(isRetryable({ status: 401 })).toBe(false);
  });

  it("classifies socket error codes", () => {
    expect(isRetryable({ code: "ECONNRESET" })).toBe(true);
    expect(isRetryable({ code: "ENOENT" })).toBe(false);
  });

  it("does not retry plain errors or non-objects", () => {
    expect(isRetryable(new Error("boom"))).toBe(false);
    expect(isRetryable("boom")).toBe(false);
    expect(isRetryable(null)).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures with exponential waits", async () => {
    const waits: number[] = [];
    const fn = vi
      .fn()
      .mockRejectedValueOnce({ status: 503 })
      .mockRejectedValueOnce({ status: 429 })
      .mockResolvedValue("third time");

    const result = await withRetry(fn, {
      maxRetries: 2,
      baseDelayMs: 100,
      sleep: noSleep,
      onRetry: (_attempt, _err, waitMs) => waits.push(waitMs),
    });

    expect(result).toBe("third time");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([100, 200]);
  });

  it("caps the wait at maxDelayMs", async () => {
    const waits: number[] = [];
    const fn = vi
      .fn()
      .mockRejectedValueOnce({ status: 500 })
      .mockRejectedValueOnce({ status: 500 })
      .mockRejectedValueOnce({ status: 500 })
      .mockResolvedValue(1);

    await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 400,
      maxDelayMs: 1000,
      sleep: noSleep,
      onRetry: (_a, _e, w) => waits.push(w),
    });

    expect(waits).toEqual([400, 800, 1000]);
  });

  it("gives up immediately on a non-retryable error", async () => {
    const err = new ExternalServiceError("llm", "invalid key", { retryable: false });
    const fn = vi.fn().mockRejectedValue(err);

    await expect(withRetry(fn, { sleep: noSleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last error after exhausting retries", async () => {
    const fn = vi.fn().mockRejectedValue({ status: 502, message: "bad gateway" });

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep, onRetry: () => {} })).rejects.toEqual({
      status: 502,
      message: "bad gateway",
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
