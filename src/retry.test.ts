import { describe, expect, it, vi } from "vitest";
import {
  type AttemptResult,
  calculateDelay,
  executeWithRetry,
  parseRetryAfter,
} from "./retry.js";

describe("parseRetryAfter", () => {
  it.each([
    ["2", 2],
    ["0.25", 0.25],
    ["0", 0],
    [" 3 ", 3],
  ])("parses %j as %d seconds", (header, expected) => {
    expect(parseRetryAfter(header, 1)).toBe(expected);
  });

  it.each([null, undefined, "", "soon", "-1", "Wed, 21 Oct 2026 07:28:00 GMT"])(
    "falls back for %j",
    (header) => {
      expect(parseRetryAfter(header, 1.5)).toBe(1.5);
    },
  );

  it("defaults the fallback to one second", () => {
    expect(parseRetryAfter(null)).toBe(1);
  });
});

describe("calculateDelay", () => {
  const config = { maxRetries: 3 };

  it("grows linearly for transport failures", () => {
    expect([0, 1, 2].map((attempt) => calculateDelay(attempt, "transport", config))).toEqual([
      500, 1000, 1500,
    ]);
  });

  it("honours a configured backoff unit", () => {
    expect(
      calculateDelay(1, "transport", { maxRetries: 3, transportBackoffSeconds: 0.2 }),
    ).toBe(400);
  });

  it("waits exactly Retry-After when rate limited", () => {
    expect(calculateDelay(2, "rate_limited", config, 0.01)).toBe(10);
  });

  it("uses the rate-limit fallback when no Retry-After is known", () => {
    expect(calculateDelay(0, "rate_limited", config)).toBe(1000);
    expect(
      calculateDelay(0, "rate_limited", { maxRetries: 3, rateLimitFallbackSeconds: 2 }),
    ).toBe(2000);
  });
});

describe("executeWithRetry", () => {
  const noDelay = { maxRetries: 2, transportBackoffSeconds: 0 };

  it("returns the first successful response", async () => {
    const fn = vi.fn(async (): Promise<AttemptResult<string>> => ({ ok: true, response: "done" }));

    await expect(executeWithRetry(fn, noDelay)).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("throws non-retryable errors immediately", async () => {
    const error = new Error("bad request");
    const fn = vi.fn(async (): Promise<AttemptResult<string>> => ({ ok: false, error }));

    await expect(executeWithRetry(fn, noDelay)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("makes at most maxRetries + 1 attempts", async () => {
    const fn = vi.fn(
      async (attempt: number): Promise<AttemptResult<string>> => ({
        ok: false,
        error: new Error(`failure ${attempt}`),
        retry: "transport",
      }),
    );

    await expect(executeWithRetry(fn, noDelay)).rejects.toThrow("failure 2");
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
  });

  it("reports each retry to the hook", async () => {
    const onRetry = vi.fn();
    const results: AttemptResult<number>[] = [
      { ok: false, error: new Error("429"), retry: "rate_limited", retryAfterSeconds: 0 },
      { ok: false, error: new Error("reset"), retry: "transport" },
      { ok: true, response: 7 },
    ];
    const fn = async (attempt: number): Promise<AttemptResult<number>> => {
      const result = results[attempt];
      if (!result) {
        throw new Error(`unexpected attempt ${attempt}`);
      }
      return result;
    };

    await expect(executeWithRetry(fn, noDelay, { onRetry })).resolves.toBe(7);
    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.reason, info.delayMs])).toEqual([
      [0, "rate_limited", 0],
      [1, "transport", 0],
    ]);
  });

  it("treats a negative maxRetries as zero", async () => {
    const fn = vi.fn(
      async (): Promise<AttemptResult<string>> => ({
        ok: false,
        error: new Error("reset"),
        retry: "transport",
      }),
    );

    await expect(executeWithRetry(fn, { maxRetries: -1 })).rejects.toThrow("reset");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
