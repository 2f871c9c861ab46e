import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  HttpStatusError,
  MalformedResponseError,
  RequestTimeoutError,
} from "../../../src/audit/core/errors.js";
import { createPacer } from "../../../src/audit/core/pacing.js";
import { backoffDelay, pacedRetry, withRetry } from "../../../src/audit/core/retry.js";

describe("withRetry", () => {
  it("returns on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withRetry(fn);
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures then succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new HttpStatusError(503, "https://example.test/a"))
      .mockRejectedValueOnce(new RequestTimeoutError("https://example.test/a", 5))
      .mockResolvedValue("ok");
    const result = await withRetry(fn, { baseDelayMs: 1 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("throws after max retries", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow(
      "ECONNRESET",
    );
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it("does not retry fatal failures", async () => {
    const fn = vi.fn().mockRejectedValue(new HttpStatusError(404, "https://example.test/a"));
    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow(
      "HTTP 404 for https://example.test/a",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("reports exactly one outcome per attempt", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new HttpStatusError(429, "https://example.test/a"))
      .mockRejectedValueOnce(new HttpStatusError(500, "https://example.test/a"))
      .mockResolvedValue("ok");
    const outcomes: string[] = [];
    await withRetry(fn, {
      baseDelayMs: 1,
      onAttempt: (outcome) => outcomes.push(outcome),
    });
    expect(outcomes).toEqual(["throttled", "error", "success"]);
  });

  it("reports a fatal failure as an error outcome", async () => {
    const outcomes: string[] = [];
    await expect(
      withRetry(
        () => Promise.reject(new MalformedResponseError("bad body")),
        { onAttempt: (outcome) => outcomes.push(outcome) },
      ),
    ).rejects.toThrow("bad body");
    expect(outcomes).toEqual(["error"]);
  });

  it("stops waiting when the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new HttpStatusError(503, "https://example.test/a"));
    const pending = withRetry(fn, {
      baseDelayMs: 10_000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 10);
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt up to the maximum", () => {
    const noJitter = () => 0;
    expect(backoffDelay(0, new Error("x"), 100, 1000, noJitter)).toBe(100);
    expect(backoffDelay(2, new Error("x"), 100, 1000, noJitter)).toBe(400);
    expect(backoffDelay(5, new Error("x"), 100, 1000, noJitter)).toBe(1000);
  });

  it("adds at most ten percent jitter", () => {
    expect(backoffDelay(0, new Error("x"), 100, 1000, () => 0.5)).toBe(105);
  });

  it("waits at least as long as Retry-After asks", () => {
    const err = new HttpStatusError(429, "https://example.test/a", 7000);
    expect(backoffDelay(0, err, 100, 1000, () => 0)).toBe(7000);
  });
});

describe("pacedRetry", () => {
  it("takes a permit and reports an outcome for every attempt", async () => {
    const pacer = createPacer("adaptive", {
      bounds: { index: { initialDelayMs: 1, floorMs: 1, ceilingMs: 10 } },
      tuning: { cooldownOnThrottledMs: 0 },
    });
    const acquire = vi.spyOn(pacer, "acquire");
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new HttpStatusError(429, "https://example.test/cdx"))
      .mockResolvedValue(["row"]);

    const result = await pacedRetry(pacer, "index", fn, { baseDelayMs: 1 });

    expect(result).toEqual(["row"]);
    expect(acquire).toHaveBeenCalledTimes(2);
    expect(acquire).toHaveBeenCalledWith("index", undefined);
    const snap = pacer.controller("index").snapshot();
    expect(snap.totals).toEqual({ success: 1, throttled: 1, error: 0 });
    expect(snap.delayMs).toBe(2);
    expect(pacer.controller("content").snapshot().totals.throttled).toBe(0);
  });
});
