import { describe, expect, it } from "vitest";
import { DEFAULT_RETRY, computeBackoffDelay, totalAttempts } from "../src/upstream/retry";

describe("computeBackoffDelay", () => {
  it("doubles from one second and caps at thirty", () => {
    const delays = [0, 1, 2, 3, 4, 5].map((i) => computeBackoffDelay(i, DEFAULT_RETRY));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000]);
  });

  it("honours a custom policy", () => {
    const policy = { maxRetries: 2, baseDelayMs: 500, maxDelayMs: 2000, exponentialBase: 3 };
    expect([0, 1, 2].map((i) => computeBackoffDelay(i, policy))).toEqual([500, 1500, 2000]);
  });
});

describe("totalAttempts", () => {
  it("is max_retries plus one", () => {
    expect(totalAttempts(DEFAULT_RETRY)).toBe(4);
    expect(totalAttempts({ ...DEFAULT_RETRY, maxRetries: 0 })).toBe(1);
  });
});
