import { describe, expect, it } from "vitest";

import { BackoffPolicy } from "./backoff";

// random() === 0.5 cancels jitter out.
const noJitter = () => 0.5;

describe("BackoffPolicy", () => {
  it("keeps a fixed delay regardless of attempt", () => {
    const policy = new BackoffPolicy({ strategy: "fixed", baseDelayMs: 2000, maxDelayMs: 30000, random: noJitter });

    expect(policy.delayFor(1)).toBe(2000);
    expect(policy.delayFor(8)).toBe(2000);
  });

  it("doubles per consecutive failure up to the cap", () => {
    const policy = new BackoffPolicy({
      strategy: "exponential",
      baseDelayMs: 2000,
      maxDelayMs: 30000,
      random: noJitter,
    });

    expect([1, 2, 3, 4, 5, 6].map((attempt) => policy.delayFor(attempt))).toEqual([
      2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });

  it("applies jitter within the configured ratio", () => {
    const low = new BackoffPolicy({ strategy: "fixed", baseDelayMs: 1000, maxDelayMs: 5000, random: () => 0 });
    const high = new BackoffPolicy({ strategy: "fixed", baseDelayMs: 1000, maxDelayMs: 5000, random: () => 1 });

    expect(low.delayFor(1)).toBe(800);
    expect(high.delayFor(1)).toBe(1200);
  });

  it("never exceeds the cap after jitter", () => {
    const policy = new BackoffPolicy({ strategy: "exponential", baseDelayMs: 1000, maxDelayMs: 4000, random: () => 1 });

    expect(policy.delayFor(10)).toBe(4000);
  });

  it("treats attempt zero like the first attempt", () => {
    const policy = new BackoffPolicy({ strategy: "exponential", baseDelayMs: 500, maxDelayMs: 5000, random: noJitter });

    expect(policy.delayFor(0)).toBe(500);
  });
});
