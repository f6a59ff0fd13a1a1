import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BackoffPolicy } from "@/services/relay/backoff";
import { PollingLoop } from "@/services/relay/pollingLoop";
import { WorkOutcome } from "@/types/relay";

// setImmediate stays real so it can drain pending promise chains.
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function createLoop(work: () => Promise<WorkOutcome>) {
  return new PollingLoop(work, {
    name: "test",
    idleDelayMs: 1000,
    backoff: new BackoffPolicy({ strategy: "exponential", baseDelayMs: 2000, maxDelayMs: 30000, random: () => 0.5 }),
  });
}

describe("PollingLoop.runIteration", () => {
  it("continues immediately after processing a job", async () => {
    const loop = createLoop(async () => ({ status: "processed", jobId: "job-1" }));

    await expect(loop.runIteration()).resolves.toEqual({ delayMs: 0, wakeable: false });
  });

  it("sleeps the poll interval when idle", async () => {
    const loop = createLoop(async () => ({ status: "idle" }));

    await expect(loop.runIteration()).resolves.toEqual({ delayMs: 1000, wakeable: true });
  });

  it("backs off while blocked and resets after progress", async () => {
    const work = vi
      .fn<[], Promise<WorkOutcome>>()
      .mockResolvedValueOnce({ status: "blocked", reason: "no staging chat" })
      .mockResolvedValueOnce({ status: "blocked", reason: "no staging chat" })
      .mockResolvedValueOnce({ status: "idle" })
      .mockResolvedValueOnce({ status: "blocked", reason: "no staging chat" });
    const loop = createLoop(work);

    const delays: number[] = [];
    for (let i = 0; i < 4; i += 1) {
      delays.push((await loop.runIteration()).delayMs);
    }

    expect(delays).toEqual([2000, 4000, 1000, 2000]);
  });

  it("waits exactly the requested time when rate limited", async () => {
    const loop = createLoop(async () => ({ status: "rate_limited", jobId: "job-1", retryAfterMs: 30000 }));

    await expect(loop.runIteration()).resolves.toEqual({ delayMs: 30000, wakeable: false });
  });

  it("absorbs thrown errors into backoff", async () => {
    const loop = createLoop(async () => {
      throw new Error("database is down");
    });

    await expect(loop.runIteration()).resolves.toEqual({ delayMs: 2000, wakeable: false });
    await expect(loop.runIteration()).resolves.toEqual({ delayMs: 4000, wakeable: false });
  });
});

describe("PollingLoop lifecycle", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("polls again after the idle interval", async () => {
    const work = vi.fn<[], Promise<WorkOutcome>>().mockResolvedValue({ status: "idle" });
    const loop = createLoop(work);

    loop.start();
    await flush();
    expect(work).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(999);
    await flush();
    expect(work).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    await flush();
    expect(work).toHaveBeenCalledTimes(2);

    await loop.stop();
  });

  it("wakes up early from an idle sleep", async () => {
    const work = vi.fn<[], Promise<WorkOutcome>>().mockResolvedValue({ status: "idle" });
    const loop = createLoop(work);

    loop.start();
    await flush();
    loop.wake();
    await flush();

    expect(work).toHaveBeenCalledTimes(2);
    await loop.stop();
  });

  it("does not cut a rate-limit pause short", async () => {
    const work = vi
      .fn<[], Promise<WorkOutcome>>()
      .mockResolvedValueOnce({ status: "rate_limited", jobId: "job-1", retryAfterMs: 30000 })
      .mockResolvedValue({ status: "idle" });
    const loop = createLoop(work);

    loop.start();
    await flush();
    loop.wake();
    await flush();
    expect(work).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(29_999);
    await flush();
    expect(work).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    await flush();
    expect(work).toHaveBeenCalledTimes(2);

    await loop.stop();
  });

  it("stops after the current iteration", async () => {
    const work = vi.fn<[], Promise<WorkOutcome>>().mockResolvedValue({ status: "idle" });
    const loop = createLoop(work);

    loop.start();
    await flush();
    await loop.stop();

    expect(loop.isRunning()).toBe(false);
    vi.advanceTimersByTime(5000);
    await flush();
    expect(work).toHaveBeenCalledTimes(1);
  });
});
