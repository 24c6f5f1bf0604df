import { describe, expect, it, vi } from "vitest";
import { ManualClock, RetryExhaustedError, backoffDelay, withRetry, type RetryDecision } from "poster-ingestion";

class Transient extends Error {}

const retryTransient = (error: unknown): RetryDecision => (error instanceof Transient ? { retry: true } : { retry: false });

describe("backoffDelay", () => {
  it("grows geometrically", () => {
    const config = { maxAttempts: 5, baseDelayMs: 1000, backoffFactor: 2 };
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, config))).toEqual([1000, 2000, 4000]);
  });
});

describe("withRetry", () => {
  it("retries until the call succeeds", async () => {
    const clock = new ManualClock();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Transient("flaky");
      return "ok";
    });
    expect(await withRetry(fn, retryTransient, { clock })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.now()).toBe(3000);
  });

  it("rethrows errors that should not be retried", async () => {
    const clock = new ManualClock();
    const fn = vi.fn(async () => {
      throw new Error("bad request");
    });
    await expect(withRetry(fn, retryTransient, { clock })).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.now()).toBe(0);
  });

  it("gives up after the configured attempts", async () => {
    const clock = new ManualClock();
    const fn = vi.fn(async () => {
      throw new Transient("down");
    });
    const failure = withRetry(fn, retryTransient, { clock, config: { maxAttempts: 3 } });
    await expect(failure).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(failure).rejects.toMatchObject({ attempts: 3 });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.now()).toBe(3000);
  });

  it("adds the extra delay a decision asks for", async () => {
    const clock = new ManualClock();
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Transient("slow down");
        return calls;
      },
      () => ({ retry: true, extraDelayMs: 500 }),
      { clock }
    );
    expect(result).toBe(3);
    expect(clock.now()).toBe(1500 + 2500);
  });
});
