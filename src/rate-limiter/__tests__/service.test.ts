/**
 * Rate Limiter Tests
 *
 * Uses fake timers so the 20/s ceiling can be checked without waiting.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import { createRateLimiter } from "../service.js";
import { nextGrantDelay, slotSpacingMs } from "../transform.js";

describe("Rate Limiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("grants the first slot immediately", async () => {
    const limiter = createRateLimiter({ maxPerSecond: 20 });

    const result = await limiter.acquire();

    expect(result.isOk()).toBe(true);
  });

  test("100 acquisitions take at least 100/20 seconds minus one slot", async () => {
    const limiter = createRateLimiter({ maxPerSecond: 20 });
    const startedAt = Date.now();
    const grantedAt: number[] = [];

    const all = Promise.all(
      Array.from({ length: 100 }, () =>
        limiter.acquire().then((result) => {
          grantedAt.push(Date.now());
          return result;
        }),
      ),
    );

    await vi.advanceTimersByTimeAsync(5_000);
    const results = await all;

    expect(results.every((r) => r.isOk())).toBe(true);
    expect(grantedAt).toHaveLength(100);
    expect(Math.max(...grantedAt) - startedAt).toBeGreaterThanOrEqual(4_950);
  });

  test("allows no burst beyond the ceiling", async () => {
    const limiter = createRateLimiter({ maxPerSecond: 20 });
    let granted = 0;

    for (let i = 0; i < 60; i++) {
      void limiter.acquire().then(() => {
        granted++;
      });
    }

    await vi.advanceTimersByTimeAsync(1_000);

    // slots at 0, 50, ..., 1000 ms
    expect(granted).toBeGreaterThanOrEqual(20);
    expect(granted).toBeLessThanOrEqual(21);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(granted).toBe(60);
  });

  test("keeps the ceiling when the event loop stalls", async () => {
    // Timers only fire when advanced; the injected clock can run ahead of them
    let clock = 0;
    const limiter = createRateLimiter({ maxPerSecond: 20, now: () => clock });
    const grantedAt: number[] = [];

    for (let i = 0; i < 40; i++) {
      void limiter.acquire().then(() => {
        grantedAt.push(clock);
      });
    }
    await vi.advanceTimersByTimeAsync(0);

    // 600ms of synchronous work: every overdue timer fires at once afterwards
    clock = 600;
    await vi.advanceTimersByTimeAsync(600);

    for (let step = 0; step < 200; step++) {
      clock += 10;
      await vi.advanceTimersByTimeAsync(10);
    }

    expect(grantedAt).toHaveLength(40);
    expect(grantedAt.slice(0, 3)).toEqual([0, 600, 650]);
    const gaps = grantedAt.slice(1).map((t, i) => t - (grantedAt[i] ?? t));
    expect(Math.min(...gaps)).toBeGreaterThanOrEqual(50);
    const busiestSecond = Math.max(
      ...grantedAt.map(
        (start) => grantedAt.filter((t) => t >= start && t < start + 1_000).length,
      ),
    );
    expect(busiestSecond).toBeLessThanOrEqual(20);
  });

  test("returns CANCELLED for an already aborted signal", async () => {
    const limiter = createRateLimiter();
    const controller = new AbortController();
    controller.abort();

    const result = await limiter.acquire(controller.signal);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe("CANCELLED");
  });

  test("returns CANCELLED promptly when aborted while waiting", async () => {
    const limiter = createRateLimiter({ maxPerSecond: 1 });
    const controller = new AbortController();

    await limiter.acquire();
    const waiting = limiter.acquire(controller.signal);
    controller.abort();
    const result = await waiting;

    expect(result._unsafeUnwrapErr().type).toBe("CANCELLED");
  });

  test("hands a cancelled slot back to the next caller", async () => {
    const limiter = createRateLimiter({ maxPerSecond: 1 });
    const controller = new AbortController();

    await limiter.acquire();
    const waiting = limiter.acquire(controller.signal);
    controller.abort();
    await waiting;

    let granted = false;
    void limiter.acquire().then(() => {
      granted = true;
    });

    await vi.advanceTimersByTimeAsync(1_000);
    expect(granted).toBe(true);
  });
});

describe("transform", () => {
  test("spacing for 20 per second is 50ms", () => {
    expect(slotSpacingMs(20)).toBe(50);
  });

  test("no wait once the spacing has passed", () => {
    expect(nextGrantDelay(1_200, 1_000, 50)).toBe(0);
  });

  test("waits out the rest of the spacing after the last grant", () => {
    expect(nextGrantDelay(1_020, 1_000, 50)).toBe(30);
  });

  test("the first grant never waits", () => {
    expect(nextGrantDelay(0, Number.NEGATIVE_INFINITY, 50)).toBe(0);
  });
});
