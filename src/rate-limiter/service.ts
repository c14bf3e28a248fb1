/**
 * Rate Limiter Module - Service Layer
 *
 * Hard ceiling on calls per second with no burst: granted slots are at
 * least 1000 / maxPerSecond ms apart, measured from when each grant
 * actually happened. Waiters queue in FIFO order behind a single timer.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type RateLimiterError, cancelled } from "./errors.js";
import { nextGrantDelay, slotSpacingMs } from "./transform.js";

const log = createLogger("limiter");

const DEFAULT_MAX_PER_SECOND = 20;

export type RateLimiterOptions = Readonly<{
  maxPerSecond?: number;
  now?: () => number;
}>;

export type RateLimiter = Readonly<{
  /**
   * Wait until the next call may be issued.
   * Resolves to CANCELLED if `signal` is or becomes aborted.
   */
  acquire: (signal?: AbortSignal) => Promise<Result<void, RateLimiterError>>;
}>;

type Waiter = {
  resolve: (result: Result<void, RateLimiterError>) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Create a limiter with its own grant schedule.
 *
 * @example
 * const limiter = createRateLimiter({ maxPerSecond: 20 });
 * const slot = await limiter.acquire(signal);
 * if (slot.isErr()) return err(slot.error);
 */
export function createRateLimiter(
  options: RateLimiterOptions = {},
): RateLimiter {
  const maxPerSecond = options.maxPerSecond ?? DEFAULT_MAX_PER_SECOND;
  const spacingMs = slotSpacingMs(maxPerSecond);
  const now = options.now ?? Date.now;

  const queue: Waiter[] = [];
  let lastGrantAt = Number.NEGATIVE_INFINITY;
  let timer: ReturnType<typeof setTimeout> | undefined;

  function schedule(): void {
    if (timer !== undefined || queue.length === 0) {
      return;
    }
    const waitMs = Math.ceil(nextGrantDelay(now(), lastGrantAt, spacingMs));
    timer = setTimeout(pump, waitMs);
  }

  // The timer may fire late; the grant time is re-checked against the clock
  function pump(): void {
    timer = undefined;
    const current = now();

    if (nextGrantDelay(current, lastGrantAt, spacingMs) <= 0) {
      const waiter = queue.shift();
      if (waiter) {
        lastGrantAt = current;
        if (waiter.onAbort) {
          waiter.signal?.removeEventListener("abort", waiter.onAbort);
        }
        waiter.resolve(ok(undefined));
      }
    }

    schedule();
  }

  function acquire(
    signal?: AbortSignal,
  ): Promise<Result<void, RateLimiterError>> {
    if (signal?.aborted) {
      return Promise.resolve(err(cancelled("Aborted before acquiring a slot")));
    }

    const current = now();
    if (queue.length === 0 && nextGrantDelay(current, lastGrantAt, spacingMs) <= 0) {
      lastGrantAt = current;
      return Promise.resolve(ok(undefined));
    }

    log.trace({ queued: queue.length + 1 }, "Waiting for rate limit slot");

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = queue.indexOf(waiter);
          if (index !== -1) {
            queue.splice(index, 1);
          }
          if (queue.length === 0 && timer !== undefined) {
            clearTimeout(timer);
            timer = undefined;
          }
          log.debug({ queued: queue.length }, "Slot wait cancelled");
          resolve(err(cancelled("Aborted while waiting for a slot")));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }

      queue.push(waiter);
      schedule();
    });
  }

  return { acquire };
}
