/**
 * Timed Cache Module - Service Layer
 *
 * One value per key with an explicit time-to-live. Fetches are
 * single-flight: concurrent callers for the same missing key share one
 * in-flight fetch and its result. A failed fetch stores nothing.
 *
 * Each cache instance owns its state; nothing is shared between clients.
 */
import { type Result, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { CacheEntry, Clock, TtlSource } from "./schema.js";
import { isEntryValid, resolveTtl } from "./transform.js";

const log = createLogger("cache");

export type TimedCacheOptions = Readonly<{
  /** Name used in log lines */
  name?: string;
  now?: Clock;
}>;

export type TimedCache<T, E> = Readonly<{
  /**
   * Return the cached value for `key`, or run `fetch` once and store its
   * ok value for `ttl`.
   */
  getOrFetch: (
    key: string,
    ttl: TtlSource<T>,
    fetch: () => Promise<Result<T, E>>,
  ) => Promise<Result<T, E>>;
  /** Current valid value, without fetching */
  peek: (key: string) => T | undefined;
  /**
   * Drop the entry and detach any in-flight fetch, whose result is then
   * returned to its callers but not stored.
   */
  invalidate: (key: string) => boolean;
  clear: () => void;
  /** Number of stored entries, valid or not */
  size: () => number;
}>;

/**
 * Create an empty cache.
 *
 * @example
 * const cache = createTimedCache<DeviceTemperature, ThermostatError>({ name: "temperature" });
 * const result = await cache.getOrFetch("VALVE", 240_000, () => fetchTemperature("VALVE"));
 */
export function createTimedCache<T, E>(
  options: TimedCacheOptions = {},
): TimedCache<T, E> {
  const name = options.name ?? "cache";
  const now = options.now ?? Date.now;
  const entries = new Map<string, CacheEntry<T>>();
  const inflight = new Map<string, Promise<Result<T, E>>>();

  function peek(key: string): T | undefined {
    const entry = entries.get(key);
    if (entry && isEntryValid(entry, now())) {
      return entry.value;
    }
    return undefined;
  }

  async function getOrFetch(
    key: string,
    ttl: TtlSource<T>,
    fetch: () => Promise<Result<T, E>>,
  ): Promise<Result<T, E>> {
    const entry = entries.get(key);
    if (entry && isEntryValid(entry, now())) {
      log.trace({ cache: name, key }, "Cache hit");
      return ok(entry.value);
    }

    const pending = inflight.get(key);
    if (pending) {
      log.trace({ cache: name, key }, "Joining in-flight fetch");
      return pending;
    }

    log.debug({ cache: name, key }, "Cache miss, fetching");

    const request: Promise<Result<T, E>> = fetch().then(
      (result) => {
        // Only the current fetch may write; invalidate() detaches it
        if (inflight.get(key) !== request) {
          return result;
        }
        inflight.delete(key);

        if (result.isOk()) {
          const ttlMs = resolveTtl(ttl, result.value);
          entries.set(key, { value: result.value, fetchedAt: now(), ttlMs });
          log.trace({ cache: name, key, ttlMs }, "Cache entry stored");
        } else {
          entries.delete(key);
        }

        return result;
      },
      (error: unknown) => {
        if (inflight.get(key) === request) {
          inflight.delete(key);
        }
        throw error;
      },
    );

    inflight.set(key, request);
    return request;
  }

  function invalidate(key: string): boolean {
    const hadInflight = inflight.delete(key);
    const hadEntry = entries.delete(key);

    if (hadInflight || hadEntry) {
      log.debug({ cache: name, key }, "Cache entry invalidated");
    }

    return hadInflight || hadEntry;
  }

  function clear(): void {
    entries.clear();
    inflight.clear();
    log.debug({ cache: name }, "Cache cleared");
  }

  return {
    getOrFetch,
    peek,
    invalidate,
    clear,
    size: () => entries.size,
  };
}
