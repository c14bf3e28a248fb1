/**
 * Timed Cache Module - Pure Transformations
 */
import type { CacheEntry, TtlSource } from "./schema.js";

/**
 * Check whether an entry may still be served.
 *
 * @example
 * isEntryValid({ value: 1, fetchedAt: 1000, ttlMs: 500 }, 1499) // true
 * isEntryValid({ value: 1, fetchedAt: 1000, ttlMs: 500 }, 1500) // false
 */
export function isEntryValid<T>(entry: CacheEntry<T>, now: number): boolean {
  return now < entry.fetchedAt + entry.ttlMs;
}

/**
 * Resolve a TTL source against the fetched value. Negative values become 0.
 */
export function resolveTtl<T>(ttl: TtlSource<T>, value: T): number {
  const ttlMs = typeof ttl === "function" ? ttl(value) : ttl;
  return Math.max(ttlMs, 0);
}
