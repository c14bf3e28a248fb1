/**
 * Timed Cache Module - Types
 */

/**
 * A stored value and the window in which it may be served.
 * Valid iff now < fetchedAt + ttlMs.
 */
export type CacheEntry<T> = Readonly<{
  value: T;
  fetchedAt: number; // Unix timestamp in ms
  ttlMs: number;
}>;

/**
 * Time-to-live in ms, fixed or derived from the fetched value.
 */
export type TtlSource<T> = number | ((value: T) => number);

/**
 * Source of the current time in ms.
 */
export type Clock = () => number;
