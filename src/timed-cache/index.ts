/**
 * Timed Cache Module - Public API
 */

export type { CacheEntry, Clock, TtlSource } from "./schema.js";
export type { TimedCache, TimedCacheOptions } from "./service.js";

export { createTimedCache } from "./service.js";
export { isEntryValid, resolveTtl } from "./transform.js";
