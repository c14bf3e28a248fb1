/**
 * Intervals Module - Public API
 */

export type { Granularity, Interval } from "./schema.js";
export { GRANULARITIES } from "./schema.js";

export {
  alignRange,
  chunkRange,
  intervalSeconds,
  isGranularity,
  partitionRange,
  roundDown,
  roundUp,
  toUnixSeconds,
} from "./transform.js";
