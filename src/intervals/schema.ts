/**
 * Intervals Module - Types
 *
 * Granularities and half-open time intervals used by historic retrieval.
 */

/**
 * Minute granularities that divide 30 (and so 60), which keeps every
 * interval aligned to the hour.
 */
export const GRANULARITIES = [1, 2, 3, 5, 6, 10, 15, 30] as const;

export type Granularity = (typeof GRANULARITIES)[number];

/**
 * Half-open interval [start, end).
 */
export type Interval = Readonly<{
  start: Date;
  end: Date;
}>;
