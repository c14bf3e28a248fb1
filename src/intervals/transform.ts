/**
 * Intervals Module - Pure Transformations
 *
 * Alignment works on epoch milliseconds, so boundaries fall on whole UTC
 * hours. For any zone whose offset is a multiple of 30 minutes that is
 * the same as aligning to the local hour.
 */
import { GRANULARITIES, type Granularity, type Interval } from "./schema.js";

const MINUTE_MS = 60 * 1000;

/**
 * Type guard for values coming from outside the type system.
 */
export function isGranularity(value: number): value is Granularity {
  return GRANULARITIES.some((granularity) => granularity === value);
}

/**
 * Round down to the nearest multiple of `minutes` (seconds dropped).
 *
 * @example
 * roundDown(new Date("2024-01-01T00:07:30Z"), 5) // 00:05:00
 */
export function roundDown(date: Date, minutes: Granularity): Date {
  const step = minutes * MINUTE_MS;
  return new Date(Math.floor(date.getTime() / step) * step);
}

/**
 * Round up to the nearest multiple of `minutes`; aligned dates are kept.
 *
 * @example
 * roundUp(new Date("2024-01-01T00:07:30Z"), 5) // 00:10:00
 */
export function roundUp(date: Date, minutes: Granularity): Date {
  const step = minutes * MINUTE_MS;
  return new Date(Math.ceil(date.getTime() / step) * step);
}

/**
 * Widen [start, end) outwards to `minutes` boundaries.
 */
export function alignRange(
  start: Date,
  end: Date,
  minutes: Granularity,
): Interval {
  return { start: roundDown(start, minutes), end: roundUp(end, minutes) };
}

/**
 * Split [start, end) into consecutive intervals of `minutes` length,
 * after aligning the range. Returns an empty list when end <= start.
 *
 * @example
 * partitionRange(00:07, 01:00, 5) // [00:05-00:10), [00:10-00:15), ..., [00:55-01:00)
 */
export function partitionRange(
  start: Date,
  end: Date,
  minutes: Granularity,
): ReadonlyArray<Interval> {
  const aligned = alignRange(start, end, minutes);
  const step = minutes * MINUTE_MS;
  const intervals: Interval[] = [];

  for (
    let current = aligned.start.getTime();
    current < aligned.end.getTime();
    current += step
  ) {
    intervals.push({ start: new Date(current), end: new Date(current + step) });
  }

  return intervals;
}

/**
 * Split [start, end) into chunks of at most `maxMs` length.
 * The last chunk may be shorter.
 */
export function chunkRange(
  start: Date,
  end: Date,
  maxMs: number,
): ReadonlyArray<Interval> {
  const chunks: Interval[] = [];

  for (
    let current = start.getTime();
    current < end.getTime();
    current += maxMs
  ) {
    chunks.push({
      start: new Date(current),
      end: new Date(Math.min(current + maxMs, end.getTime())),
    });
  }

  return chunks;
}

/**
 * Length of an interval in whole seconds.
 */
export function intervalSeconds(interval: Interval): number {
  return Math.round((interval.end.getTime() - interval.start.getTime()) / 1000);
}

/**
 * Unix timestamp (seconds) of a date.
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
