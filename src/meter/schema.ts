/**
 * Meter Module - Schemas and Types
 *
 * Data shapes of the Energyhive mobile proxy API and the values the
 * client produces. Schemas are the source of truth - types derived with
 * z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { Granularity } from "../intervals/index.js";

// =============================================================================
// Values
// =============================================================================

/**
 * Current power use (W) and when a newer reading becomes available.
 */
export type CurrentPower = Readonly<{
  value: number;
  expiresAt: Date;
}>;

/**
 * Energy used (kWh) within [start, end).
 */
export type HistoricPower = Readonly<{
  value: number;
  start: Date;
  end: Date;
}>;

export type HistoricRequest = Readonly<{
  start: Date;
  end: Date;
  granularity: Granularity;
  /** Aborts the remaining sub-interval calls */
  signal?: AbortSignal;
}>;

/**
 * Lazy, finite and restartable: every iteration issues its calls again.
 * The first failed element is also the last one.
 */
export type HistoricSeries<T, E> = AsyncIterable<Result<T, E>>;

// =============================================================================
// getCurrentValuesSummary
// =============================================================================

/**
 * One meter in the current values summary.
 * `data` holds one object mapping a millisecond timestamp to watts.
 */
export const CurrentValuesEntrySchema = z.object({
  cid: z.string().optional(),
  sid: z.string(),
  units: z.string(),
  age: z.number(),
  data: z.array(z.record(z.string(), z.number())),
});

export const CurrentValuesSummarySchema = z.array(CurrentValuesEntrySchema);

export type CurrentValuesSummary = z.infer<typeof CurrentValuesSummarySchema>;

// =============================================================================
// getEnergy
// =============================================================================

/**
 * Energy for a custom period. `sum` arrives as a string such as "0.09".
 */
export const EnergyResponseSchema = z.object({
  sum: z.coerce.number(),
  duration: z.coerce.number(),
  units: z.string(),
});

export type EnergyResponse = z.infer<typeof EnergyResponseSchema>;

// =============================================================================
// Errors reported in a 200 response
// =============================================================================

/**
 * The service reports failures as objects, with the description under
 * either `desc` or `description`.
 */
export const ApiErrorResponseSchema = z
  .object({
    status: z.string().optional(),
    desc: z.string().optional(),
    description: z.string().optional(),
    error: z
      .object({
        id: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
