/**
 * Meter Module - Pure Transformations
 *
 * Response interpretation and query building. No I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { type Interval, intervalSeconds, toUnixSeconds } from "../intervals/index.js";
import {
  type MeterError,
  apiError,
  authFailed,
  invalidResponse,
  multipleMeters,
  noMeter,
  noReading,
  serverError,
} from "./errors.js";
import {
  ApiErrorResponseSchema,
  type CurrentPower,
  CurrentValuesSummarySchema,
  EnergyResponseSchema,
  type HistoricPower,
} from "./schema.js";

/** A new current reading is published every 30 seconds */
export const CURRENT_VALUE_LIFETIME_MS = 30 * 1000;

const BAD_TOKEN = "bad token";

/**
 * Map an error object sent with a 200 status to a MeterError.
 */
export function classifyErrorResponse(data: unknown): MeterError {
  const parsed = ApiErrorResponseSchema.safeParse(data);
  if (!parsed.success) {
    return invalidResponse("Unexpected response format", data);
  }

  if (parsed.data.error?.id === 500) {
    return serverError("Service reported an internal error");
  }

  if (parsed.data.status === "error") {
    const description = parsed.data.desc ?? parsed.data.description ?? "";
    if (description.toLowerCase() === BAD_TOKEN) {
      return authFailed("Meter token was rejected");
    }
    return apiError(description);
  }

  return invalidResponse("Unexpected response format", data);
}

/**
 * Extract the single reading of the single meter.
 *
 * @example
 * parseCurrentValues([{ sid: "1", units: "kWm", age: 3, data: [{ "1700000000000": 512 }] }])
 * // ok({ value: 512, expiresAt: 1700000030000 })
 */
export function parseCurrentValues(
  data: unknown,
): Result<CurrentPower, MeterError> {
  if (!Array.isArray(data)) {
    return err(classifyErrorResponse(data));
  }
  if (data.length === 0) {
    return err(noMeter());
  }
  if (data.length > 1) {
    return err(multipleMeters(data.length));
  }

  const parsed = CurrentValuesSummarySchema.safeParse(data);
  const meter = parsed.success ? parsed.data[0] : undefined;
  if (!meter) {
    return err(invalidResponse("Invalid current values format", data));
  }

  const reading = meter.data.length === 1 ? meter.data[0] : undefined;
  const entries = reading ? Object.entries(reading) : [];
  const [entry] = entries;
  if (!entry || entries.length !== 1) {
    return err(
      noReading(`Expected one reading, found ${meter.data.length} readings`),
    );
  }

  const [timestampKey, value] = entry;
  if (!/^\d+$/.test(timestampKey)) {
    return err(invalidResponse(`Invalid reading timestamp: ${timestampKey}`));
  }

  return ok({
    value,
    expiresAt: new Date(Number(timestampKey) + CURRENT_VALUE_LIFETIME_MS),
  });
}

/**
 * How long a current reading may be reused: until it expires, and never
 * longer than one publication period. A reading that has already expired
 * (meter lagging, or a clock running ahead) is reused for a full period.
 */
export function currentValueTtl(power: CurrentPower, now: number): number {
  const remaining = power.expiresAt.getTime() - now;
  if (remaining <= 0) {
    return CURRENT_VALUE_LIFETIME_MS;
  }
  return Math.min(remaining, CURRENT_VALUE_LIFETIME_MS);
}

/**
 * Energy for one interval. The reported duration must match the
 * interval length.
 */
export function parseEnergyResponse(
  data: unknown,
  interval: Interval,
): Result<HistoricPower, MeterError> {
  const parsed = EnergyResponseSchema.safeParse(data);
  if (!parsed.success) {
    return err(classifyErrorResponse(data));
  }

  const expected = intervalSeconds(interval);
  if (parsed.data.duration !== expected) {
    return err(
      invalidResponse(
        `Expected a duration of ${expected}s, got ${parsed.data.duration}s`,
        data,
      ),
    );
  }

  return ok({
    value: parsed.data.sum,
    start: interval.start,
    end: interval.end,
  });
}

/**
 * Query parameters of a getEnergy call, token excluded.
 * `offsetMinutes` follows Date#getTimezoneOffset (UTC minus local).
 */
export function buildEnergyQuery(
  interval: Interval,
  offsetMinutes: number,
): Readonly<Record<string, string>> {
  return {
    fromTime: String(toUnixSeconds(interval.start)),
    toTime: String(toUnixSeconds(interval.end)),
    period: "custom",
    offset: String(offsetMinutes),
  };
}
