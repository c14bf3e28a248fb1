/**
 * Meter Module - Service Layer
 *
 * Client for one energy meter behind the Energyhive mobile proxy.
 * Authentication is a long-lived token sent as a query parameter.
 *
 * - current(): the latest reading, reused until the next one is due
 * - getHistoric(): energy per aligned sub-interval, one call each,
 *   throttled to the configured calls per second
 */
import { type Result, err, ok } from "neverthrow";

import { type Interval, partitionRange } from "../intervals/index.js";
import { createLogger, startOperation } from "../logger.js";
import { type RateLimiter, createRateLimiter } from "../rate-limiter/index.js";
import { type TimedCache, createTimedCache } from "../timed-cache/index.js";
import {
  type MeterError,
  cancelled,
  formatMeterError,
  invalidRange,
  invalidResponse,
  networkError,
  serverError,
} from "./errors.js";
import type {
  CurrentPower,
  HistoricPower,
  HistoricRequest,
  HistoricSeries,
} from "./schema.js";
import {
  buildEnergyQuery,
  currentValueTtl,
  parseCurrentValues,
  parseEnergyResponse,
} from "./transform.js";

const log = createLogger("meter");

const DEFAULT_BASE_URL = "http://www.energyhive.com/mobile_proxy";
const DEFAULT_TIMEOUT_MS = 10000;
const CURRENT_KEY = "current";

export type MeterClientOptions = Readonly<{
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRequestsPerSecond?: number;
  /**
   * Offset sent with historic queries, in Date#getTimezoneOffset minutes.
   * Defaults to the local offset at the start of each interval.
   */
  offsetMinutes?: number;
  now?: () => number;
}>;

export type MeterClient = Readonly<{
  current: () => Promise<Result<CurrentPower, MeterError>>;
  /**
   * Validates the range and returns a lazy series; no call is made until
   * it is iterated.
   */
  getHistoric: (
    request: HistoricRequest,
  ) => Result<HistoricSeries<HistoricPower, MeterError>, MeterError>;
}>;

type MeterContext = Readonly<{
  token: string;
  baseUrl: string;
  timeoutMs: number;
  offsetMinutes: number | undefined;
  now: () => number;
  limiter: RateLimiter;
  cache: TimedCache<CurrentPower, MeterError>;
}>;

/**
 * Create a meter client with its own cache and rate limiter.
 *
 * @example
 * const meter = createMeterClient({ token: process.env.METER_TOKEN });
 * const power = await meter.current();
 * if (power.isOk()) console.log(`${power.value.value} W`);
 */
export function createMeterClient(options: MeterClientOptions): MeterClient {
  const now = options.now ?? Date.now;
  const ctx: MeterContext = {
    token: options.token,
    baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    offsetMinutes: options.offsetMinutes,
    now,
    limiter: createRateLimiter({
      maxPerSecond: options.maxRequestsPerSecond,
      now,
    }),
    cache: createTimedCache<CurrentPower, MeterError>({ name: "meter", now }),
  };

  return {
    current: () => current(ctx),
    getHistoric: (request) => getHistoric(ctx, request),
  };
}

// =============================================================================
// HTTP
// =============================================================================

async function requestJson(
  ctx: MeterContext,
  endpoint: string,
  params: Readonly<Record<string, string>>,
  signal?: AbortSignal,
): Promise<Result<unknown, MeterError>> {
  const url = new URL(`${ctx.baseUrl}${endpoint}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  url.searchParams.set("token", ctx.token);

  log.debug({ endpoint, ...params }, "Calling energy service");

  const timeout = AbortSignal.timeout(ctx.timeoutMs);

  try {
    const response = await fetch(url.toString(), {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (response.status === 500) {
      return err(serverError(`HTTP 500: ${response.statusText}`));
    }
    if (!response.ok) {
      return err(
        networkError(`HTTP ${response.status}: ${response.statusText}`),
      );
    }

    const data: unknown = await response.json();
    return ok(data);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (signal?.aborted) {
      return err(cancelled("Request aborted"));
    }
    if (cause instanceof SyntaxError) {
      return err(invalidResponse("Response is not valid JSON"));
    }
    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(networkError("Request timed out", cause));
    }
    return err(networkError("Failed to reach energy service", cause));
  }
}

// =============================================================================
// Current power
// =============================================================================

async function fetchCurrent(
  ctx: MeterContext,
): Promise<Result<CurrentPower, MeterError>> {
  const data = await requestJson(ctx, "/getCurrentValuesSummary", {});
  if (data.isErr()) {
    return err(data.error);
  }

  const power = parseCurrentValues(data.value);
  if (power.isErr()) {
    log.warn(
      { error: formatMeterError(power.error) },
      "Could not read current power",
    );
    return power;
  }

  log.info(
    { power: power.value.value, expiresAt: power.value.expiresAt },
    "Current power received",
  );
  return power;
}

function current(ctx: MeterContext): Promise<Result<CurrentPower, MeterError>> {
  return ctx.cache.getOrFetch(
    CURRENT_KEY,
    (power) => currentValueTtl(power, ctx.now()),
    () => fetchCurrent(ctx),
  );
}

// =============================================================================
// Historic power
// =============================================================================

async function fetchEnergy(
  ctx: MeterContext,
  interval: Interval,
  signal?: AbortSignal,
): Promise<Result<HistoricPower, MeterError>> {
  const offsetMinutes =
    ctx.offsetMinutes ?? interval.start.getTimezoneOffset();

  const data = await requestJson(
    ctx,
    "/getEnergy",
    buildEnergyQuery(interval, offsetMinutes),
    signal,
  );
  if (data.isErr()) {
    return err(data.error);
  }

  return parseEnergyResponse(data.value, interval);
}

async function* iterateHistoric(
  ctx: MeterContext,
  intervals: ReadonlyArray<Interval>,
  signal?: AbortSignal,
): AsyncGenerator<Result<HistoricPower, MeterError>, void, undefined> {
  const op = startOperation(log, "getHistoric", {
    intervals: intervals.length,
  });

  for (const interval of intervals) {
    const slot = await ctx.limiter.acquire(signal);
    if (slot.isErr()) {
      op.fail(slot.error, { start: interval.start });
      yield err(cancelled(slot.error.message));
      return;
    }

    const result = await fetchEnergy(ctx, interval, signal);
    if (result.isErr()) {
      op.fail(formatMeterError(result.error), { start: interval.start });
      yield result;
      return;
    }

    yield result;
  }

  op.complete();
}

function getHistoric(
  ctx: MeterContext,
  request: HistoricRequest,
): Result<HistoricSeries<HistoricPower, MeterError>, MeterError> {
  if (request.end.getTime() <= request.start.getTime()) {
    return err(invalidRange(request.start, request.end));
  }

  const intervals = partitionRange(
    request.start,
    request.end,
    request.granularity,
  );

  return ok({
    [Symbol.asyncIterator]: () =>
      iterateHistoric(ctx, intervals, request.signal),
  });
}

/**
 * Drain a series into an array; the first error fails the whole result.
 */
export async function collectHistoric<T, E>(
  series: HistoricSeries<T, E>,
): Promise<Result<T[], E>> {
  const values: T[] = [];
  for await (const item of series) {
    if (item.isErr()) {
      return err(item.error);
    }
    values.push(item.value);
  }
  return ok(values);
}
