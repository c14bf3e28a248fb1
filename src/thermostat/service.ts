/**
 * Thermostat Module - Service Layer
 *
 * Client for one Netatmo household: a relay, a thermostat and a
 * thermostatic valve. Every call carries a bearer token from the
 * client's own TokenStore; a 401/403 triggers one refresh and one retry.
 *
 * Caches:
 * - temperatures: per device, 4 minutes
 * - home status: one shared entry, 15 seconds, behind the four status
 *   accessors
 *
 * A successful setpoint write drops the status entry and the temperature
 * of every device the write affects.
 */
import { type Result, err, ok } from "neverthrow";

import { type Interval, partitionRange } from "../intervals/index.js";
import { createLogger, startOperation } from "../logger.js";
import { createTimedCache } from "../timed-cache/index.js";
import {
  type AccessCredential,
  type LiveToken,
  type TokenState,
  createTokenStore,
} from "../token-store/index.js";
import {
  type ThermostatClientError,
  type ThermostatError,
  apiError,
  cancelled,
  formatThermostatError,
  invalidRange,
  invalidResponse,
  measurementError,
  networkError,
  unauthorized,
} from "./errors.js";
import {
  ApiErrorBodySchema,
  DEFAULT_HOLD_MINUTES,
  type Device,
  type DeviceTemperature,
  type DeviceTopology,
  type HistoricTemperature,
  type HistoricTemperatureRequest,
  type HomeStatus,
  HomeStatusResponseSchema,
  HomesDataResponseSchema,
  MAX_SETPOINT_TEMPERATURE,
  MeasureResponseSchema,
  type Reading,
  type SetpointMode,
  SetpointResponseSchema,
  ThermostatsDataResponseSchema,
} from "./schema.js";
import {
  VALVE_OFF_TEMPERATURE,
  buildHistoricQuery,
  buildMeasurementQuery,
  buildSetpointRequest,
  findThermostatReading,
  forwardFill,
  invalidatedDevices,
  parseBody,
  parseMeasurement,
  parseReadings,
  planHistoricChunks,
  projectHomeStatus,
  resolveTopology,
} from "./transform.js";

const log = createLogger("thermostat");

const DEFAULT_API_URL = "https://api.netatmo.com/api";
const DEFAULT_OAUTH_URL = "https://api.netatmo.com/oauth2";
const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_TEMPERATURE_TTL_MS = 4 * 60 * 1000;
const DEFAULT_STATUS_TTL_MS = 15 * 1000;
const STATUS_KEY = "home-status";

export type ThermostatClientOptions = Readonly<{
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** A live access token to start with; otherwise the first call refreshes */
  liveToken?: LiveToken;
  /** Receives every rotated credential; persist its refresh token */
  onRefresh?: (credential: AccessCredential) => void | Promise<void>;
  apiUrl?: string;
  oauthUrl?: string;
  timeoutMs?: number;
  temperatureTtlMs?: number;
  statusTtlMs?: number;
  now?: () => number;
}>;

type Outcome<T> = Promise<Result<T, ThermostatClientError>>;

export type ThermostatClient = Readonly<{
  getTopology: () => DeviceTopology;
  /** Resolve the devices again and drop every cached value */
  reloadTopology: () => Outcome<DeviceTopology>;
  getTokenState: () => TokenState;

  getMeasurement: (device: Device) => Outcome<DeviceTemperature>;
  thermostatTemperature: () => Outcome<number>;
  valveTemperature: () => Outcome<number>;
  getHistoric: (
    request: HistoricTemperatureRequest,
  ) => Outcome<ReadonlyArray<HistoricTemperature>>;

  /**
   * Apply a setpoint. ok(false) when the vendor rejects the request;
   * errors are reserved for invalid arguments, auth and transport.
   */
  setDevice: (
    device: Device,
    mode: SetpointMode,
    temperature?: number,
    minutes?: number,
  ) => Outcome<boolean>;
  turnOnDevice: (device: Device, minutes?: number) => Outcome<boolean>;
  turnOffDevice: (device: Device, minutes?: number) => Outcome<boolean>;

  thermostatOn: () => Outcome<boolean>;
  boilerOn: () => Outcome<boolean>;
  valveOn: () => Outcome<boolean>;
  valvePercentage: () => Outcome<number>;
}>;

/**
 * Create a thermostat client. Resolves the household topology first;
 * the client is only returned when that succeeds.
 *
 * @example
 * const client = await createThermostatClient({ clientId, clientSecret, refreshToken });
 * if (client.isErr()) throw new Error(formatThermostatError(client.error));
 * const boiler = await client.value.boilerOn();
 */
export async function createThermostatClient(
  options: ThermostatClientOptions,
): Promise<Result<ThermostatClient, ThermostatClientError>> {
  const now = options.now ?? Date.now;
  const apiUrl = options.apiUrl ?? DEFAULT_API_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const temperatureTtlMs =
    options.temperatureTtlMs ?? DEFAULT_TEMPERATURE_TTL_MS;
  const statusTtlMs = options.statusTtlMs ?? DEFAULT_STATUS_TTL_MS;

  const tokens = createTokenStore({
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    refreshToken: options.refreshToken,
    liveToken: options.liveToken,
    oauthUrl: options.oauthUrl ?? DEFAULT_OAUTH_URL,
    timeoutMs,
    onRefresh: options.onRefresh,
    now,
  });
  const temperatures = createTimedCache<DeviceTemperature, ThermostatClientError>({
    name: "temperature",
    now,
  });
  const statuses = createTimedCache<HomeStatus, ThermostatClientError>({
    name: "status",
    now,
  });

  // ===========================================================================
  // HTTP
  // ===========================================================================

  async function post(
    accessToken: string,
    endpoint: string,
    params: Readonly<Record<string, string>>,
    signal?: AbortSignal,
  ): Promise<Result<unknown, ThermostatError>> {
    log.debug({ endpoint }, "Calling thermostat service");

    const timeout = AbortSignal.timeout(timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${apiUrl}${endpoint}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": "application/x-www-form-urlencoded;charset=UTF-8",
        },
        body: new URLSearchParams(params).toString(),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (signal?.aborted) {
        return err(cancelled("Request aborted"));
      }
      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(networkError("Request timed out", cause));
      }
      return err(networkError("Failed to reach thermostat service", cause));
    }

    if (response.status === 401 || response.status === 403) {
      return err(unauthorized(response.status));
    }

    const data: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const rejection = ApiErrorBodySchema.safeParse(data);
      if (response.status === 400 && rejection.success) {
        return err(
          apiError(400, rejection.data.error.code, rejection.data.error.message),
        );
      }
      return err(
        networkError(`HTTP ${response.status}: ${response.statusText}`),
      );
    }

    if (data === undefined) {
      return err(invalidResponse("Response is not valid JSON"));
    }

    return ok(data);
  }

  function call(
    endpoint: string,
    params: Readonly<Record<string, string>>,
    signal?: AbortSignal,
  ): Outcome<unknown> {
    return tokens.withAuthorization(
      (accessToken) => post(accessToken, endpoint, params, signal),
      (error: ThermostatError) => error.type === "UNAUTHORIZED",
    );
  }

  // ===========================================================================
  // Topology
  // ===========================================================================

  async function loadTopology(): Outcome<DeviceTopology> {
    const data = await call("/homesdata", {});
    if (data.isErr()) {
      return err(data.error);
    }

    const homes = parseBody(HomesDataResponseSchema, data.value, "homesdata");
    if (homes.isErr()) {
      return err(homes.error);
    }

    const resolved = resolveTopology(homes.value);
    if (resolved.isErr()) {
      log.error(
        { error: formatThermostatError(resolved.error) },
        "Could not identify household devices",
      );
      return err(resolved.error);
    }

    log.info(
      {
        relayId: resolved.value.relayId,
        thermostatId: resolved.value.thermostatId,
        valveId: resolved.value.valveId,
        coupled: resolved.value.thermostatRoomId === resolved.value.roomId,
      },
      "Household devices identified",
    );
    return resolved;
  }

  const initial = await loadTopology();
  if (initial.isErr()) {
    return err(initial.error);
  }
  let topology = initial.value;

  async function replaceTopology(): Outcome<DeviceTopology> {
    const op = startOperation(log, "reloadTopology", {
      previousRoomId: topology.roomId,
    });
    const reloaded = await loadTopology();
    if (reloaded.isErr()) {
      op.fail(reloaded.error);
      return reloaded;
    }
    topology = reloaded.value;
    temperatures.clear();
    op.complete({ roomId: topology.roomId });
    return reloaded;
  }

  async function reloadTopology(): Outcome<DeviceTopology> {
    const reloaded = await replaceTopology();
    if (reloaded.isOk()) {
      statuses.clear();
    }
    return reloaded;
  }

  // ===========================================================================
  // Temperatures
  // ===========================================================================

  async function fetchMeasurement(device: Device): Outcome<DeviceTemperature> {
    const data = await call(
      "/getmeasure",
      buildMeasurementQuery(topology, device),
    );
    if (data.isErr()) {
      return err(data.error);
    }

    const body = parseBody(MeasureResponseSchema, data.value, "getmeasure");
    if (body.isErr()) {
      return err(body.error);
    }

    const measurement = parseMeasurement(body.value, device);
    if (measurement.isErr()) {
      return err(measurement.error);
    }

    log.info(
      { device, value: measurement.value.value },
      "Temperature measured",
    );
    return ok(measurement.value);
  }

  function getMeasurement(device: Device): Outcome<DeviceTemperature> {
    return temperatures.getOrFetch(device, temperatureTtlMs, () =>
      fetchMeasurement(device),
    );
  }

  async function fetchHistoricReadings(
    device: Device,
    chunks: ReadonlyArray<Interval>,
    signal?: AbortSignal,
  ): Outcome<ReadonlyArray<Reading>> {
    const readings: Reading[] = [];
    for (const chunk of chunks) {
      if (signal?.aborted) {
        return err(cancelled("Historic retrieval aborted"));
      }

      const data = await call(
        "/getmeasure",
        buildHistoricQuery(topology, device, chunk),
        signal,
      );
      if (data.isErr()) {
        return err(data.error);
      }

      const body = parseBody(MeasureResponseSchema, data.value, "getmeasure");
      if (body.isErr()) {
        return err(body.error);
      }

      const chunkReadings = parseReadings(body.value);
      if (chunkReadings.isErr()) {
        return err(chunkReadings.error);
      }
      readings.push(...chunkReadings.value);
    }

    if (readings.length === 0) {
      return err(measurementError("No readings in the requested period"));
    }
    return ok(readings);
  }

  async function getHistoric(
    request: HistoricTemperatureRequest,
  ): Outcome<ReadonlyArray<HistoricTemperature>> {
    const { device, start, end, granularity, signal } = request;
    if (end.getTime() <= start.getTime()) {
      return err(invalidRange(start, end));
    }

    const chunks = planHistoricChunks(start, end);
    const op = startOperation(log, "getHistoric", {
      device,
      chunks: chunks.length,
    });

    const readings = await fetchHistoricReadings(device, chunks, signal);
    if (readings.isErr()) {
      op.fail(readings.error);
      return err(readings.error);
    }

    const values = forwardFill(
      readings.value,
      partitionRange(start, end, granularity),
    );
    op.complete({ readings: readings.value.length, values: values.length });
    return ok(values);
  }

  // ===========================================================================
  // Setpoints
  // ===========================================================================

  async function setDevice(
    device: Device,
    mode: SetpointMode,
    temperature?: number,
    minutes?: number,
  ): Outcome<boolean> {
    const request = buildSetpointRequest(
      topology,
      device,
      { mode, temperature, minutes },
      now(),
    );
    if (request.isErr()) {
      return err(request.error);
    }

    const data = await call(request.value.endpoint, request.value.params);
    if (data.isErr()) {
      if (data.error.type === "API_ERROR") {
        log.warn(
          { device, mode, code: data.error.code },
          `Setpoint rejected: ${data.error.message}`,
        );
        return ok(false);
      }
      return err(data.error);
    }

    const result = parseBody(SetpointResponseSchema, data.value, "setpoint");
    if (result.isErr()) {
      return err(result.error);
    }

    const success = result.value.status === "ok";
    if (!success) {
      log.warn(
        { device, mode, status: result.value.status },
        "Setpoint not applied",
      );
      return ok(false);
    }

    statuses.invalidate(STATUS_KEY);
    for (const affected of invalidatedDevices(topology, device)) {
      temperatures.invalidate(affected);
    }

    log.info(
      { device, mode, temperature, minutes },
      "Setpoint applied",
    );
    return ok(true);
  }

  function turnOnDevice(
    device: Device,
    minutes: number = DEFAULT_HOLD_MINUTES,
  ): Outcome<boolean> {
    return setDevice(device, "MANUAL", MAX_SETPOINT_TEMPERATURE, minutes);
  }

  function turnOffDevice(
    device: Device,
    minutes: number = DEFAULT_HOLD_MINUTES,
  ): Outcome<boolean> {
    if (device === "THERMOSTAT") {
      return setDevice(device, "OFF");
    }
    return setDevice(device, "MANUAL", VALVE_OFF_TEMPERATURE, minutes);
  }

  // ===========================================================================
  // Home status
  // ===========================================================================

  async function fetchHomeStatusOnce(): Outcome<HomeStatus> {
    const data = await call("/homestatus", { home_id: topology.homeId });
    if (data.isErr()) {
      return err(data.error);
    }

    const status = parseBody(HomeStatusResponseSchema, data.value, "homestatus");
    if (status.isErr()) {
      return err(status.error);
    }

    let reading: Readonly<{ temperature: number; setpoint: number }> | null = null;
    if (topology.thermostatRoomId === null) {
      const thermostats = await call("/getthermostatsdata", {
        device_id: topology.relayId,
      });
      if (thermostats.isErr()) {
        return err(thermostats.error);
      }

      const parsed = parseBody(
        ThermostatsDataResponseSchema,
        thermostats.value,
        "getthermostatsdata",
      );
      if (parsed.isErr()) {
        return err(parsed.error);
      }

      const found = findThermostatReading(parsed.value, topology.thermostatId);
      if (found.isErr()) {
        return err(found.error);
      }
      reading = found.value;
    }

    const projected = projectHomeStatus(status.value, topology, reading);
    if (projected.isErr()) {
      log.warn(
        { error: formatThermostatError(projected.error) },
        "Could not derive home status",
      );
      return err(projected.error);
    }

    log.debug({ ...projected.value }, "Home status refreshed");
    return ok(projected.value);
  }

  // A room that vanished means the devices moved: re-resolve once and retry
  async function fetchHomeStatus(): Outcome<HomeStatus> {
    const status = await fetchHomeStatusOnce();
    if (
      status.isOk() ||
      status.error.type !== "STATUS_ERROR" ||
      status.error.missingRoomId === null
    ) {
      return status;
    }

    log.warn(
      { roomId: status.error.missingRoomId },
      "Room missing from home status, identifying devices again",
    );
    const reloaded = await replaceTopology();
    if (reloaded.isErr()) {
      return err(reloaded.error);
    }
    return fetchHomeStatusOnce();
  }

  function homeStatus(): Outcome<HomeStatus> {
    return statuses.getOrFetch(STATUS_KEY, statusTtlMs, fetchHomeStatus);
  }

  async function project<T>(select: (status: HomeStatus) => T): Outcome<T> {
    const status = await homeStatus();
    return status.map(select);
  }

  return ok({
    getTopology: () => topology,
    reloadTopology,
    getTokenState: tokens.getState,

    getMeasurement,
    thermostatTemperature: async () =>
      (await getMeasurement("THERMOSTAT")).map((reading) => reading.value),
    valveTemperature: async () =>
      (await getMeasurement("VALVE")).map((reading) => reading.value),
    getHistoric,

    setDevice,
    turnOnDevice,
    turnOffDevice,

    thermostatOn: () => project((status) => status.thermostatOn),
    boilerOn: () => project((status) => status.boilerOn),
    valveOn: () => project((status) => status.valveOn),
    valvePercentage: () => project((status) => status.valvePercentage),
  });
}
