/**
 * Thermostat Module - Pure Transformations
 *
 * Topology resolution, response interpretation and setpoint request
 * building. No I/O.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import {
  type Interval,
  alignRange,
  chunkRange,
  toUnixSeconds,
} from "../intervals/index.js";
import {
  type ThermostatError,
  invalidDuration,
  invalidResponse,
  invalidTemperature,
  measurementError,
  statusError,
  topologyError,
} from "./errors.js";
import {
  type Device,
  type DeviceSetpoint,
  type DeviceTemperature,
  type DeviceTopology,
  DEFAULT_HOLD_MINUTES,
  type HistoricTemperature,
  type HomeStatus,
  type HomeStatusResponse,
  type HomesDataResponse,
  MAX_SETPOINT_TEMPERATURE,
  MIN_SETPOINT_TEMPERATURE,
  type MeasureResponse,
  type Reading,
  type ThermostatsDataResponse,
} from "./schema.js";

const RELAY_TYPE = "NAPlug";
const THERMOSTAT_TYPE = "NATherm1";
const VALVE_TYPE = "NRV";

/** The smallest bin the measure endpoint offers */
export const HISTORIC_BIN_MINUTES = 30;
/** Records returned by one measure call at most */
export const HISTORIC_BINS_PER_CALL = 1024;

/** Valve "off" is a low manual setpoint */
export const VALVE_OFF_TEMPERATURE = MIN_SETPOINT_TEMPERATURE;

/**
 * Validate `data` against `schema`, mapping failure to INVALID_RESPONSE.
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string,
): Result<z.infer<S>, ThermostatError> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return err(invalidResponse(`Invalid ${what} response format`, data));
  }
  return ok(parsed.data);
}

// =============================================================================
// Topology
// =============================================================================

/**
 * Find the single relay, thermostat and valve of the single home, and
 * the rooms they are in.
 */
export function resolveTopology(
  data: HomesDataResponse,
): Result<DeviceTopology, ThermostatError> {
  const homes = data.body.homes;
  const [home] = homes;
  if (!home || homes.length !== 1) {
    return err(topologyError("HOME", `Expected one home, found ${homes.length}`));
  }

  const single = (type: string) => {
    const found = home.modules.filter((module) => module.type === type);
    return found.length === 1 ? found[0] : undefined;
  };

  const relay = single(RELAY_TYPE);
  if (!relay) {
    return err(topologyError("RELAY", "Expected exactly one relay"));
  }
  const thermostat = single(THERMOSTAT_TYPE);
  if (!thermostat) {
    return err(topologyError("THERMOSTAT", "Expected exactly one thermostat"));
  }
  const valve = single(VALVE_TYPE);
  if (!valve) {
    return err(topologyError("VALVE", "Expected exactly one valve"));
  }

  const valveRooms = home.rooms.filter((room) =>
    room.module_ids?.includes(valve.id),
  );
  const [valveRoom] = valveRooms;
  if (!valveRoom || valveRooms.length !== 1) {
    return err(
      topologyError("ROOM", `Expected the valve in one room, found ${valveRooms.length}`),
    );
  }

  const thermostatRoom = home.rooms.find((room) =>
    room.module_ids?.includes(thermostat.id),
  );

  return ok({
    homeId: home.id,
    roomId: valveRoom.id,
    thermostatRoomId: thermostatRoom?.id ?? null,
    thermostatId: thermostat.id,
    valveId: valve.id,
    relayId: relay.id,
  });
}

export function moduleIdFor(topology: DeviceTopology, device: Device): string {
  return device === "THERMOSTAT" ? topology.thermostatId : topology.valveId;
}

/**
 * Devices whose cached temperature is stale after writing to `device`.
 * A valve sharing the thermostat's room drives both.
 */
export function invalidatedDevices(
  topology: DeviceTopology,
  device: Device,
): ReadonlyArray<Device> {
  const coupled = topology.thermostatRoomId === topology.roomId;
  if (!coupled) {
    return [device];
  }
  return ["THERMOSTAT", "VALVE"];
}

// =============================================================================
// Measurements
// =============================================================================

/**
 * Readings of a measure response in chronological order.
 */
export function parseReadings(
  data: MeasureResponse,
): Result<ReadonlyArray<Reading>, ThermostatError> {
  const readings: Reading[] = [];

  for (const [timestamp, values] of Object.entries(data.body)) {
    const [value] = values;
    if (!/^\d+$/.test(timestamp) || value === undefined || values.length !== 1) {
      return err(
        measurementError(`Expected one value at ${timestamp}, found ${values.length}`),
      );
    }
    readings.push({ at: Number(timestamp) * 1000, value });
  }

  return ok(readings.sort((a, b) => a.at - b.at));
}

/**
 * The latest temperature of a device: exactly one timestamp with one value.
 */
export function parseMeasurement(
  data: MeasureResponse,
  device: Device,
): Result<DeviceTemperature, ThermostatError> {
  const readings = parseReadings(data);
  if (readings.isErr()) {
    return err(readings.error);
  }

  const [reading] = readings.value;
  if (!reading || readings.value.length !== 1) {
    return err(
      measurementError(
        `Expected one measurement, found ${readings.value.length}`,
      ),
    );
  }

  return ok({ measuredAt: new Date(reading.at), value: reading.value, device });
}

export function buildMeasurementQuery(
  topology: DeviceTopology,
  device: Device,
): Readonly<Record<string, string>> {
  return {
    device_id: topology.relayId,
    module_id: moduleIdFor(topology, device),
    scale: "max",
    type: "Temperature",
    limit: "1",
    date_end: "last",
    optimize: "false",
  };
}

// =============================================================================
// Historic temperature
// =============================================================================

/**
 * The measure calls covering [start, end): the range is widened to
 * 30-minute bins and split into calls of at most 1024 bins.
 */
export function planHistoricChunks(
  start: Date,
  end: Date,
): ReadonlyArray<Interval> {
  const bins = alignRange(start, end, HISTORIC_BIN_MINUTES);
  return chunkRange(
    bins.start,
    bins.end,
    HISTORIC_BINS_PER_CALL * HISTORIC_BIN_MINUTES * 60 * 1000,
  );
}

export function buildHistoricQuery(
  topology: DeviceTopology,
  device: Device,
  chunk: Interval,
): Readonly<Record<string, string>> {
  return {
    device_id: topology.relayId,
    module_id: moduleIdFor(topology, device),
    scale: "30min",
    type: "Temperature",
    limit: String(HISTORIC_BINS_PER_CALL),
    date_begin: String(toUnixSeconds(chunk.start)),
    date_end: String(toUnixSeconds(chunk.end)),
    optimize: "false",
  };
}

/**
 * Spread readings over slots. A slot takes the last reading before its
 * end; slots before the first reading take the first reading.
 *
 * @example
 * // readings at 00:00 (20) and 00:30 (21), 15-minute slots 00:00-01:00
 * forwardFill(readings, slots) // 20, 20, 21, 21
 */
export function forwardFill(
  readings: ReadonlyArray<Reading>,
  slots: ReadonlyArray<Interval>,
): ReadonlyArray<HistoricTemperature> {
  const [first] = readings;
  if (!first) {
    return [];
  }

  let index = 0;
  let value = first.value;

  return slots.map((slot) => {
    let next = readings[index];
    while (next && next.at < slot.end.getTime()) {
      value = next.value;
      index++;
      next = readings[index];
    }
    return { value, start: slot.start, end: slot.end };
  });
}

// =============================================================================
// Setpoints
// =============================================================================

export type SetpointRequest = Readonly<{
  endpoint: "/setthermpoint" | "/setroomthermpoint";
  params: Readonly<Record<string, string>>;
}>;

/**
 * Validate a setpoint and build the call that applies it.
 * The thermostat is set directly; the valve through its room.
 */
export function buildSetpointRequest(
  topology: DeviceTopology,
  device: Device,
  setpoint: DeviceSetpoint,
  now: number,
): Result<SetpointRequest, ThermostatError> {
  const effective: DeviceSetpoint =
    device === "VALVE" && setpoint.mode === "OFF"
      ? {
          mode: "MANUAL",
          temperature: VALVE_OFF_TEMPERATURE,
          minutes: setpoint.minutes ?? DEFAULT_HOLD_MINUTES,
        }
      : setpoint;

  const params: Record<string, string> = {};
  const isThermostat = device === "THERMOSTAT";

  if (isThermostat) {
    params.device_id = topology.relayId;
    params.module_id = topology.thermostatId;
    params.setpoint_mode = effective.mode.toLowerCase();
  } else {
    params.home_id = topology.homeId;
    params.room_id = topology.roomId;
    params.mode = effective.mode === "PROGRAM" ? "home" : effective.mode.toLowerCase();
  }

  if (effective.mode === "MANUAL" || effective.mode === "MAX") {
    const minutes = effective.minutes;
    if (minutes === undefined || !(minutes > 0)) {
      return err(invalidDuration(minutes));
    }
    const endTime = String(Math.floor(now / 1000) + Math.round(minutes * 60));
    params[isThermostat ? "setpoint_endtime" : "endtime"] = endTime;
  }

  if (effective.mode === "MANUAL") {
    const temperature = effective.temperature;
    if (
      temperature === undefined ||
      !(temperature >= MIN_SETPOINT_TEMPERATURE && temperature <= MAX_SETPOINT_TEMPERATURE)
    ) {
      return err(invalidTemperature(temperature));
    }
    params[isThermostat ? "setpoint_temp" : "temp"] = String(temperature);
  }

  return ok({
    endpoint: isThermostat ? "/setthermpoint" : "/setroomthermpoint",
    params,
  });
}

// =============================================================================
// Home status
// =============================================================================

/**
 * Measured and target temperature of the thermostat when it has no room.
 */
export function findThermostatReading(
  data: ThermostatsDataResponse,
  thermostatId: string,
): Result<Readonly<{ temperature: number; setpoint: number }>, ThermostatError> {
  const module = data.body.devices
    .flatMap((relay) => relay.modules)
    .find((candidate) => candidate._id === thermostatId);
  if (!module) {
    return err(statusError(`Thermostat ${thermostatId} missing from thermostat data`));
  }
  return ok({
    temperature: module.measured.temperature,
    setpoint: module.measured.setpoint_temp,
  });
}

/**
 * Build the composite status from one homestatus response. `reading` is
 * required when the thermostat has no room.
 */
export function projectHomeStatus(
  data: HomeStatusResponse,
  topology: DeviceTopology,
  reading: Readonly<{ temperature: number; setpoint: number }> | null,
): Result<HomeStatus, ThermostatError> {
  const { rooms, modules } = data.body.home;

  const valveRoom = rooms.find((room) => room.id === topology.roomId);
  if (!valveRoom) {
    return err(
      statusError(
        `Room ${topology.roomId} missing from home status`,
        topology.roomId,
      ),
    );
  }

  const boilers = modules.filter((module) => module.type === THERMOSTAT_TYPE);
  const boilerStatus =
    boilers.length === 1 ? boilers[0]?.boiler_status : undefined;
  if (boilerStatus === undefined) {
    return err(statusError("Boiler status not reported"));
  }

  let thermostatOn: boolean;
  if (topology.thermostatRoomId === null) {
    if (!reading) {
      return err(statusError("Thermostat reading required when it has no room"));
    }
    thermostatOn = reading.temperature < reading.setpoint;
  } else {
    const thermostatRoom = rooms.find(
      (room) => room.id === topology.thermostatRoomId,
    );
    if (!thermostatRoom) {
      return err(
        statusError(
          `Room ${topology.thermostatRoomId} missing from home status`,
          topology.thermostatRoomId,
        ),
      );
    }
    thermostatOn =
      thermostatRoom.therm_setpoint_mode !== "off" &&
      thermostatRoom.therm_measured_temperature <
        thermostatRoom.therm_setpoint_temperature;
  }

  return ok({
    thermostatOn,
    boilerOn: boilerStatus,
    valveOn:
      valveRoom.therm_setpoint_temperature >
      valveRoom.therm_measured_temperature,
    valvePercentage: valveRoom.heating_power_request ?? 0,
  });
}
