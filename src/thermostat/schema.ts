/**
 * Thermostat Module - Schemas and Types
 *
 * Netatmo energy API shapes and the values the client produces.
 * The household has one relay (NAPlug), one thermostat (NATherm1) and
 * one thermostatic valve (NRV).
 *
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import type { Granularity } from "../intervals/index.js";

// =============================================================================
// Devices and Setpoints
// =============================================================================

export const DeviceSchema = z.enum(["THERMOSTAT", "VALVE"]);

export type Device = z.infer<typeof DeviceSchema>;

/**
 * PROGRAM returns to the schedule. MANUAL and MAX hold until an end time;
 * OFF on the thermostat holds until changed.
 */
export const SetpointModeSchema = z.enum(["PROGRAM", "MANUAL", "OFF", "MAX"]);

export type SetpointMode = z.infer<typeof SetpointModeSchema>;

export type DeviceSetpoint = Readonly<{
  mode: SetpointMode;
  temperature?: number;
  minutes?: number;
}>;

/** Setpoint temperatures accepted for MANUAL (°C) */
export const MIN_SETPOINT_TEMPERATURE = 7;
export const MAX_SETPOINT_TEMPERATURE = 30;

/** Default hold for turn on/off (24 hours) */
export const DEFAULT_HOLD_MINUTES = 24 * 60;

/**
 * Identifiers of the household devices, resolved once per client.
 */
export type DeviceTopology = Readonly<{
  homeId: string;
  /** Room holding the valve */
  roomId: string;
  /** Room holding the thermostat, null when it is not assigned to one */
  thermostatRoomId: string | null;
  thermostatId: string;
  valveId: string;
  relayId: string;
}>;

// =============================================================================
// Values
// =============================================================================

export type DeviceTemperature = Readonly<{
  measuredAt: Date;
  /** °C */
  value: number;
  device: Device;
}>;

export type HistoricTemperature = Readonly<{
  value: number;
  start: Date;
  end: Date;
}>;

export type HistoricTemperatureRequest = Readonly<{
  device: Device;
  start: Date;
  end: Date;
  granularity: Granularity;
  signal?: AbortSignal;
}>;

/**
 * One snapshot of the home, shared by the four status accessors.
 */
export type HomeStatus = Readonly<{
  thermostatOn: boolean;
  boilerOn: boolean;
  valveOn: boolean;
  valvePercentage: number;
}>;

/**
 * A single temperature reading; `at` in Unix ms.
 */
export type Reading = Readonly<{
  at: number;
  value: number;
}>;

// =============================================================================
// API: homesdata
// =============================================================================

export const HomeRoomSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  type: z.string().optional(),
  module_ids: z.array(z.string()).optional(),
});

export const HomeModuleSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string().optional(),
  bridge: z.string().optional(),
});

export const HomesDataResponseSchema = z.object({
  body: z.object({
    homes: z.array(
      z.object({
        id: z.string(),
        name: z.string().optional(),
        rooms: z.array(HomeRoomSchema).default([]),
        modules: z.array(HomeModuleSchema).default([]),
      }),
    ),
  }),
});

export type HomesDataResponse = z.infer<typeof HomesDataResponseSchema>;

// =============================================================================
// API: getmeasure
// =============================================================================

/**
 * With optimize=false the body maps Unix seconds to one value per type.
 * An empty result arrives as [].
 */
export const MeasureResponseSchema = z.object({
  body: z.preprocess(
    (value) => (Array.isArray(value) && value.length === 0 ? {} : value),
    z.record(z.string(), z.array(z.number())),
  ),
});

export type MeasureResponse = z.infer<typeof MeasureResponseSchema>;

// =============================================================================
// API: homestatus
// =============================================================================

export const StatusRoomSchema = z.object({
  id: z.string(),
  therm_measured_temperature: z.number(),
  therm_setpoint_temperature: z.number(),
  therm_setpoint_mode: z.string().optional(),
  heating_power_request: z.number().optional(),
});

export const StatusModuleSchema = z.object({
  id: z.string(),
  type: z.string(),
  boiler_status: z.boolean().optional(),
});

export const HomeStatusResponseSchema = z.object({
  body: z.object({
    home: z.object({
      id: z.string(),
      rooms: z.array(StatusRoomSchema).default([]),
      modules: z.array(StatusModuleSchema).default([]),
    }),
  }),
});

export type HomeStatusResponse = z.infer<typeof HomeStatusResponseSchema>;

// =============================================================================
// API: getthermostatsdata
// =============================================================================

export const ThermostatsDataResponseSchema = z.object({
  body: z.object({
    devices: z.array(
      z.object({
        _id: z.string(),
        type: z.string(),
        modules: z.array(
          z.object({
            _id: z.string(),
            type: z.string(),
            measured: z.object({
              time: z.number().optional(),
              temperature: z.number(),
              setpoint_temp: z.number(),
            }),
          }),
        ),
      }),
    ),
  }),
});

export type ThermostatsDataResponse = z.infer<
  typeof ThermostatsDataResponseSchema
>;

// =============================================================================
// API: setthermpoint / setroomthermpoint
// =============================================================================

export const SetpointResponseSchema = z.object({
  status: z.string(),
});

/**
 * Error body, e.g. {"error": {"code": 21, "message": "Invalid mode"}}.
 */
export const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
  }),
});
