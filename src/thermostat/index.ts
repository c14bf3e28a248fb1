/**
 * Thermostat Module - Public API
 */

// Types
export type {
  Device,
  DeviceSetpoint,
  DeviceTemperature,
  DeviceTopology,
  HistoricTemperature,
  HistoricTemperatureRequest,
  HomeStatus,
  SetpointMode,
} from "./schema.js";
export type {
  ThermostatClientError,
  ThermostatError,
  TopologyComponent,
} from "./errors.js";
export type { ThermostatClient, ThermostatClientOptions } from "./service.js";

// Schemas
export { DeviceSchema, SetpointModeSchema } from "./schema.js";

// Error utilities
export { formatThermostatError } from "./errors.js";

// Service
export { createThermostatClient } from "./service.js";

// Pure transformations
export {
  buildSetpointRequest,
  forwardFill,
  invalidatedDevices,
  projectHomeStatus,
  resolveTopology,
} from "./transform.js";
