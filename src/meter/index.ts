/**
 * Meter Module - Public API
 */

// Types
export type {
  CurrentPower,
  HistoricPower,
  HistoricRequest,
  HistoricSeries,
} from "./schema.js";
export type { MeterError } from "./errors.js";
export type { MeterClient, MeterClientOptions } from "./service.js";

// Error utilities
export { formatMeterError } from "./errors.js";

// Service
export { collectHistoric, createMeterClient } from "./service.js";

// Pure transformations
export {
  CURRENT_VALUE_LIFETIME_MS,
  buildEnergyQuery,
  classifyErrorResponse,
  parseCurrentValues,
  parseEnergyResponse,
} from "./transform.js";
