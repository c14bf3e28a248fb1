/**
 * Household Data Sources - Library Entry Point
 *
 * Clients for an energy meter and a Netatmo thermostat with valve, plus
 * the building blocks they share: a timed cache, a rate limiter, an
 * OAuth2 token store and hour-aligned intervals.
 *
 * Every client owns its own state; create one per household.
 */
import type { Result } from "neverthrow";

import { getMeterConfig, getThermostatConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { type MeterClient, createMeterClient } from "./meter/index.js";
import {
  type ThermostatClient,
  type ThermostatClientError,
  createThermostatClient,
} from "./thermostat/index.js";
import type { AccessCredential } from "./token-store/index.js";

const log = createLogger("config");

export * from "./intervals/index.js";
export * from "./meter/index.js";
export * from "./rate-limiter/index.js";
export * from "./thermostat/index.js";
export * from "./timed-cache/index.js";
export * from "./token-store/index.js";
export { type Config, config, getMeterConfig, getThermostatConfig } from "./config.js";

/**
 * Meter client configured from the environment, or null without
 * METER_TOKEN.
 */
export function createMeterClientFromEnv(): MeterClient | null {
  const meterConfig = getMeterConfig();
  if (!meterConfig) {
    log.warn("METER_TOKEN not set, meter client unavailable");
    return null;
  }
  return createMeterClient(meterConfig);
}

/**
 * Thermostat client configured from the environment, or null unless the
 * Netatmo client ID, secret and refresh token are all set.
 */
export async function createThermostatClientFromEnv(
  onRefresh?: (credential: AccessCredential) => void | Promise<void>,
): Promise<Result<ThermostatClient, ThermostatClientError> | null> {
  const thermostatConfig = getThermostatConfig();
  if (!thermostatConfig) {
    log.warn("Netatmo credentials not set, thermostat client unavailable");
    return null;
  }
  return createThermostatClient({ ...thermostatConfig, onRefresh });
}
