/**
 * Thermostat Module - Error Types
 *
 * Typed error unions for thermostat and valve operations.
 * Errors are values, not exceptions.
 */
import { type TokenError, formatTokenError } from "../token-store/index.js";

/**
 * Which part of the household could not be identified.
 */
export type TopologyComponent = "HOME" | "RELAY" | "THERMOSTAT" | "VALVE" | "ROOM";

/**
 * Errors raised by the thermostat service itself.
 */
export type ThermostatError =
  | {
      /** The account does not hold exactly one of each expected device */
      readonly type: "TOPOLOGY_ERROR";
      readonly message: string;
      readonly component: TopologyComponent;
    }
  | {
      readonly type: "MEASUREMENT_ERROR";
      readonly message: string;
    }
  | {
      readonly type: "STATUS_ERROR";
      readonly message: string;
      /** Set when a room the topology names is absent from the status */
      readonly missingRoomId: string | null;
    }
  | {
      readonly type: "INVALID_DURATION";
      readonly message: string;
      readonly minutes: number | undefined;
    }
  | {
      readonly type: "INVALID_TEMPERATURE";
      readonly message: string;
      readonly temperature: number | undefined;
    }
  | {
      readonly type: "INVALID_RANGE";
      readonly message: string;
      readonly start: Date;
      readonly end: Date;
    }
  | {
      /** HTTP 401/403; retried once after a token refresh */
      readonly type: "UNAUTHORIZED";
      readonly message: string;
      readonly statusCode: number;
    }
  | {
      /** The vendor rejected a well-formed request */
      readonly type: "API_ERROR";
      readonly message: string;
      readonly statusCode: number;
      readonly code: number;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "CANCELLED";
      readonly message: string;
    };

/**
 * Everything a thermostat client operation can fail with.
 */
export type ThermostatClientError = ThermostatError | TokenError;

// =============================================================================
// Error Factory Functions
// =============================================================================

export function topologyError(
  component: TopologyComponent,
  message: string,
): ThermostatError {
  return { type: "TOPOLOGY_ERROR", message, component };
}

export function measurementError(message: string): ThermostatError {
  return { type: "MEASUREMENT_ERROR", message };
}

export function statusError(
  message: string,
  missingRoomId: string | null = null,
): ThermostatError {
  return { type: "STATUS_ERROR", message, missingRoomId };
}

export function invalidDuration(minutes: number | undefined): ThermostatError {
  return {
    type: "INVALID_DURATION",
    message: "A positive number of minutes is required",
    minutes,
  };
}

export function invalidTemperature(
  temperature: number | undefined,
): ThermostatError {
  return {
    type: "INVALID_TEMPERATURE",
    message: "Temperature must be between 7 and 30°C",
    temperature,
  };
}

export function invalidRange(start: Date, end: Date): ThermostatError {
  return {
    type: "INVALID_RANGE",
    message: "The end date should be after the start date",
    start,
    end,
  };
}

export function unauthorized(statusCode: number): ThermostatError {
  return {
    type: "UNAUTHORIZED",
    message: `HTTP ${statusCode}: access token not accepted`,
    statusCode,
  };
}

export function apiError(
  statusCode: number,
  code: number,
  message: string,
): ThermostatError {
  return { type: "API_ERROR", message, statusCode, code };
}

export function networkError(message: string, cause?: Error): ThermostatError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

export function invalidResponse(
  message: string,
  responseData?: unknown,
): ThermostatError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function cancelled(message: string): ThermostatError {
  return { type: "CANCELLED", message };
}

/**
 * Format a thermostat client error for logging.
 */
export function formatThermostatError(error: ThermostatClientError): string {
  switch (error.type) {
    case "TOPOLOGY_ERROR":
      return `Topology error (${error.component}): ${error.message}`;
    case "MEASUREMENT_ERROR":
      return `Measurement error: ${error.message}`;
    case "STATUS_ERROR":
      return `Status error: ${error.message}`;
    case "INVALID_DURATION":
      return `Invalid duration ${String(error.minutes)}: ${error.message}`;
    case "INVALID_TEMPERATURE":
      return `Invalid temperature ${String(error.temperature)}: ${error.message}`;
    case "INVALID_RANGE":
      return `Invalid range ${error.start.toISOString()} - ${error.end.toISOString()}: ${error.message}`;
    case "UNAUTHORIZED":
      return `Unauthorized: ${error.message}`;
    case "API_ERROR":
      return `API error ${error.code}: ${error.message}`;
    case "CANCELLED":
      return `Cancelled: ${error.message}`;
    case "AUTH_INVALID":
    case "AUTH_REJECTED":
    case "NETWORK_ERROR":
    case "INVALID_RESPONSE":
      return formatTokenError(error);
  }
}
