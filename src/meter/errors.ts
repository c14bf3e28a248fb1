/**
 * Meter Module - Error Types
 *
 * Typed error unions for energy meter operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur during meter operations.
 */
export type MeterError =
  | {
      /** The meter token was rejected ("bad token"); there is no refresh */
      readonly type: "AUTH_FAILED";
      readonly message: string;
    }
  | {
      readonly type: "SERVER_ERROR";
      readonly message: string;
    }
  | {
      /** The service answered with an error description */
      readonly type: "API_ERROR";
      readonly message: string;
      readonly description: string;
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
      readonly type: "NO_METER";
      readonly message: string;
    }
  | {
      readonly type: "MULTIPLE_METERS";
      readonly message: string;
      readonly count: number;
    }
  | {
      /** A meter was found but it reported zero or several readings */
      readonly type: "NO_READING";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RANGE";
      readonly message: string;
      readonly start: Date;
      readonly end: Date;
    }
  | {
      readonly type: "CANCELLED";
      readonly message: string;
    };

export function authFailed(message: string): MeterError {
  return { type: "AUTH_FAILED", message };
}

export function serverError(message: string): MeterError {
  return { type: "SERVER_ERROR", message };
}

export function apiError(description: string): MeterError {
  return {
    type: "API_ERROR",
    message: `Service reported an error: ${description}`,
    description,
  };
}

export function networkError(message: string, cause?: Error): MeterError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

export function invalidResponse(
  message: string,
  responseData?: unknown,
): MeterError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function noMeter(): MeterError {
  return { type: "NO_METER", message: "No meter is linked to this token" };
}

export function multipleMeters(count: number): MeterError {
  return {
    type: "MULTIPLE_METERS",
    message: `Expected one meter, found ${count}`,
    count,
  };
}

export function noReading(message: string): MeterError {
  return { type: "NO_READING", message };
}

export function invalidRange(start: Date, end: Date): MeterError {
  return {
    type: "INVALID_RANGE",
    message: "The end date should be after the start date",
    start,
    end,
  };
}

export function cancelled(message: string): MeterError {
  return { type: "CANCELLED", message };
}

/**
 * Format a MeterError for logging.
 */
export function formatMeterError(error: MeterError): string {
  switch (error.type) {
    case "AUTH_FAILED":
      return `Auth failed: ${error.message}`;
    case "SERVER_ERROR":
      return `Server error: ${error.message}`;
    case "API_ERROR":
      return `API error: ${error.description}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NO_METER":
      return `No meter: ${error.message}`;
    case "MULTIPLE_METERS":
      return `Multiple meters: ${error.message}`;
    case "NO_READING":
      return `No reading: ${error.message}`;
    case "INVALID_RANGE":
      return `Invalid range ${error.start.toISOString()} - ${error.end.toISOString()}: ${error.message}`;
    case "CANCELLED":
      return `Cancelled: ${error.message}`;
  }
}
