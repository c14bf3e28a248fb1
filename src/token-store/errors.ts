/**
 * Token Store Module - Error Types
 *
 * Typed error unions for the OAuth2 token lifecycle.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while obtaining a valid access token.
 */
export type TokenError =
  | {
      /** Refresh rejected by the auth server; terminal until re-authorized */
      readonly type: "AUTH_INVALID";
      readonly reason: string;
      readonly message: string;
    }
  | {
      /** A call was rejected again with a freshly refreshed token */
      readonly type: "AUTH_REJECTED";
      readonly message: string;
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
    };

/**
 * Create an AUTH_INVALID error.
 */
export function authInvalid(reason: string, message: string): TokenError {
  return { type: "AUTH_INVALID", reason, message };
}

/**
 * Create an AUTH_REJECTED error.
 */
export function authRejected(message: string): TokenError {
  return { type: "AUTH_REJECTED", message };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TokenError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): TokenError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Format a TokenError for logging.
 */
export function formatTokenError(error: TokenError): string {
  switch (error.type) {
    case "AUTH_INVALID":
      return `Authorization invalid (${error.reason}): ${error.message}`;
    case "AUTH_REJECTED":
      return `Authorization rejected: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
  }
}
