/**
 * Rate Limiter Module - Error Types
 *
 * Waiting for a slot is never an error; only cancellation is.
 */

export type RateLimiterError = {
  readonly type: "CANCELLED";
  readonly message: string;
};

/**
 * Create a CANCELLED error.
 */
export function cancelled(message: string): RateLimiterError {
  return { type: "CANCELLED", message };
}

/**
 * Format a RateLimiterError for logging.
 */
export function formatRateLimiterError(error: RateLimiterError): string {
  return `Cancelled: ${error.message}`;
}
