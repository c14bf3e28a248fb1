/**
 * Rate Limiter Module - Public API
 */

export type { RateLimiter, RateLimiterOptions } from "./service.js";
export type { RateLimiterError } from "./errors.js";

export { formatRateLimiterError } from "./errors.js";
export { createRateLimiter } from "./service.js";
export { nextGrantDelay, slotSpacingMs } from "./transform.js";
