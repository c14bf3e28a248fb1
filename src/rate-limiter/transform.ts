/**
 * Rate Limiter Module - Pure Transformations
 */

/**
 * Minimum spacing between two granted slots.
 *
 * @example
 * slotSpacingMs(20) // 50
 */
export function slotSpacingMs(maxPerSecond: number): number {
  return 1000 / maxPerSecond;
}

/**
 * Milliseconds until the next grant is allowed, measured from the time the
 * previous grant actually happened.
 *
 * @example
 * nextGrantDelay(1_020, 1_000, 50) // 30
 * nextGrantDelay(1_200, 1_000, 50) // 0
 */
export function nextGrantDelay(
  now: number,
  lastGrantAt: number,
  spacingMs: number,
): number {
  return Math.max(0, lastGrantAt + spacingMs - now);
}
