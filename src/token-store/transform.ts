/**
 * Token Store Module - Pure Transformations
 */
import type { AccessCredential, TokenRefreshResponse } from "./schema.js";

/**
 * OAuth2 errors after which the refresh token can never succeed again.
 */
export const TERMINAL_OAUTH_ERRORS: ReadonlySet<string> = new Set([
  "invalid_client",
  "invalid_grant",
  "unauthorized_client",
]);

/**
 * Check if a token is still usable.
 *
 * Adds a 60-second buffer before actual expiry.
 */
export function isTokenValid(expiresAt: number, now: number): boolean {
  const bufferMs = 60000; // 1 minute buffer
  return now < expiresAt - bufferMs;
}

/**
 * Calculate token expiry timestamp.
 *
 * @param expiresInSeconds - Token lifetime in seconds from the API
 * @param now - Current timestamp in ms
 */
export function calculateTokenExpiry(
  expiresInSeconds: number,
  now: number,
): number {
  return now + expiresInSeconds * 1000;
}

/**
 * Form body for the refresh_token grant.
 */
export function buildRefreshBody(credential: AccessCredential): URLSearchParams {
  return new URLSearchParams({
    grant_type: "refresh_token",
    client_id: credential.clientId,
    client_secret: credential.clientSecret,
    refresh_token: credential.refreshToken,
  });
}

/**
 * Replace both tokens at once. The old refresh token is gone afterwards.
 */
export function applyRefresh(
  credential: AccessCredential,
  response: TokenRefreshResponse,
  now: number,
): AccessCredential {
  return {
    ...credential,
    accessToken: response.access_token,
    refreshToken: response.refresh_token,
    expiresAt: calculateTokenExpiry(response.expires_in, now),
  };
}

/**
 * Whether an OAuth2 error code makes the store INVALID.
 */
export function isTerminalOAuthError(code: string): boolean {
  return TERMINAL_OAUTH_ERRORS.has(code);
}
