/**
 * Token Store Module - Schemas and Types
 *
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Token Lifecycle
// =============================================================================

/**
 * VALID -> EXPIRED -> REFRESHING -> VALID | INVALID (terminal)
 */
export const TokenStatusSchema = z.enum([
  "VALID",
  "EXPIRED",
  "REFRESHING",
  "INVALID",
]);

export type TokenStatus = z.infer<typeof TokenStatusSchema>;

/**
 * The token pair and the app credentials it belongs to.
 * `expiresAt` always describes the stored `accessToken`; both are null
 * until the first refresh when the store starts without an access token.
 */
export type AccessCredential = Readonly<{
  accessToken: string | null;
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  expiresAt: number | null; // Unix timestamp in ms
}>;

/** An access token known to be live, with its expiry (Unix ms) */
export type LiveToken = Readonly<{
  accessToken: string;
  expiresAt: number;
}>;

export type TokenState = Readonly<{
  status: TokenStatus;
  expiresAt: number | null;
}>;

// =============================================================================
// OAuth2 API Types
// =============================================================================

/**
 * Successful refresh_token grant response.
 */
export const TokenRefreshResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().positive(),
  scope: z.array(z.string()).optional(),
});

export type TokenRefreshResponse = z.infer<typeof TokenRefreshResponseSchema>;

/**
 * OAuth2 error body, e.g. {"error": "invalid_grant"}.
 */
export const OAuthErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export type OAuthErrorResponse = z.infer<typeof OAuthErrorResponseSchema>;
