/**
 * Token Store Module - Public API
 */

// Types
export type {
  AccessCredential,
  LiveToken,
  TokenState,
  TokenStatus,
} from "./schema.js";
export type { TokenError } from "./errors.js";
export type { TokenStore, TokenStoreOptions } from "./service.js";

// Error utilities
export { formatTokenError } from "./errors.js";

// Service
export { createTokenStore } from "./service.js";

// Pure transformations
export {
  applyRefresh,
  calculateTokenExpiry,
  isTerminalOAuthError,
  isTokenValid,
} from "./transform.js";
