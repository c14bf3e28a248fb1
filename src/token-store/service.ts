/**
 * Token Store Module - Service Layer
 *
 * Holds the OAuth2 token pair of one client and runs the refresh
 * protocol against the auth server. Refresh is single-flight: callers
 * that find the token expired while a refresh is running wait for it and
 * share its outcome.
 *
 * The refresh token rotates on every refresh. `onRefresh` is called with
 * the new credential so the caller can persist it; losing it means the
 * account has to be authorized again.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger, startOperation } from "../logger.js";
import {
  type TokenError,
  authInvalid,
  authRejected,
  formatTokenError,
  invalidResponse,
  networkError,
} from "./errors.js";
import {
  type AccessCredential,
  type LiveToken,
  OAuthErrorResponseSchema,
  type TokenState,
  type TokenStatus,
  TokenRefreshResponseSchema,
} from "./schema.js";
import {
  applyRefresh,
  buildRefreshBody,
  isTerminalOAuthError,
  isTokenValid,
} from "./transform.js";

const log = createLogger("token");

const DEFAULT_TIMEOUT_MS = 10000;

export type TokenStoreOptions = Readonly<{
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** A live access token, if one is known; the store then starts VALID */
  liveToken?: LiveToken;
  /** OAuth2 base URL; the token endpoint is `${oauthUrl}/token` */
  oauthUrl: string;
  timeoutMs?: number;
  /** Called after every successful refresh with the rotated credential */
  onRefresh?: (credential: AccessCredential) => void | Promise<void>;
  now?: () => number;
}>;

export type TokenStore = Readonly<{
  /**
   * A usable access token: immediate when VALID, refreshed when EXPIRED,
   * shared with the running refresh when REFRESHING.
   */
  getValidToken: () => Promise<Result<string, TokenError>>;
  /**
   * Report that `accessToken` was rejected. Ignored unless it is still
   * the current token.
   */
  markExpired: (accessToken: string) => void;
  /**
   * Run `call` with a valid token; on an authorization failure refresh
   * once and retry once.
   */
  withAuthorization: <T, E>(
    call: (accessToken: string) => Promise<Result<T, E>>,
    isAuthorizationFailure: (error: E) => boolean,
  ) => Promise<Result<T, E | TokenError>>;
  getState: () => TokenState;
  getCredential: () => AccessCredential;
}>;

/**
 * Create a token store for one set of app credentials.
 *
 * @example
 * const tokens = createTokenStore({
 *   clientId, clientSecret, refreshToken,
 *   oauthUrl: "https://api.netatmo.com/oauth2",
 *   onRefresh: (credential) => saveRefreshToken(credential.refreshToken),
 * });
 * const token = await tokens.getValidToken();
 */
export function createTokenStore(options: TokenStoreOptions): TokenStore {
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const tokenUrl = `${options.oauthUrl}/token`;

  const { liveToken } = options;

  let credential: AccessCredential = {
    accessToken: liveToken?.accessToken ?? null,
    refreshToken: options.refreshToken,
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    expiresAt: liveToken?.expiresAt ?? null,
  };
  let status: TokenStatus = liveToken ? "VALID" : "EXPIRED";
  let terminalError: TokenError | null = null;
  let refreshing: Promise<Result<string, TokenError>> | null = null;

  // ===========================================================================
  // Refresh protocol
  // ===========================================================================

  async function runRefresh(): Promise<Result<string, TokenError>> {
    let response: Response;
    try {
      response = await fetch(tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded;charset=UTF-8",
        },
        body: buildRefreshBody(credential).toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      status = "EXPIRED";
      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(networkError("Token request timed out", cause));
      }
      return err(networkError("Failed to reach token endpoint", cause));
    }

    const data: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const oauthError = OAuthErrorResponseSchema.safeParse(data);
      if (
        response.status === 400 &&
        oauthError.success &&
        isTerminalOAuthError(oauthError.data.error)
      ) {
        status = "INVALID";
        terminalError = authInvalid(
          oauthError.data.error,
          "Refresh rejected; the account must be authorized again",
        );
        log.error(
          { reason: oauthError.data.error },
          "Refresh token rejected, token store is now INVALID",
        );
        return err(terminalError);
      }

      status = "EXPIRED";
      return err(
        networkError(`HTTP ${response.status}: ${response.statusText}`),
      );
    }

    const parsed = TokenRefreshResponseSchema.safeParse(data);
    if (!parsed.success) {
      status = "EXPIRED";
      return err(invalidResponse("Invalid token response format", data));
    }

    credential = applyRefresh(credential, parsed.data, now());
    status = "VALID";

    await notifyRefresh(credential);

    return ok(parsed.data.access_token);
  }

  async function notifyRefresh(rotated: AccessCredential): Promise<void> {
    if (!options.onRefresh) {
      return;
    }
    const op = startOperation(log, "onRefresh");
    try {
      await options.onRefresh(rotated);
      op.complete();
    } catch (error) {
      // The new tokens are already in use; persisting them is the caller's job
      op.fail(error);
    }
  }

  function refresh(): Promise<Result<string, TokenError>> {
    if (refreshing) {
      return refreshing;
    }

    status = "REFRESHING";
    const op = startOperation(log, "refreshToken", {
      clientId: credential.clientId,
    });
    const request = runRefresh()
      .then((result) => {
        if (result.isOk()) {
          op.complete({ expiresAt: credential.expiresAt });
        } else {
          op.fail(result.error, { status });
        }
        return result;
      })
      .finally(() => {
        refreshing = null;
      });
    refreshing = request;
    return request;
  }

  // ===========================================================================
  // Public operations
  // ===========================================================================

  async function getValidToken(): Promise<Result<string, TokenError>> {
    if (status === "INVALID" && terminalError) {
      return err(terminalError);
    }

    if (status === "REFRESHING" && refreshing) {
      log.debug("Waiting for running token refresh");
      return refreshing;
    }

    if (
      status === "VALID" &&
      credential.accessToken !== null &&
      credential.expiresAt !== null &&
      isTokenValid(credential.expiresAt, now())
    ) {
      return ok(credential.accessToken);
    }

    log.debug({ status }, "Token expired or missing, refreshing");
    return refresh();
  }

  function markExpired(accessToken: string): void {
    if (status === "VALID" && credential.accessToken === accessToken) {
      status = "EXPIRED";
      log.info("Access token rejected, marked EXPIRED");
    }
  }

  async function withAuthorization<T, E>(
    call: (accessToken: string) => Promise<Result<T, E>>,
    isAuthorizationFailure: (error: E) => boolean,
  ): Promise<Result<T, E | TokenError>> {
    const token = await getValidToken();
    if (token.isErr()) {
      return err(token.error);
    }

    const attempt = await call(token.value);
    if (attempt.isOk() || !isAuthorizationFailure(attempt.error)) {
      return attempt;
    }

    markExpired(token.value);

    const renewed = await getValidToken();
    if (renewed.isErr()) {
      log.warn(
        { error: formatTokenError(renewed.error) },
        "Could not renew token after rejection",
      );
      return err(renewed.error);
    }

    const retry = await call(renewed.value);
    if (retry.isErr() && isAuthorizationFailure(retry.error)) {
      return err(authRejected("Access token rejected again after refresh"));
    }

    return retry;
  }

  return {
    getValidToken,
    markExpired,
    withAuthorization,
    getState: () => ({ status, expiresAt: credential.expiresAt }),
    getCredential: () => credential,
  };
}
