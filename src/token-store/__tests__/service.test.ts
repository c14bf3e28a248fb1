/**
 * Token Store Service Tests
 *
 * Refresh protocol against a stubbed token endpoint: state transitions,
 * single-flight refresh, rotation and the retry-once rule.
 */
import { err, ok } from "neverthrow";
import { beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  startOperation: () => ({ complete: vi.fn(), fail: vi.fn() }),
}));

// Import after mocks
import { createTokenStore } from "../service.js";

const OAUTH_URL = "https://auth.example.test/oauth2";
const NOW = 1_700_000_000_000;

function tokenResponse(accessToken: string, refreshToken: string) {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    json: () =>
      Promise.resolve({
        access_token: accessToken,
        refresh_token: refreshToken,
        expires_in: 10800,
        scope: ["read_thermostat", "write_thermostat"],
      }),
  };
}

function oauthError(error: string) {
  return {
    ok: false,
    status: 400,
    statusText: "Bad Request",
    json: () => Promise.resolve({ error }),
  };
}

function baseOptions() {
  return {
    clientId: "test-client",
    clientSecret: "test-secret",
    refreshToken: "refresh-1",
    oauthUrl: OAUTH_URL,
    now: () => NOW,
  };
}

type CallError = { readonly type: "UNAUTHORIZED" } | { readonly type: "OTHER" };
const isUnauthorized = (error: CallError) => error.type === "UNAUTHORIZED";

describe("Token Store", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Initial state
  // ===========================================================================

  describe("initial state", () => {
    test("starts EXPIRED without an access token", () => {
      const store = createTokenStore(baseOptions());
      expect(store.getState()).toEqual({ status: "EXPIRED", expiresAt: null });
    });

    test("starts VALID and serves a live access token without a call", async () => {
      vi.stubGlobal("fetch", vi.fn());
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "live-access", expiresAt: NOW + 3_600_000 },
      });

      const token = await store.getValidToken();

      expect(store.getState().status).toBe("VALID");
      expect(token._unsafeUnwrap()).toBe("live-access");
      expect(fetch).not.toHaveBeenCalled();
    });

    test("keeps the live token and its expiry together", () => {
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "live-access", expiresAt: NOW + 3_600_000 },
      });

      expect(store.getState()).toEqual({
        status: "VALID",
        expiresAt: NOW + 3_600_000,
      });
      expect(store.getCredential()).toMatchObject({
        accessToken: "live-access",
        expiresAt: NOW + 3_600_000,
      });
    });

    test("refreshes a live token that is inside the expiry buffer", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "old-access", expiresAt: NOW + 30_000 },
      });

      const token = await store.getValidToken();

      expect(token._unsafeUnwrap()).toBe("access-2");
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Refresh protocol
  // ===========================================================================

  describe("refresh", () => {
    test("posts the refresh_token grant as a form body", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore(baseOptions());

      await store.getValidToken();

      const [url, init] = vi.mocked(fetch).mock.calls[0] ?? [];
      expect(url).toBe(`${OAUTH_URL}/token`);
      expect(init?.method).toBe("POST");
      const body = new URLSearchParams(String(init?.body));
      expect(body.get("grant_type")).toBe("refresh_token");
      expect(body.get("client_id")).toBe("test-client");
      expect(body.get("client_secret")).toBe("test-secret");
      expect(body.get("refresh_token")).toBe("refresh-1");
    });

    test("replaces both tokens and records the expiry", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore(baseOptions());

      await store.getValidToken();

      expect(store.getState()).toEqual({
        status: "VALID",
        expiresAt: NOW + 10800 * 1000,
      });
      expect(store.getCredential()).toEqual({
        accessToken: "access-2",
        refreshToken: "refresh-2",
        clientId: "test-client",
        clientSecret: "test-secret",
        expiresAt: NOW + 10800 * 1000,
      });
    });

    test("uses the rotated refresh token for the next refresh", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(tokenResponse("access-2", "refresh-2"))
          .mockResolvedValueOnce(tokenResponse("access-3", "refresh-3")),
      );
      const store = createTokenStore(baseOptions());

      await store.getValidToken();
      store.markExpired("access-2");
      await store.getValidToken();

      const secondBody = new URLSearchParams(
        String(vi.mocked(fetch).mock.calls[1]?.[1]?.body),
      );
      expect(secondBody.get("refresh_token")).toBe("refresh-2");
      expect(store.getCredential().refreshToken).toBe("refresh-3");
    });

    test("notifies the observer with the rotated credential", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const onRefresh = vi.fn();
      const store = createTokenStore({ ...baseOptions(), onRefresh });

      await store.getValidToken();

      expect(onRefresh).toHaveBeenCalledTimes(1);
      expect(onRefresh).toHaveBeenCalledWith(
        expect.objectContaining({ refreshToken: "refresh-2" }),
      );
    });

    test("keeps the new token when the observer throws", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore({
        ...baseOptions(),
        onRefresh: () => {
          throw new Error("disk full");
        },
      });

      const token = await store.getValidToken();

      expect(token._unsafeUnwrap()).toBe("access-2");
      expect(store.getState().status).toBe("VALID");
    });

    test("becomes INVALID on invalid_grant and stays there", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(oauthError("invalid_grant")),
      );
      const store = createTokenStore(baseOptions());

      const first = await store.getValidToken();
      const second = await store.getValidToken();

      expect(first._unsafeUnwrapErr()).toMatchObject({
        type: "AUTH_INVALID",
        reason: "invalid_grant",
      });
      expect(second._unsafeUnwrapErr().type).toBe("AUTH_INVALID");
      expect(store.getState().status).toBe("INVALID");
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    test("becomes INVALID on invalid_client", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(oauthError("invalid_client")),
      );
      const store = createTokenStore(baseOptions());

      const result = await store.getValidToken();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "AUTH_INVALID",
        reason: "invalid_client",
      });
    });

    test("stays EXPIRED after a transport failure so the next call retries", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockRejectedValueOnce(new Error("Connection refused"))
          .mockResolvedValueOnce(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore(baseOptions());

      const failed = await store.getValidToken();
      expect(failed._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(store.getState().status).toBe("EXPIRED");

      const retried = await store.getValidToken();
      expect(retried._unsafeUnwrap()).toBe("access-2");
    });

    test("returns NETWORK_ERROR for a server error", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: false,
          status: 500,
          statusText: "Internal Server Error",
          json: () => Promise.reject(new SyntaxError("Unexpected token")),
        }),
      );
      const store = createTokenStore(baseOptions());

      const result = await store.getValidToken();

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(result._unsafeUnwrapErr().message).toBe(
        "HTTP 500: Internal Server Error",
      );
      expect(store.getState().status).toBe("EXPIRED");
    });

    test("returns INVALID_RESPONSE when expires_in is missing", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: true,
          status: 200,
          statusText: "OK",
          json: () =>
            Promise.resolve({ access_token: "a", refresh_token: "r" }),
        }),
      );
      const store = createTokenStore(baseOptions());

      const result = await store.getValidToken();

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
      expect(store.getCredential().refreshToken).toBe("refresh-1");
    });
  });

  // ===========================================================================
  // Single-flight
  // ===========================================================================

  describe("single-flight refresh", () => {
    test("M concurrent callers cause exactly one refresh and share the token", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore(baseOptions());

      const results = await Promise.all(
        Array.from({ length: 8 }, () => store.getValidToken()),
      );

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(results.map((r) => r._unsafeUnwrap())).toEqual(
        Array.from({ length: 8 }, () => "access-2"),
      );
    });

    test("M concurrent callers all receive the INVALID error", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(oauthError("invalid_grant")),
      );
      const store = createTokenStore(baseOptions());

      const results = await Promise.all(
        Array.from({ length: 5 }, () => store.getValidToken()),
      );

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(results.every((r) => r.isErr() && r.error.type === "AUTH_INVALID")).toBe(true);
    });

    test("reports REFRESHING while the refresh is running", async () => {
      let respond: (value: unknown) => void = () => undefined;
      vi.stubGlobal(
        "fetch",
        vi.fn(
          () =>
            new Promise((resolve) => {
              respond = resolve;
            }),
        ),
      );
      const store = createTokenStore(baseOptions());

      const pending = store.getValidToken();
      expect(store.getState().status).toBe("REFRESHING");

      respond(tokenResponse("access-2", "refresh-2"));
      await pending;
      expect(store.getState().status).toBe("VALID");
    });
  });

  // ===========================================================================
  // markExpired / withAuthorization
  // ===========================================================================

  describe("withAuthorization", () => {
    test("ignores a rejection of a token that was already replaced", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore(baseOptions());
      await store.getValidToken();

      store.markExpired("some-older-token");

      expect(store.getState().status).toBe("VALID");
    });

    test("refreshes once and retries once after an authorization failure", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "stale-access", expiresAt: NOW + 3_600_000 },
      });
      const call = vi.fn(async (token: string) =>
        token === "access-2"
          ? ok<string, CallError>("reading")
          : err<string, CallError>({ type: "UNAUTHORIZED" }),
      );

      const result = await store.withAuthorization(call, isUnauthorized);

      expect(result._unsafeUnwrap()).toBe("reading");
      expect(call).toHaveBeenCalledTimes(2);
      expect(call.mock.calls.map(([token]) => token)).toEqual([
        "stale-access",
        "access-2",
      ]);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    test("returns AUTH_REJECTED when the retry is rejected too", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "stale-access", expiresAt: NOW + 3_600_000 },
      });
      const call = vi.fn(async () =>
        err<string, CallError>({ type: "UNAUTHORIZED" }),
      );

      const result = await store.withAuthorization(call, isUnauthorized);

      expect(result._unsafeUnwrapErr().type).toBe("AUTH_REJECTED");
      expect(call).toHaveBeenCalledTimes(2);
      expect(fetch).toHaveBeenCalledTimes(1);
      // terminal for that call only
      expect(store.getState().status).toBe("VALID");
    });

    test("passes other errors through without refreshing", async () => {
      vi.stubGlobal("fetch", vi.fn());
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "live-access", expiresAt: NOW + 3_600_000 },
      });
      const call = vi.fn(async () => err<string, CallError>({ type: "OTHER" }));

      const result = await store.withAuthorization(call, isUnauthorized);

      expect(result._unsafeUnwrapErr().type).toBe("OTHER");
      expect(call).toHaveBeenCalledTimes(1);
      expect(fetch).not.toHaveBeenCalled();
    });

    test("concurrent rejected calls trigger one refresh", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(tokenResponse("access-2", "refresh-2")),
      );
      const store = createTokenStore({
        ...baseOptions(),
        liveToken: { accessToken: "stale-access", expiresAt: NOW + 3_600_000 },
      });
      const call = async (token: string) =>
        token === "access-2"
          ? ok<number, CallError>(1)
          : err<number, CallError>({ type: "UNAUTHORIZED" });

      const results = await Promise.all(
        Array.from({ length: 4 }, () =>
          store.withAuthorization(call, isUnauthorized),
        ),
      );

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(results.every((r) => r.isOk())).toBe(true);
    });
  });
});
