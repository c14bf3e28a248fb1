/**
 * Configuration Tests
 *
 * The environment is read when the module loads, so each test imports a
 * fresh copy.
 */
import { afterEach, describe, expect, test, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  return import("../config.js");
}

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("applies defaults for unset values", async () => {
    const { config } = await loadConfig();

    expect(config.ENERGY_API_URL).toBe("http://www.energyhive.com/mobile_proxy");
    expect(config.THERMOSTAT_STATUS_TTL_MS).toBe(15000);
  });

  test("treats an empty token as unset", async () => {
    vi.stubEnv("METER_TOKEN", "");

    const { getMeterConfig } = await loadConfig();

    expect(getMeterConfig()).toBeNull();
  });

  test("meter options from the environment", async () => {
    vi.stubEnv("METER_TOKEN", "test-token");
    vi.stubEnv("ENERGY_API_URL", "http://meter.test");
    vi.stubEnv("METER_MAX_REQUESTS_PER_SECOND", "10");
    vi.stubEnv("HTTP_TIMEOUT_MS", "5000");

    const { getMeterConfig } = await loadConfig();

    expect(getMeterConfig()).toEqual({
      token: "test-token",
      baseUrl: "http://meter.test",
      maxRequestsPerSecond: 10,
      timeoutMs: 5000,
    });
  });

  test("thermostat options need all three credentials", async () => {
    vi.stubEnv("NETATMO_CLIENT_ID", "test-client");
    vi.stubEnv("NETATMO_CLIENT_SECRET", "test-secret");
    vi.stubEnv("NETATMO_REFRESH_TOKEN", "");

    const { getThermostatConfig } = await loadConfig();

    expect(getThermostatConfig()).toBeNull();
  });

  test("thermostat options from the environment", async () => {
    vi.stubEnv("NETATMO_CLIENT_ID", "test-client");
    vi.stubEnv("NETATMO_CLIENT_SECRET", "test-secret");
    vi.stubEnv("NETATMO_REFRESH_TOKEN", "test-refresh");
    vi.stubEnv("NETATMO_API_URL", "http://netatmo.test/api");

    const { getThermostatConfig } = await loadConfig();

    expect(getThermostatConfig()).toMatchObject({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh",
      apiUrl: "http://netatmo.test/api",
    });
  });

  describe("invalid values", () => {
    test("fall back to defaults without stopping the process", async () => {
      const exit = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit called");
      });
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.stubEnv("NODE_ENV", "staging");
      vi.stubEnv("LOG_LEVEL", "warning");
      vi.stubEnv("METER_MAX_REQUESTS_PER_SECOND", "fast");
      vi.stubEnv("METER_TOKEN", "test-token");

      const { config } = await loadConfig();

      expect(exit).not.toHaveBeenCalled();
      expect(config.NODE_ENV).toBe("production");
      expect(config.LOG_LEVEL).toBe("info");
      expect(config.METER_MAX_REQUESTS_PER_SECOND).toBe(20);
      expect(config.METER_TOKEN).toBe("test-token");
      expect(warn).toHaveBeenCalledWith(
        "⚠️ Invalid configuration for NODE_ENV, LOG_LEVEL, METER_MAX_REQUESTS_PER_SECOND, using defaults",
      );

      exit.mockRestore();
      warn.mockRestore();
    });
  });
});
