/**
 * Typed configuration - parsed from the environment with Zod at load time.
 * This is a library loaded into someone else's process, so an invalid value
 * never stops it: the key is reported and its default used instead.
 *
 * Every setting has a default, so the library loads without any
 * environment. Credentials are optional: clients can be built from
 * explicit options instead.
 *
 * Covers:
 * - Runtime and logging
 * - Energy meter service (Energyhive)
 * - Thermostat service (Netatmo)
 */
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),
  HTTP_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Timeout for a single upstream HTTP call (ms)"),

  // ==========================================================================
  // Energy Meter (Energyhive mobile proxy)
  // ==========================================================================
  ENERGY_API_URL: z
    .string()
    .url()
    .default("http://www.energyhive.com/mobile_proxy")
    .describe("Energyhive API base URL, without trailing slash"),
  METER_TOKEN: optionalString.describe("Energyhive app token for the meter"),
  METER_MAX_REQUESTS_PER_SECOND: z.coerce
    .number()
    .positive()
    .default(20)
    .describe("Ceiling for historic retrieval calls per second"),

  // ==========================================================================
  // Thermostat (Netatmo energy API)
  // ==========================================================================
  NETATMO_API_URL: z
    .string()
    .url()
    .default("https://api.netatmo.com/api")
    .describe("Netatmo API base URL, without trailing slash"),
  NETATMO_OAUTH_URL: z
    .string()
    .url()
    .default("https://api.netatmo.com/oauth2")
    .describe("Netatmo OAuth2 base URL, without trailing slash"),
  NETATMO_CLIENT_ID: optionalString.describe("Netatmo app client ID"),
  NETATMO_CLIENT_SECRET: optionalString.describe("Netatmo app client secret"),
  NETATMO_REFRESH_TOKEN: optionalString.describe(
    "Netatmo refresh token (rotates on every refresh)",
  ),
  THERMOSTAT_TEMPERATURE_TTL_MS: z.coerce
    .number()
    .positive()
    .default(4 * 60 * 1000)
    .describe("How long a measured device temperature is reused (ms)"),
  THERMOSTAT_STATUS_TTL_MS: z.coerce
    .number()
    .positive()
    .default(15 * 1000)
    .describe("How long the composite home status is reused (ms)"),
});

/**
 * Parse the environment, falling back to the default for every key that
 * fails validation.
 */
function parseConfig(env: NodeJS.ProcessEnv): z.infer<typeof ConfigSchema> {
  const parsed = ConfigSchema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }

  const invalidKeys = new Set(
    parsed.error.issues.map((issue) => String(issue.path[0])),
  );
  console.warn(
    `⚠️ Invalid configuration for ${[...invalidKeys].join(", ")}, using defaults`,
  );

  // Every key has a default or is optional, so this parse cannot fail
  return ConfigSchema.parse(
    Object.fromEntries(
      Object.entries(env).filter(([key]) => !invalidKeys.has(key)),
    ),
  );
}

export const config = parseConfig(process.env);

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Meter client options from the environment.
 * Returns null if no meter token is configured.
 */
export function getMeterConfig(): Readonly<{
  token: string;
  baseUrl: string;
  maxRequestsPerSecond: number;
  timeoutMs: number;
}> | null {
  if (!config.METER_TOKEN) {
    return null;
  }

  return {
    token: config.METER_TOKEN,
    baseUrl: config.ENERGY_API_URL,
    maxRequestsPerSecond: config.METER_MAX_REQUESTS_PER_SECOND,
    timeoutMs: config.HTTP_TIMEOUT_MS,
  };
}

/**
 * Thermostat client options from the environment.
 * Returns null unless client ID, secret and refresh token are all set.
 */
export function getThermostatConfig(): Readonly<{
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  apiUrl: string;
  oauthUrl: string;
  timeoutMs: number;
  temperatureTtlMs: number;
  statusTtlMs: number;
}> | null {
  if (
    !config.NETATMO_CLIENT_ID ||
    !config.NETATMO_CLIENT_SECRET ||
    !config.NETATMO_REFRESH_TOKEN
  ) {
    return null;
  }

  return {
    clientId: config.NETATMO_CLIENT_ID,
    clientSecret: config.NETATMO_CLIENT_SECRET,
    refreshToken: config.NETATMO_REFRESH_TOKEN,
    apiUrl: config.NETATMO_API_URL,
    oauthUrl: config.NETATMO_OAUTH_URL,
    timeoutMs: config.HTTP_TIMEOUT_MS,
    temperatureTtlMs: config.THERMOSTAT_TEMPERATURE_TTL_MS,
    statusTtlMs: config.THERMOSTAT_STATUS_TTL_MS,
  };
}
