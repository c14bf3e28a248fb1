/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs. Tokens and client
 * secrets are never passed to these loggers.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Client core
  cache: "\x1b[90m", // gray
  limiter: "\x1b[33m", // yellow
  token: "\x1b[35m", // magenta

  // Vendor clients
  meter: "\x1b[36m", // cyan
  thermostat: "\x1b[91m", // bright red

  // Infrastructure
  config: "\x1b[34m", // blue
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('thermostat');
 * log.info({ device }, 'Setting device to MANUAL');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Multi-step client operations that get a start/complete/fail trail.
 */
export type Operation =
  | "getHistoric"
  | "refreshToken"
  | "onRefresh"
  | "reloadTopology";

export type OperationLog = Readonly<{
  complete: (context?: Record<string, unknown>) => void;
  /** Accepts thrown values as well as the tagged errors in `err` results */
  fail: (error: unknown, context?: Record<string, unknown>) => void;
}>;

/**
 * Log the start of an operation and return the handle that logs its end,
 * with the duration since the start.
 *
 * @example
 * const op = startOperation(log, "getHistoric", { device });
 * if (result.isErr()) op.fail(result.error);
 * else op.complete({ values: result.value.length });
 */
export function startOperation(
  logger: Pick<Logger, "debug" | "info" | "error">,
  operation: Operation,
  context: Record<string, unknown> = {},
): OperationLog {
  const startTime = Date.now();
  logger.debug({ operation, ...context }, `→ ${operation} started`);

  return {
    complete: (extra = {}) => {
      const durationMs = Date.now() - startTime;
      logger.info(
        { operation, durationMs, ...context, ...extra },
        `✓ ${operation} completed (${durationMs}ms)`,
      );
    },
    fail: (error, extra = {}) => {
      const durationMs = Date.now() - startTime;
      const errorMessage = describeError(error);
      logger.error(
        { operation, durationMs, error: errorMessage, ...context, ...extra },
        `✗ ${operation} failed: ${errorMessage}`,
      );
    },
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return `${String(error.type)}: ${error.message}`;
  }
  return String(error);
}
