/**
 * @accrual/subscriptions — Logging.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { RuntimeConfig } from "./config.js";

/**
 * Build the process logger. Development output goes through pino-pretty.
 */
export function createLogger(config: RuntimeConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
