/**
 * @coldsig/toolkit — Logging.
 *
 * Key material, seeds and signatures are never passed to the logger.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { ToolkitConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * pino logger at the configured level, pretty-printed in development.
 */
export function createLogger(
  config: Pick<ToolkitConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Logger for library callers that pass none. */
export const silentLogger: Logger = pino({ level: "silent" });
