// src/core/logger.ts

import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Root logger for the library. Components log through children created
 * with `componentLogger`, callers can pass their own pino instance in the
 * options instead.
 */
export const logger: Logger = pino({
  name: "gerber-paste-volume",
  level: process.env.PASTE_VOLUME_LOG_LEVEL ?? "info",
});

export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? logger).child({ component });
}
