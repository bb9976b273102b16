/**
 * Structured logging
 *
 * Single pino instance shared by every pipeline stage. Level comes from
 * LOG_LEVEL (default: info); tests run with LOG_LEVEL=silent. Lines go to
 * stderr so the printed report on stdout stays clean.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export function createLogger(
  destination: DestinationStream = pino.destination({ fd: 2, sync: true }),
  level: string = process.env.LOG_LEVEL || "info"
): Logger {
  return pino({
    level,
    base: {
      service: "evidence-harvester",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["apiKey", "headers.X-Subscription-Token", "headers.x-api-key"],
      censor: "[REDACTED]",
    },
  }, destination);
}

export const logger = createLogger();

/**
 * Child logger tagged with the component that writes through it
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
