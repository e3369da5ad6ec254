import pino from "pino";
import { ServiceCoordinate, formatCoord } from "../services/serviceCoord.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "contest-admin"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = typeof logger;

/**
 * Returns a child logger bound to the service instance it speaks for
 * (or talks to).
 */
export function getServiceLogger(coord: ServiceCoordinate, component?: string): Logger {
  return logger.child({
    service: formatCoord(coord),
    ...(component ? { component } : {})
  });
}
