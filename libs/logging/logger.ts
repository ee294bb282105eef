import pino from "pino";
import type { EndpointContext } from "../context/endpoint.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "response-mask"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the calling endpoint attached.
 * Masking calls without an endpoint context log through the root logger.
 */
export function getContextLogger(context?: EndpointContext) {
  if (!context) {
    return logger;
  }
  return logger.child({
    endpoint: context.endpoint,
    method: context.method,
    path: context.path
  });
}
