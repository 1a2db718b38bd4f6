import pino, { Logger } from "pino";
import type { LogLevel } from "../config/settings";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "clientSecret",
  "*.clientSecret",
  "headers['X-Client-Secret']",
  "*.headers['X-Client-Secret']"
];

/**
 * JSON logger on stdout. Silenced under Vitest or NODE_ENV=test; pipe through
 * pino-pretty for human-readable output.
 */
export function makeLogger(bindings?: Record<string, unknown>, level: LogLevel = "info"): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino({
    level,
    enabled: !isTestTooling,
    base: { ...bindings, app: "regsync" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" }
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
