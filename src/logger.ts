import type { Logger } from "pino";
import pino from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "secret",
  "token",
  "*.secret",
  "*.token",
  'headers["x-hub-signature-256"]',
  'req.headers["x-hub-signature-256"]'
];

/**
 * Process logger. JSON lines go to stderr so that stdout stays free for the
 * CLI's JSON output; silenced under test tooling.
 */
export const makeLogger = (bindings?: Record<string, unknown>): Logger => {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.TOLLGATE_LOG_LEVEL ?? "info";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      base: { ...bindings, service: "tollgate" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" }
    },
    pino.destination({ dest: 2, sync: true })
  );
};

export const makeNoopLogger = (): Logger => pino({ enabled: false });
