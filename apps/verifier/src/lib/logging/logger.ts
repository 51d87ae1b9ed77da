/**
 * Pino Logger Configuration
 *
 * Single source of truth for structured logging configuration.
 * - JSON output in production, pretty-print in development
 * - Private verification inputs redacted via Pino's redact option
 * - Child loggers for session correlation
 */
import { type Logger, pino, stdSerializers } from "pino";

import { REDACT_KEYS } from "./redact.js";

const nodeEnv = process.env.NODE_ENV || "development";
const isDev = nodeEnv !== "production" && nodeEnv !== "test";
const logLevel = process.env.LOG_LEVEL || (isDev ? "debug" : "info");

const redactPaths = [
  ...REDACT_KEYS,
  // Canonical redaction keys (nested with wildcard)
  ...Array.from(REDACT_KEYS, (key) => `*.${key}`),
];

/**
 * Base logger instance - created once at module load.
 * Use createSessionLogger() for connection-scoped logging.
 */
export const logger: Logger = pino({
  level: logLevel,

  // Pretty-print in dev, structured JSON in production
  ...(isDev && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    },
  }),

  base: {
    service: "zk-insurance-verifier",
    env: nodeEnv,
  },

  redact: {
    paths: redactPaths,
    censor: "[REDACTED]",
  },

  serializers: {
    err: stdSerializers.err,
  },
});

/**
 * Creates a child logger bound to one client connection.
 *
 * @param sessionId - Session UUID, also used to name the working area
 * @param peer - Remote address of the client
 */
export function createSessionLogger(
  sessionId: string,
  peer: string,
  parent: Logger = logger
): Logger {
  return parent.child({ sessionId, peer });
}

export type { Logger };
