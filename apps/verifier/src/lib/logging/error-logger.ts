/**
 * Error Logger with Fingerprinting
 *
 * Provides structured error logging with:
 * - Error fingerprinting for grouping similar errors
 * - Context extraction from known error types (ProverError, ConfigError)
 * - Consistent log format across the service
 */
import { createHash } from "node:crypto";

import { ConfigError, ProverError } from "../errors.js";
import { type Logger, logger } from "./logger.js";
import { sanitizeLogMessage } from "./redact.js";

/** Matches stack trace location: "at functionName (file:line:col)" or "at file:line:col" */
const STACK_LOCATION_PATTERN = /at\s+(?:(.+?)\s+\()?(.+?):(\d+):\d+\)?/;

/** Matches path prefix up to and including /src/ for normalization */
const SRC_PATH_PREFIX_PATTERN = /^.*?\/src\//;

interface ErrorContext {
  sessionId?: string;
  peer?: string;
  operation?: string;
  phase?: string;
}

function extractErrorContext(error: unknown): Record<string, unknown> {
  if (error instanceof ProverError) {
    return {
      errorType: "ProverError",
      operation: error.operation,
      kind: error.kind,
      code: error.code,
    };
  }
  if (error instanceof ConfigError) {
    return {
      errorType: "ConfigError",
      issues: error.issues,
    };
  }
  return {};
}

/**
 * Extracts the first meaningful stack frame location.
 * Skips node_modules and Node internals.
 */
function getStackLocation(err: Error): string {
  const lines = err.stack?.split("\n") ?? [];
  for (const line of lines.slice(1)) {
    if (line.includes("node_modules") || line.includes("node:")) {
      continue;
    }

    const match = line.match(STACK_LOCATION_PATTERN);
    if (match) {
      const file = match[2];
      const lineNum = match[3];
      const relativePath =
        file?.replace(SRC_PATH_PREFIX_PATTERN, "src/") ?? "unknown";
      return `${relativePath}:${lineNum}`;
    }
  }
  return "unknown";
}

/**
 * Creates a stable fingerprint for error grouping.
 * Includes first 100 chars of message for better grouping.
 */
function createFingerprint(err: Error): string {
  const location = getStackLocation(err);
  const messagePart = err.message.slice(0, 100);
  const input = `${err.name}:${messagePart}:${location}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 12);
}

/**
 * Log an error with context and fingerprinting.
 *
 * @returns The error fingerprint (12 chars)
 */
export function logError(
  error: unknown,
  context: ErrorContext = {},
  log: Pick<Logger, "error"> = logger
): string {
  const err = error instanceof Error ? error : new Error(String(error));
  const safeMessage = sanitizeLogMessage(err.message);
  const fingerprint = createFingerprint(err);
  const errorContext = extractErrorContext(error);
  const safeStack = err.stack
    ? err.stack.replace(err.message, safeMessage)
    : undefined;

  log.error(
    {
      ...context,
      ...errorContext,
      fingerprint,
      error: {
        name: err.name,
        message: safeMessage,
        stack: safeStack,
      },
    },
    `[${fingerprint}] ${safeMessage}`
  );

  return fingerprint;
}

/**
 * Log a warning for expected failures (rejected connections, tool exits).
 * Does not include stack traces - these are expected conditions.
 */
export function logWarn(
  message: string,
  context: Record<string, unknown> = {},
  log: Pick<Logger, "warn"> = logger
): void {
  log.warn(context, sanitizeLogMessage(message));
}
