/**
 * Structured Logging Module
 *
 * Public API for structured logging throughout the service.
 *
 * @example Session usage
 * ```ts
 * const log = createSessionLogger(session.id, peer);
 * log.info({ phase: session.phase }, "Session advanced");
 * ```
 *
 * @example Error logging
 * ```ts
 * import { logError, logWarn } from "./logging/index.js";
 * const fingerprint = logError(error, { sessionId, operation: "prove" });
 * logWarn("Connection rejected", { activeSessions });
 * ```
 */

export { logError, logWarn } from "./error-logger.js";
export {
  createSessionLogger,
  type Logger,
  logger,
} from "./logger.js";
export {
  REDACT_KEYS,
  sanitizeLogMessage,
  sanitizeToolOutput,
} from "./redact.js";
