/**
 * Redaction Utilities
 *
 * Canonical list of fields that must never reach the logs: the private
 * circuit inputs and the proof bytes.
 */

/**
 * Keys that should always be redacted from logs.
 * Referenced in logger.ts for Pino redaction paths.
 */
export const REDACT_KEYS = new Set([
  // Private circuit inputs
  "age",
  "bmi",
  "bmiTimesTen",
  "input",

  // Proof material
  "proof",
  "proofBase64",
  "witness",
]);

const LONG_HEX_PATTERN = /\b(?:0x)?[a-fA-F0-9]{32,}\b/g;
const LONG_DIGIT_PATTERN = /\b\d{6,}\b/g;
// biome-ignore lint/suspicious/noControlCharactersInRegex: strips ANSI colors from tool output
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

const MAX_MESSAGE_LENGTH = 500;
const MAX_TOOL_OUTPUT_LENGTH = 2000;

/**
 * Sanitize free-form log messages.
 * Keeps messages readable while redacting field elements and long hashes.
 */
export function sanitizeLogMessage(message: string): string {
  if (!message) return message;

  let output = message;
  output = output.replace(LONG_HEX_PATTERN, "[redacted-hex]");
  output = output.replace(LONG_DIGIT_PATTERN, "[redacted-number]");

  if (output.length > MAX_MESSAGE_LENGTH) {
    output = `${output.slice(0, 200)}…[truncated:${output.length}]`;
  }

  return output;
}

/**
 * Prepare nargo/bb stderr for logging.
 * Tool errors put the cause at the end, so the tail is kept.
 */
export function sanitizeToolOutput(output: string): string {
  const plain = output.replace(ANSI_PATTERN, "").trim();
  const redacted = plain
    .replace(LONG_HEX_PATTERN, "[redacted-hex]")
    .replace(LONG_DIGIT_PATTERN, "[redacted-number]");

  if (redacted.length > MAX_TOOL_OUTPUT_LENGTH) {
    return `[truncated:${redacted.length}]…${redacted.slice(-MAX_TOOL_OUTPUT_LENGTH)}`;
  }
  return redacted;
}
