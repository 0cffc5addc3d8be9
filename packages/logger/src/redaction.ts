/**
 * Log redaction
 *
 * Keeps credentials out of log lines and masks e-mail addresses that show up
 * in free text (queries and OCR passages routinely contain them).
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "cohereapikey",
  "authorization",
  "cookie",
  "accesstoken",
  "refreshtoken",
]);

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys lose their value entirely; string values keep their text
 * with e-mail addresses masked.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_PATTERN, REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log object.
 * Used as pino's `formatters.log` hook.
 */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

/**
 * JSON paths for pino's `redact` option, covering the config objects that
 * carry credentials (e.g. `config.cohere.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  "apiKey",
  "token",
  "authorization",
  "password",
  "secret",
  "*.apiKey",
  "*.token",
  "*.authorization",
  "*.password",
  "*.secret",
  "config.cohere.apiKey",
];
