/**
 * PII Redaction for Safe Logging
 *
 * Uploaded spreadsheets are third-party personal data, and the enrollment
 * targets echo submitted emails back in their error text. Everything that
 * reaches a log line from outside the process goes through here:
 * - request bodies → sanitizeForLog (field names and string contents)
 * - error messages → describeError
 *
 * Names stay visible so operators can tell log lines apart.
 */

/** Field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'email',
  'email_address',
  'linkedinUrl',
  'linkedin',
  'LINKEDIN',
  'api_token',
  'apiKey',
  'token',
  'Authorization',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

const EMAIL_IN_TEXT = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const LINKEDIN_IN_TEXT = /(?:https?:\/\/)?(?:[a-zA-Z0-9-]+\.)*linkedin\.com\/[^\s"',]*/gi;
const TOKEN_PARAM_IN_TEXT = /\b(api_token|token)=[^&\s"']+/g;

/** Masks emails, LinkedIn URLs and token query parameters inside free text */
export function redactText(text: string): string {
  return text
    .replace(TOKEN_PARAM_IN_TEXT, `$1=${REDACTED}`)
    .replace(LINKEDIN_IN_TEXT, REDACTED)
    .replace(EMAIL_IN_TEXT, REDACTED);
}

/** Loggable message of a caught value */
export function describeError(error: unknown): string {
  return redactText(error instanceof Error ? error.message : String(error));
}

/**
 * Copy of `value` safe to log: PII fields become '[REDACTED]', strings are
 * passed through redactText, arrays become '[Array(N)]' and objects nested
 * past MAX_DEPTH become '[Object]'.
 */
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return redactText(value);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return `[Array(${value.length})]`;
  }
  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [
      key,
      PII_FIELDS.has(key) ? REDACTED : sanitizeForLog(field, depth + 1),
    ]),
  );
}
