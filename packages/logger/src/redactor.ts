/**
 * Redaction rules for credentials and contact details that may reach logs
 * or the interaction store.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are always redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "apikey",
  "api_key",
  "x-api-key",
  "cohereapikey",
  "openaiapikey",
  "semanticscholarapikey",
  "qdrantapikey",
  "databaseurl",
  "redisurl",
  "authorization",
  "password",
  "token",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/** Replace email addresses inside free text. */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED);
}

/**
 * Redact a single key/value pair.
 *
 * - Known credential keys are replaced entirely with "[REDACTED]".
 * - Email addresses inside string values are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return redactText(value);
  }

  return value;
}

const REDACTED_FIELDS = [
  "apiKey",
  "api_key",
  "cohereApiKey",
  "openaiApiKey",
  "semanticScholarApiKey",
  "qdrantApiKey",
  "databaseUrl",
  "redisUrl",
  "authorization",
  "password",
  "token",
];

/**
 * Paths for Pino's `redact` option: every credential field at the top level
 * and one level of nesting (e.g. `headers.authorization`), plus the
 * Semantic Scholar key header.
 */
export const REDACT_PATHS: string[] = [
  ...REDACTED_FIELDS,
  ...REDACTED_FIELDS.map((field) => `*.${field}`),
  'headers["x-api-key"]',
];
