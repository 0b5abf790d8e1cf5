/**
 * Key-based redaction for metadata maps handed to the logger.
 *
 * The sensitive key set is data: add new secret-bearing field names to
 * DEFAULT_SENSITIVE_KEYS (or pass a custom set) instead of scattering
 * string checks through callers.
 */

export const REDACTED_VALUE = "[REDACTED]";

export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  "authorization",
  "auth",
  "token",
  "github-token",
  "github_token",
  "access_token",
  "api_key",
  "apikey",
  "api-key",
  "azure_ai_foundry_api_key",
  "input_azure_foundry_api_key",
  "azure_foundry_api_key",
];

export type Redactor = (
  payload: Readonly<Record<string, unknown>>,
) => Record<string, unknown>;

/** Build a redactor over a fixed set of key names (matched case-insensitively). */
export function createRedactor(sensitiveKeys: Iterable<string>): Redactor {
  const keys = new Set(Array.from(sensitiveKeys, (k) => k.toLowerCase()));

  return (payload) => {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      sanitized[key] = keys.has(key.toLowerCase()) ? REDACTED_VALUE : value;
    }
    return sanitized;
  };
}

const defaultRedactor = createRedactor(DEFAULT_SENSITIVE_KEYS);

/**
 * Return a copy of `payload` with sensitive values replaced.
 * The input map is never modified.
 */
export function redactPayload(
  payload: Readonly<Record<string, unknown>>,
  sensitiveKeys?: Iterable<string>,
): Record<string, unknown> {
  return sensitiveKeys ? createRedactor(sensitiveKeys)(payload) : defaultRedactor(payload);
}
