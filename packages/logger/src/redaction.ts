/**
 * Credential redaction paths.
 *
 * Request headers, socket auth frames and client configs all carry the API
 * key pair under different names.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "keyId",
  "secretKey",
  "key",
  "secret",
  "key_id",
  "secret_key",
  "*.keyId",
  "*.secretKey",
  "*.key",
  "*.secret",
  "*.key_id",
  "*.secret_key",
  'headers["APCA-API-KEY-ID"]',
  'headers["APCA-API-SECRET-KEY"]',
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
