export const AUTH_ERROR_CODES = [
  "AUTH_ENVELOPE_MALFORMED",
  "AUTH_DECRYPTION_FAILED",
  "AUTH_TOKEN_MALFORMED",
  "AUTH_INVALID_SIGNATURE",
  "AUTH_TOKEN_MISSING_CLAIMS",
  "AUTH_TOKEN_INVALID",
  "AUTH_INVALID_ISSUER",
  "AUTH_EXTENSION_DATA_INVALID",
  "AUTH_CONFIG_ERROR",
  "AUTH_INTERNAL_ERROR",
] as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[number];

/** Fixed client-facing messages; nothing request-specific goes in here. */
export const AUTH_ERROR_MESSAGES: Readonly<Record<AuthErrorCode, string>> = {
  AUTH_ENVELOPE_MALFORMED: "Token envelope is malformed",
  AUTH_DECRYPTION_FAILED: "Token could not be decrypted",
  AUTH_TOKEN_MALFORMED: "Token is malformed",
  AUTH_INVALID_SIGNATURE: "Token signature is invalid",
  AUTH_TOKEN_MISSING_CLAIMS: "Token missing required claims",
  AUTH_TOKEN_INVALID: "Token invalid",
  AUTH_INVALID_ISSUER: "Token issuer is invalid",
  AUTH_EXTENSION_DATA_INVALID: "Extension data is not serializable",
  AUTH_CONFIG_ERROR: "Invalid configuration",
  AUTH_INTERNAL_ERROR: "Internal error",
};

export function isAuthErrorCode(x: unknown): x is AuthErrorCode {
  return (
    typeof x === "string" &&
    (AUTH_ERROR_CODES as readonly string[]).includes(x)
  );
}
