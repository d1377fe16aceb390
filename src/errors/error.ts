import type { AuthErrorCode } from "./codes.js";
import { AUTH_ERROR_MESSAGES, isAuthErrorCode } from "./codes.js";

export type AuthError = {
  code: AuthErrorCode;
  message: string;
  details?: unknown;
};

export type Failure = { ok: false; error: AuthError };

export function err(
  code: AuthErrorCode,
  message: string = AUTH_ERROR_MESSAGES[code],
  details?: unknown,
): AuthError {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

export function fail(code: AuthErrorCode, details?: unknown): Failure {
  return { ok: false, error: err(code, AUTH_ERROR_MESSAGES[code], details) };
}

export function isAuthError(x: unknown): x is AuthError {
  if (!x || typeof x !== "object") return false;
  if (!("code" in x) || !("message" in x)) return false;
  return isAuthErrorCode(x.code) && typeof x.message === "string";
}
