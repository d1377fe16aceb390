import type { TokenServiceConfig } from "./types.js";
import {
  DEFAULT_KEY_DERIVATION_VERSION,
  isKeyDerivationVersion,
} from "./crypto/keyDerivation.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_TIMEOUT_MINUTES = 60;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value || value.trim().length === 0) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function nonNegativeNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number`);
  }
  return n;
}

/**
 * Reads the token service configuration from environment variables.
 * Error messages name the variable, never its value.
 *
 * - AUTH_SECRET, AUTH_SALT, AUTH_ISSUER: required
 * - AUTH_TIMEOUT_MINUTES: default 60
 * - AUTH_KEY_DERIVATION: v1 | v2, default v2
 * - AUTH_CLOCK_SKEW_SECONDS: default 0
 */
export function loadTokenServiceConfig(
  env: Env = process.env,
): TokenServiceConfig {
  const keyDerivation =
    env.AUTH_KEY_DERIVATION?.trim() || DEFAULT_KEY_DERIVATION_VERSION;
  if (!isKeyDerivationVersion(keyDerivation)) {
    throw new Error("AUTH_KEY_DERIVATION must be v1 or v2");
  }

  return {
    secret: required(env, "AUTH_SECRET"),
    salt: required(env, "AUTH_SALT"),
    issuer: required(env, "AUTH_ISSUER"),
    timeoutMinutes: nonNegativeNumber(
      env,
      "AUTH_TIMEOUT_MINUTES",
      DEFAULT_TIMEOUT_MINUTES,
    ),
    keyDerivation,
    clockSkewSeconds: nonNegativeNumber(env, "AUTH_CLOCK_SKEW_SECONDS", 0),
  };
}
