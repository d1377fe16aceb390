import { pbkdf2Sync } from "node:crypto";

/** AES-256-GCM key size. */
export const DERIVED_KEY_BYTES = 32;

export type KeyDerivationVersion = "v1" | "v2";

export type KeyDerivationParams = {
  digest: "sha1" | "sha256";
  iterations: number;
};

/**
 * PBKDF2 parameter sets. Envelopes are only readable with the parameters that
 * sealed them, so an entry is never edited in place; add a new version.
 * - v1: legacy parameters of older deployments
 * - v2: current default
 */
export const KEY_DERIVATION_PARAMS: Readonly<
  Record<KeyDerivationVersion, Readonly<KeyDerivationParams>>
> = {
  v1: { digest: "sha1", iterations: 4096 },
  v2: { digest: "sha256", iterations: 100_000 },
};

export const DEFAULT_KEY_DERIVATION_VERSION: KeyDerivationVersion = "v2";

export function isKeyDerivationVersion(x: unknown): x is KeyDerivationVersion {
  return x === "v1" || x === "v2";
}

/**
 * Derives the 32-byte envelope key from the service secret and salt.
 * Deterministic for equal inputs. The caller owns the returned buffer and
 * should zero it once done.
 */
export function deriveKey(
  sharedSecret: string,
  salt: string,
  version: KeyDerivationVersion = DEFAULT_KEY_DERIVATION_VERSION,
): Uint8Array {
  const { digest, iterations } = KEY_DERIVATION_PARAMS[version];
  return pbkdf2Sync(sharedSecret, salt, iterations, DERIVED_KEY_BYTES, digest);
}
