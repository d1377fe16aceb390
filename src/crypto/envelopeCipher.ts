import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { fail } from "../errors/error.js";
import type { Failure } from "../errors/error.js";
import { DERIVED_KEY_BYTES } from "./keyDerivation.js";

const CIPHER = "aes-256-gcm";

/** GCM standard nonce size. */
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;

// Padded standard alphabet only; Buffer.from(..., "base64") would skip junk.
const BASE64_RE =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type DecryptResult = { ok: true; plaintext: Uint8Array } | Failure;

function assertKey(key: Uint8Array) {
  if (key.length !== DERIVED_KEY_BYTES) {
    throw new Error(`Envelope key must be ${DERIVED_KEY_BYTES} bytes`);
  }
}

/**
 * Seals `plaintext` under `key` with a fresh random nonce.
 * Output: base64(nonce ‖ ciphertext ‖ tag).
 */
export function encrypt(plaintext: Uint8Array, key: Uint8Array): string {
  assertKey(key);

  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv(CIPHER, key, nonce, {
    authTagLength: TAG_BYTES,
  });
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const tag = cipher.getAuthTag();

  return Buffer.concat([nonce, ciphertext, tag]).toString("base64");
}

/**
 * Opens an envelope produced by {@link encrypt}.
 *
 * A wrong key and a modified envelope both end in AUTH_DECRYPTION_FAILED
 * with the same message.
 */
export function decrypt(envelope: string, key: Uint8Array): DecryptResult {
  assertKey(key);

  if (!BASE64_RE.test(envelope)) return fail("AUTH_ENVELOPE_MALFORMED");

  const raw = Buffer.from(envelope, "base64");
  // non-zero padding bits decode the same; only the canonical text is accepted
  if (raw.toString("base64") !== envelope) {
    return fail("AUTH_ENVELOPE_MALFORMED");
  }
  if (raw.length < NONCE_BYTES) return fail("AUTH_ENVELOPE_MALFORMED");

  // too short to carry a tag: same outcome as a tag mismatch
  if (raw.length < NONCE_BYTES + TAG_BYTES) {
    return fail("AUTH_DECRYPTION_FAILED");
  }

  const nonce = raw.subarray(0, NONCE_BYTES);
  const ciphertext = raw.subarray(NONCE_BYTES, raw.length - TAG_BYTES);
  const tag = raw.subarray(raw.length - TAG_BYTES);

  const decipher = createDecipheriv(CIPHER, key, nonce, {
    authTagLength: TAG_BYTES,
  });
  decipher.setAuthTag(tag);

  try {
    const plaintext = Buffer.concat([
      decipher.update(ciphertext),
      decipher.final(),
    ]);
    return { ok: true, plaintext };
  } catch {
    return fail("AUTH_DECRYPTION_FAILED");
  }
}
