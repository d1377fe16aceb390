import { describe, it, expect } from "vitest";
import {
  NONCE_BYTES,
  TAG_BYTES,
  decrypt,
  encrypt,
} from "../src/crypto/envelopeCipher.js";

const key = new Uint8Array(32).fill(7);
const otherKey = new Uint8Array(32).fill(8);
const utf8 = (s: string) => Buffer.from(s, "utf8");

describe("envelope cipher", () => {
  it("round-trips plaintext", () => {
    const envelope = encrypt(utf8("header.payload.sig"), key);
    const res = decrypt(envelope, key);

    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(Buffer.from(res.plaintext).toString("utf8")).toBe(
        "header.payload.sig",
      );
    }
  });

  it("round-trips empty plaintext", () => {
    const envelope = encrypt(new Uint8Array(0), key);
    expect(Buffer.from(envelope, "base64")).toHaveLength(
      NONCE_BYTES + TAG_BYTES,
    );

    const res = decrypt(envelope, key);
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.plaintext).toHaveLength(0);
  });

  it("lays out nonce ‖ ciphertext ‖ tag as base64", () => {
    const envelope = encrypt(utf8("hello"), key);
    expect(envelope).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
    expect(Buffer.from(envelope, "base64")).toHaveLength(
      NONCE_BYTES + 5 + TAG_BYTES,
    );
  });

  it("uses a fresh nonce per call", () => {
    const a = Buffer.from(encrypt(utf8("same"), key), "base64");
    const b = Buffer.from(encrypt(utf8("same"), key), "base64");
    expect(a.subarray(0, NONCE_BYTES).equals(b.subarray(0, NONCE_BYTES))).toBe(
      false,
    );
  });

  it("rejects every single-byte modification", () => {
    const raw = Buffer.from(encrypt(utf8("tamper me"), key), "base64");

    for (let i = 0; i < raw.length; i++) {
      const copy = Buffer.from(raw);
      copy[i] ^= 0x01;
      const res = decrypt(copy.toString("base64"), key);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe("AUTH_DECRYPTION_FAILED");
    }
  });

  it("reports a wrong key exactly like tampering", () => {
    const envelope = encrypt(utf8("secret"), key);
    const wrongKey = decrypt(envelope, otherKey);

    const raw = Buffer.from(envelope, "base64");
    raw[raw.length - 1] ^= 0xff;
    const tampered = decrypt(raw.toString("base64"), key);

    expect(wrongKey).toEqual(tampered);
    expect(wrongKey).toEqual({
      ok: false,
      error: {
        code: "AUTH_DECRYPTION_FAILED",
        message: "Token could not be decrypted",
      },
    });
  });

  it("rejects text that is not base64", () => {
    for (const bad of ["not base64!", "abc", "ab=c", "Zm9v\n"]) {
      const res = decrypt(bad, key);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe("AUTH_ENVELOPE_MALFORMED");
    }
  });

  it("rejects base64 whose padding bits are set", () => {
    const alphabet =
      "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";
    // 12 + 7 + 16 = 35 bytes: one "=" and two unused bits in the last symbol
    const envelope = encrypt(utf8("hello!!"), key);
    expect(envelope.endsWith("=")).toBe(true);
    expect(envelope.endsWith("==")).toBe(false);

    const i = envelope.length - 2;
    const variant =
      envelope.slice(0, i) +
      alphabet[alphabet.indexOf(envelope[i]) + 1] +
      envelope.slice(i + 1);

    expect(Buffer.from(variant, "base64")).toEqual(
      Buffer.from(envelope, "base64"),
    );
    expect(decrypt(envelope, key).ok).toBe(true);

    const res = decrypt(variant, key);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("AUTH_ENVELOPE_MALFORMED");
  });

  it("rejects input shorter than a nonce", () => {
    for (const len of [0, 1, NONCE_BYTES - 1]) {
      const res = decrypt(Buffer.alloc(len).toString("base64"), key);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe("AUTH_ENVELOPE_MALFORMED");
    }
  });

  it("fails decryption when there is no room for a tag", () => {
    const res = decrypt(Buffer.alloc(NONCE_BYTES + 4).toString("base64"), key);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("AUTH_DECRYPTION_FAILED");
  });

  it("throws on a key of the wrong size", () => {
    expect(() => encrypt(utf8("x"), new Uint8Array(16))).toThrow(
      /must be 32 bytes/,
    );
    expect(() => decrypt("AAAA", new Uint8Array(31))).toThrow(
      /must be 32 bytes/,
    );
  });
});
