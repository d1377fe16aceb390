import { describe, it, expect } from "vitest";
import {
  AUTH_ERROR_CODES,
  AUTH_ERROR_MESSAGES,
  isAuthErrorCode,
} from "../src/errors/codes.js";
import { err, fail, isAuthError } from "../src/errors/error.js";

describe("auth errors", () => {
  it("has a distinct code and a message for every kind", () => {
    expect(new Set(AUTH_ERROR_CODES).size).toBe(AUTH_ERROR_CODES.length);
    for (const code of AUTH_ERROR_CODES) {
      expect(AUTH_ERROR_MESSAGES[code].length).toBeGreaterThan(0);
    }
  });

  it("err uses the fixed message and only adds details when given", () => {
    expect(err("AUTH_INVALID_ISSUER")).toEqual({
      code: "AUTH_INVALID_ISSUER",
      message: "Token issuer is invalid",
    });
    expect(err("AUTH_TOKEN_MALFORMED", "custom", { cause: "ERR_JWS_INVALID" }))
      .toEqual({
        code: "AUTH_TOKEN_MALFORMED",
        message: "custom",
        details: { cause: "ERR_JWS_INVALID" },
      });
    expect("details" in err("AUTH_TOKEN_INVALID")).toBe(false);
  });

  it("fail wraps an error in a failed result", () => {
    expect(fail("AUTH_DECRYPTION_FAILED")).toEqual({
      ok: false,
      error: {
        code: "AUTH_DECRYPTION_FAILED",
        message: "Token could not be decrypted",
      },
    });
  });

  it("recognises error values", () => {
    expect(isAuthErrorCode("AUTH_TOKEN_INVALID")).toBe(true);
    expect(isAuthErrorCode("AUTH_NOPE")).toBe(false);
    expect(isAuthError(err("AUTH_TOKEN_INVALID"))).toBe(true);
    expect(isAuthError({ code: "AUTH_NOPE", message: "x" })).toBe(false);
    expect(isAuthError(new Error("x"))).toBe(false);
    expect(isAuthError(null)).toBe(false);
  });
});
