import { SignJWT, errors, jwtVerify } from "jose";
import { fail } from "../errors/error.js";
import { canonicalExtensionData, fromPayload, toPayload } from "./claims.js";
import type {
  ClaimSigner,
  Claims,
  ExtensionData,
  SignResult,
  VerifyOptions,
  VerifyResult,
} from "./types.js";

/** The only signing algorithm accepted in either direction. */
export const SIGNING_ALG = "HS256";

function toHmacKey(secret: string) {
  return new TextEncoder().encode(secret);
}

/**
 * HS256 JWT signer keyed by a caller-supplied secret.
 *
 * Authenticity and shape only: expiry comes back as `valid: false` and the
 * issuer is not looked at. Those are the token service's checks.
 */
export class JwtClaimSigner implements ClaimSigner {
  async sign(claims: Claims, secret: string): Promise<SignResult> {
    if (secret.length === 0) return fail("AUTH_CONFIG_ERROR");

    let adx: ExtensionData | undefined;
    if (claims.extensionData !== undefined) {
      adx = canonicalExtensionData(claims.extensionData);
      if (!adx) return fail("AUTH_EXTENSION_DATA_INVALID");
    }

    const token = await new SignJWT(toPayload(claims, adx))
      .setProtectedHeader({ alg: SIGNING_ALG, typ: "JWT" })
      .sign(toHmacKey(secret));

    return { ok: true, token };
  }

  async verify(
    token: string,
    secret: string,
    options: VerifyOptions = {},
  ): Promise<VerifyResult> {
    if (secret.length === 0) return fail("AUTH_CONFIG_ERROR");

    try {
      const { payload } = await jwtVerify(token, toHmacKey(secret), {
        algorithms: [SIGNING_ALG],
        currentDate: options.currentDate,
        clockTolerance: options.clockSkewSeconds ?? 0,
      });
      return { ok: true, valid: true, claims: fromPayload(payload) };
    } catch (e) {
      // jose checks the signature before any claim, so these carry an
      // authentic payload
      if (
        e instanceof errors.JWTExpired ||
        e instanceof errors.JWTClaimValidationFailed
      ) {
        return { ok: true, valid: false, claims: fromPayload(e.payload) };
      }
      if (e instanceof errors.JWSSignatureVerificationFailed) {
        return fail("AUTH_INVALID_SIGNATURE");
      }
      if (e instanceof errors.JOSEError) {
        return fail("AUTH_TOKEN_MALFORMED", { cause: e.code });
      }
      throw e;
    }
  }
}
