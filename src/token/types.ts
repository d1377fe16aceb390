import type { Failure } from "../errors/error.js";

export type ExtensionValue = string | number | boolean | ExtensionData;
export type ExtensionData = { [key: string]: ExtensionValue };

export type Claims = {
  readonly subjectId: string;
  readonly displayName: string;
  readonly issuer: string;
  /** Absolute expiry, seconds since epoch. */
  readonly expiresAt: number;
  readonly issuedAt?: number;
  readonly extensionData?: Readonly<ExtensionData>;
};

/** Claim names as they appear in the signed token. */
export type TokenPayload = {
  sub: string; // subjectId
  name: string; // displayName
  iss: string;
  exp: number;
  iat?: number;
  adx?: ExtensionData;
};

export type SignResult = { ok: true; token: string } | Failure;

/**
 * `valid` is false when the signature checked out but a time-based claim
 * (expiry, not-before) did not. `claims` is undefined when the payload is
 * authentic but lacks the identity claims.
 */
export type VerifyResult =
  | { ok: true; valid: boolean; claims: Claims | undefined }
  | Failure;

export type VerifyOptions = {
  currentDate?: Date;
  clockSkewSeconds?: number;
};

export interface ClaimSigner {
  sign(claims: Claims, secret: string): Promise<SignResult>;
  verify(
    token: string,
    secret: string,
    options?: VerifyOptions,
  ): Promise<VerifyResult>;
}
