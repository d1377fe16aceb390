import type { Failure } from "./errors/error.js";
import type { KeyDerivationVersion } from "./crypto/keyDerivation.js";
import type { Logger } from "./logger.js";
import type { ClaimSigner, Claims, ExtensionData } from "./token/types.js";

export type TokenServiceConfig = {
  /** Envelope key material. Changing it invalidates every issued token. */
  secret: string;
  /** Must stay stable for the service's lifetime, same as `secret`. */
  salt: string;
  issuer: string;
  timeoutMinutes: number;

  keyDerivation?: KeyDerivationVersion;
  clockSkewSeconds?: number;
};

export type Clock = () => Date;

export type TokenServiceDeps = {
  signer?: ClaimSigner;
  clock?: Clock;
  logger?: Logger;
};

export type IssueTokenResult =
  | {
      ok: true;
      token: string;
      expiresAt: string;
    }
  | Failure;

export type RedeemTokenResult =
  | {
      ok: true;
      subjectId: string;
      displayName: string;
    }
  | Failure;

export type ParseTokenResult = { ok: true; claims: Claims } | Failure;

export type EncryptTokenResult = { ok: true; envelope: string } | Failure;

export type DecryptTokenResult = { ok: true; signedToken: string } | Failure;

export type VerifiedToken = {
  valid: boolean;
  claims: Claims | undefined;
};

export type UserIdentity = {
  subjectId: string;
  displayName: string;
};

export interface TokenService {
  issueToken(
    callerSecret: string,
    subjectId: string,
    displayName: string,
    extensionData?: ExtensionData,
  ): Promise<IssueTokenResult>;
  redeemToken(token: string, callerSecret: string): Promise<RedeemTokenResult>;
  parseToken(token: string, callerSecret: string): Promise<ParseTokenResult>;
  encryptToken(signedToken: string): EncryptTokenResult;
  decryptToken(envelope: string): DecryptTokenResult;
  validateClaims(verified: VerifiedToken): ParseTokenResult;
  getUserFromClaims(claims: Claims): UserIdentity;
}
