import type {
  Clock,
  DecryptTokenResult,
  EncryptTokenResult,
  IssueTokenResult,
  ParseTokenResult,
  RedeemTokenResult,
  TokenService,
  TokenServiceConfig,
  TokenServiceDeps,
  UserIdentity,
  VerifiedToken,
} from "./types.js";
import { fail } from "./errors/error.js";
import type { Failure } from "./errors/error.js";
import {
  DEFAULT_KEY_DERIVATION_VERSION,
  deriveKey,
  isKeyDerivationVersion,
} from "./crypto/keyDerivation.js";
import { decrypt, encrypt } from "./crypto/envelopeCipher.js";
import { JwtClaimSigner } from "./token/jwtClaimSigner.js";
import type { Claims, ExtensionData } from "./token/types.js";
import { consoleLogger } from "./logger.js";

const systemClock: Clock = () => new Date();

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.trim().length > 0;
}

// Secrets and subject ids are taken byte for byte; only emptiness is refused.
function isNonEmpty(x: unknown): x is string {
  return typeof x === "string" && x.length > 0;
}

function toEpochSeconds(d: Date) {
  return Math.floor(d.getTime() / 1000);
}

function assertConfig(config: TokenServiceConfig) {
  if (!isNonEmptyString(config?.secret)) {
    throw new Error("TokenServiceConfig.secret is required");
  }
  if (!isNonEmptyString(config.salt)) {
    throw new Error("TokenServiceConfig.salt is required");
  }
  if (!isNonEmptyString(config.issuer)) {
    throw new Error("TokenServiceConfig.issuer is required");
  }
  if (!Number.isFinite(config.timeoutMinutes) || config.timeoutMinutes < 0) {
    throw new Error("TokenServiceConfig.timeoutMinutes must be >= 0");
  }
  if (
    config.keyDerivation !== undefined &&
    !isKeyDerivationVersion(config.keyDerivation)
  ) {
    throw new Error("TokenServiceConfig.keyDerivation must be v1 or v2");
  }
  if (
    config.clockSkewSeconds !== undefined &&
    (!Number.isFinite(config.clockSkewSeconds) || config.clockSkewSeconds < 0)
  ) {
    throw new Error("TokenServiceConfig.clockSkewSeconds must be >= 0");
  }
}

/**
 * Builds the token service.
 *
 * Signing uses the secret passed per call; the envelope key is always
 * derived from the service's own secret and salt. Config is copied and
 * frozen here, and nothing else is held between calls.
 *
 * Without `deps.logger`, each rejected token writes one `console.debug`
 * line (operation and error code only). Pass `silentLogger` to turn that off.
 */
export function createTokenService(
  config: TokenServiceConfig,
  deps: TokenServiceDeps = {},
): TokenService {
  assertConfig(config);

  const cfg = Object.freeze({
    secret: config.secret,
    salt: config.salt,
    issuer: config.issuer,
    timeoutSeconds: Math.floor(config.timeoutMinutes * 60),
    keyDerivation: config.keyDerivation ?? DEFAULT_KEY_DERIVATION_VERSION,
    clockSkewSeconds: config.clockSkewSeconds ?? 0,
  });

  const signer = deps.signer ?? new JwtClaimSigner();
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? consoleLogger;

  function rejected(op: string, result: Failure): Failure {
    logger.debug("token operation rejected", { op, code: result.error.code });
    return result;
  }

  function internalError(op: string, e: unknown): Failure {
    const name = e instanceof Error ? e.name : typeof e;
    logger.warn("token operation failed unexpectedly", { op, error: name });
    return fail("AUTH_INTERNAL_ERROR");
  }

  // Fresh per call and zeroed afterwards; see DESIGN.md on caching.
  function withEnvelopeKey<T>(fn: (key: Uint8Array) => T): T {
    const key = deriveKey(cfg.secret, cfg.salt, cfg.keyDerivation);
    try {
      return fn(key);
    } finally {
      key.fill(0);
    }
  }

  function encryptToken(signedToken: string): EncryptTokenResult {
    try {
      const envelope = withEnvelopeKey((key) =>
        encrypt(Buffer.from(signedToken, "utf8"), key),
      );
      return { ok: true, envelope };
    } catch (e) {
      return internalError("encryptToken", e);
    }
  }

  function decryptToken(envelope: string): DecryptTokenResult {
    try {
      const opened = withEnvelopeKey((key) => decrypt(envelope, key));
      if (!opened.ok) return rejected("decryptToken", opened);
      return {
        ok: true,
        signedToken: Buffer.from(opened.plaintext).toString("utf8"),
      };
    } catch (e) {
      return internalError("decryptToken", e);
    }
  }

  /**
   * Checks run in a fixed order: claims present, signature-validity flag
   * (covers expiry), issuer.
   */
  function validateClaims(verified: VerifiedToken): ParseTokenResult {
    const { claims } = verified;
    if (!claims) return fail("AUTH_TOKEN_MISSING_CLAIMS");
    if (!verified.valid) return fail("AUTH_TOKEN_INVALID");
    if (claims.issuer !== cfg.issuer) return fail("AUTH_INVALID_ISSUER");
    return { ok: true, claims };
  }

  function getUserFromClaims(claims: Claims): UserIdentity {
    return { subjectId: claims.subjectId, displayName: claims.displayName };
  }

  async function issueToken(
    callerSecret: string,
    subjectId: string,
    displayName: string,
    extensionData?: ExtensionData,
  ): Promise<IssueTokenResult> {
    try {
      if (!isNonEmpty(callerSecret)) {
        return rejected("issueToken", fail("AUTH_CONFIG_ERROR"));
      }
      if (!isNonEmpty(subjectId) || typeof displayName !== "string") {
        return rejected("issueToken", fail("AUTH_TOKEN_MISSING_CLAIMS"));
      }

      const issuedAt = toEpochSeconds(clock());
      const expiresAt = issuedAt + cfg.timeoutSeconds;

      const claims: Claims = Object.freeze({
        subjectId,
        displayName,
        issuer: cfg.issuer,
        expiresAt,
        issuedAt,
        ...(extensionData !== undefined ? { extensionData } : {}),
      });

      const signed = await signer.sign(claims, callerSecret);
      if (!signed.ok) return rejected("issueToken", signed);

      const sealed = encryptToken(signed.token);
      if (!sealed.ok) return sealed;

      return {
        ok: true,
        token: sealed.envelope,
        expiresAt: new Date(expiresAt * 1000).toISOString(),
      };
    } catch (e) {
      return internalError("issueToken", e);
    }
  }

  async function parseToken(
    token: string,
    callerSecret: string,
  ): Promise<ParseTokenResult> {
    try {
      if (!isNonEmpty(callerSecret)) {
        return rejected("parseToken", fail("AUTH_CONFIG_ERROR"));
      }

      const opened = decryptToken(token);
      if (!opened.ok) return opened;

      const verified = await signer.verify(opened.signedToken, callerSecret, {
        currentDate: clock(),
        clockSkewSeconds: cfg.clockSkewSeconds,
      });
      if (!verified.ok) return rejected("parseToken", verified);

      const checked = validateClaims(verified);
      if (!checked.ok) return rejected("parseToken", checked);

      return checked;
    } catch (e) {
      return internalError("parseToken", e);
    }
  }

  async function redeemToken(
    token: string,
    callerSecret: string,
  ): Promise<RedeemTokenResult> {
    const parsed = await parseToken(token, callerSecret);
    if (!parsed.ok) return parsed;
    return { ok: true, ...getUserFromClaims(parsed.claims) };
  }

  return Object.freeze({
    issueToken,
    redeemToken,
    parseToken,
    encryptToken,
    decryptToken,
    validateClaims,
    getUserFromClaims,
  });
}
