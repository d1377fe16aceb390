import type {
  Claims,
  ExtensionData,
  ExtensionValue,
  TokenPayload,
} from "./types.js";

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.length > 0;
}

// Assigning this key on a plain object sets its prototype instead.
const RESERVED_KEY = "__proto__";

function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (!x || typeof x !== "object" || Array.isArray(x)) return false;
  const proto = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

function canonicalValue(
  value: unknown,
  ancestors: Set<object>,
): ExtensionValue | undefined {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (isPlainObject(value)) return canonicalMapping(value, ancestors);
  return undefined;
}

function canonicalMapping(
  data: unknown,
  ancestors: Set<object>,
): ExtensionData | undefined {
  if (!isPlainObject(data)) return undefined;
  if (ancestors.has(data)) return undefined; // cycle

  ancestors.add(data);
  const out: ExtensionData = {};
  for (const key of Object.keys(data).sort()) {
    if (key === RESERVED_KEY) return undefined;
    const v = canonicalValue(data[key], ancestors);
    if (v === undefined) return undefined;
    out[key] = v;
  }
  ancestors.delete(data);
  return out;
}

/**
 * Returns a copy of `data` with keys sorted at every level, or undefined if
 * any value falls outside string | finite number | boolean | nested mapping.
 * Cyclic data and a `__proto__` key are rejected as well.
 */
export function canonicalExtensionData(
  data: unknown,
): ExtensionData | undefined {
  return canonicalMapping(data, new Set());
}

export function toPayload(
  claims: Claims,
  extensionData?: ExtensionData,
): TokenPayload {
  const payload: TokenPayload = {
    sub: claims.subjectId,
    name: claims.displayName,
    iss: claims.issuer,
    exp: claims.expiresAt,
  };
  if (typeof claims.issuedAt === "number") payload.iat = claims.issuedAt;
  if (extensionData && Object.keys(extensionData).length > 0) {
    payload.adx = extensionData;
  }
  return payload;
}

/**
 * Reads identity claims out of a verified payload. Undefined when any of
 * sub/name/iss/exp is absent or mistyped; a malformed `adx` is dropped.
 */
export function fromPayload(payload: unknown): Claims | undefined {
  if (!isPlainObject(payload)) return undefined;

  const { sub, name, iss, exp, iat, adx } = payload;
  if (!isNonEmptyString(sub)) return undefined;
  if (typeof name !== "string") return undefined;
  if (typeof iss !== "string") return undefined;
  if (typeof exp !== "number" || !Number.isFinite(exp)) return undefined;

  const extensionData =
    adx === undefined ? undefined : canonicalExtensionData(adx);

  return Object.freeze({
    subjectId: sub,
    displayName: name,
    issuer: iss,
    expiresAt: exp,
    ...(typeof iat === "number" ? { issuedAt: iat } : {}),
    ...(extensionData ? { extensionData: Object.freeze(extensionData) } : {}),
  });
}
