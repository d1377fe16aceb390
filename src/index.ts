export { createTokenService } from "./framework.js";
export { loadTokenServiceConfig } from "./config.js";

export * from "./types.js";
export * from "./errors/codes.js";
export * from "./errors/error.js";
export * from "./logger.js";

export * from "./crypto/keyDerivation.js";
export * from "./crypto/envelopeCipher.js";

export * from "./token/types.js";
export * from "./token/jwtClaimSigner.js";
