import { createTokenService } from "../../src/framework.js";
import { loadTokenServiceConfig } from "../../src/config.js";

// -----------------------------
// Service config
// Env vars win; the fallbacks are for local runs only.
// -----------------------------
const config = loadTokenServiceConfig({
  AUTH_SECRET: "dev-secret-change-me",
  AUTH_SALT: "dev-salt",
  AUTH_ISSUER: "session-service",
  AUTH_TIMEOUT_MINUTES: "15",
  ...process.env,
});

const tokens = createTokenService(config);

// Per-tenant signing secrets; only the holder of the same secret can redeem.
const TENANT_SECRETS = {
  acme: "acme-signing-secret",
  globex: "globex-signing-secret",
} as const;

async function main() {
  const issued = await tokens.issueToken(
    TENANT_SECRETS.acme,
    "u-1",
    "Alice",
    { tenantId: "acme", flags: { beta: true } },
  );

  if (!issued.ok) {
    console.error("Issue failed:", issued.error);
    process.exit(1);
  }

  console.log("Token issued");
  console.log("expiresAt:", issued.expiresAt);

  const redeemed = await tokens.redeemToken(issued.token, TENANT_SECRETS.acme);
  if (redeemed.ok) {
    console.log("subjectId:", redeemed.subjectId);
    console.log("displayName:", redeemed.displayName);
  } else {
    console.error("Redeem failed:", redeemed.error.code);
  }

  const crossTenant = await tokens.redeemToken(
    issued.token,
    TENANT_SECRETS.globex,
  );
  if (!crossTenant.ok) {
    console.log("Cross-tenant redeem rejected:", crossTenant.error.code);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
