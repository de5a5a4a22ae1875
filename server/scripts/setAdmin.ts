/**
 * Grant or revoke the admin flag for one account.
 *
 * Usage:
 *   npx tsx server/scripts/setAdmin.ts <email> [--revoke]
 *
 * Requires DATABASE_URL. Takes effect on each open session's next request.
 */

import { loadEnv } from "../config/env";
import { setAdminFlag } from "../auth/adminTools";
import { DbStore } from "../store/dbStore";

async function main() {
  const args = process.argv.slice(2);
  const email = args.find((arg) => !arg.startsWith("--"));
  const revoke = args.includes("--revoke");

  if (!email) {
    console.error("Usage: setAdmin.ts <email> [--revoke]");
    process.exitCode = 1;
    return;
  }

  const env = loadEnv(process.env);
  if (!env.DATABASE_URL) {
    console.error("DATABASE_URL is not set");
    process.exitCode = 1;
    return;
  }

  await setAdminFlag(new DbStore(env.DATABASE_URL), email, !revoke);
  console.log(`${revoke ? "Revoked" : "Granted"} admin for ${email}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
