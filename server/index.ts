import { AUTH_CONSTANTS } from "./config/constants";
import { loadEnv } from "./config/env";
import { createApp } from "./app";
import { createServices } from "./container";
import { DbStore } from "./store/dbStore";
import { MemStore } from "./store/memStore";
import type { RelationalStore } from "./store/types";
import { getErrorMessage } from "./utils/errorHandler";
import { createLogger } from "./utils/logger";

const log = createLogger("Server");

async function main() {
  const env = loadEnv(process.env);

  let store: RelationalStore;
  if (env.DATABASE_URL) {
    store = new DbStore(env.DATABASE_URL);
  } else {
    log.warn("DATABASE_URL not set, using the in-memory store (data is lost on restart)");
    store = new MemStore();
  }

  const services = createServices({ store, allowedDomains: env.ALLOWED_EMAIL_DOMAINS });
  const { server } = await createApp(services);

  const sweep = setInterval(() => {
    services.sessions.sweepExpired().catch((error: unknown) => {
      log.warn("Scheduled session sweep failed", { error: getErrorMessage(error) });
    });
  }, AUTH_CONSTANTS.SESSION_SWEEP_INTERVAL_MS);
  sweep.unref();

  server.listen(env.PORT, () => {
    log.info(`Serving on port ${env.PORT} (${env.NODE_ENV})`);
  });
}

main().catch((error: unknown) => {
  log.error("Failed to start", { error: getErrorMessage(error) });
  process.exitCode = 1;
});
