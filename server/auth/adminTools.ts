import type { RelationalStore } from "../store/types";
import { NotFoundError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";

const log = createLogger("Admin");

/**
 * Out-of-band role change. Users can never set their own flag; open
 * sessions pick the new value up on their next validation.
 */
export async function setAdminFlag(store: RelationalStore, email: string, isAdmin: boolean): Promise<void> {
  const normalized = email.trim().toLowerCase();
  const updated = await store.update("users", { is_admin: isAdmin }, [
    { op: "eq", column: "email", value: normalized },
  ]);
  if (updated === 0) {
    throw new NotFoundError(`User ${normalized}`);
  }
  log.info(`Admin flag set to ${isAdmin}`, { email: normalized });
}
