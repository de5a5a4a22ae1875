import { randomBytes } from "crypto";
import { z } from "zod";
import { AUTH_CONSTANTS } from "../config/constants";
import { toQueryError } from "../query/cachedQueryExecutor";
import type { RelationalStore, Row } from "../store/types";
import { systemClock, type Clock } from "../utils/clock";
import { SessionError, getErrorMessage } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";

const log = createLogger("Sessions");

const TOKEN_PATTERN = new RegExp(`^[A-Za-z0-9_-]{${AUTH_CONSTANTS.SESSION_TOKEN_LENGTH}}$`);

/** What a validated session tells the rest of the request. */
export interface SessionView {
  token: string;
  userId: string;
  email: string;
  /** Snapshot taken at login; later profile edits show up after re-login. */
  displayName: string;
  /** Read from the user row on each validation. */
  isAdmin: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export interface IssuedSession {
  token: string;
  createdAt: Date;
  expiresAt: Date;
}

const timestampSchema = z.coerce.date();

const sessionRowSchema = z.object({
  token: z.string(),
  user_id: z.string(),
  user_email: z.string(),
  user_display_name: z.string(),
  user_is_admin: z.boolean().nullish().transform((value) => value === true),
  created_at: timestampSchema,
  expires_at: timestampSchema,
});

const deletedSchema = z.array(z.object({ deleted: z.coerce.number() }));

type Lookup =
  | { status: "valid"; session: SessionView }
  | { status: "expired" }
  | { status: "missing" };

export function generateSessionToken(): string {
  return randomBytes(AUTH_CONSTANTS.SESSION_TOKEN_BYTES).toString("base64url");
}

export function isWellFormedToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

/**
 * Issues, validates and revokes opaque session tokens. Every operation is a
 * single atomic procedure call, so a validate racing a delete of the same
 * token simply finds nothing.
 */
export class SessionStore {
  private lastSweepAt = Number.NEGATIVE_INFINITY;

  constructor(
    private store: RelationalStore,
    private clock: Clock = systemClock,
    private ttlMs: number = AUTH_CONSTANTS.SESSION_TTL_MS,
  ) {}

  async create(userId: string, displayName: string): Promise<string> {
    const issued = await this.issue(userId, displayName);
    return issued.token;
  }

  async issue(userId: string, displayName: string): Promise<IssuedSession> {
    await this.sweepIfDue();

    const token = generateSessionToken();
    const createdAt = new Date(this.clock.now());
    const expiresAt = new Date(createdAt.getTime() + this.ttlMs);
    await this.callStore("create_session", {
      p_token: token,
      p_user_id: userId,
      p_user_name: displayName,
      p_created_at: createdAt.toISOString(),
      p_expires_at: expiresAt.toISOString(),
    });

    log.info("Session created", { userId, token, expiresAt: expiresAt.toISOString() });
    return { token, createdAt, expiresAt };
  }

  /** Null for unknown, malformed or expired tokens. */
  async validate(token: string): Promise<SessionView | null> {
    const lookup = await this.lookup(token);
    return lookup.status === "valid" ? lookup.session : null;
  }

  /** Like validate, but says why a token was refused. */
  async resolve(token: string): Promise<SessionView> {
    const lookup = await this.lookup(token);
    if (lookup.status === "expired") throw new SessionError("Expired");
    if (lookup.status === "missing") throw new SessionError("NotFound");
    return lookup.session;
  }

  async delete(token: string): Promise<void> {
    if (!isWellFormedToken(token)) return;
    const rows = await this.callStore("delete_session", { p_token: token });
    log.debug("Session deleted", { token, deleted: countDeleted(rows) });
  }

  /** Physically removes every expired row. Returns how many went. */
  async sweepExpired(): Promise<number> {
    this.lastSweepAt = this.clock.now();
    const rows = await this.callStore("purge_expired_sessions", {
      p_now: new Date(this.lastSweepAt).toISOString(),
    });
    const deleted = countDeleted(rows);
    if (deleted > 0) {
      log.info(`Swept ${deleted} expired sessions`);
    }
    return deleted;
  }

  private async sweepIfDue(): Promise<void> {
    if (this.clock.now() - this.lastSweepAt < AUTH_CONSTANTS.SESSION_SWEEP_INTERVAL_MS) return;
    try {
      await this.sweepExpired();
    } catch (error) {
      // Sweeping is housekeeping; issuing the session still goes ahead
      log.warn("Expired session sweep failed", { error: getErrorMessage(error) });
    }
  }

  private async lookup(token: string): Promise<Lookup> {
    if (!isWellFormedToken(token)) return { status: "missing" };

    const rows = await this.callStore("validate_session", { p_token: token });
    if (rows.length === 0) return { status: "missing" };

    const row = sessionRowSchema.parse(rows[0]);
    if (row.expires_at.getTime() <= this.clock.now()) {
      try {
        await this.callStore("delete_session", { p_token: token });
        log.info("Expired session removed on validation", { token, userId: row.user_id });
      } catch (error) {
        // The row stays until the next sweep; the token is refused either way
        log.warn("Expired session delete failed", { token, error: getErrorMessage(error) });
      }
      return { status: "expired" };
    }

    return {
      status: "valid",
      session: {
        token: row.token,
        userId: row.user_id,
        email: row.user_email,
        displayName: row.user_display_name,
        isAdmin: row.user_is_admin,
        createdAt: row.created_at,
        expiresAt: row.expires_at,
      },
    };
  }

  private async callStore(procedure: string, params: Record<string, unknown>): Promise<Row[]> {
    try {
      return await this.store.callProcedure(procedure, params);
    } catch (error) {
      throw toQueryError(error);
    }
  }
}

function countDeleted(rows: Row[]): number {
  return deletedSchema.parse(rows).reduce((sum, row) => sum + row.deleted, 0);
}
