import { z } from "zod";
import { loginSchema, registerSchema } from "@shared/schema";
import { toQueryError } from "../query/cachedQueryExecutor";
import { STORE_ERROR_CODES, StoreError, type RelationalStore, type Row } from "../store/types";
import {
  AuthError,
  ValidationError,
  getErrorMessage,
} from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import type { SessionStore, SessionView } from "./sessionStore";

const log = createLogger("Auth");

export interface AuthUser {
  id: string;
  email: string;
  displayName: string;
  isAdmin: boolean;
}

export interface LoginResult {
  user: AuthUser;
  token: string;
  expiresAt: Date;
}

export interface AuthGateOptions {
  /** Lower-case email domains allowed to register. */
  allowedDomains: readonly string[];
}

const userRowSchema = z.object({
  user_id: z.string(),
  user_email: z.string(),
  user_display_name: z.string(),
  user_is_admin: z.boolean().nullish().transform((value) => value === true),
});

export function isAllowedDomain(email: string, allowedDomains: readonly string[]): boolean {
  const at = email.lastIndexOf("@");
  if (at < 0) return false;
  const domain = email.slice(at + 1).trim().toLowerCase();
  return allowedDomains.some((allowed) => allowed.toLowerCase() === domain);
}

/**
 * Credential checks and account registration. Passwords are verified and
 * hashed inside the store; this layer never sees a hash.
 */
export class AuthGate {
  constructor(
    private store: RelationalStore,
    private sessions: SessionStore,
    private options: AuthGateOptions,
  ) {}

  async authenticate(email: string, password: string): Promise<AuthUser> {
    const credentials = parse(loginSchema, { email, password });
    const rows = await this.callStore("authenticate_user", {
      p_email: credentials.email.toLowerCase(),
      p_password: credentials.password,
    });
    if (rows.length === 0) {
      log.info("Failed sign-in attempt");
      throw new AuthError("InvalidCredentials");
    }
    return toAuthUser(rows[0]);
  }

  /** Creates the account only; the caller decides whether to sign in next. */
  async register(email: string, password: string, displayName: string): Promise<AuthUser> {
    const input = parse(registerSchema, { email, password, displayName });
    if (!isAllowedDomain(input.email, this.options.allowedDomains)) {
      throw new AuthError("DomainRestricted");
    }

    let rows: Row[];
    try {
      rows = await this.store.callProcedure("register_user", {
        p_email: input.email,
        p_password: input.password,
        p_display_name: input.displayName,
      });
    } catch (error) {
      if (error instanceof StoreError && error.code === STORE_ERROR_CODES.UNIQUE_VIOLATION) {
        throw new AuthError("DuplicateAccount");
      }
      throw toQueryError(error);
    }
    if (rows.length === 0) {
      throw new AuthError("DuplicateAccount");
    }

    const user = toAuthUser(rows[0]);
    log.info("Account registered", { userId: user.id });
    return user;
  }

  async login(email: string, password: string): Promise<LoginResult> {
    const user = await this.authenticate(email, password);
    const issued = await this.sessions.issue(user.id, user.displayName);
    return { user, token: issued.token, expiresAt: issued.expiresAt };
  }

  async logout(token: string): Promise<void> {
    await this.sessions.delete(token);
  }

  /**
   * Admin gate. Reads the flag captured when the session was validated, so
   * it never makes its own round trip.
   */
  checkAdmin(session: SessionView | null | undefined): boolean {
    return session?.isAdmin === true;
  }

  private async callStore(procedure: string, params: Record<string, unknown>): Promise<Row[]> {
    try {
      return await this.store.callProcedure(procedure, params);
    } catch (error) {
      throw toQueryError(error);
    }
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(getErrorMessage(result.error));
  }
  return result.data;
}

function toAuthUser(row: Row | undefined): AuthUser {
  const parsed = userRowSchema.parse(row);
  return {
    id: parsed.user_id,
    email: parsed.user_email,
    displayName: parsed.user_display_name,
    isAdmin: parsed.user_is_admin,
  };
}
