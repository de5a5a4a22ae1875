import type { Request, Response, NextFunction, RequestHandler } from "express";
import { AUTH_CONSTANTS } from "../config/constants";
import type { AuthGate } from "../auth/authGate";
import type { SessionStore, SessionView } from "../auth/sessionStore";
import { AuthorizationError, SessionError, handleRouteError } from "../utils/errorHandler";
import { getContext } from "./requestContext";

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Reads the session token from the Authorization header, falling back to
 * the `_session` query parameter the dashboard keeps in its URL.
 */
export function extractSessionToken(req: Request): string | null {
  const header = req.get("Authorization");
  if (header && BEARER_PREFIX.test(header)) {
    const token = header.replace(BEARER_PREFIX, "").trim();
    if (token) return token;
  }
  const fromQuery = req.query[AUTH_CONSTANTS.SESSION_QUERY_PARAM];
  return typeof fromQuery === "string" && fromQuery.length > 0 ? fromQuery : null;
}

export function requireSession(sessions: SessionStore): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = extractSessionToken(req);
      if (!token) {
        throw new SessionError("NotFound");
      }
      getContext(req).session = await sessions.resolve(token);
      next();
    } catch (error) {
      handleRouteError(res, error, "Auth");
    }
  };
}

export function requireAdmin(gate: AuthGate): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!gate.checkAdmin(getContext(req).session)) {
      handleRouteError(res, new AuthorizationError("Admin access required"));
      return;
    }
    next();
  };
}

/** The validated session; only valid behind requireSession. */
export function sessionOf(req: Request): SessionView {
  const session = getContext(req).session;
  if (!session) {
    throw new SessionError("NotFound");
  }
  return session;
}
