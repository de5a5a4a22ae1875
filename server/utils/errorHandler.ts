import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { createLogger } from "./logger";

const log = createLogger("Errors");

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthorizationError extends Error implements AppError {
  statusCode = 403;
  isOperational = true;
  constructor(message = "Access denied") {
    super(message);
    this.name = "AuthorizationError";
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  constructor(message = "Rate limit exceeded") {
    super(message);
    this.name = "RateLimitError";
  }
}

export type AuthErrorKind = "InvalidCredentials" | "DuplicateAccount" | "DomainRestricted";

const AUTH_ERRORS: Record<AuthErrorKind, { statusCode: number; message: string }> = {
  // Same message whether the email or the password was wrong
  InvalidCredentials: { statusCode: 401, message: "Invalid email or password." },
  DuplicateAccount: { statusCode: 409, message: "Account already exists. Sign in instead." },
  DomainRestricted: {
    statusCode: 403,
    message: "Registration is restricted to approved company email domains.",
  },
};

export class AuthError extends Error implements AppError {
  statusCode: number;
  isOperational = true;
  readonly code: AuthErrorKind;
  constructor(kind: AuthErrorKind) {
    super(AUTH_ERRORS[kind].message);
    this.name = "AuthError";
    this.code = kind;
    this.statusCode = AUTH_ERRORS[kind].statusCode;
  }
}

export type SessionErrorKind = "Expired" | "NotFound";

export class SessionError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  readonly code: SessionErrorKind;
  constructor(kind: SessionErrorKind) {
    super("Your session has expired. Please sign in again.");
    this.name = "SessionError";
    this.code = kind;
  }
}

export type QueryErrorKind = "BackendUnavailable" | "Timeout" | "BadFilter";

const QUERY_ERRORS: Record<QueryErrorKind, { statusCode: number; message: string }> = {
  BackendUnavailable: {
    statusCode: 503,
    message: "The data service is temporarily unavailable. Please try again.",
  },
  Timeout: { statusCode: 504, message: "The data service took too long to respond." },
  BadFilter: { statusCode: 400, message: "Invalid filter" },
};

export class QueryError extends Error implements AppError {
  statusCode: number;
  isOperational = true;
  readonly code: QueryErrorKind;
  constructor(kind: QueryErrorKind, detail?: string, options?: ErrorOptions) {
    super(detail ? `${QUERY_ERRORS[kind].message}: ${detail}` : QUERY_ERRORS[kind].message, options);
    this.name = "QueryError";
    this.code = kind;
    this.statusCode = QUERY_ERRORS[kind].statusCode;
  }

  get retryable(): boolean {
    return this.code === "BackendUnavailable" || this.code === "Timeout";
  }
}

export type FilterErrorKind = "OutOfRange" | "EmptyMembership";

export class FilterError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  readonly code: FilterErrorKind;
  readonly field: string;
  constructor(kind: FilterErrorKind, field: string, message: string) {
    super(message);
    this.name = "FilterError";
    this.code = kind;
    this.field = field;
  }
}

/**
 * Raised inside the result cache. Callers of the query layer never see it:
 * the executor falls back to a live fetch.
 */
export class CacheError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  readonly key: string;
  constructor(key: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CacheError";
    this.key = key;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(res: Response, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  // Internals of unexpected failures stay in the logs
  const message = statusCode >= 500 && !isOperational(error)
    ? "An unexpected error occurred"
    : getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  log.error(`[${context}] ${message}`, stack ? { stack } : undefined);
}

function isOperational(error: unknown): boolean {
  return error instanceof Error && "isOperational" in error && error.isOperational === true;
}
