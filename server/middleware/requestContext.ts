import type { Request, Response, NextFunction } from "express";
import type { SessionView } from "../auth/sessionStore";
import { createLogger, generateCorrelationId } from "../utils/logger";

const log = createLogger("Request");

/**
 * Per-request state. Created when a request arrives and discarded when its
 * response closes; nothing about the UI lives in module-level globals.
 */
export interface RequestContext {
  correlationId: string;
  startedAt: number;
  /** Filled in by requireSession. */
  session: SessionView | null;
  /** Aborts when the client goes away before the response is written. */
  signal: AbortSignal;
}

export function createRequestContext(): { context: RequestContext; abort: () => void } {
  const controller = new AbortController();
  return {
    context: {
      correlationId: generateCorrelationId(),
      startedAt: Date.now(),
      session: null,
      signal: controller.signal,
    },
    abort: () => controller.abort(),
  };
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const { context, abort } = createRequestContext();
  req.context = context;

  res.on("close", () => {
    if (!res.writableFinished) {
      abort();
      log.info(`${req.method} ${req.path} abandoned by client`, { correlationId: context.correlationId });
    } else if (req.path.startsWith("/api")) {
      log.info(`${req.method} ${req.path} ${res.statusCode}`, {
        correlationId: context.correlationId,
        duration: Date.now() - context.startedAt,
      });
    }
    req.context = undefined;
  });

  next();
}

/** The context installed by `requestContext`, or a fresh one for requests that bypassed it. */
export function getContext(req: Request): RequestContext {
  if (!req.context) {
    req.context = createRequestContext().context;
  }
  return req.context;
}
