/**
 * Security Middleware
 *
 * Security headers, origin checks for state-changing requests, and rate
 * limiting for the sign-in endpoints.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ValidationError } from '../utils/errorHandler';
import { RATE_LIMIT_CONSTANTS } from '../config/constants';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';

const log = createLogger('Security');

/**
 * Origin validation middleware.
 * State-changing requests carrying an Origin or Referer must come from the
 * host serving the API.
 */
export function validateOrigin(req: Request, res: Response, next: NextFunction) {
    // Skip validation for GET requests (they don't change state)
    if (req.method === 'GET' || req.method === 'HEAD' || req.method === 'OPTIONS') {
        return next();
    }

    const origin = req.get('Origin') || req.get('Referer');
    const host = req.get('Host');

    if (!origin) {
        // Same-origin requests from some browsers carry neither header
        return next();
    }

    let originHost: string;
    try {
        originHost = new URL(origin).host;
    } catch {
        return next(new ValidationError('Invalid request origin'));
    }

    if (originHost !== host) {
        log.warn(`Invalid origin: ${origin} for host: ${host}`);
        return next(new ValidationError('Invalid request origin'));
    }

    next();
}

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Session tokens can ride in page URLs; never hand them to another site
    res.setHeader('Referrer-Policy', 'no-referrer');

    // Content Security Policy (basic)
    const csp = [
        "default-src 'self'",
        "script-src 'self'",
        "style-src 'self' 'unsafe-inline'",
        "img-src 'self' data:",
        "connect-src 'self'",
    ].join('; ');

    res.setHeader('Content-Security-Policy', csp);

    if (req.path.startsWith('/api/')) {
        res.setHeader('Cache-Control', 'no-store');
    }

    next();
}

export interface RateLimitOptions {
    windowMs: number;
    maxAttempts: number;
    clock?: Clock;
}

export type RateLimiter = RequestHandler & {
    /** Clients with a window still being tracked. */
    trackedClients(): number;
};

/**
 * Fixed-window rate limiter keyed by client IP. Windows that have closed are
 * dropped at most once per window length.
 */
export function createRateLimiter(options: RateLimitOptions): RateLimiter {
    const attempts = new Map<string, { count: number; resetTime: number }>();
    const clock = options.clock ?? systemClock;
    let lastPrune = clock.now();

    const prune = (now: number) => {
        if (now - lastPrune < options.windowMs) return;
        lastPrune = now;
        for (const [clientId, data] of attempts) {
            if (now > data.resetTime) {
                attempts.delete(clientId);
            }
        }
    };

    const handler: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
        const clientId = req.ip || 'unknown';
        const now = clock.now();
        prune(now);

        const clientData = attempts.get(clientId);

        if (!clientData || now > clientData.resetTime) {
            attempts.set(clientId, { count: 1, resetTime: now + options.windowMs });
            return next();
        }

        if (clientData.count >= options.maxAttempts) {
            const retryAfter = Math.ceil((clientData.resetTime - now) / 1000);
            log.warn(`Rate limit hit for ${clientId}`);
            res.set('Retry-After', retryAfter.toString());
            res.status(429).json({
                error: 'Too many authentication attempts',
                retryAfter
            });
            return;
        }

        clientData.count++;
        next();
    };

    return Object.assign(handler, { trackedClients: () => attempts.size });
}

/**
 * Rate limiting for authentication endpoints.
 * Prevents brute force attacks on login.
 */
export const authRateLimit = createRateLimiter({
    windowMs: RATE_LIMIT_CONSTANTS.AUTH_WINDOW_MS,
    maxAttempts: RATE_LIMIT_CONSTANTS.AUTH_MAX_ATTEMPTS,
});
