import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Request, Response, NextFunction } from "express";
import {
    validateOrigin,
    addSecurityHeaders,
    createRateLimiter,
} from "../middleware/security";
import { ManualClock } from "../utils/clock";
import { ValidationError } from "../utils/errorHandler";

function headerLookup(headers: Record<string, string | undefined>) {
    return vi.fn((name: string) => headers[name]);
}

describe("Security Middleware", () => {
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    let mockNext: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        mockReq = {
            method: 'POST',
            path: '/api/quotes',
            get: headerLookup({}) as unknown as Request['get'],
        };
        mockRes = {
            setHeader: vi.fn(),
            status: vi.fn().mockReturnThis(),
            json: vi.fn(),
            set: vi.fn(),
        };
        mockNext = vi.fn();
    });

    const run = (handler: (req: Request, res: Response, next: NextFunction) => void) =>
        handler(mockReq as Request, mockRes as Response, mockNext as unknown as NextFunction);

    describe("validateOrigin", () => {
        it("should allow GET requests without validation", () => {
            mockReq.method = 'GET';

            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should allow requests without Origin header", () => {
            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should allow requests from the serving host", () => {
            mockReq.get = headerLookup({
                Origin: 'https://portal.example.com',
                Host: 'portal.example.com',
            }) as unknown as Request['get'];

            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith();
        });

        it("should reject requests from other origins", () => {
            mockReq.get = headerLookup({
                Origin: 'https://elsewhere.example.net',
                Host: 'portal.example.com',
            }) as unknown as Request['get'];
            const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith(expect.any(ValidationError));
            warnSpy.mockRestore();
        });

        it("should reject an unparsable origin", () => {
            mockReq.get = headerLookup({ Origin: 'not a url', Host: 'portal.example.com' }) as unknown as Request['get'];

            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith(expect.any(ValidationError));
        });

        it("should handle Referer header when Origin is not present", () => {
            mockReq.get = headerLookup({
                Referer: 'https://portal.example.com/quotes',
                Host: 'portal.example.com',
            }) as unknown as Request['get'];

            run(validateOrigin);

            expect(mockNext).toHaveBeenCalledWith();
        });
    });

    describe("addSecurityHeaders", () => {
        it("should add all required security headers", () => {
            run(addSecurityHeaders);

            expect(mockRes.setHeader).toHaveBeenCalledWith('X-Frame-Options', 'DENY');
            expect(mockRes.setHeader).toHaveBeenCalledWith('X-Content-Type-Options', 'nosniff');
            expect(mockRes.setHeader).toHaveBeenCalledWith('Content-Security-Policy', expect.stringContaining("default-src 'self'"));
            expect(mockNext).toHaveBeenCalled();
        });

        it("should never send a referrer", () => {
            run(addSecurityHeaders);

            expect(mockRes.setHeader).toHaveBeenCalledWith('Referrer-Policy', 'no-referrer');
        });

        it("should disable caching of API responses", () => {
            run(addSecurityHeaders);

            expect(mockRes.setHeader).toHaveBeenCalledWith('Cache-Control', 'no-store');
        });
    });

    describe("createRateLimiter", () => {
        let clock: ManualClock;
        let limiter: ReturnType<typeof createRateLimiter>;

        beforeEach(() => {
            clock = new ManualClock(1_000_000);
            limiter = createRateLimiter({ windowMs: 15 * 60 * 1000, maxAttempts: 10, clock });
            mockReq = { ...mockReq, ip: '127.0.0.1' };
            vi.spyOn(console, 'warn').mockImplementation(() => {});
        });

        it("should allow requests within limit", () => {
            for (let i = 0; i < 5; i++) {
                run(limiter);
            }

            expect(mockNext).toHaveBeenCalledTimes(5);
        });

        it("should block requests exceeding limit", () => {
            for (let i = 0; i < 11; i++) {
                run(limiter);
            }

            expect(mockNext).toHaveBeenCalledTimes(10);
            expect(mockRes.status).toHaveBeenCalledWith(429);
            expect(mockRes.set).toHaveBeenCalledWith('Retry-After', '900');
            expect(mockRes.json).toHaveBeenCalledWith({
                error: 'Too many authentication attempts',
                retryAfter: 900
            });
        });

        it("should reset counter after time window", () => {
            for (let i = 0; i < 10; i++) {
                run(limiter);
            }

            clock.advance(16 * 60 * 1000);
            run(limiter);

            expect(mockNext).toHaveBeenCalledTimes(11);
            expect(mockRes.status).not.toHaveBeenCalled();
        });

        it("should forget clients whose window has closed", () => {
            for (const ip of ['10.0.0.1', '10.0.0.2', '10.0.0.3']) {
                mockReq = { ...mockReq, ip };
                run(limiter);
            }
            expect(limiter.trackedClients()).toBe(3);

            clock.advance(16 * 60 * 1000);
            mockReq = { ...mockReq, ip: '10.0.0.4' };
            run(limiter);

            expect(limiter.trackedClients()).toBe(1);
        });

        it("should keep clients whose window is still open", () => {
            run(limiter);
            clock.advance(10 * 60 * 1000);
            mockReq = { ...mockReq, ip: '10.0.0.2' };
            run(limiter);

            clock.advance(6 * 60 * 1000);
            mockReq = { ...mockReq, ip: '10.0.0.3' };
            run(limiter);

            expect(limiter.trackedClients()).toBe(2);
        });

        it("should count clients separately", () => {
            for (let i = 0; i < 10; i++) {
                run(limiter);
            }
            mockReq = { ...mockReq, ip: '10.0.0.2' };

            run(limiter);

            expect(mockNext).toHaveBeenCalledTimes(11);
        });
    });
});
