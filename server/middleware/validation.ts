/**
 * Validation Middleware
 *
 * Zod-based request validation for body, params, and query.
 * Integrates with existing error handling via ValidationError.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodSchema, ZodError } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.patch("/api/testimonials/:id/status",
 *   requireSession(sessions),
 *   validate({ params: commonSchemas.id, body: updateTestimonialStatusSchema }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

// Common parameter schemas
export const commonSchemas = {
  id: z.object({
    id: z.string().trim().min(1, "ID is required"),
  }),
};
