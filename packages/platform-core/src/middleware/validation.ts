import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { sendErrorResponse } from '../error-handling/errors';

function sendZodError(res: Response, error: z.ZodError, message: string): void {
  sendErrorResponse(res, 400, message, {
    code: 'VALIDATION_ERROR',
    details: {
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

/**
 * Replaces `req.body` with the parsed value, or answers 400 with the zod issues.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      sendZodError(res, result.error, 'Request body validation failed');
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Parses `req.query` into `res.locals.query`; express keeps `req.query` as the raw strings.
 */
export function validateQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      sendZodError(res, result.error, 'Query parameters validation failed');
      return;
    }
    res.locals.query = result.data;
    next();
  };
}
