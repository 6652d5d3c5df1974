/**
 * Response helpers
 *
 * Successful responses are wrapped as `{ success: true, data }`; errors go through
 * `sendErrorResponse` / `errorHandler()` as `{ success: false, error }`.
 */

import type { Response } from 'express';

export interface SuccessResponseBody<T> {
  success: true;
  data: T;
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const body: SuccessResponseBody<T> = { success: true, data };
  res.status(statusCode).json(body);
}

export function sendCreated<T>(res: Response, data: T): void {
  sendSuccess(res, data, 201);
}
