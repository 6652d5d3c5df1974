import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getCorrelationContext } from '../logging/correlation';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  TIMEOUT = 'TIMEOUT',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public override readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

/**
 * Raised by withTimeout when an operation outlives its bound.
 */
export class TimeoutError extends DomainError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 504, undefined, DomainErrorCode.TIMEOUT, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

export function createDomainServiceError<T extends string>(serviceName: string, domainErrorCodes: Record<string, T>) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND, undefined, id ? { resource, id } : { resource });
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static conflict(message: string) {
      return new ServiceError(message, 409, domainErrorCodes.CONFLICT);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Narrows an unknown thrown value to an Error so it can be attached as a cause.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof DomainError && error.code === code;
}

const STATUS_CODE_NAMES: Record<number, string> = {
  400: DomainErrorCode.BAD_REQUEST,
  401: DomainErrorCode.UNAUTHORIZED,
  403: DomainErrorCode.FORBIDDEN,
  404: DomainErrorCode.NOT_FOUND,
  409: DomainErrorCode.CONFLICT,
  422: DomainErrorCode.VALIDATION_ERROR,
  503: DomainErrorCode.SERVICE_UNAVAILABLE,
  504: DomainErrorCode.TIMEOUT,
};

export function statusCodeToErrorCode(statusCode: number): string {
  return STATUS_CODE_NAMES[statusCode] ?? (statusCode >= 500 ? DomainErrorCode.INTERNAL_ERROR : DomainErrorCode.UNKNOWN);
}

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  };
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: { code?: string; details?: Record<string, unknown> }
): void {
  const correlationId = getCorrelationContext()?.correlationId;
  const body: ErrorResponseBody = {
    success: false,
    error: {
      code: options?.code || statusCodeToErrorCode(statusCode),
      message,
      ...(options?.details && { details: options.details }),
      ...(correlationId && { correlationId }),
    },
  };
  res.status(statusCode).json(body);
}

export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(error);

    if (error instanceof DomainError) {
      if (error.statusCode >= 500) {
        middlewareLogger.error('DomainError caught', {
          error: serializeError(error),
          url: req.originalUrl,
          method: req.method,
        });
      } else {
        middlewareLogger.debug('DomainError caught', { code: error.code, url: req.originalUrl });
      }
      sendErrorResponse(res, error.statusCode, error.message, { code: error.code, details: error.details });
      return;
    }

    middlewareLogger.error('Unhandled error', {
      error: serializeError(error),
      url: req.originalUrl,
      method: req.method,
    });

    const message = process.env.NODE_ENV === 'production' ? 'Internal Server Error' : errorMessage(error);
    sendErrorResponse(res, 500, message);
  };
}

/**
 * Forwards async route handler rejections to the express error handler.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
