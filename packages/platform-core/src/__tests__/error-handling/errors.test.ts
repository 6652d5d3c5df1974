import { describe, it, expect, vi, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('../../logging/logger', () => ({
  getLogger: () => mockLogger,
}));

import {
  DomainError,
  TimeoutError,
  asyncHandler,
  createDomainServiceError,
  errorHandler,
  isErrorCode,
  notFoundHandler,
  statusCodeToErrorCode,
  toError,
} from '../../error-handling/errors';
import { validateBody, validateQuery } from '../../middleware/validation';
import { sendCreated, sendSuccess } from '../../http/response-helpers';

const LibraryErrorCodes = {
  NOT_FOUND: 'LIBRARY_NOT_FOUND',
  VALIDATION_ERROR: 'LIBRARY_VALIDATION_ERROR',
  CONFLICT: 'LIBRARY_CONFLICT',
  INTERNAL_ERROR: 'LIBRARY_INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'LIBRARY_SERVICE_UNAVAILABLE',
} as const;

const LibraryError = createDomainServiceError('Library', LibraryErrorCodes);

describe('createDomainServiceError', () => {
  it('should build errors with the service codes and status', () => {
    const error = LibraryError.notFound('Album', 'a-1');

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('LibraryError');
    expect(error.message).toBe('Album not found: a-1');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('LIBRARY_NOT_FOUND');
    expect(error.details).toEqual({ resource: 'Album', id: 'a-1' });
  });

  it('should default the code to the internal error code', () => {
    const error = new LibraryError('boom');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('LIBRARY_INTERNAL_ERROR');
  });

  it('should keep the cause on service-unavailable errors', () => {
    const cause = new Error('socket hang up');
    const error = LibraryError.serviceUnavailable('remote store', cause);

    expect(error.statusCode).toBe(503);
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toMatchObject({ code: 'LIBRARY_SERVICE_UNAVAILABLE', cause: 'socket hang up' });
  });
});

describe('error helpers', () => {
  it('should map status codes to generic error codes', () => {
    expect(statusCodeToErrorCode(404)).toBe('NOT_FOUND');
    expect(statusCodeToErrorCode(504)).toBe('TIMEOUT');
    expect(statusCodeToErrorCode(502)).toBe('INTERNAL_ERROR');
    expect(statusCodeToErrorCode(418)).toBe('UNKNOWN');
  });

  it('should narrow thrown values to errors', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
    expect(toError(7).message).toBe('7');
  });

  it('should recognise domain error codes', () => {
    expect(isErrorCode(new TimeoutError('list', 10), 'TIMEOUT')).toBe(true);
    expect(isErrorCode(new Error('TIMEOUT'), 'TIMEOUT')).toBe(false);
  });
});

describe('express middleware', () => {
  const BodySchema = z.object({ name: z.string().min(1) });
  const QuerySchema = z.object({ limit: z.coerce.number().int().positive().default(10) });

  function buildApp() {
    const app = express();
    app.use(express.json());

    app.post(
      '/items',
      validateBody(BodySchema),
      asyncHandler(async (req, res) => {
        const { name } = BodySchema.parse(req.body);
        sendCreated(res, { name });
      })
    );
    app.get('/items', validateQuery(QuerySchema), (_req, res) => {
      const { limit }: z.infer<typeof QuerySchema> = res.locals.query;
      sendSuccess(res, { limit });
    });
    app.get(
      '/missing',
      asyncHandler(async () => {
        throw LibraryError.notFound('Album', 'nope');
      })
    );
    app.get(
      '/explode',
      asyncHandler(async () => {
        throw new Error('unexpected');
      })
    );

    app.use(notFoundHandler());
    app.use(errorHandler());
    return app;
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should wrap successful responses', async () => {
    const response = await request(buildApp()).post('/items').send({ name: 'Radio' });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ success: true, data: { name: 'Radio' } });
  });

  it('should answer 400 with zod issues for an invalid body', async () => {
    const response = await request(buildApp()).post('/items').send({ name: '' });

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.message).toBe('Request body validation failed');
    expect(response.body.error.details.errors[0].field).toBe('name');
  });

  it('should expose parsed query values through res.locals', async () => {
    const defaulted = await request(buildApp()).get('/items');
    const explicit = await request(buildApp()).get('/items?limit=3');

    expect(defaulted.body.data).toEqual({ limit: 10 });
    expect(explicit.body.data).toEqual({ limit: 3 });
  });

  it('should render domain errors with their status and code', async () => {
    const response = await request(buildApp()).get('/missing');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: {
        code: 'LIBRARY_NOT_FOUND',
        message: 'Album not found: nope',
        details: { resource: 'Album', id: 'nope' },
      },
    });
  });

  it('should answer 500 for unexpected errors and log them', async () => {
    const response = await request(buildApp()).get('/explode');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('INTERNAL_ERROR');
    expect(mockLogger.error).toHaveBeenCalledWith('Unhandled error', expect.objectContaining({ url: '/explode' }));
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(buildApp()).delete('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route DELETE /nowhere not found' });
  });
});
