/**
 * Logging Middleware
 *
 * Express middleware that binds a correlation ID to the request and logs its completion
 */

import type { Request, Response, NextFunction } from 'express';
import type { LogContext } from './types';
import { getLogger } from './logger';
import { correlationStorage, generateCorrelationId } from './correlation';

export function requestLogger(serviceName: string) {
  const logger = getLogger(`${serviceName}-http`);

  return (req: Request, res: Response, next: NextFunction): void => {
    const rawCorrelationId = req.headers['x-correlation-id'] || generateCorrelationId();
    const correlationId = Array.isArray(rawCorrelationId) ? rawCorrelationId[0] : rawCorrelationId;
    const startedAt = Date.now();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader('x-correlation-id', correlationId);
    res.on('finish', () => {
      logger.debug('Request completed', {
        correlationId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });

    correlationStorage.run(context, () => {
      next();
    });
  };
}
