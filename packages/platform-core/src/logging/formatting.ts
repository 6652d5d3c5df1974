/**
 * Log Formatting
 *
 * Winston formats plus redaction of secrets and signed-URL credentials
 */

import * as winston from 'winston';
import type { LogContext } from './types';

const SECRET_KEY_PATTERNS = [
  /authorization/i,
  /set-cookie/i,
  /api[-_]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /credentials?/i,
  /bearer/i,
];

// Query parameters that carry the credential part of a signed GCS or S3 URL
const SIGNED_URL_PARAMS = /([?&](?:X-Goog-Signature|X-Goog-Credential|X-Amz-Signature|X-Amz-Credential|X-Amz-Security-Token|Signature)=)[^&\s"]+/gi;

export function redactSignedUrl(value: string): string {
  return value.replace(SIGNED_URL_PARAMS, '$1[REDACTED]');
}

/**
 * Redacts secret-looking keys and signed URL credentials from a log payload
 */
export function maskSecrets(obj: unknown, maxDepth = 4): unknown {
  if (typeof obj === 'string') {
    return redactSignedUrl(obj);
  }
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_KEY_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else {
      masked[key] = maskSecrets(value, maxDepth - 1);
    }
  }
  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

export function createProdFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context && !info.correlationId) {
        info.correlationId = context.correlationId;
      }
      return safeStringify(info, 50000);
    })
  );
}
