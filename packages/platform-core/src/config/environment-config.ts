/**
 * Environment Configuration
 *
 * Parses process.env into a typed service configuration and fails fast on bad values.
 */

import { z } from 'zod';
import { getLogger } from '../logging/logger';
import { DomainError, DomainErrorCode } from '../error-handling/errors';
import type { EnvSource } from '../resilience/env-utils';

const logger = getLogger('environment-config');

export class ConfigurationError extends DomainError {
  constructor(
    serviceName: string,
    public readonly issues: string[]
  ) {
    super(`Invalid configuration for ${serviceName}: ${issues.join('; ')}`, 500, undefined, DomainErrorCode.VALIDATION_ERROR, {
      issues,
    });
    this.name = 'ConfigurationError';
  }
}

export function parseEnvironment<TSchema extends z.ZodTypeAny>(
  serviceName: string,
  schema: TSchema,
  env: EnvSource = process.env
): z.infer<TSchema> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    logger.error('Environment validation failed', { serviceName, issues });
    throw new ConfigurationError(serviceName, issues);
  }
  return result.data;
}

/**
 * Optional string env var: blank values count as unset.
 */
export const optionalEnvString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));
