/**
 * Platform Core - shared infrastructure for Robin Radio services
 *
 * - Structured logging with correlation tracking
 * - Domain error model and express error middleware
 * - Retry, timeout and batch fan-out primitives
 * - Key-value stores (memory, JSON file, Redis)
 * - Environment configuration, response helpers, SSE, graceful shutdown
 */

export * from './logging/index';
export * from './error-handling/errors';
export * from './resilience/index';
export * from './cache/index';
export * from './config/index';
export * from './http/index';
export * from './middleware/index';
export * from './lifecycle/index';
