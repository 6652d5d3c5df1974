export * from './retry';
export * from './timeout';
export * from './batch';
export * from './env-utils';
