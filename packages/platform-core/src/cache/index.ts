export * from './types';
export * from './MemoryKeyValueStore';
export * from './JsonFileKeyValueStore';
export * from './RedisKeyValueStore';
export * from './factory';
