import type { IKeyValueStore } from './types';
import { MemoryKeyValueStore } from './MemoryKeyValueStore';
import { JsonFileKeyValueStore } from './JsonFileKeyValueStore';
import { RedisKeyValueStore } from './RedisKeyValueStore';

export type KeyValueStoreConfig =
  | { kind: 'memory' }
  | { kind: 'file'; filePath: string }
  | { kind: 'redis'; serviceName: string; keyPrefix: string; url?: string };

export function createKeyValueStore(config: KeyValueStoreConfig): IKeyValueStore {
  switch (config.kind) {
    case 'memory':
      return new MemoryKeyValueStore();
    case 'file':
      return new JsonFileKeyValueStore(config.filePath);
    case 'redis':
      return new RedisKeyValueStore({ serviceName: config.serviceName, keyPrefix: config.keyPrefix, url: config.url });
  }
}
