import { DomainError, DomainErrorCode } from '../error-handling/errors';

/**
 * String-valued key-value store that survives process restarts (except the in-memory variant).
 */
export interface IKeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  /** Keys starting with `prefix`, in no particular order */
  keys(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}

export type KeyValueOperation = 'get' | 'set' | 'remove' | 'has' | 'keys' | 'load';

export class KeyValueStoreError extends DomainError {
  constructor(
    public readonly backend: string,
    public readonly operation: KeyValueOperation,
    cause?: Error,
    key?: string
  ) {
    super(
      `Key-value store ${operation} failed (${backend})`,
      503,
      cause,
      DomainErrorCode.SERVICE_UNAVAILABLE,
      key ? { backend, operation, key } : { backend, operation }
    );
    this.name = 'KeyValueStoreError';
  }
}
