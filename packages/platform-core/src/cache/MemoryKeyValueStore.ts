import type { IKeyValueStore } from './types';

export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly entries = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) this.entries.set(key, value);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.entries.keys()].filter(key => key.startsWith(prefix));
  }

  async close(): Promise<void> {}

  get size(): number {
    return this.entries.size;
  }
}
