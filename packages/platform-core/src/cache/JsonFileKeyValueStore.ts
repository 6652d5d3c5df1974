/**
 * JSON file backed key-value store
 *
 * The whole table lives in one JSON document that is loaded on first access and
 * rewritten (temp file + rename) after every mutation. Writes are serialized so
 * a later snapshot never lands before an earlier one.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { toError } from '../error-handling/errors';
import { KeyValueStoreError, type IKeyValueStore } from './types';

const logger = getLogger('platform-core-json-file-store');

const StoreDocumentSchema = z.record(z.string());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileKeyValueStore implements IKeyValueStore {
  private entries: Map<string, string> | null = null;
  private loading: Promise<Map<string, string>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<string | null> {
    const entries = await this.load();
    return entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    const entries = await this.load();
    entries.set(key, value);
    await this.flush('set', key);
  }

  async remove(key: string): Promise<void> {
    const entries = await this.load();
    if (!entries.delete(key)) return;
    await this.flush('remove', key);
  }

  async has(key: string): Promise<boolean> {
    const entries = await this.load();
    return entries.has(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const entries = await this.load();
    return [...entries.keys()].filter(key => key.startsWith(prefix));
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private async load(): Promise<Map<string, string>> {
    if (this.entries) return this.entries;
    if (!this.loading) {
      this.loading = this.readDocument().finally(() => {
        this.loading = null;
      });
    }
    this.entries = await this.loading;
    return this.entries;
  }

  private async readDocument(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return new Map();
      throw new KeyValueStoreError('file', 'load', toError(error));
    }

    try {
      return new Map(Object.entries(StoreDocumentSchema.parse(JSON.parse(raw))));
    } catch (error) {
      const quarantinePath = `${this.filePath}.corrupt-${Date.now()}`;
      logger.warn('Store document is unreadable, starting empty', {
        filePath: this.filePath,
        quarantinePath,
        error: serializeError(error),
      });
      await rename(this.filePath, quarantinePath).catch((renameError: unknown) => {
        logger.warn('Could not quarantine unreadable store document', { error: serializeError(renameError) });
      });
      return new Map();
    }
  }

  private flush(operation: 'set' | 'remove', key: string): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.entries ?? []));
    const write = this.writeChain.then(() => this.writeAtomically(snapshot, operation, key));
    // the caller observes the failure through `write`; the chain itself must stay usable
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeAtomically(snapshot: string, operation: 'set' | 'remove', key: string): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, snapshot, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new KeyValueStoreError('file', operation, toError(error), key);
    }
  }
}
