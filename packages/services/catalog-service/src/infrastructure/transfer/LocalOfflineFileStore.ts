/**
 * Offline files on the local filesystem, flat under one directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { getLogger } from '@robin-radio/platform-core';
import type { IOfflineFileStore } from '../../application/interfaces/IOfflineFileStore';

const logger = getLogger('catalog-service-offline-files');

export class LocalOfflineFileStore implements IOfflineFileStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  pathFor(fileName: string): string {
    return path.join(this.baseDir, path.basename(fileName));
  }

  async write(fileName: string, data: Buffer): Promise<string> {
    const filePath = this.pathFor(fileName);
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(filePath, data);
    logger.debug('Offline file written', { filePath, bytes: data.length });
    return filePath;
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async removeAll(): Promise<void> {
    await fs.rm(this.baseDir, { recursive: true, force: true });
    await fs.mkdir(this.baseDir, { recursive: true });
    logger.info('Offline directory cleared', { baseDir: this.baseDir });
  }
}
