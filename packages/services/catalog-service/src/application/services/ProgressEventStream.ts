/**
 * Progress Event Stream
 * Broadcast of catalog loading progress. Subscribers only see events emitted after they subscribe.
 */

import { getLogger, serializeError } from '@robin-radio/platform-core';
import type { LoadingProgress } from '../../domains/catalog/value-objects/LoadingProgress';

const logger = getLogger('catalog-service-progress-stream');

export type ProgressListener = (progress: LoadingProgress) => void;

export class ProgressEventStream {
  private readonly listeners = new Set<ProgressListener>();
  private lastEmitted: LoadingProgress | null = null;

  emit(progress: LoadingProgress): void {
    this.lastEmitted = progress;
    for (const listener of [...this.listeners]) {
      try {
        listener(progress);
      } catch (error) {
        logger.warn('Progress listener threw', { error: serializeError(error) });
      }
    }
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Most recent event; informational only, never replayed to new subscribers */
  get latest(): LoadingProgress | null {
    return this.lastEmitted;
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  dispose(): void {
    this.listeners.clear();
  }
}
