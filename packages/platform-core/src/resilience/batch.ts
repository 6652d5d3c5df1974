export interface BatchSettledEvent {
  batchIndex: number;
  batchSize: number;
  processed: number;
  total: number;
  durationMs: number;
}

/**
 * Runs task thunks in consecutive batches. Every task of a batch starts together and the
 * next batch starts only after all of them have settled. A rejected task does not abort
 * its batch. Results come back in input order.
 */
export async function runInBatches<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  batchSize: number,
  onBatchSettled?: (event: BatchSettledEvent) => void
): Promise<PromiseSettledResult<T>[]> {
  if (batchSize < 1) {
    throw new RangeError(`batchSize must be >= 1, got ${batchSize}`);
  }

  const results: PromiseSettledResult<T>[] = [];
  for (let start = 0, batchIndex = 0; start < tasks.length; start += batchSize, batchIndex++) {
    const batch = tasks.slice(start, start + batchSize);
    const startedAt = Date.now();
    const settled = await Promise.allSettled(batch.map(async task => task()));
    results.push(...settled);

    onBatchSettled?.({
      batchIndex,
      batchSize: batch.length,
      processed: results.length,
      total: tasks.length,
      durationMs: Date.now() - startedAt,
    });
  }
  return results;
}
