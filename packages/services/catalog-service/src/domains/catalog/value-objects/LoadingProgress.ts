export interface LoadingProgress {
  readonly message: string;
  /** Fraction in [0, 1] */
  readonly progress: number;
  readonly itemsProcessed: number;
  readonly totalItems: number;
  readonly elapsedMs: number;
  readonly estimatedRemainingMs?: number;
}

export function createLoadingProgress(input: LoadingProgress): LoadingProgress {
  return Object.freeze({
    ...input,
    progress: Math.min(1, Math.max(0, input.progress)),
  });
}

/**
 * Processing-pass progress: discovery owns the first 10%, album processing the rest.
 */
export function processingFraction(processed: number, totalEstimate: number): number {
  if (totalEstimate <= 0) return 1;
  return Math.min(1, Math.max(0.1, 0.1 + (processed / totalEstimate) * 0.9));
}
