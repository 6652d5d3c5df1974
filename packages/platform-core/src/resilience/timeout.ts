import { TimeoutError } from '../error-handling/errors';

/**
 * Races `operation` against a timer. The timer is always cleared once either side settles.
 */
export async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
