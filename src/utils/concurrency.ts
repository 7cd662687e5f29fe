/**
 * Bounded parallelism and per-operation timeouts.
 */

/** Raised by withTimeout when the wrapped operation does not settle in time. */
export class OperationTimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "OperationTimeoutError";
  }
}

/**
 * Process items with at most `concurrency` in flight.
 * Results keep the input order.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency = 5,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(concurrency, 1), items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      results[idx] = await processor(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Reject with OperationTimeoutError if `promise` has not settled after `ms`.
 * A non-positive `ms` disables the bound.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  if (ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new OperationTimeoutError(message, ms)), ms);
    promise
      .then((val) => { clearTimeout(timer); resolve(val); })
      .catch((error: unknown) => { clearTimeout(timer); reject(error); });
  });
}
