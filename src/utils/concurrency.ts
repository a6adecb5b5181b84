import { InvalidArgumentError, TimeoutError } from './errors.js';

export type ProgressCallback<R> = (result: R, index: number, completed: number, total: number) => void;

export interface MapConcurrentOptions<R> {
  /** Maximum calls in flight */
  workers: number;
  /** Envelope for the whole map; unset means no limit */
  timeoutMs?: number;
  onProgress?: ProgressCallback<R>;
}

/**
 * Map `items` through `fn` with at most `workers` calls in flight.
 * Results come back in input order. The first rejection rejects the whole
 * map; workers stop picking up new items once that happens.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: MapConcurrentOptions<R>
): Promise<R[]> {
  const { workers: concurrency, timeoutMs, onProgress } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidArgumentError(`Worker count must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;
  let completed = 0;
  let stopped = false;

  const worker = async (): Promise<void> => {
    while (!stopped && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        const result = await fn(items[index], index);
        results[index] = result;
        completed++;
        onProgress?.(result, index, completed, items.length);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  };

  const run = Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, () => worker())
  ).then(() => results);

  if (timeoutMs === undefined) {
    return run;
  }
  try {
    return await withTimeout(run, timeoutMs, `Processing ${items.length} item(s)`);
  } catch (error) {
    stopped = true;
    throw error;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reject with a TimeoutError when `promise` has not settled within `ms`.
 * The timer never keeps the process alive after the race settles.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, { ms })), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
