import { rootLogger } from './logging.js';
import { assert } from './validation.js';

/**
 * Return a promise that resolves in ms milliseconds.
 * @param ms Time to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes a fetch request that fails after a timeout via an AbortController.
 * An abort of `options.signal` is forwarded to the request as well.
 * @param resource resource to fetch (e.g URL)
 * @param options fetch call options object
 * @param timeout timeout MS (default 10_000)
 * @returns fetch response
 */
export async function fetchWithTimeout(
  resource: string | URL,
  options?: RequestInit,
  timeout = 10_000,
) {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeout);
  const outerSignal = options?.signal;
  const forwardAbort = () => controller.abort();
  if (outerSignal) {
    if (outerSignal.aborted) controller.abort();
    else outerSignal.addEventListener('abort', forwardAbort, { once: true });
  }
  try {
    return await fetch(resource, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(id);
    outerSignal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Retries an async function if it raises an exception,
 *   using exponential backoff.
 * @param runner callback to run
 * @param attempts max number of attempts
 * @param baseRetryMs base delay between attempts
 * @param signal once aborted, the last error is thrown without further attempts
 * @returns runner return value
 */
export async function retryAsync<T>(
  runner: () => T | Promise<T>,
  attempts = 5,
  baseRetryMs = 50,
  signal?: AbortSignal,
): Promise<T> {
  const maxAttempts = Math.max(attempts, 1);
  let saveError: unknown;
  for (let i = 0; i < maxAttempts; i++) {
    try {
      return await runner();
    } catch (error) {
      saveError = error;
      if (signal?.aborted) break;
      if (i < maxAttempts - 1) {
        rootLogger.trace(
          { attempt: i + 1, attempts: maxAttempts },
          'Retrying after error',
        );
        await sleep(baseRetryMs * 2 ** i);
      }
    }
  }
  throw saveError;
}

export interface CollectUntilOptions {
  /** Maximum number of `mapFn` executions in flight */
  concurrency: number;
  /** Number of defined results after which dispatching stops */
  target: number;
}

export type Collected<B> = { index: number; value: B };

/**
 * Walk xs in order with a bounded worker pool until `target` calls of
 * `mapFn` have produced a value. A call resolving to `undefined` counts as
 * a miss and frees its slot for the next element.
 *
 * No more calls are kept in flight than results still missing, so once the
 * target is met the remaining elements are never visited. The signal passed
 * to `mapFn` is aborted when collection finishes or when a call rejects;
 * a rejection rejects the whole collection.
 *
 * @returns the collected values ordered by their index in xs
 */
export function collectUntil<A, B>(
  xs: A[],
  mapFn: (val: A, idx: number, signal: AbortSignal) => Promise<B | undefined>,
  { concurrency, target }: CollectUntilOptions,
): Promise<Collected<B>[]> {
  assert(concurrency > 0, 'concurrency must be greater than 0');
  const controller = new AbortController();
  const collected: Collected<B>[] = [];
  let next = 0;
  let inFlight = 0;
  let settled = false;

  return new Promise((resolve, reject) => {
    const finish = () => {
      settled = true;
      controller.abort();
      resolve(collected.sort((a, b) => a.index - b.index));
    };

    const dispatch = () => {
      if (settled) return;
      if (collected.length >= target) return finish();
      while (
        next < xs.length &&
        inFlight < concurrency &&
        collected.length + inFlight < target
      ) {
        const index = next++;
        inFlight++;
        Promise.resolve()
          .then(() => mapFn(xs[index], index, controller.signal))
          .then(
            (value) => {
              inFlight--;
              if (settled) return;
              if (value !== undefined) collected.push({ index, value });
              dispatch();
            },
            (error: unknown) => {
              inFlight--;
              if (settled) return;
              settled = true;
              controller.abort();
              reject(error);
            },
          );
      }
      if (inFlight === 0) finish();
    };

    dispatch();
  });
}
