import { ConcurrencyError } from '../errors.js';
import type { SharedStore } from './types.js';

/**
 * Outcome of one mutation attempt: the value to write (or null to leave the
 * key untouched) and the result handed back to the caller
 */
export interface MutationStep<T> {
  next: string | null;
  result: T;
}

export interface OptimisticUpdateOptions {
  ttlSeconds?: number;
  /** Attempts before giving up (default: 5) */
  maxAttempts?: number;
}

/**
 * Read-modify-write a key through compare-and-swap, retrying on conflict
 *
 * `mutate` must be pure: it is re-run against the fresh value after every
 * lost race.
 *
 * @throws ConcurrencyError when every attempt lost its race
 */
export async function optimisticUpdate<T>(
  store: SharedStore,
  key: string,
  mutate: (current: string | null) => MutationStep<T>,
  options: OptimisticUpdateOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 5;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const current = await store.get(key);
    const step = mutate(current);

    if (step.next === null || step.next === current) {
      return step.result;
    }

    const swapped = await store.compareAndSwap(key, current, step.next, options.ttlSeconds);
    if (swapped) {
      return step.result;
    }
  }

  throw new ConcurrencyError(`Gave up updating ${key} after ${maxAttempts} attempts`);
}
