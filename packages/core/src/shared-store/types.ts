/**
 * Shared low-latency store
 *
 * Everything several workers mutate concurrently (round-robin queues, rate
 * counters, presence, sessions, captcha challenges) goes through this
 * interface. Each method is a single atomic operation against the backend;
 * callers never compose a read and a write by hand, they use
 * `compareAndSwap` or `increment`.
 */

export interface SetOptions {
  /** Expiry in seconds; omitted means no expiry */
  ttlSeconds?: number;
  /** Only write when the key does not exist (SET NX) */
  onlyIfAbsent?: boolean;
}

export interface SharedStore {
  get(key: string): Promise<string | null>;

  /**
   * @returns false when `onlyIfAbsent` was set and the key already existed
   */
  set(key: string, value: string, options?: SetOptions): Promise<boolean>;

  delete(key: string): Promise<void>;

  /**
   * Atomically increment a counter, creating it at 1 with the given expiry
   *
   * @returns the counter value after the increment
   */
  increment(key: string, ttlSeconds: number): Promise<number>;

  /**
   * Write `next` only if the stored value still equals `expected`
   * (`null` meaning the key must be absent)
   */
  compareAndSwap(
    key: string,
    expected: string | null,
    next: string,
    ttlSeconds?: number
  ): Promise<boolean>;

  close(): Promise<void>;
}
