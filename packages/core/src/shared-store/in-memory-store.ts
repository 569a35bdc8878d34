import type { SetOptions, SharedStore } from './types.js';

interface StoredValue {
  value: string;
  expiresAt: number | null;
}

export interface InMemorySharedStoreOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * Single-process SharedStore
 *
 * Used when no REDIS_URL is configured and throughout the tests. Every
 * method completes without yielding between its read and its write, which
 * gives the same atomicity the Redis scripts provide.
 */
export class InMemorySharedStore implements SharedStore {
  private readonly entries = new Map<string, StoredValue>();
  private readonly now: () => number;

  constructor(options: InMemorySharedStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.read(key));
  }

  set(key: string, value: string, options: SetOptions = {}): Promise<boolean> {
    if (options.onlyIfAbsent === true && this.read(key) !== null) {
      return Promise.resolve(false);
    }
    this.write(key, value, options.ttlSeconds);
    return Promise.resolve(true);
  }

  delete(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  increment(key: string, ttlSeconds: number): Promise<number> {
    const current = this.read(key);
    const next = current === null ? 1 : Number.parseInt(current, 10) + 1;

    if (current === null) {
      this.write(key, String(next), ttlSeconds);
    } else {
      const entry = this.entries.get(key);
      this.entries.set(key, { value: String(next), expiresAt: entry?.expiresAt ?? null });
    }

    return Promise.resolve(next);
  }

  compareAndSwap(
    key: string,
    expected: string | null,
    next: string,
    ttlSeconds?: number
  ): Promise<boolean> {
    if (this.read(key) !== expected) {
      return Promise.resolve(false);
    }
    this.write(key, next, ttlSeconds);
    return Promise.resolve(true);
  }

  close(): Promise<void> {
    this.entries.clear();
    return Promise.resolve();
  }

  /** Number of live keys */
  size(): number {
    for (const key of [...this.entries.keys()]) {
      this.read(key);
    }
    return this.entries.size;
  }

  private read(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  private write(key: string, value: string, ttlSeconds?: number): void {
    const expiresAt =
      ttlSeconds !== undefined && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }
}
