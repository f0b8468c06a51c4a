const DEFAULT_MAX_SIZE = 64;

/**
 * Promise memo keyed by input fingerprint. Concurrent callers with the same
 * key share one in-flight computation; a rejected computation is evicted so
 * the next caller retries. Oldest entries go first once `maxSize` is reached.
 */
export class MemoCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  constructor(private readonly maxSize = DEFAULT_MAX_SIZE) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) return existing;

    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) this.entries.delete(oldest);
    }

    const pending = compute();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
