/**
 * Session Cache
 *
 * Bounded map of composed prompts. Least recently used entries are evicted
 * past capacity; entries older than the TTL read as absent.
 */

export interface SessionCacheOptions {
  /** Maximum entries (default: 256) */
  capacity?: number;
  /** Entry lifetime in ms (default: 10 minutes) */
  ttlMs?: number;
  now?: () => number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class SessionCache<V> {
  readonly capacity: number;
  readonly ttlMs: number;
  private now: () => number;
  private entries = new Map<string, Entry<V>>();

  constructor(options: SessionCacheOptions = {}) {
    this.capacity = options.capacity ?? 256;
    this.ttlMs = options.ttlMs ?? 600_000;
    this.now = options.now ?? Date.now;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError(`Session cache capacity must be a positive integer, got ${this.capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
