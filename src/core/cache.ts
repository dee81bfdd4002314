/**
 * core/cache.ts
 *
 * Lazy value cache used by the system info collector. A section is loaded
 * on first request and reused until it expires (ttlMs) or is invalidated.
 * ttlMs = Infinity keeps static hardware data for the life of the process.
 *
 * M maps each section key to the type of value stored under it.
 */

interface Entry<T> {
  value: T;
  loadedAt: number;
}

type Entries<M> = { [K in keyof M]?: Entry<M[K]> };

export class SectionCache<M extends object> {
  private entries: Entries<M> = {};
  private readonly loaded = new Set<keyof M & string>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Returns the cached value for `key`, loading it when absent or older than ttlMs. */
  async get<K extends keyof M & string>(key: K, ttlMs: number, load: () => Promise<M[K]>): Promise<M[K]> {
    const entry = this.entries[key];
    if (entry && this.now() - entry.loadedAt < ttlMs) {
      return entry.value;
    }
    const value = await load();
    this.entries[key] = { value, loadedAt: this.now() };
    this.loaded.add(key);
    return value;
  }

  has(key: keyof M & string): boolean {
    return this.loaded.has(key);
  }

  invalidate(key: keyof M & string): void {
    delete this.entries[key];
    this.loaded.delete(key);
  }

  /** Drops every entry; returns how many were dropped. */
  clear(): number {
    const size = this.loaded.size;
    this.entries = {};
    this.loaded.clear();
    return size;
  }

  keys(): string[] {
    return Array.from(this.loaded);
  }
}
