import { CacheStore } from '../cache.store';

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * In-process CacheStore for tests. Honours TTLs against Date.now() so fake
 * timers drive expiry; `unavailable` makes every call reject.
 */
export class InMemoryCacheStore extends CacheStore {
  readonly entries = new Map<string, Entry>();
  unavailable = false;

  async get(key: string): Promise<string | null> {
    this.assertAvailable();
    const entry = this.live(key);
    return entry ? entry.value : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertAvailable();
    if (ttlSeconds <= 0) {
      throw new Error('ERR invalid expire time in set');
    }
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async delete(...keys: string[]): Promise<number> {
    this.assertAvailable();
    let removed = 0;
    for (const key of keys) {
      if (this.live(key) && this.entries.delete(key)) {
        removed++;
      }
    }
    return removed;
  }

  async exists(key: string): Promise<boolean> {
    this.assertAvailable();
    return this.live(key) !== null;
  }

  async ping(): Promise<boolean> {
    return !this.unavailable;
  }

  /** Number of unexpired keys */
  size(): number {
    return [...this.entries.keys()].filter((key) => this.live(key)).length;
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private assertAvailable() {
    if (this.unavailable) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
  }
}
