/**
 * Key-value cache abstraction
 * Injected by class token; Redis in production, in-memory in tests.
 */
export abstract class CacheStore {
  abstract get(key: string): Promise<string | null>;

  /** Store a value that expires after ttlSeconds (must be > 0) */
  abstract set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** Returns the number of keys removed */
  abstract delete(...keys: string[]): Promise<number>;

  abstract exists(key: string): Promise<boolean>;

  abstract ping(): Promise<boolean>;
}
