/**
 * Shared key/value store with per-entry TTL, visible to every API and worker
 * process. Expired entries read as missing.
 */
export abstract class KeyValueCache {
  /** Stored value, or undefined when missing or expired */
  abstract get(key: string): Promise<unknown>;

  abstract set(key: string, value: unknown, ttlSeconds: number): Promise<void>;

  /** Reads and deletes in one step; a second take of the same key sees undefined */
  abstract take(key: string): Promise<unknown>;

  abstract delete(key: string): Promise<void>;

  /**
   * Atomically increments a counter and returns the new value. The TTL applies
   * only when the counter is created, so a window never extends itself.
   */
  abstract increment(key: string, ttlSeconds: number): Promise<number>;

  /** Deletes expired entries, returning how many went */
  abstract purgeExpired(): Promise<number>;
}
