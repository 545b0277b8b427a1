import { KeyValueCache } from '../cache/key-value.cache';

interface Entry {
  value: unknown;
  expiresAt: number;
}

/** Process-local KeyValueCache for specs. `now` is injectable so TTLs can be stepped over. */
export class InMemoryKeyValueCache extends KeyValueCache {
  private readonly entries = new Map<string, Entry>();

  constructor(public now: () => number = () => Date.now()) {
    super();
  }

  async get(key: string): Promise<unknown> {
    return this.live(key)?.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    // Round-trip through JSON like the jsonb column does
    this.entries.set(key, {
      value: JSON.parse(JSON.stringify(value)),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async take(key: string): Promise<unknown> {
    const entry = this.live(key);
    this.entries.delete(key);
    return entry?.value;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    const next = typeof entry?.value === 'number' ? entry.value + 1 : 1;
    this.entries.set(key, {
      value: next,
      expiresAt: entry ? entry.expiresAt : this.now() + ttlSeconds * 1000,
    });
    return next;
  }

  async purgeExpired(): Promise<number> {
    let purged = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= this.now()) {
        this.entries.delete(key);
        purged++;
      }
    }
    return purged;
  }

  /** Drops an entry as if its TTL had run out */
  evict(key: string): void {
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    return entry && entry.expiresAt > this.now() ? entry : undefined;
  }
}
