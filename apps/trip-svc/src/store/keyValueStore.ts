/**
 * String key-value storage with optional per-key expiry. Search records, revoked
 * tokens and the refresh-token index all live here, so every cache is bounded by TTL.
 */
export interface KeyValueStore {
  readonly kind: 'memory' | 'redis';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Live keys starting with `prefix`, in no particular order. */
  keys(prefix: string): Promise<string[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

interface Entry {
  value: string;
  expiresAt: number | null;
}

/**
 * Single-process store. Expired entries are dropped when read and swept on `keys`.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  readonly kind = 'memory';
  private entries = new Map<string, Entry>();

  constructor(private readonly clock: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds === undefined ? null : this.clock() + ttlSeconds * 1000
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const live: string[] = [];
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      } else if (key.startsWith(prefix)) {
        live.push(key);
      }
    }
    return live;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: Entry): boolean {
    return entry.expiresAt !== null && this.clock() >= entry.expiresAt;
  }
}
