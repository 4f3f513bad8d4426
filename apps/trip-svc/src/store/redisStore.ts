import { createClient } from 'redis';
import { KeyValueStore } from './keyValueStore';

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis-backed store shared by every worker that points at the same server.
 */
export class RedisKeyValueStore implements KeyValueStore {
  readonly kind = 'redis';

  constructor(private readonly client: RedisClient) {}

  static async connect(url: string): Promise<RedisKeyValueStore> {
    const client = createClient({ url });
    client.on('error', (err: unknown) => console.error('Redis Client Error', err));
    await client.connect();
    console.log('✅ Redis connected');
    return new RedisKeyValueStore(client);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds === undefined) {
      await this.client.set(key, value);
      return;
    }
    if (ttlSeconds <= 0) {
      await this.client.del(key);
      return;
    }
    await this.client.setEx(key, Math.ceil(ttlSeconds), value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const found: string[] = [];
    for await (const key of this.client.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
      found.push(key);
    }
    return found;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      console.error('Redis ping failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}
