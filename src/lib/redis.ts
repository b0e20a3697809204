import { Redis } from "@upstash/redis";

export interface KVSetOptions {
  /** Expiry in seconds. */
  ex?: number;
  /** Only set when the key does not exist. */
  nx?: boolean;
}

/**
 * The subset of Redis used for checkpoints, the run lock and progress.
 * Values are JSON-compatible and come back already decoded.
 */
export interface KVStore {
  get(key: string): Promise<unknown>;
  /** Resolves false when `nx` was given and the key already existed. */
  set(key: string, value: unknown, opts?: KVSetOptions): Promise<boolean>;
  del(key: string): Promise<number>;
}

/**
 * In-memory KV store used when Upstash Redis is not configured.
 * Values are deep-copied in and out so callers never share state with it.
 */
export class MemoryKV implements KVStore {
  private store = new Map<string, { value: unknown; expiresAt?: number }>();

  private isExpired(key: string): boolean {
    const entry = this.store.get(key);
    if (!entry) return true;
    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return true;
    }
    return false;
  }

  async get(key: string): Promise<unknown> {
    if (this.isExpired(key)) return null;
    const entry = this.store.get(key);
    return entry ? structuredClone(entry.value) : null;
  }

  async set(key: string, value: unknown, opts?: KVSetOptions): Promise<boolean> {
    if (opts?.nx && !this.isExpired(key)) {
      return false;
    }
    const expiresAt = opts?.ex ? Date.now() + opts.ex * 1000 : undefined;
    this.store.set(key, { value: structuredClone(value), expiresAt });
    return true;
  }

  async del(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0;
  }
}

export class UpstashKV implements KVStore {
  constructor(private readonly client: Redis) {}

  get(key: string): Promise<unknown> {
    return this.client.get<unknown>(key);
  }

  async set(key: string, value: unknown, opts?: KVSetOptions): Promise<boolean> {
    let result: unknown;
    if (opts?.ex !== undefined && opts.nx) {
      result = await this.client.set(key, value, { ex: opts.ex, nx: true });
    } else if (opts?.ex !== undefined) {
      result = await this.client.set(key, value, { ex: opts.ex });
    } else if (opts?.nx) {
      result = await this.client.set(key, value, { nx: true });
    } else {
      result = await this.client.set(key, value);
    }
    return result !== null;
  }

  del(key: string): Promise<number> {
    return this.client.del(key);
  }
}

export function createKV(options?: { url: string; token: string }): KVStore {
  return options
    ? new UpstashKV(new Redis({ url: options.url, token: options.token }))
    : new MemoryKV();
}
