/**
 * String key/value cache with TTL, used to share MX lookups between
 * verifications.
 *
 * InMemoryCache is the default. RedisCache shares entries across
 * processes and degrades to "always miss" when Redis is unavailable.
 */

import { logger } from './logger';
import { RedisClient } from './redis';

const log = logger.child('cache');

export interface ICache {
  /**
   * @returns Value if present and not expired, null otherwise
   */
  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlMs: number): Promise<void>;

  delete(key: string): Promise<void>;

  /**
   * Release connections held by the cache
   */
  close(): Promise<void>;
}

interface CacheEntry {
  data: string;
  expiresAt: number;
}

export interface InMemoryCacheOptions {
  now?: () => number;
  /** Expired entries are swept this often; 0 disables the sweep */
  cleanupIntervalMs?: number;
  /** Oldest entries are evicted beyond this size */
  maxEntries?: number;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 10000;

export class InMemoryCache implements ICache {
  private cache: Map<string, CacheEntry> = new Map();
  private readonly now: () => number;
  private readonly maxEntries: number;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(options: InMemoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;

    const interval = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    if (interval > 0) {
      this.cleanupTimer = setInterval(() => this.cleanupExpired(), interval);
      // the sweep alone must not keep the process alive
      this.cleanupTimer.unref();
    }
  }

  get size(): number {
    return this.cache.size;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);

    if (!entry) {
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    return entry.data;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    // re-insert so Map order stays oldest-write first
    this.cache.delete(key);
    this.cache.set(key, {
      data: value,
      expiresAt: this.now() + ttlMs,
    });

    if (this.cache.size > this.maxEntries) {
      this.cleanupExpired();
    }
    for (const oldest of this.cache.keys()) {
      if (this.cache.size <= this.maxEntries) break;
      this.cache.delete(oldest);
    }
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.cache.clear();
  }

  /**
   * Drop expired entries
   */
  cleanupExpired(): void {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      log.debug(`Cache cleanup: ${cleaned} expired entries removed`);
    }
  }
}

export class RedisCache implements ICache {
  constructor(private readonly redis: RedisClient) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.getClient().get(key);
    } catch (error) {
      log.warn('Redis GET failed, treating as cache miss', { key, error: String(error) });
      return null;
    }
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    // Redis rejects a zero expiry
    if (ttlMs <= 0) return;

    try {
      await this.redis.getClient().set(key, value, 'PX', ttlMs);
    } catch (error) {
      log.warn('Redis SET failed, entry not cached', { key, error: String(error) });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.redis.getClient().del(key);
    } catch (error) {
      log.warn('Redis DEL failed', { key, error: String(error) });
    }
  }

  async close(): Promise<void> {
    await this.redis.disconnect();
  }
}

export interface CacheSettings {
  enabled: boolean;
  url: string;
  keyPrefix: string;
}

/**
 * Redis-backed cache when enabled, in-memory otherwise
 */
export function createCache(settings: CacheSettings): ICache {
  if (settings.enabled) {
    log.info('Using Redis MX cache');
    return new RedisCache(new RedisClient(settings.url, settings.keyPrefix));
  }
  return new InMemoryCache();
}
