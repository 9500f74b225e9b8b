/**
 * Lazily created ioredis connection for the MX cache.
 *
 * Commands fail fast while Redis is down (no offline queue), so the
 * cache degrades to misses instead of stalling verifications.
 */

import Redis from 'ioredis';
import { logger } from './logger';

const log = logger.child('redis');

const MAX_RECONNECT_ATTEMPTS = 10;

/**
 * Remove credentials from URL for logging
 */
function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return url.replace(/:([^@]+)@/, ':***@');
  }
}

export class RedisClient {
  private client: Redis | null = null;

  constructor(
    private readonly url: string,
    private readonly keyPrefix: string
  ) {}

  /**
   * The connection, opened on first call
   */
  getClient(): Redis {
    if (!this.client) {
      this.client = this.open();
    }
    return this.client;
  }

  private open(): Redis {
    const client = new Redis(this.url, {
      keyPrefix: this.keyPrefix,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      connectTimeout: 5000,
      commandTimeout: 2000,
      retryStrategy: (times: number) => {
        if (times > MAX_RECONNECT_ATTEMPTS) {
          log.error(`Giving up on Redis after ${times} reconnection attempts`);
          return null;
        }
        return Math.min(times * 200, 3000);
      },
    });

    client.on('ready', () => log.info(`MX cache connected to ${redactUrl(this.url)}`));
    client.on('error', (error: Error) => log.warn('Redis error, MX lookups will bypass the cache', { error: error.message }));

    return client;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;

    try {
      await client.quit();
    } catch (error) {
      log.debug('Redis QUIT failed, dropping the connection', { error: String(error) });
      client.disconnect();
    }
  }
}
