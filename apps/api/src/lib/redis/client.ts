/**
 * Redis client for the rate governor's durable store
 */
import Redis from 'ioredis';
import type { Logger } from '@tracklift/providers-core';

export interface RedisConfig {
  url?: string;
  /**
   * Max retry attempts per command before it fails
   * @default 3
   */
  maxRetries?: number;
  /**
   * Enable offline queue (queue commands when disconnected)
   * @default false
   */
  enableOfflineQueue?: boolean;
  logger?: Logger;
}

/**
 * Initialize Redis client; commands fail fast while reconnects continue
 */
export function createRedisClient(config: RedisConfig = {}): Redis {
  const { url, maxRetries = 3, enableOfflineQueue = false, logger } = config;

  if (!url) {
    throw new Error('Redis URL is required');
  }

  const client = new Redis(url, {
    maxRetriesPerRequest: maxRetries,
    enableOfflineQueue,
    lazyConnect: false,
    // keep reconnecting so the rate governor can leave degraded mode
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
  });

  client.on('error', (err: Error) => {
    logger?.error({ err: err.message }, 'redis connection error');
  });

  client.on('connect', () => {
    logger?.info('redis connected');
  });

  client.on('reconnecting', () => {
    logger?.warn('redis reconnecting');
  });

  return client;
}

/**
 * Check if Redis is connected and healthy
 */
export async function checkRedisHealth(client: Pick<Redis, 'ping'>): Promise<boolean> {
  const result = await client.ping();
  return result === 'PONG';
}
