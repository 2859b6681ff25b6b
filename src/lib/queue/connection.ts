/**
 * Shared BullMQ connection config for queues and workers, plus a Redis
 * health check run before the workers start.
 */

import { getConfig } from '@/lib/config';

export function redisConnection(url = getConfig().redisUrl): { url: string } {
  return { url };
}

/**
 * Check whether Redis is reachable.
 * Returns true if a PING succeeds within 3 seconds, false otherwise.
 */
export async function checkRedisHealth(url = getConfig().redisUrl): Promise<boolean> {
  try {
    const { default: Redis } = await import('ioredis');
    const client = new Redis(url, {
      connectTimeout: 3000,
      maxRetriesPerRequest: 0,
      lazyConnect: true,
    });

    await client.connect();
    const pong = await client.ping();
    await client.quit();
    return pong === 'PONG';
  } catch (error) {
    console.warn('[Redis] Health check failed:', error instanceof Error ? error.message : String(error));
    return false;
  }
}
