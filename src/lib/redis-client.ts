import { Redis } from 'ioredis';
import logger from './logger.js';

let redisClient: Redis | null = null;

/**
 * Returns the shared Redis client, creating it lazily from `redisUrl`.
 *
 * Returns null when no URL is configured or construction fails. Short
 * connect timeout and a single retry per request keep the in-memory fallback
 * responsive when Redis is down.
 */
export function getRedisClient(redisUrl: string | undefined): Redis | null {
  if (redisClient) return redisClient;
  if (!redisUrl) return null;

  try {
    redisClient = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      connectTimeout: 3000,
      lazyConnect: true,
    });

    redisClient.on('error', (err: Error) => {
      logger.warn({ err: err.message }, 'Redis connection error');
    });

    return redisClient;
  } catch (err) {
    logger.warn(
      { err: err instanceof Error ? err.message : String(err) },
      'Failed to create Redis client',
    );
    return null;
  }
}

export async function shutdownRedis(): Promise<void> {
  if (!redisClient) return;
  const client = redisClient;
  redisClient = null;
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis quit failed');
  }
}
