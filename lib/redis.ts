import Redis from 'ioredis';
import { errorMessage } from './errors';
import type { Logger } from './logger';

/**
 * Redis client for the snapshot cache, or null when REDIS_URL is unset and
 * the file cache should be used instead.
 */
export function createRedis(redisUrl: string | null, logger: Logger): Redis | null {
  if (!redisUrl) return null;

  if (!/^rediss?:\/\//.test(redisUrl)) {
    throw new Error(`REDIS_URL must start with redis:// or rediss://. Received "${redisUrl}"`);
  }

  const redis = new Redis(redisUrl, { maxRetriesPerRequest: 1 });
  redis.on('error', (err: unknown) => {
    logger.warn('Redis connection error: %s', errorMessage(err));
  });
  return redis;
}
