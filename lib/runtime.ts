import { FileCacheStore, RedisCacheStore, SnapshotCache, isSnapshot, type CacheStore } from './cache';
import type { AppConfig } from './config';
import type { Logger } from './logger';
import type { Snapshot } from './models';
import { createRedis } from './redis';
import { RecommendationService } from './service';
import { FplClient } from './upstream';

/**
 * Wire the service from configuration: FPL client, cache store (Redis when
 * REDIS_URL is set, files otherwise) and the snapshot cache.
 */
export function createRecommendationService(
  config: AppConfig,
  logger: Logger
): { service: RecommendationService; close: () => Promise<void> } {
  const redis = createRedis(config.cache.redisUrl, logger);
  const store: CacheStore = redis
    ? new RedisCacheStore(redis, logger)
    : new FileCacheStore(config.cache.directory, logger);

  const cache = new SnapshotCache<Snapshot>({ store, logger, guard: isSnapshot });
  const source = new FplClient({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
    logger,
  });

  const close = async () => {
    if (redis) await redis.quit();
  };

  return { service: new RecommendationService({ source, cache, logger }), close };
}
