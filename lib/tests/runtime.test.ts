import { describe, it, expect } from 'vitest';
import { getConfig } from '../config';
import { createRedis } from '../redis';
import { createRecommendationService } from '../runtime';
import { RecommendationService } from '../service';
import { silentLogger } from './helpers';

describe('createRedis', () => {
  it('returns null without a url', () => {
    expect(createRedis(null, silentLogger)).toBeNull();
    expect(createRedis('', silentLogger)).toBeNull();
  });

  it('rejects urls that are not redis urls', () => {
    expect(() => createRedis('http://localhost:6379', silentLogger)).toThrow(
      'REDIS_URL must start with redis:// or rediss://. Received "http://localhost:6379"'
    );
  });
});

describe('createRecommendationService', () => {
  it('wires a file-backed service when no redis url is configured', async () => {
    const { service, close } = createRecommendationService(getConfig({ CACHE_DIR: 'tmp-cache' }), silentLogger);
    expect(service).toBeInstanceOf(RecommendationService);
    await expect(close()).resolves.toBeUndefined();
  });
});
