import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import { POSITIONS, type Player, type Snapshot, type UpcomingFixture } from './models';

export const CACHE_TTL_MS = 15 * 60 * 1000;
export const SNAPSHOT_KEY = 'gameweek-snapshot';

export interface CacheEntry {
  /**
   * Epoch milliseconds at write time.
   */
  storedAt: number;
  data: unknown;
}

/**
 * Where cache entries live. Reads of missing or damaged entries return null.
 */
export interface CacheStore {
  read(key: string): Promise<CacheEntry | null>;
  write(key: string, entry: CacheEntry): Promise<void>;
}

function parseEntry(text: string): CacheEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  if (!('storedAt' in parsed) || !('data' in parsed)) return null;
  if (typeof parsed.storedAt !== 'number' || !Number.isFinite(parsed.storedAt)) return null;
  return { storedAt: parsed.storedAt, data: parsed.data };
}

/**
 * One JSON file per key under a directory.
 */
export class FileCacheStore implements CacheStore {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  private fileFor(key: string): string {
    return path.join(this.directory, `${key.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`);
  }

  async read(key: string): Promise<CacheEntry | null> {
    const file = this.fileFor(key);
    let text: string;
    try {
      text = await fs.promises.readFile(file, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      this.logger.warn('Cache file %s unreadable, treating as miss: %s', file, errorMessage(err));
      return null;
    }

    const entry = parseEntry(text);
    if (!entry) this.logger.warn('Cache file %s is corrupt, treating as miss', file);
    return entry;
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    await fs.promises.writeFile(this.fileFor(key), JSON.stringify(entry), 'utf8');
  }
}

// The subset of the ioredis client the cache needs.
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export const REDIS_PREFIX = 'fpl-recommender:cache';

/**
 * Cache entries stored as JSON strings in Redis.
 */
export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly redis: KeyValueClient,
    private readonly logger: Logger
  ) {}

  async read(key: string): Promise<CacheEntry | null> {
    const redisKey = `${REDIS_PREFIX}:${key}`;
    let text: string | null;
    try {
      text = await this.redis.get(redisKey);
    } catch (err) {
      this.logger.warn('Redis read of %s failed, treating as miss: %s', redisKey, errorMessage(err));
      return null;
    }
    if (text === null) return null;

    const entry = parseEntry(text);
    if (!entry) this.logger.warn('Redis entry %s is corrupt, treating as miss', redisKey);
    return entry;
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    await this.redis.set(`${REDIS_PREFIX}:${key}`, JSON.stringify(entry));
  }
}

export interface SnapshotCacheOptions<T> {
  store: CacheStore;
  logger: Logger;
  /**
   * Checks that stored data still has the expected shape.
   */
  guard: (data: unknown) => data is T;
  ttlMs?: number;
  now?: () => number;
}

/**
 * Timestamp-checked read/write over a CacheStore. Entries younger than the
 * TTL are returned; anything else is a miss and the caller refetches.
 */
export class SnapshotCache<T> {
  private readonly store: CacheStore;
  private readonly logger: Logger;
  private readonly guard: (data: unknown) => data is T;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SnapshotCacheOptions<T>) {
    this.store = options.store;
    this.logger = options.logger;
    this.guard = options.guard;
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<T | null> {
    const entry = await this.store.read(key);
    if (!entry) return null;

    const age = this.now() - entry.storedAt;
    if (age < 0 || age >= this.ttlMs) {
      this.logger.debug('Cache entry %s is stale (%ds old)', key, Math.round(age / 1000));
      return null;
    }
    if (!this.guard(entry.data)) {
      this.logger.warn('Cache entry %s has an unexpected shape, treating as miss', key);
      return null;
    }
    return entry.data;
  }

  /**
   * Overwrite the entry. A failed write is logged; the data is still usable.
   */
  async put(key: string, data: T): Promise<void> {
    try {
      await this.store.write(key, { storedAt: this.now(), data });
    } catch (err) {
      this.logger.warn('Cache write of %s failed: %s', key, errorMessage(err));
    }
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isUpcomingFixture(v: unknown): v is UpcomingFixture {
  return (
    isRecord(v) &&
    typeof v.opponentTeamId === 'number' &&
    typeof v.isHome === 'boolean' &&
    typeof v.difficulty === 'number' &&
    typeof v.opponentStrength === 'number'
  );
}

function isPlayer(v: unknown): v is Player {
  if (!isRecord(v)) return false;
  return (
    typeof v.id === 'number' &&
    typeof v.name === 'string' &&
    typeof v.fullName === 'string' &&
    typeof v.teamId === 'number' &&
    typeof v.teamName === 'string' &&
    typeof v.teamShort === 'string' &&
    typeof v.price === 'number' &&
    typeof v.form === 'number' &&
    typeof v.pointsPerGame === 'number' &&
    typeof v.ictIndex === 'number' &&
    typeof v.selectedByPercent === 'number' &&
    (v.chanceOfPlaying === null || typeof v.chanceOfPlaying === 'number') &&
    (v.expectedPoints === undefined || typeof v.expectedPoints === 'number') &&
    POSITIONS.some((p) => p === v.position) &&
    (v.availability === 'available' || v.availability === 'doubtful' || v.availability === 'unavailable') &&
    Array.isArray(v.upcoming) &&
    v.upcoming.every(isUpcomingFixture)
  );
}

export function isSnapshot(v: unknown): v is Snapshot {
  return isRecord(v) && typeof v.fetchedAt === 'string' && Array.isArray(v.players) && v.players.every(isPlayer);
}
