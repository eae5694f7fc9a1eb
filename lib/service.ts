import { SNAPSHOT_KEY, type SnapshotCache } from './cache';
import { buildSnapshot, normalize } from './ingestion';
import type { Logger } from './logger';
import type {
  Availability,
  Position,
  RecommendationResult,
  SelectionRequest,
  Snapshot,
} from './models';
import { scorePlayers } from './scoring';
import { selectPlayers } from './selection';
import type { FplSource } from './upstream';

export interface SearchHit {
  id: number;
  name: string;
  fullName: string;
  team: string;
  position: Position;
  price: number;
  availability: Availability;
}

export interface Recommendation {
  result: RecommendationResult;
  snapshotAt: string;
}

export interface RecommendationServiceDeps {
  source: FplSource;
  cache: SnapshotCache<Snapshot>;
  logger: Logger;
  now?: () => Date;
}

/**
 * Fetch (through the cache), score and select. Each call works on its own
 * copy of the data; the cache is the only shared state.
 */
export class RecommendationService {
  private readonly source: FplSource;
  private readonly cache: SnapshotCache<Snapshot>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: RecommendationServiceDeps) {
    this.source = deps.source;
    this.cache = deps.cache;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async loadSnapshot(options: { refresh?: boolean } = {}): Promise<Snapshot> {
    if (!options.refresh) {
      const cached = await this.cache.get(SNAPSHOT_KEY);
      if (cached) {
        this.logger.debug('Using cached snapshot from %s', cached.fetchedAt);
        return cached;
      }
    }

    this.logger.info('Fetching bootstrap-static and fixtures');
    const bootstrap = await this.source.getBootstrapStatic();
    const fixtures = await this.source.getFixtures();

    const snapshot = buildSnapshot(bootstrap, fixtures, this.now());
    this.logger.info('Loaded %d players', snapshot.players.length);

    await this.cache.put(SNAPSHOT_KEY, snapshot);
    return snapshot;
  }

  async recommend(request: SelectionRequest, options: { refresh?: boolean } = {}): Promise<Recommendation> {
    const snapshot = await this.loadSnapshot(options);
    const scored = scorePlayers(snapshot.players);
    const result = selectPlayers(scored, request);

    if (result.kind === 'infeasible') {
      this.logger.info('No feasible roster: %j', result.shortfalls);
    } else if (result.kind === 'ok') {
      this.logger.info('Selected %d players for %s', result.players.length, result.totalCost.toFixed(1));
    }

    return { result, snapshotAt: snapshot.fetchedAt };
  }

  /**
   * Case and accent insensitive name lookup. Exact display-name matches come
   * first, then prefix matches, then any substring match.
   */
  async search(query: string, limit = 20): Promise<SearchHit[]> {
    const needle = normalize(query);
    if (!needle) return [];

    const snapshot = await this.loadSnapshot();

    const ranked: Array<{ rank: number; hit: SearchHit }> = [];
    for (const p of snapshot.players) {
      const short = normalize(p.name);
      const full = normalize(p.fullName);

      let rank: number;
      if (short === needle) rank = 0;
      else if (short.startsWith(needle) || full.startsWith(needle)) rank = 1;
      else if (short.includes(needle) || full.includes(needle)) rank = 2;
      else continue;

      ranked.push({
        rank,
        hit: {
          id: p.id,
          name: p.name,
          fullName: p.fullName,
          team: p.teamShort || p.teamName,
          position: p.position,
          price: p.price,
          availability: p.availability,
        },
      });
    }

    ranked.sort((a, b) => a.rank - b.rank || a.hit.name.localeCompare(b.hit.name) || a.hit.id - b.hit.id);
    return ranked.slice(0, limit).map((r) => r.hit);
  }
}
