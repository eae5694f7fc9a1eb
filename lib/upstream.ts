import axios, { type AxiosInstance } from 'axios';
import { UpstreamError, errorMessage } from './errors';
import type { Logger } from './logger';

// Raw FPL API shapes. Numeric stats arrive as strings ("5.3") and any field
// may be missing, so everything is optional and loosely typed here; the
// ingestion step turns these into fixed-shape records.
type Numeric = number | string | null;

export interface FplElement {
  id?: number;
  web_name?: string;
  first_name?: string;
  second_name?: string;
  team?: number;
  element_type?: number;
  now_cost?: Numeric;
  form?: Numeric;
  points_per_game?: Numeric;
  ict_index?: Numeric;
  ep_next?: Numeric;
  selected_by_percent?: Numeric;
  status?: string;
  chance_of_playing_next_round?: Numeric;
}

export interface FplTeam {
  id?: number;
  name?: string;
  short_name?: string;
  strength_overall_home?: Numeric;
  strength_overall_away?: Numeric;
}

export interface FplBootstrapStatic {
  elements?: FplElement[];
  teams?: FplTeam[];
}

export interface FplFixture {
  id?: number;
  event?: number | null;
  finished?: boolean;
  kickoff_time?: string | null;
  team_h?: number;
  team_a?: number;
  team_h_difficulty?: Numeric;
  team_a_difficulty?: Numeric;
}

/**
 * Source of raw FPL data. The HTTP client implements it; tests supply fakes.
 */
export interface FplSource {
  getBootstrapStatic(): Promise<FplBootstrapStatic>;
  getFixtures(): Promise<FplFixture[]>;
}

export interface FplClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

/**
 * FPL public API client. Failures surface as UpstreamError and are not retried.
 */
export class FplClient implements FplSource {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: FplClientOptions) {
    this.logger = options.logger;
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      headers: { Accept: 'application/json' },
    });
  }

  private async get<T>(endpoint: string): Promise<T> {
    const started = Date.now();
    try {
      const response = await this.http.get<T>(endpoint);
      this.logger.debug('Fetched %s in %dms', endpoint, Date.now() - started);
      if (response.data === null || typeof response.data !== 'object') {
        throw new UpstreamError(endpoint, response.status, 'response body is not JSON');
      }
      return response.data;
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      if (axios.isAxiosError(err)) {
        throw new UpstreamError(endpoint, err.response?.status ?? null, err.message);
      }
      throw new UpstreamError(endpoint, null, errorMessage(err));
    }
  }

  /**
   * Players, teams and positions.
   */
  async getBootstrapStatic(): Promise<FplBootstrapStatic> {
    const data = await this.get<FplBootstrapStatic>('/bootstrap-static/');
    if (!Array.isArray(data.elements) || !Array.isArray(data.teams)) {
      throw new UpstreamError('/bootstrap-static/', null, 'expected elements and teams arrays');
    }
    return data;
  }

  /**
   * All fixtures with difficulty ratings and home/away flags.
   */
  async getFixtures(): Promise<FplFixture[]> {
    const data = await this.get<FplFixture[]>('/fixtures/');
    if (!Array.isArray(data)) {
      throw new UpstreamError('/fixtures/', null, 'expected an array of fixtures');
    }
    return data;
  }
}
