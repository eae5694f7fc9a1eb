import type { CacheEntry, CacheStore } from '../cache';
import { createLogger } from '../logger';
import type { Player, ScoredPlayer } from '../models';
import type { FplBootstrapStatic, FplFixture, FplSource } from '../upstream';

export const silentLogger = createLogger('test', { level: 'error', silent: true });

export function makePlayer(overrides: Partial<Player> = {}): Player {
  return {
    id: 1,
    name: 'Player',
    fullName: 'Test Player',
    teamId: 1,
    teamName: 'Team 1',
    teamShort: 'T1',
    position: 'MID',
    price: 5,
    form: 0,
    pointsPerGame: 0,
    ictIndex: 0,
    availability: 'available',
    chanceOfPlaying: null,
    selectedByPercent: 0,
    upcoming: [],
    ...overrides,
  };
}

// Scored player with an explicit score, for selector tests.
export function makeScored(overrides: Partial<ScoredPlayer> & { id: number; score: number }): ScoredPlayer {
  return {
    ...makePlayer(),
    fixtureOutlook: 0,
    riskPenalty: 0,
    value: 0,
    ...overrides,
  };
}

export class MemoryCacheStore implements CacheStore {
  readonly entries = new Map<string, string>();
  writes = 0;

  async read(key: string): Promise<CacheEntry | null> {
    const text = this.entries.get(key);
    if (text === undefined) return null;
    const entry: CacheEntry = JSON.parse(text);
    return entry;
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    this.writes++;
    this.entries.set(key, JSON.stringify(entry));
  }
}

export class FakeSource implements FplSource {
  bootstrapCalls = 0;
  fixtureCalls = 0;
  failWith: Error | null = null;

  constructor(
    public bootstrap: FplBootstrapStatic,
    public fixtures: FplFixture[] = []
  ) {}

  async getBootstrapStatic(): Promise<FplBootstrapStatic> {
    this.bootstrapCalls++;
    if (this.failWith) throw this.failWith;
    return this.bootstrap;
  }

  async getFixtures(): Promise<FplFixture[]> {
    this.fixtureCalls++;
    if (this.failWith) throw this.failWith;
    return this.fixtures;
  }
}

/**
 * Small league: three teams, one fixture each way, six players.
 *  - 10 Keeper     GK  team 1  4.5  available
 *  - 11 Stone      DEF team 1  4.0  available
 *  - 12 Rocha      DEF team 2  5.0  doubtful 75%
 *  - 13 Müller     MID team 2  6.0  available
 *  - 14 Ode        MID team 3  4.5  available
 *  - 15 Benched    FWD team 3  7.5  injured
 */
export function sampleBootstrap(): FplBootstrapStatic {
  return {
    teams: [
      { id: 1, name: 'Arsenal', short_name: 'ARS', strength_overall_home: 1300, strength_overall_away: 1300 },
      { id: 2, name: 'Brentford', short_name: 'BRE', strength_overall_home: 1100, strength_overall_away: 1100 },
      { id: 3, name: 'Chelsea', short_name: 'CHE', strength_overall_home: 1200, strength_overall_away: 1200 },
    ],
    elements: [
      {
        id: 10, web_name: 'Keeper', first_name: 'Kim', second_name: 'Keeper', team: 1, element_type: 1,
        now_cost: 45, form: '2.0', points_per_game: '3.0', ict_index: '10.0', status: 'a',
        chance_of_playing_next_round: null, selected_by_percent: '5.0',
      },
      {
        id: 11, web_name: 'Stone', first_name: 'Sam', second_name: 'Stone', team: 1, element_type: 2,
        now_cost: 40, form: '4.0', points_per_game: '4.0', ict_index: '20.0', ep_next: '3.0', status: 'a',
        chance_of_playing_next_round: null, selected_by_percent: '10.0',
      },
      {
        id: 12, web_name: 'Rocha', first_name: 'Rui', second_name: 'Rocha', team: 2, element_type: 2,
        now_cost: 50, form: '5.0', points_per_game: '5.0', ict_index: '30.0', status: 'd',
        chance_of_playing_next_round: 75, selected_by_percent: '12.5',
      },
      {
        id: 13, web_name: 'Müller', first_name: 'Max', second_name: 'Müller', team: 2, element_type: 3,
        now_cost: 60, form: '6.0', points_per_game: '6.0', ict_index: '40.0', status: 'a',
        chance_of_playing_next_round: null, selected_by_percent: '20.0',
      },
      {
        id: 14, web_name: 'Ode', first_name: 'Olly', second_name: 'Ode', team: 3, element_type: 3,
        now_cost: 45, form: '3.0', points_per_game: '3.0', ict_index: '15.0', status: 'a',
        chance_of_playing_next_round: null, selected_by_percent: '1.0',
      },
      {
        id: 15, web_name: 'Benched', first_name: 'Ben', second_name: 'Benched', team: 3, element_type: 4,
        now_cost: 75, form: '9.0', points_per_game: '9.0', ict_index: '90.0', status: 'i',
        chance_of_playing_next_round: 0, selected_by_percent: '30.0',
      },
    ],
  };
}

export function sampleFixtures(): FplFixture[] {
  return [
    { id: 1, event: 1, finished: true, team_h: 1, team_a: 2, team_h_difficulty: 2, team_a_difficulty: 4 },
    { id: 2, event: 2, finished: false, team_h: 1, team_a: 2, team_h_difficulty: 2, team_a_difficulty: 4 },
    { id: 3, event: 2, finished: false, team_h: 3, team_a: 1, team_h_difficulty: 4, team_a_difficulty: 3 },
  ];
}
