export type Position = 'GK' | 'DEF' | 'MID' | 'FWD';

export type Availability = 'available' | 'doubtful' | 'unavailable';

// Upstream element_type ids. 1=GK, 2=DEF, 3=MID, 4=FWD
export const POSITION_BY_CODE: Record<number, Position> = {
  1: 'GK',
  2: 'DEF',
  3: 'MID',
  4: 'FWD',
};

export const POSITIONS: readonly Position[] = ['GK', 'DEF', 'MID', 'FWD'];

// Game rule: a squad may hold at most three players from one club.
export const MAX_FROM_TEAM = 3;

export interface UpcomingFixture {
  opponentTeamId: number;
  isHome: boolean;
  /**
   * Fixture difficulty rating from this player's side, 1 (easiest) to 5.
   */
  difficulty: number;
  /**
   * Opponent overall strength rescaled to 1 (weakest) .. 5 (strongest).
   */
  opponentStrength: number;
}

// A player as the recommender sees it. Every field is filled at ingestion so
// scoring never has to deal with missing keys.
export interface Player {
  id: number;
  /**
   * Short display name (upstream web_name).
   */
  name: string;
  fullName: string;
  teamId: number;
  teamName: string;
  teamShort: string;
  position: Position;
  /**
   * Price in millions, never negative.
   */
  price: number;
  form: number;
  pointsPerGame: number;
  ictIndex: number;
  availability: Availability;
  /**
   * Percent chance of playing next round, or null when the upstream has no news.
   */
  chanceOfPlaying: number | null;
  expectedPoints?: number;
  selectedByPercent: number;
  upcoming: UpcomingFixture[];
}

export interface ScoredPlayer extends Player {
  fixtureOutlook: number;
  riskPenalty: number;
  score: number;
  /**
   * Points per game per million; 0 when the price is 0.
   */
  value: number;
}

// What gets cached: the fully ingested player set and when it was fetched.
export interface Snapshot {
  fetchedAt: string;
  players: Player[];
}

export interface PositionNeed {
  position: Position;
  count: number;
}

export interface SelectionRequest {
  budget: number;
  needs: PositionNeed[];
  excludeIds: number[];
  maxFromTeam: number;
  topPerPosition: number;
}

export interface Shortfall {
  position: Position;
  required: number;
  filled: number;
}

export type RecommendationResult =
  | { kind: 'ok'; players: ScoredPlayer[]; totalCost: number; remaining: number }
  | { kind: 'empty' }
  | { kind: 'infeasible'; shortfalls: Shortfall[] };
