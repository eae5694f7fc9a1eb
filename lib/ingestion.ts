import {
  POSITION_BY_CODE,
  type Availability,
  type Player,
  type Position,
  type Snapshot,
  type UpcomingFixture,
} from './models';
import type { FplBootstrapStatic, FplElement, FplFixture, FplTeam } from './upstream';

export const FIXTURE_HORIZON = 3;
const NEUTRAL_STRENGTH = 3;

export function normalize(s: unknown): string {
  return String(s ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}

export function toNumber(raw: unknown, fallback = 0): number {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : fallback;
  if (typeof raw === 'string' && raw.trim() !== '') {
    const n = Number(raw);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}

// Entries of an upstream array that are not objects are dropped.
function records<T extends object>(items: T[] | undefined): T[] {
  if (!Array.isArray(items)) return [];
  return items.filter((item): item is T => typeof item === 'object' && item !== null);
}

function optionalNumber(raw: unknown): number | undefined {
  const n = toNumber(raw, Number.NaN);
  return Number.isNaN(n) ? undefined : n;
}

export function mapPosition(elementType: unknown): Position | null {
  if (typeof elementType !== 'number') return null;
  return POSITION_BY_CODE[elementType] ?? null;
}

// a = available, d = doubtful; injured, suspended, unavailable and
// not-in-squad codes all count as unavailable.
export function mapAvailability(status: unknown): Availability {
  if (status === 'a') return 'available';
  if (status === 'd') return 'doubtful';
  return 'unavailable';
}

/**
 * Average home/away strength per team, rescaled linearly onto 1..5.
 * A league where every team has the same strength maps to 3.
 */
export function teamStrengths(teams: FplTeam[]): Map<number, number> {
  const raw = new Map<number, number>();
  for (const t of records(teams)) {
    if (typeof t.id !== 'number') continue;
    const home = toNumber(t.strength_overall_home, NEUTRAL_STRENGTH);
    const away = toNumber(t.strength_overall_away, NEUTRAL_STRENGTH);
    raw.set(t.id, (home + away) / 2);
  }

  const values = [...raw.values()];
  const lo = Math.min(...values);
  const hi = Math.max(...values);

  const scaled = new Map<number, number>();
  for (const [id, v] of raw) {
    scaled.set(id, hi === lo ? NEUTRAL_STRENGTH : 1 + (4 * (v - lo)) / (hi - lo));
  }
  return scaled;
}

function clampDifficulty(v: number): number {
  return Math.max(1, Math.min(5, v));
}

/**
 * Next unfinished fixtures for every team, in upstream (kickoff) order.
 * Fixtures without difficulty ratings are skipped.
 */
export function upcomingByTeam(
  fixtures: FplFixture[],
  strengths: Map<number, number>,
  horizon = FIXTURE_HORIZON
): Map<number, UpcomingFixture[]> {
  const byTeam = new Map<number, UpcomingFixture[]>();

  const push = (teamId: number, fx: UpcomingFixture) => {
    const list = byTeam.get(teamId) ?? [];
    if (list.length >= horizon) return;
    list.push(fx);
    byTeam.set(teamId, list);
  };

  for (const fx of records(fixtures)) {
    if (fx.finished) continue;
    if (typeof fx.team_h !== 'number' || typeof fx.team_a !== 'number') continue;
    const homeDifficulty = optionalNumber(fx.team_h_difficulty);
    const awayDifficulty = optionalNumber(fx.team_a_difficulty);
    if (homeDifficulty === undefined || awayDifficulty === undefined) continue;

    push(fx.team_h, {
      opponentTeamId: fx.team_a,
      isHome: true,
      difficulty: clampDifficulty(homeDifficulty),
      opponentStrength: strengths.get(fx.team_a) ?? NEUTRAL_STRENGTH,
    });
    push(fx.team_a, {
      opponentTeamId: fx.team_h,
      isHome: false,
      difficulty: clampDifficulty(awayDifficulty),
      opponentStrength: strengths.get(fx.team_h) ?? NEUTRAL_STRENGTH,
    });
  }

  return byTeam;
}

function toPlayer(
  el: FplElement,
  teamsById: Map<number, FplTeam>,
  upcoming: Map<number, UpcomingFixture[]>
): Player | null {
  if (typeof el.id !== 'number') return null;
  const position = mapPosition(el.element_type);
  if (!position) return null;

  const teamId = typeof el.team === 'number' ? el.team : 0;
  const team = teamsById.get(teamId);
  const chance = optionalNumber(el.chance_of_playing_next_round);
  const fullName = [el.first_name, el.second_name].filter(Boolean).join(' ');

  const player: Player = {
    id: el.id,
    name: el.web_name || el.second_name || `Player ${el.id}`,
    fullName,
    teamId,
    teamName: team?.name ?? '',
    teamShort: team?.short_name ?? '',
    position,
    price: Math.max(0, toNumber(el.now_cost) / 10),
    form: toNumber(el.form),
    pointsPerGame: toNumber(el.points_per_game),
    ictIndex: toNumber(el.ict_index),
    availability: mapAvailability(el.status),
    chanceOfPlaying: chance === undefined ? null : chance,
    selectedByPercent: toNumber(el.selected_by_percent),
    upcoming: upcoming.get(teamId) ?? [],
  };

  const ep = optionalNumber(el.ep_next);
  if (ep !== undefined) player.expectedPoints = ep;

  return player;
}

/**
 * Turn the raw bootstrap and fixtures payloads into the snapshot the
 * recommender works from.
 */
export function buildSnapshot(
  bootstrap: FplBootstrapStatic,
  fixtures: FplFixture[],
  fetchedAt: Date
): Snapshot {
  const teams = records(bootstrap.teams);
  const teamsById = new Map<number, FplTeam>();
  for (const t of teams) {
    if (typeof t.id === 'number') teamsById.set(t.id, t);
  }

  const upcoming = upcomingByTeam(fixtures, teamStrengths(teams));

  const players: Player[] = [];
  for (const el of records(bootstrap.elements)) {
    const p = toPlayer(el, teamsById, upcoming);
    if (p) players.push(p);
  }

  return { fetchedAt: fetchedAt.toISOString(), players };
}
