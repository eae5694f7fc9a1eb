// lib/scoring.ts
import type { Player, ScoredPlayer, UpcomingFixture } from './models';

export const WEIGHTS = {
  form: 0.4,
  pointsPerGame: 0.25,
  fixtureOutlook: 0.2,
  ictIndex: 0.1,
  expectedPoints: 0.05,
} as const;

// Chance of playing (percent) at or above which a doubtful player costs nothing.
const RISK_FREE_CHANCE = 60;

/**
 * Outlook of a single fixture. Difficulty and opponent strength are both on
 * a 1..5 scale and inverted so that easier games score higher; a home game
 * adds a small bonus. Range is 0.9 (hardest away) to 4.7 (easiest home).
 */
export function fixtureScore(fx: UpcomingFixture): number {
  const invDifficulty = 6 - fx.difficulty;
  const invOpponent = 6 - fx.opponentStrength;
  const homeBoost = fx.isHome ? 0.2 : 0;
  return invDifficulty * 0.6 + invOpponent * 0.3 + homeBoost;
}

export function fixtureOutlook(upcoming: UpcomingFixture[]): number {
  if (upcoming.length === 0) return 0;
  const total = upcoming.reduce((sum, fx) => sum + fixtureScore(fx), 0);
  return total / upcoming.length;
}

/**
 * Zero unless the player is doubtful. Below a 60% chance of playing the
 * penalty grows linearly to -1 at 0%. An unknown chance costs nothing.
 */
export function riskPenalty(player: Pick<Player, 'availability' | 'chanceOfPlaying'>): number {
  if (player.availability !== 'doubtful' || player.chanceOfPlaying === null) return 0;
  const chance = Math.max(0, Math.min(100, player.chanceOfPlaying));
  const shortfall = Math.max(0, RISK_FREE_CHANCE - chance);
  return shortfall === 0 ? 0 : -shortfall / RISK_FREE_CHANCE;
}

export function valueRatio(player: Pick<Player, 'pointsPerGame' | 'price'>): number {
  if (player.price <= 0) return 0;
  return player.pointsPerGame / player.price;
}

export function scorePlayer(player: Player): ScoredPlayer {
  const outlook = fixtureOutlook(player.upcoming);
  const penalty = riskPenalty(player);

  const score =
    WEIGHTS.form * player.form +
    WEIGHTS.pointsPerGame * player.pointsPerGame +
    WEIGHTS.fixtureOutlook * outlook +
    WEIGHTS.ictIndex * player.ictIndex +
    WEIGHTS.expectedPoints * (player.expectedPoints ?? 0) +
    penalty;

  return {
    ...player,
    fixtureOutlook: outlook,
    riskPenalty: penalty,
    score,
    value: valueRatio(player),
  };
}

/**
 * Score every player that can play. Unavailable players are dropped rather
 * than penalised. Input order is preserved.
 */
export function scorePlayers(players: Player[]): ScoredPlayer[] {
  return players.filter((p) => p.availability !== 'unavailable').map(scorePlayer);
}
