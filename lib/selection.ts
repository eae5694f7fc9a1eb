import type {
  PositionNeed,
  RecommendationResult,
  ScoredPlayer,
  SelectionRequest,
  Shortfall,
} from './models';

// Prices are compared in tenths of a million so 0.1 steps add up exactly.
function tenths(price: number): number {
  return Math.round(price * 10);
}

/**
 * Score desc, then cheaper first, then original order.
 */
export function rankCandidates(pool: ScoredPlayer[]): ScoredPlayer[] {
  return pool
    .map((player, index) => ({ player, index }))
    .sort((a, b) => {
      if (b.player.score !== a.player.score) return b.player.score - a.player.score;
      if (a.player.price !== b.player.price) return a.player.price - b.player.price;
      return a.index - b.index;
    })
    .map(({ player }) => player);
}

// Cheapest possible cost (in tenths) of n players from the candidates.
function cheapestFill(candidates: ScoredPlayer[], n: number, skip: Set<number>): number {
  if (n <= 0) return 0;
  return candidates
    .filter((p) => !skip.has(p.id))
    .map((p) => tenths(p.price))
    .sort((a, b) => a - b)
    .slice(0, n)
    .reduce((sum, t) => sum + t, 0);
}

function requestedTotal(needs: PositionNeed[]): number {
  return needs.reduce((sum, n) => sum + Math.max(0, n.count), 0);
}

/**
 * Greedy fill per position bucket under the budget and the per-team cap.
 *
 * Positions are filled in request order and each one walks its top
 * `topPerPosition` candidates by score. A candidate is only taken if the
 * money left still covers the cheapest fill of every slot that is still
 * open. There is no backtracking and that reserve ignores the team cap, so
 * the result is not a global optimum. Any unfilled position makes the whole
 * result infeasible; a partial roster is never returned.
 */
export function selectPlayers(pool: ScoredPlayer[], request: SelectionRequest): RecommendationResult {
  if (requestedTotal(request.needs) === 0) return { kind: 'empty' };

  const excluded = new Set(request.excludeIds);
  const ranked = rankCandidates(pool.filter((p) => !excluded.has(p.id)));
  const slots = request.needs
    .filter((need) => need.count > 0)
    .map((need) => ({
      need,
      candidates: ranked.filter((p) => p.position === need.position).slice(0, request.topPerPosition),
    }));

  // Floor so a budget like 12.55 never admits a 12.6 spend.
  const budget = Math.floor(request.budget * 10 + 1e-9);
  const selected: ScoredPlayer[] = [];
  const pickedIds = new Set<number>();
  const teamCounts = new Map<number, number>();
  const shortfalls: Shortfall[] = [];
  let spend = 0;

  slots.forEach(({ need, candidates }, slotIndex) => {
    const laterReserve = slots
      .slice(slotIndex + 1)
      .reduce((sum, later) => sum + cheapestFill(later.candidates, later.need.count, pickedIds), 0);

    let filled = 0;
    for (const candidate of candidates) {
      if (filled >= need.count) break;
      if (pickedIds.has(candidate.id)) continue;

      const price = tenths(candidate.price);
      const ownReserve = cheapestFill(
        candidates,
        need.count - filled - 1,
        new Set([...pickedIds, candidate.id])
      );
      if (spend + price + ownReserve + laterReserve > budget) continue;

      const fromTeam = teamCounts.get(candidate.teamId) ?? 0;
      if (fromTeam >= request.maxFromTeam) continue;

      selected.push(candidate);
      pickedIds.add(candidate.id);
      teamCounts.set(candidate.teamId, fromTeam + 1);
      spend += price;
      filled++;
    }

    if (filled < need.count) {
      shortfalls.push({ position: need.position, required: need.count, filled });
    }
  });

  if (shortfalls.length > 0) return { kind: 'infeasible', shortfalls };

  return {
    kind: 'ok',
    players: selected,
    totalCost: spend / 10,
    remaining: Number((request.budget - spend / 10).toFixed(2)),
  };
}
