import { RequestValidationError } from './errors';
import { MAX_FROM_TEAM, POSITION_BY_CODE, type PositionNeed, type SelectionRequest } from './models';

export const DEFAULT_TOP_PER_POSITION = 30;
export const MAX_TOP_PER_POSITION = 100;

// Parameters as they arrive from a query string, a JSON body or the CLI.
export interface RawSelectionParams {
  budget?: unknown;
  need?: unknown;
  exclude?: unknown;
  max_from_team?: unknown;
  top_per_pos?: unknown;
}

function asText(v: unknown): string | undefined {
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  if (typeof v === 'string') return v.trim();
  return undefined;
}

function parseDecimal(v: unknown): number | null {
  const s = asText(v);
  if (!s || !/^\d+(\.\d+)?$/.test(s)) return null;
  return Number(s);
}

function parseInteger(v: unknown): number | null {
  const s = asText(v);
  if (!s || !/^\d+$/.test(s)) return null;
  return Number(s);
}

/**
 * Parse "2:1,3:2,4:1" (1 DEF, 2 MID, 1 FWD). Position codes follow the FPL
 * element types: 1=GK, 2=DEF, 3=MID, 4=FWD. A bare code counts as one
 * player; repeated codes add up. Order of first appearance is kept.
 */
export function parseNeed(raw: string, errors: string[]): PositionNeed[] {
  const counts = new Map<number, number>();
  const parts = raw
    .replace(/;/g, ',')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);

  if (parts.length === 0) {
    errors.push('need must list at least one position:count pair');
    return [];
  }

  for (const part of parts) {
    const m = part.match(/^(\d+)\s*(?::\s*(\d+))?$/);
    if (!m) {
      errors.push(`need entry "${part}" is not in position:count form`);
      continue;
    }
    const code = Number(m[1]);
    const count = m[2] === undefined ? 1 : Number(m[2]);
    if (!POSITION_BY_CODE[code]) {
      errors.push(`need position ${code} is not one of 1 (GK), 2 (DEF), 3 (MID), 4 (FWD)`);
      continue;
    }
    counts.set(code, (counts.get(code) ?? 0) + count);
  }

  return [...counts].map(([code, count]) => ({ position: POSITION_BY_CODE[code], count }));
}

export function parseExclude(raw: unknown, errors: string[]): number[] {
  if (raw === undefined || raw === null || raw === '') return [];

  const tokens: unknown[] = Array.isArray(raw)
    ? raw
    : typeof raw === 'string'
      ? raw.replace(/;/g, ',').split(',').map((t) => t.trim()).filter(Boolean)
      : [raw];

  const ids: number[] = [];
  for (const tok of tokens) {
    const id = parseInteger(tok);
    if (id === null || id <= 0) {
      errors.push(`exclude entry "${String(tok)}" is not a player id`);
      continue;
    }
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

/**
 * Validate and normalise selection parameters. Every problem is collected
 * and reported at once.
 */
export function parseSelectionRequest(params: RawSelectionParams): SelectionRequest {
  const errors: string[] = [];

  let budget = 0;
  if (params.budget === undefined || params.budget === '') {
    errors.push('budget is required');
  } else {
    const b = parseDecimal(params.budget);
    if (b === null) errors.push(`budget "${String(params.budget)}" is not a non-negative number`);
    else budget = b;
  }

  let needs: PositionNeed[] = [];
  const needText = asText(params.need);
  if (needText === undefined || needText === '') {
    errors.push('need is required, e.g. need=2:1,3:1');
  } else {
    needs = parseNeed(needText, errors);
  }

  const excludeIds = parseExclude(params.exclude, errors);

  let maxFromTeam = MAX_FROM_TEAM;
  if (params.max_from_team !== undefined && params.max_from_team !== '') {
    const m = parseInteger(params.max_from_team);
    if (m === null || m < 1 || m > MAX_FROM_TEAM) {
      errors.push(`max_from_team must be an integer from 1 to ${MAX_FROM_TEAM}`);
    } else {
      maxFromTeam = m;
    }
  }

  let topPerPosition = DEFAULT_TOP_PER_POSITION;
  if (params.top_per_pos !== undefined && params.top_per_pos !== '') {
    const t = parseInteger(params.top_per_pos);
    if (t === null || t < 1 || t > MAX_TOP_PER_POSITION) {
      errors.push(`top_per_pos must be an integer from 1 to ${MAX_TOP_PER_POSITION}`);
    } else {
      topPerPosition = t;
    }
  }

  if (errors.length > 0) throw new RequestValidationError(errors);

  return { budget, needs, excludeIds, maxFromTeam, topPerPosition };
}
