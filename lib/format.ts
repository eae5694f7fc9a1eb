import Papa from 'papaparse';
import type { Position, ScoredPlayer } from './models';

export interface CompactRow {
  id: number;
  name: string;
  team: string;
  pos: Position;
  price: number;
  score: number;
  form: number;
  ppg: number;
  fixtureOutlook: number;
  value: number;
  cumSpend: number;
}

export const COLUMNS: readonly (keyof CompactRow)[] = [
  'id',
  'name',
  'team',
  'pos',
  'price',
  'score',
  'form',
  'ppg',
  'fixtureOutlook',
  'value',
  'cumSpend',
];

function round(x: number, dp: number): number {
  const f = 10 ** dp;
  return Math.round(x * f) / f;
}

/**
 * Project selected players to the fields shown to users, with a running
 * spend total in selection order.
 */
export function toRows(players: ScoredPlayer[]): CompactRow[] {
  let spend = 0;
  return players.map((p) => {
    spend += Math.round(p.price * 10);
    return {
      id: p.id,
      name: p.name,
      team: p.teamShort || p.teamName || String(p.teamId),
      pos: p.position,
      price: round(p.price, 1),
      score: round(p.score, 2),
      form: round(p.form, 2),
      ppg: round(p.pointsPerGame, 2),
      fixtureOutlook: round(p.fixtureOutlook, 2),
      value: round(p.value, 3),
      cumSpend: spend / 10,
    };
  });
}

/**
 * Header line plus one line per row, without a trailing newline.
 */
export function toCsv(rows: CompactRow[]): string {
  const csv = Papa.unparse(
    {
      fields: [...COLUMNS],
      data: rows.map((r) => COLUMNS.map((c) => r[c])),
    },
    { newline: '\n' }
  );
  // unparse ends a header-only document with a newline
  return csv.endsWith('\n') ? csv.slice(0, -1) : csv;
}

/**
 * Plain text table with right-aligned numeric columns.
 */
export function toTable(rows: CompactRow[]): string {
  const header = COLUMNS.map(String);
  const body = rows.map((r) => COLUMNS.map((c) => String(r[c])));
  const numeric = COLUMNS.map((c) => rows.length > 0 && typeof rows[0][c] === 'number');

  const widths = header.map((h, i) => Math.max(h.length, ...body.map((cells) => cells[i].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, i) => (numeric[i] ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
      .join('  ')
      .trimEnd();

  return [line(header), ...body.map(line)].join('\n');
}
