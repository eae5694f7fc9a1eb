import type { Server } from 'http';
import axios from 'axios';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SnapshotCache, isSnapshot } from '../../lib/cache';
import { UpstreamError } from '../../lib/errors';
import type { Snapshot } from '../../lib/models';
import { RecommendationService } from '../../lib/service';
import { FakeSource, MemoryCacheStore, sampleBootstrap, sampleFixtures, silentLogger } from '../../lib/tests/helpers';
import { createApp } from '../src/app';

const SNAPSHOT_AT = '2026-10-19T12:00:00.000Z';

let server: Server;
let source: FakeSource;
let http: ReturnType<typeof axios.create>;

beforeEach(async () => {
  source = new FakeSource(sampleBootstrap(), sampleFixtures());
  const cache = new SnapshotCache<Snapshot>({
    store: new MemoryCacheStore(),
    logger: silentLogger,
    guard: isSnapshot,
    now: () => Date.parse(SNAPSHOT_AT),
  });
  const service = new RecommendationService({
    source,
    cache,
    logger: silentLogger,
    now: () => new Date(SNAPSHOT_AT),
  });
  const app = createApp({ service, logger: silentLogger });

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

const rocha = { id: 12, name: 'Rocha', team: 'BRE', pos: 'DEF', price: 5, score: 6.55, form: 5, ppg: 5, fixtureOutlook: 1.5, value: 1, cumSpend: 5 };
const muller = { id: 13, name: 'Müller', team: 'BRE', pos: 'MID', price: 6, score: 8.2, form: 6, ppg: 6, fixtureOutlook: 1.5, value: 1, cumSpend: 11 };

describe('GET /health', () => {
  it('reports ok', async () => {
    const res = await http.get('/health');
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ ok: true });
    expect(source.bootstrapCalls).toBe(0);
  });
});

describe('GET /recommend', () => {
  it('returns the recommended roster', async () => {
    const res = await http.get('/recommend', { params: { budget: '12.5', need: '2:1,3:1' } });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ items: [rocha, muller], totalCost: 11, remaining: 1.5, snapshotAt: SNAPSHOT_AT });
  });

  it('leaves out excluded players', async () => {
    const res = await http.get('/recommend', { params: { budget: '12.5', need: '3:1', exclude: '13' } });
    expect(res.status).toBe(200);
    expect(res.data.items.map((r: { id: number }) => r.id)).toEqual([14]);
  });

  it('rejects max_from_team above three before scoring', async () => {
    const res = await http.get('/recommend', { params: { budget: '10', need: '2:1', max_from_team: '5' } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Invalid request', details: ['max_from_team must be an integer from 1 to 3'] });
    expect(source.bootstrapCalls).toBe(0);
  });

  it('rejects a malformed budget and need', async () => {
    const res = await http.get('/recommend', { params: { budget: 'abc', need: '2-1' } });
    expect(res.status).toBe(400);
    expect(res.data.details).toEqual([
      'budget "abc" is not a non-negative number',
      'need entry "2-1" is not in position:count form',
    ]);
  });

  it('reports an infeasible request distinctly', async () => {
    const res = await http.get('/recommend', { params: { budget: '3', need: '2:1' } });
    expect(res.status).toBe(422);
    expect(res.data).toEqual({
      error: 'no feasible roster',
      shortfalls: [{ position: 'DEF', required: 1, filled: 0 }],
      snapshotAt: SNAPSHOT_AT,
    });
  });

  it('returns an empty roster when nothing is needed', async () => {
    const res = await http.get('/recommend', { params: { budget: '10', need: '2:0' } });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ items: [], totalCost: 0, remaining: 10, snapshotAt: SNAPSHOT_AT });
  });

  it('returns full player records with compact=false', async () => {
    const res = await http.get('/recommend', { params: { budget: '12.5', need: '2:1,3:1', compact: 'false' } });
    expect(res.status).toBe(200);
    expect(res.data.items.map((p: { id: number }) => p.id)).toEqual([12, 13]);
    expect(res.data.items[0]).toMatchObject({
      id: 12,
      fullName: 'Rui Rocha',
      teamShort: 'BRE',
      position: 'DEF',
      price: 5,
      availability: 'doubtful',
      chanceOfPlaying: 75,
      riskPenalty: 0,
      fixtureOutlook: 1.5,
      upcoming: [{ opponentTeamId: 1, isHome: false, difficulty: 4, opponentStrength: 5 }],
    });
    expect(res.data.totalCost).toBe(11);
  });

  it('rejects a compact flag that is not a boolean', async () => {
    const res = await http.get('/recommend', { params: { budget: '12.5', need: '2:1', compact: 'maybe' } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Invalid request', details: ['compact must be true or false'] });
  });

  it('switches to CSV with format=csv', async () => {
    const res = await http.get('/recommend', {
      params: { budget: '12.5', need: '2:1,3:1', format: 'csv' },
      responseType: 'text',
    });
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.data.split('\n')).toHaveLength(3);
  });

  it('maps upstream failures to 502', async () => {
    source.failWith = new UpstreamError('/bootstrap-static/', 503, 'Request failed with status code 503');
    const res = await http.get('/recommend', { params: { budget: '10', need: '2:1' } });
    expect(res.status).toBe(502);
    expect(res.data).toEqual({
      error: 'Upstream error',
      message: 'FPL API request to /bootstrap-static/ failed: Request failed with status code 503',
    });
  });

  it('serves repeated requests from the cache', async () => {
    const a = await http.get('/recommend', { params: { budget: '12.5', need: '2:1,3:1' } });
    const b = await http.get('/recommend', { params: { budget: '12.5', need: '2:1,3:1' } });
    expect(b.data).toEqual(a.data);
    expect(source.bootstrapCalls).toBe(1);
  });
});

describe('GET /recommend.csv', () => {
  it('returns the roster as a CSV attachment', async () => {
    const res = await http.get('/recommend.csv', {
      params: { budget: '12.5', need: '2:1,3:1' },
      responseType: 'text',
    });
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="recommendations.csv"');
    expect(res.data).toBe(
      [
        'id,name,team,pos,price,score,form,ppg,fixtureOutlook,value,cumSpend',
        '12,Rocha,BRE,DEF,5,6.55,5,5,1.5,1,5',
        '13,Müller,BRE,MID,6,8.2,6,6,1.5,1,11',
      ].join('\n')
    );
  });
});

describe('POST /recommend', () => {
  it('accepts the parameters as JSON', async () => {
    const res = await http.post('/recommend', { budget: 12.5, need: '2:1,3:1', max_from_team: 3 });
    expect(res.status).toBe(200);
    expect(res.data.items).toEqual([rocha, muller]);
  });

  it('rejects a body that is not JSON', async () => {
    const res = await http.post('/recommend', '{"budget": 1', { headers: { 'Content-Type': 'application/json' } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Invalid request', details: ['body is not valid JSON'] });
  });
});

describe('GET /search', () => {
  it('looks players up by name', async () => {
    const res = await http.get('/search', { params: { query: 'rocha' } });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      items: [{ id: 12, name: 'Rocha', fullName: 'Rui Rocha', team: 'BRE', position: 'DEF', price: 5, availability: 'doubtful' }],
    });
  });

  it('requires a query', async () => {
    const res = await http.get('/search');
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Invalid request', details: ['query is required'] });
  });
});

describe('POST /reload-data', () => {
  it('refetches even with a fresh cache', async () => {
    await http.get('/search', { params: { query: 'ode' } });
    const res = await http.post('/reload-data');
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ ok: true, players: 6, snapshotAt: SNAPSHOT_AT });
    expect(source.bootstrapCalls).toBe(2);
  });
});
