import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { RequestValidationError } from '../../lib/errors';
import { toCsv, toRows } from '../../lib/format';
import { parseSelectionRequest, type RawSelectionParams } from '../../lib/params';
import type { Recommendation, RecommendationService } from '../../lib/service';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function handle(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function wantsCsv(req: Request): boolean {
  const format = req.query.format;
  if (typeof format === 'string' && format.toLowerCase() === 'csv') return true;
  return (req.headers.accept ?? '').toLowerCase().includes('text/csv');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function selectionParams(source: Record<string, unknown>): RawSelectionParams {
  return {
    budget: source.budget,
    need: source.need,
    exclude: source.exclude,
    max_from_team: source.max_from_team,
    top_per_pos: source.top_per_pos,
  };
}

// compact=false returns full scored player records instead of display rows.
function parseCompact(raw: unknown): boolean {
  if (raw === undefined || raw === '' || raw === true || raw === 'true' || raw === '1') return true;
  if (raw === false || raw === 'false' || raw === '0') return false;
  throw new RequestValidationError(['compact must be true or false']);
}

interface ResponseShape {
  csv: boolean;
  compact: boolean;
}

function sendRecommendation(res: Response, rec: Recommendation, budget: number, shape: ResponseShape): void {
  const { result, snapshotAt } = rec;

  if (result.kind === 'infeasible') {
    res.status(422).json({ error: 'no feasible roster', shortfalls: result.shortfalls, snapshotAt });
    return;
  }

  const players = result.kind === 'ok' ? result.players : [];

  if (shape.csv) {
    res.status(200).attachment('recommendations.csv').type('text/csv; charset=utf-8').send(toCsv(toRows(players)));
    return;
  }

  res.json({
    items: shape.compact ? toRows(players) : players,
    totalCost: result.kind === 'ok' ? result.totalCost : 0,
    remaining: result.kind === 'ok' ? result.remaining : budget,
    snapshotAt,
  });
}

export function createRouter(service: RecommendationService): Router {
  const router = Router();

  // GET /health - liveness only, never touches the upstream
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  // GET /recommend.csv - same as /recommend, always CSV
  router.get(
    '/recommend.csv',
    handle(async (req, res) => {
      const request = parseSelectionRequest(selectionParams(req.query));
      const rec = await service.recommend(request);
      sendRecommendation(res, rec, request.budget, { csv: true, compact: true });
    })
  );

  // GET /recommend?budget=7.5&need=2:1,3:1&exclude=1,2&max_from_team=3&top_per_pos=30[&compact=false]
  router.get(
    '/recommend',
    handle(async (req, res) => {
      const compact = parseCompact(req.query.compact);
      const request = parseSelectionRequest(selectionParams(req.query));
      const rec = await service.recommend(request);
      sendRecommendation(res, rec, request.budget, { csv: wantsCsv(req), compact });
    })
  );

  // POST /recommend - same parameters as a JSON body
  router.post(
    '/recommend',
    handle(async (req, res) => {
      const body: unknown = req.body;
      const fields: Record<string, unknown> = isRecord(body) ? body : {};
      const compact = parseCompact(fields.compact);
      const request = parseSelectionRequest(selectionParams(fields));
      const rec = await service.recommend(request);
      sendRecommendation(res, rec, request.budget, { csv: wantsCsv(req), compact });
    })
  );

  // GET /search?query=salah - player id lookup by name
  router.get(
    '/search',
    handle(async (req, res) => {
      const query = req.query.query ?? req.query.q;
      if (typeof query !== 'string' || !query.trim()) {
        throw new RequestValidationError(['query is required']);
      }
      const items = await service.search(query);
      res.json({ items });
    })
  );

  // POST /reload-data - bypass the cache and refetch
  router.post(
    '/reload-data',
    handle(async (_req, res) => {
      const snapshot = await service.loadSnapshot({ refresh: true });
      res.json({ ok: true, players: snapshot.players.length, snapshotAt: snapshot.fetchedAt });
    })
  );

  return router;
}
