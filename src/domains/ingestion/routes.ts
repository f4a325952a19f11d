// ──────────────────────────────────────────
// Ingestion: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { InvalidArgumentError } from '../../shared/errors';
import { INGEST_KINDS, isIngestKind } from '../../shared/types';
import { parseCountry } from '../../shared/validate';
import { queryNumber, queryString, route, sendOk } from '../../platform/http';
import { IngestionService } from './ingestion.service';

export function createIngestionRoutes(ingestionService: IngestionService, defaultCountry: string): Router {
  const router = Router();

  // GET /runs?country=GB: recent ingestion runs
  router.get('/runs', route(async (req: Request, res: Response) => {
    const country = queryString(req, 'country');
    sendOk(res, await ingestionService.listRuns(country), country?.toUpperCase());
  }));

  // POST /:kind?country=GB&days=30&date=YYYY-MM-DD: fetch on demand
  router.post('/:kind', route(async (req: Request, res: Response) => {
    const kind = String(req.params.kind);
    if (!isIngestKind(kind)) {
      throw new InvalidArgumentError(`Unsupported ingest kind: ${kind} (expected one of ${INGEST_KINDS.join(', ')})`);
    }
    const country = parseCountry(queryString(req, 'country') ?? defaultCountry);
    const run = await ingestionService.ingest({
      kind,
      country,
      days: queryNumber(req, 'days'),
      date: queryString(req, 'date'),
    });
    res.status(201);
    sendOk(res, run, country);
  }));

  return router;
}
