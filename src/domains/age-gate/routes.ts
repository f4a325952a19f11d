// ──────────────────────────────────────────
// Age-gate: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { parseCountry } from '../../shared/validate';
import { queryNumber, queryString, route, sendOk } from '../../platform/http';
import { AgeGateClassifier } from './classifier';

export function createAgeGateRoutes(classifier: AgeGateClassifier, defaultCountry: string): Router {
  const router = Router();

  // GET /top-domains?country=GB&date=2025-07-25&limit=10&category=Adult: snapshot with gate flags
  router.get('/top-domains', route(async (req: Request, res: Response) => {
    const country = parseCountry(queryString(req, 'country') ?? defaultCountry);
    const result = await classifier.classifyTopDomains({
      country,
      date: queryString(req, 'date'),
      limit: queryNumber(req, 'limit'),
      category: queryString(req, 'category'),
    });
    sendOk(res, result, country);
  }));

  // GET /age-gate/status?country=GB&date=...&limit=10: curated list vs. today's top-N
  router.get('/age-gate/status', route(async (req: Request, res: Response) => {
    const country = parseCountry(queryString(req, 'country') ?? defaultCountry);
    const report = await classifier.curatedStatus({
      country,
      date: queryString(req, 'date'),
      limit: queryNumber(req, 'limit'),
    });
    sendOk(res, report, country);
  }));

  // GET /age-gate/daily?country=GB&since=2025-07-24&until=...&limit=100
  router.get('/age-gate/daily', route(async (req: Request, res: Response) => {
    const country = parseCountry(queryString(req, 'country') ?? defaultCountry);
    const counts = await classifier.dailyGatedCounts({
      country,
      since: queryString(req, 'since'),
      until: queryString(req, 'until'),
      limit: queryNumber(req, 'limit'),
    });
    sendOk(res, counts, country);
  }));

  return router;
}
