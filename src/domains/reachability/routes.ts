// ──────────────────────────────────────────
// Reachability: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { queryList, queryNumber, queryString, route, sendOk } from '../../platform/http';
import { ReachabilityService } from './reachability.service';

export function createReachabilityRoutes(service: ReachabilityService, defaultCountry: string): Router {
  const router = Router();

  // GET /ooni/reachability?country=GB&tools=tor,snowflake&days=120 (or since/until YYYY-MM-DD)
  router.get('/ooni/reachability', route(async (req: Request, res: Response) => {
    const report = await service.report({
      country: queryString(req, 'country') ?? defaultCountry,
      tools: queryList(req, 'tools'),
      days: queryNumber(req, 'days'),
      since: queryString(req, 'since'),
      until: queryString(req, 'until'),
    });
    sendOk(res, report, report.country);
  }));

  return router;
}
