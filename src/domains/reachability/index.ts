// ──────────────────────────────────────────
// Reachability domain: barrel export
// ──────────────────────────────────────────

export { ReachabilityService } from './reachability.service';
export { createReachabilityRoutes } from './routes';
