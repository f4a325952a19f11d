// ──────────────────────────────────────────
// Analytics domain: barrel export
// ──────────────────────────────────────────

export { WindowStatsService } from './window-stats';
export { RankChangeService, diffRankSnapshots } from './rank-changes';
export { createAnalyticsRoutes } from './routes';
