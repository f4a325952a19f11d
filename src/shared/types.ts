// ──────────────────────────────────────────
// Shared type definitions for Netwatch
// ──────────────────────────────────────────

export type Source = 'cloudflare' | 'ooni';
export type IngestKind = 'http' | 'l3' | 'bots' | 'top' | 'reachability';
export type RunStatus = 'running' | 'completed' | 'failed';
export type Sufficiency = 'ok' | 'low';
export type L3Direction = 'target' | 'origin';
export type ReachabilityTool = 'tor' | 'snowflake' | 'psiphon';

export const METRIC_NAMES = [
  'http_requests_norm',
  'l3_bytes_target',
  'l3_bytes_origin',
  'bot_traffic',
  'ooni_ok_rate_tor',
  'ooni_ok_rate_snowflake',
  'ooni_ok_rate_psiphon',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export const INGEST_KINDS: readonly IngestKind[] = ['http', 'l3', 'bots', 'top', 'reachability'];

export function isMetricName(value: string): value is MetricName {
  return METRIC_NAMES.some((m) => m === value);
}

export const REACHABILITY_TOOLS: readonly ReachabilityTool[] = ['tor', 'snowflake', 'psiphon'];

export function isReachabilityTool(value: string): value is ReachabilityTool {
  return REACHABILITY_TOOLS.some((t) => t === value);
}

export function isIngestKind(value: string): value is IngestKind {
  return INGEST_KINDS.some((k) => k === value);
}

/** A single observation. `timestamp` is an ISO-8601 UTC string. */
export interface MetricPoint {
  country: string;
  metric: MetricName;
  timestamp: string;
  value: number;
}

export interface StoredMetricPoint extends MetricPoint {
  source: Source;
  kind: IngestKind;
}

/** `date` is YYYY-MM-DD. */
export interface DomainRankEntry {
  country: string;
  date: string;
  rank: number;
  domain: string;
  category: string | null;
}

export interface EventLink {
  label: string;
  url: string;
}

export interface MeasurementEvent {
  slug: string;
  name: string;
  instant: Date;
  country: string;
  links: EventLink[];
}

/** One day of OONI results for a circumvention tool. `date` is YYYY-MM-DD. */
export interface ReachabilityDay {
  country: string;
  tool: ReachabilityTool;
  date: string;
  ok: number;
  tests: number;
  okRate: number;
}

export type GateStatus = boolean | 'unknown';

export interface AgeGateRecord {
  domain: string;
  category: string;
  gated: GateStatus;
  notes: string | null;
}

export interface IngestionRun {
  id: string;
  source: Source;
  kind: IngestKind;
  country: string;
  status: RunStatus;
  points: number;
  error: string | null;
  created_at: string;
  completed_at: string | null;
}

// ── Analytics results ──

export interface WindowSummary {
  start: string;
  end: string;
  count: number;
  mean: number | null;
  lowConfidence: boolean;
}

export interface ControlDetail {
  prePoints: number;
  postPoints: number;
}

export interface WindowStatsResult {
  country: string;
  metric: MetricName;
  event: { slug: string; name: string; instant: string };
  windowDays: number;
  pre: WindowSummary;
  post: WindowSummary;
  trafficShiftIndex: number | null;
  sufficiency: Sufficiency;
  controls: string[];
  controlsDetail: Record<string, ControlDetail>;
  zScoreVsControls: number | null;
}

export type RankChangeStatus = 'moved' | 'unchanged' | 'new_entrant' | 'dropped_out';

export interface RankChange {
  domain: string;
  rankA: number | null;
  rankB: number | null;
  delta: number | null;
  status: RankChangeStatus;
}

export interface ClassifiedDomain {
  entry: DomainRankEntry;
  gated: GateStatus;
  notes: string | null;
}

export interface DailyGateCount {
  date: string;
  gated: number;
  unknown: number;
  notGated: number;
}

export interface ReachabilityReport {
  country: string;
  tools: ReachabilityTool[];
  since: string;
  until: string;
  series: Partial<Record<ReachabilityTool, ReachabilityDay[]>>;
  latestOkRate: Partial<Record<ReachabilityTool, number | null>>;
}

export interface CuratedStatusRow {
  domain: string;
  category: string;
  gated: GateStatus;
  notes: string | null;
  inTop: boolean;
  rank: number | null;
}

export interface CuratedStatusReport {
  country: string;
  date: string | null;
  limit: number;
  results: CuratedStatusRow[];
  counts: { gated: number; unknown: number; notGated: number; inTop: number };
}
