// ──────────────────────────────────────────
// Analytics: Window statistics around an event
// ──────────────────────────────────────────

import { EventRegistry, TimeSeriesReader } from '../../shared/contracts';
import { addDays, parseCountry, parseDayCount, parseMetric } from '../../shared/validate';
import { ControlDetail, MetricPoint, WindowStatsResult, WindowSummary } from '../../shared/types';

export interface WindowStatsOptions {
  defaultWindowDays: number;
  minWindowPoints: number;
}

export interface WindowStatsParams {
  country: string;
  metric: string;
  eventSlug: string;
  windowDays?: number;
  controls?: string[];
}

export interface EventWindows {
  preStart: Date;
  instant: Date;
  postEnd: Date;
}

export class WindowStatsService {
  constructor(
    private store: TimeSeriesReader,
    private events: EventRegistry,
    private options: WindowStatsOptions
  ) {}

  async computeWindowStats(params: WindowStatsParams): Promise<WindowStatsResult> {
    const country = parseCountry(params.country);
    const metric = parseMetric(params.metric);
    const windowDays = parseDayCount(params.windowDays ?? this.options.defaultWindowDays, 'window_days');
    const controls = dedupe((params.controls ?? []).map(parseCountry).filter((c) => c !== country));
    const event = this.events.resolve(params.eventSlug);

    const windows: EventWindows = {
      preStart: addDays(event.instant, -windowDays),
      instant: event.instant,
      postEnd: addDays(event.instant, windowDays),
    };

    // One read spanning both windows, split in memory
    const points = await this.store.queryPoints(country, metric, windows.preStart, windows.postEnd);
    const { pre, post } = partition(points, windows);

    const preSummary = summarize(pre, windows.preStart, windows.instant, this.options.minWindowPoints);
    const postSummary = summarize(post, windows.instant, windows.postEnd, this.options.minWindowPoints);

    const controlsDetail: Record<string, ControlDetail> = {};
    let zScoreVsControls: number | null = null;

    if (controls.length > 0) {
      const controlSeries = await Promise.all(
        controls.map((c) => this.store.queryPoints(c, metric, windows.preStart, windows.postEnd))
      );
      const split = controlSeries.map((series) => partition(series, windows));
      controls.forEach((c, i) => {
        const s = split[i];
        controlsDetail[c] = { prePoints: s?.pre.length ?? 0, postPoints: s?.post.length ?? 0 };
      });
      zScoreVsControls = zScoreVsSyntheticControl({ pre, post }, split);
    }

    return {
      country,
      metric,
      event: { slug: event.slug, name: event.name, instant: event.instant.toISOString() },
      windowDays,
      pre: preSummary,
      post: postSummary,
      trafficShiftIndex: trafficShiftIndex(preSummary.mean, postSummary.mean),
      sufficiency: preSummary.lowConfidence || postSummary.lowConfidence ? 'low' : 'ok',
      controls,
      controlsDetail,
      zScoreVsControls,
    };
  }
}

// ── Helpers ──

export interface Split {
  pre: MetricPoint[];
  post: MetricPoint[];
}

/** pre = [preStart, instant), post = [instant, postEnd] */
export function partition(points: MetricPoint[], windows: EventWindows): Split {
  const preStart = windows.preStart.getTime();
  const instant = windows.instant.getTime();
  const postEnd = windows.postEnd.getTime();
  const pre: MetricPoint[] = [];
  const post: MetricPoint[] = [];

  for (const p of points) {
    const t = Date.parse(p.timestamp);
    if (isNaN(t)) continue;
    if (t >= preStart && t < instant) pre.push(p);
    else if (t >= instant && t <= postEnd) post.push(p);
  }
  return { pre, post };
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function populationStdDev(values: number[]): number | null {
  const m = mean(values);
  if (m === null) return null;
  return Math.sqrt(values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length);
}

export function trafficShiftIndex(preMean: number | null, postMean: number | null): number | null {
  if (preMean === null || postMean === null || preMean === 0) return null;
  return (postMean - preMean) / preMean;
}

function summarize(points: MetricPoint[], start: Date, end: Date, minPoints: number): WindowSummary {
  return {
    start: start.toISOString(),
    end: end.toISOString(),
    count: points.length,
    mean: mean(points.map((p) => p.value)),
    lowConfidence: points.length < minPoints,
  };
}

/**
 * Per timestamp, diff = subject − mean(controls present at that timestamp).
 * z = (mean post diff − mean pre diff) / std(pre diffs).
 */
export function zScoreVsSyntheticControl(subject: Split, controls: Split[]): number | null {
  const preDiffs = alignedDiffs(subject.pre, controls.map((c) => c.pre));
  const postDiffs = alignedDiffs(subject.post, controls.map((c) => c.post));

  const preMean = mean(preDiffs);
  const postMean = mean(postDiffs);
  const preStd = populationStdDev(preDiffs);
  if (preMean === null || postMean === null || preStd === null || preStd === 0) return null;
  return (postMean - preMean) / preStd;
}

function alignedDiffs(subject: MetricPoint[], controls: MetricPoint[][]): number[] {
  const byTs = controls.map((series) => new Map(series.map((p) => [p.timestamp, p.value])));
  const diffs: number[] = [];

  for (const p of subject) {
    const ctrlValues = byTs.flatMap((m) => {
      const v = m.get(p.timestamp);
      return v === undefined ? [] : [v];
    });
    const ctrlMean = mean(ctrlValues);
    if (ctrlMean === null) continue;
    diffs.push(p.value - ctrlMean);
  }
  return diffs;
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}
