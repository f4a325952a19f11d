import { describe, it, expect, beforeEach } from 'vitest';
import { StaticEventRegistry } from '../../../config/events';
import { InvalidArgumentError, NotFoundError } from '../../../shared/errors';
import { MemoryStore } from '../../../__tests__/fixtures';
import { WindowStatsService, partition, trafficShiftIndex } from '../window-stats';

// Default registry event: uk-age-verify-2025 at 2025-07-25T00:00:00Z
const EVENT = 'uk-age-verify-2025';

describe('WindowStatsService', () => {
  let store: MemoryStore;
  let service: WindowStatsService;

  beforeEach(() => {
    store = new MemoryStore();
    service = new WindowStatsService(store, new StaticEventRegistry(), {
      defaultWindowDays: 14,
      minWindowPoints: 3,
    });
  });

  it('computes window means and the traffic shift index', async () => {
    store.addPoints('GB', 'http_requests_norm', [
      ['2025-07-20T00:00:00Z', 10],
      ['2025-07-21T00:00:00Z', 20],
      ['2025-07-22T00:00:00Z', 30],
      ['2025-07-25T00:00:00Z', 40],
      ['2025-07-30T00:00:00Z', 60],
    ]);

    const result = await service.computeWindowStats({ country: 'gb', metric: 'http_requests_norm', eventSlug: EVENT });

    expect(result.country).toBe('GB');
    expect(result.windowDays).toBe(14);
    expect(result.pre).toEqual({
      start: '2025-07-11T00:00:00.000Z',
      end: '2025-07-25T00:00:00.000Z',
      count: 3,
      mean: 20,
      lowConfidence: false,
    });
    expect(result.post).toEqual({
      start: '2025-07-25T00:00:00.000Z',
      end: '2025-08-08T00:00:00.000Z',
      count: 2,
      mean: 50,
      lowConfidence: true,
    });
    expect(result.trafficShiftIndex).toBe(1.5);
    expect(result.sufficiency).toBe('low');
    expect(result.zScoreVsControls).toBeNull();
  });

  it('excludes points outside both windows', async () => {
    store.addPoints('GB', 'bot_traffic', [
      ['2025-07-10T23:59:59Z', 1000],
      ['2025-07-11T00:00:00Z', 2],
      ['2025-07-24T23:59:59Z', 4],
      ['2025-08-08T00:00:00Z', 6],
      ['2025-08-08T00:00:01Z', 1000],
    ]);

    const result = await service.computeWindowStats({ country: 'GB', metric: 'bot_traffic', eventSlug: EVENT });

    expect(result.pre.count).toBe(2);
    expect(result.pre.mean).toBe(3);
    expect(result.post.count).toBe(1);
    expect(result.post.mean).toBe(6);
  });

  it('reads both windows with a single store query', async () => {
    await service.computeWindowStats({ country: 'GB', metric: 'http_requests_norm', eventSlug: EVENT });
    expect(store.queryCalls).toBe(1);
  });

  it('reports null mean and index when the post window is empty', async () => {
    store.addPoints('GB', 'http_requests_norm', [
      ['2025-07-20T00:00:00Z', 10],
      ['2025-07-21T00:00:00Z', 20],
      ['2025-07-22T00:00:00Z', 30],
    ]);

    const result = await service.computeWindowStats({ country: 'GB', metric: 'http_requests_norm', eventSlug: EVENT });

    expect(result.post.mean).toBeNull();
    expect(result.post.count).toBe(0);
    expect(result.trafficShiftIndex).toBeNull();
    expect(result.sufficiency).toBe('low');
  });

  it('reports a null index when the pre mean is exactly zero', async () => {
    store.addPoints('GB', 'l3_bytes_target', [
      ['2025-07-20T00:00:00Z', 0],
      ['2025-07-26T00:00:00Z', 5],
    ]);

    const result = await service.computeWindowStats({ country: 'GB', metric: 'l3_bytes_target', eventSlug: EVENT });

    expect(result.pre.mean).toBe(0);
    expect(result.post.mean).toBe(5);
    expect(result.trafficShiftIndex).toBeNull();
  });

  it('is sufficient when both windows reach the minimum', async () => {
    const sparse = new WindowStatsService(store, new StaticEventRegistry(), { defaultWindowDays: 3, minWindowPoints: 1 });
    store.addPoints('GB', 'http_requests_norm', [
      ['2025-07-24T00:00:00Z', 4],
      ['2025-07-26T00:00:00Z', 5],
    ]);

    const result = await sparse.computeWindowStats({ country: 'GB', metric: 'http_requests_norm', eventSlug: EVENT });

    expect(result.windowDays).toBe(3);
    expect(result.sufficiency).toBe('ok');
    expect(result.trafficShiftIndex).toBe(0.25);
  });

  it('computes a z-score against a synthetic control', async () => {
    store.addPoints('GB', 'http_requests_norm', [
      ['2025-07-20T00:00:00Z', 10],
      ['2025-07-21T00:00:00Z', 12],
      ['2025-07-22T00:00:00Z', 14],
      ['2025-07-26T00:00:00Z', 20],
    ]);
    store.addPoints('IE', 'http_requests_norm', [
      ['2025-07-19T00:00:00Z', 99],
      ['2025-07-20T00:00:00Z', 5],
      ['2025-07-21T00:00:00Z', 5],
      ['2025-07-22T00:00:00Z', 5],
      ['2025-07-26T00:00:00Z', 5],
    ]);

    const result = await service.computeWindowStats({
      country: 'GB',
      metric: 'http_requests_norm',
      eventSlug: EVENT,
      controls: ['ie', 'GB'],
    });

    // pre diffs 5, 7, 9 (mean 7, population std sqrt(8/3)); post diff 15
    expect(result.controls).toEqual(['IE']);
    expect(result.controlsDetail).toEqual({ IE: { prePoints: 4, postPoints: 1 } });
    expect(result.zScoreVsControls).toBeCloseTo(8 / Math.sqrt(8 / 3), 10);
  });

  it('rejects an unknown event slug with NotFound', async () => {
    await expect(
      service.computeWindowStats({ country: 'GB', metric: 'http_requests_norm', eventSlug: 'nonexistent' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it.each([
    [{ country: 'GBR', metric: 'http_requests_norm' }],
    [{ country: 'GB', metric: 'page_views' }],
    [{ country: 'GB', metric: 'http_requests_norm', windowDays: 0 }],
    [{ country: 'GB', metric: 'http_requests_norm', windowDays: 2.5 }],
  ])('rejects invalid arguments %j', async (params) => {
    await expect(service.computeWindowStats({ ...params, eventSlug: EVENT })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it.each([36_501, 100_000_000])('rejects a window of %i days before reading the store', async (windowDays) => {
    await expect(
      service.computeWindowStats({ country: 'GB', metric: 'http_requests_norm', eventSlug: EVENT, windowDays })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(store.queryCalls).toBe(0);
  });

  it('accepts the largest supported window', async () => {
    const result = await service.computeWindowStats({
      country: 'GB',
      metric: 'http_requests_norm',
      eventSlug: EVENT,
      windowDays: 36_500,
    });
    expect(result.windowDays).toBe(36_500);
    expect(result.pre.count).toBe(0);
  });
});

describe('partition', () => {
  it('puts the event instant in the post window', () => {
    const windows = {
      preStart: new Date('2025-07-24T00:00:00Z'),
      instant: new Date('2025-07-25T00:00:00Z'),
      postEnd: new Date('2025-07-26T00:00:00Z'),
    };
    const point = (timestamp: string) => ({ country: 'GB', metric: 'bot_traffic' as const, timestamp, value: 1 });

    const { pre, post } = partition(
      [point('2025-07-24T00:00:00.000Z'), point('2025-07-25T00:00:00.000Z'), point('2025-07-26T00:00:00.000Z')],
      windows
    );

    expect(pre.map((p) => p.timestamp)).toEqual(['2025-07-24T00:00:00.000Z']);
    expect(post.map((p) => p.timestamp)).toEqual(['2025-07-25T00:00:00.000Z', '2025-07-26T00:00:00.000Z']);
  });
});

describe('trafficShiftIndex', () => {
  it('is (post − pre) / pre', () => {
    expect(trafficShiftIndex(20, 50)).toBe(1.5);
    expect(trafficShiftIndex(40, 30)).toBe(-0.25);
  });

  it('is null when either mean is missing or pre is zero', () => {
    expect(trafficShiftIndex(null, 5)).toBeNull();
    expect(trafficShiftIndex(5, null)).toBeNull();
    expect(trafficShiftIndex(0, 5)).toBeNull();
  });
});
