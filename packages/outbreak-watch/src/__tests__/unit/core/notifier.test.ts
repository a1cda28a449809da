/**
 * Notifier Tests
 *
 * Change detection, baseline merging and update message formatting.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LogNotifier,
  describeChanges,
  formatCount,
  formatDelta,
  formatMetric,
  formatUpdateMessage,
  mergeBaseline,
  metricsChanged,
} from '../../../core/notifier.js';
import { Logger } from '../../../core/utils/logger.js';
import { country, metricSet, province } from '../../utils/fixtures.js';

describe('describeChanges', () => {
  it('should report every known field when there is no baseline', () => {
    expect(describeChanges(null, metricSet({ confirmed: 1000, deaths: 10 }))).toEqual([
      { field: 'confirmed', previous: null, current: 1000, delta: null },
      { field: 'deaths', previous: null, current: 10, delta: null },
    ]);
  });

  it('should report only the fields that moved', () => {
    const previous = metricSet({ confirmed: 1000, deaths: 10 });
    const current = metricSet({ confirmed: 1200, deaths: 10 });

    expect(describeChanges(previous, current)).toEqual([
      { field: 'confirmed', previous: 1000, current: 1200, delta: 200 },
    ]);
  });

  it('should not treat a field that became unknown as a change', () => {
    const previous = metricSet({ confirmed: 5, recovered: 2 });
    const current = metricSet({ confirmed: 5, recovered: null });

    expect(describeChanges(previous, current)).toEqual([]);
    expect(metricsChanged(previous, current)).toBe(false);
  });

  it('should ignore the as-of time', () => {
    const previous = metricSet({ confirmed: 5 });
    const current = metricSet({ confirmed: 5, asOf: new Date('2020-04-03T00:00:00Z') });

    expect(metricsChanged(previous, current)).toBe(false);
  });

  it('should always notify a subscription with no baseline', () => {
    expect(metricsChanged(null, metricSet())).toBe(true);
  });
});

describe('mergeBaseline', () => {
  it('should keep previous values where the current ones are unknown', () => {
    const asOf = new Date('2020-04-05T00:00:00Z');
    const merged = mergeBaseline(
      metricSet({ confirmed: 5, deaths: 1, incidentRate: 2.5 }),
      metricSet({ confirmed: 7, asOf })
    );

    expect(merged).toEqual({
      confirmed: 7,
      deaths: 1,
      recovered: null,
      active: null,
      incidentRate: 2.5,
      asOf,
    });
  });

  it('should use the current values when there is no baseline', () => {
    const current = metricSet({ confirmed: 3 });
    expect(mergeBaseline(null, current)).toBe(current);
  });
});

describe('formatting', () => {
  it('should group thousands', () => {
    expect(formatCount(999)).toBe('999');
    expect(formatCount(1234567)).toBe('1,234,567');
  });

  it('should render rates with two decimals and unknowns as words', () => {
    expect(formatMetric('incidentRate', 12.5)).toBe('12.50');
    expect(formatMetric('deaths', null)).toBe('unknown');
  });

  it('should sign deltas', () => {
    expect(formatDelta('confirmed', 1200)).toBe('+1,200');
    expect(formatDelta('deaths', -3)).toBe('-3');
    expect(formatDelta('active', 0)).toBe('±0');
    expect(formatDelta('incidentRate', 0.5)).toBe('+0.50');
  });

  it('should build one line per known metric with deltas', () => {
    const message = formatUpdateMessage(
      province('Canada', 'Ontario'),
      metricSet({ confirmed: 1000, deaths: 12 }),
      metricSet({ confirmed: 1200, deaths: 12, incidentRate: 8.25 })
    );

    expect(message).toBe(
      ['Update for Ontario, Canada', 'Confirmed: 1,200 (+200)', 'Deaths: 12', 'Incident rate: 8.25'].join(
        '\n'
      )
    );
  });
});

describe('LogNotifier', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log the update and report delivery', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const notifier = new LogNotifier(
      new Logger({ level: 'info', service: 'notifier-test', pretty: false })
    );

    const outcome = await notifier.notify(
      'alice',
      country('France'),
      null,
      metricSet({ confirmed: 40 })
    );

    expect(outcome).toEqual({ delivered: true });
    expect(info).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(info.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'info',
      service: 'notifier-test',
      message: 'Update for France\nConfirmed: 40',
      subscriberId: 'alice',
      region: 'France',
      asOf: '2020-04-01T00:00:00.000Z',
    });
  });
});
