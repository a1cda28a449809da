/**
 * Reconciler Tests
 *
 * Diffing subscriptions against a snapshot, delivery bookkeeping and baseline
 * recording.
 */

import { describe, it, expect } from 'vitest';
import { reconcile } from '../../../services/reconciler.js';
import { FETCHED_AT, country, csv, metricSet, parseSnapshot, province } from '../../utils/fixtures.js';
import { MemoryReconcileStore, RecordingNotifier } from '../../utils/mocks.js';

const snapshot = parseSnapshot(
  csv(
    { country: 'United States', confirmed: 1000, deaths: 10, recovered: 90 },
    { province: 'Ontario', country: 'Canada', confirmed: 60 },
    { country: 'France', confirmed: 40 }
  )
);

const US = country('United States');

describe('reconcile', () => {
  it('should notify changed subscriptions and count the rest', async () => {
    const store = new MemoryReconcileStore([
      { subscriberId: 'alice', region: US, lastNotified: null },
      {
        subscriberId: 'bob',
        region: province('Canada', 'Ontario'),
        lastNotified: metricSet({ confirmed: 60 }),
      },
      { subscriberId: 'carol', region: country('Italy'), lastNotified: null },
      { subscriberId: 'dave', region: country('France'), lastNotified: null },
    ]);
    const notifier = new RecordingNotifier();
    notifier.outcomes.push({ delivered: true }, { delivered: false, reason: 'muted' });

    const report = await reconcile(store, snapshot, notifier);

    expect(report).toEqual({
      notified: 1,
      unchanged: 1,
      failed: 1,
      missing: 1,
      failures: [{ subscriberId: 'dave', region: country('France'), reason: 'muted' }],
    });
    expect(notifier.calls.map((call) => call.subscriberId)).toEqual(['alice', 'dave']);
    expect(store.baseline('alice', US)).toEqual({
      confirmed: 1000,
      deaths: 10,
      recovered: 90,
      active: 900,
      incidentRate: null,
      asOf: FETCHED_AT,
    });
    expect(store.baseline('dave', country('France'))).toBeNull();
  });

  it('should not notify twice for the same figures', async () => {
    const store = new MemoryReconcileStore([{ subscriberId: 'alice', region: US, lastNotified: null }]);
    const notifier = new RecordingNotifier();

    await reconcile(store, snapshot, notifier);
    const second = await reconcile(store, snapshot, notifier);

    expect(second.unchanged).toBe(1);
    expect(notifier.calls).toHaveLength(1);
  });

  it('should not report a drop when a province of a rolled-up country stops reporting', async () => {
    const CANADA = country('Canada');
    const complete = parseSnapshot(
      csv(
        { province: 'Ontario', country: 'Canada', confirmed: 60, deaths: 2 },
        { province: 'Quebec', country: 'Canada', confirmed: 40, deaths: 3 }
      )
    );
    const quebecUnknown = parseSnapshot(
      csv(
        { province: 'Ontario', country: 'Canada', confirmed: 60, deaths: 2 },
        { province: 'Quebec', country: 'Canada', deaths: 3 }
      )
    );
    const store = new MemoryReconcileStore([
      { subscriberId: 'alice', region: CANADA, lastNotified: null },
    ]);
    const notifier = new RecordingNotifier();

    await reconcile(store, complete, notifier);
    const gap = await reconcile(store, quebecUnknown, notifier);
    const back = await reconcile(store, complete, notifier);

    expect(gap.unchanged).toBe(1);
    expect(back.unchanged).toBe(1);
    expect(notifier.calls.map((call) => call.current.confirmed)).toEqual([100]);
    expect(store.baseline('alice', CANADA)?.confirmed).toBe(100);
  });

  it('should turn a throwing notifier into a failure and keep the baseline', async () => {
    const store = new MemoryReconcileStore([{ subscriberId: 'alice', region: US, lastNotified: null }]);
    const notifier = new RecordingNotifier();
    notifier.outcomes.push(new Error('smtp down'));

    const report = await reconcile(store, snapshot, notifier);

    expect(report.failures).toEqual([
      {
        subscriberId: 'alice',
        region: US,
        reason: 'Delivery to alice for United States failed: smtp down',
      },
    ]);
    expect(store.baseline('alice', US)).toBeNull();
  });

  it('should count a delivered update whose baseline cannot be saved as failed', async () => {
    const store = new MemoryReconcileStore([{ subscriberId: 'alice', region: US, lastNotified: null }]);
    store.failRecord = new Error('disk full');

    const report = await reconcile(store, snapshot, new RecordingNotifier());

    expect(report.notified).toBe(0);
    expect(report.failures).toEqual([
      { subscriberId: 'alice', region: US, reason: 'baseline not saved: disk full' },
    ]);
  });

  it('should keep last known values in the baseline when fields go missing', async () => {
    const previous = metricSet({ confirmed: 1000, deaths: 10, recovered: 90, active: 900 });
    const store = new MemoryReconcileStore([{ subscriberId: 'alice', region: US, lastNotified: previous }]);
    const notifier = new RecordingNotifier();
    const partial = parseSnapshot(csv({ country: 'United States', confirmed: 1200 }));

    await reconcile(store, partial, notifier);

    expect(notifier.calls[0]?.previous).toBe(previous);
    expect(store.baseline('alice', US)).toEqual({
      confirmed: 1200,
      deaths: 10,
      recovered: 90,
      active: 900,
      incidentRate: null,
      asOf: FETCHED_AT,
    });
  });
});
