/**
 * Aggregator Tests
 *
 * Province roll-up, global totals without double counting, and ranking
 * order with deterministic tie-breaks.
 */

import { describe, it, expect } from 'vitest';
import {
  affectedCountryCount,
  countryRegions,
  globalTotals,
  rank,
  rankOf,
  rankProvinces,
  rankedCountries,
  regionMetrics,
} from '../../../aggregation/aggregator.js';
import { RegionDataNotFoundError } from '../../../core/errors.js';
import { FETCHED_AT, country, csv, parseSnapshot, province } from '../../utils/fixtures.js';

const snapshot = parseSnapshot(
  csv(
    { province: 'Ontario', country: 'Canada', confirmed: 60, deaths: 2, recovered: 8 },
    { province: 'Quebec', country: 'Canada', confirmed: 40, deaths: 3, recovered: 7 },
    { country: 'United States', confirmed: 1000, deaths: 10, recovered: 90 },
    { province: 'New York', country: 'United States', confirmed: 500 },
    { country: 'France', confirmed: 100 },
    { country: 'Germany', confirmed: 100, deaths: 1, recovered: 9 },
    { province: 'Kerala', country: 'India', confirmed: 5 },
    { province: 'Punjab', country: 'India', deaths: 1 },
    { country: 'Georgia', confirmed: 0, deaths: 0, recovered: 0 },
    { country: 'Taiwan', deaths: 1 }
  )
);

describe('regionMetrics', () => {
  it('should roll a country up from its provinces', () => {
    expect(regionMetrics(snapshot, country('Canada'))).toEqual({
      region: country('Canada'),
      metrics: {
        confirmed: 100,
        deaths: 5,
        recovered: 15,
        active: 80,
        incidentRate: null,
        asOf: FETCHED_AT,
      },
      complete: true,
      source: 'rollup',
    });
  });

  it('should leave a rolled-up field unknown when any province lacks it', () => {
    const india = regionMetrics(snapshot, country('India'));
    expect(india.complete).toBe(false);
    expect(india.metrics).toEqual({
      confirmed: null,
      deaths: null,
      recovered: null,
      active: null,
      incidentRate: null,
      asOf: FETCHED_AT,
    });
  });

  it('should keep fields every province reports', () => {
    const partial = parseSnapshot(
      csv(
        { province: 'Ontario', country: 'Canada', confirmed: 60, deaths: 2 },
        { province: 'Quebec', country: 'Canada', confirmed: 40 }
      )
    );
    const canada = regionMetrics(partial, country('Canada'));
    expect(canada.complete).toBe(false);
    expect(canada.metrics.confirmed).toBe(100);
    expect(canada.metrics.deaths).toBeNull();
  });

  it('should prefer a country-level row over its provinces', () => {
    const us = regionMetrics(snapshot, country('United States'));
    expect(us.source).toBe('reported');
    expect(us.metrics.confirmed).toBe(1000);
    expect(us.complete).toBe(true);
  });

  it('should return province rows as reported', () => {
    expect(regionMetrics(snapshot, province('Canada', 'Quebec')).metrics.active).toBe(30);
  });

  it('should throw when the snapshot has nothing for the region', () => {
    expect(() => regionMetrics(snapshot, province('Canada', 'British Columbia'))).toThrow(
      RegionDataNotFoundError
    );
    expect(() => regionMetrics(snapshot, country('Italy'))).toThrow(
      'No data for Italy in the current snapshot'
    );
  });
});

describe('globalTotals', () => {
  it('should count every country once and skip unknown values', () => {
    expect(countryRegions(snapshot).map((region) => region.country)).toEqual([
      'Canada',
      'France',
      'Georgia',
      'Germany',
      'India',
      'Taiwan',
      'United States',
    ]);

    expect(globalTotals(snapshot)).toEqual({
      metrics: {
        confirmed: 1305,
        deaths: 18,
        recovered: 114,
        active: 1070,
        incidentRate: null,
        asOf: snapshot.timestamp,
      },
      complete: false,
      incompleteRegions: [country('France'), country('India'), country('Taiwan')],
      regionCount: 7,
    });
  });

  it('should report complete totals when every count is known', () => {
    const clean = parseSnapshot(
      csv(
        { province: 'Ontario', country: 'Canada', confirmed: 60, deaths: 1, recovered: 9 },
        { country: 'France', confirmed: 40, deaths: 2, recovered: 8 }
      )
    );
    const totals = globalTotals(clean);
    expect(totals.complete).toBe(true);
    expect(totals.incompleteRegions).toEqual([]);
    expect(totals.metrics.confirmed).toBe(100);
  });

  it('should count countries with at least one confirmed case', () => {
    expect(affectedCountryCount(snapshot)).toBe(4);
  });
});

describe('rankings', () => {
  it('should order countries by confirmed count, then region id', () => {
    expect(rankedCountries(snapshot)).toEqual([
      { region: country('United States'), confirmed: 1000, position: 1 },
      { region: country('Canada'), confirmed: 100, position: 2 },
      { region: country('France'), confirmed: 100, position: 3 },
      { region: country('Germany'), confirmed: 100, position: 4 },
      { region: country('Georgia'), confirmed: 0, position: 5 },
    ]);
  });

  it('should page with absolute positions', () => {
    expect(rank(snapshot, 2).map((e) => e.region.country)).toEqual(['United States', 'Canada']);
    expect(rank(snapshot, 2, 3).map((e) => [e.region.country, e.position])).toEqual([
      ['France', 3],
      ['Germany', 4],
    ]);
    expect(rank(snapshot, 10, 7)).toEqual([]);
  });

  it('should rank provinces with a known confirmed count', () => {
    expect(rankProvinces(snapshot, 10)).toEqual([
      { region: province('United States', 'New York'), confirmed: 500, position: 1 },
      { region: province('Canada', 'Ontario'), confirmed: 60, position: 2 },
      { region: province('Canada', 'Quebec'), confirmed: 40, position: 3 },
      { region: province('India', 'Kerala'), confirmed: 5, position: 4 },
    ]);
  });

  it('should find a country position', () => {
    expect(rankOf(snapshot, country('United States'))).toBe(1);
    expect(rankOf(snapshot, country('Georgia'))).toBe(5);
    expect(rankOf(snapshot, country('Taiwan'))).toBeNull();
    expect(rankOf(snapshot, country('India'))).toBeNull();
    expect(rankOf(snapshot, province('Canada', 'Ontario'))).toBeNull();
  });

  it('should reject invalid page bounds', () => {
    expect(() => rank(snapshot, 0)).toThrow(RangeError);
    expect(() => rank(snapshot, 1.5)).toThrow(RangeError);
    expect(() => rank(snapshot, 1, 0)).toThrow('start must be a positive integer, got 0');
  });
});
