/**
 * Region Catalog Tests
 *
 * Name normalization, alias and qualified-name resolution, ambiguity and
 * suggestion ordering.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RegionCatalog, normalizeRegionName } from '../../../registry/region-catalog.js';
import {
  AmbiguousRegionError,
  CatalogLoadError,
  UnknownRegionError,
} from '../../../core/errors.js';
import { country, createTestCatalog, province } from '../../utils/fixtures.js';

describe('normalizeRegionName', () => {
  it('should fold case, accents and whitespace', () => {
    expect(normalizeRegionName('  Québec   City ')).toBe('quebec city');
  });

  it('should drop trailing asterisk markers', () => {
    expect(normalizeRegionName('Taiwan*')).toBe('taiwan');
  });

  it('should unify typographic apostrophes', () => {
    expect(normalizeRegionName('Cote d’Ivoire')).toBe("cote d'ivoire");
  });
});

describe('RegionCatalog', () => {
  const catalog = createTestCatalog();

  describe('resolve', () => {
    it('should resolve canonical names case-insensitively', () => {
      expect(catalog.resolve('  united   STATES ')).toEqual(country('United States'));
    });

    it('should resolve ISO codes and aliases to countries', () => {
      expect(catalog.resolve('US')).toEqual(country('United States'));
      expect(catalog.resolve('usa')).toEqual(country('United States'));
      expect(catalog.resolve('Taiwan*')).toEqual(country('Taiwan'));
    });

    it('should resolve unique province names and province aliases', () => {
      expect(catalog.resolve('Ontario')).toEqual(province('Canada', 'Ontario'));
      expect(catalog.resolve('québec')).toEqual(province('Canada', 'Quebec'));
      expect(catalog.resolve('NY')).toEqual(province('United States', 'New York'));
    });

    it('should prefer a country over a province with the same name', () => {
      expect(catalog.resolve('Georgia')).toEqual(country('Georgia'));
    });

    it('should resolve qualified province names', () => {
      expect(catalog.resolve('Georgia, United States')).toEqual(
        province('United States', 'Georgia')
      );
      expect(catalog.resolve('US/Georgia')).toEqual(province('United States', 'Georgia'));
      expect(catalog.resolve('Punjab, Pakistan')).toEqual(province('Pakistan', 'Punjab'));
    });

    it('should reject a province name shared by several countries', () => {
      expect(() => catalog.resolve('Punjab')).toThrow(AmbiguousRegionError);
      try {
        catalog.resolve('Punjab');
      } catch (error) {
        expect(error).toBeInstanceOf(AmbiguousRegionError);
        if (error instanceof AmbiguousRegionError) {
          expect(error.candidates).toEqual([province('India', 'Punjab'), province('Pakistan', 'Punjab')]);
        }
      }
    });

    it('should reject unknown and empty names', () => {
      expect(() => catalog.resolve('Atlantis')).toThrow(UnknownRegionError);
      expect(() => catalog.resolve('   ')).toThrow(UnknownRegionError);
    });
  });

  describe('resolveParts', () => {
    it('should return the country for an empty province', () => {
      expect(catalog.resolveParts('Canada', '  ')).toEqual(country('Canada'));
    });

    it('should only match provinces of the given country', () => {
      expect(catalog.resolveParts('India', 'Punjab')).toEqual(province('India', 'Punjab'));
      expect(() => catalog.resolveParts('Canada', 'Punjab')).toThrow('Unknown region: "Punjab, Canada"');
    });

    it('should reject an unknown country', () => {
      expect(() => catalog.resolveParts('Atlantis', '')).toThrow(UnknownRegionError);
    });
  });

  describe('listing', () => {
    it('should list a country before its provinces in catalog order', () => {
      expect(catalog.list('ca')).toEqual([
        country('Canada'),
        province('Canada', 'Ontario'),
        province('Canada', 'Quebec'),
        province('Canada', 'British Columbia'),
      ]);
    });

    it('should report membership and sub-entries', () => {
      expect(catalog.isSubEntry(province('Canada', 'Ontario'))).toBe(true);
      expect(catalog.isSubEntry(country('Canada'))).toBe(false);
      expect(catalog.has(country('France'))).toBe(true);
      expect(catalog.has(province('Canada', 'Atlantis'))).toBe(false);
      expect(catalog.size).toBe(20);
      expect(catalog.countries()).toHaveLength(9);
    });
  });

  describe('suggest', () => {
    it('should rank prefix matches before substring matches', () => {
      expect(catalog.suggest('can')).toEqual([
        country('Canada'),
        province('Canada', 'British Columbia'),
        province('Canada', 'Ontario'),
        province('Canada', 'Quebec'),
      ]);
    });

    it('should honour the limit', () => {
      expect(catalog.suggest('can', 2)).toEqual([
        country('Canada'),
        province('Canada', 'British Columbia'),
      ]);
    });

    it('should return nothing for unmatched queries', () => {
      expect(catalog.suggest('zzz')).toEqual([]);
    });
  });

  describe('fromDefinitions', () => {
    it('should reject duplicate countries', () => {
      expect(() =>
        RegionCatalog.fromDefinitions({ countries: [{ name: 'France' }, { name: 'france' }] })
      ).toThrow(CatalogLoadError);
    });

    it('should reject aliases targeting unknown regions', () => {
      expect(() =>
        RegionCatalog.fromDefinitions(
          { countries: [{ name: 'France' }] },
          { aliases: { Gaul: 'Rome' } }
        )
      ).toThrow('Alias "Gaul" targets unknown country Rome');
    });
  });

  describe('load', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'outbreak-watch-catalog-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load the bundled catalog and aliases', async () => {
      const bundled = await RegionCatalog.load({ regionsPath: null, aliasesPath: null });
      expect(bundled.resolve('Mainland China')).toEqual(country('China'));
      expect(bundled.resolve('Hong Kong SAR')).toEqual(province('China', 'Hong Kong'));
      expect(bundled.resolve('Ontario')).toEqual(province('Canada', 'Ontario'));
    });

    it('should load catalog files from disk', async () => {
      const regionsPath = join(dir, 'regions.json');
      const aliasesPath = join(dir, 'aliases.json');
      await writeFile(
        regionsPath,
        JSON.stringify({ version: 1, countries: [{ name: 'Freedonia', provinces: ['North'] }] })
      );
      await writeFile(aliasesPath, JSON.stringify({ version: 1, aliases: { FD: 'Freedonia' } }));

      const loaded = await RegionCatalog.load({ regionsPath, aliasesPath });
      expect(loaded.resolve('fd')).toEqual(country('Freedonia'));
      expect(loaded.resolve('north')).toEqual(province('Freedonia', 'North'));
    });

    it('should fail on malformed or invalid files', async () => {
      const broken = join(dir, 'broken.json');
      await writeFile(broken, '{ not json');
      await expect(RegionCatalog.load({ regionsPath: broken, aliasesPath: null })).rejects.toThrow(
        CatalogLoadError
      );

      const empty = join(dir, 'empty.json');
      await writeFile(empty, JSON.stringify({ version: 1, countries: [] }));
      await expect(RegionCatalog.load({ regionsPath: empty, aliasesPath: null })).rejects.toThrow(
        'catalog must list at least one country'
      );
    });

    it('should fail on a missing file', async () => {
      await expect(
        RegionCatalog.load({ regionsPath: join(dir, 'missing.json'), aliasesPath: null })
      ).rejects.toThrow(CatalogLoadError);
    });
  });
});
