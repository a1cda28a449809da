/**
 * Region Catalog
 *
 * Canonical list of countries and their provinces/states, plus alias
 * resolution from the many spellings an upstream source or a user may use
 * ("US", "USA", "United States", "Taiwan*", "Mainland China").
 *
 * Resolution order for a free-text query:
 * 1. Country canonical name, ISO alpha-2 code or country alias
 * 2. Province canonical name or province alias (must be unique across countries)
 * 3. Qualified forms: "Province, Country" and "Country/Province"
 *
 * Read-only after construction.
 *
 * @example
 * ```typescript
 * const catalog = await RegionCatalog.load({ regionsPath: null, aliasesPath: null });
 * catalog.resolve('usa');            // { country: 'United States', province: '' }
 * catalog.resolve('Ontario');        // { country: 'Canada', province: 'Ontario' }
 * catalog.list('Canada');            // Canada, then its provinces in catalog order
 * ```
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Region } from '../core/types.js';
import { compareRegions, regionId, regionLabel } from '../core/types.js';
import {
  AmbiguousRegionError,
  CatalogLoadError,
  UnknownRegionError,
  errorMessage,
} from '../core/errors.js';
import { formatZodError } from '../core/utils/validation.js';

// ============================================================================
// Definition files
// ============================================================================

export interface CountryDefinition {
  readonly name: string;
  /** ISO 3166-1 alpha-2, registered as a country alias */
  readonly code?: string;
  readonly provinces?: readonly string[];
}

export interface CatalogDefinition {
  readonly countries: readonly CountryDefinition[];
}

/**
 * alias → canonical target, where target is `"Country"` or `"Country/Province"`
 */
export interface AliasDefinition {
  readonly aliases: Readonly<Record<string, string>>;
}

const CatalogFileSchema = z.object({
  version: z.literal(1),
  countries: z
    .array(
      z.object({
        name: z.string().min(1),
        code: z.string().length(2).optional(),
        provinces: z.array(z.string().min(1)).optional(),
      })
    )
    .min(1, 'catalog must list at least one country'),
});

const AliasFileSchema = z.object({
  version: z.literal(1),
  aliases: z.record(z.string().min(1)),
});

const BUNDLED_REGIONS_PATH = fileURLToPath(new URL('../../data/regions.json', import.meta.url));
const BUNDLED_ALIASES_PATH = fileURLToPath(
  new URL('../../data/region-aliases.json', import.meta.url)
);

export interface CatalogSources {
  /** null = bundled data/regions.json */
  readonly regionsPath: string | null;
  /** null = bundled data/region-aliases.json */
  readonly aliasesPath: string | null;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Lookup key: case-folded, diacritics stripped, whitespace collapsed,
 * typographic apostrophes unified, trailing `*` markers dropped.
 */
export function normalizeRegionName(raw: string): string {
  return raw
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .replace(/[‘’ʼ]/g, "'")
    .toLowerCase()
    .replace(/\*+\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// ============================================================================
// Region Catalog
// ============================================================================

interface CountryRecord {
  readonly region: Region;
  readonly provinces: readonly Region[];
}

export class RegionCatalog {
  private readonly countriesByName = new Map<string, CountryRecord>();
  private readonly countryOrder: Region[] = [];
  /** normalized key → canonical country name */
  private readonly countryIndex = new Map<string, string>();
  /** normalized key → provinces with that name or alias */
  private readonly provinceIndex = new Map<string, Region[]>();

  private constructor(catalog: CatalogDefinition, aliases: AliasDefinition) {
    this.indexCountries(catalog);
    this.indexAliases(aliases);
  }

  /**
   * Build a catalog from in-memory definitions
   *
   * @throws CatalogLoadError on duplicates or dangling alias targets
   */
  static fromDefinitions(
    catalog: CatalogDefinition,
    aliases: AliasDefinition = { aliases: {} }
  ): RegionCatalog {
    return new RegionCatalog(catalog, aliases);
  }

  /**
   * Load catalog and alias table from JSON files
   *
   * @throws CatalogLoadError when a file is unreadable or fails validation
   */
  static async load(sources: CatalogSources): Promise<RegionCatalog> {
    const regionsPath = sources.regionsPath ?? BUNDLED_REGIONS_PATH;
    const aliasesPath = sources.aliasesPath ?? BUNDLED_ALIASES_PATH;

    const catalog = CatalogFileSchema.safeParse(await readJsonFile(regionsPath));
    if (!catalog.success) {
      throw new CatalogLoadError(
        `Invalid region catalog ${regionsPath}: ${formatZodError(catalog.error)}`,
        regionsPath
      );
    }

    const aliases = AliasFileSchema.safeParse(await readJsonFile(aliasesPath));
    if (!aliases.success) {
      throw new CatalogLoadError(
        `Invalid alias table ${aliasesPath}: ${formatZodError(aliases.error)}`,
        aliasesPath
      );
    }

    return new RegionCatalog(catalog.data, aliases.data);
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /**
   * Resolve free text to a canonical region
   *
   * @throws UnknownRegionError when nothing matches
   * @throws AmbiguousRegionError when an unqualified province name exists in several countries
   */
  resolve(rawName: string): Region {
    const key = normalizeRegionName(rawName);
    if (key === '') {
      throw new UnknownRegionError(rawName);
    }

    const country = this.countryIndex.get(key);
    if (country !== undefined) {
      return this.countryRecord(country).region;
    }

    const provinces = this.provinceIndex.get(key);
    if (provinces && provinces.length === 1 && provinces[0] !== undefined) {
      return provinces[0];
    }
    if (provinces && provinces.length > 1) {
      throw new AmbiguousRegionError(rawName, provinces);
    }

    const qualified = this.resolveQualified(rawName);
    if (qualified) {
      return qualified;
    }

    throw new UnknownRegionError(rawName);
  }

  /**
   * Resolve the two-column form used by upstream rows
   *
   * An empty province yields the country-level region.
   */
  resolveParts(countryName: string, provinceName: string): Region {
    const country = this.countryIndex.get(normalizeRegionName(countryName));
    if (country === undefined) {
      throw new UnknownRegionError(countryName);
    }

    const provinceKey = normalizeRegionName(provinceName);
    if (provinceKey === '') {
      return this.countryRecord(country).region;
    }

    const match = this.provinceIndex.get(provinceKey)?.find((p) => p.country === country);
    if (!match) {
      throw new UnknownRegionError(`${provinceName.trim()}, ${countryName.trim()}`);
    }
    return match;
  }

  /**
   * Country-level entry first, then provinces in catalog order
   *
   * @throws UnknownRegionError when `country` is not a catalogued country
   */
  list(country: string): readonly Region[] {
    const name = this.countryIndex.get(normalizeRegionName(country));
    if (name === undefined) {
      throw new UnknownRegionError(country);
    }
    const record = this.countryRecord(name);
    return [record.region, ...record.provinces];
  }

  /** Country-level regions in catalog order */
  countries(): readonly Region[] {
    return this.countryOrder;
  }

  /** True for provinces, which roll up into their country */
  isSubEntry(region: Region): boolean {
    const record = this.countriesByName.get(region.country);
    return (
      region.province !== '' &&
      record !== undefined &&
      record.provinces.some((p) => p.province === region.province)
    );
  }

  has(region: Region): boolean {
    const record = this.countriesByName.get(region.country);
    if (!record) return false;
    return region.province === '' || this.isSubEntry(region);
  }

  /**
   * Regions whose name starts with, then contains, the query
   */
  suggest(rawName: string, limit = 5): readonly Region[] {
    const key = normalizeRegionName(rawName);
    if (key === '' || limit <= 0) return [];

    const scored: Array<{ region: Region; score: number }> = [];
    for (const record of this.countriesByName.values()) {
      for (const region of [record.region, ...record.provinces]) {
        const name = normalizeRegionName(region.province || region.country);
        if (name.startsWith(key)) {
          scored.push({ region, score: 0 });
        } else if (name.includes(key) || normalizeRegionName(regionLabel(region)).includes(key)) {
          scored.push({ region, score: 1 });
        }
      }
    }

    return scored
      .sort((a, b) => a.score - b.score || compareRegions(a.region, b.region))
      .slice(0, limit)
      .map((s) => s.region);
  }

  get size(): number {
    let total = 0;
    for (const record of this.countriesByName.values()) {
      total += 1 + record.provinces.length;
    }
    return total;
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  private indexCountries(catalog: CatalogDefinition): void {
    for (const def of catalog.countries) {
      const name = def.name.trim();
      const key = normalizeRegionName(name);
      if (this.countryIndex.has(key)) {
        throw new CatalogLoadError(`Duplicate country in catalog: ${name}`, null);
      }

      const region: Region = Object.freeze({ country: name, province: '' });
      const seen = new Set<string>();
      const provinces: Region[] = [];
      for (const rawProvince of def.provinces ?? []) {
        const province = rawProvince.trim();
        const provinceKey = normalizeRegionName(province);
        if (seen.has(provinceKey)) {
          throw new CatalogLoadError(`Duplicate province in ${name}: ${province}`, null);
        }
        seen.add(provinceKey);
        const entry: Region = Object.freeze({ country: name, province });
        provinces.push(entry);
        this.addProvinceKey(provinceKey, entry);
      }

      this.countriesByName.set(name, { region, provinces: Object.freeze(provinces) });
      this.countryOrder.push(region);
      this.countryIndex.set(key, name);
    }

    // ISO codes never shadow a canonical name
    for (const def of catalog.countries) {
      if (!def.code) continue;
      const codeKey = normalizeRegionName(def.code);
      if (!this.countryIndex.has(codeKey)) {
        this.countryIndex.set(codeKey, def.name.trim());
      }
    }
  }

  private indexAliases(aliases: AliasDefinition): void {
    for (const [alias, target] of Object.entries(aliases.aliases)) {
      const key = normalizeRegionName(alias);
      if (key === '') {
        throw new CatalogLoadError(`Empty alias for target ${target}`, null);
      }

      const [countryPart = '', ...rest] = target.split('/');
      const provincePart = rest.join('/');
      const record = this.countriesByName.get(countryPart.trim());
      if (!record) {
        throw new CatalogLoadError(`Alias "${alias}" targets unknown country ${countryPart}`, null);
      }

      if (provincePart === '') {
        const existing = this.countryIndex.get(key);
        if (existing !== undefined && normalizeRegionName(existing) === key && existing !== record.region.country) {
          throw new CatalogLoadError(`Alias "${alias}" collides with country ${existing}`, null);
        }
        this.countryIndex.set(key, record.region.country);
        continue;
      }

      const province = record.provinces.find((p) => p.province === provincePart.trim());
      if (!province) {
        throw new CatalogLoadError(`Alias "${alias}" targets unknown province ${target}`, null);
      }
      this.addProvinceKey(key, province);
    }
  }

  private addProvinceKey(key: string, region: Region): void {
    const bucket = this.provinceIndex.get(key);
    if (!bucket) {
      this.provinceIndex.set(key, [region]);
    } else if (!bucket.some((r) => regionId(r) === regionId(region))) {
      bucket.push(region);
    }
  }

  private countryRecord(name: string): CountryRecord {
    const record = this.countriesByName.get(name);
    if (!record) {
      throw new UnknownRegionError(name);
    }
    return record;
  }

  private resolveQualified(rawName: string): Region | null {
    const slash = rawName.indexOf('/');
    if (slash > 0) {
      const attempt = this.tryResolveParts(rawName.slice(0, slash), rawName.slice(slash + 1));
      if (attempt) return attempt;
    }

    const comma = rawName.lastIndexOf(',');
    if (comma > 0) {
      const attempt = this.tryResolveParts(rawName.slice(comma + 1), rawName.slice(0, comma));
      if (attempt) return attempt;
    }

    return null;
  }

  private tryResolveParts(country: string, province: string): Region | null {
    if (normalizeRegionName(province) === '') return null;
    try {
      return this.resolveParts(country, province);
    } catch (error) {
      if (error instanceof UnknownRegionError) return null;
      throw error;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CatalogLoadError(`Cannot read ${path}: ${errorMessage(error)}`, path, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new CatalogLoadError(`Malformed JSON in ${path}: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }
}
