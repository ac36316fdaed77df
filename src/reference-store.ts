/**
 * Reference Store
 *
 * Loads the canonical site records once and answers lookups by postal code,
 * name token, name prefix and identifier. A loaded store is never mutated:
 * records are frozen and every index is private.
 */

import * as path from 'path';
import { DataLoadError } from './errors.js';
import {
  normalizeName,
  DEFAULT_NAME_TABLES,
  type NameTables,
  type NormalizedName,
} from './name-normalizer.js';
import { coercePostalCode } from './postal-code.js';
import { normalizeProviderCode } from './provider-normalizer.js';
import { findColumn, readTable, tableFromRecords, type Table } from './table-reader.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ReferenceLocation {
  readonly canonicalId: string;
  readonly canonicalName: string;
  readonly street: string | null;

  /** Always 5 digits when present */
  readonly postalCode: string | null;
  readonly city: string | null;

  /** Collector code the site is registered under, uppercased */
  readonly provider: string | null;
}

/**
 * Location fields as supplied by a caller building a store in memory
 */
export interface ReferenceLocationInput {
  canonicalId: string;
  canonicalName: string;
  street?: string | null;
  postalCode?: string | null;
  city?: string | null;
  provider?: string | null;
}

export interface LoadWarning {
  /** 1-based data row (header excluded) */
  row: number;
  message: string;
}

export interface ReferenceStoreOptions {
  nameTables?: NameTables;
}

export interface ReferenceStoreStats {
  locations: number;
  withPostalCode: number;
  withoutPostalCode: number;
  distinctPostalCodes: number;
  withProvider: number;
  franchises: Record<string, number>;
  providers: Record<string, number>;
  warnings: number;
}

/**
 * Accepted header names per field, compared after `headerKey()`
 */
export const REFERENCE_COLUMNS = {
  canonicalId: ['identifier', 'id', 'site', 'canonical_id', 'site_id'],
  canonicalName: ['name', 'entreprise', 'canonical_name', 'nom', 'restaurant', 'company_name'],
  street: ['street_address', 'street', 'adresse', 'address', 'rue'],
  postalCode: ['postal_code', 'code_postal', 'cp', 'zip', 'postcode', 'zip_code'],
  city: ['city', 'ville', 'commune'],
  provider: ['provider', 'collecte', 'prestataire', 'collector'],
} as const;

type ReferenceField = keyof typeof REFERENCE_COLUMNS;

const REQUIRED_FIELDS: ReferenceField[] = [
  'canonicalId',
  'canonicalName',
  'street',
  'postalCode',
  'city',
];

// ============================================================================
// HELPERS
// ============================================================================

function optionalText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed || null;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function addToIndex<K>(index: Map<K, ReferenceLocation[]>, key: K, location: ReferenceLocation): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(location);
  } else {
    index.set(key, [location]);
  }
}

// ============================================================================
// STORE
// ============================================================================

export class ReferenceStore {
  readonly locations: readonly ReferenceLocation[];
  readonly warnings: readonly LoadWarning[];
  readonly nameTables: NameTables;

  private readonly byId = new Map<string, ReferenceLocation>();
  private readonly byPostalCode = new Map<string, ReferenceLocation[]>();
  private readonly byNameToken = new Map<string, ReferenceLocation[]>();
  private readonly byProvider = new Map<string, ReferenceLocation[]>();
  private readonly normalizedNames = new Map<string, NormalizedName>();

  /** Normalized names sorted by text, then identifier */
  private readonly sortedNames: { text: string; location: ReferenceLocation }[];

  private constructor(
    inputs: Iterable<{ input: ReferenceLocationInput; row: number }>,
    nameTables: NameTables
  ) {
    this.nameTables = nameTables;
    const locations: ReferenceLocation[] = [];
    const warnings: LoadWarning[] = [];

    for (const { input, row } of inputs) {
      const canonicalId = optionalText(input.canonicalId);
      const canonicalName = optionalText(input.canonicalName);

      if (!canonicalId) {
        warnings.push({ row, message: 'Missing identifier, row skipped' });
        continue;
      }
      if (!canonicalName) {
        warnings.push({ row, message: `Missing name for ${canonicalId}, row skipped` });
        continue;
      }
      if (this.byId.has(canonicalId)) {
        warnings.push({ row, message: `Duplicate identifier ${canonicalId}, row skipped` });
        continue;
      }

      const rawPostal = optionalText(input.postalCode);
      const postalCode = coercePostalCode(rawPostal);
      if (rawPostal && !postalCode) {
        warnings.push({
          row,
          message: `Invalid postal code "${rawPostal}" for ${canonicalId}, stored as empty`,
        });
      }

      const provider = normalizeProviderCode(input.provider ?? '');

      const location: ReferenceLocation = Object.freeze({
        canonicalId,
        canonicalName,
        street: optionalText(input.street),
        postalCode,
        city: optionalText(input.city),
        provider: provider || null,
      });

      locations.push(location);
      this.index(location);
    }

    this.locations = Object.freeze(locations);
    this.warnings = Object.freeze(warnings);
    this.sortedNames = locations
      .map(location => ({ text: this.getNormalizedName(location).text, location }))
      .sort((a, b) => compareText(a.text, b.text) || compareText(a.location.canonicalId, b.location.canonicalId));
  }

  private index(location: ReferenceLocation): void {
    this.byId.set(location.canonicalId, location);

    if (location.postalCode) {
      addToIndex(this.byPostalCode, location.postalCode, location);
    }
    if (location.provider) {
      addToIndex(this.byProvider, location.provider, location);
    }

    const normalized = normalizeName(location.canonicalName, this.nameTables);
    this.normalizedNames.set(location.canonicalId, normalized);
    for (const token of new Set(normalized.tokens)) {
      addToIndex(this.byNameToken, token, location);
    }
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  /**
   * Build a store from typed locations
   */
  static fromLocations(
    locations: Iterable<ReferenceLocationInput>,
    options: ReferenceStoreOptions = {}
  ): ReferenceStore {
    const inputs = Array.from(locations, (input, i) => ({ input, row: i + 1 }));
    return new ReferenceStore(inputs, options.nameTables ?? DEFAULT_NAME_TABLES);
  }

  /**
   * Build a store from a header + rows table. Throws DataLoadError when a
   * required column is missing.
   */
  static fromTable(
    table: Table,
    options: ReferenceStoreOptions & { source?: string } = {}
  ): ReferenceStore {
    const source = options.source ?? 'reference data';
    const columnIndex = (field: ReferenceField): number =>
      findColumn(table.headers, REFERENCE_COLUMNS[field]);
    const columns: Record<ReferenceField, number> = {
      canonicalId: columnIndex('canonicalId'),
      canonicalName: columnIndex('canonicalName'),
      street: columnIndex('street'),
      postalCode: columnIndex('postalCode'),
      city: columnIndex('city'),
      provider: columnIndex('provider'),
    };

    const missing = REQUIRED_FIELDS.filter(field => columns[field] === -1);
    if (missing.length > 0) {
      const expected = missing.map(field => REFERENCE_COLUMNS[field][0]).join(', ');
      throw new DataLoadError(
        `${source} is missing required column(s): ${expected} (found: ${table.headers.join(', ') || 'none'})`,
        source
      );
    }

    const cell = (row: string[], field: ReferenceField): string | null =>
      columns[field] === -1 ? null : row[columns[field]] ?? null;

    const inputs = table.rows.map((row, i) => ({
      row: i + 1,
      input: {
        canonicalId: cell(row, 'canonicalId') ?? '',
        canonicalName: cell(row, 'canonicalName') ?? '',
        street: cell(row, 'street'),
        postalCode: cell(row, 'postalCode'),
        city: cell(row, 'city'),
        provider: cell(row, 'provider'),
      },
    }));

    return new ReferenceStore(inputs, options.nameTables ?? DEFAULT_NAME_TABLES);
  }

  /**
   * Build a store from header-keyed records, e.g. rows of a parsed JSON file
   */
  static fromRecords(
    records: readonly Record<string, unknown>[],
    options: ReferenceStoreOptions & { source?: string } = {}
  ): ReferenceStore {
    return ReferenceStore.fromTable(tableFromRecords(records), options);
  }

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  get size(): number {
    return this.locations.length;
  }

  getById(canonicalId: string): ReferenceLocation | null {
    return this.byId.get(canonicalId) ?? null;
  }

  findByPostalCode(postalCode: string): readonly ReferenceLocation[] {
    return this.byPostalCode.get(postalCode) ?? [];
  }

  /**
   * Locations whose normalized name contains the token
   */
  findByNameToken(token: string): readonly ReferenceLocation[] {
    const [normalized] = normalizeName(token, this.nameTables).tokens;
    if (!normalized) return [];
    return this.byNameToken.get(normalized) ?? [];
  }

  /**
   * Locations whose normalized name starts with the normalized prefix,
   * ordered by name then identifier. Binary search over the sorted names.
   */
  findByNamePrefix(prefix: string): ReferenceLocation[] {
    const text = normalizeName(prefix, this.nameTables).text;
    if (!text) return [];

    let low = 0;
    let high = this.sortedNames.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareText(this.sortedNames[mid].text, text) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    const matches: ReferenceLocation[] = [];
    for (let i = low; i < this.sortedNames.length && this.sortedNames[i].text.startsWith(text); i++) {
      matches.push(this.sortedNames[i].location);
    }
    return matches;
  }

  findByProvider(providerCode: string): readonly ReferenceLocation[] {
    return this.byProvider.get(normalizeProviderCode(providerCode)) ?? [];
  }

  /**
   * Normalized name of a location, precomputed for stored ones
   */
  getNormalizedName(location: ReferenceLocation): NormalizedName {
    const cached = this.normalizedNames.get(location.canonicalId);
    if (cached && this.byId.get(location.canonicalId) === location) return cached;
    return normalizeName(location.canonicalName, this.nameTables);
  }

  stats(): ReferenceStoreStats {
    const franchises: Record<string, number> = {};
    const providers: Record<string, number> = {};
    let withPostalCode = 0;
    let withProvider = 0;

    for (const location of this.locations) {
      if (location.postalCode) withPostalCode++;
      if (location.provider) {
        withProvider++;
        providers[location.provider] = (providers[location.provider] ?? 0) + 1;
      }
      const franchise = this.getNormalizedName(location).franchise;
      if (franchise) {
        franchises[franchise] = (franchises[franchise] ?? 0) + 1;
      }
    }

    return {
      locations: this.locations.length,
      withPostalCode,
      withoutPostalCode: this.locations.length - withPostalCode,
      distinctPostalCodes: this.byPostalCode.size,
      withProvider,
      franchises,
      providers,
      warnings: this.warnings.length,
    };
  }
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Load a reference store from a .csv/.tsv/.txt/.json file
 */
export async function loadReferenceStore(
  filePath: string,
  options: ReferenceStoreOptions = {}
): Promise<ReferenceStore> {
  const table = await readTable(filePath);
  return ReferenceStore.fromTable(table, { ...options, source: path.basename(filePath) });
}

/**
 * Share one in-flight load between callers. A failed load is forgotten so
 * the next call retries.
 */
export function createStoreLoader(
  load: () => Promise<ReferenceStore>
): () => Promise<ReferenceStore> {
  let pending: Promise<ReferenceStore> | null = null;

  return () => {
    if (!pending) {
      pending = load().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
}
