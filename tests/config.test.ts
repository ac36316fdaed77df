import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  DEFAULT_RESOLVER_CONFIG,
  DEFAULT_MATCHING_TABLES,
  validateResolverConfig,
  parseResolverConfig,
  loadResolverConfig,
  parseMatchingTables,
  loadMatchingTables,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { normalizeName } from '../src/name-normalizer.js';
import { normalizeAddress } from '../src/address-normalizer.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

// ============================================================================
// RESOLVER CONFIG
// ============================================================================

describe('validateResolverConfig', () => {
  it('accepts the defaults', () => {
    expect(validateResolverConfig(DEFAULT_RESOLVER_CONFIG)).toEqual(DEFAULT_RESOLVER_CONFIG);
  });

  it('rejects scores outside [0, 1]', () => {
    const config = { ...DEFAULT_RESOLVER_CONFIG, tieEpsilon: -0.1 };
    expect(() => validateResolverConfig(config, 'options')).toThrow(ConfigError);
    expect(() => validateResolverConfig(config, 'options'))
      .toThrow('Invalid options: tieEpsilon: Number must be greater than or equal to 0');
  });
});

describe('parseResolverConfig', () => {
  it('merges overrides over the base', () => {
    expect(parseResolverConfig({ maxNearMisses: 2 })).toEqual({
      ...DEFAULT_RESOLVER_CONFIG,
      maxNearMisses: 2,
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseResolverConfig({ threshold: 0.5 }))
      .toThrow("Invalid config: (root): Unrecognized key(s) in object: 'threshold'");
  });

  it('rejects fractional near-miss counts', () => {
    expect(() => parseResolverConfig({ maxNearMisses: 1.5 })).toThrow(ConfigError);
  });
});

describe('loadResolverConfig', () => {
  it('loads overrides from a file', async () => {
    const config = await loadResolverConfig(fixture('config.json'));
    expect(config.nameMatchThreshold).toBe(0.9);
    expect(config.maxNearMisses).toBe(3);
    expect(config.tieEpsilon).toBe(DEFAULT_RESOLVER_CONFIG.tieEpsilon);
  });

  it('reports invalid values with the file name', async () => {
    const file = fixture('bad-config.json');
    await expect(loadResolverConfig(file)).rejects.toThrow(
      `Invalid ${file}: nameMatchThreshold: Number must be less than or equal to 1`
    );
  });

  it('reports unreadable files', async () => {
    await expect(loadResolverConfig(fixture('missing.json'))).rejects.toThrow(ConfigError);
  });

  it('reports malformed JSON', async () => {
    const file = fixture('missing-columns.csv');
    await expect(loadResolverConfig(file)).rejects.toThrow(`Invalid JSON in ${file}`);
  });
});

// ============================================================================
// MATCHING TABLES
// ============================================================================

describe('parseMatchingTables', () => {
  it('returns the base for an empty document', () => {
    expect(parseMatchingTables({})).toEqual(DEFAULT_MATCHING_TABLES);
  });

  it('replaces tables when extend is false', () => {
    const tables = parseMatchingTables({ extend: false, noiseTokens: ['sarl'] });
    expect(tables.name.noiseTokens).toEqual(['SARL']);
    expect(tables.name.franchiseAliases).toBe(DEFAULT_MATCHING_TABLES.name.franchiseAliases);
  });

  it('uppercases abbreviations', () => {
    const tables = parseMatchingTables({ streetAbbreviations: { imp: 'impasse' } });
    expect(tables.address.streetAbbreviations['IMP']).toBe('IMPASSE');
  });

  it('rejects invalid patterns', () => {
    expect(() => parseMatchingTables({ franchiseAliases: [{ pattern: '(', canonical: 'X' }] }))
      .toThrow('Invalid tables: franchiseAliases.0.pattern: invalid regular expression');
  });

  it('rejects malformed postal codes', () => {
    const data = { companyAddresses: [{ name: 'ACME', street: '', postalCode: '7500' }] };
    expect(() => parseMatchingTables(data))
      .toThrow('Invalid tables: companyAddresses.0.postalCode: must be 5 digits');
  });
});

describe('loadMatchingTables', () => {
  it('extends the built-in tables', async () => {
    const tables = await loadMatchingTables(fixture('tables.json'));

    expect(tables.name.franchiseAliases).toHaveLength(DEFAULT_MATCHING_TABLES.name.franchiseAliases.length + 1);
    expect(tables.name.noiseTokens).toContain('RESTAURANT');
    expect(tables.address.companyAddresses).toContainEqual({
      name: 'ACME',
      street: '1 RUE DE LA PAIX',
      postalCode: '75002',
    });
  });

  it('feeds the normalizers', async () => {
    const tables = await loadMatchingTables(fixture('tables.json'));

    expect(normalizeName('Restaurant Quick Burger', tables.name).text).toBe('QUICK');
    expect(normalizeName('SARL McDo', tables.name).text).toBe('MCDONALDS');
    expect(normalizeAddress('ACME, 1 RUE DE LA PAIX 75002 PARIS', tables.address).isCompanyAddress).toBe(true);
  });
});
