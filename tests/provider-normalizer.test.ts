import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  termContainment,
  matchProvider,
  resolveProvider,
  detectWasteTypes,
  determineCollectionSuffix,
  providersFromTable,
  normalizeProviderCode,
  loadProviderAliases,
  type ProviderAlias,
} from '../src/provider-normalizer.js';
import { DataLoadError } from '../src/errors.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const SUEZ: ProviderAlias = {
  canonicalCode: 'SUEZ',
  aliases: ['SUEZ RV', 'SUEZ RECYCLAGE ET VALORISATION', 'SITA'],
  acceptedCombinationSuffixes: ['SUEZBIO', 'SUEZDIB', 'SUEZBIODIB'],
};

const VEOLIA: ProviderAlias = {
  canonicalCode: 'VEOLIA',
  aliases: ['VEOLIA PROPRETE', 'ONYX'],
  acceptedCombinationSuffixes: ['VEOLIABIO', 'VEOLIABIODIB', 'VEOLIADIBCS'],
};

const PROVIDERS = [SUEZ, VEOLIA];

// ============================================================================
// MATCHING
// ============================================================================

describe('termContainment', () => {
  it('averages the best ratio of each term token', () => {
    expect(termContainment(['SUEZ', 'RV', 'CENTRE'], 'Suez RV')).toBe(1);
    expect(termContainment(['VEOLA'], 'VEOLIA')).toBeCloseTo(5 / 6);
  });

  it('returns 0 without tokens', () => {
    expect(termContainment([], 'SUEZ')).toBe(0);
    expect(termContainment(['SUEZ'], '')).toBe(0);
  });
});

describe('matchProvider', () => {
  it('matches an alias embedded in a longer string', () => {
    expect(matchProvider('Suez RV Centre Est', PROVIDERS)).toEqual({
      canonicalCode: 'SUEZ',
      score: 1,
      matchedTerm: 'SUEZ RV',
    });
  });

  it('prefers the longer term on equal scores', () => {
    expect(matchProvider('Veolia Propreté Sud', PROVIDERS)?.matchedTerm).toBe('VEOLIA PROPRETE');
  });

  it('tolerates misspellings', () => {
    const match = matchProvider('VEOLA', PROVIDERS);
    expect(match?.canonicalCode).toBe('VEOLIA');
    expect(match?.matchedTerm).toBe('VEOLIA');
    expect(match?.score).toBeCloseTo(5 / 6);
  });

  it('returns null below the threshold', () => {
    expect(matchProvider('Transports Martin', PROVIDERS)).toBeNull();
    expect(matchProvider('VEOLA', PROVIDERS, 0.9)).toBeNull();
  });

  it('returns null for empty input', () => {
    expect(matchProvider('', PROVIDERS)).toBeNull();
    expect(matchProvider(null, PROVIDERS)).toBeNull();
    expect(matchProvider('SUEZ', [])).toBeNull();
  });
});

describe('resolveProvider', () => {
  it('returns the canonical code', () => {
    expect(resolveProvider('ONYX', PROVIDERS)).toBe('VEOLIA');
    expect(resolveProvider('Transports Martin', PROVIDERS)).toBeNull();
  });
});

// ============================================================================
// COLLECTION SUFFIX
// ============================================================================

describe('detectWasteTypes', () => {
  it('returns types in pattern order', () => {
    expect(detectWasteTypes(['Collecte DIB', 'Bac BIO'])).toEqual(['BIO', 'DIB']);
  });

  it('detects recyclables by keyword or code', () => {
    expect(detectWasteTypes(['Recyclables'])).toEqual(['CS']);
    expect(detectWasteTypes(['Bac CS 660L'])).toEqual(['CS']);
  });

  it('does not read CS inside a word', () => {
    expect(detectWasteTypes(['CSV export'])).toEqual([]);
  });

  it('returns nothing for empty labels', () => {
    expect(detectWasteTypes([])).toEqual([]);
  });
});

describe('determineCollectionSuffix', () => {
  it('returns the code when no waste type is detected', () => {
    expect(determineCollectionSuffix(SUEZ, [])).toBe('SUEZ');
    expect(determineCollectionSuffix(SUEZ, ['Ordures ménagères'])).toBe('SUEZ');
  });

  it('returns the exact registered combination', () => {
    expect(determineCollectionSuffix(SUEZ, ['Déchets BIO'])).toBe('SUEZBIO');
    expect(determineCollectionSuffix(SUEZ, ['BIO', 'DIB'])).toBe('SUEZBIODIB');
  });

  it('falls back to the best overlapping combination', () => {
    expect(determineCollectionSuffix(VEOLIA, ['Recyclables'])).toBe('VEOLIADIBCS');
  });

  it('builds a suffix when nothing is registered', () => {
    const onyx: ProviderAlias = { canonicalCode: 'ONYX', aliases: [], acceptedCombinationSuffixes: [] };
    expect(determineCollectionSuffix(onyx, ['DIB', 'BIO'])).toBe('ONYXBIODIB');
  });
});

// ============================================================================
// LOADING
// ============================================================================

describe('providersFromTable', () => {
  it('merges rows repeating a code', () => {
    const providers = providersFromTable({
      headers: ['Code', 'Alias'],
      rows: [['suez', 'SITA'], ['Suez', 'SITA|SUEZ RV'], ['', 'ORPHAN']],
    });
    expect(providers).toEqual([
      { canonicalCode: 'SUEZ', aliases: ['SITA', 'SUEZ RV'], acceptedCombinationSuffixes: [] },
    ]);
  });

  it('removes spaces from multi-word codes', () => {
    const providers = providersFromTable({
      headers: ['code', 'aliases'],
      rows: [['Suez RV', 'SUEZ RV'], ['Veolia', '']],
    });
    expect(providers.map(p => p.canonicalCode)).toEqual(['SUEZRV', 'VEOLIA']);
    expect(normalizeProviderCode(' suez  rv ')).toBe('SUEZRV');
  });

  it('requires a code column', () => {
    const table = { headers: ['name'], rows: [] };
    expect(() => providersFromTable(table, 'providers.csv')).toThrow(DataLoadError);
    expect(() => providersFromTable(table, 'providers.csv'))
      .toThrow('providers.csv is missing required column: canonical_code (found: name)');
  });
});

describe('loadProviderAliases', () => {
  it('loads the provider file', async () => {
    expect(await loadProviderAliases(fixture('providers.csv'))).toEqual(PROVIDERS);
  });
});
