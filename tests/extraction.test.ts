import { describe, it, expect, vi } from 'vitest';
import {
  buildQueryBundle,
  analyzeDocument,
  type ExtractedFields,
  type ExtractionService,
  type QuotaTracker,
} from '../src/extraction.js';

const RUBO_FIELDS: ExtractedFields = {
  companyName: 'MCDONALDS',
  streetAddress: '34 BOULEVARD DES ITALIENS',
  postalCode: '75009',
  city: 'PARIS',
};

const DOCUMENT = 'RUBO 34 BOULEVARD DES ITALIENS 75009 PARIS\nLIVRAISON 12 AVENUE DE LA GARE 58180 MARZY';

function createQuota(limit: number): QuotaTracker & { calls: number } {
  return {
    calls: 0,
    canMakeCall() {
      return this.calls < limit;
    },
    recordCall() {
      this.calls++;
    },
  };
}

// ============================================================================
// QUERY ASSEMBLY
// ============================================================================

describe('buildQueryBundle', () => {
  it('uses the structured address', () => {
    const query = buildQueryBundle({
      companyName: ' McDo ',
      streetAddress: '10 rue de la République',
      postalCode: '69002',
      city: 'Lyon',
      providerName: 'Suez RV',
    });

    expect(query).toEqual({
      rawName: 'McDo',
      rawAddress: '10 rue de la République 69002 Lyon',
      postalCodeHint: '69002',
      providerRaw: 'Suez RV',
    });
  });

  it('falls back to the document text for a company address', () => {
    const query = buildQueryBundle(RUBO_FIELDS, DOCUMENT);

    expect(query.rawAddress).toBe(DOCUMENT);
    expect(query.postalCodeHint).toBeNull();
  });

  it('drops a company address without document text', () => {
    const query = buildQueryBundle(RUBO_FIELDS);

    expect(query.rawAddress).toBeNull();
    expect(query.postalCodeHint).toBeNull();
  });

  it('uses the document text when no address was extracted', () => {
    expect(buildQueryBundle({}, DOCUMENT)).toEqual({
      rawName: '',
      rawAddress: DOCUMENT,
      postalCodeHint: null,
      providerRaw: null,
    });
  });

  it('handles empty fields', () => {
    expect(buildQueryBundle({ companyName: null, wasteTypes: null })).toEqual({
      rawName: '',
      rawAddress: null,
      postalCodeHint: null,
      providerRaw: null,
    });
  });

  it('ignores a malformed postal code', () => {
    expect(buildQueryBundle({ postalCode: '7500' }).postalCodeHint).toBeNull();
  });
});

// ============================================================================
// DOCUMENT ANALYSIS
// ============================================================================

describe('analyzeDocument', () => {
  it('extracts fields and builds the query', async () => {
    const service: ExtractionService = {
      extract: vi.fn(async () => ({ companyName: 'Burger King', postalCode: '69007' })),
    };
    const quota = createQuota(1);

    const analysis = await analyzeDocument('scanned text', service, quota);

    expect(analysis.error).toBeNull();
    expect(analysis.fields).toEqual({ companyName: 'Burger King', postalCode: '69007' });
    expect(analysis.query).toEqual({
      rawName: 'Burger King',
      rawAddress: '69007',
      postalCodeHint: '69007',
      providerRaw: null,
    });
    expect(service.extract).toHaveBeenCalledWith('scanned text');
    expect(quota.calls).toBe(1);
  });

  it('stops when the quota is exhausted', async () => {
    const service: ExtractionService = { extract: vi.fn(async () => ({})) };

    const analysis = await analyzeDocument('scanned text', service, createQuota(0));

    expect(analysis).toEqual({ fields: null, query: null, error: 'Extraction quota exhausted' });
    expect(service.extract).not.toHaveBeenCalled();
  });

  it('reports service failures and still records the call', async () => {
    const service: ExtractionService = {
      extract: vi.fn(async () => {
        throw new Error('rate limited');
      }),
    };
    const quota = createQuota(5);

    const analysis = await analyzeDocument('scanned text', service, quota);

    expect(analysis).toEqual({ fields: null, query: null, error: 'rate limited' });
    expect(quota.calls).toBe(1);
  });

  it('works without a quota tracker', async () => {
    const service: ExtractionService = { extract: async () => ({ companyName: 'KFC' }) };
    const analysis = await analyzeDocument('', service);
    expect(analysis.query?.rawName).toBe('KFC');
  });
});
