/**
 * Provider Normalizer
 *
 * Maps the collector name printed on an invoice ("Suez RV Centre Est",
 * "VEOLIA PROPRETE") to a canonical provider code, and picks the collection
 * suffix (code + waste streams, e.g. SUEZBIODIB) the site is registered under.
 */

import * as path from 'path';
import { DataLoadError } from './errors.js';
import { cleanText } from './name-normalizer.js';
import { editDistanceRatio, tokenize } from './similarity.js';
import { findColumn, readTable, type Table } from './table-reader.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ProviderAlias {
  /** Canonical provider code (uppercase) */
  canonicalCode: string;
  aliases: string[];

  /** Registered collection suffixes, e.g. ["SUEZBIO", "SUEZBIODIB"] */
  acceptedCombinationSuffixes: string[];
}

export interface ProviderMatch {
  canonicalCode: string;
  score: number;

  /** The code or alias that produced the score */
  matchedTerm: string;
}

/**
 * A waste stream and the label pattern that reveals it
 */
export interface WasteTypePattern {
  type: string;

  /** Regular expression source, matched against the uppercased label */
  pattern: string;
}

export const DEFAULT_PROVIDER_THRESHOLD = 0.6;

export const DEFAULT_WASTE_TYPE_PATTERNS: WasteTypePattern[] = [
  { type: 'BIO', pattern: 'BIO' },
  { type: 'DIB', pattern: 'DIB' },
  { type: 'CS', pattern: '\\bCS\\b|RECYCLABLE' },
];

export const PROVIDER_COLUMNS = {
  canonicalCode: ['canonical_code', 'collecte', 'code', 'provider', 'prestataire'],
  aliases: ['aliases', 'alias', 'noms'],
  combinations: ['combinations', 'combinaisons', 'accepted_combination_suffixes', 'suffixes'],
} as const;

// ============================================================================
// MATCHING
// ============================================================================

/**
 * Canonical form of a provider code: cleaned, uppercase, no spaces ("Suez RV" → SUEZRV)
 */
export function normalizeProviderCode(raw: string): string {
  return cleanText(raw).replace(/\s+/g, '');
}

/**
 * How well a raw provider string contains a term: mean over the term's
 * tokens of the best edit ratio against any raw token
 */
export function termContainment(rawTokens: string[], term: string): number {
  const termTokens = tokenize(cleanText(term));
  if (termTokens.length === 0 || rawTokens.length === 0) return 0;

  let total = 0;
  for (const termToken of termTokens) {
    let best = 0;
    for (const rawToken of rawTokens) {
      best = Math.max(best, editDistanceRatio(termToken, rawToken));
    }
    total += best;
  }
  return total / termTokens.length;
}

/**
 * Best provider for a raw string, or null below the threshold.
 * Ties prefer the longer term, then the earlier provider.
 */
export function matchProvider(
  raw: string | null | undefined,
  providers: readonly ProviderAlias[],
  threshold: number = DEFAULT_PROVIDER_THRESHOLD
): ProviderMatch | null {
  const rawTokens = tokenize(cleanText(raw ?? ''));
  if (rawTokens.length === 0) return null;

  let best: ProviderMatch | null = null;
  let bestLength = 0;

  for (const provider of providers) {
    for (const term of [provider.canonicalCode, ...provider.aliases]) {
      const score = termContainment(rawTokens, term);
      const length = cleanText(term).length;
      if (
        best === null ||
        score > best.score ||
        (score === best.score && length > bestLength)
      ) {
        best = { canonicalCode: provider.canonicalCode, score, matchedTerm: term };
        bestLength = length;
      }
    }
  }

  if (best === null || best.score < threshold) return null;
  return best;
}

/**
 * Canonical provider code for a raw string, or null
 */
export function resolveProvider(
  raw: string | null | undefined,
  providers: readonly ProviderAlias[],
  threshold: number = DEFAULT_PROVIDER_THRESHOLD
): string | null {
  return matchProvider(raw, providers, threshold)?.canonicalCode ?? null;
}

// ============================================================================
// COLLECTION SUFFIX
// ============================================================================

/**
 * Waste streams named in a list of labels, in pattern order
 */
export function detectWasteTypes(
  labels: readonly string[],
  patterns: readonly WasteTypePattern[] = DEFAULT_WASTE_TYPE_PATTERNS
): string[] {
  const text = labels.map(label => cleanText(label)).join(' ');
  if (!text) return [];

  return patterns
    .filter(pattern => new RegExp(pattern.pattern).test(text))
    .map(pattern => pattern.type);
}

/**
 * Waste streams encoded in a suffix ("SUEZBIODIB" → BIO, DIB). The provider
 * code prefix is ignored.
 */
function suffixWasteTypes(
  suffix: string,
  code: string,
  patterns: readonly WasteTypePattern[]
): Set<string> {
  const tail = suffix.startsWith(code) ? suffix.slice(code.length) : suffix;
  return new Set(patterns.filter(pattern => tail.includes(pattern.type)).map(pattern => pattern.type));
}

/**
 * Collection suffix for a provider and the waste labels read off the invoice.
 *
 * 1. no waste type detected → the provider code
 * 2. a registered suffix with exactly the detected types
 * 3. the registered suffix sharing the most types (first wins)
 * 4. code + detected types sorted alphabetically
 */
export function determineCollectionSuffix(
  provider: ProviderAlias,
  wasteLabels: readonly string[],
  patterns: readonly WasteTypePattern[] = DEFAULT_WASTE_TYPE_PATTERNS
): string {
  const code = provider.canonicalCode.toUpperCase();
  const detected = detectWasteTypes(wasteLabels, patterns);
  if (detected.length === 0) return code;

  const detectedSet = new Set(detected);
  let bestMatch: string | null = null;
  let bestOverlap = 0;

  for (const raw of provider.acceptedCombinationSuffixes) {
    const suffix = raw.toUpperCase();
    const types = suffixWasteTypes(suffix, code, patterns);
    const overlap = detected.filter(type => types.has(type)).length;

    if (types.size === detectedSet.size && overlap === detectedSet.size) {
      return suffix;
    }
    if (overlap > bestOverlap) {
      bestMatch = suffix;
      bestOverlap = overlap;
    }
  }

  if (bestMatch) return bestMatch;
  return code + [...detected].sort().join('');
}

// ============================================================================
// LOADING
// ============================================================================

function splitList(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell
    .split(/[,|]/)
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Build provider aliases from a header + rows table. Rows repeating a code
 * are merged.
 */
export function providersFromTable(table: Table, source = 'provider data'): ProviderAlias[] {
  const codeColumn = findColumn(table.headers, PROVIDER_COLUMNS.canonicalCode);
  if (codeColumn === -1) {
    throw new DataLoadError(
      `${source} is missing required column: canonical_code (found: ${table.headers.join(', ') || 'none'})`,
      source
    );
  }
  const aliasColumn = findColumn(table.headers, PROVIDER_COLUMNS.aliases);
  const combinationColumn = findColumn(table.headers, PROVIDER_COLUMNS.combinations);

  const byCode = new Map<string, ProviderAlias>();

  for (const row of table.rows) {
    const code = normalizeProviderCode(row[codeColumn] ?? '');
    if (!code) continue;

    const entry = byCode.get(code) ?? { canonicalCode: code, aliases: [], acceptedCombinationSuffixes: [] };
    byCode.set(code, entry);

    if (aliasColumn !== -1) {
      for (const alias of splitList(row[aliasColumn])) {
        if (!entry.aliases.includes(alias)) entry.aliases.push(alias);
      }
    }
    if (combinationColumn !== -1) {
      for (const suffix of splitList(row[combinationColumn]).map(s => s.toUpperCase())) {
        if (!entry.acceptedCombinationSuffixes.includes(suffix)) {
          entry.acceptedCombinationSuffixes.push(suffix);
        }
      }
    }
  }

  return [...byCode.values()];
}

/**
 * Load provider aliases from a .csv/.tsv/.txt/.json file
 */
export async function loadProviderAliases(filePath: string): Promise<ProviderAlias[]> {
  const table = await readTable(filePath);
  return providersFromTable(table, path.basename(filePath));
}
