/**
 * Similarity Engine
 *
 * Scores a query against reference locations.
 *
 * Name similarity takes the better of two signals:
 * - token overlap: word-order independent ("PARIS MCDONALDS" = "MCDONALDS PARIS")
 * - edit-distance ratio on the full string: tolerant of spelling drift
 *
 * Address similarity weights an exact postal code as half the score; the
 * other half is street-token overlap with city equality as a small tiebreaker.
 *
 * Every function here is pure.
 */

import {
  normalizeCity,
  streetTokens,
  DEFAULT_STREET_ABBREVIATIONS,
  type NormalizedAddress,
} from './address-normalizer.js';
import {
  normalizeName,
  DEFAULT_NAME_TABLES,
  type NameTables,
  type NormalizedName,
} from './name-normalizer.js';
import type { ReferenceLocation } from './reference-store.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Share of the address score carried by an exact postal code match */
export const POSTAL_CODE_WEIGHT = 0.5;

/** Share of the street component carried by city equality */
export const CITY_TIEBREAK_WEIGHT = 0.1;

// ============================================================================
// TOKEN COMPARISON
// ============================================================================

/**
 * Split normalized text into tokens
 */
export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Jaccard overlap of two token sets: |A ∩ B| / |A ∪ B|
 *
 * "MCDONALDS PARIS" vs "PARIS MCDONALDS" → 1.0
 */
export function tokenOverlapRatio(tokens1: string[], tokens2: string[]): number {
  const set1 = new Set(tokens1);
  const set2 = new Set(tokens2);

  if (set1.size === 0 && set2.size === 0) return 1;
  if (set1.size === 0 || set2.size === 0) return 0;

  let intersection = 0;
  for (const token of set1) {
    if (set2.has(token)) intersection++;
  }

  const union = set1.size + set2.size - intersection;
  return intersection / union;
}

// ============================================================================
// EDIT DISTANCE
// ============================================================================

/**
 * Levenshtein distance (insertions, deletions, substitutions)
 */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let previous = Array.from({ length: n + 1 }, (_, j) => j);
  let current = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= m; i++) {
    current[0] = i;
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[n];
}

/**
 * 1 - distance / longer length. Identical strings (including two empty ones) → 1.
 */
export function editDistanceRatio(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longest;
}

// ============================================================================
// NAME SIMILARITY
// ============================================================================

/**
 * Similarity of two normalized names: max(token overlap, edit ratio)
 */
export function nameSimilarity(a: NormalizedName, b: NormalizedName): number {
  return Math.max(
    tokenOverlapRatio(a.tokens, b.tokens),
    editDistanceRatio(a.text, b.text),
  );
}

/**
 * Full breakdown of a name comparison, for diagnostics
 */
export function explainNameMatch(
  name1: string,
  name2: string,
  tables: NameTables = DEFAULT_NAME_TABLES
): {
  name1Original: string;
  name2Original: string;
  name1Normalized: NormalizedName;
  name2Normalized: NormalizedName;
  sharedTokens: string[];
  tokenOverlap: number;
  editRatio: number;
  similarity: number;
} {
  const normalized1 = normalizeName(name1, tables);
  const normalized2 = normalizeName(name2, tables);
  const tokens2 = new Set(normalized2.tokens);
  const tokenOverlap = tokenOverlapRatio(normalized1.tokens, normalized2.tokens);
  const editRatio = editDistanceRatio(normalized1.text, normalized2.text);

  return {
    name1Original: name1,
    name2Original: name2,
    name1Normalized: normalized1,
    name2Normalized: normalized2,
    sharedTokens: [...new Set(normalized1.tokens)].filter(token => tokens2.has(token)),
    tokenOverlap,
    editRatio,
    similarity: Math.max(tokenOverlap, editRatio),
  };
}

// ============================================================================
// ADDRESS SIMILARITY
// ============================================================================

/**
 * Similarity of a query address to a reference location's address.
 *
 * postal (0.5) + street component (0.5), where the street component is
 * 0.9 × street-token overlap + 0.1 × city equality.
 */
export function addressSimilarity(
  address: NormalizedAddress,
  location: ReferenceLocation,
  abbreviations: Record<string, string> = DEFAULT_STREET_ABBREVIATIONS
): number {
  const postalScore =
    address.postalCode !== null && address.postalCode === location.postalCode ? 1 : 0;

  let streetScore = 0;
  if (address.street && location.street) {
    streetScore = tokenOverlapRatio(
      streetTokens(address.street, abbreviations),
      streetTokens(location.street, abbreviations),
    );
  }

  let cityScore = 0;
  if (address.city && location.city) {
    const city1 = normalizeCity(address.city);
    cityScore = city1 !== '' && city1 === normalizeCity(location.city) ? 1 : 0;
  }

  const streetComponent =
    (1 - CITY_TIEBREAK_WEIGHT) * streetScore + CITY_TIEBREAK_WEIGHT * cityScore;

  return POSTAL_CODE_WEIGHT * postalScore + (1 - POSTAL_CODE_WEIGHT) * streetComponent;
}
