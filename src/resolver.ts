/**
 * Disambiguation Resolver
 *
 * Resolves a query bundle to one reference location in three ordered stages.
 * Each stage runs only when the previous one produced no confident result:
 *
 * 1. Name match: locations whose name similarity clears the threshold.
 *    A single survivor is resolved (EXACT_NAME).
 * 2. Address disambiguation: several survivors and a usable address. The
 *    combined name/address score must lead by more than the tie epsilon
 *    (NAME_PLUS_ADDRESS), otherwise the tied candidates are returned.
 * 3. Postal fallback: no survivor, or no usable address. Locations sharing
 *    the postal code, re-ranked by name; the leader needs a minimum margin
 *    (POSTAL_FALLBACK).
 *
 * When every stage is exhausted the result is not_found; survivors of
 * stage 1 lead its near misses.
 *
 * Resolution is synchronous and reads nothing but its arguments, so repeated
 * calls with the same query and store return equal results.
 */

import { DEFAULT_MATCHING_TABLES, DEFAULT_RESOLVER_CONFIG, type MatchingTables, type ResolverConfig } from './config.js';
import { isUsableAddress, normalizeAddress, type NormalizedAddress } from './address-normalizer.js';
import { normalizeName } from './name-normalizer.js';
import { coercePostalCode } from './postal-code.js';
import { matchProvider, type ProviderAlias } from './provider-normalizer.js';
import type { ReferenceLocation, ReferenceStore } from './reference-store.js';
import { addressSimilarity, nameSimilarity } from './similarity.js';

// ============================================================================
// TYPES
// ============================================================================

export interface QueryBundle {
  rawName: string;
  rawAddress?: string | null;
  postalCodeHint?: string | null;
  providerRaw?: string | null;
}

export type MatchedVia = 'EXACT_NAME' | 'NAME_PLUS_ADDRESS' | 'POSTAL_FALLBACK';

export interface MatchCandidate {
  location: ReferenceLocation;
  nameScore: number;

  /** null when the address was not compared */
  addressScore: number | null;
  combinedScore: number;
}

interface ResultBase {
  /** Canonical provider code, when providers were given and one matched */
  provider: string | null;

  /** Stages run and their outcome */
  trace: string[];
}

export interface ResolvedResult extends ResultBase {
  status: 'resolved';
  location: ReferenceLocation;
  matchedVia: MatchedVia;
  candidate: MatchCandidate;

  /** Runners-up of the deciding stage */
  nearMisses: MatchCandidate[];
}

export interface AmbiguousResult extends ResultBase {
  status: 'ambiguous';
  candidates: MatchCandidate[];
}

export interface NotFoundResult extends ResultBase {
  status: 'not_found';
  reason: string;
  nearMisses: MatchCandidate[];
}

export type ResolutionResult = ResolvedResult | AmbiguousResult | NotFoundResult;

export interface ResolveOptions {
  config?: ResolverConfig;

  /** Address tables; names are normalized with the store's own tables */
  tables?: MatchingTables;

  /** Enables provider resolution and provider-scoped candidate pools */
  providers?: readonly ProviderAlias[];
}

// ============================================================================
// RANKING
// ============================================================================

function byIdAscending(a: MatchCandidate, b: MatchCandidate): number {
  const idA = a.location.canonicalId;
  const idB = b.location.canonicalId;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

/**
 * Sort by combined score (then name score) descending; ties break on id
 */
export function rankCandidates(candidates: readonly MatchCandidate[]): MatchCandidate[] {
  return [...candidates].sort((a, b) =>
    b.combinedScore - a.combinedScore ||
    b.nameScore - a.nameScore ||
    byIdAscending(a, b)
  );
}

function score(value: number): string {
  return value.toFixed(3);
}

// ============================================================================
// RESOLVE
// ============================================================================

/**
 * Resolve a query bundle against a reference store
 */
export function resolve(
  query: QueryBundle,
  store: ReferenceStore,
  options: ResolveOptions = {}
): ResolutionResult {
  const config = options.config ?? DEFAULT_RESOLVER_CONFIG;
  const tables = options.tables ?? DEFAULT_MATCHING_TABLES;
  const trace: string[] = [];

  // Provider and candidate pool
  let provider: string | null = null;
  if (options.providers) {
    const match = matchProvider(query.providerRaw, options.providers, config.providerThreshold);
    provider = match?.canonicalCode ?? null;
    trace.push(match
      ? `provider: ${match.canonicalCode} (via "${match.matchedTerm}", ${score(match.score)})`
      : 'provider: none');
  }

  let pool: readonly ReferenceLocation[] = store.locations;
  if (provider && config.useProviderScope) {
    const scoped = store.findByProvider(provider);
    if (scoped.length > 0) {
      pool = scoped;
      trace.push(`pool: ${scoped.length} location(s) registered with ${provider}`);
    }
  }

  // Query normalization
  const queryName = normalizeName(query.rawName ?? '', store.nameTables);
  const address = normalizeAddress(query.rawAddress, tables.address);
  const hint = coercePostalCode(query.postalCodeHint);
  const postalCode = hint ?? address.postalCode;

  trace.push(queryName.text ? `name: ${queryName.text}` : 'name: none');
  if (address.isCompanyAddress) {
    trace.push('address: company address only, ignored');
  } else {
    trace.push(address.normalizedText ? `address: ${address.normalizedText}` : 'address: none');
  }

  const base = { provider, trace };

  const scored: MatchCandidate[] = pool.map(location => {
    const nameScore = queryName.text
      ? nameSimilarity(queryName, store.getNormalizedName(location))
      : 0;
    return { location, nameScore, addressScore: null, combinedScore: nameScore };
  });

  const nearMisses = (): MatchCandidate[] =>
    rankCandidates(scored.filter(c => c.nameScore > 0)).slice(0, config.maxNearMisses);

  // Stage 1: name match
  const nameCandidates = queryName.text
    ? rankCandidates(scored.filter(c => c.nameScore >= config.nameMatchThreshold))
    : [];

  if (!queryName.text) {
    trace.push('stage 1: skipped, no name');
  } else {
    trace.push(`stage 1: ${nameCandidates.length} candidate(s) at or above ${config.nameMatchThreshold}`);
  }

  if (nameCandidates.length === 1) {
    const [winner] = nameCandidates;
    return {
      ...base,
      status: 'resolved',
      location: winner.location,
      matchedVia: 'EXACT_NAME',
      candidate: winner,
      nearMisses: rankCandidates(scored.filter(c => c !== winner && c.nameScore > 0))
        .slice(0, config.maxNearMisses),
    };
  }

  // Stage 2: address disambiguation
  if (nameCandidates.length >= 2) {
    if (isUsableAddress(address)) {
      const filled: NormalizedAddress =
        address.postalCode === null && hint ? { ...address, postalCode: hint } : address;
      return disambiguateByAddress(nameCandidates, filled, config, tables, base);
    }
    trace.push('stage 2: skipped, no usable address');
  }

  // Stage 3: postal fallback
  if (!postalCode) {
    trace.push('stage 3: skipped, no postal code');
  } else {
    const postalSet = pool.filter(location => location.postalCode === postalCode);
    trace.push(`stage 3: ${postalSet.length} location(s) at ${postalCode}`);

    if (postalSet.length > 0) {
      const inPostalSet = new Set(postalSet);
      const ranked = rankCandidates(scored.filter(c => inPostalSet.has(c.location)));
      const [leader, runnerUp] = ranked;

      if (!runnerUp || leader.nameScore - runnerUp.nameScore >= config.postalMinMargin) {
        return {
          ...base,
          status: 'resolved',
          location: leader.location,
          matchedVia: 'POSTAL_FALLBACK',
          candidate: leader,
          nearMisses: ranked.slice(1, 1 + config.maxNearMisses),
        };
      }

      trace.push(
        `stage 3: lead ${score(leader.nameScore - runnerUp.nameScore)} below margin ${config.postalMinMargin}`
      );
      return { ...base, status: 'ambiguous', candidates: ranked };
    }
  }

  if (nameCandidates.length >= 2) {
    const others = nearMisses().filter(c => !nameCandidates.includes(c));
    return {
      ...base,
      status: 'not_found',
      reason: postalCode
        ? `${nameCandidates.length} locations matched the name but none is at postal code ${postalCode}`
        : `${nameCandidates.length} locations matched the name and no address or postal code separated them`,
      nearMisses: [...nameCandidates, ...others].slice(0, config.maxNearMisses),
    };
  }

  let reason: string;
  if (!queryName.text && !postalCode) {
    reason = 'No name, address or postal code to match on';
  } else if (!postalCode) {
    reason = 'No location matched the name and no postal code was available';
  } else if (!queryName.text) {
    reason = `No location at postal code ${postalCode}`;
  } else {
    reason = `No location matched the name or postal code ${postalCode}`;
  }

  return { ...base, status: 'not_found', reason, nearMisses: nearMisses() };
}

/**
 * Stage 2: rank name candidates by the weighted name/address score
 */
function disambiguateByAddress(
  nameCandidates: MatchCandidate[],
  address: NormalizedAddress,
  config: ResolverConfig,
  tables: MatchingTables,
  base: { provider: string | null; trace: string[] }
): ResolutionResult {
  const ranked = rankCandidates(
    nameCandidates.map(candidate => {
      const addressScore = addressSimilarity(
        address,
        candidate.location,
        tables.address.streetAbbreviations
      );
      return {
        ...candidate,
        addressScore,
        combinedScore: config.nameWeight * candidate.nameScore + config.addressWeight * addressScore,
      };
    })
  );

  const [leader, runnerUp] = ranked;
  const gap = leader.combinedScore - runnerUp.combinedScore;
  base.trace.push(
    `stage 2: leader ${leader.location.canonicalId} ${score(leader.combinedScore)}, runner-up ${score(runnerUp.combinedScore)}`
  );

  if (gap > config.tieEpsilon) {
    return {
      ...base,
      status: 'resolved',
      location: leader.location,
      matchedVia: 'NAME_PLUS_ADDRESS',
      candidate: leader,
      nearMisses: ranked.slice(1, 1 + config.maxNearMisses),
    };
  }

  const tied = ranked.filter(c => leader.combinedScore - c.combinedScore <= config.tieEpsilon);
  base.trace.push(`stage 2: ${tied.length} candidates within ${config.tieEpsilon}, not resolved`);
  return { ...base, status: 'ambiguous', candidates: tied };
}
