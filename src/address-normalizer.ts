/**
 * Address Normalizer & Extractor
 *
 * Pulls a {street, postal code, city} triple out of free invoice text.
 *
 * Every 5-digit run in the text is a candidate postal code. Each candidate is
 * scored on its surroundings and the best one wins, so the result does not
 * depend on which address happens to be printed first:
 * - city words right after the code (+2)
 * - a street type before it (+1)
 * - a house number before it (+1)
 * - an invoice/contact label right before it (-3, and negatives are dropped)
 *
 * Candidates matching a known non-destination address (the invoicing
 * company's own headquarters) are set aside, and so are lines without a
 * postal code that hold a company street. When nothing else is left the
 * result is flagged `isCompanyAddress` and carries no fields.
 */

import { cleanText, stripDiacritics } from './name-normalizer.js';
import { findPostalCodeSpans } from './postal-code.js';

// =============================================================================
// TABLES
// =============================================================================

/**
 * An address printed on invoices that is never the served site
 */
export interface CompanyAddress {
  name: string;
  street: string;
  postalCode: string;
}

export interface AddressTables {
  companyAddresses: CompanyAddress[];

  /** Street abbreviation → expansion, matched per token */
  streetAbbreviations: Record<string, string>;
}

export const DEFAULT_COMPANY_ADDRESSES: CompanyAddress[] = [
  { name: 'RUBO', street: '34 BOULEVARD DES ITALIENS', postalCode: '75009' },
];

export const DEFAULT_STREET_ABBREVIATIONS: Record<string, string> = {
  AV: 'AVENUE',
  AVE: 'AVENUE',
  BD: 'BOULEVARD',
  BLD: 'BOULEVARD',
  BLVD: 'BOULEVARD',
  BOUL: 'BOULEVARD',
  R: 'RUE',
  RTE: 'ROUTE',
  CHE: 'CHEMIN',
  CHEM: 'CHEMIN',
  PL: 'PLACE',
  IMP: 'IMPASSE',
  ALL: 'ALLEE',
  SQ: 'SQUARE',
  FG: 'FAUBOURG',
  FBG: 'FAUBOURG',
  CRS: 'COURS',
  ESP: 'ESPLANADE',
  PROM: 'PROMENADE',
  RES: 'RESIDENCE',
  LOT: 'LOTISSEMENT',
  ST: 'SAINT',
  STE: 'SAINTE',
  RN: 'ROUTE NATIONALE',
  RD: 'ROUTE DEPARTEMENTALE',
  CC: 'CENTRE COMMERCIAL',
  ZA: 'ZONE ARTISANALE',
  ZI: 'ZONE INDUSTRIELLE',
  ZC: 'ZONE COMMERCIALE',
  ZAC: 'ZONE D AMENAGEMENT CONCERTE',
  LD: 'LIEU DIT',
};

export const DEFAULT_ADDRESS_TABLES: AddressTables = {
  companyAddresses: DEFAULT_COMPANY_ADDRESSES,
  streetAbbreviations: DEFAULT_STREET_ABBREVIATIONS,
};

const STREET_TYPES = new Set([
  'RUE', 'RUELLE', 'AVENUE', 'BOULEVARD', 'ROUTE', 'CHEMIN', 'PLACE',
  'IMPASSE', 'ALLEE', 'SQUARE', 'FAUBOURG', 'QUAI', 'COURS', 'ESPLANADE',
  'PROMENADE', 'RESIDENCE', 'LOTISSEMENT', 'ZONE', 'CENTRE', 'LIEU', 'PARC',
  'VOIE', 'PASSAGE', 'CHAUSSEE', 'SENTIER', 'ROND', 'ROCADE',
]);

/** Articles and prepositions ignored when comparing streets */
export const STREET_STOPWORDS = new Set([
  'DE', 'DU', 'DES', 'LA', 'LE', 'LES', 'L', 'D', 'ET', 'A', 'AU', 'AUX', 'EN',
]);

/** Words that end a city name */
const CITY_TERMINATORS = new Set([
  'CEDEX', 'FRANCE', 'TEL', 'TELEPHONE', 'FAX', 'EMAIL', 'MAIL', 'SIRET',
  'SIREN', 'TVA', 'BP', 'CS',
]);

const LABEL_BEFORE_CODE =
  /\b(?:N|NO|NUM|NUMERO|FACTURE|CLIENT|COMPTE|REF|REFERENCE|TEL|TELEPHONE|FAX|SIRET|SIREN|TVA|COMMANDE|CONTRAT|BP|CS)\b\s*[°:.#]*\s*$/;

const HOUSE_NUMBER = /^\d{1,4}$/;
const HOUSE_NUMBER_SUFFIX = /^(?:BIS|TER|[A-D])$/;

// =============================================================================
// CANONICAL FORMS
// =============================================================================

/**
 * Canonical street text: cleaned, apostrophes split, abbreviations expanded
 */
export function normalizeStreet(
  raw: string,
  abbreviations: Record<string, string> = DEFAULT_STREET_ABBREVIATIONS
): string {
  return cleanText(raw)
    .replace(/'/g, ' ')
    .split(' ')
    .filter(token => token.length > 0)
    .map(token => abbreviations[token] ?? token)
    .join(' ');
}

/**
 * Street tokens that carry meaning (articles dropped)
 */
export function streetTokens(
  raw: string,
  abbreviations: Record<string, string> = DEFAULT_STREET_ABBREVIATIONS
): string[] {
  const normalized = normalizeStreet(raw, abbreviations);
  if (!normalized) return [];
  return normalized.split(' ').filter(token => !STREET_STOPWORDS.has(token));
}

/**
 * Canonical city text: "St-Étienne Cedex 2" → "SAINT ETIENNE"
 */
export function normalizeCity(raw: string): string {
  const tokens = cleanText(raw)
    .replace(/'/g, ' ')
    .split(' ')
    .filter(token => token.length > 0);

  const kept: string[] = [];
  for (const token of tokens) {
    if (CITY_TERMINATORS.has(token) || /\d/.test(token)) break;
    kept.push(token === 'ST' ? 'SAINT' : token === 'STE' ? 'SAINTE' : token);
  }
  return kept.join(' ');
}

// =============================================================================
// EXTRACTION
// =============================================================================

export interface NormalizedAddress {
  street: string | null;
  postalCode: string | null;
  city: string | null;

  /** Canonical "street postal city" text of the chosen address */
  normalizedText: string;

  /** Only a known company address was found; nothing here is usable */
  isCompanyAddress: boolean;

  /** Company addresses that were set aside while scanning */
  skippedCompanyAddresses: number;
}

interface AddressCandidate {
  postalCode: string;
  street: string | null;
  city: string | null;
  offset: number;
  score: number;
  isCompany: boolean;
}

export function emptyAddress(): NormalizedAddress {
  return {
    street: null,
    postalCode: null,
    city: null,
    normalizedText: '',
    isCompanyAddress: false,
    skippedCompanyAddresses: 0,
  };
}

/**
 * Whether an address can serve as a disambiguation signal
 */
export function isUsableAddress(address: NormalizedAddress): boolean {
  if (address.isCompanyAddress) return false;
  return address.postalCode !== null || address.street !== null || address.city !== null;
}

/**
 * Keep the part of a segment that starts at the house number or street type
 */
function trimToStreet(segment: string, abbreviations: Record<string, string>): string {
  const tokens = normalizeStreet(segment, abbreviations).split(' ').filter(t => t.length > 0);
  const typeIndex = tokens.findIndex(token => STREET_TYPES.has(token));
  if (typeIndex === -1) return tokens.join(' ');

  let start = typeIndex;
  if (typeIndex > 0 && HOUSE_NUMBER.test(tokens[typeIndex - 1])) {
    start = typeIndex - 1;
  } else if (
    typeIndex > 1 &&
    HOUSE_NUMBER_SUFFIX.test(tokens[typeIndex - 1]) &&
    HOUSE_NUMBER.test(tokens[typeIndex - 2])
  ) {
    start = typeIndex - 2;
  }
  return tokens.slice(start).join(' ');
}

function lastSegment(text: string): string {
  const segments = text
    .split(/[,;:]/)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
  return segments[segments.length - 1] ?? '';
}

function extractCity(after: string): string | null {
  const match = after.match(/^[\s,\-]*([A-Z][A-Z' \-]*)/);
  if (!match) return null;
  const city = normalizeCity(match[1]);
  return city || null;
}

function containsCompanyStreet(
  context: Set<string>,
  company: CompanyAddress,
  abbreviations: Record<string, string>
): boolean {
  const companyStreet = streetTokens(company.street, abbreviations);
  return companyStreet.length > 0 && companyStreet.every(token => context.has(token));
}

function matchesCompany(
  postalCode: string,
  contextText: string,
  company: CompanyAddress,
  abbreviations: Record<string, string>
): boolean {
  if (postalCode !== company.postalCode) return false;

  const context = new Set(streetTokens(contextText, abbreviations));
  if (containsCompanyStreet(context, company, abbreviations)) return true;

  const companyName = cleanText(company.name).split(' ').filter(t => t.length > 0);
  return companyName.length > 0 && companyName.every(token => context.has(token));
}

/**
 * A line without postal code names a company address when it holds the
 * company's whole street
 */
function mentionsCompanyStreet(line: string, tables: AddressTables): boolean {
  const context = new Set(streetTokens(line, tables.streetAbbreviations));
  return tables.companyAddresses.some(company =>
    containsCompanyStreet(context, company, tables.streetAbbreviations)
  );
}

/**
 * Extract and normalize the destination address from free text.
 * Accepts a single address line or a whole document.
 */
export function normalizeAddress(
  raw: string | null | undefined,
  tables: AddressTables = DEFAULT_ADDRESS_TABLES
): NormalizedAddress {
  if (!raw || !raw.trim()) return emptyAddress();

  const abbreviations = tables.streetAbbreviations;
  const text = stripDiacritics(raw).toUpperCase();
  const lines = text.split(/\r?\n/);

  const candidates: AddressCandidate[] = [];
  let lineOffset = 0;

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex];

    for (const span of findPostalCodeSpans(line)) {
      const before = line.slice(0, span.start);
      const after = line.slice(span.end);

      let streetSource = lastSegment(before);
      let context = line;
      if (!streetSource && lineIndex > 0) {
        const previous = lines[lineIndex - 1];
        if (findPostalCodeSpans(previous).length === 0) {
          streetSource = lastSegment(previous);
          context = `${previous} ${line}`;
        }
      }

      const street = streetSource ? trimToStreet(streetSource, abbreviations) || null : null;
      const city = extractCity(after);
      const streetTokenList = street ? street.split(' ') : [];

      let score = 0;
      if (city) score += 2;
      if (streetTokenList.some(token => STREET_TYPES.has(token))) score += 1;
      if (streetTokenList.some(token => HOUSE_NUMBER.test(token))) score += 1;
      if (LABEL_BEFORE_CODE.test(before)) score -= 3;

      const isCompany = tables.companyAddresses.some(company =>
        matchesCompany(span.code, context, company, abbreviations)
      );

      candidates.push({
        postalCode: span.code,
        street,
        city,
        offset: lineOffset + span.start,
        score,
        isCompany,
      });
    }

    lineOffset += line.length + 1;
  }

  const skippedCompanyAddresses = candidates.filter(c => c.isCompany).length;
  const plausible = candidates
    .filter(c => !c.isCompany && c.score >= 0)
    .sort((a, b) => b.score - a.score || a.offset - b.offset);

  const best = plausible[0];
  if (best) {
    return {
      street: best.street,
      postalCode: best.postalCode,
      city: best.city,
      normalizedText: [best.street, best.postalCode, best.city].filter(Boolean).join(' '),
      isCompanyAddress: false,
      skippedCompanyAddresses,
    };
  }

  if (skippedCompanyAddresses > 0) {
    return { ...emptyAddress(), isCompanyAddress: true, skippedCompanyAddresses };
  }

  // No postal code anywhere: the text minus company lines is the street
  const filled = lines.filter(line => line.trim().length > 0);
  const kept = filled.filter(line => !mentionsCompanyStreet(line, tables));
  const skippedLines = filled.length - kept.length;
  if (kept.length === 0) {
    return { ...emptyAddress(), isCompanyAddress: true, skippedCompanyAddresses: skippedLines };
  }

  const street = normalizeStreet(kept.join(' '), abbreviations);
  return {
    ...emptyAddress(),
    street: street || null,
    normalizedText: street,
    skippedCompanyAddresses: skippedLines,
  };
}
