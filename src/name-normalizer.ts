/**
 * Company Name Normalizer
 *
 * Canonicalizes free-text company names read off invoices so that spelling
 * variants of one site compare equal.
 *
 * Processing order:
 * 1. Strip diacritics, uppercase, drop punctuation (internal apostrophes kept)
 * 2. Collapse franchise spellings to one alias token (MAC DO → MCDONALDS)
 * 3. Drop legal-form noise tokens (SARL, SAS, ...)
 *
 * The alias and noise tables are plain data; callers may pass their own.
 */

// =============================================================================
// TABLES
// =============================================================================

/**
 * A franchise spelling. `pattern` is a regular expression source matched
 * against the cleaned (uppercase, single-spaced) name as whole words.
 */
export interface FranchiseAlias {
  pattern: string;
  canonical: string;
}

export interface NameTables {
  franchiseAliases: FranchiseAlias[];
  noiseTokens: string[];
}

export const DEFAULT_FRANCHISE_ALIASES: FranchiseAlias[] = [
  // McDonald's
  { pattern: "MC ?DONALD'?S?", canonical: 'MCDONALDS' },
  { pattern: "MAC ?DONALD'?S?", canonical: 'MCDONALDS' },
  { pattern: 'MC ?DO', canonical: 'MCDONALDS' },
  { pattern: 'MAC ?DO', canonical: 'MCDONALDS' },
  // Other quick-service chains
  { pattern: 'BURGER ?KING|BK', canonical: 'BURGERKING' },
  { pattern: 'KENTUCKY FRIED CHICKEN|KFC', canonical: 'KFC' },
  { pattern: "DOMINO'?S(?: PIZZA)?", canonical: 'DOMINOS' },
  { pattern: 'PIZZA ?HUT', canonical: 'PIZZAHUT' },
  { pattern: "O ?TACOS|O'TACOS", canonical: 'OTACOS' },
];

export const DEFAULT_NOISE_TOKENS: string[] = [
  'SARL',
  'SAS',
  'SASU',
  'SA',
  'EURL',
  'SNC',
  'SCI',
  'STE',
  'SOCIETE',
  'ETS',
  'ETABLISSEMENTS',
];

export const DEFAULT_NAME_TABLES: NameTables = {
  franchiseAliases: DEFAULT_FRANCHISE_ALIASES,
  noiseTokens: DEFAULT_NOISE_TOKENS,
};

// =============================================================================
// TEXT CLEANING
// =============================================================================

/**
 * Remove accents and ligatures ("Saône" → "Saone", "Œuvre" → "OEuvre")
 */
export function stripDiacritics(text: string): string {
  return text
    .replace(/Œ/g, 'OE')
    .replace(/œ/g, 'oe')
    .replace(/Æ/g, 'AE')
    .replace(/æ/g, 'ae')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Uppercase, strip diacritics and punctuation, collapse whitespace.
 * Apostrophes survive only between two letters or digits.
 */
export function cleanText(raw: string): string {
  if (!raw) return '';

  return stripDiacritics(raw)
    .toUpperCase()
    .replace(/[\u2018\u2019\u02bc`\u00b4]/g, "'")
    .replace(/[^A-Z0-9'\s]/g, ' ')
    .replace(/(?<![A-Z0-9])'+|'+(?![A-Z0-9])/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// =============================================================================
// NORMALIZATION
// =============================================================================

export interface NormalizedName {
  /** Canonical form used for comparisons */
  text: string;

  /** Whitespace tokens of `text` */
  tokens: string[];

  /** Canonical franchise token if an alias applied */
  franchise: string | null;
}

export interface CompiledAlias {
  regex: RegExp;
  canonical: string;
}

const compiledCache = new WeakMap<FranchiseAlias[], CompiledAlias[]>();

/**
 * Compile alias patterns as whole-word expressions, longest pattern first
 */
export function compileFranchiseAliases(aliases: FranchiseAlias[]): CompiledAlias[] {
  const cached = compiledCache.get(aliases);
  if (cached) return cached;

  const compiled = [...aliases]
    .sort((a, b) => b.pattern.length - a.pattern.length)
    .map(alias => ({
      regex: new RegExp(`(?<![A-Z0-9'])(?:${alias.pattern})(?![A-Z0-9'])`, 'g'),
      canonical: alias.canonical.toUpperCase(),
    }));

  compiledCache.set(aliases, compiled);
  return compiled;
}

/**
 * Normalize a company name for comparison
 */
export function normalizeName(
  raw: string,
  tables: NameTables = DEFAULT_NAME_TABLES
): NormalizedName {
  let text = cleanText(raw);
  if (!text) {
    return { text: '', tokens: [], franchise: null };
  }

  let franchise: string | null = null;
  for (const alias of compileFranchiseAliases(tables.franchiseAliases)) {
    alias.regex.lastIndex = 0;
    if (alias.regex.test(text)) {
      alias.regex.lastIndex = 0;
      text = text.replace(alias.regex, alias.canonical);
      franchise = franchise ?? alias.canonical;
    }
  }

  let tokens = text.split(' ').filter(token => token.length > 0);

  const noise = new Set(tables.noiseTokens.map(token => token.toUpperCase()));
  const kept = tokens.filter(token => !noise.has(token));
  if (kept.length > 0) {
    tokens = kept;
  }

  return {
    text: tokens.join(' '),
    tokens,
    franchise,
  };
}

/**
 * Size of the alias tables (for stats output)
 */
export function getNameTableStats(tables: NameTables = DEFAULT_NAME_TABLES): {
  franchiseAliases: number;
  franchiseClasses: number;
  noiseTokens: number;
} {
  return {
    franchiseAliases: tables.franchiseAliases.length,
    franchiseClasses: new Set(tables.franchiseAliases.map(a => a.canonical.toUpperCase())).size,
    noiseTokens: tables.noiseTokens.length,
  };
}
