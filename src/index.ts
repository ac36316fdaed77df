/**
 * site-resolver - match invoice site references to canonical locations
 *
 * @packageDocumentation
 */

// ============================================================================
// ERRORS
// ============================================================================

export { DataLoadError, ConfigError } from './errors.js';

// ============================================================================
// POSTAL CODES
// ============================================================================

export {
  POSTAL_CODE_PATTERN,
  type PostalCodeSpan,
  isValidPostalCode,
  coercePostalCode,
  findPostalCodeSpans,
} from './postal-code.js';

// ============================================================================
// NAME NORMALIZER
// ============================================================================

export {
  type FranchiseAlias,
  type NameTables,
  type NormalizedName,
  type CompiledAlias,
  DEFAULT_FRANCHISE_ALIASES,
  DEFAULT_NOISE_TOKENS,
  DEFAULT_NAME_TABLES,
  stripDiacritics,
  cleanText,
  compileFranchiseAliases,
  normalizeName,
  getNameTableStats,
} from './name-normalizer.js';

// ============================================================================
// ADDRESS NORMALIZER
// ============================================================================

export {
  type CompanyAddress,
  type AddressTables,
  type NormalizedAddress,
  DEFAULT_COMPANY_ADDRESSES,
  DEFAULT_STREET_ABBREVIATIONS,
  DEFAULT_ADDRESS_TABLES,
  STREET_STOPWORDS,
  normalizeStreet,
  streetTokens,
  normalizeCity,
  emptyAddress,
  isUsableAddress,
  normalizeAddress,
} from './address-normalizer.js';

// ============================================================================
// SIMILARITY
// ============================================================================

export {
  POSTAL_CODE_WEIGHT,
  CITY_TIEBREAK_WEIGHT,
  tokenize,
  tokenOverlapRatio,
  levenshteinDistance,
  editDistanceRatio,
  nameSimilarity,
  explainNameMatch,
  addressSimilarity,
} from './similarity.js';

// ============================================================================
// TABLES & REFERENCE STORE
// ============================================================================

export {
  type Table,
  type TableFormat,
  getFileType,
  getSupportedExtensions,
  detectDelimiter,
  parseDelimited,
  parseJsonTable,
  tableFromRecords,
  headerKey,
  findColumn,
  readTable,
} from './table-reader.js';

export {
  type ReferenceLocation,
  type ReferenceLocationInput,
  type LoadWarning,
  type ReferenceStoreOptions,
  type ReferenceStoreStats,
  REFERENCE_COLUMNS,
  ReferenceStore,
  loadReferenceStore,
  createStoreLoader,
} from './reference-store.js';

// ============================================================================
// PROVIDERS
// ============================================================================

export {
  type ProviderAlias,
  type ProviderMatch,
  type WasteTypePattern,
  DEFAULT_PROVIDER_THRESHOLD,
  DEFAULT_WASTE_TYPE_PATTERNS,
  PROVIDER_COLUMNS,
  termContainment,
  matchProvider,
  resolveProvider,
  detectWasteTypes,
  determineCollectionSuffix,
  providersFromTable,
  loadProviderAliases,
} from './provider-normalizer.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  type ResolverConfig,
  type MatchingTables,
  type MatchingTablesFile,
  DEFAULT_RESOLVER_CONFIG,
  DEFAULT_MATCHING_TABLES,
  resolverConfigSchema,
  matchingTablesSchema,
  mergeMatchingTables,
  validateResolverConfig,
  parseResolverConfig,
  loadResolverConfig,
  parseMatchingTables,
  loadMatchingTables,
} from './config.js';

// ============================================================================
// RESOLVER
// ============================================================================

export {
  type QueryBundle,
  type MatchedVia,
  type MatchCandidate,
  type ResolvedResult,
  type AmbiguousResult,
  type NotFoundResult,
  type ResolutionResult,
  type ResolveOptions,
  rankCandidates,
  resolve,
} from './resolver.js';

// ============================================================================
// EXTRACTION BOUNDARY
// ============================================================================

export {
  type ExtractedFields,
  type ExtractionService,
  type QuotaTracker,
  type DocumentAnalysis,
  buildQueryBundle,
  analyzeDocument,
} from './extraction.js';
