/**
 * Resolver Configuration
 *
 * Thresholds and weights for the resolver, and the matching tables (franchise
 * aliases, noise tokens, street abbreviations, company addresses, waste-type
 * patterns). Both can be overridden from JSON files validated with zod.
 */

import * as fsPromises from 'fs/promises';
import { z } from 'zod';
import {
  DEFAULT_ADDRESS_TABLES,
  type AddressTables,
} from './address-normalizer.js';
import { ConfigError } from './errors.js';
import { DEFAULT_NAME_TABLES, type NameTables } from './name-normalizer.js';
import {
  DEFAULT_PROVIDER_THRESHOLD,
  DEFAULT_WASTE_TYPE_PATTERNS,
  type WasteTypePattern,
} from './provider-normalizer.js';

// ============================================================================
// RESOLVER CONFIG
// ============================================================================

export interface ResolverConfig {
  /** Minimum name similarity for a stage-1 candidate (0-1) */
  nameMatchThreshold: number;

  /** Weight of the name score in the stage-2 combined score */
  nameWeight: number;

  /** Weight of the address score in the stage-2 combined score */
  addressWeight: number;

  /** Combined scores closer than this are a tie */
  tieEpsilon: number;

  /** Lead the postal-fallback winner needs over the runner-up */
  postalMinMargin: number;

  /** Minimum provider match score (0-1) */
  providerThreshold: number;

  /** Near misses reported with a not-found result */
  maxNearMisses: number;

  /** Restrict candidates to the query's provider when the store is tagged */
  useProviderScope: boolean;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  nameMatchThreshold: 0.85,
  nameWeight: 0.4,
  addressWeight: 0.6,
  tieEpsilon: 0.01,
  postalMinMargin: 0.15,
  providerThreshold: DEFAULT_PROVIDER_THRESHOLD,
  maxNearMisses: 5,
  useProviderScope: true,
};

const unitInterval = z.number().min(0).max(1);

export const resolverConfigSchema = z
  .object({
    nameMatchThreshold: unitInterval,
    nameWeight: unitInterval,
    addressWeight: unitInterval,
    tieEpsilon: unitInterval,
    postalMinMargin: unitInterval,
    providerThreshold: unitInterval,
    maxNearMisses: z.number().int().min(0),
    useProviderScope: z.boolean(),
  })
  .strict();

// ============================================================================
// MATCHING TABLES
// ============================================================================

export interface MatchingTables {
  name: NameTables;
  address: AddressTables;
  wasteTypes: WasteTypePattern[];
}

export const DEFAULT_MATCHING_TABLES: MatchingTables = {
  name: DEFAULT_NAME_TABLES,
  address: DEFAULT_ADDRESS_TABLES,
  wasteTypes: DEFAULT_WASTE_TYPE_PATTERNS,
};

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const regexSource = z.string().min(1).refine(compiles, 'invalid regular expression');

export const matchingTablesSchema = z
  .object({
    /** true: append to the built-in tables; false: replace them */
    extend: z.boolean().default(true),
    franchiseAliases: z
      .array(z.object({ pattern: regexSource, canonical: z.string().min(1) }))
      .optional(),
    noiseTokens: z.array(z.string().min(1)).optional(),
    streetAbbreviations: z.record(z.string().min(1)).optional(),
    companyAddresses: z
      .array(
        z.object({
          name: z.string().min(1),
          street: z.string(),
          postalCode: z.string().regex(/^\d{5}$/, 'must be 5 digits'),
        })
      )
      .optional(),
    wasteTypes: z
      .array(z.object({ type: z.string().min(1), pattern: regexSource }))
      .optional(),
  })
  .strict();

export type MatchingTablesFile = z.infer<typeof matchingTablesSchema>;

/**
 * Apply a tables file over a base set of tables
 */
export function mergeMatchingTables(
  base: MatchingTables,
  file: MatchingTablesFile
): MatchingTables {
  const extend = file.extend;
  const pick = <T>(current: T[], added: T[] | undefined): T[] =>
    added === undefined ? current : extend ? [...current, ...added] : added;

  const abbreviations = file.streetAbbreviations === undefined
    ? base.address.streetAbbreviations
    : extend
      ? { ...base.address.streetAbbreviations, ...upperKeys(file.streetAbbreviations) }
      : upperKeys(file.streetAbbreviations);

  return {
    name: {
      franchiseAliases: pick(base.name.franchiseAliases, file.franchiseAliases),
      noiseTokens: pick(base.name.noiseTokens, file.noiseTokens?.map(t => t.toUpperCase())),
    },
    address: {
      companyAddresses: pick(base.address.companyAddresses, file.companyAddresses),
      streetAbbreviations: abbreviations,
    },
    wasteTypes: pick(base.wasteTypes, file.wasteTypes),
  };
}

function upperKeys(record: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key.toUpperCase(), value.toUpperCase()])
  );
}

// ============================================================================
// FILE LOADING
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    );
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    );
  }
}

/**
 * Check a full config; throws ConfigError listing every bad field
 */
export function validateResolverConfig(config: ResolverConfig, source = 'config'): ResolverConfig {
  const result = resolverConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, source);
  }
  return result.data;
}

/**
 * Parse config overrides and merge them over a base config
 */
export function parseResolverConfig(
  data: unknown,
  base: ResolverConfig = DEFAULT_RESOLVER_CONFIG,
  source = 'config'
): ResolverConfig {
  const result = resolverConfigSchema.partial().safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, source);
  }
  return { ...base, ...result.data };
}

/**
 * Load resolver config overrides from a JSON file
 */
export async function loadResolverConfig(
  filePath: string,
  base: ResolverConfig = DEFAULT_RESOLVER_CONFIG
): Promise<ResolverConfig> {
  return parseResolverConfig(await readJsonFile(filePath), base, filePath);
}

/**
 * Parse a matching tables document and apply it over a base
 */
export function parseMatchingTables(
  data: unknown,
  base: MatchingTables = DEFAULT_MATCHING_TABLES,
  source = 'tables'
): MatchingTables {
  const result = matchingTablesSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, source);
  }
  return mergeMatchingTables(base, result.data);
}

/**
 * Load matching tables from a JSON file
 */
export async function loadMatchingTables(
  filePath: string,
  base: MatchingTables = DEFAULT_MATCHING_TABLES
): Promise<MatchingTables> {
  return parseMatchingTables(await readJsonFile(filePath), base, filePath);
}
