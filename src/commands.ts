/**
 * siteresolve commands
 *
 * Commands:
 *   resolve  - Resolve one site reference
 *   batch    - Resolve every row of a query file
 *   compare  - Compare two names and show match details
 *   address  - Extract the destination address from text
 *   provider - Resolve a provider name and collection suffix
 *   stats    - Show statistics about a reference file
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import ora, { type Ora } from 'ora';

import { normalizeAddress } from './address-normalizer.js';
import {
  DEFAULT_MATCHING_TABLES,
  DEFAULT_RESOLVER_CONFIG,
  loadMatchingTables,
  loadResolverConfig,
  validateResolverConfig,
  type MatchingTables,
  type ResolverConfig,
} from './config.js';
import { DataLoadError } from './errors.js';
import { getNameTableStats } from './name-normalizer.js';
import {
  determineCollectionSuffix,
  loadProviderAliases,
  matchProvider,
  type ProviderAlias,
} from './provider-normalizer.js';
import { loadReferenceStore, type ReferenceLocation, type ReferenceStore } from './reference-store.js';
import { resolve, type MatchCandidate, type QueryBundle, type ResolutionResult } from './resolver.js';
import { explainNameMatch } from './similarity.js';
import { findColumn, readTable } from './table-reader.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

// ============================================================================
// SHARED CONTEXT
// ============================================================================

interface ContextOptions {
  config?: string;
  tables?: string;
  providers?: string;
  threshold?: string;
}

interface ResolverContext {
  config: ResolverConfig;
  tables: MatchingTables;
  providers: ProviderAlias[] | undefined;
  store: ReferenceStore;
}

function withContextOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Resolver config overrides (JSON)')
    .option('--tables <file>', 'Matching tables (JSON)')
    .option('-p, --providers <file>', 'Provider aliases (CSV or JSON)')
    .option('-t, --threshold <score>', 'Name match threshold (0-1)');
}

async function loadContext(reference: string, options: ContextOptions): Promise<ResolverContext> {
  let config = options.config
    ? await loadResolverConfig(path.resolve(options.config))
    : DEFAULT_RESOLVER_CONFIG;
  if (options.threshold !== undefined) {
    config = { ...config, nameMatchThreshold: parseFloat(options.threshold) };
  }
  config = validateResolverConfig(config, 'options');

  const tables = options.tables
    ? await loadMatchingTables(path.resolve(options.tables))
    : DEFAULT_MATCHING_TABLES;

  const providers = options.providers
    ? await loadProviderAliases(path.resolve(options.providers))
    : undefined;

  const store = await loadReferenceStore(path.resolve(reference), { nameTables: tables.name });

  return { config, tables, providers, store };
}

function fail(spinner: Ora | null, label: string, error: unknown): void {
  if (spinner) spinner.fail(label);
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

function reportWarnings(store: ReferenceStore, spinner: Ora | null): void {
  if (!spinner) return;
  if (store.warnings.length > 0) {
    spinner.warn(`Loaded ${store.size} locations, ${store.warnings.length} row warning(s)`);
  } else {
    spinner.succeed(`Loaded ${store.size} locations`);
  }
}

// ============================================================================
// OUTPUT FORMATTERS
// ============================================================================

type OutputFormat = 'json' | 'table' | 'csv';

function escapeCSV(str: string): string {
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function formatLocation(location: ReferenceLocation): string {
  const place = [location.postalCode, location.city].filter(Boolean).join(' ');
  return [location.street, place].filter(Boolean).join(', ') || '(no address)';
}

function formatCandidate(candidate: MatchCandidate): string {
  const address = candidate.addressScore === null ? '' : `  address ${candidate.addressScore.toFixed(3)}`;
  return `  ${candidate.location.canonicalId.padEnd(10)} ${candidate.location.canonicalName}` +
    `  (name ${candidate.nameScore.toFixed(3)}${address}  combined ${candidate.combinedScore.toFixed(3)})`;
}

export function formatResult(result: ResolutionResult, verbose = false): string {
  const lines: string[] = [];

  switch (result.status) {
    case 'resolved':
      lines.push(`Status:   resolved (${result.matchedVia})`);
      lines.push(`Site:     ${result.location.canonicalId} ${result.location.canonicalName}`);
      lines.push(`Address:  ${formatLocation(result.location)}`);
      lines.push(formatCandidate(result.candidate).trim());
      break;
    case 'ambiguous':
      lines.push(`Status:   ambiguous (${result.candidates.length} candidates)`);
      for (const candidate of result.candidates) lines.push(formatCandidate(candidate));
      break;
    case 'not_found':
      lines.push('Status:   not found');
      lines.push(`Reason:   ${result.reason}`);
      if (result.nearMisses.length > 0) {
        lines.push('Near misses:');
        for (const candidate of result.nearMisses) lines.push(formatCandidate(candidate));
      }
      break;
  }

  if (result.provider) lines.push(`Provider: ${result.provider}`);

  if (verbose) {
    lines.push('', 'Trace:');
    for (const line of result.trace) lines.push(`  ${line}`);
  }

  return lines.join('\n');
}

// ============================================================================
// RESOLVE COMMAND
// ============================================================================

interface ResolveCommandOptions extends ContextOptions {
  name: string;
  address?: string;
  postal?: string;
  provider?: string;
  format: string;
  verbose?: boolean;
  quiet?: boolean;
}

function createResolveCommand(): Command {
  return withContextOptions(
    new Command('resolve')
      .description('Resolve one site reference against a reference file')
      .argument('<reference>', 'Reference locations (CSV, TSV or JSON)')
      .option('-n, --name <name>', 'Company name as read off the document', '')
      .option('-a, --address <text>', 'Address text (a line or the whole document)')
      .option('--postal <code>', 'Postal code hint')
      .option('--provider <name>', 'Provider name as read off the document')
      .option('-f, --format <format>', 'Output format: table, json', 'table')
      .option('-v, --verbose', 'Show the resolution trace')
      .option('-q, --quiet', 'Suppress progress output')
  ).action(async (reference: string, options: ResolveCommandOptions) => {
    const spinner = options.quiet ? null : ora('Loading reference data...').start();

    try {
      const context = await loadContext(reference, options);
      reportWarnings(context.store, spinner);

      const query: QueryBundle = {
        rawName: options.name,
        rawAddress: options.address ?? null,
        postalCodeHint: options.postal ?? null,
        providerRaw: options.provider ?? null,
      };
      const result = resolve(query, context.store, context);

      console.log(options.format === 'json'
        ? JSON.stringify(result, null, 2)
        : formatResult(result, options.verbose));

      if (result.status !== 'resolved') process.exitCode = 2;
    } catch (error) {
      fail(spinner, 'Resolve failed', error);
    }
  });
}

// ============================================================================
// BATCH COMMAND
// ============================================================================

export const QUERY_COLUMNS = {
  label: ['file', 'document', 'label', 'id'],
  name: ['name', 'company_name', 'raw_name', 'entreprise', 'restaurant'],
  address: ['address', 'raw_address', 'adresse', 'street_address'],
  postalCode: ['postal_code', 'postal_code_hint', 'code_postal', 'cp'],
  provider: ['provider', 'provider_raw', 'provider_name', 'prestataire', 'collecte'],
} as const;

export interface BatchRow {
  row: number;
  label: string | null;
  name: string;
  status: ResolutionResult['status'];
  canonicalId: string | null;
  canonicalName: string | null;
  matchedVia: string | null;
  provider: string | null;
  candidates: string[];
  reason: string | null;
}

function toBatchRow(row: number, label: string | null, name: string, result: ResolutionResult): BatchRow {
  const base = { row, label, name, status: result.status, provider: result.provider };
  switch (result.status) {
    case 'resolved':
      return {
        ...base,
        canonicalId: result.location.canonicalId,
        canonicalName: result.location.canonicalName,
        matchedVia: result.matchedVia,
        candidates: [],
        reason: null,
      };
    case 'ambiguous':
      return {
        ...base,
        canonicalId: null,
        canonicalName: null,
        matchedVia: null,
        candidates: result.candidates.map(c => c.location.canonicalId),
        reason: null,
      };
    case 'not_found':
      return {
        ...base,
        canonicalId: null,
        canonicalName: null,
        matchedVia: null,
        candidates: [],
        reason: result.reason,
      };
  }
}

function formatBatch(rows: BatchRow[], format: OutputFormat): string {
  if (format === 'csv') {
    const headers = ['row', 'label', 'name', 'status', 'canonical_id', 'matched_via', 'provider', 'candidates', 'reason'];
    const lines = rows.map(r => [
      String(r.row),
      escapeCSV(r.label ?? ''),
      escapeCSV(r.name),
      r.status,
      escapeCSV(r.canonicalId ?? ''),
      r.matchedVia ?? '',
      escapeCSV(r.provider ?? ''),
      escapeCSV(r.candidates.join('|')),
      escapeCSV(r.reason ?? ''),
    ].join(','));
    return [headers.join(','), ...lines].join('\n');
  }
  return JSON.stringify(rows, null, 2);
}

interface BatchCommandOptions extends ContextOptions {
  output?: string;
  format: string;
  quiet?: boolean;
}

function createBatchCommand(): Command {
  return withContextOptions(
    new Command('batch')
      .description('Resolve every row of a query file')
      .argument('<reference>', 'Reference locations (CSV, TSV or JSON)')
      .argument('<queries>', 'Queries (CSV, TSV or JSON) with a name column')
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
      .option('-f, --format <format>', 'Output format: json, csv', 'json')
      .option('-q, --quiet', 'Suppress progress output')
  ).action(async (reference: string, queries: string, options: BatchCommandOptions) => {
    const spinner = options.quiet ? null : ora('Loading reference data...').start();

    try {
      const context = await loadContext(reference, options);
      const table = await readTable(path.resolve(queries));

      const column = (names: readonly string[]) => findColumn(table.headers, names);
      const columns = {
        label: column(QUERY_COLUMNS.label),
        name: column(QUERY_COLUMNS.name),
        address: column(QUERY_COLUMNS.address),
        postalCode: column(QUERY_COLUMNS.postalCode),
        provider: column(QUERY_COLUMNS.provider),
      };
      if (columns.name === -1) {
        throw new DataLoadError(
          `${path.basename(queries)} has no name column (expected one of: ${QUERY_COLUMNS.name.join(', ')})`,
          queries
        );
      }
      const cell = (row: string[], index: number): string | null =>
        index === -1 ? null : row[index]?.trim() || null;

      if (spinner) spinner.text = `Resolving ${table.rows.length} queries...`;

      const rows = table.rows.map((row, i) => {
        const name = cell(row, columns.name) ?? '';
        const result = resolve(
          {
            rawName: name,
            rawAddress: cell(row, columns.address),
            postalCodeHint: cell(row, columns.postalCode),
            providerRaw: cell(row, columns.provider),
          },
          context.store,
          context
        );
        return toBatchRow(i + 1, cell(row, columns.label), name, result);
      });

      const resolved = rows.filter(r => r.status === 'resolved').length;
      const ambiguous = rows.filter(r => r.status === 'ambiguous').length;
      const notFound = rows.length - resolved - ambiguous;

      if (spinner) {
        const summary = `Resolved ${resolved} of ${rows.length} queries (${ambiguous} ambiguous, ${notFound} not found)`;
        if (resolved === rows.length) spinner.succeed(summary);
        else spinner.warn(summary);
      }

      const format: OutputFormat = options.format === 'csv' ? 'csv' : 'json';
      const output = formatBatch(rows, format);

      if (options.output) {
        fs.writeFileSync(options.output, output);
        if (!options.quiet) {
          console.log(`Output written to ${options.output}`);
        }
      } else {
        console.log(output);
      }
    } catch (error) {
      fail(spinner, 'Batch failed', error);
    }
  });
}

// ============================================================================
// COMPARE COMMAND
// ============================================================================

function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare two names and show match details')
    .argument('<name1>', 'First name')
    .argument('<name2>', 'Second name')
    .option('-t, --threshold <score>', 'Name match threshold', String(DEFAULT_RESOLVER_CONFIG.nameMatchThreshold))
    .action((name1: string, name2: string, options: { threshold: string }) => {
      const threshold = parseFloat(options.threshold);
      const details = explainNameMatch(name1, name2);

      console.log('\n=== Name Comparison ===\n');
      console.log(`Original 1:   "${details.name1Original}"`);
      console.log(`Original 2:   "${details.name2Original}"`);
      console.log(`Normalized 1: "${details.name1Normalized.text}"`);
      console.log(`Normalized 2: "${details.name2Normalized.text}"`);
      if (details.name1Normalized.franchise || details.name2Normalized.franchise) {
        console.log(`Franchise:    ${details.name1Normalized.franchise ?? '-'} / ${details.name2Normalized.franchise ?? '-'}`);
      }

      console.log('\n=== Similarity Scores ===\n');
      console.log(`Token overlap:  ${(details.tokenOverlap * 100).toFixed(1)}%`);
      console.log(`Edit ratio:     ${(details.editRatio * 100).toFixed(1)}%`);
      console.log(`Combined (max): ${(details.similarity * 100).toFixed(1)}%`);
      console.log(`Shared tokens:  ${details.sharedTokens.join(', ') || '(none)'}`);

      console.log('\n=== Result ===\n');
      console.log(`Match: ${details.similarity >= threshold ? 'YES' : 'NO'}`);
      console.log('');
    });
}

// ============================================================================
// ADDRESS COMMAND
// ============================================================================

function createAddressCommand(): Command {
  return new Command('address')
    .description('Extract the destination address from text')
    .argument('<text>', 'Address line or document text')
    .option('--tables <file>', 'Matching tables (JSON)')
    .option('-f, --format <format>', 'Output format: table, json', 'table')
    .action(async (text: string, options: { tables?: string; format: string }) => {
      try {
        const tables = options.tables
          ? await loadMatchingTables(path.resolve(options.tables))
          : DEFAULT_MATCHING_TABLES;
        const address = normalizeAddress(text, tables.address);

        if (options.format === 'json') {
          console.log(JSON.stringify(address, null, 2));
          return;
        }

        console.log(`Street:      ${address.street ?? '-'}`);
        console.log(`Postal code: ${address.postalCode ?? '-'}`);
        console.log(`City:        ${address.city ?? '-'}`);
        console.log(`Company:     ${address.isCompanyAddress ? 'yes (no usable address)' : 'no'}`);
        if (address.skippedCompanyAddresses > 0) {
          console.log(`Skipped:     ${address.skippedCompanyAddresses} company address(es)`);
        }
      } catch (error) {
        fail(null, 'Address extraction failed', error);
      }
    });
}

// ============================================================================
// PROVIDER COMMAND
// ============================================================================

interface ProviderCommandOptions {
  providers: string;
  wasteTypes?: string[];
  tables?: string;
  threshold: string;
}

function createProviderCommand(): Command {
  return new Command('provider')
    .description('Resolve a provider name to its code and collection suffix')
    .argument('<raw>', 'Provider name as read off the document')
    .requiredOption('-p, --providers <file>', 'Provider aliases (CSV or JSON)')
    .option('-w, --waste-types <labels...>', 'Waste labels printed on the invoice')
    .option('--tables <file>', 'Matching tables (JSON)')
    .option('-t, --threshold <score>', 'Minimum match score', String(DEFAULT_RESOLVER_CONFIG.providerThreshold))
    .action(async (raw: string, options: ProviderCommandOptions) => {
      try {
        const config = validateResolverConfig(
          { ...DEFAULT_RESOLVER_CONFIG, providerThreshold: parseFloat(options.threshold) },
          'options'
        );
        const tables = options.tables
          ? await loadMatchingTables(path.resolve(options.tables))
          : DEFAULT_MATCHING_TABLES;
        const providers = await loadProviderAliases(path.resolve(options.providers));
        const match = matchProvider(raw, providers, config.providerThreshold);

        if (!match) {
          console.log(`No provider matched "${raw}"`);
          process.exitCode = 2;
          return;
        }

        console.log(`Provider: ${match.canonicalCode}`);
        console.log(`Matched:  "${match.matchedTerm}" (${match.score.toFixed(3)})`);

        const provider = providers.find(p => p.canonicalCode === match.canonicalCode);
        if (provider) {
          const suffix = determineCollectionSuffix(provider, options.wasteTypes ?? [], tables.wasteTypes);
          console.log(`Suffix:   ${suffix}`);
        }
      } catch (error) {
        fail(null, 'Provider lookup failed', error);
      }
    });
}

// ============================================================================
// STATS COMMAND
// ============================================================================

function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show statistics about a reference file')
    .argument('<reference>', 'Reference locations (CSV, TSV or JSON)')
    .option('--tables <file>', 'Matching tables (JSON)')
    .option('--alias-stats', 'Show alias table statistics')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (reference: string, options: { tables?: string; aliasStats?: boolean; quiet?: boolean }) => {
      const spinner = options.quiet ? null : ora('Analyzing reference data...').start();

      try {
        const tables = options.tables
          ? await loadMatchingTables(path.resolve(options.tables))
          : DEFAULT_MATCHING_TABLES;
        const store = await loadReferenceStore(path.resolve(reference), { nameTables: tables.name });
        const stats = store.stats();

        if (spinner) spinner.succeed('Analysis complete');

        console.log('\n=== Reference Statistics ===\n');
        console.log(`Locations:         ${stats.locations}`);
        console.log(`With postal code:  ${stats.withPostalCode}`);
        console.log(`No postal code:    ${stats.withoutPostalCode}`);
        console.log(`Postal codes:      ${stats.distinctPostalCodes}`);
        console.log(`With provider:     ${stats.withProvider}`);

        const franchises = Object.entries(stats.franchises).sort((a, b) => b[1] - a[1]);
        if (franchises.length > 0) {
          console.log('\nFranchises:');
          for (const [franchise, count] of franchises) {
            console.log(`  ${franchise}: ${count}`);
          }
        }

        const providers = Object.entries(stats.providers).sort((a, b) => b[1] - a[1]);
        if (providers.length > 0) {
          console.log('\nProviders:');
          for (const [provider, count] of providers) {
            console.log(`  ${provider}: ${count}`);
          }
        }

        if (store.warnings.length > 0) {
          console.log(`\nWarnings (${store.warnings.length}):`);
          for (const warning of store.warnings) {
            console.log(`  row ${warning.row}: ${warning.message}`);
          }
        }

        if (options.aliasStats) {
          const aliasStats = getNameTableStats(tables.name);
          console.log('\n=== Alias Tables ===\n');
          console.log(`Franchise aliases: ${aliasStats.franchiseAliases}`);
          console.log(`Franchise classes: ${aliasStats.franchiseClasses}`);
          console.log(`Noise tokens:      ${aliasStats.noiseTokens}`);
          console.log(`Company addresses: ${tables.address.companyAddresses.length}`);
        }

        console.log('');
      } catch (error) {
        fail(spinner, 'Analysis failed', error);
      }
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .name('siteresolve')
    .description('Resolve invoice site references to canonical locations')
    .version(VERSION);

  program.addCommand(createResolveCommand());
  program.addCommand(createBatchCommand());
  program.addCommand(createCompareCommand());
  program.addCommand(createAddressCommand());
  program.addCommand(createProviderCommand());
  program.addCommand(createStatsCommand());

  return program;
}
