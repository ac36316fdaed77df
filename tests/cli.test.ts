/**
 * CLI Tests
 *
 * Runs the commands in-process against the fixtures and checks their output.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { CommanderError } from 'commander';
import { createProgram, VERSION } from '../src/commands.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const REFERENCE = fixture('restaurants.csv');
const QUERIES = fixture('queries.csv');
const PROVIDERS = fixture('providers.csv');

let stdout: string[];
let stderr: string[];

async function runCLI(args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: str => stdout.push(str),
      writeErr: str => stderr.push(str),
    });

  try {
    await program.parseAsync(['node', 'siteresolve', ...args]);
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
  }

  const exitCode = process.exitCode ?? 0;
  return {
    stdout: stdout.join('\n'),
    stderr: stderr.join('\n'),
    exitCode: typeof exitCode === 'number' ? exitCode : Number(exitCode),
  };
}

beforeEach(() => {
  stdout = [];
  stderr = [];
  process.exitCode = undefined;
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ============================================================================
// VERSION
// ============================================================================

describe('version', () => {
  it('prints the version', async () => {
    const result = await runCLI(['--version']);
    expect(result.stdout.trim()).toBe(VERSION);
  });
});

// ============================================================================
// RESOLVE
// ============================================================================

describe('resolve', () => {
  it('prints a resolved site', async () => {
    const result = await runCLI(['resolve', REFERENCE, '-n', 'Burger King', '-q']);

    const lines = result.stdout.split('\n');
    expect(lines[0]).toBe('Status:   resolved (EXACT_NAME)');
    expect(lines[1]).toBe('Site:     S004 BURGER KING');
    expect(lines[2]).toBe('Address:  5 AVENUE JEAN JAURES, 69007 LYON');
    expect(result.exitCode).toBe(0);
  });

  it('prints the trace when verbose', async () => {
    const result = await runCLI(['resolve', REFERENCE, '-n', 'Burger King', '-q', '-v']);

    expect(result.stdout).toContain('Trace:\n  name: BURGERKING\n  address: none\n  stage 1: 1 candidate(s) at or above 0.85');
  });

  it('uses the address to separate branches', async () => {
    const result = await runCLI([
      'resolve', REFERENCE, '-n', 'MCDONALDS', '-a', '10 RUE DE LA REPUBLIQUE 69002 LYON', '-q', '-f', 'json',
    ]);

    const parsed: unknown = JSON.parse(result.stdout);
    expect(parsed).toMatchObject({
      status: 'resolved',
      matchedVia: 'NAME_PLUS_ADDRESS',
      location: { canonicalId: 'S002' },
    });
  });

  it('exits with 2 when not resolved', async () => {
    const result = await runCLI(['resolve', REFERENCE, '-n', 'McDo', '-q']);

    expect(result.stdout.split('\n').slice(0, 2)).toEqual([
      'Status:   not found',
      'Reason:   2 locations matched the name and no address or postal code separated them',
    ]);
    expect(result.exitCode).toBe(2);
  });

  it('exits with 2 on a tie', async () => {
    const result = await runCLI([
      'resolve', REFERENCE, '-n', 'MCDONALDS', '-a', 'RUE SAINT-DENIS 13001 MARSEILLE', '-q',
    ]);

    expect(result.stdout.split('\n')[0]).toBe('Status:   ambiguous (2 candidates)');
    expect(result.exitCode).toBe(2);
  });

  it('rejects an invalid threshold', async () => {
    const result = await runCLI(['resolve', REFERENCE, '-n', 'KFC', '-t', '1.5', '-q']);

    expect(result.stderr).toBe('Invalid options: nameMatchThreshold: Number must be less than or equal to 1');
    expect(result.exitCode).toBe(1);
  });

  it('reports a missing reference file', async () => {
    const result = await runCLI(['resolve', fixture('missing.csv'), '-n', 'KFC', '-q']);

    expect(result.stderr).toContain('Cannot read');
    expect(result.exitCode).toBe(1);
  });
});

// ============================================================================
// BATCH
// ============================================================================

describe('batch', () => {
  it('writes one CSV line per query', async () => {
    const result = await runCLI(['batch', REFERENCE, QUERIES, '-f', 'csv', '-q']);

    expect(result.stdout.split('\n')).toEqual([
      'row,label,name,status,canonical_id,matched_via,provider,candidates,reason',
      '1,inv-1.pdf,MCDONALDS,resolved,S002,NAME_PLUS_ADDRESS,,,',
      '2,inv-2.pdf,RESTAURANT MARZY,resolved,S003,POSTAL_FALLBACK,,,',
      '3,inv-3.pdf,MCDONALDS,not_found,,,,,2 locations matched the name and no address or postal code separated them',
      '4,inv-4.pdf,,not_found,,,,,"No name, address or postal code to match on"',
    ]);
    expect(result.exitCode).toBe(0);
  });

  it('resolves providers when given aliases', async () => {
    const result = await runCLI(['batch', REFERENCE, QUERIES, '-p', PROVIDERS, '-q']);

    const rows: unknown = JSON.parse(result.stdout);
    expect(rows).toMatchObject([
      { row: 1, status: 'resolved', canonicalId: 'S002', provider: 'SUEZ' },
      { row: 2, provider: null },
      { row: 3, status: 'not_found', candidates: [] },
      { row: 4, status: 'not_found' },
    ]);
  });

  it('requires a name column', async () => {
    const result = await runCLI(['batch', REFERENCE, PROVIDERS, '-q']);

    expect(result.stderr).toBe(
      'providers.csv has no name column (expected one of: name, company_name, raw_name, entreprise, restaurant)'
    );
    expect(result.exitCode).toBe(1);
  });
});

// ============================================================================
// COMPARE / ADDRESS / PROVIDER
// ============================================================================

describe('compare', () => {
  it('shows normalized names and the verdict', async () => {
    const result = await runCLI(['compare', 'McDo Nevers', 'MCDONALDS NEVERS MARZY']);

    expect(result.stdout).toContain('Normalized 1: "MCDONALDS NEVERS"');
    expect(result.stdout).toContain('Shared tokens:  MCDONALDS, NEVERS');
    expect(result.stdout).toContain('Match: NO');
  });

  it('matches spelling variants', async () => {
    const result = await runCLI(['compare', 'Mac Do', "McDonald's"]);
    expect(result.stdout).toContain('Match: YES');
  });
});

describe('address', () => {
  it('skips the company address', async () => {
    const text = 'SOCIETE RUBO, 34 BOULEVARD DES ITALIENS 75009 PARIS\nLIVRAISON : 12 AVENUE DE LA GARE 58180 MARZY';
    const result = await runCLI(['address', text]);

    expect(result.stdout.split('\n')).toEqual([
      'Street:      12 AVENUE DE LA GARE',
      'Postal code: 58180',
      'City:        MARZY',
      'Company:     no',
      'Skipped:     1 company address(es)',
    ]);
  });
});

describe('provider', () => {
  it('prints the code and collection suffix', async () => {
    const result = await runCLI(['provider', 'Suez RV Centre Est', '-p', PROVIDERS, '-w', 'BIO', 'DIB']);

    expect(result.stdout.split('\n')).toEqual([
      'Provider: SUEZ',
      'Matched:  "SUEZ RV" (1.000)',
      'Suffix:   SUEZBIODIB',
    ]);
  });

  it('detects waste types from custom tables', async () => {
    const args = ['provider', 'SUEZ', '-p', PROVIDERS, '-w', 'Collecte verre'];

    const builtIn = await runCLI(args);
    expect(builtIn.stdout.split('\n')[2]).toBe('Suffix:   SUEZ');

    stdout = [];
    const custom = await runCLI([...args, '--tables', fixture('waste-tables.json')]);
    expect(custom.stdout.split('\n')).toEqual([
      'Provider: SUEZ',
      'Matched:  "SUEZ" (1.000)',
      'Suffix:   SUEZVERRE',
    ]);
  });

  it('rejects an invalid threshold', async () => {
    const result = await runCLI(['provider', 'SUEZ', '-p', PROVIDERS, '-t', '1.5']);

    expect(result.stderr).toBe('Invalid options: providerThreshold: Number must be less than or equal to 1');
    expect(result.exitCode).toBe(1);
  });

  it('rejects a threshold that is not a number', async () => {
    const result = await runCLI(['provider', 'SUEZ', '-p', PROVIDERS, '-t', 'high']);

    expect(result.stderr).toBe('Invalid options: providerThreshold: Expected number, received nan');
    expect(result.exitCode).toBe(1);
  });

  it('exits with 2 when nothing matches', async () => {
    const result = await runCLI(['provider', 'Transports Martin', '-p', PROVIDERS]);

    expect(result.stdout).toBe('No provider matched "Transports Martin"');
    expect(result.exitCode).toBe(2);
  });
});

// ============================================================================
// STATS
// ============================================================================

describe('stats', () => {
  it('summarizes the reference file', async () => {
    const result = await runCLI(['stats', REFERENCE, '-q']);

    expect(result.stdout).toContain('Locations:         5');
    expect(result.stdout).toContain('No postal code:    1');
    expect(result.stdout).toContain('Franchises:\n  MCDONALDS: 3');
    expect(result.stdout).toContain('Providers:\n  SUEZ: 2\n  VEOLIA: 2');
    expect(result.stdout).toContain('Warnings (3):\n  row 5: Invalid postal code "7500" for S005, stored as empty');
  });

  it('includes custom tables in alias statistics', async () => {
    const result = await runCLI(['stats', REFERENCE, '--tables', fixture('tables.json'), '--alias-stats', '-q']);

    expect(result.stdout).toContain('Franchise aliases: 10');
    expect(result.stdout).toContain('Noise tokens:      12');
    expect(result.stdout).toContain('Company addresses: 2');
  });
});
