/**
 * Table Reader
 *
 * Reads the tabular sources the resolver is configured from (reference
 * locations, provider aliases) into a header + rows table.
 *
 * Supported: delimited text (.csv, .tsv, .txt; delimiter auto-detected,
 * BOM tolerated) and JSON (.json, an array of flat objects).
 */

import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { DataLoadError } from './errors.js';
import { stripDiacritics } from './name-normalizer.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Table {
  headers: string[];

  /** Data rows, each padded to `headers.length` */
  rows: string[][];
}

export type TableFormat = 'csv' | 'json' | 'unknown';

// ============================================================================
// FILE TYPE DETECTION
// ============================================================================

/**
 * Detect file type from extension
 */
export function getFileType(filePath: string): TableFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.csv':
    case '.tsv':
    case '.txt': return 'csv';
    case '.json': return 'json';
    default: return 'unknown';
  }
}

/**
 * Get list of supported file extensions
 */
export function getSupportedExtensions(): string[] {
  return ['.csv', '.tsv', '.txt', '.json'];
}

// ============================================================================
// DELIMITED TEXT
// ============================================================================

/**
 * Detect CSV delimiter from the header line
 */
export function detectDelimiter(firstLine: string): string {
  const delimiters = [',', '\t', ';', '|'];
  let maxCount = 0;
  let detected = ',';

  for (const delim of delimiters) {
    const count = firstLine.split(delim).length - 1;
    if (count > maxCount) {
      maxCount = count;
      detected = delim;
    }
  }

  return detected;
}

function padRow(row: string[], width: number): string[] {
  if (row.length >= width) return row.slice(0, width);
  return [...row, ...new Array<string>(width - row.length).fill('')];
}

/**
 * Parse delimited text into a table
 */
export function parseDelimited(content: string, source = 'input'): Table {
  const text = content.replace(/^\uFEFF/, '');
  const firstLine = text.split(/\r?\n/).find(line => line.trim()) ?? '';
  if (!firstLine) {
    throw new DataLoadError(`${source} has no header row`, source);
  }

  let records: unknown;
  try {
    records = parse(text, {
      delimiter: detectDelimiter(firstLine),
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      trim: true,
    });
  } catch (error) {
    throw new DataLoadError(
      `Cannot parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      { cause: error }
    );
  }

  if (!Array.isArray(records) || records.length === 0) {
    throw new DataLoadError(`${source} has no header row`, source);
  }

  const [headerRow, ...dataRows] = records.map(record =>
    Array.isArray(record) ? record.map(value => String(value)) : []
  );
  const headers = headerRow.map(header => header.trim());

  return {
    headers,
    rows: dataRows.map(row => padRow(row, headers.length)),
  };
}

// ============================================================================
// JSON
// ============================================================================

function cellValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(cellValue).join(',');
  if (typeof value === 'object') return '';
  return String(value).trim();
}

/**
 * Parse a JSON array of flat objects into a table
 */
export function parseJsonTable(content: string, source = 'input'): Table {
  let data: unknown;
  try {
    data = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new DataLoadError(
      `Cannot parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      { cause: error }
    );
  }

  if (!Array.isArray(data)) {
    throw new DataLoadError(`${source} must contain a JSON array of objects`, source);
  }

  return tableFromRecords(data);
}

/**
 * Build a table from plain objects. Headers are the union of keys in
 * first-seen order; entries that are not objects become empty rows.
 */
export function tableFromRecords(records: readonly unknown[]): Table {
  const headers: string[] = [];
  const objects: Record<string, unknown>[] = [];

  for (const item of records) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      objects.push({});
      continue;
    }
    const entries = Object.entries(item);
    for (const [key] of entries) {
      if (!headers.includes(key)) headers.push(key);
    }
    objects.push(Object.fromEntries(entries));
  }

  return {
    headers,
    rows: objects.map(object => headers.map(header => cellValue(object[header]))),
  };
}

// ============================================================================
// COLUMNS
// ============================================================================

/**
 * Canonical header key: "Code Postal" → "code_postal"
 */
export function headerKey(header: string): string {
  return stripDiacritics(header)
    .toLowerCase()
    .trim()
    .replace(/[\s\-.]+/g, '_');
}

/**
 * Index of the first header matching one of the accepted names, or -1
 */
export function findColumn(headers: string[], names: readonly string[]): number {
  const keys = headers.map(headerKey);
  for (const name of names) {
    const index = keys.indexOf(name);
    if (index !== -1) return index;
  }
  return -1;
}

// ============================================================================
// MAIN READ FUNCTION
// ============================================================================

/**
 * Read a tabular file. Throws DataLoadError when it is unreadable or of an
 * unsupported type.
 */
export async function readTable(filePath: string): Promise<Table> {
  const fileType = getFileType(filePath);
  const source = path.basename(filePath);

  if (fileType === 'unknown') {
    throw new DataLoadError(
      `Unsupported file type: ${path.extname(filePath) || '(none)'}`,
      filePath
    );
  }

  let content: string;
  try {
    content = await fsPromises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DataLoadError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    );
  }

  return fileType === 'json'
    ? parseJsonTable(content, source)
    : parseDelimited(content, source);
}
