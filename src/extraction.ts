/**
 * Extraction Boundary
 *
 * Interfaces for the collaborators that turn a scanned document into fields
 * (an AI extraction service, gated by a quota tracker), and the assembly of
 * those fields into a resolver query.
 */

import {
  DEFAULT_ADDRESS_TABLES,
  isUsableAddress,
  normalizeAddress,
  type AddressTables,
} from './address-normalizer.js';
import { coercePostalCode } from './postal-code.js';
import type { QueryBundle } from './resolver.js';

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Best-effort fields read off a document. Any of them may be missing.
 */
export interface ExtractedFields {
  companyName?: string | null;
  streetAddress?: string | null;
  postalCode?: string | null;
  city?: string | null;
  providerName?: string | null;
  documentDate?: string | null;
  documentNumber?: string | null;

  /** Waste stream labels printed on the invoice lines */
  wasteTypes?: string[] | null;
}

export interface ExtractionService {
  extract(rawText: string): Promise<ExtractedFields>;
}

/**
 * Consulted before every extraction call
 */
export interface QuotaTracker {
  canMakeCall(): boolean | Promise<boolean>;
  recordCall(): void | Promise<void>;
}

// ============================================================================
// QUERY ASSEMBLY
// ============================================================================

function text(value: string | null | undefined): string {
  return value?.trim() ?? '';
}

/**
 * Build a resolver query from extracted fields.
 *
 * The structured address is used when it yields a usable, non-company
 * address. Otherwise the raw document text is handed to the address
 * extractor instead, and a postal code taken from the company address is
 * not used as a hint.
 */
export function buildQueryBundle(
  fields: ExtractedFields,
  rawText?: string | null,
  tables: AddressTables = DEFAULT_ADDRESS_TABLES
): QueryBundle {
  const structured = [text(fields.streetAddress), text(fields.postalCode), text(fields.city)]
    .filter(part => part.length > 0)
    .join(' ');

  const parsed = structured ? normalizeAddress(structured, tables) : null;
  const structuredUsable = parsed !== null && isUsableAddress(parsed);

  let rawAddress: string | null = structured || null;
  let postalCodeHint = coercePostalCode(text(fields.postalCode));

  if (!structuredUsable && rawText && rawText.trim()) {
    rawAddress = rawText;
  }
  if (parsed?.isCompanyAddress) {
    postalCodeHint = null;
    if (!rawText || !rawText.trim()) rawAddress = null;
  }

  return {
    rawName: text(fields.companyName),
    rawAddress,
    postalCodeHint,
    providerRaw: text(fields.providerName) || null,
  };
}

// ============================================================================
// DOCUMENT ANALYSIS
// ============================================================================

export interface DocumentAnalysis {
  fields: ExtractedFields | null;
  query: QueryBundle | null;
  error: string | null;
}

/**
 * Run the extraction service over a document's text and build the query.
 * Quota exhaustion and service failures are reported in `error`; every
 * call made is recorded against the quota.
 */
export async function analyzeDocument(
  rawText: string,
  service: ExtractionService,
  quota?: QuotaTracker,
  tables: AddressTables = DEFAULT_ADDRESS_TABLES
): Promise<DocumentAnalysis> {
  if (quota && !(await quota.canMakeCall())) {
    return { fields: null, query: null, error: 'Extraction quota exhausted' };
  }

  let fields: ExtractedFields;
  try {
    fields = await service.extract(rawText);
  } catch (err) {
    return {
      fields: null,
      query: null,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  } finally {
    if (quota) await quota.recordCall();
  }

  return { fields, query: buildQueryBundle(fields, rawText, tables), error: null };
}
