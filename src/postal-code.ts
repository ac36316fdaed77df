/**
 * Postal Code Utilities
 *
 * French postal codes are exactly five digits. The first two digits give the
 * département (three for overseas codes starting with 97/98).
 */

export const POSTAL_CODE_PATTERN = /^\d{5}$/;

/**
 * A 5-digit run inside free text. Offsets index into the scanned string.
 */
export interface PostalCodeSpan {
  code: string;
  start: number;
  end: number;
}

/**
 * Check whether a value is a well-formed postal code
 */
export function isValidPostalCode(value: string | null | undefined): value is string {
  return typeof value === 'string' && POSTAL_CODE_PATTERN.test(value);
}

/**
 * Coerce a raw cell to a postal code, or null when it is not one.
 * Inner spaces are removed ("75 001" → "75001"); nothing is ever padded.
 */
export function coercePostalCode(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const compact = raw.replace(/\s+/g, '');
  return isValidPostalCode(compact) ? compact : null;
}

/**
 * Find every 5-digit run bounded by word boundaries.
 * Runs that belong to a longer digit sequence (SIRET, phone numbers written
 * without spaces) never match.
 */
export function findPostalCodeSpans(text: string): PostalCodeSpan[] {
  if (!text) return [];

  const spans: PostalCodeSpan[] = [];
  const pattern = /\b\d{5}\b/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    spans.push({
      code: match[0],
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return spans;
}
