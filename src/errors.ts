/**
 * Error types
 *
 * Only loading can fail. Ambiguous and unmatched resolutions are ordinary
 * result values (see resolver.ts), never exceptions.
 */

/**
 * Reference or provider data could not be loaded: unreadable file,
 * unsupported format, or required columns missing.
 */
export class DataLoadError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataLoadError';
    this.source = source;
  }
}

/**
 * A configuration or alias-table file is malformed.
 */
export class ConfigError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.source = source;
  }
}
