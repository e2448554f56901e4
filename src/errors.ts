/**
 * Error taxonomy for the catalog.
 *
 * Every error carries a stable `code` so callers can branch without
 * relying on `instanceof` across package boundaries.
 */

export type VolcanoCatalogErrorCode =
  | 'INVALID_DATASET'
  | 'DOWNLOAD_FAILED'
  | 'MODE_ERROR'
  | 'MALFORMED_RECORD'
  | 'MISSING_FILE'
  | 'UNSUPPORTED_UNIT';

export class VolcanoCatalogError extends Error {
  readonly code: VolcanoCatalogErrorCode;

  constructor(code: VolcanoCatalogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Dataset identifier outside the fixed enumeration
 */
export class InvalidDatasetError extends VolcanoCatalogError {
  constructor(
    readonly dataset: string,
    readonly allowed: readonly string[],
  ) {
    super('INVALID_DATASET', `Unknown dataset: ${dataset}. Available: ${allowed.join(', ')}`);
  }
}

/**
 * Network or HTTP failure while fetching a dataset
 */
export class DownloadFailedError extends VolcanoCatalogError {
  constructor(
    readonly url: string,
    cause: unknown,
    readonly status?: number,
  ) {
    super('DOWNLOAD_FAILED', `Failed to download data from ${url}: ${describeCause(cause)}`, { cause });
  }
}

export class ModeError extends VolcanoCatalogError {
  constructor(
    readonly expected: 'local' | 'web-services',
    readonly actual: 'local' | 'web-services',
  ) {
    super('MODE_ERROR', `Operation requires a ${expected} database, but this one is ${actual}`);
  }
}

/**
 * A CSV row that could not be turned into a record. Loaders catch it
 * and skip the row.
 */
export class MalformedRecordError extends VolcanoCatalogError {
  constructor(
    readonly row: number,
    reason: string,
  ) {
    super('MALFORMED_RECORD', `Malformed record at row ${row}: ${reason}`);
  }
}

export class MissingFileError extends VolcanoCatalogError {
  constructor(readonly path: string, cause?: unknown) {
    super('MISSING_FILE', `CSV file not found: ${path}`, { cause });
  }
}

export class UnsupportedUnitError extends VolcanoCatalogError {
  constructor(readonly unit: string) {
    super('UNSUPPORTED_UNIT', `Units must be 'm' or 'ft', got '${unit}'`);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
