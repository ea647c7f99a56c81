interface SourceRequestErrorOptions extends ErrorOptions {
  url: string;
  status?: number | null;
}

export class SourceRequestError extends Error {
  readonly url: string;

  readonly status: number | null;

  constructor(message: string, { url, status = null, ...options }: SourceRequestErrorOptions) {
    super(message, options);
    this.name = 'SourceRequestError';
    this.url = url;
    this.status = status;
  }
}

export class TableStructureError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TableStructureError';
  }
}

export type MissingRole = 'datetime' | 'temperature';

interface HeaderResolutionErrorOptions extends ErrorOptions {
  headers: string[];
  missing: MissingRole;
}

export class HeaderResolutionError extends Error {
  readonly headers: string[];

  readonly missing: MissingRole;

  constructor(message: string, { headers, missing, ...options }: HeaderResolutionErrorOptions) {
    super(message, options);
    this.name = 'HeaderResolutionError';
    this.headers = headers;
    this.missing = missing;
  }
}

interface EmptyExtractionErrorOptions extends ErrorOptions {
  rows: number;
}

/** Raised only under the `fail` empty-run policy. */
export class EmptyExtractionError extends Error {
  readonly rows: number;

  constructor(message: string, { rows, ...options }: EmptyExtractionErrorOptions) {
    super(message, options);
    this.name = 'EmptyExtractionError';
    this.rows = rows;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Structural and resolution failures: the page was fetched but no series could be read from it. */
export function isExtractionError(error: unknown): error is TableStructureError | HeaderResolutionError {
  return error instanceof TableStructureError || error instanceof HeaderResolutionError;
}
