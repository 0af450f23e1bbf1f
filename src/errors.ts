/**
 * Error types raised by the aggregation and ingestion paths.
 *
 * Every error carries a `code` so callers can branch without
 * `instanceof` chains across package boundaries.
 */

export type AnalyticsErrorCode =
  | 'MALFORMED_URL'
  | 'STORE_UNAVAILABLE'
  | 'STORE_READ_FAILURE'
  | 'STORE_WRITE_FAILURE'
  | 'INVALID_EVENT';

export class AnalyticsError extends Error {
  readonly code: AnalyticsErrorCode;

  constructor(code: AnalyticsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalyticsError';
    this.code = code;
  }
}

/** A URL or referrer that cannot be split into host and path. */
export class MalformedUrlError extends AnalyticsError {
  readonly url: string;

  constructor(url: string) {
    super('MALFORMED_URL', `unable to extract domain and path from the link: ${url}`);
    this.name = 'MalformedUrlError';
    this.url = url;
  }
}

export class StoreUnavailableError extends AnalyticsError {
  constructor() {
    super('STORE_UNAVAILABLE', 'event store is not configured');
    this.name = 'StoreUnavailableError';
  }
}

export class StoreReadError extends AnalyticsError {
  constructor(domain: string, options?: { cause?: unknown }) {
    super('STORE_READ_FAILURE', `cannot list events for ${domain}`, options);
    this.name = 'StoreReadError';
  }
}

export class StoreWriteError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_WRITE_FAILURE', message, options);
    this.name = 'StoreWriteError';
  }
}

/** Ingestion input that failed validation. */
export class InvalidEventError extends AnalyticsError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_EVENT', `invalid event: ${issues.join('; ')}`);
    this.name = 'InvalidEventError';
    this.issues = issues;
  }
}

/** Message of an unknown thrown value, for log metadata. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
