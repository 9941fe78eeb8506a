export type FetchErrorKind = 'network' | 'timeout' | 'parse';

/**
 * Per-request failure. Returned by FetchClient, never thrown past it.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = options.status;
  }
}

/**
 * A missing selector or field on one item. The item is skipped, the source continues.
 */
export class ExtractionError extends Error {
  readonly sourceName: string;
  readonly field: string;
  readonly itemUrl?: string;

  constructor(sourceName: string, field: string, message: string, itemUrl?: string) {
    super(message);
    this.name = 'ExtractionError';
    this.sourceName = sourceName;
    this.field = field;
    this.itemUrl = itemUrl;
  }
}

export class ScoringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringError';
  }
}

/**
 * A persistence call failed or a row did not pass the insert schema.
 */
export class StorageError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: { cause?: unknown } = {}) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { cause: options.cause });
    this.name = 'StorageError';
    this.issues = issues;
  }
}

export class CoordinatorTaskFailure extends Error {
  readonly sourceName: string;
  readonly timedOut: boolean;

  constructor(sourceName: string, message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CoordinatorTaskFailure';
    this.sourceName = sourceName;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Invalid static configuration. The only error rejected synchronously to callers.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
