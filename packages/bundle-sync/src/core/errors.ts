/**
 * Bundle Sync Error Types
 *
 * Every failure the pipeline can observe is one of these classes. Resolver
 * and fetcher errors are caught at their boundary and turned into outcome
 * records; only ConfigError and IndexFormatError stop a run.
 */

export type ErrorCode =
  | 'TRANSPORT'
  | 'NOT_FOUND'
  | 'MALFORMED_RESPONSE'
  | 'VALIDATION'
  | 'FILESYSTEM'
  | 'CONFIG'
  | 'INDEX_FORMAT';

/**
 * Base class for all bundle sync errors
 */
export class SyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Network failure, timeout or unexpected HTTP status
 */
export class TransportError extends SyncError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
    this.name = 'TransportError';
    this.url = url;
  }
}

/**
 * Zero-match lookup or missing upstream resource. Never fatal.
 */
export class NotFoundError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
  }
}

/**
 * Upstream payload could not be parsed or did not match the expected shape
 */
export class MalformedResponseError extends SyncError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super('MALFORMED_RESPONSE', message, options);
    this.name = 'MalformedResponseError';
    this.url = url;
  }
}

/**
 * Downloaded payload is not a binary artifact (e.g. an HTML error page)
 */
export class ValidationError extends SyncError {
  readonly url: string;
  readonly byteLength: number;

  constructor(message: string, url: string, byteLength: number) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.url = url;
    this.byteLength = byteLength;
  }
}

/**
 * Directory creation or file write failed
 */
export class FilesystemError extends SyncError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super('FILESYSTEM', message, options);
    this.name = 'FilesystemError';
    this.path = path;
  }
}

/**
 * Declaration or configuration is missing or invalid. Halts the run.
 *
 * RECOVERY:
 * - Check the path given by --config / BUNDLE_SYNC_DECLARATION
 * - Review `issues` for the offending fields
 */
export class ConfigError extends SyncError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Repository index exists but cannot be parsed. Halts the run.
 */
export class IndexFormatError extends SyncError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super('INDEX_FORMAT', message, options);
    this.name = 'IndexFormatError';
    this.path = path;
  }
}

/**
 * Normalize any thrown value into a SyncError (unknown errors count as transport)
 */
export function toSyncError(error: unknown, url = ''): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, url, { cause: error });
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for an fs error raised because the path does not exist
 */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
