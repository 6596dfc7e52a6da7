/**
 * Data Lake Errors
 *
 * Every failure the lake reports on purpose is a `DataLakeError` subclass
 * with a stable `code`. Validation errors (partition keys, schema versions)
 * are caller mistakes and are never retried; `WriteFailureError` wraps I/O
 * failures and is the only retryable kind.
 *
 * @module lake/errors
 */

export type DataLakeErrorCode =
  | 'INVALID_PARTITION_KEY'
  | 'UNKNOWN_SCHEMA_VERSION'
  | 'UNMAPPABLE_SCHEMA_VERSION'
  | 'WRITE_FAILURE'
  | 'INTEGRITY_MISMATCH';

/**
 * Base class for lake errors.
 */
export class DataLakeError extends Error {
  constructor(
    message: string,
    public readonly code: DataLakeErrorCode,
    public readonly isRetryable: boolean = false,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DataLakeError';
  }
}

/**
 * Malformed endpoint, business date or store id.
 */
export class InvalidPartitionKeyError extends DataLakeError {
  constructor(
    public readonly field: 'endpoint' | 'businessDate' | 'storeId' | 'partition',
    public readonly value: string,
    reason: string
  ) {
    super(`Invalid ${field} "${value}": ${reason}`, 'INVALID_PARTITION_KEY');
    this.name = 'InvalidPartitionKeyError';
  }
}

/**
 * Registry lookup for a version that was never registered.
 */
export class UnknownSchemaVersionError extends DataLakeError {
  constructor(
    public readonly endpoint: string,
    public readonly version: string
  ) {
    super(`Schema version ${version} is not registered for endpoint ${endpoint}`, 'UNKNOWN_SCHEMA_VERSION');
    this.name = 'UnknownSchemaVersionError';
  }
}

/**
 * No chain of known renames leads from a payload's version to the current one.
 */
export class UnmappableSchemaVersionError extends DataLakeError {
  constructor(
    public readonly endpoint: string,
    public readonly fromVersion: string,
    public readonly toVersion: string,
    reason: string
  ) {
    super(
      `Cannot map ${endpoint} payload from schema ${fromVersion} to ${toVersion}: ${reason}`,
      'UNMAPPABLE_SCHEMA_VERSION'
    );
    this.name = 'UnmappableSchemaVersionError';
  }
}

/**
 * I/O failure while creating a record file.
 */
export class WriteFailureError extends DataLakeError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause: unknown
  ) {
    super(message, 'WRITE_FAILURE', true, { cause });
    this.name = 'WriteFailureError';
  }
}

/**
 * Stored content does not match its recorded hash.
 */
export class IntegrityMismatchError extends DataLakeError {
  constructor(
    public readonly filePath: string,
    public readonly expectedHash: string,
    public readonly actualHash: string
  ) {
    super(
      `Integrity check failed for ${filePath}: expected ${expectedHash}, got ${actualHash}`,
      'INTEGRITY_MISMATCH'
    );
    this.name = 'IntegrityMismatchError';
  }
}

/**
 * Check if an error is transient and worth retrying.
 *
 * @param error - Error to check
 * @returns true for retryable lake errors
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof DataLakeError && error.isRetryable;
}
