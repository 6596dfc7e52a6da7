/**
 * Data Lake Core
 *
 * @module lake
 */

// Facade
export { DataLake, type DataLakeOptions } from './data-lake.js';

// Errors
export {
  DataLakeError,
  InvalidPartitionKeyError,
  UnknownSchemaVersionError,
  UnmappableSchemaVersionError,
  WriteFailureError,
  IntegrityMismatchError,
  isRetryableError,
  type DataLakeErrorCode,
} from './errors.js';

// Partitions
export {
  resolvePartition,
  getPartitionDir,
  parsePartitionSegments,
  parseBusinessDate,
  formatBusinessDate,
  validateEndpoint,
  validateStoreId,
  type PartitionKey,
  type DateParts,
  type BusinessDateInput,
  type ResolvedPartition,
} from './partition.js';

// Field paths and hashing
export { flattenFieldPaths, sortedFields, renameFieldPath, renameFieldPaths, validateRename } from './fields.js';
export { canonicalJson, hashPayload, payloadSizeBytes, calculateFileHash } from './hash.js';

// Schema tracking
export { SchemaRegistry, type RegisterVersionOptions, type EndpointSchemaSummary } from './registry.js';
export { FileRegistryStore, InMemoryRegistryStore, type RegistryStore } from './registry-store.js';
export { ChangeDetector } from './detector.js';
export { FieldAdapter } from './adapter.js';

// Ingestion and reads
export { PayloadWriter, buildRecordFileName, type WriteRequest, type WriteResult } from './writer.js';
export {
  ingestBatch,
  DEFAULT_BATCH_OPTIONS,
  type BatchOptions,
  type BatchResult,
  type FailedWrite,
  type RecordWriter,
} from './batch.js';
export { queryRecords, readStoredRecord, type RecordQuery, type QueriedRecord } from './query.js';

// Maintenance
export {
  RetentionExecutor,
  retentionCutoff,
  type ArchivedPartition,
  type FailedPartition,
  type RetentionResult,
  type RetentionRunOptions,
} from './retention.js';
export {
  collectLakeStatistics,
  type LakeStatistics,
  type FolderStatistics,
  type EndpointStatistics,
} from './statistics.js';
