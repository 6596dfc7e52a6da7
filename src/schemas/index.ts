/**
 * Schema Exports
 *
 * Zod schemas and inferred types for every file the lake persists.
 */

// Common
export {
  JsonValueSchema,
  isJsonObject,
  BusinessDateSchema,
  ISO8601TimestampSchema,
  SchemaVersionSchema,
  type JsonValue,
  type JsonObject,
  type BusinessDateString,
  type ISO8601Timestamp,
  type SchemaVersionString,
} from './common.js';

// Versions
export {
  INITIAL_SCHEMA_VERSION,
  FILE_SCHEMA_VERSIONS,
  parseVersion,
  formatVersion,
  compareVersions,
  nextVersion,
  type VersionParts,
} from './versions.js';

// Stored records
export {
  CORE_METADATA_KEYS,
  RecordMetadataSchema,
  StoredRecordSchema,
  MetadataSidecarSchema,
  type RecordMetadata,
  type StoredRecord,
  type MetadataSidecar,
} from './record.js';

// Registry file
export {
  SchemaVersionEntrySchema,
  EndpointHistorySchema,
  RegistrySnapshotSchema,
  createEmptyRegistrySnapshot,
  type SchemaVersionEntry,
  type EndpointHistory,
  type RegistrySnapshot,
} from './registry.js';

// Change reports
export {
  ChangeReportSchema,
  ChangeLogEntrySchema,
  hasChanges,
  type ChangeReport,
  type ChangeLogEntry,
} from './change-report.js';
