/**
 * Schema Registry File Schema
 *
 * Persisted form of the per-endpoint field-set history kept in
 * `esquemas/registro_esquemas.json`.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema, SchemaVersionSchema } from './common.js';
import { FILE_SCHEMA_VERSIONS, compareVersions } from './versions.js';

// ============================================
// Version Entry
// ============================================

/**
 * One immutable entry in an endpoint's history.
 */
export const SchemaVersionEntrySchema = z.object({
  /** MAJOR.MINOR version */
  version: SchemaVersionSchema,
  /** Version this entry evolved from (null for the first entry) */
  previousVersion: SchemaVersionSchema.nullable(),
  /** Flattened dotted field paths, sorted */
  fields: z.array(z.string().min(1)),
  /** Known renames from `previousVersion` field paths to this version's paths */
  renames: z.record(z.string().min(1)).default({}),
  /** Payloads from earlier versions cannot be mapped across this entry */
  breaking: z.boolean().default(false),
  /** When the entry was registered */
  registeredAt: ISO8601TimestampSchema,
});

export type SchemaVersionEntry = z.infer<typeof SchemaVersionEntrySchema>;

// ============================================
// Endpoint History
// ============================================

export const EndpointHistorySchema = z
  .object({
    versions: z.array(SchemaVersionEntrySchema).min(1),
  })
  .superRefine((history, ctx) => {
    history.versions.forEach((entry, index) => {
      if (index === 0) {
        if (entry.previousVersion !== null) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'First version must not have a previousVersion',
            path: ['versions', index, 'previousVersion'],
          });
        }
        return;
      }

      const previous = history.versions[index - 1];
      const comparable =
        SchemaVersionSchema.safeParse(entry.version).success &&
        SchemaVersionSchema.safeParse(previous.version).success;
      if (comparable && compareVersions(entry.version, previous.version) <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Version ${entry.version} must be greater than ${previous.version}`,
          path: ['versions', index, 'version'],
        });
      }
      if (entry.previousVersion !== previous.version) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `previousVersion must be ${previous.version}`,
          path: ['versions', index, 'previousVersion'],
        });
      }
    });
  });

export type EndpointHistory = z.infer<typeof EndpointHistorySchema>;

// ============================================
// Registry Snapshot
// ============================================

export const RegistrySnapshotSchema = z.object({
  /** Layout version of the registry file itself */
  schemaVersion: z.literal(FILE_SCHEMA_VERSIONS.registry),
  /** History per endpoint */
  endpoints: z.record(EndpointHistorySchema),
});

export type RegistrySnapshot = z.infer<typeof RegistrySnapshotSchema>;

/**
 * Snapshot of a registry with no endpoints.
 */
export function createEmptyRegistrySnapshot(): RegistrySnapshot {
  return { schemaVersion: FILE_SCHEMA_VERSIONS.registry, endpoints: {} };
}
