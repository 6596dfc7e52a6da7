/**
 * Change Report Schema
 *
 * Field-level difference between an ingested payload and the registry's
 * current field set for its endpoint. Reports are transient; the ones with
 * changes are appended to the audit log, which is never read back as
 * schema truth.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema, SchemaVersionSchema } from './common.js';

export const ChangeReportSchema = z.object({
  /** Endpoint the payload belongs to */
  endpoint: z.string().min(1),
  /** Registry version the payload was compared against */
  baseVersion: SchemaVersionSchema,
  /** Paths present in the payload but not in the registry (sorted) */
  fieldsAdded: z.array(z.string()),
  /** Paths in the registry but missing from the payload (sorted) */
  fieldsRemoved: z.array(z.string()),
  /** When the comparison ran */
  detectedAt: ISO8601TimestampSchema,
});

export type ChangeReport = z.infer<typeof ChangeReportSchema>;

/**
 * Audit log line: a change report plus the version it produced.
 */
export const ChangeLogEntrySchema = ChangeReportSchema.extend({
  /** Version registered because of this change */
  newVersion: SchemaVersionSchema,
});

export type ChangeLogEntry = z.infer<typeof ChangeLogEntrySchema>;

/**
 * Whether a report carries any added or removed field.
 */
export function hasChanges(report: ChangeReport): boolean {
  return report.fieldsAdded.length > 0 || report.fieldsRemoved.length > 0;
}
