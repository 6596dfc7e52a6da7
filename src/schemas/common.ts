/**
 * Common Zod Schemas - Shared types used across the lake
 */

import { z } from 'zod';

// ============================================
// JSON Value Schema
// ============================================

/**
 * Any JSON value as produced by `JSON.parse`.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Narrow a JSON value to a plain object.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// Date Schemas
// ============================================

/**
 * Business date as an ISO calendar date (YYYY-MM-DD).
 *
 * Only the format is checked here; calendar validity is checked by
 * `parseBusinessDate` in `lake/partition`.
 */
export const BusinessDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Business date must be in YYYY-MM-DD format');

export type BusinessDateString = z.infer<typeof BusinessDateSchema>;

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z
  .string()
  .datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Schema Version Schema
// ============================================

/**
 * Payload schema version in MAJOR.MINOR form (e.g., "1.0", "1.12").
 */
export const SchemaVersionSchema = z
  .string()
  .regex(/^\d+\.\d+$/, 'Schema version must be in MAJOR.MINOR format');

export type SchemaVersionString = z.infer<typeof SchemaVersionSchema>;
