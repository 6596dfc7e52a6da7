/**
 * Record Query
 *
 * Reads stored records back for an endpoint and business-date range,
 * verifies their integrity and normalizes each payload to the endpoint's
 * current field names.
 *
 * @module lake/query
 */

import * as path from 'node:path';
import { readDirSafe, readJson } from '../storage/atomic.js';
import { getRawDir, toLakeRelativeId } from '../storage/paths.js';
import {
  StoredRecordSchema,
  type JsonValue,
  type RecordMetadata,
  type StoredRecord,
} from '../schemas/index.js';
import type { FieldAdapter } from './adapter.js';
import { IntegrityMismatchError, InvalidPartitionKeyError } from './errors.js';
import { hashPayload } from './hash.js';
import {
  datePartsToUtc,
  formatBusinessDate,
  parseBusinessDate,
  daySegments,
  validateEndpoint,
  validateStoreId,
  type BusinessDateInput,
  type DateParts,
} from './partition.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Query parameters.
 */
export interface RecordQuery {
  endpoint: string;
  /** First business date (inclusive) */
  from: BusinessDateInput;
  /** Last business date (inclusive, default: `from`) */
  to?: BusinessDateInput;
  /** Restrict to one store (default: every store) */
  storeId?: string;
  /** Recompute `hash_dados` for every record (default: true) */
  verifyIntegrity?: boolean;
}

/**
 * One record as returned by a query.
 */
export interface QueriedRecord {
  /** Record path relative to the lake root */
  fileId: string;
  metadados: RecordMetadata;
  /** Payload with current field names */
  dados: JsonValue;
  /** Schema version the payload was written under */
  originalVersion: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Reading
// ============================================================================

/**
 * Read and validate one record file.
 *
 * @param filePath - Record path
 * @param verifyIntegrity - Recompute the payload hash (default: true)
 * @throws Error naming the file when its shape is invalid
 * @throws IntegrityMismatchError when the payload hash differs
 */
export async function readStoredRecord(filePath: string, verifyIntegrity = true): Promise<StoredRecord> {
  const data = await readJson(filePath);
  const parsed = StoredRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid record file ${filePath}: ${issues}`);
  }

  const record = parsed.data;
  if (verifyIntegrity) {
    const actual = hashPayload(record.dados);
    if (actual !== record.metadados.hash_dados) {
      throw new IntegrityMismatchError(filePath, record.metadados.hash_dados, actual);
    }
  }
  return record;
}

/**
 * Every calendar day from `from` to `to`, inclusive.
 */
export function enumerateDays(from: DateParts, to: DateParts): DateParts[] {
  const days: DateParts[] = [];
  const end = datePartsToUtc(to).getTime();
  for (let time = datePartsToUtc(from).getTime(); time <= end; time += DAY_MS) {
    days.push(parseBusinessDate(new Date(time)));
  }
  return days;
}

async function listStoreDirs(dayDir: string, storeId: string | undefined): Promise<string[]> {
  if (storeId !== undefined) {
    return [path.join(dayDir, `loja=${storeId}`)];
  }
  const entries = await readDirSafe(dayDir);
  return entries
    .filter((entry) => entry.isDirectory() && entry.name.startsWith('loja='))
    .map((entry) => path.join(dayDir, entry.name))
    .sort();
}

// ============================================================================
// Query
// ============================================================================

/**
 * Find, verify and normalize the records of an endpoint.
 *
 * @param root - Lake root
 * @param adapter - Field adapter used to normalize payloads
 * @param query - Endpoint, date range and filters
 * @returns Records sorted by ingestion timestamp, then file id
 * @throws InvalidPartitionKeyError for a malformed key or `from > to`
 * @throws IntegrityMismatchError when a payload was altered after write
 * @throws UnmappableSchemaVersionError when a record cannot be normalized
 */
export async function queryRecords(
  root: string,
  adapter: FieldAdapter,
  query: RecordQuery
): Promise<QueriedRecord[]> {
  validateEndpoint(query.endpoint);
  if (query.storeId !== undefined) {
    validateStoreId(query.storeId);
  }

  const from = parseBusinessDate(query.from);
  const to = query.to === undefined ? from : parseBusinessDate(query.to);
  if (datePartsToUtc(from).getTime() > datePartsToUtc(to).getTime()) {
    throw new InvalidPartitionKeyError(
      'businessDate',
      `${formatBusinessDate(from)}..${formatBusinessDate(to)}`,
      'range start is after its end'
    );
  }

  const verify = query.verifyIntegrity ?? true;
  const rawDir = getRawDir(root);
  const results: QueriedRecord[] = [];

  for (const day of enumerateDays(from, to)) {
    const dayDir = path.join(rawDir, ...daySegments(query.endpoint, day));

    for (const storeDir of await listStoreDirs(dayDir, query.storeId)) {
      const files = (await readDirSafe(storeDir))
        .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
        .map((entry) => entry.name)
        .sort();

      for (const fileName of files) {
        const filePath = path.join(storeDir, fileName);
        const record = await readStoredRecord(filePath, verify);
        const originalVersion = record.metadados.versao_esquema;

        results.push({
          fileId: toLakeRelativeId(root, filePath),
          metadados: record.metadados,
          dados: adapter.normalize(query.endpoint, record.dados, originalVersion),
          originalVersion,
        });
      }
    }
  }

  return results.sort(
    (a, b) =>
      a.metadados.timestamp_ingestao.localeCompare(b.metadados.timestamp_ingestao) ||
      a.fileId.localeCompare(b.fileId)
  );
}
