/**
 * Partition Path Resolver
 *
 * Maps (endpoint, business date, store id) to the Hive-style directory
 * segments used below `dados_brutos/`:
 *
 * ```
 * <endpoint>/ano=YYYY/mes=MM/dia=DD/loja=<storeId>
 * ```
 *
 * Inputs are validated, never sanitized: two distinct keys always resolve to
 * two distinct paths. Pure functions, no I/O.
 *
 * @module lake/partition
 */

import * as path from 'node:path';
import { getRawDir } from '../storage/paths.js';
import { InvalidPartitionKeyError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Calendar date parts of a business date.
 */
export interface DateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * Identity of one store's partition for one endpoint and day.
 */
export interface PartitionKey extends DateParts {
  endpoint: string;
  storeId: string;
}

/**
 * Business date input: `YYYY-MM-DD`, or a Date read in UTC.
 */
export type BusinessDateInput = string | Date;

/**
 * Resolved partition.
 */
export interface ResolvedPartition {
  key: PartitionKey;
  /** `[endpoint, ano=YYYY, mes=MM, dia=DD, loja=<id>]` */
  segments: string[];
}

// ============================================================================
// Validation
// ============================================================================

/** Endpoint names: API operation identifiers */
const ENDPOINT_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

/** Store ids: path-segment safe, no leading dot */
const STORE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validate an endpoint name.
 *
 * @throws InvalidPartitionKeyError if the name is not a safe identifier
 */
export function validateEndpoint(endpoint: string): void {
  if (!ENDPOINT_PATTERN.test(endpoint)) {
    throw new InvalidPartitionKeyError(
      'endpoint',
      endpoint,
      'must start with a letter and contain only letters, digits, "_" or "-"'
    );
  }
}

/**
 * Validate a store id.
 *
 * @throws InvalidPartitionKeyError if the id is empty or unsafe as a path segment
 */
export function validateStoreId(storeId: string): void {
  if (!STORE_ID_PATTERN.test(storeId) || storeId.includes('..')) {
    throw new InvalidPartitionKeyError(
      'storeId',
      storeId,
      'must be non-empty and contain only letters, digits, ".", "_" or "-"'
    );
  }
}

function isValidCalendarDate({ year, month, day }: DateParts): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

// ============================================================================
// Business Dates
// ============================================================================

/**
 * Parse a business date into calendar parts.
 *
 * @param input - `YYYY-MM-DD` string or Date (UTC components are used)
 * @throws InvalidPartitionKeyError for malformed or impossible dates
 * @example
 * ```typescript
 * parseBusinessDate('2024-01-15'); // { year: 2024, month: 1, day: 15 }
 * parseBusinessDate('2023-02-29'); // throws
 * ```
 */
export function parseBusinessDate(input: BusinessDateInput): DateParts {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidPartitionKeyError('businessDate', String(input), 'is not a valid date');
    }
    return {
      year: input.getUTCFullYear(),
      month: input.getUTCMonth() + 1,
      day: input.getUTCDate(),
    };
  }

  const match = DATE_PATTERN.exec(input);
  if (!match) {
    throw new InvalidPartitionKeyError('businessDate', input, 'must be in YYYY-MM-DD format');
  }

  const parts: DateParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
  if (!isValidCalendarDate(parts)) {
    throw new InvalidPartitionKeyError('businessDate', input, 'is not a valid calendar date');
  }
  return parts;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format date parts as `YYYY-MM-DD`.
 */
export function formatBusinessDate({ year, month, day }: DateParts): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Date parts as a UTC Date at midnight.
 */
export function datePartsToUtc({ year, month, day }: DateParts): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Directory segments of one endpoint's day, above the store folders.
 */
export function daySegments(endpoint: string, date: DateParts): string[] {
  return [
    endpoint,
    `ano=${pad(date.year, 4)}`,
    `mes=${pad(date.month, 2)}`,
    `dia=${pad(date.day, 2)}`,
  ];
}

/**
 * Directory segments of a partition key.
 */
export function partitionSegments(key: PartitionKey): string[] {
  return [...daySegments(key.endpoint, key), `loja=${key.storeId}`];
}

/**
 * Resolve the partition for an ingestion.
 *
 * @param endpoint - Source API endpoint
 * @param businessDate - Business date of the record
 * @param storeId - Store identifier
 * @returns Validated key and its directory segments
 * @throws InvalidPartitionKeyError on malformed input
 * @example
 * ```typescript
 * resolvePartition('getGuestChecks', '2024-01-05', 'loja001').segments;
 * // ['getGuestChecks', 'ano=2024', 'mes=01', 'dia=05', 'loja=loja001']
 * ```
 */
export function resolvePartition(
  endpoint: string,
  businessDate: BusinessDateInput,
  storeId: string
): ResolvedPartition {
  validateEndpoint(endpoint);
  validateStoreId(storeId);
  const date = parseBusinessDate(businessDate);

  const key: PartitionKey = { endpoint, storeId, ...date };
  return { key, segments: partitionSegments(key) };
}

/**
 * Absolute directory of a partition inside a lake.
 */
export function getPartitionDir(root: string, key: PartitionKey): string {
  return path.join(getRawDir(root), ...partitionSegments(key));
}

/**
 * Read the numeric value of a `name=value` segment.
 *
 * @returns The parsed integer, or null when the segment does not match
 */
export function parseNumericSegment(segment: string, name: 'ano' | 'mes' | 'dia'): number | null {
  const prefix = `${name}=`;
  if (!segment.startsWith(prefix)) {
    return null;
  }
  const raw = segment.slice(prefix.length);
  const width = name === 'ano' ? 4 : 2;
  if (raw.length !== width || !/^\d+$/.test(raw)) {
    return null;
  }
  return Number(raw);
}

/**
 * Inverse of `partitionSegments`.
 *
 * @param segments - `[endpoint, ano=YYYY, mes=MM, dia=DD, loja=<id>]`
 * @throws InvalidPartitionKeyError when the segments are not a valid partition
 */
export function parsePartitionSegments(segments: readonly string[]): PartitionKey {
  const joined = segments.join('/');
  if (segments.length !== 5) {
    throw new InvalidPartitionKeyError('partition', joined, 'expected 5 path segments');
  }

  const [endpoint, yearSeg, monthSeg, daySeg, storeSeg] = segments;
  const year = parseNumericSegment(yearSeg, 'ano');
  const month = parseNumericSegment(monthSeg, 'mes');
  const day = parseNumericSegment(daySeg, 'dia');
  if (year === null || month === null || day === null || !storeSeg.startsWith('loja=')) {
    throw new InvalidPartitionKeyError('partition', joined, 'expected ano=/mes=/dia=/loja= segments');
  }

  return resolvePartition(
    endpoint,
    formatBusinessDate({ year, month, day }),
    storeSeg.slice('loja='.length)
  ).key;
}
