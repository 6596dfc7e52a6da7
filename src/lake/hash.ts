/**
 * Payload Hashing
 *
 * `hash_dados` is the SHA-256 of the payload's canonical JSON: object keys
 * sorted recursively, no whitespace. Two payloads that differ only in key
 * order hash the same.
 *
 * @module lake/hash
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { isJsonObject, type JsonValue } from '../schemas/index.js';

function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isJsonObject(value)) {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize a payload with recursively sorted keys.
 *
 * @example
 * ```typescript
 * canonicalJson({ b: 1, a: { d: 2, c: 3 } }); // '{"a":{"c":3,"d":2},"b":1}'
 * ```
 */
export function canonicalJson(payload: JsonValue): string {
  return JSON.stringify(canonicalize(payload));
}

/**
 * SHA-256 of the canonical payload JSON.
 *
 * @returns 64-character lowercase hex digest
 */
export function hashPayload(payload: JsonValue): string {
  return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

/**
 * UTF-8 byte length of the payload's JSON serialization.
 */
export function payloadSizeBytes(payload: JsonValue): number {
  return Buffer.byteLength(JSON.stringify(payload), 'utf-8');
}

/**
 * Calculate SHA-256 hash of a file's contents.
 *
 * @param filePath - Absolute path to the file
 * @returns 64-character lowercase hex SHA-256 hash
 * @throws If file doesn't exist or can't be read
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return createHash('sha256').update(content).digest('hex');
}
