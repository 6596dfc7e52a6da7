/**
 * Batch Ingestion
 *
 * Writes many payloads in call order. Transient write failures are retried
 * with exponential backoff; a record that keeps failing is logged and
 * reported without aborting the rest of the batch.
 *
 * @module lake/batch
 */

import { isRetryableError } from './errors.js';
import { formatBusinessDate, parseBusinessDate } from './partition.js';
import type { PayloadWriter, WriteRequest, WriteResult } from './writer.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Retry settings for a batch.
 */
export interface BatchOptions {
  /** Total attempts per record, including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on every further retry (default: 200) */
  backoffMs?: number;
  /** Injectable delay, for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * A record that could not be written.
 */
export interface FailedWrite {
  /** Position in the input list */
  index: number;
  endpoint: string;
  /** Business date as given (`YYYY-MM-DD` when it parsed) */
  businessDate: string;
  storeId: string;
  /** Attempts made before giving up */
  attempts: number;
  error: Error;
}

/**
 * Batch outcome.
 */
export interface BatchResult {
  /** Successful writes, in call order */
  written: WriteResult[];
  /** Records that failed, in call order */
  failed: FailedWrite[];
}

/**
 * Anything that writes one record; `PayloadWriter` in production.
 */
export type RecordWriter = Pick<PayloadWriter, 'write'>;

export const DEFAULT_BATCH_OPTIONS = {
  maxAttempts: 3,
  backoffMs: 200,
} as const;

// ============================================================================
// Helpers
// ============================================================================

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeDate(input: WriteRequest['businessDate']): string {
  if (typeof input === 'string') {
    return input;
  }
  try {
    return formatBusinessDate(parseBusinessDate(input));
  } catch {
    return String(input);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Batch Ingestion
// ============================================================================

/**
 * Write a list of payloads sequentially.
 *
 * Only retryable errors (`WriteFailureError`) are retried; validation
 * errors fail the record on the first attempt.
 *
 * @param writer - Record writer
 * @param requests - Payloads in the order they must be applied
 * @param options - Retry settings
 * @returns Written records and failures
 *
 * @example
 * ```typescript
 * const { written, failed } = await ingestBatch(writer, requests, { maxAttempts: 5 });
 * if (failed.length > 0) process.exitCode = 1;
 * ```
 */
export async function ingestBatch(
  writer: RecordWriter,
  requests: readonly WriteRequest[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_BATCH_OPTIONS.maxAttempts);
  const backoffMs = options.backoffMs ?? DEFAULT_BATCH_OPTIONS.backoffMs;
  const sleep = options.sleep ?? defaultSleep;

  const result: BatchResult = { written: [], failed: [] };

  for (const [index, request] of requests.entries()) {
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        result.written.push(await writer.write(request));
        break;
      } catch (error) {
        if (isRetryableError(error) && attempt < maxAttempts) {
          await sleep(backoffMs * 2 ** (attempt - 1));
          continue;
        }

        const failure: FailedWrite = {
          index,
          endpoint: request.endpoint,
          businessDate: describeDate(request.businessDate),
          storeId: request.storeId,
          attempts: attempt,
          error: toError(error),
        };
        console.error(
          `[Ingest] Failed to write record ${index} (${failure.endpoint} ${failure.businessDate} ${failure.storeId}) after ${attempt} attempt(s):`,
          failure.error.message
        );
        result.failed.push(failure);
        break;
      }
    }
  }

  return result;
}
