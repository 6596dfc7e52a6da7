/**
 * Payload Writer
 *
 * Lands one raw API response in its partition as a new, uniquely named
 * file carrying a provenance envelope. Files are never overwritten: each
 * ingestion creates a distinct file, even within the same millisecond.
 *
 * The schema step (registry bootstrap or change detection) runs before the
 * file is committed so the envelope carries the version that describes the
 * payload. It never fails the ingestion.
 *
 * @module lake/writer
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { atomicCreateJson, atomicWriteJson } from '../storage/atomic.js';
import {
  getChangeLogPath,
  getMetadataSidecarPath,
  toLakeRelativeId,
} from '../storage/paths.js';
import {
  CORE_METADATA_KEYS,
  hasChanges,
  type ChangeLogEntry,
  type ChangeReport,
  type JsonValue,
  type MetadataSidecar,
  type RecordMetadata,
  type StoredRecord,
} from '../schemas/index.js';
import type { ChangeDetector } from './detector.js';
import { WriteFailureError } from './errors.js';
import { flattenFieldPaths } from './fields.js';
import { hashPayload, payloadSizeBytes } from './hash.js';
import {
  formatBusinessDate,
  getPartitionDir,
  resolvePartition,
  type BusinessDateInput,
} from './partition.js';
import type { SchemaRegistry } from './registry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One payload to ingest.
 */
export interface WriteRequest {
  /** Source API endpoint (e.g., getGuestChecks) */
  endpoint: string;
  /** Business date assigned by the source system */
  businessDate: BusinessDateInput;
  /** Store identifier */
  storeId: string;
  /** Raw API response body, stored unmodified */
  payload: JsonValue;
  /** Originating system (`origem`) */
  sourceSystem: string;
  /** Operator running the ingestion (`usuario`) */
  operatorId: string;
  /** Extra string metadata (e.g., `versao_api`); core keys cannot be overridden */
  extraMetadata?: Record<string, string>;
}

/**
 * Outcome of a successful write.
 */
export interface WriteResult {
  /** Record path relative to the lake root, with forward slashes */
  fileId: string;
  /** Absolute record path */
  filePath: string;
  /** Envelope as written */
  metadata: RecordMetadata;
  /** Change report when the payload differed from the registry, else null */
  change: ChangeReport | null;
  /** Version registered by this write, else null */
  versionCreated: string | null;
}

/**
 * Writer dependencies.
 */
export interface PayloadWriterOptions {
  /** Lake root */
  root: string;
  registry: SchemaRegistry;
  detector: ChangeDetector;
  /** Clock for ingestion timestamps */
  now?: () => Date;
}

interface SchemaOutcome {
  version: string;
  change: ChangeReport | null;
  versionCreated: string | null;
}

/** Upper bound on same-name retries for one write */
const MAX_NAME_ATTEMPTS = 1000;

// ============================================================================
// File Naming
// ============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Record file name for an ingestion instant (UTC).
 *
 * Format: `{endpoint}_{storeId}_{YYYYMMDD}_{HHMMSS}_{mmm}[_{n}].json`
 *
 * @param endpoint - Endpoint name
 * @param storeId - Store id
 * @param timestamp - Ingestion instant
 * @param attempt - 1 for the plain name, n > 1 appends `_n`
 * @example
 * ```typescript
 * buildRecordFileName('getGuestChecks', 'loja001', new Date('2024-01-15T10:15:00.042Z'));
 * // 'getGuestChecks_loja001_20240115_101500_042.json'
 * ```
 */
export function buildRecordFileName(
  endpoint: string,
  storeId: string,
  timestamp: Date,
  attempt = 1
): string {
  const date = `${timestamp.getUTCFullYear()}${pad(timestamp.getUTCMonth() + 1)}${pad(timestamp.getUTCDate())}`;
  const time = `${pad(timestamp.getUTCHours())}${pad(timestamp.getUTCMinutes())}${pad(timestamp.getUTCSeconds())}`;
  const millis = pad(timestamp.getUTCMilliseconds(), 3);
  const suffix = attempt > 1 ? `_${attempt}` : '';
  return `${endpoint}_${storeId}_${date}_${time}_${millis}${suffix}.json`;
}

function buildExtraMetadata(extra: Record<string, string> | undefined): Record<string, string> {
  if (!extra) {
    return {};
  }
  const reserved = new Set<string>(CORE_METADATA_KEYS);
  const clash = Object.keys(extra).find((key) => reserved.has(key));
  if (clash) {
    throw new Error(`Extra metadata cannot override core key "${clash}"`);
  }
  return { ...extra };
}

// ============================================================================
// Payload Writer Class
// ============================================================================

/**
 * PayloadWriter creates one record file per call.
 *
 * @example
 * ```typescript
 * const writer = new PayloadWriter({ root, registry, detector });
 * const result = await writer.write({
 *   endpoint: 'getGuestChecks',
 *   businessDate: '2024-01-15',
 *   storeId: 'loja001',
 *   payload: { guestCheckId: 'X', chkTtl: 85.5 },
 *   sourceSystem: 'sistema_pos',
 *   operatorId: 'operador001',
 * });
 * result.fileId;
 * // 'dados_brutos/getGuestChecks/ano=2024/mes=01/dia=15/loja=loja001/getGuestChecks_loja001_..._.json'
 * ```
 */
export class PayloadWriter {
  private readonly root: string;
  private readonly registry: SchemaRegistry;
  private readonly detector: ChangeDetector;
  private readonly now: () => Date;

  constructor(options: PayloadWriterOptions) {
    this.root = options.root;
    this.registry = options.registry;
    this.detector = options.detector;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write a payload to its partition.
   *
   * @param request - Payload and provenance
   * @returns Location, envelope and schema outcome of the new record
   * @throws InvalidPartitionKeyError for malformed endpoint/date/store
   * @throws WriteFailureError on I/O failure (no record file is left behind)
   */
  async write(request: WriteRequest): Promise<WriteResult> {
    const { key } = resolvePartition(request.endpoint, request.businessDate, request.storeId);
    const extra = buildExtraMetadata(request.extraMetadata);

    const schema = await this.resolveSchemaVersion(request.endpoint, request.payload);

    const timestamp = this.now();
    const metadata: RecordMetadata = {
      ...extra,
      endpoint: key.endpoint,
      data_negocio: formatBusinessDate(key),
      id_loja: key.storeId,
      timestamp_ingestao: timestamp.toISOString(),
      versao_esquema: schema.version,
      hash_dados: hashPayload(request.payload),
      tamanho_bytes: payloadSizeBytes(request.payload),
      origem: request.sourceSystem,
      usuario: request.operatorId,
    };
    const record: StoredRecord = { metadados: metadata, dados: request.payload };

    const partitionDir = getPartitionDir(this.root, key);
    const filePath = await this.createRecordFile(partitionDir, key.endpoint, key.storeId, timestamp, record);

    await this.writeSidecar(key.endpoint, filePath, metadata);

    return {
      fileId: toLakeRelativeId(this.root, filePath),
      filePath,
      metadata,
      change: schema.change,
      versionCreated: schema.versionCreated,
    };
  }

  // ==========================================================================
  // Schema Step
  // ==========================================================================

  private async resolveSchemaVersion(endpoint: string, payload: JsonValue): Promise<SchemaOutcome> {
    const fields = flattenFieldPaths(payload);

    try {
      if (!this.registry.hasEndpoint(endpoint)) {
        const version = await this.registry.registerNewVersion(endpoint, fields);
        return { version, change: null, versionCreated: version };
      }

      const report = this.detector.detect(endpoint, fields);
      if (!hasChanges(report)) {
        return { version: report.baseVersion, change: null, versionCreated: null };
      }

      const version = await this.registry.registerNewVersion(endpoint, fields);
      console.warn(
        `[Writer] Schema change on ${endpoint}: ${report.baseVersion} -> ${version} ` +
          `(+${report.fieldsAdded.length} / -${report.fieldsRemoved.length} fields)`
      );
      await this.appendChangeLog({ ...report, newVersion: version });
      return { version, change: report, versionCreated: version };
    } catch (error) {
      console.warn(
        `[Writer] Schema tracking failed for ${endpoint}, keeping version ${this.registry.currentVersion(endpoint)}:`,
        error instanceof Error ? error.message : String(error)
      );
      return { version: this.registry.currentVersion(endpoint), change: null, versionCreated: null };
    }
  }

  private async appendChangeLog(entry: ChangeLogEntry): Promise<void> {
    const logPath = getChangeLogPath(this.root);
    await fs.mkdir(path.dirname(logPath), { recursive: true });
    await fs.appendFile(logPath, `${JSON.stringify(entry)}\n`, 'utf-8');
  }

  // ==========================================================================
  // File Creation
  // ==========================================================================

  private async createRecordFile(
    partitionDir: string,
    endpoint: string,
    storeId: string,
    timestamp: Date,
    record: StoredRecord
  ): Promise<string> {
    try {
      await fs.mkdir(partitionDir, { recursive: true });
    } catch (error) {
      throw new WriteFailureError(`Cannot create partition ${partitionDir}`, partitionDir, error);
    }

    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const filePath = path.join(partitionDir, buildRecordFileName(endpoint, storeId, timestamp, attempt));

      let created: boolean;
      try {
        created = await atomicCreateJson(filePath, record);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new WriteFailureError(`Failed to write ${filePath}: ${message}`, filePath, error);
      }
      if (created) {
        return filePath;
      }
    }

    throw new WriteFailureError(
      `No free file name in ${partitionDir} after ${MAX_NAME_ATTEMPTS} attempts`,
      partitionDir,
      null
    );
  }

  private async writeSidecar(endpoint: string, filePath: string, metadata: RecordMetadata): Promise<void> {
    const fileName = path.basename(filePath);
    const sidecar: MetadataSidecar = {
      ...metadata,
      caminho_arquivo: filePath,
      nome_arquivo: fileName,
    };

    try {
      await atomicWriteJson(getMetadataSidecarPath(this.root, endpoint, fileName), sidecar);
    } catch (error) {
      console.warn(
        `[Writer] Metadata sidecar not written for ${fileName}:`,
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
