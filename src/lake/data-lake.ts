/**
 * Data Lake
 *
 * Wires the lake components together over one root directory.
 *
 * @module lake/data-lake
 */

import * as fs from 'node:fs/promises';
import { getLakeFolder, getRegistryPath, type LakeFolder } from '../storage/paths.js';
import type { JsonValue } from '../schemas/index.js';
import { FieldAdapter } from './adapter.js';
import { ingestBatch, type BatchOptions, type BatchResult } from './batch.js';
import { ChangeDetector } from './detector.js';
import { queryRecords, type QueriedRecord, type RecordQuery } from './query.js';
import { FileRegistryStore, type RegistryStore } from './registry-store.js';
import {
  SchemaRegistry,
  type EndpointSchemaSummary,
  type RegisterVersionOptions,
} from './registry.js';
import { RetentionExecutor, type RetentionResult, type RetentionRunOptions } from './retention.js';
import { collectLakeStatistics, type LakeStatistics } from './statistics.js';
import { PayloadWriter, type WriteRequest, type WriteResult } from './writer.js';

/**
 * Options for opening a lake.
 */
export interface DataLakeOptions {
  /** Lake root directory (created if missing) */
  root: string;
  /** Registry persistence (default: `esquemas/registro_esquemas.json`) */
  registryStore?: RegistryStore;
  /** Clock shared by every component */
  now?: () => Date;
}

const FOLDER_KEYS: readonly LakeFolder[] = ['raw', 'processed', 'schemas', 'metadata', 'archive'];

/**
 * DataLake is the entry point for ingestion, queries and maintenance.
 *
 * @example
 * ```typescript
 * const lake = await DataLake.open({ root: './dados/data_lake' });
 * await lake.write({ endpoint: 'getGuestChecks', businessDate: '2024-01-15', storeId: 'loja001',
 *   payload, sourceSystem: 'sistema_pos', operatorId: 'operador001' });
 * const records = await lake.query({ endpoint: 'getGuestChecks', from: '2024-01-15' });
 * ```
 */
export class DataLake {
  readonly registry: SchemaRegistry;
  readonly detector: ChangeDetector;
  readonly adapter: FieldAdapter;

  private readonly writer: PayloadWriter;
  private readonly retention: RetentionExecutor;

  private constructor(
    readonly root: string,
    registry: SchemaRegistry,
    private readonly now: () => Date
  ) {
    this.registry = registry;
    this.detector = new ChangeDetector(registry, now);
    this.adapter = new FieldAdapter(registry);
    this.writer = new PayloadWriter({ root, registry, detector: this.detector, now });
    this.retention = new RetentionExecutor(root, now);
  }

  /**
   * Create the folder layout and load the schema registry.
   */
  static async open(options: DataLakeOptions): Promise<DataLake> {
    const now = options.now ?? (() => new Date());

    for (const folder of FOLDER_KEYS) {
      await fs.mkdir(getLakeFolder(options.root, folder), { recursive: true });
    }

    const store = options.registryStore ?? new FileRegistryStore(getRegistryPath(options.root));
    const registry = await SchemaRegistry.open(store, now);
    return new DataLake(options.root, registry, now);
  }

  /**
   * Store one payload.
   */
  write(request: WriteRequest): Promise<WriteResult> {
    return this.writer.write(request);
  }

  /**
   * Store payloads in order, retrying transient failures.
   */
  writeBatch(requests: readonly WriteRequest[], options?: BatchOptions): Promise<BatchResult> {
    return ingestBatch(this.writer, requests, options);
  }

  /**
   * Read normalized records back.
   */
  query(query: RecordQuery): Promise<QueriedRecord[]> {
    return queryRecords(this.root, this.adapter, query);
  }

  /**
   * Normalize a single payload to the endpoint's current field names.
   */
  normalize(endpoint: string, payload: JsonValue, version: string): JsonValue {
    return this.adapter.normalize(endpoint, payload, version);
  }

  /**
   * Archive partitions older than the retention window.
   */
  runRetention(options: RetentionRunOptions): Promise<RetentionResult> {
    return this.retention.run(options);
  }

  /**
   * File counts and sizes.
   */
  statistics(): Promise<LakeStatistics> {
    return collectLakeStatistics(this.root, this.now);
  }

  /**
   * Registered endpoints and their versions.
   */
  listSchemas(): EndpointSchemaSummary[] {
    return this.registry.summaries();
  }

  /**
   * Register a field set by hand, e.g. to declare renames.
   */
  registerSchemaVersion(
    endpoint: string,
    fields: Iterable<string>,
    options?: RegisterVersionOptions
  ): Promise<string> {
    return this.registry.registerNewVersion(endpoint, fields, options);
  }
}
