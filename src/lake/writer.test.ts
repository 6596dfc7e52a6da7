/**
 * Tests for the payload writer
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ChangeLogEntrySchema, MetadataSidecarSchema, StoredRecordSchema } from '../schemas/index.js';
import type { JsonValue } from '../schemas/index.js';
import { ChangeDetector } from './detector.js';
import { WriteFailureError } from './errors.js';
import { hashPayload, payloadSizeBytes } from './hash.js';
import { InMemoryRegistryStore } from './registry-store.js';
import { SchemaRegistry } from './registry.js';
import { PayloadWriter, buildRecordFileName, type WriteRequest } from './writer.js';

const NOW = new Date('2024-01-15T10:15:00.042Z');
const PARTITION = 'dados_brutos/getGuestChecks/ano=2024/mes=01/dia=15/loja=loja001';

function request(payload: JsonValue, overrides: Partial<WriteRequest> = {}): WriteRequest {
  return {
    endpoint: 'getGuestChecks',
    businessDate: '2024-01-15',
    storeId: 'loja001',
    payload,
    sourceSystem: 'sistema_pos',
    operatorId: 'operador001',
    ...overrides,
  };
}

async function readRecord(filePath: string) {
  return StoredRecordSchema.parse(JSON.parse(await fs.readFile(filePath, 'utf-8')));
}

describe('buildRecordFileName', () => {
  it('should use the UTC ingestion time with milliseconds', () => {
    expect(buildRecordFileName('getGuestChecks', 'loja001', NOW)).toBe(
      'getGuestChecks_loja001_20240115_101500_042.json'
    );
  });

  it('should append the attempt number on collisions', () => {
    expect(buildRecordFileName('getGuestChecks', 'loja001', NOW, 3)).toBe(
      'getGuestChecks_loja001_20240115_101500_042_3.json'
    );
  });
});

describe('PayloadWriter', () => {
  let root: string;
  let store: InMemoryRegistryStore;
  let registry: SchemaRegistry;
  let writer: PayloadWriter;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'writer-test-'));
    store = new InMemoryRegistryStore();
    registry = await SchemaRegistry.open(store, () => NOW);
    writer = new PayloadWriter({
      root,
      registry,
      detector: new ChangeDetector(registry, () => NOW),
      now: () => NOW,
    });
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should write the envelope and the unmodified payload', async () => {
    const payload = { guestCheckId: 'X', chkTtl: 85.5, nome: 'São Paulo' };

    const result = await writer.write(request(payload, { extraMetadata: { versao_api: 'v2' } }));

    expect(result.fileId).toBe(`${PARTITION}/getGuestChecks_loja001_20240115_101500_042.json`);
    expect(result.filePath).toBe(path.join(root, ...result.fileId.split('/')));

    const record = await readRecord(result.filePath);
    expect(record.dados).toEqual(payload);
    expect(record.metadados).toEqual({
      endpoint: 'getGuestChecks',
      data_negocio: '2024-01-15',
      id_loja: 'loja001',
      timestamp_ingestao: '2024-01-15T10:15:00.042Z',
      versao_esquema: '1.0',
      hash_dados: hashPayload(payload),
      tamanho_bytes: payloadSizeBytes(payload),
      origem: 'sistema_pos',
      usuario: 'operador001',
      versao_api: 'v2',
    });
    expect(result.metadata).toEqual(record.metadados);
  });

  it('should register the first payload of an endpoint as 1.0', async () => {
    const result = await writer.write(request({ guestCheckId: 'X', taxes: [] }));

    expect(result.versionCreated).toBe('1.0');
    expect(result.change).toBeNull();
    expect([...registry.fieldSet('getGuestChecks', '1.0')]).toEqual(['guestCheckId', 'taxes']);
  });

  it('should create distinct files for writes in the same millisecond', async () => {
    const first = await writer.write(request({ guestCheckId: 'X' }));
    const second = await writer.write(request({ guestCheckId: 'X' }));
    const third = await writer.write(request({ guestCheckId: 'Y' }));

    expect(path.basename(first.filePath)).toBe('getGuestChecks_loja001_20240115_101500_042.json');
    expect(path.basename(second.filePath)).toBe('getGuestChecks_loja001_20240115_101500_042_2.json');
    expect(path.basename(third.filePath)).toBe('getGuestChecks_loja001_20240115_101500_042_3.json');

    expect((await readRecord(first.filePath)).dados).toEqual({ guestCheckId: 'X' });
    expect((await readRecord(third.filePath)).dados).toEqual({ guestCheckId: 'Y' });
    expect((await fs.readdir(path.dirname(first.filePath))).sort()).toEqual([
      'getGuestChecks_loja001_20240115_101500_042.json',
      'getGuestChecks_loja001_20240115_101500_042_2.json',
      'getGuestChecks_loja001_20240115_101500_042_3.json',
    ]);
  });

  it('should register a new version when fields change', async () => {
    await writer.write(request({ guestCheckId: 'X', taxes: [1] }));

    const result = await writer.write(request({ guestCheckId: 'X', taxation: [1] }));

    expect(result.versionCreated).toBe('1.1');
    expect(result.metadata.versao_esquema).toBe('1.1');
    expect(result.change).toEqual({
      endpoint: 'getGuestChecks',
      baseVersion: '1.0',
      fieldsAdded: ['taxation'],
      fieldsRemoved: ['taxes'],
      detectedAt: NOW.toISOString(),
    });
    expect(registry.currentVersion('getGuestChecks')).toBe('1.1');
  });

  it('should append change reports to the audit log', async () => {
    await writer.write(request({ a: 1 }));
    await writer.write(request({ a: 1, b: 2 }));
    await writer.write(request({ b: 2 }));

    const lines = (await fs.readFile(path.join(root, 'esquemas', 'alteracoes_esquema.jsonl'), 'utf-8'))
      .trim()
      .split('\n')
      .map((line) => ChangeLogEntrySchema.parse(JSON.parse(line)));

    expect(lines.map((line) => [line.baseVersion, line.newVersion, line.fieldsAdded, line.fieldsRemoved])).toEqual([
      ['1.0', '1.1', ['b'], []],
      ['1.1', '1.2', [], ['a']],
    ]);
  });

  it('should keep the version when the payload shape is unchanged', async () => {
    await writer.write(request({ a: 1 }));

    const result = await writer.write(request({ a: 2 }));

    expect(result.versionCreated).toBeNull();
    expect(result.change).toBeNull();
    expect(result.metadata.versao_esquema).toBe('1.0');
  });

  it('should write a metadata sidecar', async () => {
    const result = await writer.write(request({ a: 1 }));

    const sidecarPath = path.join(
      root,
      'metadados',
      'getGuestChecks',
      'meta_getGuestChecks_loja001_20240115_101500_042.json'
    );
    const sidecar = MetadataSidecarSchema.parse(JSON.parse(await fs.readFile(sidecarPath, 'utf-8')));
    expect(sidecar).toEqual({
      ...result.metadata,
      caminho_arquivo: result.filePath,
      nome_arquivo: 'getGuestChecks_loja001_20240115_101500_042.json',
    });
  });

  it('should still write when the schema step fails', async () => {
    await writer.write(request({ a: 1 }));
    store.save = async () => {
      throw new Error('registry offline');
    };

    const result = await writer.write(request({ b: 1 }));

    expect(result.metadata.versao_esquema).toBe('1.0');
    expect(result.versionCreated).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      '[Writer] Schema tracking failed for getGuestChecks, keeping version 1.0:',
      'registry offline'
    );
    expect((await readRecord(result.filePath)).dados).toEqual({ b: 1 });
  });

  it('should reject invalid partition keys before touching disk', async () => {
    await expect(writer.write(request({ a: 1 }, { storeId: '../x' }))).rejects.toMatchObject({
      code: 'INVALID_PARTITION_KEY',
      field: 'storeId',
    });
    await expect(writer.write(request({ a: 1 }, { businessDate: '2024-02-30' }))).rejects.toMatchObject({
      code: 'INVALID_PARTITION_KEY',
      field: 'businessDate',
    });
    expect(registry.hasEndpoint('getGuestChecks')).toBe(false);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('should reject extra metadata that overrides a core key', async () => {
    await expect(
      writer.write(request({ a: 1 }, { extraMetadata: { hash_dados: 'x' } }))
    ).rejects.toThrow('Extra metadata cannot override core key "hash_dados"');
  });

  it('should raise a retryable WriteFailureError on I/O failure', async () => {
    // A file where the raw folder should be makes every partition unreachable
    await fs.writeFile(path.join(root, 'dados_brutos'), 'not a directory');

    const failure = writer.write(request({ a: 1 }));

    await expect(failure).rejects.toBeInstanceOf(WriteFailureError);
    await expect(failure).rejects.toMatchObject({ isRetryable: true, code: 'WRITE_FAILURE' });
  });
});
