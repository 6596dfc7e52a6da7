/**
 * End-to-end tests through the DataLake facade
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { DataLake } from './data-lake.js';
import { InMemoryRegistryStore } from './registry-store.js';
import type { WriteRequest } from './writer.js';

function guestCheck(payload: WriteRequest['payload'], businessDate = '2024-01-15'): WriteRequest {
  return {
    endpoint: 'getGuestChecks',
    businessDate,
    storeId: 'loja001',
    payload,
    sourceSystem: 'sistema_pos',
    operatorId: 'operador001',
  };
}

describe('DataLake', () => {
  let root: string;
  let clock: Date;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'lake-test-'));
    clock = new Date('2024-01-15T10:00:00.000Z');
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  async function open(): Promise<DataLake> {
    return DataLake.open({ root, now: () => clock });
  }

  it('should create the folder layout', async () => {
    await open();

    expect((await fs.readdir(root)).sort()).toEqual([
      'arquivo',
      'dados_brutos',
      'dados_processados',
      'esquemas',
      'metadados',
    ]);
  });

  it('should track a rename end to end and survive a restart', async () => {
    const lake = await open();
    const first = await lake.write(guestCheck({ guestCheckId: 'X', taxes: [{ taxNum: 28 }] }));
    expect(first.metadata.versao_esquema).toBe('1.0');

    // The source API renamed taxes to taxation; declare it before the next ingestion
    const version = await lake.registerSchemaVersion('getGuestChecks', ['guestCheckId', 'taxation[].taxNum'], {
      renames: { taxes: 'taxation' },
    });
    expect(version).toBe('1.1');

    clock = new Date('2024-01-15T11:00:00.000Z');
    const second = await lake.write(guestCheck({ guestCheckId: 'Y', taxation: [{ taxNum: 29 }] }));
    expect(second.metadata.versao_esquema).toBe('1.1');
    expect(second.versionCreated).toBeNull();

    const reopened = await open();
    expect(reopened.listSchemas()).toEqual([
      { endpoint: 'getGuestChecks', currentVersion: '1.1', versions: ['1.0', '1.1'] },
    ]);

    const records = await reopened.query({ endpoint: 'getGuestChecks', from: '2024-01-15' });
    expect(records.map((r) => r.dados)).toEqual([
      { guestCheckId: 'X', taxation: [{ taxNum: 28 }] },
      { guestCheckId: 'Y', taxation: [{ taxNum: 29 }] },
    ]);
    expect(reopened.normalize('getGuestChecks', { taxes: [] }, '1.0')).toEqual({ taxation: [] });
  });

  it('should register undeclared changes as one removal plus one addition', async () => {
    const lake = await open();
    await lake.write(guestCheck({ guestCheckId: 'X', taxes: 1 }));

    const result = await lake.write(guestCheck({ guestCheckId: 'X', taxation: 1 }));

    expect(result.versionCreated).toBe('1.1');
    expect(result.change?.fieldsAdded).toEqual(['taxation']);
    expect(result.change?.fieldsRemoved).toEqual(['taxes']);
    // No rename was declared, so old payloads keep their names
    expect(lake.normalize('getGuestChecks', { guestCheckId: 'X', taxes: 1 }, '1.0')).toEqual({
      guestCheckId: 'X',
      taxes: 1,
    });
  });

  it('should write batches, archive and report statistics', async () => {
    const lake = await open();
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const batch = await lake.writeBatch([
      guestCheck({ a: 1 }, '2023-10-01'),
      guestCheck({ a: 2 }, '2024-01-15'),
      guestCheck({ a: 3 }, 'not-a-date'),
    ]);

    expect(batch.written).toHaveLength(2);
    expect(batch.failed.map((f) => f.index)).toEqual([2]);

    const { archived, failed } = await lake.runRetention({ retentionDays: 90 });
    expect(archived.map((a) => a.businessDate)).toEqual(['2023-10-01']);
    expect(failed).toEqual([]);

    const stats = await lake.statistics();
    expect(stats.calculatedAt).toBe('2024-01-15T10:00:00.000Z');
    expect(stats.folders.dados_brutos.files).toBe(1);
    expect(stats.folders.arquivo.files).toBe(1);
    expect(stats.folders.metadados.files).toBe(2);
    expect(stats.endpoints.getGuestChecks.dates).toEqual(['2024-01-15']);
  });

  it('should write and track endpoints named like object members', async () => {
    const lake = await open();

    const first = await lake.write({ ...guestCheck({ a: 1 }), endpoint: 'constructor' });
    const second = await lake.write({ ...guestCheck({ a: 1, b: 2 }), endpoint: 'constructor' });

    expect(first.versionCreated).toBe('1.0');
    expect(second.metadata.versao_esquema).toBe('1.1');
    expect(lake.listSchemas()).toEqual([{ endpoint: 'constructor', currentVersion: '1.1', versions: ['1.0', '1.1'] }]);
  });

  it('should accept an injected registry store', async () => {
    const store = new InMemoryRegistryStore();
    const lake = await DataLake.open({ root, registryStore: store, now: () => clock });

    await lake.write(guestCheck({ a: 1 }));

    expect(store.saveCount).toBe(1);
    expect(await fs.readdir(path.join(root, 'esquemas'))).toEqual([]);
  });
});
