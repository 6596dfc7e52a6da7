/**
 * Unit Tests for All Zod Schemas
 *
 * Tests each schema with valid and invalid data to ensure proper validation.
 */

import { describe, it, expect } from '@jest/globals';

import {
  // Common
  JsonValueSchema,
  isJsonObject,
  BusinessDateSchema,
  ISO8601TimestampSchema,
  SchemaVersionSchema,
  // Versions
  INITIAL_SCHEMA_VERSION,
  parseVersion,
  formatVersion,
  compareVersions,
  nextVersion,
  // Records
  RecordMetadataSchema,
  StoredRecordSchema,
  MetadataSidecarSchema,
  // Registry
  SchemaVersionEntrySchema,
  EndpointHistorySchema,
  RegistrySnapshotSchema,
  createEmptyRegistrySnapshot,
  // Change reports
  ChangeReportSchema,
  ChangeLogEntrySchema,
  hasChanges,
} from './index.js';

const HASH = 'a'.repeat(64);
const NOW = '2024-01-15T10:15:00.000Z';

function validMetadata(): Record<string, unknown> {
  return {
    endpoint: 'getGuestChecks',
    data_negocio: '2024-01-15',
    id_loja: 'loja001',
    timestamp_ingestao: NOW,
    versao_esquema: '1.0',
    hash_dados: HASH,
    tamanho_bytes: 42,
    origem: 'sistema_pos',
    usuario: 'operador001',
  };
}

function entry(version: string, previousVersion: string | null, fields: string[] = ['a']) {
  return { version, previousVersion, fields, renames: {}, breaking: false, registeredAt: NOW };
}

// ============================================
// Common Schemas
// ============================================

describe('Common Schemas', () => {
  describe('JsonValueSchema', () => {
    it('should accept nested JSON values', () => {
      const value = { a: [1, 'two', null, true, { b: [] }] };
      expect(JsonValueSchema.parse(value)).toEqual(value);
    });

    it('should reject non-JSON values', () => {
      expect(JsonValueSchema.safeParse(undefined).success).toBe(false);
      expect(JsonValueSchema.safeParse({ f: () => 1 }).success).toBe(false);
    });
  });

  describe('isJsonObject', () => {
    it('should accept plain objects only', () => {
      expect(isJsonObject({})).toBe(true);
      expect(isJsonObject([])).toBe(false);
      expect(isJsonObject(null)).toBe(false);
      expect(isJsonObject('x')).toBe(false);
      expect(isJsonObject(undefined)).toBe(false);
    });
  });

  describe('BusinessDateSchema', () => {
    it('should accept YYYY-MM-DD', () => {
      expect(BusinessDateSchema.safeParse('2024-01-15').success).toBe(true);
    });

    it('should reject other formats', () => {
      expect(BusinessDateSchema.safeParse('15/01/2024').success).toBe(false);
      expect(BusinessDateSchema.safeParse('2024-1-5').success).toBe(false);
    });
  });

  describe('ISO8601TimestampSchema', () => {
    it('should accept UTC timestamps', () => {
      expect(ISO8601TimestampSchema.safeParse(NOW).success).toBe(true);
    });

    it('should reject dates without time', () => {
      expect(ISO8601TimestampSchema.safeParse('2024-01-15').success).toBe(false);
    });
  });

  describe('SchemaVersionSchema', () => {
    it('should accept MAJOR.MINOR', () => {
      expect(SchemaVersionSchema.safeParse('1.0').success).toBe(true);
      expect(SchemaVersionSchema.safeParse('12.34').success).toBe(true);
    });

    it('should reject other shapes', () => {
      expect(SchemaVersionSchema.safeParse('1').success).toBe(false);
      expect(SchemaVersionSchema.safeParse('v1.0').success).toBe(false);
      expect(SchemaVersionSchema.safeParse('1.0.0').success).toBe(false);
    });
  });
});

// ============================================
// Version Helpers
// ============================================

describe('Version Helpers', () => {
  it('should start at 1.0', () => {
    expect(INITIAL_SCHEMA_VERSION).toBe('1.0');
  });

  it('should parse and format versions', () => {
    expect(parseVersion('2.7')).toEqual({ major: 2, minor: 7 });
    expect(formatVersion({ major: 3, minor: 0 })).toBe('3.0');
    expect(() => parseVersion('abc')).toThrow('Invalid schema version "abc"');
  });

  it('should compare numerically', () => {
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0);
    expect(compareVersions('1.2', '2.0')).toBeLessThan(0);
    expect(compareVersions('1.1', '1.1')).toBe(0);
  });

  it('should bump minor, or major on breaking changes', () => {
    expect(nextVersion('1.0')).toBe('1.1');
    expect(nextVersion('1.9')).toBe('1.10');
    expect(nextVersion('1.9', true)).toBe('2.0');
  });
});

// ============================================
// Stored Record Schemas
// ============================================

describe('Stored Record Schemas', () => {
  describe('RecordMetadataSchema', () => {
    it('should validate a complete envelope', () => {
      expect(RecordMetadataSchema.safeParse(validMetadata()).success).toBe(true);
    });

    it('should keep extra metadata keys', () => {
      const parsed = RecordMetadataSchema.parse({ ...validMetadata(), versao_api: 'v2' });
      expect(parsed.versao_api).toBe('v2');
    });

    it('should reject a missing core key', () => {
      const metadata = validMetadata();
      delete metadata.hash_dados;
      expect(RecordMetadataSchema.safeParse(metadata).success).toBe(false);
    });

    it('should reject a malformed hash', () => {
      const result = RecordMetadataSchema.safeParse({ ...validMetadata(), hash_dados: 'abc' });
      expect(result.success).toBe(false);
    });

    it('should reject a negative size', () => {
      const result = RecordMetadataSchema.safeParse({ ...validMetadata(), tamanho_bytes: -1 });
      expect(result.success).toBe(false);
    });
  });

  describe('StoredRecordSchema', () => {
    it('should accept any JSON payload', () => {
      const result = StoredRecordSchema.safeParse({ metadados: validMetadata(), dados: [1, 2] });
      expect(result.success).toBe(true);
    });

    it('should require dados', () => {
      const result = StoredRecordSchema.safeParse({ metadados: validMetadata() });
      expect(result.success).toBe(false);
    });
  });

  describe('MetadataSidecarSchema', () => {
    it('should require the file location', () => {
      expect(MetadataSidecarSchema.safeParse(validMetadata()).success).toBe(false);
      expect(
        MetadataSidecarSchema.safeParse({
          ...validMetadata(),
          caminho_arquivo: '/lake/x.json',
          nome_arquivo: 'x.json',
        }).success
      ).toBe(true);
    });
  });
});

// ============================================
// Registry Schemas
// ============================================

describe('Registry Schemas', () => {
  describe('SchemaVersionEntrySchema', () => {
    it('should default renames and breaking', () => {
      const parsed = SchemaVersionEntrySchema.parse({
        version: '1.0',
        previousVersion: null,
        fields: ['a'],
        registeredAt: NOW,
      });
      expect(parsed.renames).toEqual({});
      expect(parsed.breaking).toBe(false);
    });
  });

  describe('EndpointHistorySchema', () => {
    it('should accept a linked history', () => {
      const history = { versions: [entry('1.0', null), entry('1.1', '1.0'), entry('2.0', '1.1')] };
      expect(EndpointHistorySchema.safeParse(history).success).toBe(true);
    });

    it('should reject an empty history', () => {
      expect(EndpointHistorySchema.safeParse({ versions: [] }).success).toBe(false);
    });

    it('should reject a first entry with a previous version', () => {
      const result = EndpointHistorySchema.safeParse({ versions: [entry('1.0', '0.9')] });
      expect(result.success).toBe(false);
    });

    it('should reject versions that do not increase', () => {
      const result = EndpointHistorySchema.safeParse({
        versions: [entry('1.1', null), entry('1.0', '1.1')],
      });
      expect(result.success).toBe(false);
    });

    it('should reject a broken previousVersion link', () => {
      const result = EndpointHistorySchema.safeParse({
        versions: [entry('1.0', null), entry('1.1', '0.5')],
      });
      expect(result.success).toBe(false);
    });

    it('should report malformed versions without throwing', () => {
      const result = EndpointHistorySchema.safeParse({
        versions: [entry('1.0', null), entry('bad', '1.0')],
      });
      expect(result.success).toBe(false);
    });
  });

  describe('RegistrySnapshotSchema', () => {
    it('should accept an empty registry', () => {
      expect(RegistrySnapshotSchema.parse(createEmptyRegistrySnapshot())).toEqual({
        schemaVersion: 1,
        endpoints: {},
      });
    });

    it('should reject an unknown file layout version', () => {
      expect(RegistrySnapshotSchema.safeParse({ schemaVersion: 2, endpoints: {} }).success).toBe(
        false
      );
    });
  });
});

// ============================================
// Change Report Schemas
// ============================================

describe('Change Report Schemas', () => {
  const report = {
    endpoint: 'getGuestChecks',
    baseVersion: '1.0',
    fieldsAdded: ['taxation'],
    fieldsRemoved: ['taxes'],
    detectedAt: NOW,
  };

  it('should validate a report', () => {
    expect(ChangeReportSchema.safeParse(report).success).toBe(true);
  });

  it('should require newVersion in log entries', () => {
    expect(ChangeLogEntrySchema.safeParse(report).success).toBe(false);
    expect(ChangeLogEntrySchema.safeParse({ ...report, newVersion: '1.1' }).success).toBe(true);
  });

  it('should detect changes', () => {
    expect(hasChanges(report)).toBe(true);
    expect(hasChanges({ ...report, fieldsAdded: [], fieldsRemoved: [] })).toBe(false);
  });
});
