/**
 * Tests for the partition path resolver
 */

import { describe, it, expect } from '@jest/globals';
import * as path from 'node:path';
import { InvalidPartitionKeyError } from './errors.js';
import {
  daySegments,
  formatBusinessDate,
  getPartitionDir,
  parseBusinessDate,
  parseNumericSegment,
  parsePartitionSegments,
  resolvePartition,
} from './partition.js';

describe('resolvePartition', () => {
  it('should build Hive-style segments with zero padding', () => {
    const { key, segments } = resolvePartition('getGuestChecks', '2024-01-05', 'loja001');

    expect(segments).toEqual(['getGuestChecks', 'ano=2024', 'mes=01', 'dia=05', 'loja=loja001']);
    expect(key).toEqual({ endpoint: 'getGuestChecks', storeId: 'loja001', year: 2024, month: 1, day: 5 });
  });

  it('should read Date inputs in UTC', () => {
    const { segments } = resolvePartition('getFiscalInvoice', new Date('2024-12-31T23:30:00Z'), '7');

    expect(segments).toEqual(['getFiscalInvoice', 'ano=2024', 'mes=12', 'dia=31', 'loja=7']);
  });

  it('should be deterministic', () => {
    const a = resolvePartition('getGuestChecks', '2024-01-15', 'loja001');
    const b = resolvePartition('getGuestChecks', '2024-01-15', 'loja001');

    expect(a).toEqual(b);
  });

  it('should map distinct keys to distinct paths', () => {
    const paths = new Set(
      [
        ['getGuestChecks', '2024-01-15', 'loja001'],
        ['getGuestChecks', '2024-01-15', 'loja002'],
        ['getGuestChecks', '2024-01-16', 'loja001'],
        ['getChargeBack', '2024-01-15', 'loja001'],
      ].map(([e, d, s]) => resolvePartition(e, d, s).segments.join('/'))
    );

    expect(paths.size).toBe(4);
  });

  it.each(['', '1abc', 'get/Checks', 'get Checks', '../x'])('should reject endpoint %j', (endpoint) => {
    expect(() => resolvePartition(endpoint, '2024-01-15', 'loja001')).toThrow(InvalidPartitionKeyError);
  });

  it.each(['', 'a/b', 'a\\b', '..', 'a..b', '.hidden', 'loja=1'])('should reject store id %j', (storeId) => {
    expect(() => resolvePartition('getGuestChecks', '2024-01-15', storeId)).toThrow(
      InvalidPartitionKeyError
    );
  });

  it('should name the offending field', () => {
    try {
      resolvePartition('getGuestChecks', '2024-13-01', 'loja001');
      throw new Error('expected a failure');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPartitionKeyError);
      expect(error).toMatchObject({ field: 'businessDate', value: '2024-13-01', code: 'INVALID_PARTITION_KEY' });
    }
  });
});

describe('parseBusinessDate', () => {
  it('should parse valid dates', () => {
    expect(parseBusinessDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it.each(['2023-02-29', '2024-04-31', '2024-00-10', '2024-1-5', '20240115', 'yesterday'])(
    'should reject %j',
    (input) => {
      expect(() => parseBusinessDate(input)).toThrow(InvalidPartitionKeyError);
    }
  );

  it('should reject invalid Date objects', () => {
    expect(() => parseBusinessDate(new Date('nope'))).toThrow('is not a valid date');
  });

  it('should round-trip through formatBusinessDate', () => {
    expect(formatBusinessDate(parseBusinessDate('0999-03-07'))).toBe('0999-03-07');
  });
});

describe('getPartitionDir', () => {
  it('should place partitions below dados_brutos', () => {
    const { key } = resolvePartition('getGuestChecks', '2024-01-15', 'loja001');

    expect(getPartitionDir('/lake', key)).toBe(
      path.join('/lake', 'dados_brutos', 'getGuestChecks', 'ano=2024', 'mes=01', 'dia=15', 'loja=loja001')
    );
  });

  it('should share the day directory with daySegments', () => {
    expect(daySegments('getGuestChecks', { year: 2024, month: 1, day: 15 })).toEqual([
      'getGuestChecks',
      'ano=2024',
      'mes=01',
      'dia=15',
    ]);
  });
});

describe('parsePartitionSegments', () => {
  it('should invert resolvePartition', () => {
    const { key, segments } = resolvePartition('getGuestChecks', '2024-01-15', 'loja.001');

    expect(parsePartitionSegments(segments)).toEqual(key);
  });

  it('should reject malformed segments', () => {
    expect(() => parsePartitionSegments(['getGuestChecks', 'ano=2024', 'mes=01', 'dia=15'])).toThrow(
      'expected 5 path segments'
    );
    expect(() =>
      parsePartitionSegments(['getGuestChecks', 'year=2024', 'mes=01', 'dia=15', 'loja=1'])
    ).toThrow('expected ano=/mes=/dia=/loja= segments');
    expect(() =>
      parsePartitionSegments(['getGuestChecks', 'ano=2024', 'mes=02', 'dia=30', 'loja=1'])
    ).toThrow(InvalidPartitionKeyError);
  });
});

describe('parseNumericSegment', () => {
  it('should read fixed-width values', () => {
    expect(parseNumericSegment('ano=2024', 'ano')).toBe(2024);
    expect(parseNumericSegment('mes=09', 'mes')).toBe(9);
  });

  it('should return null on mismatch', () => {
    expect(parseNumericSegment('mes=9', 'mes')).toBeNull();
    expect(parseNumericSegment('dia=ab', 'dia')).toBeNull();
    expect(parseNumericSegment('ano=2024', 'mes')).toBeNull();
  });
});
