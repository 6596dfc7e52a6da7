/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, parseConfig } from './index.js';

describe('parseConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.dataDir).toBe(path.resolve('dados', 'data_lake'));
    expect(config.retentionDays).toBe(90);
    expect(config.sourceSystem).toBe('sistema_pos');
    expect(config.operatorId).toBe('operador001');
    expect(config.writeAttempts).toBe(3);
    expect(config.nodeEnv).toBe('development');
    expect(config.isDevelopment).toBe(true);
  });

  it('should use custom data directory when specified', () => {
    const config = parseConfig({ POSLAKE_DATA_DIR: '/custom/path' });
    expect(config.dataDir).toBe('/custom/path');
  });

  it('should expand ~ in the data directory', () => {
    const config = parseConfig({ POSLAKE_DATA_DIR: '~/lake' });
    expect(config.dataDir).toBe(path.join(os.homedir(), 'lake'));
  });

  it('should treat empty values as unset', () => {
    const config = parseConfig({ POSLAKE_DATA_DIR: '', POSLAKE_RETENTION_DAYS: '' });
    expect(config.dataDir).toBe(path.resolve('dados', 'data_lake'));
    expect(config.retentionDays).toBe(90);
  });

  it('should coerce numeric variables', () => {
    const config = parseConfig({ POSLAKE_RETENTION_DAYS: '30', POSLAKE_WRITE_ATTEMPTS: '5' });
    expect(config.retentionDays).toBe(30);
    expect(config.writeAttempts).toBe(5);
  });

  it('should have environment flags', () => {
    const config = parseConfig({ NODE_ENV: 'test' });
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.isDevelopment).toBe(false);
  });

  it('should reject invalid values and name the variable', () => {
    expect(() => parseConfig({ POSLAKE_RETENTION_DAYS: 'ninety' })).toThrow(
      /POSLAKE_RETENTION_DAYS/
    );
    expect(() => parseConfig({ POSLAKE_RETENTION_DAYS: '-1' })).toThrow(/POSLAKE_RETENTION_DAYS/);
    expect(() => parseConfig({ POSLAKE_WRITE_ATTEMPTS: '0' })).toThrow(/POSLAKE_WRITE_ATTEMPTS/);
    expect(() => parseConfig({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV/);
  });
});

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: 'test' };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should read process.env', () => {
    process.env.POSLAKE_OPERATOR_ID = 'operador042';
    const config = loadConfig();
    expect(config.operatorId).toBe('operador042');
    expect(config.isTest).toBe(true);
  });
});
