/**
 * Configuration Module
 *
 * Loads and validates environment variables for the POS data lake.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_DATA_DIR, resolveDataDir } from '../storage/paths.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Lake root
  POSLAKE_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),

  // Retention window in days
  POSLAKE_RETENTION_DAYS: z.coerce.number().int().nonnegative().default(90),

  // Provenance defaults for ingestion
  POSLAKE_SOURCE_SYSTEM: z.string().min(1).default('sistema_pos'),
  POSLAKE_OPERATOR_ID: z.string().min(1).default('operador001'),

  // Attempts per record in batch ingestion
  POSLAKE_WRITE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

/**
 * Application configuration
 */
export interface LakeConfig {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  /** Absolute lake root */
  dataDir: string;
  retentionDays: number;
  sourceSystem: string;
  operatorId: string;
  writeAttempts: number;
}

/**
 * Build the configuration from an environment map.
 *
 * Empty strings count as unset, so `POSLAKE_DATA_DIR=` in `.env` falls back
 * to the default.
 *
 * @param env - Environment variables (e.g. `process.env`)
 * @throws Error listing every invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv): LakeConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parseResult = envSchema.safeParse(defined);
  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${details}`);
  }

  const parsed = parseResult.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isDevelopment: parsed.NODE_ENV === 'development',
    isTest: parsed.NODE_ENV === 'test',

    dataDir: resolveDataDir(parsed.POSLAKE_DATA_DIR),
    retentionDays: parsed.POSLAKE_RETENTION_DAYS,
    sourceSystem: parsed.POSLAKE_SOURCE_SYSTEM,
    operatorId: parsed.POSLAKE_OPERATOR_ID,
    writeAttempts: parsed.POSLAKE_WRITE_ATTEMPTS,
  };
}

/**
 * Load the configuration from `process.env` (after `.env` is applied).
 */
export function loadConfig(): LakeConfig {
  return parseConfig(process.env);
}
