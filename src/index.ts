/**
 * POS Data Lake
 *
 * Partitioned raw storage for restaurant POS API payloads with schema
 * evolution tracking.
 *
 * @module pos-lake
 */

export * from './lake/index.js';
export * from './schemas/index.js';
export { resolveDataDir, LAKE_FOLDERS } from './storage/index.js';
export { loadConfig, parseConfig, type LakeConfig } from './config/index.js';
