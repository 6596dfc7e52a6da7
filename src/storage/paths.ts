/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the data lake folders.
 * Partition paths below `dados_brutos/` are built by `lake/partition`.
 *
 * Directory Structure:
 * ```
 * <root>/                                          # e.g. ./dados/data_lake
 * ├── dados_brutos/                                # Raw API payloads
 * │   └── <endpoint>/ano=YYYY/mes=MM/dia=DD/loja=<id>/<record>.json
 * ├── dados_processados/                           # Reserved for downstream jobs
 * ├── esquemas/
 * │   ├── registro_esquemas.json                   # Schema registry
 * │   └── alteracoes_esquema.jsonl                 # Change report audit log
 * ├── metadados/
 * │   └── <endpoint>/meta_<record>.json            # Metadata sidecars
 * └── arquivo/                                     # Archived partitions (same layout)
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Folder names below the lake root.
 */
export const LAKE_FOLDERS = {
  raw: 'dados_brutos',
  processed: 'dados_processados',
  schemas: 'esquemas',
  metadata: 'metadados',
  archive: 'arquivo',
} as const;

export type LakeFolder = keyof typeof LAKE_FOLDERS;

/** Default lake root, relative to the working directory */
export const DEFAULT_DATA_DIR = path.join('dados', 'data_lake');

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'endpoint')
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Resolves a configured data directory, expanding a leading `~`.
 *
 * @param dir - Configured directory (absolute, relative or `~`-prefixed)
 * @returns Absolute path
 */
export function resolveDataDir(dir: string): string {
  if (dir.startsWith('~')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

/**
 * Gets the absolute path of one of the lake folders.
 *
 * @param root - Lake root
 * @param folder - Folder key
 */
export function getLakeFolder(root: string, folder: LakeFolder): string {
  return path.join(root, LAKE_FOLDERS[folder]);
}

/**
 * Gets the raw payload folder (`dados_brutos/`).
 */
export function getRawDir(root: string): string {
  return getLakeFolder(root, 'raw');
}

/**
 * Gets the archive folder (`arquivo/`).
 */
export function getArchiveDir(root: string): string {
  return getLakeFolder(root, 'archive');
}

/**
 * Gets the path of the schema registry file.
 */
export function getRegistryPath(root: string): string {
  return path.join(getLakeFolder(root, 'schemas'), 'registro_esquemas.json');
}

/**
 * Gets the path of the change report audit log.
 */
export function getChangeLogPath(root: string): string {
  return path.join(getLakeFolder(root, 'schemas'), 'alteracoes_esquema.jsonl');
}

/**
 * Gets the metadata sidecar path for a stored record.
 *
 * @param root - Lake root
 * @param endpoint - Endpoint name
 * @param recordFileName - Record file name (e.g. `getGuestChecks_loja001_20240115_101500_000.json`)
 * @returns Absolute path to `metadados/<endpoint>/meta_<stem>.json`
 * @example
 * ```typescript
 * getMetadataSidecarPath('/lake', 'getGuestChecks', 'getGuestChecks_loja001_20240115_101500_000.json');
 * // '/lake/metadados/getGuestChecks/meta_getGuestChecks_loja001_20240115_101500_000.json'
 * ```
 */
export function getMetadataSidecarPath(
  root: string,
  endpoint: string,
  recordFileName: string
): string {
  validateIdSecurity(endpoint, 'endpoint');
  validateIdSecurity(recordFileName, 'recordFileName');

  const stem = recordFileName.endsWith('.json')
    ? recordFileName.slice(0, -'.json'.length)
    : recordFileName;

  return path.join(getLakeFolder(root, 'metadata'), endpoint, `meta_${stem}.json`);
}

/**
 * Converts an absolute path inside the lake into a root-relative id with
 * forward slashes, independent of the host platform.
 *
 * @param root - Lake root
 * @param filePath - Absolute path inside the lake
 */
export function toLakeRelativeId(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}
