/**
 * Storage Layer
 *
 * Lake folder paths and atomic file primitives.
 * All write operations use the temp file + rename (or link) pattern.
 *
 * @module storage
 */

// Path utilities
export {
  LAKE_FOLDERS,
  DEFAULT_DATA_DIR,
  validateIdSecurity,
  resolveDataDir,
  getLakeFolder,
  getRawDir,
  getArchiveDir,
  getRegistryPath,
  getChangeLogPath,
  getMetadataSidecarPath,
  toLakeRelativeId,
  type LakeFolder,
} from './paths.js';

// Atomic operations
export {
  atomicWriteJson,
  atomicCreateJson,
  atomicCopyFile,
  readJson,
  fileExists,
  readDirSafe,
  removeQuietly,
} from './atomic.js';
