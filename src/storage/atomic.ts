/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename (or link)
 * patterns, plus complementary read operations.
 *
 * Temp files are named `<target>.tmp.<pid>.<n>` so they never end in `.json`
 * and are invisible to readers that glob for records.
 *
 * @module storage/atomic
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

let tempCounter = 0;

/**
 * Build a unique temp path next to the target file.
 */
function tempPathFor(filePath: string): string {
  tempCounter += 1;
  return `${filePath}.tmp.${process.pid}.${Date.now()}.${tempCounter}`;
}

/**
 * Remove a file, ignoring "already gone" and logging anything else.
 *
 * Used on cleanup paths where the original error must be the one surfaced.
 */
export async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      console.warn(
        `[Storage] Could not remove temp file ${filePath}:`,
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}

/**
 * Atomically write JSON data to a file
 *
 * Uses temp file + rename pattern for atomic writes. An existing file at
 * the target path is replaced.
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd)
 *
 * @example
 * await atomicWriteJson('/lake/esquemas/registro_esquemas.json', { schemaVersion: 1, endpoints: {} });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = tempPathFor(filePath);
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeQuietly(tempPath);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Atomically create a new JSON file without ever replacing an existing one.
 *
 * The content is written to a temp file and then hard-linked to the target
 * name. `link` fails with EEXIST when the name is taken, so a record that is
 * already on disk is never touched; in that case the function resolves to
 * `false` and the caller picks another name.
 *
 * Other I/O errors are rethrown unchanged (the caller decides how to wrap
 * them). The temp file is removed on every path.
 *
 * @param filePath - Target file path (parent directory must exist)
 * @param data - Data to write (will be JSON.stringify'd)
 * @returns true if the file was created, false if the name already existed
 */
export async function atomicCreateJson(filePath: string, data: unknown): Promise<boolean> {
  const tempPath = tempPathFor(filePath);
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.writeFile(tempPath, json, { encoding: 'utf-8', flag: 'wx' });
    await fs.link(tempPath, filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await removeQuietly(tempPath);
  }
}

/**
 * Copy a file through a temp name so the destination appears complete or
 * not at all.
 *
 * @param sourcePath - File to copy
 * @param targetPath - Destination (parent directories are created)
 */
export async function atomicCopyFile(sourcePath: string, targetPath: string): Promise<void> {
  const tempPath = tempPathFor(targetPath);

  try {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.copyFile(sourcePath, tempPath);
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await removeQuietly(tempPath);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic copy failed for ${sourcePath} -> ${targetPath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * List the entries of a directory, treating a missing directory as empty.
 *
 * @param dirPath - Directory to list
 * @returns Directory entries (empty when the directory does not exist)
 */
export async function readDirSafe(dirPath: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
