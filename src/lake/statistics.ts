/**
 * Lake Statistics
 *
 * File counts and sizes per lake folder, plus per-endpoint totals with the
 * stores and business dates present in active storage.
 *
 * @module lake/statistics
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { readDirSafe } from '../storage/atomic.js';
import { LAKE_FOLDERS, getRawDir } from '../storage/paths.js';
import { formatBusinessDate, parseNumericSegment } from './partition.js';

// ============================================================================
// Types
// ============================================================================

export interface FolderStatistics {
  files: number;
  bytes: number;
}

export interface EndpointStatistics extends FolderStatistics {
  /** Store ids with at least one record, sorted */
  stores: string[];
  /** Business dates (`YYYY-MM-DD`) with at least one record, sorted */
  dates: string[];
}

export interface LakeStatistics {
  calculatedAt: string;
  totalFiles: number;
  totalBytes: number;
  /** Keyed by folder name on disk (e.g. `dados_brutos`) */
  folders: Record<string, FolderStatistics>;
  /** Keyed by endpoint, from `dados_brutos/` only */
  endpoints: Record<string, EndpointStatistics>;
}

interface FileInfo {
  /** Path segments relative to the folder that was walked */
  segments: string[];
  bytes: number;
}

// ============================================================================
// Walking
// ============================================================================

async function walkFiles(dirPath: string, prefix: string[] = []): Promise<FileInfo[]> {
  const files: FileInfo[] = [];
  for (const entry of await readDirSafe(dirPath)) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(entryPath, [...prefix, entry.name])));
    } else if (entry.isFile()) {
      const { size } = await fs.stat(entryPath);
      files.push({ segments: [...prefix, entry.name], bytes: size });
    }
  }
  return files;
}

function dateOf(segments: string[]): string | null {
  const year = parseNumericSegment(segments[1] ?? '', 'ano');
  const month = parseNumericSegment(segments[2] ?? '', 'mes');
  const day = parseNumericSegment(segments[3] ?? '', 'dia');
  if (year === null || month === null || day === null) {
    return null;
  }
  return formatBusinessDate({ year, month, day });
}

function storeOf(segments: string[]): string | null {
  const storeSeg = segments[4];
  return storeSeg?.startsWith('loja=') ? storeSeg.slice('loja='.length) : null;
}

function addToGroup(groups: Map<string, Set<string>>, key: string, value: string): void {
  const group = groups.get(key);
  if (group) {
    group.add(value);
  } else {
    groups.set(key, new Set([value]));
  }
}

// ============================================================================
// Statistics
// ============================================================================

/**
 * Collect lake statistics.
 *
 * @param root - Lake root
 * @param now - Clock for `calculatedAt`
 */
export async function collectLakeStatistics(
  root: string,
  now: () => Date = () => new Date()
): Promise<LakeStatistics> {
  const stats: LakeStatistics = {
    calculatedAt: now().toISOString(),
    totalFiles: 0,
    totalBytes: 0,
    folders: {},
    endpoints: {},
  };

  for (const folderName of Object.values(LAKE_FOLDERS)) {
    const files = await walkFiles(path.join(root, folderName));
    const folderStats: FolderStatistics = {
      files: files.length,
      bytes: files.reduce((sum, file) => sum + file.bytes, 0),
    };
    stats.folders[folderName] = folderStats;
    stats.totalFiles += folderStats.files;
    stats.totalBytes += folderStats.bytes;
  }

  // Keyed by a Map so endpoint names like `constructor` stay plain keys
  const totals = new Map<string, FolderStatistics>();
  const stores = new Map<string, Set<string>>();
  const dates = new Map<string, Set<string>>();

  for (const file of await walkFiles(getRawDir(root))) {
    if (file.segments.length < 2) {
      continue;
    }
    const endpoint = file.segments[0];
    const total = totals.get(endpoint) ?? { files: 0, bytes: 0 };
    total.files++;
    total.bytes += file.bytes;
    totals.set(endpoint, total);

    const store = storeOf(file.segments);
    if (store !== null) {
      addToGroup(stores, endpoint, store);
    }
    const date = dateOf(file.segments);
    if (date !== null) {
      addToGroup(dates, endpoint, date);
    }
  }

  stats.endpoints = Object.fromEntries(
    [...totals].map(([endpoint, total]): [string, EndpointStatistics] => [
      endpoint,
      {
        ...total,
        stores: [...(stores.get(endpoint) ?? [])].sort(),
        dates: [...(dates.get(endpoint) ?? [])].sort(),
      },
    ])
  );

  return stats;
}
