/**
 * Retention / Archival Executor
 *
 * Moves day partitions older than the retention window from `dados_brutos/`
 * to `arquivo/`, keeping the partition structure:
 *
 * ```
 * dados_brutos/<endpoint>/ano=YYYY/mes=MM/dia=DD/loja=<id>/<file>
 *   -> arquivo/<endpoint>/ano=YYYY/mes=MM/dia=DD/loja=<id>/<file>
 * ```
 *
 * Each file is copied through a temp name; a file already present in the
 * archive with the same SHA-256 is skipped, so a run interrupted half-way
 * can simply be run again. The active day directory is removed only after
 * every file in it is archived.
 *
 * @module lake/retention
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { atomicCopyFile, fileExists, readDirSafe } from '../storage/atomic.js';
import { getArchiveDir, getRawDir, toLakeRelativeId } from '../storage/paths.js';
import { IntegrityMismatchError } from './errors.js';
import { calculateFileHash } from './hash.js';
import {
  datePartsToUtc,
  formatBusinessDate,
  parseBusinessDate,
  parseNumericSegment,
  type DateParts,
} from './partition.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for one retention run.
 */
export interface RetentionRunOptions {
  /** Days of data kept in active storage */
  retentionDays: number;
  /** Report what would be archived without touching any file */
  dryRun?: boolean;
}

/**
 * One archived day partition of an endpoint.
 */
export interface ArchivedPartition {
  endpoint: string;
  /** `YYYY-MM-DD` */
  businessDate: string;
  /** Files copied to the archive in this run */
  filesArchived: number;
  /** Files already archived with a matching hash */
  filesSkipped: number;
  /** Bytes copied in this run */
  bytes: number;
  /** Archive directory of the day, relative to the lake root */
  archiveDir: string;
}

/**
 * A day partition that could not be archived. Its files stay in active
 * storage; a later run retries it.
 */
export interface FailedPartition {
  endpoint: string;
  /** `YYYY-MM-DD` */
  businessDate: string;
  error: Error;
}

/**
 * Outcome of one retention run.
 */
export interface RetentionResult {
  /** Archived days, oldest first per endpoint */
  archived: ArchivedPartition[];
  /** Days that failed; the run continues past them */
  failed: FailedPartition[];
}

interface AgedDay {
  endpoint: string;
  date: DateParts;
  /** `[ano=YYYY, mes=MM, dia=DD]` as found on disk */
  segments: [string, string, string];
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Cutoff
// ============================================================================

/**
 * First business date that is kept: the UTC date of `now - retentionDays`.
 * Partitions dated strictly before it are aged.
 *
 * @example
 * ```typescript
 * formatBusinessDate(retentionCutoff(new Date('2024-04-15T08:00:00Z'), 90)); // '2024-01-16'
 * ```
 */
export function retentionCutoff(now: Date, retentionDays: number): DateParts {
  if (!Number.isInteger(retentionDays) || retentionDays < 0) {
    throw new Error(`Retention days must be a non-negative integer, got ${retentionDays}`);
  }
  return parseBusinessDate(new Date(now.getTime() - retentionDays * DAY_MS));
}

function isBefore(a: DateParts, b: DateParts): boolean {
  return datePartsToUtc(a).getTime() < datePartsToUtc(b).getTime();
}

async function listDirs(dirPath: string): Promise<string[]> {
  const entries = await readDirSafe(dirPath);
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

async function listFilesRecursive(dirPath: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readDirSafe(dirPath)) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
  return files.sort();
}

/**
 * Remove a directory if it is empty; anything else is left alone.
 */
async function removeIfEmpty(dirPath: string): Promise<void> {
  try {
    await fs.rmdir(dirPath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== 'ENOTEMPTY' && code !== 'EEXIST' && code !== 'ENOENT') {
      throw error;
    }
  }
}

// ============================================================================
// Retention Executor Class
// ============================================================================

/**
 * RetentionExecutor archives aged day partitions.
 *
 * @example
 * ```typescript
 * const executor = new RetentionExecutor(root);
 * const { archived, failed } = await executor.run({ retentionDays: 90 });
 * // Second run: { archived: [], failed: [] }
 * ```
 */
export class RetentionExecutor {
  constructor(
    private readonly root: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Archive every day partition older than the retention window.
   *
   * @param options - Retention window and dry-run flag
   * A day whose archive already holds a different file under the same name
   * (`IntegrityMismatchError`) or that hits an I/O error is reported in
   * `failed` and stays in active storage; the remaining days still run.
   *
   * @param options - Retention window and dry-run flag
   */
  async run(options: RetentionRunOptions): Promise<RetentionResult> {
    const cutoff = retentionCutoff(this.now(), options.retentionDays);
    const aged = await this.findAgedDays(cutoff);

    const result: RetentionResult = { archived: [], failed: [] };
    for (const day of aged) {
      try {
        result.archived.push(await this.archiveDay(day, options.dryRun === true));
      } catch (error) {
        const failure: FailedPartition = {
          endpoint: day.endpoint,
          businessDate: formatBusinessDate(day.date),
          error: error instanceof Error ? error : new Error(String(error)),
        };
        console.error(
          `[Retention] Failed to archive ${failure.endpoint} ${failure.businessDate}:`,
          failure.error.message
        );
        result.failed.push(failure);
      }
    }

    if (result.archived.length > 0) {
      const verb = options.dryRun ? 'Would archive' : 'Archived';
      console.log(
        `[Retention] ${verb} ${result.archived.length} partition(s) dated before ${formatBusinessDate(cutoff)}`
      );
    }
    return result;
  }

  // ==========================================================================
  // Discovery
  // ==========================================================================

  private async findAgedDays(cutoff: DateParts): Promise<AgedDay[]> {
    const rawDir = getRawDir(this.root);
    const aged: AgedDay[] = [];

    for (const endpoint of await listDirs(rawDir)) {
      const endpointDir = path.join(rawDir, endpoint);
      for (const yearSeg of await listDirs(endpointDir)) {
        for (const monthSeg of await listDirs(path.join(endpointDir, yearSeg))) {
          for (const daySeg of await listDirs(path.join(endpointDir, yearSeg, monthSeg))) {
            const segments: [string, string, string] = [yearSeg, monthSeg, daySeg];
            const date = this.parseDay(segments);
            if (!date) {
              console.warn(
                `[Retention] Skipping unrecognized partition ${endpoint}/${segments.join('/')}`
              );
              continue;
            }
            if (isBefore(date, cutoff)) {
              aged.push({ endpoint, date, segments });
            }
          }
        }
      }
    }

    return aged;
  }

  private parseDay([yearSeg, monthSeg, daySeg]: [string, string, string]): DateParts | null {
    const year = parseNumericSegment(yearSeg, 'ano');
    const month = parseNumericSegment(monthSeg, 'mes');
    const day = parseNumericSegment(daySeg, 'dia');
    if (year === null || month === null || day === null) {
      return null;
    }
    const formatted = formatBusinessDate({ year, month, day });
    try {
      return parseBusinessDate(formatted);
    } catch {
      return null;
    }
  }

  // ==========================================================================
  // Archival
  // ==========================================================================

  private async archiveDay(day: AgedDay, dryRun: boolean): Promise<ArchivedPartition> {
    const relative = [day.endpoint, ...day.segments];
    const sourceDir = path.join(getRawDir(this.root), ...relative);
    const targetDir = path.join(getArchiveDir(this.root), ...relative);

    const result: ArchivedPartition = {
      endpoint: day.endpoint,
      businessDate: formatBusinessDate(day.date),
      filesArchived: 0,
      filesSkipped: 0,
      bytes: 0,
      archiveDir: toLakeRelativeId(this.root, targetDir),
    };

    for (const sourcePath of await listFilesRecursive(sourceDir)) {
      const targetPath = path.join(targetDir, path.relative(sourceDir, sourcePath));

      if (await fileExists(targetPath)) {
        if (!dryRun) {
          await this.verifyArchivedCopy(sourcePath, targetPath);
        }
        result.filesSkipped++;
        continue;
      }

      const { size } = await fs.stat(sourcePath);
      if (!dryRun) {
        await atomicCopyFile(sourcePath, targetPath);
      }
      result.filesArchived++;
      result.bytes += size;
    }

    if (!dryRun) {
      await fs.rm(sourceDir, { recursive: true, force: true });
      const monthDir = path.dirname(sourceDir);
      await removeIfEmpty(monthDir);
      await removeIfEmpty(path.dirname(monthDir));
    }

    return result;
  }

  private async verifyArchivedCopy(sourcePath: string, targetPath: string): Promise<void> {
    const [expected, actual] = await Promise.all([
      calculateFileHash(sourcePath),
      calculateFileHash(targetPath),
    ]);
    if (expected !== actual) {
      throw new IntegrityMismatchError(targetPath, expected, actual);
    }
  }
}
