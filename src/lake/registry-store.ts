/**
 * Schema Registry Persistence
 *
 * The registry keeps its state behind a `RegistryStore` so the same
 * registry logic runs on a JSON file or in memory.
 *
 * @module lake/registry-store
 */

import * as fs from 'node:fs/promises';
import { atomicWriteJson } from '../storage/atomic.js';
import {
  RegistrySnapshotSchema,
  type RegistrySnapshot,
} from '../schemas/index.js';

/**
 * Persistence backend for the schema registry.
 */
export interface RegistryStore {
  /** Human-readable location for log and error messages */
  readonly description: string;
  /** Load the last saved snapshot, or null if nothing was saved yet */
  load(): Promise<RegistrySnapshot | null>;
  /** Replace the saved snapshot */
  save(snapshot: RegistrySnapshot): Promise<void>;
}

function cloneSnapshot(snapshot: RegistrySnapshot): RegistrySnapshot {
  return structuredClone(snapshot);
}

/**
 * Registry stored as a JSON file, written atomically.
 */
export class FileRegistryStore implements RegistryStore {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = filePath;
  }

  async load(): Promise<RegistrySnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON in schema registry: ${this.filePath}`, { cause: error });
    }

    const parsed = RegistrySnapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid schema registry ${this.filePath}: ${issues}`);
    }
    return parsed.data;
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    await atomicWriteJson(this.filePath, snapshot);
  }
}

/**
 * Registry kept in process memory. Snapshots are copied in and out so
 * callers cannot alter stored state by reference.
 */
export class InMemoryRegistryStore implements RegistryStore {
  readonly description = 'memory';

  private snapshot: RegistrySnapshot | null;

  constructor(initial?: RegistrySnapshot) {
    this.snapshot = initial ? cloneSnapshot(RegistrySnapshotSchema.parse(initial)) : null;
  }

  /** Number of completed saves */
  saveCount = 0;

  async load(): Promise<RegistrySnapshot | null> {
    return this.snapshot ? cloneSnapshot(this.snapshot) : null;
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    this.snapshot = cloneSnapshot(snapshot);
    this.saveCount++;
  }
}
