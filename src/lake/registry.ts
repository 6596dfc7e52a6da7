/**
 * Schema Registry
 *
 * Owns the canonical field-set history of every endpoint:
 * `(endpoint, version) -> field set`. Entries are immutable; a further
 * change always produces a new version.
 *
 * State lives in an injected `RegistryStore` and is saved before
 * `registerNewVersion` resolves. The registry assumes a single writer:
 * two processes registering versions for the same endpoint concurrently
 * can lose one of the registrations.
 *
 * @module lake/registry
 */

import {
  INITIAL_SCHEMA_VERSION,
  createEmptyRegistrySnapshot,
  nextVersion,
  type EndpointHistory,
  type RegistrySnapshot,
  type SchemaVersionEntry,
} from '../schemas/index.js';
import { UnknownSchemaVersionError } from './errors.js';
import { sortedFields, validateRename } from './fields.js';
import { validateEndpoint } from './partition.js';
import type { RegistryStore } from './registry-store.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for registering a version.
 */
export interface RegisterVersionOptions {
  /** Known renames from the current version's paths to the new ones */
  renames?: Record<string, string>;
  /** Bump the major version; older payloads become unmappable */
  breaking?: boolean;
}

/**
 * Summary of one endpoint's history.
 */
export interface EndpointSchemaSummary {
  endpoint: string;
  currentVersion: string;
  versions: string[];
}

// ============================================================================
// Schema Registry Class
// ============================================================================

/**
 * SchemaRegistry tracks versioned field sets per endpoint.
 *
 * @example
 * ```typescript
 * const registry = await SchemaRegistry.open(new FileRegistryStore(getRegistryPath(root)));
 * registry.currentVersion('getGuestChecks'); // '1.0' until something is registered
 * await registry.registerNewVersion('getGuestChecks', ['guestCheckId', 'taxes']); // '1.0'
 * await registry.registerNewVersion('getGuestChecks', ['guestCheckId', 'taxation']); // '1.1'
 * ```
 */
export class SchemaRegistry {
  private constructor(
    private readonly store: RegistryStore,
    private snapshot: RegistrySnapshot,
    private readonly now: () => Date
  ) {}

  /**
   * Load a registry from its store.
   *
   * @param store - Persistence backend
   * @param now - Clock used for `registeredAt`
   */
  static async open(store: RegistryStore, now: () => Date = () => new Date()): Promise<SchemaRegistry> {
    const snapshot = (await store.load()) ?? createEmptyRegistrySnapshot();
    return new SchemaRegistry(store, snapshot, now);
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  /**
   * Check if an endpoint has any registered version.
   */
  hasEndpoint(endpoint: string): boolean {
    return this.historyOf(endpoint) !== undefined;
  }

  /**
   * Registered endpoints, sorted alphabetically.
   */
  endpoints(): string[] {
    return Object.keys(this.snapshot.endpoints).sort();
  }

  /**
   * Most recent version of an endpoint, or the initial version if the
   * endpoint was never registered.
   */
  currentVersion(endpoint: string): string {
    const versions = this.historyOf(endpoint)?.versions;
    if (!versions || versions.length === 0) {
      return INITIAL_SCHEMA_VERSION;
    }
    return versions[versions.length - 1].version;
  }

  /**
   * Entries of an endpoint, oldest first. Empty for unseen endpoints.
   */
  history(endpoint: string): readonly Readonly<SchemaVersionEntry>[] {
    const versions = this.historyOf(endpoint)?.versions ?? [];
    return versions.map((entry) => Object.freeze(structuredClone(entry)));
  }

  /**
   * Single entry lookup.
   *
   * @throws UnknownSchemaVersionError if the version was never registered
   */
  entry(endpoint: string, version: string): Readonly<SchemaVersionEntry> {
    const found = this.historyOf(endpoint)?.versions.find((e) => e.version === version);
    if (!found) {
      throw new UnknownSchemaVersionError(endpoint, version);
    }
    return Object.freeze(structuredClone(found));
  }

  /**
   * Field set recorded for a version.
   *
   * @throws UnknownSchemaVersionError if the version was never registered
   */
  fieldSet(endpoint: string, version: string): ReadonlySet<string> {
    return new Set(this.entry(endpoint, version).fields);
  }

  /**
   * One summary per endpoint, sorted by endpoint.
   */
  summaries(): EndpointSchemaSummary[] {
    return this.endpoints().map((endpoint) => ({
      endpoint,
      currentVersion: this.currentVersion(endpoint),
      versions: this.history(endpoint).map((entry) => entry.version),
    }));
  }

  // Endpoint names such as `constructor` must not resolve to prototype members
  private historyOf(endpoint: string): EndpointHistory | undefined {
    const { endpoints } = this.snapshot;
    return Object.hasOwn(endpoints, endpoint) ? endpoints[endpoint] : undefined;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a field set as the next version of an endpoint.
   *
   * - Unseen endpoint: registered as the initial version.
   * - Same field set as the current version: no new entry, the current
   *   version is returned. With renames or `breaking`, a new entry with the
   *   same fields is appended instead; its renames describe the change that
   *   produced the current version (sources from the version before it).
   * - Otherwise: next minor version (next major when `breaking`).
   *
   * @param endpoint - Endpoint name
   * @param fields - Flattened field paths
   * @param options - Renames and breaking flag
   * @returns The version that now describes `fields`
   * @throws Error if a rename does not match the two field sets, or would
   *   overwrite a field that is not itself renamed away
   */
  async registerNewVersion(
    endpoint: string,
    fields: Iterable<string>,
    options: RegisterVersionOptions = {}
  ): Promise<string> {
    validateEndpoint(endpoint);
    const sorted = sortedFields(fields);
    const renames = options.renames ?? {};
    const history = this.historyOf(endpoint);

    if (!history) {
      if (Object.keys(renames).length > 0) {
        throw new Error(`Cannot declare renames for the first version of ${endpoint}`);
      }
      return this.append(endpoint, {
        version: INITIAL_SCHEMA_VERSION,
        previousVersion: null,
        fields: sorted,
        renames: {},
        breaking: false,
        registeredAt: this.now().toISOString(),
      });
    }

    const current = history.versions[history.versions.length - 1];
    const declared = Object.keys(renames).length > 0 || options.breaking === true;

    if (sameFields(sortedFields(current.fields), sorted)) {
      if (!declared) {
        return current.version;
      }
      if (Object.keys(renames).length > 0) {
        this.checkLateRenames(endpoint, history, current, renames);
      }
    } else {
      this.checkRenames(endpoint, new Set(current.fields), new Set(sorted), renames);
    }

    return this.append(endpoint, {
      version: nextVersion(current.version, options.breaking === true),
      previousVersion: current.version,
      fields: sorted,
      renames: { ...renames },
      breaking: options.breaking === true,
      registeredAt: this.now().toISOString(),
    });
  }

  private checkRenames(
    endpoint: string,
    previous: ReadonlySet<string>,
    next: ReadonlySet<string>,
    renames: Record<string, string>
  ): void {
    const targets = new Set<string>();
    for (const [from, to] of Object.entries(renames)) {
      if (!coversField(previous, from)) {
        throw new Error(`Rename source "${from}" is not a field of the current ${endpoint} schema`);
      }
      if (!coversField(next, to)) {
        throw new Error(`Rename target "${to}" is not a field of the new ${endpoint} schema`);
      }
      if (targets.has(to)) {
        throw new Error(`Rename target "${to}" is used more than once`);
      }
      if (coversField(previous, to) && !Object.hasOwn(renames, to)) {
        throw new Error(
          `Rename target "${to}" is already a field of the current ${endpoint} schema and is not renamed away`
        );
      }
      targets.add(to);
      validateRename(from, to);
    }
  }

  /**
   * Renames declared after the change they describe was registered as a
   * plain addition and removal. Sources come from the version before the
   * current one and must be gone from the current field set.
   */
  private checkLateRenames(
    endpoint: string,
    history: EndpointHistory,
    current: SchemaVersionEntry,
    renames: Record<string, string>
  ): void {
    const before = history.versions.find((entry) => entry.version === current.previousVersion);
    if (!before) {
      throw new Error(`Cannot declare renames for the first version of ${endpoint}`);
    }

    const currentFields = new Set(current.fields);
    for (const from of Object.keys(renames)) {
      if (coversField(currentFields, from)) {
        throw new Error(`Rename source "${from}" is still a field of the current ${endpoint} schema`);
      }
    }
    this.checkRenames(endpoint, new Set(before.fields), currentFields, renames);
  }

  private async append(endpoint: string, entry: SchemaVersionEntry): Promise<string> {
    const updated: RegistrySnapshot = structuredClone(this.snapshot);
    const history = Object.hasOwn(updated.endpoints, endpoint) ? updated.endpoints[endpoint] : undefined;
    if (history) {
      history.versions.push(entry);
    } else {
      updated.endpoints[endpoint] = { versions: [entry] };
    }

    await this.store.save(updated);
    this.snapshot = updated;
    return entry.version;
  }
}

/**
 * True when `fieldPath` is a recorded field or the parent of one
 * (`taxes` covers `taxes[].taxNum`).
 */
function coversField(fields: ReadonlySet<string>, fieldPath: string): boolean {
  if (fields.has(fieldPath)) {
    return true;
  }
  for (const field of fields) {
    if (field.startsWith(`${fieldPath}.`) || field.startsWith(`${fieldPath}[]`)) {
      return true;
    }
  }
  return false;
}

function sameFields(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((field, index) => field === b[index]);
}
