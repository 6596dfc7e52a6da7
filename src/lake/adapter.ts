/**
 * Field Adapter
 *
 * Read-time normalization: rewrites the field names of a payload stored
 * under an older schema version to the endpoint's current names, walking
 * the registry history one version at a time. Values are never changed.
 *
 * Lazy migration on read, the stored files are never rewritten.
 *
 * @module lake/adapter
 */

import type { JsonValue, SchemaVersionEntry } from '../schemas/index.js';
import { UnmappableSchemaVersionError } from './errors.js';
import { renameFieldPaths } from './fields.js';
import type { SchemaRegistry } from './registry.js';

/**
 * FieldAdapter maps payloads forward through recorded renames.
 *
 * @example
 * ```typescript
 * const adapter = new FieldAdapter(registry);
 * // 1.0 -> 1.1 renamed "taxes" to "taxation"
 * adapter.normalize('getGuestChecks', { guestCheckId: 'X', taxes: [1] }, '1.0');
 * // { guestCheckId: 'X', taxation: [1] }
 * ```
 */
export class FieldAdapter {
  constructor(private readonly registry: SchemaRegistry) {}

  /**
   * Entries to apply, oldest first, to bring `version` up to the current one.
   *
   * @throws UnmappableSchemaVersionError when no unbroken chain exists
   */
  migrationPath(endpoint: string, version: string): Readonly<SchemaVersionEntry>[] {
    const current = this.registry.currentVersion(endpoint);
    if (version === current) {
      return [];
    }

    const history = this.registry.history(endpoint);
    const byVersion = new Map(history.map((entry) => [entry.version, entry]));
    if (!byVersion.has(version)) {
      throw new UnmappableSchemaVersionError(endpoint, version, current, 'version is not in the registry history');
    }

    const steps: Readonly<SchemaVersionEntry>[] = [];
    let cursor = byVersion.get(current);

    while (cursor && cursor.version !== version) {
      if (cursor.breaking) {
        throw new UnmappableSchemaVersionError(
          endpoint,
          version,
          current,
          `version ${cursor.version} is a breaking change`
        );
      }
      steps.push(cursor);
      cursor = cursor.previousVersion === null ? undefined : byVersion.get(cursor.previousVersion);
    }

    if (!cursor) {
      throw new UnmappableSchemaVersionError(
        endpoint,
        version,
        current,
        'no chain of recorded versions leads to the current version'
      );
    }

    return steps.reverse();
  }

  /**
   * Normalize a payload to the endpoint's current field names.
   *
   * Returns the same reference when `version` is already current; otherwise
   * a renamed deep copy. The renames of one step are applied together;
   * those whose source path is absent are skipped.
   *
   * @param endpoint - Endpoint name
   * @param payload - Payload as stored
   * @param version - Schema version the payload was written under
   * @throws UnmappableSchemaVersionError if the version cannot be mapped
   */
  normalize(endpoint: string, payload: JsonValue, version: string): JsonValue {
    const steps = this.migrationPath(endpoint, version);
    if (steps.length === 0) {
      return payload;
    }

    const result = structuredClone(payload);
    for (const step of steps) {
      renameFieldPaths(result, step.renames);
    }
    return result;
  }
}
