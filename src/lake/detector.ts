/**
 * Change Detector
 *
 * Compares the field paths of an incoming payload with the registry's
 * current field set for its endpoint. Membership only: order and nesting
 * depth do not matter, and a rename shows up as one removal plus one
 * addition. No attempt is made to pair them up.
 *
 * @module lake/detector
 */

import type { ChangeReport } from '../schemas/index.js';
import { sortedFields } from './fields.js';
import type { SchemaRegistry } from './registry.js';

/**
 * ChangeDetector reports added and removed field paths.
 *
 * @example
 * ```typescript
 * const detector = new ChangeDetector(registry);
 * const report = detector.detect('getGuestChecks', flattenFieldPaths(payload));
 * if (hasChanges(report)) {
 *   await registry.registerNewVersion('getGuestChecks', flattenFieldPaths(payload));
 * }
 * ```
 */
export class ChangeDetector {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Diff a payload's field set against the endpoint's current version.
   *
   * Never mutates the registry.
   *
   * @param endpoint - Endpoint name
   * @param fields - Flattened field paths of the payload
   * @returns Report with sorted added/removed paths (both empty when unchanged)
   * @throws UnknownSchemaVersionError if the endpoint was never registered
   */
  detect(endpoint: string, fields: ReadonlySet<string>): ChangeReport {
    const baseVersion = this.registry.currentVersion(endpoint);
    const current = this.registry.fieldSet(endpoint, baseVersion);

    return {
      endpoint,
      baseVersion,
      fieldsAdded: sortedFields([...fields].filter((field) => !current.has(field))),
      fieldsRemoved: sortedFields([...current].filter((field) => !fields.has(field))),
      detectedAt: this.now().toISOString(),
    };
  }
}
