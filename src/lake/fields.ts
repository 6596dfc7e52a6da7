/**
 * Field Path Flattening
 *
 * Payload shapes are compared as sets of dotted field paths computed by a
 * pure recursive walk:
 *
 * - object keys are joined with `.` (`guestCheck.taxes`)
 * - array elements that are objects or arrays are walked under the parent
 *   path plus `[]` (`guestChecks[].taxes`)
 * - primitives, empty objects, empty arrays and arrays of primitives are
 *   leaves
 *
 * Keys that themselves contain `.` are not escaped.
 *
 * @module lake/fields
 */

import { isJsonObject, type JsonObject, type JsonValue } from '../schemas/index.js';

// ============================================================================
// Flattening
// ============================================================================

function joinKey(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

function walk(value: JsonValue, prefix: string, out: Set<string>): void {
  if (Array.isArray(value)) {
    let hasLeafElement = value.length === 0;
    for (const element of value) {
      if (typeof element === 'object' && element !== null) {
        walk(element, `${prefix}[]`, out);
      } else {
        hasLeafElement = true;
      }
    }
    if (hasLeafElement && prefix) {
      out.add(prefix);
    }
    return;
  }

  if (isJsonObject(value)) {
    const keys = Object.keys(value);
    if (keys.length === 0 && prefix) {
      out.add(prefix);
    }
    for (const key of keys) {
      walk(value[key], joinKey(prefix, key), out);
    }
    return;
  }

  if (prefix) {
    out.add(prefix);
  }
}

/**
 * Flatten a payload into its set of field paths.
 *
 * @param payload - Any JSON value
 * @returns Set of dotted paths
 * @example
 * ```typescript
 * flattenFieldPaths({ guestCheckId: 'X', guestCheck: { taxes: [{ taxNum: 1 }] } });
 * // Set { 'guestCheckId', 'guestCheck.taxes[].taxNum' }
 * ```
 */
export function flattenFieldPaths(payload: JsonValue): Set<string> {
  const out = new Set<string>();
  walk(payload, '', out);
  return out;
}

/**
 * Sorted array form of a field set.
 */
export function sortedFields(fields: Iterable<string>): string[] {
  return Array.from(new Set(fields)).sort();
}

// ============================================================================
// Path Parsing
// ============================================================================

/**
 * One step of a field path: an object key, or "every element" of an array.
 */
export type PathToken = { kind: 'key'; key: string } | { kind: 'each' };

/**
 * Split a field path into tokens.
 *
 * @example
 * ```typescript
 * parseFieldPath('guestChecks[].taxes');
 * // [{ kind: 'key', key: 'guestChecks' }, { kind: 'each' }, { kind: 'key', key: 'taxes' }]
 * ```
 */
export function parseFieldPath(fieldPath: string): PathToken[] {
  if (!fieldPath) {
    throw new Error('Field path must not be empty');
  }

  const tokens: PathToken[] = [];
  for (const part of fieldPath.split('.')) {
    let key = part;
    let eachCount = 0;
    while (key.endsWith('[]')) {
      key = key.slice(0, -2);
      eachCount += 1;
    }
    if (key) {
      tokens.push({ kind: 'key', key });
    } else if (eachCount === 0) {
      throw new Error(`Field path "${fieldPath}" contains an empty segment`);
    }
    for (let i = 0; i < eachCount; i++) {
      tokens.push({ kind: 'each' });
    }
  }
  return tokens;
}

function sameToken(a: PathToken, b: PathToken): boolean {
  if (a.kind === 'each' || b.kind === 'each') {
    return a.kind === b.kind;
  }
  return a.key === b.key;
}

// ============================================================================
// Renaming
// ============================================================================

/**
 * A rename split at the deepest point the two paths share.
 */
interface RenamePlan {
  shared: PathToken[];
  fromKeys: string[];
  toKeys: string[];
}

function toKeys(tokens: PathToken[], fieldPath: string): string[] {
  return tokens.map((token) => {
    if (token.kind === 'each') {
      throw new Error(
        `Rename of "${fieldPath}" crosses an array level the other path does not share`
      );
    }
    return token.key;
  });
}

/**
 * Split a rename into its shared prefix and the key paths that differ.
 *
 * @throws Error when the paths are equal, nest inside each other, or differ
 *   above an array level
 */
export function planRename(from: string, to: string): RenamePlan {
  const fromTokens = parseFieldPath(from);
  const toTokens = parseFieldPath(to);

  let shared = 0;
  while (
    shared < fromTokens.length &&
    shared < toTokens.length &&
    sameToken(fromTokens[shared], toTokens[shared])
  ) {
    shared++;
  }

  if (shared === fromTokens.length || shared === toTokens.length) {
    throw new Error(`Cannot rename "${from}" to "${to}": one path contains the other`);
  }

  return {
    shared: fromTokens.slice(0, shared),
    fromKeys: toKeys(fromTokens.slice(shared), from),
    toKeys: toKeys(toTokens.slice(shared), to),
  };
}

/**
 * Check that a rename can be applied to payloads.
 *
 * @throws Error describing why the rename is not expressible
 */
export function validateRename(from: string, to: string): void {
  planRename(from, to);
}

function collectContainers(value: JsonValue, tokens: PathToken[]): JsonObject[] {
  let current: JsonValue[] = [value];

  for (const token of tokens) {
    const next: JsonValue[] = [];
    for (const item of current) {
      if (token.kind === 'each') {
        if (Array.isArray(item)) {
          next.push(...item);
        }
      } else if (isJsonObject(item) && Object.hasOwn(item, token.key)) {
        next.push(item[token.key]);
      }
    }
    current = next;
  }

  return current.filter(isJsonObject);
}

function takeAt(container: JsonObject, keys: string[]): { found: boolean; value: JsonValue } {
  let parent: JsonObject = container;
  for (const key of keys.slice(0, -1)) {
    const child = Object.hasOwn(parent, key) ? parent[key] : null;
    if (!isJsonObject(child)) {
      return { found: false, value: null };
    }
    parent = child;
  }

  const last = keys[keys.length - 1];
  if (!Object.hasOwn(parent, last)) {
    return { found: false, value: null };
  }
  const value = parent[last];
  delete parent[last];
  return { found: true, value };
}

function putAt(container: JsonObject, keys: string[], value: JsonValue): void {
  let parent: JsonObject = container;
  for (const key of keys.slice(0, -1)) {
    const child = Object.hasOwn(parent, key) ? parent[key] : null;
    if (isJsonObject(child)) {
      parent = child;
    } else {
      const created: JsonObject = {};
      parent[key] = created;
      parent = created;
    }
  }
  parent[keys[keys.length - 1]] = value;
}

/**
 * Move the value at `from` to `to`, in place.
 *
 * Applies to every array element when the paths share `[]` levels. A
 * container without the source path is left untouched, so applying the same
 * rename twice has the effect of applying it once.
 *
 * @param payload - Payload to mutate
 * @param from - Source field path
 * @param to - Target field path
 * @returns Number of values moved
 */
export function renameFieldPath(payload: JsonValue, from: string, to: string): number {
  return renameFieldPaths(payload, { [from]: to });
}

/**
 * Apply several renames as one mapping, in place.
 *
 * Every source value is taken out before any target is written, so a swap
 * (`{ a: 'b', b: 'a' }`) exchanges the two values.
 *
 * @param payload - Payload to mutate
 * @param renames - Source path to target path
 * @returns Number of values moved
 */
export function renameFieldPaths(payload: JsonValue, renames: Readonly<Record<string, string>>): number {
  const moves: { container: JsonObject; keys: string[]; value: JsonValue }[] = [];

  for (const [from, to] of Object.entries(renames)) {
    const plan = planRename(from, to);
    for (const container of collectContainers(payload, plan.shared)) {
      const taken = takeAt(container, plan.fromKeys);
      if (taken.found) {
        moves.push({ container, keys: plan.toKeys, value: taken.value });
      }
    }
  }

  for (const move of moves) {
    putAt(move.container, move.keys, move.value);
  }
  return moves.length;
}
