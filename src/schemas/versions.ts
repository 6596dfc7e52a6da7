/**
 * Schema Version Helpers
 *
 * Payload schema versions are "MAJOR.MINOR" strings. A detected field change
 * bumps the minor number; a change declared as breaking bumps the major
 * number and resets the minor one.
 *
 * The files this project persists itself (the registry file) carry an
 * independent integer `schemaVersion`, listed in `FILE_SCHEMA_VERSIONS`.
 */

/**
 * Version assigned to the first recorded field set of an endpoint, and
 * reported for endpoints the registry has never seen.
 */
export const INITIAL_SCHEMA_VERSION = '1.0';

/**
 * Current versions of the files this project writes for its own bookkeeping.
 * Increment when making breaking changes to a file layout.
 */
export const FILE_SCHEMA_VERSIONS = {
  /** Schema registry file */
  registry: 1,
} as const;

/**
 * Parsed MAJOR.MINOR version.
 */
export interface VersionParts {
  major: number;
  minor: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

/**
 * Parse a "MAJOR.MINOR" string.
 *
 * @throws Error if the string is not in MAJOR.MINOR form
 */
export function parseVersion(version: string): VersionParts {
  const match = VERSION_PATTERN.exec(version);
  if (!match) {
    throw new Error(`Invalid schema version "${version}". Expected MAJOR.MINOR (e.g., 1.0)`);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

/**
 * Format version parts as "MAJOR.MINOR".
 */
export function formatVersion(parts: VersionParts): string {
  return `${parts.major}.${parts.minor}`;
}

/**
 * Numeric comparison of two versions ("1.10" sorts after "1.9").
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  return left.major !== right.major ? left.major - right.major : left.minor - right.minor;
}

/**
 * Next version after `version`.
 *
 * @param version - Current version
 * @param breaking - Bump the major number instead of the minor one
 * @example
 * ```typescript
 * nextVersion('1.9');        // '1.10'
 * nextVersion('1.9', true);  // '2.0'
 * ```
 */
export function nextVersion(version: string, breaking = false): string {
  const { major, minor } = parseVersion(version);
  return breaking ? formatVersion({ major: major + 1, minor: 0 }) : formatVersion({ major, minor: minor + 1 });
}
