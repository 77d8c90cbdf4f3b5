import { VERSION_KEYS, type VersionKey } from '../config/schema.js';
import { ResolutionError } from './errors.js';

export const DEFAULT_VERSIONS: Readonly<Record<VersionKey, string>> = Object.freeze({
  python_version: '3.11',
  node_version: '20',
  postgres_version: '15',
  redis_version: '7',
  mongodb_version: '7',
});

const MAJOR_MINOR = /^\d+\.\d+$/;
const MAJOR_OPTIONAL_MINOR = /^\d+(\.\d+)?$/;

const FORMATS: Record<VersionKey, { pattern: RegExp; hint: string }> = {
  python_version: { pattern: MAJOR_MINOR, hint: 'x.y, e.g. 3.12' },
  node_version: { pattern: MAJOR_OPTIONAL_MINOR, hint: 'x or x.y, e.g. 20' },
  postgres_version: { pattern: MAJOR_OPTIONAL_MINOR, hint: 'x or x.y, e.g. 16' },
  redis_version: { pattern: MAJOR_OPTIONAL_MINOR, hint: 'x or x.y, e.g. 7.2' },
  mongodb_version: { pattern: MAJOR_OPTIONAL_MINOR, hint: 'x or x.y, e.g. 7' },
};

export function isVersionKey(key: string): key is VersionKey {
  return VERSION_KEYS.some((k) => k === key);
}

function assertKnownKey(key: string): asserts key is VersionKey {
  if (!isVersionKey(key)) {
    throw new Error(`Unknown version key "${key}"`);
  }
}

/**
 * Checks a version string against the format for `key`.
 * Throws ResolutionError naming the key when it does not match.
 */
export function validateVersion(key: VersionKey, value: string): string {
  const { pattern, hint } = FORMATS[key];
  if (!pattern.test(value)) {
    throw new ResolutionError(`Invalid ${key} "${value}": expected ${hint}`);
  }
  return value;
}

type Source = string | undefined | null;

function present(value: Source): value is string {
  return value !== undefined && value !== null && value.trim() !== '';
}

/**
 * Picks the version for `key`: command-line override, then project
 * configuration, then global configuration, then the built-in default.
 * Performs no I/O. Empty values count as absent.
 */
export function resolveVersion(
  key: string,
  cliOverride: Source,
  projectConfig: Source,
  globalConfig: Source,
): string {
  assertKnownKey(key);
  for (const candidate of [cliOverride, projectConfig, globalConfig]) {
    if (present(candidate)) return validateVersion(key, candidate.trim());
  }
  return DEFAULT_VERSIONS[key];
}
