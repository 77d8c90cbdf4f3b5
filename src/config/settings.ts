import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { VERSION_KEYS, type VersionKey } from './schema.js';

/** Global user settings. Only version defaults are recognized. */
export type Settings = Readonly<Partial<Record<VersionKey, string>>>;

// Whole numbers read back unchanged; `3.10` would come back as `3.1`.
const ScalarSchema = z.union([z.string(), z.number().int()]).transform(String);

const SettingsFileSchema = z.record(z.string(), z.unknown()).nullable();

export function isSettingKey(key: string): key is VersionKey {
  return VERSION_KEYS.some((k) => k === key);
}

function readRaw(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed = SettingsFileSchema.safeParse(yaml.load(raw) ?? null);
  if (!parsed.success) {
    throw new Error(`Invalid settings file ${path}: expected a mapping`);
  }
  return parsed.data ?? {};
}

/**
 * Reads settings from `path`. A missing file yields no settings; unknown keys
 * are ignored. Unquoted decimal versions are rejected.
 */
export function loadSettings(path: string): Settings {
  const data = readRaw(path);
  const settings: Partial<Record<VersionKey, string>> = {};
  for (const key of VERSION_KEYS) {
    const raw = data[key];
    if (typeof raw === 'number' && !Number.isInteger(raw)) {
      throw new Error(`Invalid settings file ${path}: ${key} is a number; quote it so the version is kept as written`);
    }
    const value = ScalarSchema.safeParse(raw);
    if (value.success && value.data !== '') settings[key] = value.data;
  }
  return Object.freeze(settings);
}

export function saveSetting(path: string, key: VersionKey, value: string): Settings {
  const data = readRaw(path);
  data[key] = value;
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, yaml.dump(data, { lineWidth: -1 }), 'utf-8');
  return loadSettings(path);
}
