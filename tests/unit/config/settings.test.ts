import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isSettingKey, loadSettings, saveSetting } from '../../../src/config/settings.js';

describe('settings', () => {
  let homeDir: string;
  let configPath: string;

  beforeEach(() => {
    homeDir = join(tmpdir(), `stackcraft-settings-test-${Date.now()}`);
    configPath = join(homeDir, 'config.yaml');
    mkdirSync(homeDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(homeDir, { recursive: true, force: true });
  });

  it('yields nothing for a missing file', () => {
    expect(loadSettings(join(homeDir, 'missing.yaml'))).toEqual({});
  });

  it('reads known keys and ignores the rest', () => {
    writeFileSync(configPath, 'python_version: "3.12"\nnode_version: 22\neditor: vim\nredis_version: ""\n');
    expect(loadSettings(configPath)).toEqual({ python_version: '3.12', node_version: '22' });
  });

  it('rejects a file that is not a mapping', () => {
    writeFileSync(configPath, '- python_version\n');
    expect(() => loadSettings(configPath)).toThrow(`Invalid settings file ${configPath}: expected a mapping`);
  });

  it('rejects unquoted decimal versions', () => {
    writeFileSync(configPath, 'python_version: 3.10\n');
    expect(() => loadSettings(configPath)).toThrow(
      `Invalid settings file ${configPath}: python_version is a number; quote it so the version is kept as written`,
    );
  });

  it('treats an empty file as no settings', () => {
    writeFileSync(configPath, '');
    expect(loadSettings(configPath)).toEqual({});
  });

  it('saves values as strings and keeps other keys', () => {
    writeFileSync(configPath, 'editor: vim\n');
    const settings = saveSetting(configPath, 'python_version', '3.10');
    expect(settings).toEqual({ python_version: '3.10' });
    expect(readFileSync(configPath, 'utf-8')).toBe("editor: vim\npython_version: '3.10'\n");
  });

  it('creates the settings directory on first save', () => {
    const nested = join(homeDir, 'nested', 'config.yaml');
    expect(saveSetting(nested, 'redis_version', '7')).toEqual({ redis_version: '7' });
  });

  it('recognizes version keys only', () => {
    expect(isSettingKey('postgres_version')).toBe(true);
    expect(isSettingKey('editor')).toBe(false);
  });
});
