import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import { loadCatalog } from '../../../src/core/registry.js';
import { resolveSpec } from '../../../src/core/resolver.js';
import {
  EXIT_COMMIT,
  EXIT_GENERATION,
  EXIT_RESOLUTION,
  addSelectionOptions,
  reportOutcome,
  selectionFromOptions,
} from '../../../src/commands/shared.js';

const registry = loadCatalog();

function parse(args: string[]) {
  const cmd = new Command('create').exitOverride();
  const flags = addSelectionOptions(cmd, registry);
  cmd.parse(args, { from: 'user' });
  return selectionFromOptions(cmd.opts(), flags, { targetDir: '/work/demo', mode: 'create', projectName: 'demo' });
}

describe('selectionFromOptions', () => {
  it('maps component, version and feature flags', () => {
    expect(
      parse(['--redis', '--fastapi', '--python-version', '3.12', '--with-examples', '--no-git', '-p', 'web-app']),
    ).toEqual({
      targetDir: '/work/demo',
      mode: 'create',
      projectName: 'demo',
      components: ['fastapi', 'redis'],
      profile: 'web-app',
      template: undefined,
      versionOverrides: { python_version: '3.12' },
      features: ['with-examples', 'no-git'],
    });
  });

  it('selects nothing by default', () => {
    const selection = parse([]);
    expect(selection.components).toEqual([]);
    expect(selection.features).toEqual([]);
    expect(selection.versionOverrides).toEqual({});
  });

  it('rejects unknown flags', () => {
    expect(() => parse(['--django'])).toThrow();
  });
});

describe('reportOutcome', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps each failure to its exit code', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(reportOutcome({ kind: 'resolution-error', reason: 'Unknown component(s): django', componentIds: ['django'] }, false)).toBe(
      EXIT_RESOLUTION,
    );
    expect(
      reportOutcome({ kind: 'generation-error', reason: 'Conflicting paths', paths: ['a.txt', 'b.txt'] }, false),
    ).toBe(EXIT_GENERATION);
    expect(reportOutcome({ kind: 'commit-error', reason: 'disk full' }, false)).toBe(EXIT_COMMIT);
    expect(errors).toHaveBeenNthCalledWith(2, expect.any(String), 'Conflicting paths: a.txt, b.txt');
  });

  it('lists staged paths on a dry run', () => {
    const logs = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const spec = resolveSpec({ targetDir: '/work/demo', mode: 'create' }, registry);
    const code = reportOutcome(
      { kind: 'success', spec, dependencies: {}, report: null, staged: ['README.md'], warnings: [] },
      true,
    );
    expect(code).toBe(0);
    expect(logs).toHaveBeenCalledWith(expect.any(String), 'Dry run for demo: python');
  });
});
