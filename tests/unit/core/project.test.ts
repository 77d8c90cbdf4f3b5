import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isProject, loadProject, parseProjectState, renderProjectState } from '../../../src/core/project.js';
import { projectStatePath } from '../../../src/core/userdata.js';
import { ResolutionError } from '../../../src/core/errors.js';

describe('project', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = join(tmpdir(), `stackcraft-project-test-${Date.now()}`);
    mkdirSync(join(projectDir, '.stackcraft'), { recursive: true });
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('resolves the state path inside the project', () => {
    expect(projectStatePath('/work/demo')).toBe(join('/work/demo', '.stackcraft', 'project.yaml'));
  });

  it('returns null without a state file', () => {
    expect(isProject(projectDir)).toBe(false);
    expect(loadProject(projectDir)).toBeNull();
  });

  it('reads state and reserved host ports', () => {
    const state = {
      name: 'demo',
      components: ['python', 'redis'],
      versions: { python_version: '3.12', redis_version: '7' },
      ports: { redis: 6379 },
      template: 'minimal',
    };
    writeFileSync(projectStatePath(projectDir), renderProjectState(state));
    writeFileSync(
      join(projectDir, 'docker-compose.yml'),
      'services:\n  redis:\n    ports: ["6379:6379"]\n  admin:\n    ports: ["127.0.0.1:8081:80"]\n',
    );

    expect(isProject(projectDir)).toBe(true);
    expect(loadProject(projectDir)).toEqual({
      state,
      existing: { components: ['python', 'redis'], ports: { redis: 6379 }, reservedPorts: [6379, 8081] },
    });
  });

  it('keeps version strings that look like numbers', () => {
    const text = renderProjectState({
      name: 'demo',
      components: ['python'],
      versions: { python_version: '3.10' },
      ports: {},
      template: null,
    });
    expect(parseProjectState(text, 'project.yaml').versions.python_version).toBe('3.10');
  });

  it('rejects malformed state', () => {
    expect(() => parseProjectState('components: [python]\n', 'project.yaml')).toThrow(ResolutionError);
    expect(() => parseProjectState('name: [', 'project.yaml')).toThrow(/^Unreadable project state project\.yaml/);
  });
});
