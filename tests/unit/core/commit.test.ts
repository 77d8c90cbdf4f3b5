import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import yaml from 'js-yaml';
import { commit } from '../../../src/core/commit.js';
import { CommitError } from '../../../src/core/errors.js';
import { EXECUTABLE_MODE, StagedTree } from '../../../src/core/staging.js';

function sampleTree(): StagedTree {
  const tree = new StagedTree('demo');
  tree.claim('workspace', { path: 'README.md', content: '# demo\n' });
  tree.claim('workspace', { path: '.devcontainer/setup.sh', content: '#!/bin/sh\n', mode: EXECUTABLE_MODE });
  tree.claim('redis', { path: 'examples/redis_example.py', content: 'import redis\n' });
  tree.addService('redis', 'redis', { image: 'redis:7-alpine', ports: ['6379:6379'] }, ['redis_data']);
  tree.contributeDevcontainer({ forwardPorts: [6379] });
  tree.setState({ name: 'demo', components: ['redis'], versions: { redis_version: '7' }, ports: { redis: 6379 }, template: null });
  return tree.seal();
}

function commitError(fn: () => unknown): CommitError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CommitError) return err;
    throw err;
  }
  throw new Error('expected a CommitError');
}

describe('commit', () => {
  let parent: string;
  let target: string;

  beforeEach(() => {
    parent = join(tmpdir(), `stackcraft-commit-test-${Date.now()}`);
    target = join(parent, 'demo');
    mkdirSync(parent, { recursive: true });
  });

  afterEach(() => {
    rmSync(parent, { recursive: true, force: true });
  });

  describe('create', () => {
    it('writes the whole tree', () => {
      const report = commit(sampleTree(), 'create', target);
      expect(report.written).toEqual([
        '.devcontainer/devcontainer.json',
        '.devcontainer/setup.sh',
        '.stackcraft/project.yaml',
        'README.md',
        'docker-compose.yml',
        'examples/redis_example.py',
      ]);
      expect(readFileSync(join(target, 'README.md'), 'utf-8')).toBe('# demo\n');
      expect(statSync(join(target, '.devcontainer/setup.sh')).mode & 0o111).not.toBe(0);
      expect(yaml.load(readFileSync(join(target, 'docker-compose.yml'), 'utf-8'))).toEqual({
        services: { redis: { image: 'redis:7-alpine', ports: ['6379:6379'] } },
        volumes: { redis_data: {} },
      });
      expect(readdirSync(parent)).toEqual(['demo']);
    });

    it('replaces an empty target directory', () => {
      mkdirSync(target);
      commit(sampleTree(), 'create', target);
      expect(existsSync(join(target, 'README.md'))).toBe(true);
    });

    it('refuses a non-empty target', () => {
      mkdirSync(target);
      writeFileSync(join(target, 'notes.txt'), 'keep');
      const err = commitError(() => commit(sampleTree(), 'create', target));
      expect(err.reason).toBe(`${target} already exists and is not empty`);
      expect(readdirSync(target)).toEqual(['notes.txt']);
    });

    it('leaves nothing behind when a write fails', () => {
      const err = commitError(() =>
        commit(sampleTree(), 'create', target, {
          io: {
            writeFile(path, content, mode) {
              if (path.endsWith('README.md')) throw new Error('disk full');
              writeFileSync(path, content, { mode });
            },
          },
        }),
      );
      expect(err.reason).toBe('disk full');
      expect(readdirSync(parent)).toEqual([]);
    });

    it('detects short writes', () => {
      const err = commitError(() =>
        commit(sampleTree(), 'create', target, {
          io: {
            writeFile(path, content, mode) {
              writeFileSync(path, content.slice(0, -1), { mode });
            },
          },
        }),
      );
      expect(err.reason).toBe('Short write for .devcontainer/setup.sh: 9 of 10 bytes');
      expect(existsSync(target)).toBe(false);
    });

    it('reports a parent path that runs through a file', () => {
      writeFileSync(join(parent, 'afile'), 'x');
      const err = commitError(() => commit(sampleTree(), 'create', join(parent, 'afile', 'demo')));
      expect(err).toBeInstanceOf(CommitError);
      expect(readdirSync(parent)).toEqual(['afile']);
    });

    it('restores an empty target when the final rename fails', () => {
      mkdirSync(target);
      commitError(() =>
        commit(sampleTree(), 'create', target, {
          io: {
            rename() {
              throw new Error('cross-device link');
            },
          },
        }),
      );
      expect(readdirSync(target)).toEqual([]);
      expect(readdirSync(parent)).toEqual(['demo']);
    });
  });

  describe('add', () => {
    beforeEach(() => {
      mkdirSync(target);
      writeFileSync(join(target, 'README.md'), '# my notes\n');
      writeFileSync(join(target, 'docker-compose.yml'), 'services:\n  app:\n    image: nginx\n    ports:\n      - "80:80"\n');
    });

    it('preserves existing files and merges shared ones', () => {
      const report = commit(sampleTree(), 'add', target);
      expect(report).toEqual({
        written: [
          '.devcontainer/devcontainer.json',
          '.devcontainer/setup.sh',
          '.stackcraft/project.yaml',
          'examples/redis_example.py',
        ],
        preserved: ['README.md'],
        merged: ['docker-compose.yml'],
        unchanged: [],
      });
      expect(readFileSync(join(target, 'README.md'), 'utf-8')).toBe('# my notes\n');
      expect(yaml.load(readFileSync(join(target, 'docker-compose.yml'), 'utf-8'))).toEqual({
        services: {
          app: { image: 'nginx', ports: ['80:80'] },
          redis: { image: 'redis:7-alpine', ports: ['6379:6379'] },
        },
        volumes: { redis_data: {} },
      });
    });

    it('is unchanged when committed twice', () => {
      commit(sampleTree(), 'add', target);
      const report = commit(sampleTree(), 'add', target);
      expect(report.written).toEqual([]);
      expect(report.merged).toEqual([]);
      expect(report.unchanged).toEqual(['.devcontainer/devcontainer.json', '.stackcraft/project.yaml', 'docker-compose.yml']);
    });

    it('merges mergeable files and writes them fresh when missing', () => {
      writeFileSync(join(target, 'requirements.txt'), 'requests\n');
      const tree = new StagedTree('demo');
      tree.claim('dependencies', {
        path: 'requirements.txt',
        content: 'redis>=5.0.0\n',
        merge: (existing) => `${existing}redis>=5.0.0\n`,
      });
      tree.claim('workspace', { path: '.env.example', content: 'REDIS_URL=x\n', merge: (existing) => existing });

      expect(commit(tree.seal(), 'add', target)).toEqual({
        written: ['.devcontainer/devcontainer.json', '.env.example'],
        preserved: [],
        merged: ['requirements.txt'],
        unchanged: ['docker-compose.yml'],
      });
      expect(readFileSync(join(target, 'requirements.txt'), 'utf-8')).toBe('requests\nredis>=5.0.0\n');
      expect(readFileSync(join(target, '.env.example'), 'utf-8')).toBe('REDIS_URL=x\n');
    });

    it('rolls back every change when a write fails', () => {
      const composeBefore = readFileSync(join(target, 'docker-compose.yml'), 'utf-8');
      const err = commitError(() =>
        commit(sampleTree(), 'add', target, {
          io: {
            writeFile(path, content, mode) {
              if (path.endsWith('project.yaml')) throw new Error('permission denied');
              writeFileSync(path, content, { mode });
            },
          },
        }),
      );
      expect(err.reason).toBe('permission denied');
      expect(readFileSync(join(target, 'docker-compose.yml'), 'utf-8')).toBe(composeBefore);
      expect(readdirSync(target).sort()).toEqual(['README.md', 'docker-compose.yml']);
    });

    it('refuses to merge an unreadable orchestration file', () => {
      writeFileSync(join(target, 'docker-compose.yml'), 'services: [1, 2]\n');
      const err = commitError(() => commit(sampleTree(), 'add', target));
      expect(err.reason).toMatch(/^Cannot merge docker-compose\.yml: /);
      expect(existsSync(join(target, 'examples'))).toBe(false);
    });
  });
});
