import { describe, it, expect } from 'vitest';
import { StagedTree, normalizeStagedPath, EXECUTABLE_MODE, FILE_MODE } from '../../../src/core/staging.js';
import { GenerationError } from '../../../src/core/errors.js';

function sealError(tree: StagedTree): GenerationError {
  try {
    tree.seal();
  } catch (err) {
    if (err instanceof GenerationError) return err;
    throw err;
  }
  throw new Error('expected a GenerationError');
}

describe('normalizeStagedPath', () => {
  it('normalizes separators and dot segments', () => {
    expect(normalizeStagedPath('./src//main.py')).toBe('src/main.py');
    expect(normalizeStagedPath('src\\app\\..\\main.py')).toBe('src/main.py');
  });

  it('rejects paths leaving the project', () => {
    expect(normalizeStagedPath('../outside.txt')).toBeNull();
    expect(normalizeStagedPath('src/../../outside.txt')).toBeNull();
    expect(normalizeStagedPath('/etc/hosts')).toBeNull();
    expect(normalizeStagedPath('.')).toBeNull();
  });
});

describe('StagedTree', () => {
  it('records claimed files with their modes', () => {
    const tree = new StagedTree('demo');
    tree.claim('python', { path: 'src/main.py', content: 'print()\n' });
    tree.claim('workspace', { path: 'setup.sh', content: '#!/bin/sh\n', mode: EXECUTABLE_MODE });
    tree.seal();
    expect(tree.files().map((f) => [f.path, f.mode, f.owner])).toEqual([
      ['setup.sh', EXECUTABLE_MODE, 'workspace'],
      ['src/main.py', FILE_MODE, 'python'],
    ]);
  });

  it('rejects two claims on one path', () => {
    const tree = new StagedTree('demo');
    tree.claim('python', { path: 'src/main.py', content: 'a' });
    tree.claim('fastapi', { path: './src/main.py', content: 'b' });
    const err = sealError(tree);
    expect(err.reason).toBe('Conflicting paths claimed by python and fastapi');
    expect(err.paths).toEqual(['src/main.py']);
  });

  it('rejects claims on engine-owned paths', () => {
    const tree = new StagedTree('demo');
    tree.claim('redis', { path: 'docker-compose.yml', content: '' });
    tree.claim('redis', { path: '.stackcraft/project.yaml', content: '' });
    const err = sealError(tree);
    expect(err.reason).toBe('Reserved paths claimed by redis');
    expect(err.paths).toEqual(['docker-compose.yml', '.stackcraft/project.yaml']);
  });

  it('rejects paths outside the project', () => {
    const tree = new StagedTree('demo');
    tree.claim('node', { path: '../escape.js', content: '' });
    expect(sealError(tree).paths).toEqual(['../escape.js']);
  });

  it('rejects duplicate service names', () => {
    const tree = new StagedTree('demo');
    tree.addService('postgresql', 'db', { image: 'postgres:15', ports: ['5432:5432'] });
    tree.addService('mongodb', 'db', { image: 'mongo:7', ports: ['27017:27017'] });
    const err = sealError(tree);
    expect(err.reason).toBe('Duplicate service "db" from postgresql and mongodb');
    expect(err.paths).toEqual(['docker-compose.yml']);
  });

  it('collects services, volumes and descriptor hints', () => {
    const tree = new StagedTree('demo');
    tree.addService('redis', 'redis', { image: 'redis:7-alpine', ports: ['6379:6379'] }, ['redis_data']);
    tree.contributeDevcontainer({ forwardPorts: [6379], extensions: ['a.b'] });
    tree.contributeDevcontainer({ forwardPorts: [6379], mounts: ['source=x,target=/x,type=volume'] });
    expect(tree.compose()).toEqual({
      services: [{ name: 'redis', definition: { image: 'redis:7-alpine', ports: ['6379:6379'] } }],
      volumes: ['redis_data'],
    });
    expect(tree.devcontainer()).toEqual({
      forwardPorts: [6379],
      mounts: ['source=x,target=/x,type=volume'],
      extensions: ['a.b'],
    });
  });

  it('lists every path the commit touches', () => {
    const tree = new StagedTree('demo');
    tree.claim('workspace', { path: 'README.md', content: '# demo\n' });
    expect(tree.paths()).toEqual(['.devcontainer/devcontainer.json', 'README.md']);
    tree.addService('redis', 'redis', { ports: ['6379:6379'] });
    tree.setState({ name: 'demo', components: ['redis'], versions: {}, ports: { redis: 6379 }, template: null });
    expect(tree.paths()).toEqual([
      '.devcontainer/devcontainer.json',
      '.stackcraft/project.yaml',
      'README.md',
      'docker-compose.yml',
    ]);
  });
});
