import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadCatalog, Registry } from '../../../src/core/registry.js';
import { findConflict, implicationClosure, isStandaloneRuntime, resolveSpec } from '../../../src/core/resolver.js';
import { ResolutionError } from '../../../src/core/errors.js';
import type { LoadedProject } from '../../../src/core/project.js';
import type { SelectionInput } from '../../../src/config/schema.js';
import { makeComponent } from '../helpers.js';

const registry = loadCatalog();
const targetDir = resolve('/tmp/stackcraft-resolver/demo');

function create(extra: Partial<SelectionInput> = {}): SelectionInput {
  return { targetDir, mode: 'create', ...extra };
}

function resolutionError(fn: () => unknown): ResolutionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ResolutionError) return err;
    throw err;
  }
  throw new Error('expected a ResolutionError');
}

function existingProject(components: string[], overrides: Partial<LoadedProject['state']> = {}): LoadedProject {
  return {
    state: { name: 'demo', components, versions: {}, ports: {}, template: null, ...overrides },
    existing: { components, ports: overrides.ports ?? {}, reservedPorts: [] },
  };
}

describe('implicationClosure', () => {
  it('follows implications transitively', () => {
    expect([...implicationClosure(['fastapi'], registry)].sort()).toEqual(['fastapi', 'python']);
  });

  it('is idempotent', () => {
    const once = implicationClosure(['nextjs', 'redis'], registry);
    expect(implicationClosure(once, registry)).toEqual(once);
  });
});

describe('findConflict', () => {
  it('reports the pair in registry order', () => {
    expect(findConflict(['nextjs', 'express'], registry)).toEqual(['express', 'nextjs']);
    expect(findConflict(['node', 'express'], registry)).toBeNull();
  });
});

describe('isStandaloneRuntime', () => {
  it('is false when a framework of the same ecosystem is present', () => {
    const node = registry.lookup('node');
    expect(node && isStandaloneRuntime(node, ['node', 'nextjs'], registry)).toBe(false);
    expect(node && isStandaloneRuntime(node, ['node', 'fastapi', 'python'], registry)).toBe(true);
  });
});

describe('resolveSpec', () => {
  describe('create mode', () => {
    it('adds implied components', () => {
      const spec = resolveSpec(create({ components: ['fastapi', 'postgresql'] }), registry);
      expect(spec.components).toEqual(['python', 'fastapi', 'postgresql']);
      expect(spec.added).toEqual(spec.components);
    });

    it('yields the same spec for a selection and its closure', () => {
      const a = resolveSpec(create({ components: ['fastapi'] }), registry);
      const b = resolveSpec(create({ components: ['python', 'fastapi'] }), registry);
      expect(a).toEqual(b);
    });

    it('defaults to the python runtime for an empty selection', () => {
      const spec = resolveSpec(create(), registry);
      expect(spec.components).toEqual(['python']);
      expect(spec.versions).toEqual({ python_version: '3.11' });
    });

    it('rejects conflicting frameworks in either order', () => {
      for (const components of [
        ['nextjs', 'express'],
        ['express', 'nextjs'],
      ]) {
        const err = resolutionError(() => resolveSpec(create({ components }), registry));
        expect(err.reason).toBe('Components "express" and "nextjs" cannot be used together');
        expect(err.componentIds).toEqual(['express', 'nextjs']);
      }
    });

    it('names unknown components', () => {
      const err = resolutionError(() => resolveSpec(create({ components: ['fastapi', 'django'] }), registry));
      expect(err.reason).toBe('Unknown component(s): django');
      expect(err.componentIds).toEqual(['django']);
    });

    it('rejects unknown profiles and templates', () => {
      expect(() => resolveSpec(create({ profile: 'mobile' }), registry)).toThrow('Unknown profile "mobile"');
      expect(() => resolveSpec(create({ template: 'full' }), registry)).toThrow(
        'Unknown dependency template "full"',
      );
    });

    it('rejects unknown feature flags', () => {
      expect(() => resolveSpec(create({ features: ['with-docs'] }), registry)).toThrow(
        'Unknown feature flag(s): with-docs',
      );
    });

    it('merges a profile with explicit components', () => {
      const spec = resolveSpec(create({ profile: 'python', components: ['redis'] }), registry);
      expect(spec.components).toEqual(['python', 'redis']);
      expect(spec.profile).toBe('python');
      expect(spec.dependencyTemplate).toBe('minimal');
    });

    it('lets an explicit template replace the profile one', () => {
      const spec = resolveSpec(create({ profile: 'web-app', template: 'minimal' }), registry);
      expect(spec.dependencyTemplate).toBe('minimal');
      expect(spec.components).toEqual(['node', 'python', 'fastapi', 'nextjs', 'postgresql']);
    });

    it('resolves versions from overrides, settings and defaults', () => {
      const spec = resolveSpec(
        create({ components: ['fastapi', 'redis'], versionOverrides: { python_version: '3.12' } }),
        registry,
        { settings: { redis_version: '6', postgres_version: '14' } },
      );
      expect(spec.versions).toEqual({ python_version: '3.12', redis_version: '6' });
    });

    it('rejects malformed overrides', () => {
      expect(() =>
        resolveSpec(create({ versionOverrides: { python_version: '3' } }), registry),
      ).toThrow('Invalid python_version "3": expected x.y, e.g. 3.12');
      expect(() =>
        resolveSpec(create({ versionOverrides: { java_version: '21' } }), registry),
      ).toThrow('Unknown version key "java_version"');
    });

    it('takes the project name from the target directory', () => {
      const spec = resolveSpec(create(), registry);
      expect(spec.projectName).toBe('demo');
      expect(spec.targetDir).toBe(targetDir);
    });

    it('freezes the result', () => {
      const spec = resolveSpec(create({ features: ['with-deps', 'no-git', 'with-deps'] }), registry);
      expect(Object.isFrozen(spec)).toBe(true);
      expect(Object.isFrozen(spec.components)).toBe(true);
      expect(Object.isFrozen(spec.features)).toBe(true);
      expect(spec.features).toEqual(['with-deps', 'no-git']);
      expect(() => Reflect.apply(Array.prototype.push, spec.features, ['with-examples'])).toThrow(TypeError);
    });

    it('adds the default runtime for an ecosystem without one', () => {
      const custom = new Registry([
        makeComponent({ id: 'python', category: 'base-runtime', ecosystem: 'python', isDefaultRuntime: true }),
        makeComponent({ id: 'flask', ecosystem: 'python' }),
      ]);
      expect(resolveSpec(create({ components: ['flask'] }), custom).components).toEqual(['python', 'flask']);
    });
  });

  describe('add mode', () => {
    const add = (extra: Partial<SelectionInput> = {}): SelectionInput => ({ targetDir, mode: 'add', ...extra });

    it('requires an existing project', () => {
      expect(() => resolveSpec(add({ components: ['redis'] }), registry)).toThrow(
        `${targetDir} is not a generated project`,
      );
    });

    it('requires something to add', () => {
      expect(() => resolveSpec(add(), registry, { project: existingProject(['python']) })).toThrow(
        'Nothing to add: select at least one component or a profile',
      );
    });

    it('reports only the new components as added', () => {
      const spec = resolveSpec(add({ components: ['fastapi'] }), registry, {
        project: existingProject(['python'], { versions: { python_version: '3.10' } }),
        settings: { python_version: '3.9' },
      });
      expect(spec.components).toEqual(['python', 'fastapi']);
      expect(spec.added).toEqual(['fastapi']);
      expect(spec.versions.python_version).toBe('3.10');
      expect(spec.projectName).toBe('demo');
    });

    it('checks conflicts against existing components', () => {
      const err = resolutionError(() =>
        resolveSpec(add({ components: ['express'] }), registry, { project: existingProject(['node', 'nextjs']) }),
      );
      expect(err.componentIds).toEqual(['express', 'nextjs']);
    });

    it('keeps the project template', () => {
      const spec = resolveSpec(add({ components: ['redis'] }), registry, {
        project: existingProject(['python'], { template: 'minimal' }),
      });
      expect(spec.dependencyTemplate).toBe('minimal');
    });

    it('carries the existing ports', () => {
      const spec = resolveSpec(add({ components: ['redis'] }), registry, {
        project: existingProject(['python', 'fastapi'], { ports: { fastapi: 8000 } }),
      });
      expect(spec.existing.ports).toEqual({ fastapi: 8000 });
    });
  });
});
