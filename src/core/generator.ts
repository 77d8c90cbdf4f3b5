import { posix } from 'node:path';
import type { ProjectState } from '../config/schema.js';
import type { ComponentGenerator, ComponentPaths, GeneratorTable } from '../types/generator.js';
import type { Component, ServiceDeclaration } from '../types/registry.js';
import type { ResolvedSpec } from '../types/spec.js';
import { RegistryError } from './errors.js';
import type { Registry } from './registry.js';
import { isStandaloneRuntime } from './resolver.js';
import {
  catalogScripts,
  mergePackageJson,
  mergeRequirements,
  mergeScripts,
  renderPackageJson,
  renderRequirements,
  type MergedDependencies,
} from './dependencies.js';
import { assignPorts, type ComposeService } from './compose.js';
import { renderScaffold, renderValue, type ScaffoldData } from './scaffold.js';
import { EXECUTABLE_MODE, StagedTree } from './staging.js';
import { DEFAULT_VERSIONS } from './versions.js';
import { logger } from '../utils/logger.js';

// ── Binding ─────────────────────────────────────────────────────────

/**
 * Pairs every catalog component with its generator. A component without a
 * generator, or a generator without a component, is a catalog defect.
 */
export function bindGenerators(
  registry: Registry,
  generators: Readonly<Record<string, ComponentGenerator>>,
): GeneratorTable {
  const ids = new Set(registry.all().map((c) => c.id));
  const missing = [...ids].filter((id) => !(id in generators));
  const extra = Object.keys(generators).filter((id) => !ids.has(id));
  if (missing.length > 0) {
    throw new RegistryError(`No generator for component(s): ${missing.join(', ')}`);
  }
  if (extra.length > 0) {
    throw new RegistryError(`Generator(s) without a component: ${extra.sort().join(', ')}`);
  }
  return Object.freeze({ ...generators });
}

// ── Helpers ─────────────────────────────────────────────────────────

function pathsFor(component: Component): ComponentPaths {
  const dir = component.category === 'base-runtime' ? '.' : component.id;
  return { dir, join: (...segments) => posix.join(dir, ...segments) };
}

export function scaffoldData(spec: ResolvedSpec, registry: Registry): ScaffoldData {
  const resolved = new Set(spec.components);
  const has: Record<string, boolean> = {};
  for (const c of registry.all()) has[c.id] = resolved.has(c.id);
  return {
    projectName: spec.projectName,
    pythonVersion: spec.versions.python_version ?? DEFAULT_VERSIONS.python_version,
    nodeVersion: spec.versions.node_version ?? DEFAULT_VERSIONS.node_version,
    has,
    withExamples: spec.features.includes('with-examples'),
  };
}

function serviceDefinition(
  service: ServiceDeclaration,
  hostPort: number,
  vars: Record<string, unknown>,
  knownServices: ReadonlySet<string>,
): ComposeService {
  const definition: ComposeService = {
    ...(service.image ? { image: renderValue(service.image, vars) } : {}),
    ...(service.build ? { build: { context: '.', dockerfile: service.build } } : {}),
    ...(service.command ? { command: service.command } : {}),
    ports: [`${hostPort}:${service.containerPort}`],
  };
  if (service.volumes.length > 0) {
    definition.volumes = service.volumes.map((v) => renderValue(v, vars));
  }
  const env = Object.entries(service.environment);
  if (env.length > 0) {
    definition.environment = Object.fromEntries(env.map(([k, v]) => [k, renderValue(v, vars)]));
  }
  const dependsOn = service.dependsOn.filter((name) => knownServices.has(name));
  if (dependsOn.length > 0) definition.depends_on = dependsOn;
  return definition;
}

const ENV_KEY = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

function envKey(line: string): string | null {
  return ENV_KEY.exec(line)?.[1] ?? null;
}

/** Appends the variables of `lines` that `existing` does not define yet. */
export function mergeEnvExample(existing: string, lines: readonly string[]): string {
  const defined = new Set(existing.split('\n').map(envKey));
  const missing = lines.filter((line) => {
    const key = envKey(line);
    return key !== null && !defined.has(key);
  });
  if (missing.length === 0) return existing;
  const base = existing === '' || existing.endsWith('\n') ? existing : `${existing}\n`;
  return `${base}${missing.join('\n')}\n`;
}

// ── Workspace ───────────────────────────────────────────────────────

interface ServiceSummary {
  name: string;
  component: string;
  port: number;
}

function stageWorkspace(
  tree: StagedTree,
  spec: ResolvedSpec,
  registry: Registry,
  data: ScaffoldData,
  services: readonly ServiceSummary[],
  connection: ReadonlyArray<[string, string]>,
): void {
  const components = spec.components.flatMap((id) => {
    const c = registry.lookup(id);
    return c ? [{ id: c.id, description: c.description }] : [];
  });
  const readmeData = { ...data, components, services, profile: spec.profile ?? '' };
  tree.claim('workspace', { path: 'README.md', content: renderScaffold('workspace', 'README.md', readmeData) });
  tree.claim('workspace', { path: '.gitignore', content: renderScaffold('workspace', 'gitignore', data) });
  const newRuntimes =
    spec.mode === 'add' ? spec.added.filter((id) => registry.lookup(id)?.category === 'base-runtime') : [];
  tree.claim('workspace', {
    path: '.devcontainer/Dockerfile',
    content: renderScaffold('workspace', 'Dockerfile', data),
    preserveNote:
      newRuntimes.length > 0
        ? `Preserved existing .devcontainer/Dockerfile; install the ${newRuntimes.join(', ')} runtime in it by hand`
        : undefined,
  });
  tree.claim('workspace', {
    path: '.devcontainer/setup.sh',
    content: renderScaffold('workspace', 'setup.sh', data),
    mode: EXECUTABLE_MODE,
  });
  if (connection.length > 0) {
    const lines = connection.map(([key, value]) => `${key}=${value}`);
    tree.claim('workspace', {
      path: '.env.example',
      content: lines.join('\n') + '\n',
      merge: (existing) => mergeEnvExample(existing, lines),
    });
  }
}

function stageDependencies(
  tree: StagedTree,
  spec: ResolvedSpec,
  registry: Registry,
  dependencies: MergedDependencies,
  data: ScaffoldData,
): void {
  const withDeps = spec.features.includes('with-deps');
  const python = dependencies.python;
  if (python) {
    tree.claim('dependencies', {
      path: 'requirements.txt',
      content: renderRequirements(python, spec.projectName),
      merge: (existing) => mergeRequirements(existing, python),
    });
    if (withDeps) {
      tree.claim('dependencies', {
        path: 'scripts/setup-python-deps.sh',
        content: renderScaffold('workspace', 'setup-python-deps.sh', data),
        mode: EXECUTABLE_MODE,
      });
    }
  }
  const node = dependencies.node;
  if (node) {
    const scripts = mergeScripts(spec, registry);
    const replaceable = catalogScripts(registry);
    tree.claim('dependencies', {
      path: 'package.json',
      content: renderPackageJson(node, scripts, spec.projectName),
      merge: (existing) => mergePackageJson(existing, node, scripts, replaceable),
    });
    if (withDeps) {
      tree.claim('dependencies', {
        path: 'scripts/setup-nodejs-deps.sh',
        content: renderScaffold('workspace', 'setup-nodejs-deps.sh', data),
        mode: EXECUTABLE_MODE,
      });
    }
  }
}

/**
 * Warns about skeleton files of base runtimes that ran standalone before this
 * addition and now sit beside a framework of their ecosystem.
 */
function noteSupersededSkeletons(
  tree: StagedTree,
  spec: ResolvedSpec,
  registry: Registry,
  generators: GeneratorTable,
): void {
  for (const id of spec.existing.components) {
    const component = registry.lookup(id);
    const files = generators[id]?.standaloneFiles ?? [];
    if (!component || files.length === 0) continue;
    if (!isStandaloneRuntime(component, spec.existing.components, registry)) continue;
    if (isStandaloneRuntime(component, spec.components, registry)) continue;
    const frameworks = spec.added.filter((other) => {
      const c = registry.lookup(other);
      return c?.category === 'framework' && c.ecosystem === component.ecosystem;
    });
    for (const path of files) {
      tree.warn(`${path} from the standalone ${id} runtime is superseded by ${frameworks.join(', ')}; remove it once unused`);
    }
  }
}

// ── Generation ──────────────────────────────────────────────────────

/**
 * Stages the whole project for `spec` in memory. Component generators and the
 * mergeable artifacts only receive components new to the project; every
 * problem is raised as a GenerationError before anything is written.
 */
export function generateTree(
  spec: ResolvedSpec,
  dependencies: MergedDependencies,
  registry: Registry,
  generators: GeneratorTable,
): StagedTree {
  const tree = new StagedTree(spec.projectName);
  const data = scaffoldData(spec, registry);
  const added = new Set(spec.added);

  for (const id of spec.added) {
    const component = registry.lookup(id);
    const generator = generators[id];
    if (!component || !generator) {
      throw new RegistryError(`No generator bound for component "${id}"`);
    }
    const files = generator.generate({
      spec,
      component,
      registry,
      paths: pathsFor(component),
      data,
      standalone: isStandaloneRuntime(component, spec.components, registry),
    });
    for (const file of files) tree.claim(id, file);
  }

  // Orchestration file
  const runnable = spec.components.flatMap((id) => {
    const c = registry.lookup(id);
    return c?.service ? [{ component: c, service: c.service }] : [];
  });
  const knownServices = new Set(runnable.map((r) => r.service.name));
  const assigned = assignPorts(
    runnable
      .filter((r) => added.has(r.component.id))
      .map((r) => ({ componentId: r.component.id, defaultPort: r.service.defaultPort })),
    spec.existing.ports,
    spec.existing.reservedPorts,
  );

  const ports: Record<string, number> = {};
  const summaries: ServiceSummary[] = [];
  const connection: Array<[string, string]> = [];
  for (const { component, service } of runnable) {
    const port = assigned[component.id] ?? spec.existing.ports[component.id];
    if (port === undefined) continue;
    ports[component.id] = port;
    summaries.push({ name: service.name, component: component.id, port });
    const version = component.versionKey ? (spec.versions[component.versionKey] ?? 'latest') : 'latest';
    const vars = { projectName: spec.projectName, version, port };
    for (const [key, value] of Object.entries(service.connection)) {
      connection.push([key, renderValue(value, vars)]);
    }
    if (!added.has(component.id)) continue;
    tree.addService(component.id, service.name, serviceDefinition(service, port, vars, knownServices), service.namedVolumes);
    tree.contributeDevcontainer({ forwardPorts: [port] });
  }

  // Container descriptor
  for (const id of spec.added) {
    const hints = registry.lookup(id)?.devcontainer;
    if (hints) tree.contributeDevcontainer({ mounts: hints.mounts, extensions: hints.extensions });
  }

  stageWorkspace(tree, spec, registry, data, summaries, connection);
  stageDependencies(tree, spec, registry, dependencies, data);
  noteSupersededSkeletons(tree, spec, registry, generators);

  const state: ProjectState = {
    name: spec.projectName,
    components: [...spec.components],
    versions: { ...spec.versions },
    ports,
    template: spec.dependencyTemplate,
  };
  tree.setState(state);

  logger.debug('Staged tree', { files: tree.files().length, services: tree.serviceNames() });
  return tree.seal();
}
