import { basename, resolve as resolvePath } from 'node:path';
import {
  FEATURE_FLAGS,
  SelectionSchema,
  type Ecosystem,
  type FeatureFlag,
  type SelectionInput,
  type VersionKey,
} from '../config/schema.js';
import type { Settings } from '../config/settings.js';
import type { Component } from '../types/registry.js';
import { EMPTY_PROJECT, type ResolvedSpec } from '../types/spec.js';
import { ResolutionError } from './errors.js';
import type { Registry } from './registry.js';
import type { LoadedProject } from './project.js';
import { isVersionKey, resolveVersion, validateVersion } from './versions.js';
import { logger } from '../utils/logger.js';

export interface ResolveOptions {
  /** Global user settings. */
  settings?: Settings;
  /** The project being extended. Required in add mode. */
  project?: LoadedProject | null;
}

function isFeatureFlag(value: string): value is FeatureFlag {
  return FEATURE_FLAGS.some((f) => f === value);
}

/** Adds every implied component until nothing new appears. */
export function implicationClosure(seed: Iterable<string>, registry: Registry): Set<string> {
  const closed = new Set<string>();
  const queue = [...seed];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || closed.has(id)) continue;
    closed.add(id);
    for (const implied of registry.lookup(id)?.implies ?? []) {
      if (!closed.has(implied)) queue.push(implied);
    }
  }
  return closed;
}

/** First conflicting pair in registry order, or null. */
export function findConflict(ids: readonly string[], registry: Registry): [string, string] | null {
  const ordered = registry.order(ids);
  for (let i = 0; i < ordered.length; i++) {
    const a = registry.lookup(ordered[i]);
    for (let j = i + 1; j < ordered.length; j++) {
      const b = registry.lookup(ordered[j]);
      if (!a || !b) continue;
      if (a.conflicts.includes(b.id) || b.conflicts.includes(a.id)) {
        return [a.id, b.id];
      }
    }
  }
  return null;
}

function ecosystemsOf(ids: Iterable<string>, registry: Registry): Set<Ecosystem> {
  const ecosystems = new Set<Ecosystem>();
  for (const id of ids) {
    const eco = registry.lookup(id)?.ecosystem;
    if (eco) ecosystems.add(eco);
  }
  return ecosystems;
}

function hasRuntime(ids: Iterable<string>, ecosystem: Ecosystem, registry: Registry): boolean {
  for (const id of ids) {
    const c = registry.lookup(id);
    if (c?.category === 'base-runtime' && c.ecosystem === ecosystem) return true;
  }
  return false;
}

/**
 * A base runtime only produces its own application skeleton when no
 * framework of the same ecosystem is part of the project.
 */
export function isStandaloneRuntime(
  component: Component,
  componentIds: readonly string[],
  registry: Registry,
): boolean {
  if (component.category !== 'base-runtime') return false;
  return !componentIds.some((id) => {
    const other = registry.lookup(id);
    return other?.category === 'framework' && other.ecosystem === component.ecosystem;
  });
}

function deepFreeze(spec: ResolvedSpec): ResolvedSpec {
  Object.freeze(spec.components);
  Object.freeze(spec.added);
  Object.freeze(spec.versions);
  Object.freeze(spec.features);
  Object.freeze(spec.existing.components);
  Object.freeze(spec.existing.ports);
  Object.freeze(spec.existing.reservedPorts);
  Object.freeze(spec.existing);
  return Object.freeze(spec);
}

/**
 * Turns a raw selection into a closed, conflict-free, version-resolved spec.
 * Throws ResolutionError for anything the caller can correct.
 */
export function resolveSpec(
  input: SelectionInput,
  registry: Registry,
  options: ResolveOptions = {},
): ResolvedSpec {
  const parsed = SelectionSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ResolutionError(`Invalid selection: ${issue.path.join('.')}: ${issue.message}`);
  }
  const selection = parsed.data;
  const settings = options.settings ?? {};
  const project = options.project ?? null;

  const unknownFlags = selection.features.filter((f) => !isFeatureFlag(f));
  if (unknownFlags.length > 0) {
    throw new ResolutionError(`Unknown feature flag(s): ${unknownFlags.join(', ')}`);
  }
  const features = [...new Set(selection.features.filter(isFeatureFlag))];

  const unknownIds = selection.components.filter((id) => !registry.lookup(id));
  if (unknownIds.length > 0) {
    throw new ResolutionError(`Unknown component(s): ${unknownIds.join(', ')}`, unknownIds);
  }

  const profile = selection.profile ? registry.profile(selection.profile) : undefined;
  if (selection.profile && !profile) {
    throw new ResolutionError(`Unknown profile "${selection.profile}"`);
  }

  const overrides: Partial<Record<VersionKey, string>> = {};
  for (const [key, value] of Object.entries(selection.versionOverrides)) {
    if (!isVersionKey(key)) {
      throw new ResolutionError(`Unknown version key "${key}"`);
    }
    if (value.trim() !== '') overrides[key] = validateVersion(key, value.trim());
  }

  const seed = new Set<string>([...selection.components, ...(profile?.components ?? [])]);

  if (selection.mode === 'add') {
    if (!project) {
      throw new ResolutionError(`${selection.targetDir} is not a generated project`);
    }
    if (seed.size === 0) {
      throw new ResolutionError('Nothing to add: select at least one component or a profile');
    }
    for (const id of project.state.components) {
      if (!registry.lookup(id)) {
        throw new ResolutionError(`Project uses unknown component "${id}"`, [id]);
      }
      seed.add(id);
    }
  } else if (seed.size === 0) {
    const python = registry.defaultRuntime('python');
    if (python) seed.add(python.id);
  }

  let closed = implicationClosure(seed, registry);
  for (const eco of ecosystemsOf(closed, registry)) {
    if (hasRuntime(closed, eco, registry)) continue;
    const runtime = registry.defaultRuntime(eco);
    if (runtime) {
      logger.debug('Adding default runtime', { ecosystem: eco, component: runtime.id });
      closed = implicationClosure([...closed, runtime.id], registry);
    }
  }

  const components = registry.order(closed);
  const conflict = findConflict(components, registry);
  if (conflict) {
    throw new ResolutionError(
      `Components "${conflict[0]}" and "${conflict[1]}" cannot be used together`,
      conflict,
    );
  }

  const templateId =
    selection.template ?? profile?.template ?? (project ? project.state.template : null) ?? null;
  if (templateId && !registry.template(templateId)) {
    throw new ResolutionError(`Unknown dependency template "${templateId}"`);
  }

  const versions: Partial<Record<VersionKey, string>> = {};
  for (const id of components) {
    const key = registry.lookup(id)?.versionKey;
    if (!key) continue;
    versions[key] = resolveVersion(
      key,
      overrides[key],
      selection.mode === 'add' ? project?.state.versions[key] : undefined,
      settings[key],
    );
  }

  const existingIds = new Set(project && selection.mode === 'add' ? project.state.components : []);
  const added = components.filter((id) => !existingIds.has(id));
  const targetDir = resolvePath(selection.targetDir);

  const spec = deepFreeze({
    projectName: selection.projectName ?? project?.state.name ?? basename(targetDir),
    targetDir,
    mode: selection.mode,
    components,
    added,
    versions,
    features,
    dependencyTemplate: templateId,
    profile: profile?.name ?? null,
    existing: selection.mode === 'add' && project ? project.existing : EMPTY_PROJECT,
  });
  logger.debug('Resolved selection', {
    components: spec.components,
    added: spec.added,
    versions: spec.versions,
  });
  return spec;
}
