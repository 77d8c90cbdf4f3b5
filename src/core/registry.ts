import { join } from 'node:path';
import { readFileSync } from 'node:fs';
import * as TOML from 'smol-toml';
import type { z } from 'zod';
import {
  CATEGORIES,
  ECOSYSTEMS,
  ComponentFileSchema,
  ProfileFileSchema,
  TemplateFileSchema,
  type Category,
  type DependencyBlock,
  type Ecosystem,
} from '../config/schema.js';
import type {
  Component,
  DependencyEntry,
  DependencyKind,
  DependencyManifest,
  DependencyTemplate,
  Profile,
} from '../types/registry.js';
import { RegistryError, errorMessage } from './errors.js';
import { envVar } from '../config/branding.js';
import { listFiles, packageRoot } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

// ── Constants ───────────────────────────────────────────────────────

const COMPONENTS_DIR = 'components';
const PROFILES_DIR = 'profiles';
const TEMPLATES_DIR = 'templates';

function categoryRank(category: Category): number {
  return CATEGORIES.indexOf(category);
}

const PYTHON_REQUIREMENT = /^([A-Za-z0-9][A-Za-z0-9._-]*(?:\[[A-Za-z0-9,._ -]+\])?)\s*((?:===|[<>=!~]=?).*)?$/;
const NODE_REQUIREMENT = /^(@?[^@\s]+)(?:@(\S+))?$/;

// ── Requirement parsing ─────────────────────────────────────────────

export function parseRequirement(
  ecosystem: Ecosystem,
  raw: string,
  kind: DependencyKind,
): DependencyEntry {
  const text = raw.trim();
  const match = (ecosystem === 'python' ? PYTHON_REQUIREMENT : NODE_REQUIREMENT).exec(text);
  if (!match) {
    throw new RegistryError(`Malformed ${ecosystem} requirement "${raw}"`);
  }
  return {
    packageName: match[1],
    versionConstraint: (match[2] ?? (ecosystem === 'node' ? '*' : '')).trim(),
    dependencyKind: kind,
  };
}

function toManifest(deps: Partial<Record<Ecosystem, DependencyBlock>>): DependencyManifest {
  const manifest: Partial<Record<Ecosystem, readonly DependencyEntry[]>> = {};
  for (const eco of ECOSYSTEMS) {
    const block = deps[eco];
    if (!block) continue;
    manifest[eco] = [
      ...block.runtime.map((r) => parseRequirement(eco, r, 'runtime')),
      ...block.dev.map((r) => parseRequirement(eco, r, 'dev')),
    ];
  }
  return manifest;
}

// ── File loading ────────────────────────────────────────────────────

function readCatalogFile<T extends z.ZodTypeAny>(path: string, schema: T): z.infer<T> {
  let data: unknown;
  try {
    data = TOML.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new RegistryError(`Malformed TOML: ${errorMessage(err)}`, path);
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new RegistryError(`Schema violation: ${issues}`, path);
  }
  return result.data;
}

export function loadComponentFile(path: string): Component {
  const file = readCatalogFile(path, ComponentFileSchema);
  const { component: c, service } = file;
  try {
    return {
      id: c.id,
      description: c.description,
      category: c.category,
      ecosystem: c.ecosystem === 'none' ? null : c.ecosystem,
      isDefaultRuntime: c.default,
      implies: file.implies.components,
      conflicts: file.conflicts.components,
      dependencies: toManifest(file.dependencies),
      versionKey: c.version_key ?? null,
      service: service
        ? {
            name: service.name,
            defaultPort: service.default_port,
            containerPort: service.container_port,
            image: service.image ?? null,
            build: service.build ?? null,
            command: service.command ?? null,
            volumes: service.volumes,
            namedVolumes: service.named_volumes,
            dependsOn: service.depends_on,
            environment: service.environment,
            connection: service.connection,
          }
        : null,
      devcontainer: file.devcontainer,
      scripts: file.scripts,
    };
  } catch (err) {
    if (err instanceof RegistryError) throw new RegistryError(err.message, path);
    throw err;
  }
}

export function loadProfileFile(path: string): Profile {
  const file = readCatalogFile(path, ProfileFileSchema);
  return {
    name: file.profile.name,
    description: file.profile.description,
    components: file.components.ids,
    template: file.profile.template ?? null,
  };
}

export function loadTemplateFile(path: string): DependencyTemplate {
  const file = readCatalogFile(path, TemplateFileSchema);
  try {
    return {
      id: file.template.id,
      description: file.template.description,
      dependencies: toManifest(file.dependencies),
    };
  } catch (err) {
    if (err instanceof RegistryError) throw new RegistryError(err.message, path);
    throw err;
  }
}

// ── Registry ────────────────────────────────────────────────────────

function compareComponents(a: Component, b: Component): number {
  const rank = categoryRank(a.category) - categoryRank(b.category);
  return rank !== 0 ? rank : a.id.localeCompare(b.id);
}

/**
 * Immutable catalog of components, profiles and dependency templates.
 * Construction validates cross references; any defect is a RegistryError.
 */
export class Registry {
  private readonly byId: ReadonlyMap<string, Component>;
  private readonly ordered: readonly Component[];
  private readonly profilesByName: ReadonlyMap<string, Profile>;
  private readonly templatesById: ReadonlyMap<string, DependencyTemplate>;
  private readonly runtimes: ReadonlyMap<Ecosystem, Component>;

  constructor(
    components: readonly Component[],
    profiles: readonly Profile[] = [],
    templates: readonly DependencyTemplate[] = [],
  ) {
    const byId = new Map<string, Component>();
    for (const c of components) {
      if (byId.has(c.id)) throw new RegistryError(`Duplicate component id "${c.id}"`);
      byId.set(c.id, Object.freeze(c));
    }
    this.byId = byId;
    this.ordered = Object.freeze([...byId.values()].sort(compareComponents));

    this.validateReferences();
    this.validateAcyclic();
    this.validateServices();
    this.runtimes = this.collectRuntimes();

    const templatesById = new Map<string, DependencyTemplate>();
    for (const t of templates) {
      if (templatesById.has(t.id)) throw new RegistryError(`Duplicate template id "${t.id}"`);
      templatesById.set(t.id, Object.freeze(t));
    }
    this.templatesById = templatesById;

    const profilesByName = new Map<string, Profile>();
    for (const p of profiles) {
      if (profilesByName.has(p.name)) throw new RegistryError(`Duplicate profile "${p.name}"`);
      for (const id of p.components) {
        if (!byId.has(id)) {
          throw new RegistryError(`Profile "${p.name}" references unknown component "${id}"`);
        }
      }
      if (p.template && !templatesById.has(p.template)) {
        throw new RegistryError(`Profile "${p.name}" references unknown template "${p.template}"`);
      }
      profilesByName.set(p.name, Object.freeze(p));
    }
    this.profilesByName = profilesByName;
  }

  lookup(id: string): Component | undefined {
    return this.byId.get(id);
  }

  all(): readonly Component[] {
    return this.ordered;
  }

  /** Sorts ids into registry order; unknown ids are dropped. */
  order(ids: Iterable<string>): string[] {
    const wanted = new Set(ids);
    return this.ordered.filter((c) => wanted.has(c.id)).map((c) => c.id);
  }

  profile(name: string): Profile | undefined {
    return this.profilesByName.get(name);
  }

  profiles(): Profile[] {
    return [...this.profilesByName.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  template(id: string): DependencyTemplate | undefined {
    return this.templatesById.get(id);
  }

  templates(): DependencyTemplate[] {
    return [...this.templatesById.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  defaultRuntime(ecosystem: Ecosystem): Component | undefined {
    return this.runtimes.get(ecosystem);
  }

  private validateReferences(): void {
    for (const c of this.ordered) {
      for (const [label, refs] of [['implies', c.implies], ['conflicts', c.conflicts]] as const) {
        for (const ref of refs) {
          if (ref === c.id) {
            throw new RegistryError(`Component "${c.id}" ${label} itself`);
          }
          if (!this.byId.has(ref)) {
            throw new RegistryError(`Component "${c.id}" ${label} unknown component "${ref}"`);
          }
        }
      }
      for (const ref of c.implies) {
        if (c.conflicts.includes(ref)) {
          throw new RegistryError(`Component "${c.id}" both implies and conflicts with "${ref}"`);
        }
      }
      if (c.category === 'base-runtime' && c.ecosystem === null) {
        throw new RegistryError(`Base runtime "${c.id}" must declare an ecosystem`);
      }
    }
  }

  private validateAcyclic(): void {
    const state = new Map<string, 'visiting' | 'done'>();
    const visit = (id: string, trail: string[]): void => {
      const s = state.get(id);
      if (s === 'done') return;
      if (s === 'visiting') {
        throw new RegistryError(`Implication cycle: ${[...trail, id].join(' -> ')}`);
      }
      state.set(id, 'visiting');
      for (const next of this.byId.get(id)?.implies ?? []) {
        visit(next, [...trail, id]);
      }
      state.set(id, 'done');
    };
    for (const c of this.ordered) visit(c.id, []);
  }

  private validateServices(): void {
    const owners = new Map<string, string>();
    for (const c of this.ordered) {
      if (!c.service) continue;
      const owner = owners.get(c.service.name);
      if (owner) {
        throw new RegistryError(
          `Service "${c.service.name}" declared by both "${owner}" and "${c.id}"`,
        );
      }
      owners.set(c.service.name, c.id);
    }
  }

  private collectRuntimes(): Map<Ecosystem, Component> {
    const runtimes = new Map<Ecosystem, Component>();
    for (const c of this.ordered) {
      if (c.category !== 'base-runtime' || !c.ecosystem) continue;
      const current = runtimes.get(c.ecosystem);
      if (!current || (c.isDefaultRuntime && !current.isDefaultRuntime)) {
        runtimes.set(c.ecosystem, c);
      }
    }
    for (const c of this.ordered) {
      if (c.ecosystem && !runtimes.has(c.ecosystem)) {
        throw new RegistryError(
          `Component "${c.id}" needs the ${c.ecosystem} ecosystem but no base runtime provides it`,
        );
      }
    }
    return runtimes;
  }
}

// ── Catalog ─────────────────────────────────────────────────────────

export function defaultCatalogDir(): string {
  return process.env[envVar('CATALOG')] ?? join(packageRoot(), 'catalog');
}

/**
 * Loads every catalog file under `dir`. Files are read in name order so the
 * result does not depend on directory iteration order.
 */
export function loadCatalog(dir: string = defaultCatalogDir()): Registry {
  const componentsDir = join(dir, COMPONENTS_DIR);
  const componentFiles = listFiles(componentsDir, '.toml');
  if (componentFiles.length === 0) {
    throw new RegistryError('Catalog has no components', componentsDir);
  }
  const components = componentFiles.map((f) => loadComponentFile(join(componentsDir, f)));
  const profiles = listFiles(join(dir, PROFILES_DIR), '.toml').map((f) =>
    loadProfileFile(join(dir, PROFILES_DIR, f)),
  );
  const templates = listFiles(join(dir, TEMPLATES_DIR), '.toml').map((f) =>
    loadTemplateFile(join(dir, TEMPLATES_DIR, f)),
  );
  logger.debug('Catalog loaded', {
    dir,
    components: components.length,
    profiles: profiles.length,
    templates: templates.length,
  });
  return new Registry(components, profiles, templates);
}
