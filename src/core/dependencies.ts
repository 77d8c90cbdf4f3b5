import * as semver from 'semver';
import { z } from 'zod';
import { ECOSYSTEMS, type Ecosystem } from '../config/schema.js';
import type { DependencyEntry } from '../types/registry.js';
import type { ResolvedSpec } from '../types/spec.js';
import type { Registry } from './registry.js';
import { isStandaloneRuntime } from './resolver.js';

export type MergedDependencies = Readonly<Partial<Record<Ecosystem, readonly DependencyEntry[]>>>;

// ── Package identity ────────────────────────────────────────────────

/**
 * Normalized package name used to detect duplicates. Python names fold case,
 * `_` and `.` to `-` and drop extras.
 */
export function packageKey(ecosystem: Ecosystem, name: string): string {
  if (ecosystem === 'node') return name.toLowerCase();
  return name
    .replace(/\[.*\]$/, '')
    .toLowerCase()
    .replace(/[_.]+/g, '-');
}

// A clause that sets a floor: `>=2.0`, `~=1.4`, `^16`, `==3.1.*` or a bare version.
const LOWER_BOUND = /^(?:>=|>|===|==|~=|=|\^|~)?\s*v?(\d+(?:\.\d+)*)/;

/**
 * Highest lower bound among the comma-separated clauses of a constraint, or
 * null when it has none. Upper bounds such as `<3.0` and exclusions are ignored.
 */
export function minimumVersion(constraint: string): semver.SemVer | null {
  let floor: semver.SemVer | null = null;
  for (const clause of constraint.split(',')) {
    const match = LOWER_BOUND.exec(clause.trim());
    if (!match) continue;
    const version = semver.coerce(match[1]);
    if (version && (!floor || semver.gt(version, floor))) floor = version;
  }
  return floor;
}

function outranks(candidate: string, current: string): boolean {
  const a = minimumVersion(candidate);
  const b = minimumVersion(current);
  if (!a) return false;
  if (!b) return true;
  return semver.gt(a, b);
}

// ── Merging ─────────────────────────────────────────────────────────

/**
 * Collapses duplicate packages. The entry with the highest minimum version
 * wins and takes the slot of the package's first occurrence; ties keep the
 * earlier entry. A package is runtime if any occurrence is runtime.
 */
export function mergeEntries(ecosystem: Ecosystem, entries: readonly DependencyEntry[]): DependencyEntry[] {
  const slots = new Map<string, DependencyEntry>();
  for (const entry of entries) {
    const key = packageKey(ecosystem, entry.packageName);
    const current = slots.get(key);
    if (!current) {
      slots.set(key, { ...entry });
      continue;
    }
    const winner = outranks(entry.versionConstraint, current.versionConstraint) ? entry : current;
    slots.set(key, {
      packageName: winner.packageName,
      versionConstraint: winner.versionConstraint,
      dependencyKind:
        current.dependencyKind === 'runtime' || entry.dependencyKind === 'runtime' ? 'runtime' : 'dev',
    });
  }
  return [...slots.values()];
}

/**
 * Per-ecosystem dependency lists for every ecosystem whose base runtime is
 * resolved. Components contribute in registry order, then the dependency
 * template.
 */
export function mergeDependencies(spec: ResolvedSpec, registry: Registry): MergedDependencies {
  const template = spec.dependencyTemplate ? registry.template(spec.dependencyTemplate) : undefined;
  const result: Partial<Record<Ecosystem, readonly DependencyEntry[]>> = {};

  for (const eco of ECOSYSTEMS) {
    const runtime = spec.components
      .map((id) => registry.lookup(id))
      .some((c) => c?.category === 'base-runtime' && c.ecosystem === eco);
    if (!runtime) continue;

    const gathered: DependencyEntry[] = [];
    for (const id of spec.components) {
      gathered.push(...(registry.lookup(id)?.dependencies[eco] ?? []));
    }
    gathered.push(...(template?.dependencies[eco] ?? []));
    result[eco] = Object.freeze(mergeEntries(eco, gathered));
  }
  return Object.freeze(result);
}

/**
 * npm scripts contributed by the resolved node components. A base runtime's
 * scripts apply only when it runs standalone.
 */
export function mergeScripts(spec: ResolvedSpec, registry: Registry): Record<string, string> {
  const scripts: Record<string, string> = {};
  for (const id of spec.components) {
    const component = registry.lookup(id);
    if (!component || component.ecosystem !== 'node') continue;
    if (component.category === 'base-runtime' && !isStandaloneRuntime(component, spec.components, registry)) {
      continue;
    }
    Object.assign(scripts, component.scripts);
  }
  return scripts;
}

/** Every script command the catalog can produce; an existing copy may be replaced. */
export function catalogScripts(registry: Registry): ReadonlySet<string> {
  return new Set(registry.all().flatMap((c) => Object.values(c.scripts)));
}

// ── Rendering ───────────────────────────────────────────────────────

export function renderRequirements(entries: readonly DependencyEntry[], projectName: string): string {
  const line = (e: DependencyEntry) => `${e.packageName}${e.versionConstraint}`;
  const runtime = entries.filter((e) => e.dependencyKind === 'runtime').map(line);
  const dev = entries.filter((e) => e.dependencyKind === 'dev').map(line);
  const parts = [`# Python dependencies for ${projectName}`, ...runtime];
  if (dev.length > 0) {
    parts.push('', '# Development', ...dev);
  }
  return parts.join('\n') + '\n';
}

function packageName(projectName: string): string {
  const name = projectName
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[._-]+|[._-]+$/g, '');
  return name || 'app';
}

export function renderPackageJson(
  entries: readonly DependencyEntry[],
  scripts: Readonly<Record<string, string>>,
  projectName: string,
): string {
  const pick = (kind: DependencyEntry['dependencyKind']) =>
    Object.fromEntries(
      entries.filter((e) => e.dependencyKind === kind).map((e) => [e.packageName, e.versionConstraint]),
    );
  const manifest = {
    name: packageName(projectName),
    version: '0.1.0',
    private: true,
    scripts,
    dependencies: pick('runtime'),
    devDependencies: pick('dev'),
  };
  return JSON.stringify(manifest, null, 2) + '\n';
}

// ── Merging into existing manifests ─────────────────────────────────

const DEV_HEADER = /^#\s*development\b/i;
const REQUIREMENT_LINE = /^([A-Za-z0-9][A-Za-z0-9._-]*(?:\[[^\]]*\])?)\s*([^#;]*)/;

interface RequirementLine {
  index: number;
  packageName: string;
  versionConstraint: string;
}

function trimTrailingBlank(lines: string[]): void {
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
}

/**
 * Folds `entries` into an existing requirements.txt. Missing runtime packages
 * go before the development section, missing dev packages after it, and a
 * listed package is rewritten only when an entry raises its minimum version.
 * Returns `existing` untouched when nothing changes.
 */
export function mergeRequirements(existing: string, entries: readonly DependencyEntry[]): string {
  const lines = existing.split('\n');
  trimTrailingBlank(lines);

  const listed = new Map<string, RequirementLine>();
  let devHeader = -1;
  lines.forEach((raw, index) => {
    const text = raw.trim();
    if (DEV_HEADER.test(text)) {
      if (devHeader < 0) devHeader = index;
      return;
    }
    const match = REQUIREMENT_LINE.exec(text);
    if (!match) return;
    const key = packageKey('python', match[1]);
    if (!listed.has(key)) {
      listed.set(key, { index, packageName: match[1], versionConstraint: match[2].trim() });
    }
  });

  const runtime: string[] = [];
  const dev: string[] = [];
  let changed = false;
  for (const entry of entries) {
    const current = listed.get(packageKey('python', entry.packageName));
    if (!current) {
      (entry.dependencyKind === 'runtime' ? runtime : dev).push(`${entry.packageName}${entry.versionConstraint}`);
      changed = true;
    } else if (outranks(entry.versionConstraint, current.versionConstraint)) {
      lines[current.index] = `${current.packageName}${entry.versionConstraint}`;
      changed = true;
    }
  }
  if (!changed) return existing;

  if (devHeader >= 0) {
    let at = devHeader;
    while (at > 0 && lines[at - 1].trim() === '') at--;
    lines.splice(at, 0, ...runtime);
  } else {
    lines.push(...runtime);
  }
  if (dev.length > 0) {
    if (devHeader < 0) lines.push('', '# Development');
    lines.push(...dev);
  }
  return lines.join('\n') + '\n';
}

const PackageJsonSchema = z
  .object({
    scripts: z.record(z.string(), z.string()).optional(),
    dependencies: z.record(z.string(), z.string()).optional(),
    devDependencies: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

/**
 * Folds `entries` and `scripts` into an existing package.json. Packages are
 * added to the section matching their kind or raised in place; a script is
 * set when missing or when its current command is one in `replaceable`.
 * Every other key is kept. Returns `existing` untouched when nothing changes.
 */
export function mergePackageJson(
  existing: string,
  entries: readonly DependencyEntry[],
  scripts: Readonly<Record<string, string>>,
  replaceable: ReadonlySet<string>,
): string {
  const raw: unknown = JSON.parse(existing);
  const record = z.record(z.string(), z.unknown()).safeParse(raw);
  const result = PackageJsonSchema.safeParse(raw);
  if (!record.success || !result.success) {
    throw new Error('package.json is not a manifest object');
  }
  const manifest = result.data;
  const sections = {
    runtime: { ...manifest.dependencies },
    dev: { ...manifest.devDependencies },
  };
  const nextScripts = { ...manifest.scripts };

  const listed = new Map<string, { section: Record<string, string>; name: string }>();
  for (const section of [sections.runtime, sections.dev]) {
    for (const name of Object.keys(section)) {
      const key = packageKey('node', name);
      if (!listed.has(key)) listed.set(key, { section, name });
    }
  }

  let changed = false;
  for (const entry of entries) {
    const current = listed.get(packageKey('node', entry.packageName));
    if (!current) {
      sections[entry.dependencyKind][entry.packageName] = entry.versionConstraint;
      changed = true;
    } else if (outranks(entry.versionConstraint, current.section[current.name])) {
      current.section[current.name] = entry.versionConstraint;
      changed = true;
    }
  }
  for (const [name, command] of Object.entries(scripts)) {
    const current = nextScripts[name];
    if (current === command) continue;
    if (current === undefined || replaceable.has(current)) {
      nextScripts[name] = command;
      changed = true;
    }
  }
  if (!changed) return existing;

  // Spread the untouched record first so existing keys keep their order.
  const merged: Record<string, unknown> = { ...record.data };
  if (manifest.scripts || Object.keys(nextScripts).length > 0) merged.scripts = nextScripts;
  if (manifest.dependencies || Object.keys(sections.runtime).length > 0) merged.dependencies = sections.runtime;
  if (manifest.devDependencies || Object.keys(sections.dev).length > 0) merged.devDependencies = sections.dev;
  return JSON.stringify(merged, null, 2) + '\n';
}
