import { Option, type Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { VERSION_KEYS, type FeatureFlag, type SelectionInput, type VersionKey } from '../config/schema.js';
import { loadSettings, type Settings } from '../config/settings.js';
import type { GeneratorTable } from '../types/generator.js';
import type { EngineOutcome } from '../core/engine.js';
import { bindGenerators } from '../core/generator.js';
import { loadCatalog, type Registry } from '../core/registry.js';
import { getConfigPath } from '../core/userdata.js';
import { GENERATORS } from '../generators/index.js';
import { ok, fail, warn, info, heading, list } from '../ui/output.js';

// ── Exit codes ──────────────────────────────────────────────────────

export const EXIT_RESOLUTION = 2;
export const EXIT_GENERATION = 3;
export const EXIT_COMMIT = 4;

// ── Runtime ─────────────────────────────────────────────────────────

export interface Runtime {
  registry: Registry;
  generators: GeneratorTable;
  settings: Settings;
}

/** Loads the catalog and settings. Throws RegistryError on a broken catalog. */
export function loadRuntime(): Runtime {
  const registry = loadCatalog();
  return {
    registry,
    generators: bindGenerators(registry, GENERATORS),
    settings: loadSettings(getConfigPath()),
  };
}

// ── Selection options ───────────────────────────────────────────────

export interface SelectionFlags {
  components: Map<string, string>;
  versions: Map<VersionKey, string>;
}

function versionFlag(key: VersionKey): string {
  return `--${key.replace(/_/g, '-')} <version>`;
}

/** Adds one flag per catalog component plus the version, profile and feature flags. */
export function addSelectionOptions(cmd: Command, registry: Registry): SelectionFlags {
  const components = new Map<string, string>();
  for (const c of registry.all()) {
    const option = new Option(`--${c.id}`, c.description);
    cmd.addOption(option);
    components.set(c.id, option.attributeName());
  }
  const versions = new Map<VersionKey, string>();
  for (const key of VERSION_KEYS) {
    const option = new Option(versionFlag(key), `Override ${key}`);
    cmd.addOption(option);
    versions.set(key, option.attributeName());
  }
  cmd
    .option('-p, --profile <name>', 'Start from a named profile')
    .option('-t, --template <id>', 'Dependency template to merge in')
    .option('--with-deps', 'Also write dependency install scripts')
    .option('--with-examples', 'Also write example code for each component')
    .option('--no-git', 'Skip git repository initialization')
    .option('--dry-run', 'Resolve and stage without writing anything');
  return { components, versions };
}

const CommonOptionsSchema = z
  .object({
    profile: z.string().optional(),
    template: z.string().optional(),
    withDeps: z.boolean().optional(),
    withExamples: z.boolean().optional(),
    git: z.boolean().optional(),
    dryRun: z.boolean().optional(),
  })
  .passthrough();

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;

export function parseCommonOptions(opts: unknown): CommonOptions {
  return CommonOptionsSchema.parse(opts);
}

export function selectionFromOptions(
  opts: Record<string, unknown>,
  flags: SelectionFlags,
  base: Pick<SelectionInput, 'targetDir' | 'mode' | 'projectName'>,
): SelectionInput {
  const common = parseCommonOptions(opts);
  const components = [...flags.components].filter(([, attr]) => opts[attr] === true).map(([id]) => id);

  const versionOverrides: Record<string, string> = {};
  for (const [key, attr] of flags.versions) {
    const value = opts[attr];
    if (typeof value === 'string') versionOverrides[key] = value;
  }

  const features: FeatureFlag[] = [];
  if (common.withDeps) features.push('with-deps');
  if (common.withExamples) features.push('with-examples');
  if (common.git === false) features.push('no-git');

  return {
    ...base,
    components,
    profile: common.profile,
    template: common.template,
    versionOverrides,
    features,
  };
}

// ── Outcome ─────────────────────────────────────────────────────────

/** Prints an engine outcome and returns the process exit code. */
export function reportOutcome(outcome: EngineOutcome, dryRun: boolean): number {
  switch (outcome.kind) {
    case 'success': {
      const { spec, report } = outcome;
      if (dryRun || !report) {
        info(`Dry run for ${spec.projectName}: ${spec.components.join(', ')}`);
        list(outcome.staged);
        return 0;
      }
      ok(
        spec.mode === 'create'
          ? `Created ${spec.projectName} at ${spec.targetDir}`
          : `Added ${spec.added.length > 0 ? spec.added.join(', ') : 'nothing new'} to ${spec.projectName}`,
      );
      console.log(`  ${chalk.dim('components:')} ${spec.components.join(', ')}`);
      if (report.written.length > 0) {
        heading('Written');
        list(report.written);
      }
      if (report.merged.length > 0) {
        heading('Merged');
        list(report.merged);
      }
      for (const message of outcome.warnings) warn(message);
      return 0;
    }
    case 'resolution-error':
      fail(outcome.reason);
      return EXIT_RESOLUTION;
    case 'generation-error':
      fail(`${outcome.reason}${outcome.paths.length > 0 ? `: ${outcome.paths.join(', ')}` : ''}`);
      return EXIT_GENERATION;
    case 'commit-error':
      fail(outcome.reason);
      return EXIT_COMMIT;
  }
}
