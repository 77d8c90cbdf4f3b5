import { resolve } from 'node:path';
import type { SelectionInput } from '../config/schema.js';
import type { Settings } from '../config/settings.js';
import type { GeneratorTable } from '../types/generator.js';
import type { ResolvedSpec } from '../types/spec.js';
import { CommitError, GenerationError, ResolutionError, errorMessage } from './errors.js';
import type { Registry } from './registry.js';
import { resolveSpec } from './resolver.js';
import { mergeDependencies, type MergedDependencies } from './dependencies.js';
import { generateTree } from './generator.js';
import { commit, type CommitOptions, type CommitReport } from './commit.js';
import { acquireLock } from './lock.js';
import { loadProject } from './project.js';
import type { VcsInitializer } from './vcs.js';
import { logger } from '../utils/logger.js';

export interface EngineContext {
  registry: Registry;
  generators: GeneratorTable;
  settings?: Settings;
  /** Stop after staging and report what would be written. */
  dryRun?: boolean;
  vcs?: VcsInitializer;
  commit?: CommitOptions;
}

export type EngineOutcome =
  | {
      kind: 'success';
      spec: ResolvedSpec;
      dependencies: MergedDependencies;
      report: CommitReport | null;
      /** Paths the commit touches, or would touch in a dry run. */
      staged: string[];
      warnings: string[];
    }
  | { kind: 'resolution-error'; reason: string; componentIds: readonly string[] }
  | { kind: 'generation-error'; reason: string; paths: readonly string[] }
  | { kind: 'commit-error'; reason: string };

/**
 * Runs one invocation: resolve, merge, stage, commit. Expected failures come
 * back as outcomes; a RegistryError or a programming error is thrown.
 */
export async function runEngine(selection: SelectionInput, context: EngineContext): Promise<EngineOutcome> {
  const { registry, generators } = context;
  const targetDir = resolve(selection.targetDir);
  let lock: ReturnType<typeof acquireLock> | null = null;

  try {
    if (!context.dryRun) lock = acquireLock(targetDir);

    const project = selection.mode === 'add' ? loadProject(targetDir) : null;
    const spec = resolveSpec({ ...selection, targetDir }, registry, { settings: context.settings, project });
    const dependencies = mergeDependencies(spec, registry);
    const tree = generateTree(spec, dependencies, registry, generators);
    const staged = tree.paths();

    if (context.dryRun) {
      return { kind: 'success', spec, dependencies, report: null, staged, warnings: tree.warnings() };
    }

    const report = commit(tree, spec.mode, spec.targetDir, context.commit);
    const warnings = [
      ...report.preserved.map((p) => tree.get(p)?.preserveNote ?? `Preserved existing ${p}, not overwritten`),
      ...tree.warnings(),
    ];

    if (spec.mode === 'create' && !spec.features.includes('no-git') && context.vcs) {
      try {
        await context.vcs.init(spec.targetDir);
      } catch (err) {
        warnings.push(`Git initialization failed: ${errorMessage(err)}`);
      }
    }
    return { kind: 'success', spec, dependencies, report, staged, warnings };
  } catch (err) {
    if (err instanceof ResolutionError) {
      logger.debug('Resolution failed', { reason: err.reason, components: err.componentIds });
      return { kind: 'resolution-error', reason: err.reason, componentIds: err.componentIds };
    }
    if (err instanceof GenerationError) {
      logger.debug('Generation failed', { reason: err.reason, paths: err.paths });
      return { kind: 'generation-error', reason: err.reason, paths: err.paths };
    }
    if (err instanceof CommitError) {
      logger.debug('Commit failed', { reason: err.reason });
      return { kind: 'commit-error', reason: err.reason };
    }
    throw err;
  } finally {
    lock?.release();
  }
}
