export * from './errors.js';
export * from './userdata.js';

export { Registry, loadCatalog, defaultCatalogDir, parseRequirement } from './registry.js';
export { resolveVersion, validateVersion, DEFAULT_VERSIONS } from './versions.js';
export { resolveSpec, implicationClosure, findConflict, isStandaloneRuntime } from './resolver.js';
export {
  mergeDependencies,
  mergeEntries,
  mergeScripts,
  renderRequirements,
  renderPackageJson,
  type MergedDependencies,
} from './dependencies.js';
export { StagedTree, RESERVED_PATHS, type StagedFile, type FileClaim } from './staging.js';
export { bindGenerators, generateTree } from './generator.js';
export { commit, type CommitIO, type CommitOptions, type CommitReport } from './commit.js';
export { acquireLock, lockPath } from './lock.js';
export { loadProject, isProject, type LoadedProject } from './project.js';
export { gitInitializer, type VcsInitializer } from './vcs.js';
export { runEngine, type EngineContext, type EngineOutcome } from './engine.js';
