import type { FeatureFlag, VersionKey } from '../config/schema.js';

export type Mode = 'create' | 'add';

export interface ExistingProject {
  components: readonly string[];
  ports: Readonly<Record<string, number>>;
  /** Host ports already bound by services in the project's orchestration file. */
  reservedPorts: readonly number[];
}

/**
 * Canonical output of resolution. Built once per invocation and frozen.
 */
export interface ResolvedSpec {
  projectName: string;
  targetDir: string;
  mode: Mode;
  /** Implication-closed component ids in registry order. */
  components: readonly string[];
  /** Components new to the target; equal to `components` in create mode. */
  added: readonly string[];
  versions: Readonly<Partial<Record<VersionKey, string>>>;
  /** Distinct feature flags in selection order. */
  features: readonly FeatureFlag[];
  dependencyTemplate: string | null;
  profile: string | null;
  existing: ExistingProject;
}

export const EMPTY_PROJECT: ExistingProject = {
  components: [],
  ports: {},
  reservedPorts: [],
};
