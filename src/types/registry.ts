import type { Category, Ecosystem, VersionKey } from '../config/schema.js';

export type DependencyKind = 'runtime' | 'dev';

export interface DependencyEntry {
  packageName: string;
  versionConstraint: string;
  dependencyKind: DependencyKind;
}

export type DependencyManifest = Readonly<Partial<Record<Ecosystem, readonly DependencyEntry[]>>>;

export interface ServiceDeclaration {
  name: string;
  defaultPort: number;
  containerPort: number;
  image: string | null;
  build: string | null;
  command: string | null;
  volumes: readonly string[];
  namedVolumes: readonly string[];
  dependsOn: readonly string[];
  environment: Readonly<Record<string, string>>;
  /** Variables for `.env.example`, rendered with the assigned host port. */
  connection: Readonly<Record<string, string>>;
}

export interface DevcontainerHints {
  extensions: readonly string[];
  mounts: readonly string[];
}

export interface Component {
  id: string;
  description: string;
  category: Category;
  ecosystem: Ecosystem | null;
  isDefaultRuntime: boolean;
  implies: readonly string[];
  conflicts: readonly string[];
  dependencies: DependencyManifest;
  versionKey: VersionKey | null;
  service: ServiceDeclaration | null;
  devcontainer: DevcontainerHints;
  scripts: Readonly<Record<string, string>>;
}

export interface Profile {
  name: string;
  description: string;
  components: readonly string[];
  template: string | null;
}

export interface DependencyTemplate {
  id: string;
  description: string;
  dependencies: DependencyManifest;
}
