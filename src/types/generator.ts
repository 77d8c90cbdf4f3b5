import type { Registry } from '../core/registry.js';
import type { ScaffoldData } from '../core/scaffold.js';
import type { FileClaim } from '../core/staging.js';
import type { Component } from './registry.js';
import type { ResolvedSpec } from './spec.js';

/** Where a component's files live, relative to the project root. */
export interface ComponentPaths {
  dir: string;
  join(...segments: string[]): string;
}

export interface GeneratorContext {
  spec: ResolvedSpec;
  component: Component;
  registry: Registry;
  paths: ComponentPaths;
  data: ScaffoldData;
  /** True for a base runtime when no framework of its ecosystem is resolved. */
  standalone: boolean;
}

/**
 * Produces the exclusive files of one component. Must be pure: the same
 * context always yields the same files.
 */
export interface ComponentGenerator {
  generate(ctx: GeneratorContext): FileClaim[];
  /** Files a base runtime writes only while it runs standalone. */
  standaloneFiles?: readonly string[];
}

export type GeneratorTable = Readonly<Record<string, ComponentGenerator>>;
