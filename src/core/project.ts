import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { ProjectStateSchema, type ProjectState } from '../config/schema.js';
import type { ExistingProject } from '../types/spec.js';
import { ResolutionError, errorMessage } from './errors.js';
import { COMPOSE_FILE, hostPorts, parseCompose } from './compose.js';
import { projectStatePath } from './userdata.js';
import { fileExists } from '../utils/fs.js';

// ── Project state ───────────────────────────────────────────────────

export interface LoadedProject {
  state: ProjectState;
  existing: ExistingProject;
}

export function isProject(projectPath: string): boolean {
  return fileExists(projectStatePath(projectPath));
}

export function parseProjectState(raw: string, source: string): ProjectState {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ResolutionError(`Unreadable project state ${source}: ${errorMessage(err)}`);
  }
  const result = ProjectStateSchema.safeParse(data);
  if (!result.success) {
    throw new ResolutionError(`Invalid project state ${source}: ${result.error.issues[0].message}`);
  }
  return result.data;
}

export function renderProjectState(state: ProjectState): string {
  return yaml.dump(state, { lineWidth: -1, sortKeys: false });
}

/**
 * Reads the project at `projectPath`, or returns null when it has no state
 * file. Host ports already bound in its orchestration file are reported as
 * reserved.
 */
export function loadProject(projectPath: string): LoadedProject | null {
  const statePath = projectStatePath(projectPath);
  if (!fileExists(statePath)) return null;
  const state = parseProjectState(readFileSync(statePath, 'utf-8'), statePath);

  let reservedPorts: number[] = [];
  const composePath = join(projectPath, COMPOSE_FILE);
  if (fileExists(composePath)) {
    try {
      reservedPorts = hostPorts(parseCompose(readFileSync(composePath, 'utf-8')));
    } catch (err) {
      throw new ResolutionError(`Invalid ${COMPOSE_FILE}: ${errorMessage(err)}`);
    }
  }

  return {
    state,
    existing: {
      components: state.components,
      ports: state.ports,
      reservedPorts,
    },
  };
}
