import { posix } from 'node:path';
import type { ProjectState } from '../config/schema.js';
import { GenerationError } from './errors.js';
import { COMPOSE_FILE, type ComposeContribution, type ComposeService } from './compose.js';
import { DEVCONTAINER_FILE, type DevcontainerContribution } from './devcontainer.js';
import { PROJECT_STATE_PATH } from './userdata.js';

export const FILE_MODE = 0o644;
export const EXECUTABLE_MODE = 0o755;

/** Folds staged content into a file that already exists in the target. */
export type MergeFn = (existing: string) => string;

export interface StagedFile {
  path: string;
  content: string;
  mode: number;
  owner: string;
  merge?: MergeFn;
  /** Warning reported when an existing copy is preserved instead of written. */
  preserveNote?: string;
}

export interface FileClaim {
  path: string;
  content: string;
  mode?: number;
  /** Makes the file mergeable in add mode instead of exclusive. */
  merge?: MergeFn;
  preserveNote?: string;
}

/** Paths only the engine's merge steps or the commit may write. */
export const RESERVED_PATHS: readonly string[] = [COMPOSE_FILE, DEVCONTAINER_FILE, PROJECT_STATE_PATH];

interface Problem {
  reason: string;
  path: string;
}

export function normalizeStagedPath(raw: string): string | null {
  const path = posix.normalize(raw.replace(/\\/g, '/'));
  if (path === '.' || path === '' || path.startsWith('/') || path === '..' || path.startsWith('../')) {
    return null;
  }
  return path.endsWith('/') ? null : path;
}

/**
 * In-memory project tree. Exclusive files are keyed by normalized path; the
 * orchestration file and container descriptor are held as structured
 * contributions and rendered at commit time.
 */
export class StagedTree {
  readonly projectName: string;
  private readonly entries = new Map<string, StagedFile>();
  private readonly services = new Map<string, { owner: string; definition: ComposeService }>();
  private readonly volumes = new Set<string>();
  private readonly forwardPorts: number[] = [];
  private readonly mounts: string[] = [];
  private readonly extensions: string[] = [];
  private readonly problems: Problem[] = [];
  private readonly notes: string[] = [];
  private projectState: ProjectState | null = null;

  constructor(projectName: string) {
    this.projectName = projectName;
  }

  /** Records an exclusive file. Problems are collected and raised by `seal()`. */
  claim(owner: string, file: FileClaim): void {
    const path = normalizeStagedPath(file.path);
    if (path === null) {
      this.problems.push({ reason: 'Paths outside the project', path: file.path });
      return;
    }
    if (RESERVED_PATHS.includes(path)) {
      this.problems.push({ reason: `Reserved paths claimed by ${owner}`, path });
      return;
    }
    const current = this.entries.get(path);
    if (current) {
      this.problems.push({
        reason: `Conflicting paths claimed by ${current.owner} and ${owner}`,
        path,
      });
      return;
    }
    this.entries.set(path, {
      path,
      content: file.content,
      mode: file.mode ?? FILE_MODE,
      owner,
      ...(file.merge ? { merge: file.merge } : {}),
      ...(file.preserveNote ? { preserveNote: file.preserveNote } : {}),
    });
  }

  /** Records something the user has to follow up on by hand. */
  warn(message: string): void {
    if (!this.notes.includes(message)) this.notes.push(message);
  }

  warnings(): string[] {
    return [...this.notes];
  }

  addService(owner: string, name: string, definition: ComposeService, namedVolumes: readonly string[] = []): void {
    const current = this.services.get(name);
    if (current) {
      this.problems.push({
        reason: `Duplicate service "${name}" from ${current.owner} and ${owner}`,
        path: COMPOSE_FILE,
      });
      return;
    }
    this.services.set(name, { owner, definition });
    for (const volume of namedVolumes) this.volumes.add(volume);
  }

  contributeDevcontainer(hints: Partial<DevcontainerContribution>): void {
    const push = <T>(target: T[], items: readonly T[] = []) => {
      for (const item of items) if (!target.includes(item)) target.push(item);
    };
    push(this.forwardPorts, hints.forwardPorts);
    push(this.mounts, hints.mounts);
    push(this.extensions, hints.extensions);
  }

  setState(state: ProjectState): void {
    this.projectState = state;
  }

  /** Throws a GenerationError for the first kind of problem recorded. */
  seal(): this {
    if (this.problems.length > 0) {
      const reason = this.problems[0].reason;
      const paths = this.problems.filter((p) => p.reason === reason).map((p) => p.path);
      throw new GenerationError(reason, paths);
    }
    return this;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get(path: string): StagedFile | undefined {
    return this.entries.get(path);
  }

  /** Exclusive files sorted by path. */
  files(): StagedFile[] {
    return [...this.entries.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  serviceNames(): string[] {
    return [...this.services.keys()];
  }

  compose(): ComposeContribution {
    return {
      services: [...this.services].map(([name, { definition }]) => ({ name, definition })),
      volumes: [...this.volumes],
    };
  }

  devcontainer(): DevcontainerContribution {
    return {
      forwardPorts: [...this.forwardPorts],
      mounts: [...this.mounts],
      extensions: [...this.extensions],
    };
  }

  get state(): ProjectState | null {
    return this.projectState;
  }

  /** Every path the commit would touch, sorted. */
  paths(): string[] {
    const paths = this.files().map((f) => f.path);
    if (this.services.size > 0) paths.push(COMPOSE_FILE);
    paths.push(DEVCONTAINER_FILE);
    if (this.projectState) paths.push(PROJECT_STATE_PATH);
    return paths.sort();
  }
}
