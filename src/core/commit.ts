import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmSync,
  rmdirSync,
  statSync,
  writeFileSync,
  renameSync,
} from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import type { Mode } from '../types/spec.js';
import { APP_NAME } from '../config/branding.js';
import { CommitError, StackcraftError, errorMessage } from './errors.js';
import { COMPOSE_FILE, buildCompose, mergeCompose, parseCompose, renderCompose } from './compose.js';
import { DEVCONTAINER_FILE, buildDevcontainer, mergeDevcontainer } from './devcontainer.js';
import { renderProjectState } from './project.js';
import { FILE_MODE, type StagedTree } from './staging.js';
import { PROJECT_STATE_PATH } from './userdata.js';
import { dirExists, fileExists, isEmptyDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

// ── Types ───────────────────────────────────────────────────────────

/** Filesystem primitives the controller writes through. */
export interface CommitIO {
  writeFile(path: string, content: string, mode: number): void;
  rename(from: string, to: string): void;
}

export interface CommitOptions {
  io?: Partial<CommitIO>;
}

export interface CommitReport {
  /** Files created, or rewritten in full. */
  written: string[];
  /** Existing exclusive files left as they were. */
  preserved: string[];
  /** Existing mergeable files rewritten with new entries. */
  merged: string[];
  /** Existing mergeable files that needed no change. */
  unchanged: string[];
}

interface OutputFile {
  path: string;
  content: string;
  mode: number;
}

const defaultIO: CommitIO = {
  writeFile(path, content, mode) {
    writeFileSync(path, content, { encoding: 'utf-8', mode });
  },
  rename(from, to) {
    renameSync(from, to);
  },
};

// ── Shared ──────────────────────────────────────────────────────────

function writeVerified(io: CommitIO, root: string, file: OutputFile): void {
  const abs = join(root, file.path);
  io.writeFile(abs, file.content, file.mode);
  const expected = Buffer.byteLength(file.content, 'utf-8');
  const actual = statSync(abs).size;
  if (actual !== expected) {
    throw new CommitError(`Short write for ${file.path}: ${actual} of ${expected} bytes`);
  }
}

function asCommitError(err: unknown): StackcraftError {
  if (err instanceof StackcraftError) return err;
  return new CommitError(errorMessage(err));
}

/** Everything a fresh project consists of. */
function freshOutputs(tree: StagedTree): OutputFile[] {
  const outputs: OutputFile[] = tree.files().map(({ path, content, mode }) => ({ path, content, mode }));
  const compose = tree.compose();
  if (compose.services.length > 0) {
    outputs.push({ path: COMPOSE_FILE, content: renderCompose(buildCompose(compose)), mode: FILE_MODE });
  }
  outputs.push({
    path: DEVCONTAINER_FILE,
    content: buildDevcontainer(tree.projectName, tree.devcontainer()),
    mode: FILE_MODE,
  });
  if (tree.state) {
    outputs.push({ path: PROJECT_STATE_PATH, content: renderProjectState(tree.state), mode: FILE_MODE });
  }
  return outputs;
}

// ── Create ──────────────────────────────────────────────────────────

function commitCreate(tree: StagedTree, targetDir: string, io: CommitIO): CommitReport {
  const target = resolve(targetDir);
  let replaceEmpty = false;
  if (existsSync(target)) {
    if (!dirExists(target)) throw new CommitError(`${target} exists and is not a directory`);
    if (!isEmptyDir(target)) throw new CommitError(`${target} already exists and is not empty`);
    replaceEmpty = true;
  }

  const parent = dirname(target);
  mkdirSync(parent, { recursive: true });
  const staging = join(parent, `.${basename(target)}.${APP_NAME}-${process.pid}-${Date.now()}`);
  const outputs = freshOutputs(tree);

  let removedEmpty = false;
  try {
    mkdirSync(staging);
    for (const file of outputs) {
      mkdirSync(dirname(join(staging, file.path)), { recursive: true });
      writeVerified(io, staging, file);
    }
    if (replaceEmpty) {
      rmdirSync(target);
      removedEmpty = true;
    }
    io.rename(staging, target);
  } catch (err) {
    rmSync(staging, { recursive: true, force: true });
    if (removedEmpty && !existsSync(target)) mkdirSync(target);
    logger.debug('Create commit rolled back', { target, error: errorMessage(err) });
    throw asCommitError(err);
  }

  return { written: outputs.map((f) => f.path).sort(), preserved: [], merged: [], unchanged: [] };
}

// ── Add ─────────────────────────────────────────────────────────────

interface Snapshot {
  content: Buffer;
  mode: number;
}

interface AddPlan {
  writes: OutputFile[];
  report: CommitReport;
}

function planMergeable(
  root: string,
  path: string,
  fresh: () => string | null,
  merge: (existing: string) => string,
  plan: AddPlan,
  mode = FILE_MODE,
): void {
  const abs = join(root, path);
  if (!fileExists(abs)) {
    const content = fresh();
    if (content !== null) {
      plan.writes.push({ path, content, mode });
      plan.report.written.push(path);
    }
    return;
  }
  const existing = readFileSync(abs, 'utf-8');
  let next: string;
  try {
    next = merge(existing);
  } catch (err) {
    throw new CommitError(`Cannot merge ${path}: ${errorMessage(err)}`);
  }
  if (next === existing) {
    plan.report.unchanged.push(path);
    return;
  }
  plan.writes.push({ path, content: next, mode: statSync(abs).mode & 0o777 });
  plan.report.merged.push(path);
}

function planAdd(tree: StagedTree, root: string): AddPlan {
  const plan: AddPlan = { writes: [], report: { written: [], preserved: [], merged: [], unchanged: [] } };

  for (const file of tree.files()) {
    if (file.merge) {
      planMergeable(root, file.path, () => file.content, file.merge, plan, file.mode);
      continue;
    }
    if (existsSync(join(root, file.path))) {
      plan.report.preserved.push(file.path);
      continue;
    }
    plan.writes.push({ path: file.path, content: file.content, mode: file.mode });
    plan.report.written.push(file.path);
  }

  const compose = tree.compose();
  planMergeable(
    root,
    COMPOSE_FILE,
    () => (compose.services.length > 0 ? renderCompose(buildCompose(compose)) : null),
    (existing) => {
      if (compose.services.length === 0 && compose.volumes.length === 0) return existing;
      return renderCompose(mergeCompose(parseCompose(existing), compose));
    },
    plan,
  );

  const devcontainer = tree.devcontainer();
  planMergeable(
    root,
    DEVCONTAINER_FILE,
    () => buildDevcontainer(tree.projectName, devcontainer),
    (existing) => mergeDevcontainer(existing, devcontainer),
    plan,
  );

  const state = tree.state;
  if (state) {
    const content = renderProjectState(state);
    planMergeable(root, PROJECT_STATE_PATH, () => content, () => content, plan);
  }

  for (const list of Object.values(plan.report)) list.sort();
  return plan;
}

/** Creates the missing ancestors of `dir` below `root`, returning them deepest first. */
function ensureParents(root: string, dir: string): string[] {
  const created: string[] = [];
  let current = dir;
  while (current !== root && current.startsWith(root) && !existsSync(current)) {
    created.push(current);
    current = dirname(current);
  }
  for (const d of [...created].reverse()) mkdirSync(d);
  return created;
}

function rollbackAdd(
  root: string,
  snapshots: ReadonlyMap<string, Snapshot>,
  createdFiles: readonly string[],
  createdDirs: readonly string[],
): void {
  for (const [path, snapshot] of snapshots) {
    writeFileSync(join(root, path), snapshot.content, { mode: snapshot.mode });
  }
  for (const path of createdFiles) {
    rmSync(join(root, path), { force: true });
  }
  for (const dir of createdDirs) {
    if (existsSync(dir) && readdirSync(dir).length === 0) rmdirSync(dir);
  }
}

function commitAdd(tree: StagedTree, targetDir: string, io: CommitIO): CommitReport {
  const root = resolve(targetDir);
  if (!dirExists(root)) throw new CommitError(`${root} is not a directory`);

  const { writes, report } = planAdd(tree, root);

  const snapshots = new Map<string, Snapshot>();
  for (const file of writes) {
    const abs = join(root, file.path);
    if (fileExists(abs)) {
      snapshots.set(file.path, { content: readFileSync(abs), mode: statSync(abs).mode & 0o777 });
    }
  }

  const createdFiles: string[] = [];
  const createdDirs: string[] = [];
  try {
    for (const file of writes) {
      createdDirs.unshift(...ensureParents(root, dirname(join(root, file.path))));
      if (!snapshots.has(file.path)) createdFiles.push(file.path);
      writeVerified(io, root, file);
    }
  } catch (err) {
    logger.debug('Add commit rolling back', { target: root, error: errorMessage(err) });
    try {
      rollbackAdd(root, snapshots, createdFiles, createdDirs);
    } catch (rollbackErr) {
      throw new CommitError(
        `${errorMessage(err)}; rollback incomplete: ${errorMessage(rollbackErr)}`,
      );
    }
    throw asCommitError(err);
  }
  return report;
}

// ── Entry point ─────────────────────────────────────────────────────

/**
 * Promotes a staged tree into `targetDir`. Either every file lands or the
 * target is left as it was.
 */
export function commit(
  tree: StagedTree,
  mode: Mode,
  targetDir: string,
  options: CommitOptions = {},
): CommitReport {
  const io: CommitIO = { ...defaultIO, ...options.io };
  let report: CommitReport;
  try {
    report = mode === 'create' ? commitCreate(tree, targetDir, io) : commitAdd(tree, targetDir, io);
  } catch (err) {
    throw asCommitError(err);
  }
  logger.debug('Committed', {
    mode,
    written: report.written.length,
    preserved: report.preserved.length,
    merged: report.merged.length,
  });
  return report;
}
