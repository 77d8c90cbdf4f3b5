import { mkdirSync, rmdirSync, existsSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { APP_NAME } from '../config/branding.js';
import { CommitError, errorMessage } from './errors.js';
import { logger } from '../utils/logger.js';

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export interface ProjectLock {
  readonly path: string;
  release(): void;
}

/** Lock directory beside the target, so a not-yet-created target can be locked. */
export function lockPath(targetDir: string): string {
  const target = resolve(targetDir);
  return join(dirname(target), `.${basename(target)}.${APP_NAME}.lock`);
}

/**
 * Advisory lock on a target directory. `mkdir` is atomic, so a second
 * invocation against the same target fails instead of interleaving writes.
 */
export function acquireLock(targetDir: string): ProjectLock {
  const path = lockPath(targetDir);
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (err) {
    throw new CommitError(`Cannot lock ${resolve(targetDir)}: ${errorMessage(err)}`);
  }
  try {
    mkdirSync(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') {
      throw new CommitError(`Another invocation is working on ${resolve(targetDir)} (lock ${path})`);
    }
    throw new CommitError(`Cannot lock ${resolve(targetDir)}: ${errorMessage(err)}`);
  }
  logger.debug('Lock acquired', { path });

  let held = true;
  return {
    path,
    release() {
      if (!held) return;
      held = false;
      try {
        if (existsSync(path)) rmdirSync(path);
        logger.debug('Lock released', { path });
      } catch (err) {
        logger.warn('Failed to release lock', { path, error: errorMessage(err) });
      }
    },
  };
}
