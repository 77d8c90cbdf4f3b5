import { homedir } from 'node:os';
import { join } from 'node:path';
import { HOME_DIR, PROJECT_DIR, envVar } from '../config/branding.js';

// ── Directory constants ─────────────────────────────────────────────

const CONFIG_FILE = 'config.yaml';
const PROJECT_FILE = 'project.yaml';

// ── Path resolution ─────────────────────────────────────────────────

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return join(getHomeRoot(), CONFIG_FILE);
}

/** Project state path relative to the project root, in posix form. */
export const PROJECT_STATE_PATH = `${PROJECT_DIR}/${PROJECT_FILE}`;

export function projectStatePath(projectPath: string): string {
  return join(projectPath, PROJECT_DIR, PROJECT_FILE);
}
