export const APP_NAME = 'stackcraft';
export const DISPLAY_NAME = 'Stackcraft';
export const DESCRIPTION = 'Scaffolds containerized multi-service prototyping environments';
export const HOME_DIR = '.stackcraft';
export const PROJECT_DIR = '.stackcraft';
export const ENV_PREFIX = 'STACKCRAFT';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
