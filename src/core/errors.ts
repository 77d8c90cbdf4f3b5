export type ErrorCode =
  | 'REGISTRY_ERROR'
  | 'RESOLUTION_ERROR'
  | 'GENERATION_ERROR'
  | 'COMMIT_ERROR';

export class StackcraftError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'StackcraftError';
    this.code = code;
  }
}

/**
 * Catalog could not be loaded. Fatal: nothing can be resolved without it.
 */
export class RegistryError extends StackcraftError {
  readonly file: string | null;

  constructor(message: string, file: string | null = null) {
    super(file ? `${message} (${file})` : message, 'REGISTRY_ERROR');
    this.name = 'RegistryError';
    this.file = file;
  }
}

/**
 * The selection cannot be turned into a valid spec. The caller may re-prompt.
 */
export class ResolutionError extends StackcraftError {
  readonly reason: string;
  readonly componentIds: readonly string[];

  constructor(reason: string, componentIds: readonly string[] = []) {
    super(reason, 'RESOLUTION_ERROR');
    this.name = 'ResolutionError';
    this.reason = reason;
    this.componentIds = [...componentIds];
  }
}

/**
 * Generators disagree about the tree. Indicates a catalog or generator defect.
 */
export class GenerationError extends StackcraftError {
  readonly reason: string;
  readonly paths: readonly string[];

  constructor(reason: string, paths: readonly string[] = []) {
    super(paths.length ? `${reason}: ${paths.join(', ')}` : reason, 'GENERATION_ERROR');
    this.name = 'GenerationError';
    this.reason = reason;
    this.paths = [...paths];
  }
}

export class CommitError extends StackcraftError {
  readonly reason: string;

  constructor(reason: string) {
    super(reason, 'COMMIT_ERROR');
    this.name = 'CommitError';
    this.reason = reason;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
