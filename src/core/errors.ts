export type DotsyncErrorKind =
  | 'EnvLookup'
  | 'UnresolvedCycle'
  | 'MissingDirectory'
  | 'Canonicalize'
  | 'CreateDir'
  | 'Delete'
  | 'Rename'
  | 'Symlink'
  | 'IO'
  | 'ParentConflict'
  | 'Config';

export abstract class DotsyncError extends Error {
  abstract readonly kind: DotsyncErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class EnvLookupError extends DotsyncError {
  readonly kind = 'EnvLookup';

  constructor(public readonly variable: string) {
    super(`Env lookup error, please define '${variable}' in your config env or inherited env.`);
  }
}

export class UnresolvedCycleError extends DotsyncError {
  readonly kind = 'UnresolvedCycle';

  constructor(public readonly keys: string[]) {
    super(`Errors resolving env, do you have cycles? Unresolved env: ${keys.join(', ')}`);
  }
}

export class MissingDirectoryError extends DotsyncError {
  readonly kind = 'MissingDirectory';

  constructor(public readonly label: string, public readonly path: string) {
    super(`${label} directory '${path}' should exist and be a directory.`);
  }
}

export class CanonicalizeError extends DotsyncError {
  readonly kind = 'Canonicalize';

  constructor(public readonly path: string, cause: unknown) {
    super(`Error canonicalizing '${path}'`, cause);
  }
}

export class CreateDirError extends DotsyncError {
  readonly kind = 'CreateDir';

  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to create directory '${path}'`, cause);
  }
}

export class DeleteError extends DotsyncError {
  readonly kind = 'Delete';

  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to delete '${path}'`, cause);
  }
}

export class RenameError extends DotsyncError {
  readonly kind = 'Rename';

  constructor(public readonly from: string, public readonly to: string, cause: unknown) {
    super(`Failed to rename from '${from}' to '${to}'`, cause);
  }
}

export class SymlinkError extends DotsyncError {
  readonly kind = 'Symlink';

  constructor(public readonly from: string, public readonly to: string, cause: unknown) {
    super(`Failed to symlink from '${from}' to '${to}'`, cause);
  }
}

export class IOError extends DotsyncError {
  readonly kind = 'IO';

  constructor(public readonly path: string, cause: unknown) {
    super(`Failure for path '${path}'`, cause);
  }
}

/** mkdir failed, but no file or symlink in the ancestor chain explains why. */
export class ParentConflictError extends DotsyncError {
  readonly kind = 'ParentConflict';

  constructor(public readonly path: string, cause: unknown) {
    super(
      `Failed to create the parent directory '${path}' for the symlink, and none of its parents is a file or symlink that could be moved out of the way.`,
      cause,
    );
  }
}

export class ConfigError extends DotsyncError {
  readonly kind = 'Config';

  constructor(public readonly filepath: string, detail: string) {
    super(`Invalid config in '${filepath}': ${detail}`);
  }
}

export type DotsyncFailure =
  | EnvLookupError
  | UnresolvedCycleError
  | MissingDirectoryError
  | CanonicalizeError
  | CreateDirError
  | DeleteError
  | RenameError
  | SymlinkError
  | IOError
  | ParentConflictError
  | ConfigError;

export function isDotsyncError(err: unknown): err is DotsyncFailure {
  return err instanceof DotsyncError;
}

/** errno code of a Node filesystem error, if any. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
