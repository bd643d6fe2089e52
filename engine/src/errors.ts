/**
 * Error types for the revert engine
 *
 * Expected revert outcomes are reported as statuses; these errors cover
 * failures of the collaborators themselves (git, the file store, the schema
 * registry, configuration).
 */

/**
 * Base class for all revertguard errors
 */
export class RevertGuardError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = "RevertGuardError";
    Object.setPrototypeOf(this, RevertGuardError.prototype);
  }
}

/**
 * A git invocation exited with a failure
 */
export class GitCommandError extends RevertGuardError {
  constructor(
    message: string,
    public readonly args: readonly string[],
    public readonly exitStatus: number | null,
    public readonly stderr: string
  ) {
    super(message, "GIT_COMMAND_ERROR");
    this.name = "GitCommandError";
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * An entity file could not be read or written
 */
export class StorageError extends RevertGuardError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message, "STORAGE_ERROR");
    this.name = "StorageError";
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

/**
 * Unknown entity type or malformed schema file
 */
export class SchemaError extends RevertGuardError {
  constructor(
    message: string,
    public readonly entityName?: string
  ) {
    super(message, "SCHEMA_ERROR");
    this.name = "SchemaError";
    Object.setPrototypeOf(this, SchemaError.prototype);
  }
}

export class ConfigurationError extends RevertGuardError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function isRevertGuardError(error: unknown): error is RevertGuardError {
  return error instanceof RevertGuardError;
}

export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}
