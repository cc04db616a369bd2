/**
 * Reposnap Error Codes
 */
export const ErrorCodes = {
  GIT_FAILED: 'GIT_FAILED',
  COUNTER_INVALID: 'COUNTER_INVALID',
  COUNTER_LOCKED: 'COUNTER_LOCKED',
  ARCHIVE_FAILED: 'ARCHIVE_FAILED',
  CONFIG_INVALID: 'CONFIG_INVALID',
  DEP_MISSING: 'DEP_MISSING',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for reposnap errors
 */
export class ReposnapError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'ReposnapError';
  }
}

/**
 * Error: A required git invocation failed or could not be started
 */
export class GitCommandError extends ReposnapError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.GIT_FAILED,
      `git ${command} failed${exitCode === null ? '' : ` (exit ${exitCode})`}: ${stderr.trim() || 'no output'}`,
      hint,
    );
    this.name = 'GitCommandError';
  }
}

/**
 * Error: Counter file holds something other than a non-negative integer
 */
export class CounterFileError extends ReposnapError {
  constructor(
    public readonly counterPath: string,
    public readonly content: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.COUNTER_INVALID,
      `Counter file does not hold a non-negative integer: ${counterPath} (found "${content}")`,
      hint ?? 'Fix or remove the counter file and run again',
    );
    this.name = 'CounterFileError';
  }
}

/**
 * Error: Another run holds the counter lock
 */
export class CounterLockedError extends ReposnapError {
  constructor(public readonly lockPath: string, hint?: string) {
    super(
      ErrorCodes.COUNTER_LOCKED,
      `Counter is locked by another run: ${lockPath}`,
      hint ?? 'Wait for the other run to finish, or remove a stale lock file',
    );
    this.name = 'CounterLockedError';
  }
}

export class ArchiveError extends ReposnapError {
  constructor(
    public readonly archivePath: string,
    reason: string,
    hint?: string,
  ) {
    super(ErrorCodes.ARCHIVE_FAILED, `Failed to write archive ${archivePath}: ${reason}`, hint);
    this.name = 'ArchiveError';
  }
}

/**
 * Error: Configuration values failed validation
 */
export class ConfigError extends ReposnapError {
  constructor(public readonly issues: string[], hint?: string) {
    super(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${issues.join('; ')}`,
      hint ?? 'Check flags, environment variables and the env file',
    );
    this.name = 'ConfigError';
  }
}

/**
 * Error: Missing optional dependency
 */
export class DependencyMissingError extends ReposnapError {
  constructor(
    public readonly dependency: string,
    hint?: string,
  ) {
    super(
      ErrorCodes.DEP_MISSING,
      `Missing required dependency: ${dependency}`,
      hint ?? `Please install ${dependency} and try again`,
    );
    this.name = 'DependencyMissingError';
  }
}
