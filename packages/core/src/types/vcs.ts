/**
 * Version Control Capability Types
 */

/**
 * The narrow set of version-control operations the snapshotters need.
 * Every method rejects when the underlying operation fails.
 */
export interface VcsClient {
  /** Stage every change in the working directory */
  stageAll(): Promise<void>;
  /** Whether the index differs from HEAD */
  hasStagedChanges(): Promise<boolean>;
  commit(message: string): Promise<void>;
  push(): Promise<void>;
  pull(): Promise<void>;
}

/**
 * Whether a snapshot run commits only when something is staged,
 * or commits unconditionally.
 */
export type CommitPolicy = 'if-staged' | 'always';

export const COMMIT_POLICIES: readonly CommitPolicy[] = ['if-staged', 'always'];

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Rejects only when the process cannot
 * be started; a non-zero exit is reported through `exitCode`.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  cwd: string,
) => Promise<CommandResult>;

export function isCommitPolicy(value: string): value is CommitPolicy {
  return COMMIT_POLICIES.some((policy) => policy === value);
}
