/**
 * Timestamp Snapshot
 *
 * Pulls, optionally records a log line, zips the working directory (minus
 * build output, VCS metadata and earlier snapshots) into the snapshots folder,
 * then stages, commits and pushes.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  GitClient,
  createArchive,
  createLogger,
  formatTimestamp,
  resolveTimestampSnapshotConfig,
  type Env,
  type Logger,
  type TimestampSnapshotConfig,
  type VcsClient,
} from '@reposnap/core';

export interface TimestampSnapshotOptions {
  config?: TimestampSnapshotConfig;
  env?: Env;
  /** Free-text note written to the log file and appended to the commit message */
  message?: string;
  vcs?: VcsClient;
  logger?: Logger;
  now?: () => Date;
}

export interface TimestampSnapshotResult {
  timestamp: string;
  archivePath: string;
  entryCount: number;
  logWritten: boolean;
  committed: boolean;
  commitMessage: string;
}

export function timestampSnapshotName(project: string, timestamp: string): string {
  return `${project}_snapshot_${timestamp}.zip`;
}

export function timestampCommitMessage(timestamp: string, message?: string): string {
  const base = `📸 Snapshot @ ${timestamp}`;
  return message ? `${base} - ${message}` : base;
}

export async function runTimestampSnapshot(options: TimestampSnapshotOptions = {}): Promise<TimestampSnapshotResult> {
  const config = resolveTimestampSnapshotConfig(options.config, options.env);
  const logger = options.logger ?? createLogger('Save');
  const vcs = options.vcs ?? new GitClient({ cwd: config.workDir });
  const message = options.message || undefined;

  logger.info('Pulling latest changes from Git...');
  await vcs.pull();

  let logWritten = false;
  if (message) {
    await mkdir(dirname(config.logPath), { recursive: true });
    await writeFile(config.logPath, message, 'utf-8');
    logWritten = true;
  }

  const timestamp = formatTimestamp(options.now?.() ?? new Date());
  const archivePath = join(config.snapshotsDir, timestampSnapshotName(config.projectName, timestamp));
  const entryCount = await createArchive(config.workDir, archivePath, {
    excludeDirs: config.excludeDirs,
    excludeFiles: config.excludeFiles,
  });
  logger.info(`Snapshot saved to: ${archivePath} (${entryCount} files)`);

  const commitMessage = timestampCommitMessage(timestamp, message);
  await vcs.stageAll();

  if (config.commitPolicy === 'if-staged' && !(await vcs.hasStagedChanges())) {
    logger.info('No staged changes. Skipping commit and push.');
    return { timestamp, archivePath, entryCount, logWritten, committed: false, commitMessage };
  }

  await vcs.commit(commitMessage);
  logger.info('Pushing to remote...');
  await vcs.push();
  logger.info('Snapshot, pull, commit, and push complete.');

  return { timestamp, archivePath, entryCount, logWritten, committed: true, commitMessage };
}
