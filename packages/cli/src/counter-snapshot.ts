/**
 * Counter Snapshot
 *
 * Bumps the persisted snapshot counter, commits and pushes when something is
 * staged, zips the whole working directory to the destination folder as
 * `{project}_{N}.zip`, then prunes older numbered snapshots.
 */

import { join } from 'node:path';
import {
  CounterStore,
  GitClient,
  createArchive,
  createLogger,
  numberedSnapshotName,
  pruneSnapshots,
  resolveCounterSnapshotConfig,
  type CounterSnapshotConfig,
  type Env,
  type Logger,
  type PruneResult,
  type VcsClient,
} from '@reposnap/core';

export interface CounterSnapshotOptions {
  config?: CounterSnapshotConfig;
  env?: Env;
  /** Defaults to git in the working directory */
  vcs?: VcsClient;
  logger?: Logger;
}

export interface CounterSnapshotResult {
  count: bigint;
  committed: boolean;
  commitMessage: string;
  archivePath: string;
  entryCount: number;
  prune: PruneResult;
}

export function counterCommitMessage(count: bigint): string {
  return `autopush: snapshot #${count}`;
}

export async function runCounterSnapshot(options: CounterSnapshotOptions = {}): Promise<CounterSnapshotResult> {
  const config = resolveCounterSnapshotConfig(options.config, options.env);
  const logger = options.logger ?? createLogger('Counter');
  const vcs = options.vcs ?? new GitClient({ cwd: config.workDir });

  const count = await new CounterStore({ counterPath: config.counterPath }).increment();
  const commitMessage = counterCommitMessage(count);

  await vcs.stageAll();

  let committed = false;
  if (config.commitPolicy === 'always' || await vcs.hasStagedChanges()) {
    await vcs.commit(commitMessage);
    await vcs.push();
    committed = true;
    logger.info(`Git pushed with commit: "${commitMessage}"`);
  } else {
    logger.info('No staged changes. Skipping commit and push.');
  }

  const archivePath = join(config.destDir, numberedSnapshotName(config.projectName, count));
  const entryCount = await createArchive(config.workDir, archivePath);
  logger.info(`Snapshot created: ${archivePath} (${entryCount} files)`);

  const prune = await pruneSnapshots(config.destDir, config.projectName, config.keep, { logger });

  return { count, committed, commitMessage, archivePath, entryCount, prune };
}
