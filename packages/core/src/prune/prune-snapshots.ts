/**
 * Snapshot Pruning
 *
 * Keeps the newest numbered snapshots `{project}_{N}.zip` in a directory and
 * deletes the rest. Order is by the parsed N, never by file name.
 */

import { readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export interface NumberedSnapshot {
  number: bigint;
  fileName: string;
  path: string;
}

export interface PruneFailure {
  fileName: string;
  error: string;
}

export interface PruneResult {
  kept: string[];
  deleted: string[];
  failed: PruneFailure[];
}

export interface PruneOptions {
  logger?: Logger;
  /** Deletes one file; defaults to fs unlink */
  remove?: (filePath: string) => Promise<void>;
}

export const DEFAULT_KEEP = 3;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function numberedSnapshotPattern(project: string): RegExp {
  return new RegExp(`^${escapeRegExp(project)}_(\\d+)\\.zip$`);
}

export function numberedSnapshotName(project: string, count: bigint): string {
  return `${project}_${count}.zip`;
}

/**
 * Lists numbered snapshots in `dir`, oldest first. A missing directory has none.
 */
export async function listNumberedSnapshots(dir: string, project: string): Promise<NumberedSnapshot[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }

  const pattern = numberedSnapshotPattern(project);
  const snapshots: NumberedSnapshot[] = [];
  for (const fileName of names) {
    const digits = pattern.exec(fileName)?.[1];
    if (digits !== undefined) {
      snapshots.push({ number: BigInt(digits), fileName, path: join(dir, fileName) });
    }
  }

  return snapshots.sort((a, b) => (a.number < b.number ? -1 : a.number > b.number ? 1 : 0));
}

/**
 * Deletes all but the `keep` highest-numbered snapshots. A failed deletion
 * is logged and recorded, and the remaining deletions still run.
 */
export async function pruneSnapshots(
  dir: string,
  project: string,
  keep: number = DEFAULT_KEEP,
  options: PruneOptions = {},
): Promise<PruneResult> {
  const logger = options.logger ?? silentLogger;
  const remove = options.remove ?? unlink;

  const snapshots = await listNumberedSnapshots(dir, project);
  const cutoff = Math.max(0, snapshots.length - Math.max(0, keep));
  const stale = snapshots.slice(0, cutoff);
  const result: PruneResult = {
    kept: snapshots.slice(cutoff).map((s) => s.fileName),
    deleted: [],
    failed: [],
  };

  for (const snapshot of stale) {
    try {
      await remove(snapshot.path);
      result.deleted.push(snapshot.fileName);
      logger.info(`Deleted old snapshot: ${snapshot.fileName}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.failed.push({ fileName: snapshot.fileName, error: message });
      logger.warn(`Failed to delete ${snapshot.fileName}: ${message}`);
    }
  }

  return result;
}
