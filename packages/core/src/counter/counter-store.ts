/**
 * Counter Store - the persisted snapshot counter
 *
 * Read-modify-write happens under an exclusive lock file, and the new value
 * lands through a temp file renamed over the counter, so a reader never sees
 * a partial write and concurrent runs never lose an increment.
 */

import { open, readFile, rename, rm, writeFile, mkdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { CounterFileError, CounterLockedError } from '../errors/index.js';

export interface CounterStoreConfig {
  counterPath: string;
  lockRetries?: number;
  lockRetryDelayMs?: number;
}

export const DEFAULT_COUNTER_LOCK = {
  lockRetries: 20,
  lockRetryDelayMs: 50,
} as const;

const COUNTER_PATTERN = /^\d+$/;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class CounterStore {
  readonly counterPath: string;
  readonly lockPath: string;
  private lockRetries: number;
  private lockRetryDelayMs: number;

  constructor(config: CounterStoreConfig) {
    this.counterPath = config.counterPath;
    this.lockPath = `${config.counterPath}.lock`;
    this.lockRetries = config.lockRetries ?? DEFAULT_COUNTER_LOCK.lockRetries;
    this.lockRetryDelayMs = config.lockRetryDelayMs ?? DEFAULT_COUNTER_LOCK.lockRetryDelayMs;
  }

  /**
   * Current value, or 0 when the counter file does not exist yet. Held as a
   * bigint so the count never degrades into exponent notation.
   */
  async read(): Promise<bigint> {
    let content: string;
    try {
      content = await readFile(this.counterPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return 0n;
      throw error;
    }

    const trimmed = content.trim();
    if (!COUNTER_PATTERN.test(trimmed)) {
      throw new CounterFileError(this.counterPath, trimmed);
    }
    return BigInt(trimmed);
  }

  /**
   * Increments the counter by one and returns the new value.
   */
  async increment(): Promise<bigint> {
    await mkdir(dirname(this.counterPath), { recursive: true });
    await this.acquireLock();
    try {
      const next = (await this.read()) + 1n;
      await this.writeAtomic(next);
      return next;
    } finally {
      await rm(this.lockPath, { force: true });
    }
  }

  private async writeAtomic(value: bigint): Promise<void> {
    const tempPath = join(
      dirname(this.counterPath),
      `.${basename(this.counterPath)}.${process.pid}.tmp`,
    );
    await writeFile(tempPath, value.toString(), 'utf-8');
    await rename(tempPath, this.counterPath);
  }

  private async acquireLock(): Promise<void> {
    for (let attempt = 0; attempt <= this.lockRetries; attempt++) {
      try {
        const handle = await open(this.lockPath, 'wx');
        await handle.writeFile(String(process.pid));
        await handle.close();
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;
      }
      if (attempt < this.lockRetries) {
        await new Promise((resolve) => setTimeout(resolve, this.lockRetryDelayMs));
      }
    }
    throw new CounterLockedError(this.lockPath);
  }
}
