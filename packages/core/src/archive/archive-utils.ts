/**
 * ZIP archive creation and inspection for snapshots.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import archiver from 'archiver';
import * as yauzl from 'yauzl-promise';
import { ArchiveError } from '../errors/index.js';

export interface CreateArchiveOptions {
  /** Directory names skipped at any depth, together with their contents */
  excludeDirs?: Iterable<string>;
  /** File base names skipped at any depth */
  excludeFiles?: Iterable<string>;
}

export interface ArchiveFileEntry {
  absolutePath: string;
  /** Path inside the archive, always `/`-separated */
  name: string;
}

/**
 * Walks `sourceDir` and returns the files a snapshot of it would hold.
 */
export async function collectArchiveEntries(
  sourceDir: string,
  options: CreateArchiveOptions = {},
): Promise<ArchiveFileEntry[]> {
  const excludeDirs = new Set(options.excludeDirs ?? []);
  const excludeFiles = new Set(options.excludeFiles ?? []);
  const root = path.resolve(sourceDir);
  const files: ArchiveFileEntry[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excludeDirs.has(entry.name)) {
          await walk(absolutePath);
        }
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        if (!excludeFiles.has(entry.name)) {
          files.push({
            absolutePath,
            name: path.relative(root, absolutePath).split(path.sep).join('/'),
          });
        }
      }
    }
  };

  await walk(root);
  return files;
}

/**
 * Writes a ZIP of `sourceDir` to `archivePath` and returns the number of
 * file entries written. The file list is taken before the output is opened,
 * so an archive written inside `sourceDir` never contains itself. On failure
 * nothing is left at `archivePath`.
 */
export async function createArchive(
  sourceDir: string,
  archivePath: string,
  options: CreateArchiveOptions = {},
): Promise<number> {
  const entries = await collectArchiveEntries(sourceDir, options);
  await fs.promises.mkdir(path.dirname(archivePath), { recursive: true });

  const output = fs.createWriteStream(archivePath);
  const archive = archiver('zip', { zlib: { level: 6 } });

  const written = new Promise<void>((resolve, reject) => {
    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);
  });

  archive.pipe(output);
  for (const entry of entries) {
    archive.file(entry.absolutePath, { name: entry.name });
  }

  try {
    await Promise.all([archive.finalize(), written]);
  } catch (error) {
    // a partial archive must not pass for a snapshot on the next listing
    output.destroy();
    await fs.promises.rm(archivePath, { force: true });
    throw new ArchiveError(archivePath, error instanceof Error ? error.message : String(error));
  }

  return entries.length;
}

/**
 * Lists the entry names stored in a ZIP archive.
 */
export async function listArchiveEntries(archivePath: string): Promise<string[]> {
  const zip = await yauzl.open(archivePath);
  const names: string[] = [];

  try {
    for await (const entry of zip) {
      names.push(entry.filename);
    }
  } finally {
    await zip.close();
  }

  return names;
}
