#!/usr/bin/env node
/**
 * reposnap-counter
 *
 * Numbered snapshot of the current directory: bump the counter, commit and
 * push if anything is staged, zip to the destination folder, keep the newest.
 */

import { DEFAULT_ENV_FILE, ENV_KEYS, createLogger, loadProjectEnv, runCli } from '@reposnap/core';
import { parseCounterArgs } from '../args.js';
import { runCounterSnapshot } from '../counter-snapshot.js';

function printHelp(): void {
  console.log(`
Usage: reposnap-counter [options]

Options:
  --dest <dir>              Destination folder for snapshots (env ${ENV_KEYS.destDir}, default ~/Desktop)
  --keep <n>                Numbered snapshots to keep (env ${ENV_KEYS.keep}, default 3)
  --project <name>          Project name in file names (env ${ENV_KEYS.projectName}, default: directory name)
  --counter-file <path>     Counter file (env ${ENV_KEYS.counterFile}, default .snapshot_count)
  --commit-policy <policy>  if-staged | always (env ${ENV_KEYS.commitPolicy}, default if-staged)
  --env-file <path>         Env file to load (default ${DEFAULT_ENV_FILE})
  -h, --help                Show this help
`);
}

const logger = createLogger('Counter');

await runCli(async () => {
  const args = parseCounterArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const workDir = process.cwd();
  loadProjectEnv(workDir, args.envFile);

  const result = await runCounterSnapshot({
    config: {
      workDir,
      destDir: args.destDir,
      keep: args.keep,
      projectName: args.projectName,
      counterFile: args.counterFile,
      commitPolicy: args.commitPolicy,
    },
    logger,
  });

  if (result.prune.failed.length > 0) {
    logger.warn(`${result.prune.failed.length} old snapshot(s) could not be deleted`);
  }
}, logger);
