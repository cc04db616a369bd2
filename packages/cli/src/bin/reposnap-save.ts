#!/usr/bin/env node
/**
 * reposnap-save [message]
 *
 * Timestamped snapshot: pull, record the optional message, zip into the
 * snapshots folder, commit and push.
 */

import { DEFAULT_ENV_FILE, ENV_KEYS, createLogger, loadProjectEnv, runCli, scriptFileName } from '@reposnap/core';
import { parseSaveArgs } from '../args.js';
import { runTimestampSnapshot } from '../timestamp-snapshot.js';

const SCRIPT_FILE = scriptFileName(import.meta.url);

function printHelp(): void {
  console.log(`
Usage: reposnap-save [message] [options]

Arguments:
  message                   Optional note, saved to the log file and added to the commit message

Options:
  --snapshots-dir <dir>     Snapshot folder (env ${ENV_KEYS.snapshotsDir}, default snapshots)
  --project <name>          Project name in file names (env ${ENV_KEYS.projectName}, default: directory name)
  --log-file <path>         Log file for the message (env ${ENV_KEYS.logFile}, default last_agent_log.txt)
  --commit-policy <policy>  always | if-staged (env ${ENV_KEYS.commitPolicy}, default always)
  --env-file <path>         Env file to load (default ${DEFAULT_ENV_FILE})
  -h, --help                Show this help
`);
}

const logger = createLogger('Save');

await runCli(async () => {
  const args = parseSaveArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const workDir = process.cwd();
  loadProjectEnv(workDir, args.envFile);

  await runTimestampSnapshot({
    config: {
      workDir,
      snapshotsDir: args.snapshotsDir,
      projectName: args.projectName,
      logFile: args.logFile,
      commitPolicy: args.commitPolicy,
      excludeFiles: [SCRIPT_FILE],
    },
    message: args.message,
    logger,
  });
}, logger);
