/**
 * Command-line argument parsing for the reposnap binaries.
 */

import { ConfigError, COMMIT_POLICIES, isCommitPolicy, type CommitPolicy } from '@reposnap/core';

export interface ParsedCounterArgs {
  help: boolean;
  envFile?: string;
  destDir?: string;
  keep?: number;
  projectName?: string;
  counterFile?: string;
  commitPolicy?: CommitPolicy;
}

export interface ParsedSaveArgs {
  help: boolean;
  envFile?: string;
  message?: string;
  snapshotsDir?: string;
  projectName?: string;
  logFile?: string;
  commitPolicy?: CommitPolicy;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError([`${flag} requires a value`]);
  }
  return value;
}

function parseKeep(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError([`--keep must be a whole number (got "${value}")`]);
  }
  return Number(value);
}

function parseCommitPolicy(value: string): CommitPolicy {
  if (!isCommitPolicy(value)) {
    throw new ConfigError([`--commit-policy must be one of ${COMMIT_POLICIES.join(', ')} (got "${value}")`]);
  }
  return value;
}

export function parseCounterArgs(args: string[]): ParsedCounterArgs {
  const result: ParsedCounterArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--env-file':
        result.envFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--dest':
        result.destDir = requireValue(arg, nextArg);
        i++;
        break;
      case '--keep':
        result.keep = parseKeep(requireValue(arg, nextArg));
        i++;
        break;
      case '--project':
        result.projectName = requireValue(arg, nextArg);
        i++;
        break;
      case '--counter-file':
        result.counterFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--commit-policy':
        result.commitPolicy = parseCommitPolicy(requireValue(arg, nextArg));
        i++;
        break;
      default:
        throw new ConfigError([`Unexpected argument: ${arg}`], 'Run with --help to see usage');
    }
  }

  return result;
}

export function parseSaveArgs(args: string[]): ParsedSaveArgs {
  const result: ParsedSaveArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const nextArg = args[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--env-file':
        result.envFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--snapshots-dir':
        result.snapshotsDir = requireValue(arg, nextArg);
        i++;
        break;
      case '--project':
        result.projectName = requireValue(arg, nextArg);
        i++;
        break;
      case '--log-file':
        result.logFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--commit-policy':
        result.commitPolicy = parseCommitPolicy(requireValue(arg, nextArg));
        i++;
        break;
      default:
        if (arg.startsWith('--') || result.message !== undefined) {
          throw new ConfigError([`Unexpected argument: ${arg}`], 'Quote the message to pass it as one argument');
        }
        result.message = arg;
    }
  }

  return result;
}
