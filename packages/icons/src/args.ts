/**
 * Command-line argument parsing for reposnap-icons.
 */

import { ConfigError } from '@reposnap/core';

export interface ParsedIconArgs {
  help: boolean;
  outDir?: string;
}

export function parseIconArgs(args: string[]): ParsedIconArgs {
  const result: ParsedIconArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--out':
        if (nextArg === undefined || nextArg.startsWith('--')) {
          throw new ConfigError(['--out requires a value']);
        }
        result.outDir = nextArg;
        i++;
        break;
      default:
        throw new ConfigError([`Unexpected argument: ${arg}`], 'Run with --help to see usage');
    }
  }

  return result;
}
