/**
 * Shared plumbing for the command-line entry points.
 */

import { basename } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ReposnapError } from '../errors/index.js';
import type { Logger } from './logger.js';

/**
 * Runs a CLI entry point. A failure is logged, with its hint when it is a
 * ReposnapError, and sets the process exit code to 1.
 */
export async function runCli(main: () => Promise<void>, logger: Logger): Promise<void> {
  try {
    await main();
  } catch (error) {
    if (error instanceof ReposnapError) {
      logger.error(error.message);
      if (error.hint) logger.error(`Hint: ${error.hint}`);
    } else {
      logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exitCode = 1;
  }
}

/**
 * Base name of the module at `moduleUrl`, usually `import.meta.url`.
 */
export function scriptFileName(moduleUrl: string): string {
  return basename(fileURLToPath(moduleUrl));
}
