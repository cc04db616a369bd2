#!/usr/bin/env node
/**
 * reposnap-icons [--out <dir>]
 *
 * Writes placeholder app icons. Exits 0 with install guidance when the
 * image library is missing.
 */

import { createLogger, runCli } from '@reposnap/core';
import { parseIconArgs } from '../args.js';
import { DEFAULT_ICON_DIR, generateIcons } from '../icon-generator.js';

function printHelp(): void {
  console.log(`
Usage: reposnap-icons [options]

Options:
  --out <dir>   Output directory (default ${DEFAULT_ICON_DIR})
  -h, --help    Show this help
`);
}

const logger = createLogger('Icons');

await runCli(async () => {
  const args = parseIconArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  await generateIcons({ outDir: args.outDir, logger });
}, logger);
