#!/usr/bin/env node
/**
 * auditor - administrative CLI for the incremental audit cache
 */

import { consoleIO, createProgram } from './program.js';
import { formatCliError } from './lib/errors.js';
import { createTheme, shouldUseColors } from './ui/theme.js';

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  const theme = createTheme(shouldUseColors() && !process.argv.includes('--no-color'));
  for (const line of formatCliError(error, theme)) {
    consoleIO.err(line);
  }
  process.exitCode = 1;
});
