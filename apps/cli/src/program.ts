/**
 * Command definitions
 *
 * Builds the commander program; output goes through the injected writer so
 * the commands can run in-process.
 */

import { Command, InvalidArgumentError } from 'commander';
import { cacheClearCommand, cacheStatsCommand, type CacheCommandDeps, type CommandIO } from './commands/cache.js';
import { CLI_NAME, CLI_VERSION } from './lib/version.js';
import { shouldUseColors } from './ui/theme.js';

export const consoleIO: CommandIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Validate a path argument
 */
function validatePath(value: string): string {
  if (!value || value.trim() === '') {
    throw new InvalidArgumentError('Path cannot be empty');
  }
  return value.trim();
}

type GlobalOptions = {
  root?: string;
  cacheDir?: string;
  color: boolean;
};

export function createProgram(deps: Partial<CacheCommandDeps> = {}): Command {
  const commandDeps: CacheCommandDeps = { io: deps.io ?? consoleIO, createCoordinator: deps.createCoordinator };
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Incremental caching and orchestration for source-tree audits')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('-r, --root <dir>', 'Project root (default: working directory)', validatePath)
    .option('--cache-dir <dir>', 'Cache directory relative to the project root', validatePath)
    .option('--no-color', 'Disable colored output')
    .configureOutput({
      writeOut: (str) => commandDeps.io.out(str.trimEnd()),
      writeErr: (str) => commandDeps.io.err(str.trimEnd()),
    });

  const cache = program.command('cache').description('Inspect or clear the audit cache');

  cache
    .command('stats')
    .description('Show tracked files and cached tool results')
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await cacheStatsCommand(
        {
          root: globals.root,
          cacheDir: globals.cacheDir,
          json: options.json,
          color: globals.color && shouldUseColors(),
        },
        commandDeps
      );
    });

  cache
    .command('clear [tool]')
    .description('Remove one tool\'s cached results, or the whole cache')
    .action(async (tool: string | undefined, _options: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await cacheClearCommand(
        tool,
        { root: globals.root, cacheDir: globals.cacheDir, color: globals.color && shouldUseColors() },
        commandDeps
      );
    });

  return program;
}
