import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';
import { registerMergeCommand, registerResolveCommand, registerSourcesCommand } from './commands/index.js';
import { setDebugMode, setJsonMode } from './output.js';

// Read version from package.json at runtime
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

type ProgramOptions = {
  json?: boolean;
  debug?: boolean;
  manifest?: string;
};

/**
 * Build the paramstack command tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('paramstack')
    .description('Layered parameter merge with provenance')
    .version(version)
    .option('--json', 'Output in JSON format')
    .option('--debug', 'Print scope resolution details to stderr')
    .option('--manifest <path>', 'Path to paramstack.yaml (default: search upwards)')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<ProgramOptions>();
      setJsonMode(opts.json === true);
      setDebugMode(opts.debug === true);
    });

  registerMergeCommand(program);
  registerResolveCommand(program);
  registerSourcesCommand(program);

  return program;
}
