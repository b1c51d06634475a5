/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createShowCommand } from './commands/show.js';
import { createReplayCommand } from './commands/replay.js';
import { createDiffCommand } from './commands/diff.js';
import { createExportCommand } from './commands/export.js';
import { createInfoCommand } from './commands/info.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Record, replay, and debug AI agent execution traces')
    .option('-v, --verbose', 'Log debug output to stderr')
    .option('-d, --dir <directory>', 'Project directory used to resolve config and trace paths');

  program.addCommand(createShowCommand());
  program.addCommand(createReplayCommand());
  program.addCommand(createDiffCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createInfoCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\n❌ ${String(error)}\n`);
    }
    process.exitCode = 1;
  }
}
