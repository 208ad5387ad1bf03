/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createRunCommand } from './commands/run.js';
import { createWatchCommand } from './commands/watch.js';
import { createLatestCommand } from './commands/latest.js';
import { createInitCommand } from './commands/init.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Code, host, security and dependency health monitoring');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createWatchCommand());
  program.addCommand(createLatestCommand());
  program.addCommand(createInitCommand());

  return program;
}

/**
 * Exits non-zero only when setup fails (configuration, directories);
 * monitor failures are part of the printed report.
 */
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
