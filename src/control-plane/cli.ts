import { Command } from 'commander';
import { createAddCommand } from './commands/add.js';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';
import { createHistoryCommand } from './commands/history.js';
import { createRegenerateCommand } from './commands/regenerate.js';
import { createRetryCommand } from './commands/retry.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('postline')
    .description('Postline - generate, publish and archive posts one row at a time')
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createAddCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createHistoryCommand());
  program.addCommand(createRegenerateCommand());
  program.addCommand(createRetryCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createAddCommand } from './commands/add.js';
export { createRunCommand } from './commands/run.js';
export { createStatusCommand } from './commands/status.js';
export { createHistoryCommand } from './commands/history.js';
export { createRegenerateCommand } from './commands/regenerate.js';
export { createRetryCommand } from './commands/retry.js';
