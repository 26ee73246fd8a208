import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRecordStore } from '../../pipeline.js';
import { ExitCode } from '../exit-codes.js';
import {
  print,
  printError,
  formatError,
  formatRowList,
  formatJson,
} from '../formatter.js';

/**
 * Create the history command.
 */
export function createHistoryCommand(): Command {
  const command = new Command('history')
    .description('List archived rows')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const rows = await createRecordStore(getConfig()).listArchivedRows();
        print(options.json ? formatJson(rows) : formatRowList(rows, 'No archived rows.'));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}
