import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRecordStore } from '../../pipeline.js';
import { ExitCode } from '../exit-codes.js';
import {
  print,
  printError,
  formatError,
  formatRowDetail,
  formatRowList,
  formatJson,
  bold,
  dim,
} from '../formatter.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show the active row and the rows queued behind it')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        await executeStatus(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}

async function executeStatus(options: { json?: boolean }): Promise<void> {
  const store = createRecordStore(getConfig());
  const [active, ...queued] = await store.listActiveRows();

  if (options.json) {
    print(formatJson({ active: active ?? null, queued }));
    return;
  }

  if (active === undefined) {
    print(dim('The active table is empty. Add a topic with `postline add <topic>`.'));
    return;
  }

  print(formatRowDetail(active));
  if (queued.length > 0) {
    print('');
    print(bold(`Queued (${queued.length})`));
    print(formatRowList(queued, 'No queued rows.'));
  }
}
