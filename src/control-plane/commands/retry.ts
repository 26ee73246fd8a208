import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRecordStore } from '../../pipeline.js';
import { StatusLedger } from '../../orchestrator/status-ledger.js';
import { ExitCode } from '../exit-codes.js';
import { print, printError, formatError, formatSuccess, formatWarning } from '../formatter.js';

/**
 * Create the retry command.
 */
export function createRetryCommand(): Command {
  const command = new Command('retry')
    .description('Re-arm a failed row so the next run resumes its failed phase')
    .argument('[row-id]', 'Row to retry (defaults to the active row)')
    .action(async (rowId: string | undefined) => {
      try {
        const store = createRecordStore(getConfig());
        const row = await store.readRow(rowId ?? (await store.readActiveRow()).id);
        if (row.failure?.permanent === false) {
          print(formatWarning('This failure is retryable; the next run would have retried it anyway'));
        }
        const updated = await new StatusLedger(store).requestRetry(row.id);
        print(formatSuccess(`Row ${updated.id} re-armed in '${updated.status}'`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}
