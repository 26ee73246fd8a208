import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRecordStore } from '../../pipeline.js';
import { StatusLedger } from '../../orchestrator/status-ledger.js';
import { ExitCode } from '../exit-codes.js';
import { print, printError, formatError, formatSuccess, dim } from '../formatter.js';

/**
 * Create the regenerate command.
 */
export function createRegenerateCommand(): Command {
  const command = new Command('regenerate')
    .description('Discard generated content so the next run generates it again')
    .argument('[row-id]', 'Row to regenerate (defaults to the active row)')
    .action(async (rowId: string | undefined) => {
      try {
        const store = createRecordStore(getConfig());
        const id = rowId ?? (await store.readActiveRow()).id;
        const row = await new StatusLedger(store).requestRegeneration(id);
        print(formatSuccess(`Row ${row.id} will be regenerated on the next run`));
        print(dim(`  Topic: ${row.topic}`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}
