import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRecordStore } from '../../pipeline.js';
import { ExitCode } from '../exit-codes.js';
import {
  print,
  printError,
  formatError,
  formatSuccess,
  formatJson,
  dim,
} from '../formatter.js';

interface AddOptions {
  schedule?: string;
  json?: boolean;
}

/**
 * Create the add command.
 */
export function createAddCommand(): Command {
  const command = new Command('add')
    .description('Append a topic to the end of the active table')
    .argument('<topic>', 'Subject of the post')
    .option('--schedule <iso>', 'Scheduled publication time (ISO 8601)')
    .option('--json', 'Output the new row as JSON', false)
    .action(async (topic: string, options: AddOptions) => {
      try {
        await executeAdd(topic, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}

async function executeAdd(topic: string, options: AddOptions): Promise<void> {
  const store = createRecordStore(getConfig());
  const row = await store.appendRow({ topic, scheduledAt: options.schedule ?? null });

  if (options.json) {
    print(formatJson(row));
    return;
  }

  const position = (await store.listActiveRows()).findIndex((candidate) => candidate.id === row.id);
  print(formatSuccess(`Added row ${row.id}`));
  print(dim(`  Position ${position + 1} in the active table`));
}
