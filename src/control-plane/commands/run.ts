import { Command, InvalidArgumentError } from 'commander';
import { getConfig } from '../../config/index.js';
import { createPipeline } from '../../pipeline.js';
import type { Outcome } from '../../types/outcome.js';
import { ExitCode, exitCodeFor } from '../exit-codes.js';
import {
  print,
  printError,
  formatError,
  formatOutcome,
  formatJson,
} from '../formatter.js';

interface RunOptions {
  untilSettled?: boolean;
  maxSteps: number;
  json?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Advance the active row by one phase')
    .option('--until-settled', 'Keep going until the row is archived, blocked or failed', false)
    .option('--max-steps <n>', 'Upper bound on phases with --until-settled', parsePositiveInt, 10)
    .option('--json', 'Output outcomes as JSON', false)
    .action(async (options: RunOptions) => {
      try {
        await executeRun(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.ERROR;
      }
    });

  return command;
}

async function executeRun(options: RunOptions): Promise<void> {
  const { orchestrator } = await createPipeline(getConfig());

  const outcomes: Outcome[] = options.untilSettled
    ? await orchestrator.runUntilSettled(options.maxSteps)
    : [await orchestrator.runOnce()];

  if (options.json) {
    print(formatJson(options.untilSettled ? outcomes : outcomes[0]));
  } else {
    for (const outcome of outcomes) {
      print(formatOutcome(outcome));
    }
  }

  const last = outcomes[outcomes.length - 1];
  process.exitCode = last === undefined ? ExitCode.SUCCESS : exitCodeFor(last);
}
