import type { Outcome } from '../types/outcome.js';

/**
 * Process exit codes.
 */
export const ExitCode = {
  /** Completed, or nothing to do */
  SUCCESS: 0,
  /** Usage or unexpected error */
  ERROR: 1,
  /** A phase failed and needs an operator */
  PERMANENT_FAILURE: 2,
  /** A phase failed and the next run retries it */
  RETRYABLE_FAILURE: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(outcome: Outcome): ExitCode {
  if (outcome.type !== 'failed') {
    return ExitCode.SUCCESS;
  }
  return outcome.permanent ? ExitCode.PERMANENT_FAILURE : ExitCode.RETRYABLE_FAILURE;
}
