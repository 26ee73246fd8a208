/**
 * Status ledger for post rows.
 * The single authority on legal status transitions. Every row mutation the
 * orchestrator makes goes through here and lands as a compare-and-swap write.
 */

import {
  Phase,
  PostStatus,
  type Row,
  type RowFailure,
  type RowPatch,
} from '../types/row.js';
import type { RecordStore } from '../types/adapters.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('status-ledger');

/**
 * Error thrown when a transition that the table does not allow is requested.
 * This is a programming error, not a runtime condition.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly rowId: string,
    public readonly fromStatus: PostStatus,
    public readonly toStatus: PostStatus,
    public readonly validTargets: readonly PostStatus[]
  ) {
    super(
      `Invalid transition: Cannot move row ${rowId} from '${fromStatus}' to '${toStatus}'. ` +
      `Valid targets: [${validTargets.join(', ')}]`
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * State transition table for forward progress.
 * `failed` re-entry is checked separately because it depends on the failed phase,
 * and regeneration (generated -> generating) is only reachable via requestRegeneration.
 */
const transitions: Record<PostStatus, readonly PostStatus[]> = {
  [PostStatus.PENDING]: [PostStatus.GENERATING],
  [PostStatus.GENERATING]: [PostStatus.GENERATED, PostStatus.FAILED],
  [PostStatus.GENERATED]: [PostStatus.POSTING],
  [PostStatus.POSTING]: [PostStatus.POSTED, PostStatus.FAILED],
  [PostStatus.POSTED]: [PostStatus.ARCHIVING],
  [PostStatus.ARCHIVING]: [PostStatus.ARCHIVED, PostStatus.FAILED],
  [PostStatus.FAILED]: [PostStatus.GENERATING, PostStatus.POSTING, PostStatus.ARCHIVING],
  // Terminal state - no transitions out
  [PostStatus.ARCHIVED]: [],
};

/**
 * The status a phase moves the row to once it succeeds.
 */
export const PHASE_COMPLETION_STATUS: Record<Phase, PostStatus> = {
  [Phase.GENERATING]: PostStatus.GENERATED,
  [Phase.POSTING]: PostStatus.POSTED,
  [Phase.ARCHIVING]: PostStatus.ARCHIVED,
};

/**
 * Check if a status is terminal (no more transitions possible).
 */
export function isTerminalStatus(status: PostStatus): boolean {
  return status === PostStatus.ARCHIVED;
}

/**
 * Check if a status is one of the in-progress phase statuses.
 */
export function isPhaseStatus(status: PostStatus): status is Phase {
  return (
    status === PostStatus.GENERATING ||
    status === PostStatus.POSTING ||
    status === PostStatus.ARCHIVING
  );
}

/**
 * Check if a forward transition is valid.
 * For `failed`, pass the failed phase: re-entry is only allowed into that phase.
 */
export function canTransition(from: PostStatus, to: PostStatus, failedPhase?: Phase | null): boolean {
  if (from === PostStatus.FAILED) {
    return failedPhase !== undefined && failedPhase !== null && to === failedPhase;
  }
  return transitions[from].includes(to);
}

/**
 * Next phase to execute for a row in the given status.
 * Returns null when there is nothing left to do.
 */
export function nextPhase(status: PostStatus, failedPhase?: Phase | null): Phase | null {
  switch (status) {
    case PostStatus.PENDING:
    case PostStatus.GENERATING:
      return Phase.GENERATING;
    case PostStatus.GENERATED:
    case PostStatus.POSTING:
      return Phase.POSTING;
    case PostStatus.POSTED:
    case PostStatus.ARCHIVING:
      return Phase.ARCHIVING;
    case PostStatus.FAILED:
      return failedPhase ?? null;
    case PostStatus.ARCHIVED:
      return null;
  }
}

/**
 * Get human-readable progress description.
 */
export function getProgressDescription(row: Row): string {
  switch (row.status) {
    case PostStatus.PENDING:
      return 'Waiting for content generation';
    case PostStatus.GENERATING:
      return `Generating content (attempt ${row.attemptCounts.generating})`;
    case PostStatus.GENERATED:
      return 'Content generated, waiting to publish';
    case PostStatus.POSTING:
      return `Publishing (attempt ${row.attemptCounts.posting})`;
    case PostStatus.POSTED:
      return 'Published, waiting to archive';
    case PostStatus.ARCHIVING:
      return `Archiving (attempt ${row.attemptCounts.archiving})`;
    case PostStatus.ARCHIVED:
      return 'Archived';
    case PostStatus.FAILED:
      return row.failure
        ? `Failed while ${row.failure.phase}${row.failure.permanent ? ' (needs operator)' : ''}: ${row.failure.message}`
        : 'Failed';
  }
}

/**
 * StatusLedger - validates transitions and commits them through the store's
 * compare-and-swap write.
 */
export class StatusLedger {
  constructor(private readonly store: RecordStore) {}

  /**
   * Commit a transition. Fails with ConflictError (from the store) when the
   * persisted status is no longer `from`.
   */
  async commit(
    row: Pick<Row, 'id' | 'failure'>,
    from: PostStatus,
    to: PostStatus,
    fields: RowPatch = {}
  ): Promise<Row> {
    if (!canTransition(from, to, row.failure?.phase ?? null)) {
      const validTargets =
        from === PostStatus.FAILED && row.failure ? [row.failure.phase] : transitions[from];
      const error = new InvalidTransitionError(row.id, from, to, validTargets);
      log.error({ rowId: row.id, from, to }, error.message);
      throw error;
    }

    const updated = await this.store.compareAndSwapStatus(row.id, from, to, fields);
    log.info({ rowId: row.id, from, to }, 'Status transition');
    return updated;
  }

  /**
   * Persist the attempt counter for a phase. Only applies while the row is
   * still in that phase and its counter is still the one read with `row`, so
   * two runs resuming the same row cannot both start an attempt.
   */
  async recordAttempt(row: Row, phase: Phase, count: number): Promise<Row> {
    const attemptCounts = { ...row.attemptCounts, [phase]: count };
    const updated = await this.store.writeRow(
      row.id,
      { attemptCounts },
      { expectedStatus: phase, expectedAttemptCount: { phase, count: row.attemptCounts[phase] } }
    );
    log.debug({ rowId: row.id, phase, count }, 'Attempt recorded');
    return updated;
  }

  /**
   * Move a row from its phase status to `failed`.
   */
  async markFailed(
    row: Row,
    phase: Phase,
    failure: Omit<RowFailure, 'phase' | 'failedAt'>,
    fields: RowPatch = {}
  ): Promise<Row> {
    const record: RowFailure = {
      phase,
      code: failure.code,
      message: failure.message,
      permanent: failure.permanent,
      failedAt: new Date().toISOString(),
    };
    const updated = await this.commit(row, phase, PostStatus.FAILED, { ...fields, failure: record });
    log.warn({ rowId: row.id, phase, code: record.code, permanent: record.permanent }, 'Row failed');
    return updated;
  }

  /**
   * Re-enter a failed row's phase with a fresh attempt budget.
   */
  async reenterFailed(row: Row): Promise<Row> {
    if (row.status !== PostStatus.FAILED || row.failure === null) {
      throw new Error(`Row ${row.id} is in '${row.status}'; only failed rows can be re-entered`);
    }
    const phase = row.failure.phase;
    return this.commit(row, PostStatus.FAILED, phase, {
      failure: null,
      attemptCounts: { ...row.attemptCounts, [phase]: 0 },
    });
  }

  /**
   * Explicit regeneration: generated -> generating, discarding the content.
   */
  async requestRegeneration(rowId: string): Promise<Row> {
    const row = await this.store.readRow(rowId);
    if (row.status !== PostStatus.GENERATED) {
      throw new InvalidTransitionError(rowId, row.status, PostStatus.GENERATING, transitions[row.status]);
    }

    const updated = await this.store.compareAndSwapStatus(
      rowId,
      PostStatus.GENERATED,
      PostStatus.GENERATING,
      {
        content: null,
        receipt: null,
        attemptCounts: { ...row.attemptCounts, generating: 0 },
      }
    );
    log.info({ rowId }, 'Regeneration requested');
    return updated;
  }

  /**
   * Operator re-arm of a failed row (including permanent failures).
   * The next run resumes the failed phase.
   */
  async requestRetry(rowId: string): Promise<Row> {
    const row = await this.store.readRow(rowId);
    const updated = await this.reenterFailed(row);
    log.info({ rowId, phase: updated.status }, 'Retry requested');
    return updated;
  }

  /**
   * Counters cleared for a completed phase.
   */
  static resetCounter(row: Row, phase: Phase): Row['attemptCounts'] {
    return { ...row.attemptCounts, [phase]: 0 };
  }
}
