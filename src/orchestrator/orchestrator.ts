/**
 * Main Orchestrator.
 * Advances the active row through generate, publish and archive, one phase
 * per run. Every external call goes through the retry engine and every row
 * mutation goes through the status ledger.
 */

import {
  Phase,
  PostStatus,
  type PublishReceipt,
  type Row,
  type RowPatch,
} from '../types/row.js';
import type {
  ContentGenerator,
  PublishRequest,
  Publisher,
  ReceiptHint,
  RecordStore,
} from '../types/adapters.js';
import {
  BlockedReason,
  type BlockedOutcome,
  type CompletedOutcome,
  type FailedOutcome,
  type Outcome,
} from '../types/outcome.js';
import {
  ConflictError,
  ErrorKind,
  MalformedRowError,
  NotFoundError,
  getErrorCode,
  getErrorKind,
  toPipelineErrorCode,
} from '../types/pipeline-error.js';
import {
  RetryPolicyEngine,
  classifyError,
  type ErrorClass,
  type RetryFailure,
  type RetryResult,
} from './retry-policy.js';
import {
  InvalidTransitionError,
  StatusLedger,
  PHASE_COMPLETION_STATUS,
  nextPhase,
} from './status-ledger.js';
import { createLogger } from '../utils/logger.js';
import { sha256Hex } from '../utils/hash.js';

const log = createLogger('orchestrator');

/**
 * Collaborators the orchestrator drives.
 */
export interface OrchestratorDeps {
  store: RecordStore;
  generator: ContentGenerator;
  publisher: Publisher;

  /** Prompt template text handed to the generator */
  template: string;

  /**
   * Retry engine for external calls and commits.
   * Built from the configuration by the pipeline factory.
   */
  retry: RetryPolicyEngine;

  /** Defaults to a ledger over `store` */
  ledger?: StatusLedger;
}

/**
 * Idempotency key a publisher records with each publication.
 */
export function buildIdempotencyKey(rowId: string, content: string): string {
  return sha256Hex(`${rowId}\n${content}`);
}

/**
 * Whether a run outcome ends a driving loop.
 */
export function isSettled(outcome: Outcome): boolean {
  return outcome.type !== 'completed' || outcome.status === PostStatus.ARCHIVED;
}

type Claim =
  | {
      claimed: true;
      row: Row;
      /** The row was already in (or re-entered) the phase, so earlier attempts may have happened */
      resumed: boolean;
    }
  | { claimed: false; outcome: Outcome };

/**
 * Store writes are retried like external calls; a rejected transition is a
 * programmer error and is never retried.
 */
function classifyWriteError(error: Error): ErrorClass {
  return error instanceof InvalidTransitionError ? 'permanent' : classifyError(error);
}

/**
 * The main Orchestrator class.
 */
export class Orchestrator {
  private readonly store: RecordStore;
  private readonly generator: ContentGenerator;
  private readonly publisher: Publisher;
  private readonly template: string;
  private readonly retry: RetryPolicyEngine;
  private readonly ledger: StatusLedger;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.publisher = deps.publisher;
    this.template = deps.template;
    this.retry = deps.retry;
    this.ledger = deps.ledger ?? new StatusLedger(deps.store);
  }

  /**
   * Advance the active row by exactly one phase.
   */
  async runOnce(): Promise<Outcome> {
    const read = await this.retry.execute(() => this.store.readActiveRow(), classifyError, {
      label: 'read-active-row',
    });

    if (!read.success) {
      if (read.finalError instanceof NotFoundError) {
        log.info('No active row');
        return blocked(BlockedReason.NO_ACTIVE_ROW, read.finalError.message, null);
      }
      log.error({ err: read.finalError }, 'Failed to read the active row');
      return failedOutcome(null, null, read.finalError, read.permanent, null, read.attempts.length);
    }

    const row = read.result;

    if (row.status === PostStatus.ARCHIVED) {
      return blocked(BlockedReason.ALREADY_ARCHIVED, `Row ${row.id} is already archived`, row.id);
    }

    if (row.status === PostStatus.FAILED && row.failure?.permanent === true) {
      log.warn(
        { rowId: row.id, phase: row.failure.phase, code: row.failure.code },
        'Row has a permanent failure, waiting for an operator retry'
      );
      return {
        type: 'failed',
        rowId: row.id,
        phase: row.failure.phase,
        permanent: true,
        error: {
          code: toPipelineErrorCode(row.failure.code),
          kind: ErrorKind.PERMANENT,
          message: row.failure.message,
        },
        status: row.status,
        attempts: 0,
      };
    }

    const phase = nextPhase(row.status, row.failure?.phase ?? null);
    if (phase === null) {
      return blocked(BlockedReason.ALREADY_ARCHIVED, `Row ${row.id} has nothing left to do`, row.id);
    }

    log.info({ rowId: row.id, status: row.status, phase }, 'Phase starting');

    let outcome: Outcome;
    try {
      outcome = await this.runPhase(row, phase);
    } catch (error) {
      if (error instanceof ConflictError) {
        log.info({ rowId: row.id, phase, err: error }, 'Lost a status race');
        return blocked(BlockedReason.CONFLICT, error.message, row.id);
      }
      throw error;
    }

    log.info(
      { rowId: row.id, phase, outcome: outcome.type, status: outcome.type === 'blocked' ? null : outcome.status },
      'Phase finished'
    );
    return outcome;
  }

  /**
   * Call runOnce until the row is archived, blocked or failed.
   */
  async runUntilSettled(maxSteps = 10): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];

    for (let step = 0; step < maxSteps; step++) {
      const outcome = await this.runOnce();
      outcomes.push(outcome);
      if (isSettled(outcome)) {
        break;
      }
    }

    return outcomes;
  }

  /**
   * Discard generated content so the next run generates again.
   */
  async requestRegeneration(rowId?: string): Promise<Row> {
    const id = rowId ?? (await this.store.readActiveRow()).id;
    return this.ledger.requestRegeneration(id);
  }

  /**
   * Re-arm a failed row, permanent failures included.
   */
  async requestRetry(rowId?: string): Promise<Row> {
    const id = rowId ?? (await this.store.readActiveRow()).id;
    return this.ledger.requestRetry(id);
  }

  private runPhase(row: Row, phase: Phase): Promise<Outcome> {
    switch (phase) {
      case Phase.GENERATING:
        return this.runGeneration(row);
      case Phase.POSTING:
        return this.runPosting(row);
      case Phase.ARCHIVING:
        return this.runArchiving(row);
    }
  }

  private async runGeneration(row: Row): Promise<Outcome> {
    const claim = await this.claim(row, Phase.GENERATING);
    if (!claim.claimed) {
      return claim.outcome;
    }
    const claimed = claim.row;

    let current = claimed;
    let content: string;
    if (claimed.content !== null) {
      // Generated by an earlier run whose commit failed
      log.info({ rowId: claimed.id }, 'Reusing content generated before the last failure');
      content = claimed.content;
    } else {
      const attempted = await this.attemptPhase(claimed, Phase.GENERATING, (_attempt, signal) =>
        this.generator.generate(claimed.topic, this.template, signal)
      );
      current = attempted.row;
      if (!attempted.result.success) {
        return this.fail(current, Phase.GENERATING, attempted.result);
      }
      content = attempted.result.result;
    }

    const committing = current;
    const commit = await this.commitWithRetry(`commit:generating:${committing.id}`, () =>
      this.ledger.commit(committing, PostStatus.GENERATING, PostStatus.GENERATED, {
        content,
        attemptCounts: StatusLedger.resetCounter(committing, Phase.GENERATING),
      })
    );
    if (!commit.success) {
      // Keep the post on the failed row so the next run commits it instead of generating again
      const kept: RowPatch = content.trim() === '' ? {} : { content };
      return this.fail(current, Phase.GENERATING, commit, kept);
    }

    return completed(commit.result, Phase.GENERATING);
  }

  private async runPosting(row: Row): Promise<Outcome> {
    const claim = await this.claim(row, Phase.POSTING);
    if (!claim.claimed) {
      return claim.outcome;
    }
    const { row: claimed, resumed } = claim;
    const content = claimed.content;

    if (content === null) {
      const error = new MalformedRowError(claimed.id, [`content is required in status '${claimed.status}'`]);
      return this.fail(claimed, Phase.POSTING, { finalError: error, permanent: true, attempts: [] });
    }

    const idempotencyKey = buildIdempotencyKey(claimed.id, content);
    const hint: ReceiptHint = {
      rowId: claimed.id,
      idempotencyKey,
      content,
      receipt: claimed.receipt,
    };
    const request: PublishRequest = {
      rowId: claimed.id,
      topic: claimed.topic,
      content,
      idempotencyKey,
      scheduledAt: claimed.scheduledAt,
    };
    const startAttempt = claimed.attemptCounts.posting;

    const { result, row: current } = await this.attemptPhase(
      claimed,
      Phase.POSTING,
      async (attempt, signal) => {
        if (resumed || attempt > startAttempt) {
          const alreadyPublished = await this.publisher.verifyPublished(hint, signal);
          if (alreadyPublished) {
            log.info({ rowId: claimed.id, attempt, idempotencyKey }, 'Publication already present, skipping publish');
            return verifiedReceipt(hint, claimed.scheduledAt);
          }
        }
        return this.publisher.publish(request, signal);
      }
    );
    if (!result.success) {
      return this.fail(current, Phase.POSTING, result);
    }

    const receipt = result.result;
    const commit = await this.commitWithRetry(`commit:posting:${current.id}`, () =>
      this.ledger.commit(current, PostStatus.POSTING, PostStatus.POSTED, {
        receipt,
        attemptCounts: StatusLedger.resetCounter(current, Phase.POSTING),
      })
    );
    if (!commit.success) {
      // The next run verifies the publication instead of publishing again
      log.error(
        { rowId: current.id, receiptId: receipt.receiptId, err: commit.finalError },
        'Published but could not record the receipt'
      );
      return this.fail(current, Phase.POSTING, commit);
    }

    return completed(commit.result, Phase.POSTING);
  }

  private async runArchiving(row: Row): Promise<Outcome> {
    const claim = await this.claim(row, Phase.ARCHIVING);
    if (!claim.claimed) {
      return claim.outcome;
    }
    const claimed = claim.row;

    // The archive write is the commit for this phase
    const { result, row: current } = await this.attemptPhase(claimed, Phase.ARCHIVING, () =>
      this.store.archiveRow(claimed.id)
    );
    if (!result.success) {
      return this.fail(current, Phase.ARCHIVING, result);
    }

    return completed(result.result, Phase.ARCHIVING);
  }

  /**
   * Move the row into the phase status unless it is already there. A row
   * already in the phase is claimed by the first attempt-counter write.
   */
  private async claim(row: Row, phase: Phase): Promise<Claim> {
    if (row.status === phase) {
      return { claimed: true, row, resumed: true };
    }

    const reentering = row.status === PostStatus.FAILED;
    if (reentering) {
      log.info({ rowId: row.id, phase, code: row.failure?.code }, 'Re-entering failed phase');
    }
    const result = await this.commitWithRetry(`claim:${phase}:${row.id}`, () =>
      reentering ? this.ledger.reenterFailed(row) : this.ledger.commit(row, row.status, phase)
    );
    if (result.success) {
      return { claimed: true, row: result.result, resumed: reentering };
    }

    const error = result.finalError;
    if (error instanceof ConflictError) {
      log.info({ rowId: row.id, phase, err: error }, 'Lost a status race');
      return { claimed: false, outcome: blocked(BlockedReason.CONFLICT, error.message, row.id) };
    }
    if (error instanceof InvalidTransitionError) {
      throw error;
    }
    log.error({ rowId: row.id, phase, err: error }, 'Could not claim the row');
    return {
      claimed: false,
      outcome: failedOutcome(row.id, phase, error, result.permanent, row.status, result.attempts.length),
    };
  }

  /**
   * Run the phase's external call, persisting the attempt counter before each attempt.
   */
  private async attemptPhase<T>(
    row: Row,
    phase: Phase,
    operation: (attempt: number, signal: AbortSignal) => Promise<T>
  ): Promise<{ result: RetryResult<T>; row: Row }> {
    let current = row;
    const result = await this.retry.execute(operation, classifyError, {
      label: `${phase}:${row.id}`,
      startAttempt: row.attemptCounts[phase],
      beforeAttempt: async (attempt) => {
        current = await this.ledger.recordAttempt(current, phase, attempt + 1);
      },
    });
    return { result, row: current };
  }

  private commitWithRetry(label: string, write: () => Promise<Row>): Promise<RetryResult<Row>> {
    return this.retry.execute(() => write(), classifyWriteError, { label });
  }

  /**
   * Record a phase failure on the row and build the outcome.
   */
  private async fail(
    row: Row,
    phase: Phase,
    result: Pick<RetryFailure, 'finalError' | 'permanent' | 'attempts'>,
    fields: RowPatch = {}
  ): Promise<Outcome> {
    const error = result.finalError;
    const attempts = result.attempts.length;

    if (error instanceof ConflictError) {
      log.info({ rowId: row.id, phase, err: error }, 'Lost a status race');
      return blocked(BlockedReason.CONFLICT, error.message, row.id);
    }

    try {
      const failed = await this.ledger.markFailed(
        row,
        phase,
        { code: getErrorCode(error), message: error.message, permanent: result.permanent },
        fields
      );
      return failedOutcome(failed.id, phase, error, result.permanent, failed.status, attempts);
    } catch (markError) {
      if (markError instanceof ConflictError) {
        return blocked(BlockedReason.CONFLICT, markError.message, row.id);
      }
      log.error({ rowId: row.id, phase, err: markError }, 'Could not record the failure on the row');
      return failedOutcome(row.id, phase, error, result.permanent, row.status, attempts);
    }
  }
}

function completed(row: Row, phase: Phase): CompletedOutcome {
  return {
    type: 'completed',
    rowId: row.id,
    phase,
    status: PHASE_COMPLETION_STATUS[phase],
  };
}

function blocked(reason: BlockedReason, message: string, rowId: string | null): BlockedOutcome {
  return { type: 'blocked', reason, message, rowId };
}

function failedOutcome(
  rowId: string | null,
  phase: Phase | null,
  error: Error,
  permanent: boolean,
  status: PostStatus | null,
  attempts: number
): FailedOutcome {
  return {
    type: 'failed',
    rowId,
    phase,
    permanent,
    error: {
      code: getErrorCode(error),
      kind: permanent ? ErrorKind.PERMANENT : getErrorKind(error),
      message: error.message,
    },
    status,
    attempts,
  };
}

function verifiedReceipt(hint: ReceiptHint, scheduledAt: string | null): PublishReceipt {
  return {
    receiptId: hint.receipt?.receiptId ?? hint.idempotencyKey,
    idempotencyKey: hint.idempotencyKey,
    publishedAt: hint.receipt?.publishedAt ?? new Date().toISOString(),
    scheduledAt,
    url: hint.receipt?.url ?? null,
    verified: true,
  };
}

/**
 * Create an orchestrator instance.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  return new Orchestrator(deps);
}
