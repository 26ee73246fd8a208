/**
 * Contracts for the external collaborators the orchestrator drives.
 *
 * The core only depends on these interfaces; concrete adapters live under
 * src/store, src/generator and src/publisher.
 */

import type { NewRowInput, Phase, PostStatus, PublishReceipt, Row, RowPatch } from './row.js';

export interface WriteRowOptions {
  /** When set, the write only applies if the persisted status still equals this value */
  expectedStatus?: PostStatus;
  /**
   * When set, the write only applies if the persisted attempt counter of
   * `phase` still equals `count`. Makes a resumed phase claim exclusive.
   */
  expectedAttemptCount?: { phase: Phase; count: number };
}

/**
 * Read/write access to the active table and its archive.
 *
 * Implementations must reject writes that break the row invariants with a
 * MalformedRowError and must raise NotFoundError from readActiveRow when the
 * active table is empty.
 */
export interface RecordStore {
  /** The single "next" row: the first row of the active table */
  readActiveRow(): Promise<Row>;
  readRow(rowId: string): Promise<Row>;
  writeRow(rowId: string, fields: RowPatch, options?: WriteRowOptions): Promise<Row>;
  /** Throws ConflictError when the persisted status is not `expected` */
  compareAndSwapStatus(
    rowId: string,
    expected: PostStatus,
    next: PostStatus,
    fields?: RowPatch
  ): Promise<Row>;
  /**
   * Copy the row to the archive with status `archived` and remove it from the
   * active table. Only valid from `posted` or `archiving`; a row already in the
   * archive is not appended twice.
   */
  archiveRow(rowId: string): Promise<Row>;
  appendRow(input: NewRowInput): Promise<Row>;
  /** Active rows in processing order; the first one is the active row */
  listActiveRows(): Promise<Row[]>;
  listArchivedRows(): Promise<Row[]>;
}

/**
 * Turns a topic into post text.
 *
 * Failure modes: RateLimitedError (transient), InvalidTemplateError (permanent),
 * UpstreamError (transient unless flagged permanent).
 */
export interface ContentGenerator {
  generate(topic: string, template: string, signal?: AbortSignal): Promise<string>;
}

export interface PublishRequest {
  rowId: string;
  topic: string;
  content: string;
  idempotencyKey: string;
  scheduledAt: string | null;
}

/**
 * What the orchestrator knows about a possibly-completed publication.
 */
export interface ReceiptHint {
  rowId: string;
  idempotencyKey: string;
  content: string;
  receipt: PublishReceipt | null;
}

/**
 * Publishes content through an automation target.
 *
 * Failure modes: AuthenticationFailedError (permanent),
 * InterfaceElementNotFoundError (transient, then permanent when exhausted),
 * NetworkError (transient). Sessions must be torn down before the returned
 * promise settles, including when `signal` aborts.
 */
export interface Publisher {
  publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishReceipt>;
  /** Idempotency check used before any publish retry */
  verifyPublished(hint: ReceiptHint, signal?: AbortSignal): Promise<boolean>;
}
