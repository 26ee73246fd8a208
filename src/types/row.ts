import { z } from 'zod';
import { MalformedRowError } from './pipeline-error.js';

// Post Status (State Machine States)
export const PostStatus = {
  PENDING: 'pending',
  GENERATING: 'generating',
  GENERATED: 'generated',
  POSTING: 'posting',
  POSTED: 'posted',
  ARCHIVING: 'archiving',
  ARCHIVED: 'archived',
  FAILED: 'failed',
} as const;

export type PostStatus = (typeof PostStatus)[keyof typeof PostStatus];

// Phases are the in-progress statuses; each one owns a single external call
export const Phase = {
  GENERATING: 'generating',
  POSTING: 'posting',
  ARCHIVING: 'archiving',
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];

export const ALL_STATUSES: readonly PostStatus[] = Object.values(PostStatus);
export const ALL_PHASES: readonly Phase[] = Object.values(Phase);

/**
 * Statuses in which a row must carry generated content.
 */
export const CONTENT_REQUIRED_STATUSES: readonly PostStatus[] = [
  PostStatus.GENERATED,
  PostStatus.POSTING,
  PostStatus.POSTED,
  PostStatus.ARCHIVING,
  PostStatus.ARCHIVED,
];

/**
 * Statuses in which a row must carry a publish receipt.
 */
export const RECEIPT_REQUIRED_STATUSES: readonly PostStatus[] = [
  PostStatus.POSTED,
  PostStatus.ARCHIVING,
  PostStatus.ARCHIVED,
];

export type AttemptCounts = Record<Phase, number>;

/**
 * Confirmation returned by a publisher. `idempotencyKey` ties it back to the
 * row and content that produced it.
 */
export interface PublishReceipt {
  receiptId: string;
  idempotencyKey: string;
  publishedAt: string;
  scheduledAt: string | null;
  url: string | null;
  /** True when the receipt was rebuilt from a verify check instead of a publish call */
  verified: boolean;
}

/**
 * Failure recorded on a row while it sits in `failed`.
 */
export interface RowFailure {
  phase: Phase;
  code: string;
  message: string;
  permanent: boolean;
  failedAt: string;
}

// Row
export interface Row {
  id: string;
  topic: string;
  content: string | null;
  status: PostStatus;
  scheduledAt: string | null;
  attemptCounts: AttemptCounts;
  failure: RowFailure | null;
  receipt: PublishReceipt | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields a store write may change. `id`, `topic` and `createdAt` are immutable.
 */
export type RowPatch = Partial<
  Pick<Row, 'content' | 'scheduledAt' | 'attemptCounts' | 'failure' | 'receipt'>
>;

export interface NewRowInput {
  topic: string;
  scheduledAt?: string | null | undefined;
}

// Zod schemas used at the store boundary

export const postStatusSchema = z.enum([
  PostStatus.PENDING,
  PostStatus.GENERATING,
  PostStatus.GENERATED,
  PostStatus.POSTING,
  PostStatus.POSTED,
  PostStatus.ARCHIVING,
  PostStatus.ARCHIVED,
  PostStatus.FAILED,
]);

export const phaseSchema = z.enum([Phase.GENERATING, Phase.POSTING, Phase.ARCHIVING]);

export const attemptCountsSchema = z.object({
  generating: z.number().int().min(0).default(0),
  posting: z.number().int().min(0).default(0),
  archiving: z.number().int().min(0).default(0),
});

export const publishReceiptSchema = z.object({
  receiptId: z.string().min(1),
  idempotencyKey: z.string().min(1),
  publishedAt: z.string(),
  scheduledAt: z.string().nullable().default(null),
  url: z.string().nullable().default(null),
  verified: z.boolean().default(false),
});

export const rowFailureSchema = z.object({
  phase: phaseSchema,
  code: z.string(),
  message: z.string(),
  permanent: z.boolean(),
  failedAt: z.string(),
});

export const topicSchema = z.string().trim().min(1, 'Topic must not be empty');

export const scheduledAtSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO 8601 date-time');

export const newRowInputSchema = z.object({
  topic: topicSchema,
  scheduledAt: scheduledAtSchema.nullable().optional(),
});

/**
 * Create a fresh attempt counter map.
 */
export function emptyAttemptCounts(): AttemptCounts {
  return {
    generating: 0,
    posting: 0,
    archiving: 0,
  };
}

/**
 * Create a new pending row.
 */
export function createRow(id: string, input: NewRowInput, now: Date = new Date()): Row {
  const timestamp = now.toISOString();
  return {
    id,
    topic: input.topic.trim(),
    content: null,
    status: PostStatus.PENDING,
    scheduledAt: input.scheduledAt ?? null,
    attemptCounts: emptyAttemptCounts(),
    failure: null,
    receipt: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Apply a patch to a row, returning a new row.
 */
export function applyPatch(row: Row, status: PostStatus, fields: RowPatch = {}, now: Date = new Date()): Row {
  const next: Row = {
    ...row,
    status,
    attemptCounts: { ...row.attemptCounts },
    updatedAt: now.toISOString(),
  };

  if (fields.content !== undefined) {
    next.content = fields.content;
  }
  if (fields.scheduledAt !== undefined) {
    next.scheduledAt = fields.scheduledAt;
  }
  if (fields.attemptCounts !== undefined) {
    next.attemptCounts = { ...fields.attemptCounts };
  }
  if (fields.failure !== undefined) {
    next.failure = fields.failure;
  }
  if (fields.receipt !== undefined) {
    next.receipt = fields.receipt;
  }

  return next;
}

/**
 * Check the row-level invariants. Returns the list of violations (empty when valid).
 */
export function findRowViolations(row: Row): string[] {
  const violations: string[] = [];

  if (row.topic.trim().length === 0) {
    violations.push('topic is empty');
  }

  const needsContent =
    CONTENT_REQUIRED_STATUSES.includes(row.status) ||
    (row.status === PostStatus.FAILED &&
      row.failure !== null &&
      row.failure.phase !== Phase.GENERATING);
  if (needsContent && (row.content === null || row.content.trim().length === 0)) {
    violations.push(`content is required in status '${row.status}'`);
  }

  if (RECEIPT_REQUIRED_STATUSES.includes(row.status) && row.receipt === null) {
    violations.push(`receipt is required in status '${row.status}'`);
  }

  if (row.status === PostStatus.FAILED && row.failure === null) {
    violations.push('failed row has no failure record');
  }
  if (row.status !== PostStatus.FAILED && row.failure !== null) {
    violations.push(`failure record present in status '${row.status}'`);
  }

  for (const phase of ALL_PHASES) {
    const count = row.attemptCounts[phase];
    if (!Number.isInteger(count) || count < 0) {
      violations.push(`attempt count for '${phase}' is invalid`);
    }
  }

  return violations;
}

/**
 * Throw MalformedRowError when a row breaks an invariant.
 */
export function assertRowInvariants(row: Row): void {
  const violations = findRowViolations(row);
  if (violations.length > 0) {
    throw new MalformedRowError(row.id, violations);
  }
}
