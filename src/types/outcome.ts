import type { ErrorKind, PipelineErrorCode } from './pipeline-error.js';
import type { Phase, PostStatus } from './row.js';

// Reasons a run can legitimately do nothing
export const BlockedReason = {
  NO_ACTIVE_ROW: 'no_active_row',
  ALREADY_ARCHIVED: 'already_archived',
  CONFLICT: 'conflict',
} as const;

export type BlockedReason = (typeof BlockedReason)[keyof typeof BlockedReason];

export interface CompletedOutcome {
  type: 'completed';
  rowId: string;
  phase: Phase;
  status: PostStatus;
}

export interface BlockedOutcome {
  type: 'blocked';
  reason: BlockedReason;
  message: string;
  rowId: string | null;
}

export interface FailedOutcome {
  type: 'failed';
  rowId: string | null;
  /** Null only when the active row could not be read */
  phase: Phase | null;
  permanent: boolean;
  error: {
    code: PipelineErrorCode;
    kind: ErrorKind;
    message: string;
  };
  /** The row's persisted status after the failure was recorded, if known */
  status: PostStatus | null;
  attempts: number;
}

export type Outcome = CompletedOutcome | BlockedOutcome | FailedOutcome;
