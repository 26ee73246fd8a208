// Row Types
export {
  PostStatus,
  Phase,
  ALL_STATUSES,
  ALL_PHASES,
  CONTENT_REQUIRED_STATUSES,
  RECEIPT_REQUIRED_STATUSES,
  postStatusSchema,
  phaseSchema,
  attemptCountsSchema,
  publishReceiptSchema,
  rowFailureSchema,
  topicSchema,
  scheduledAtSchema,
  newRowInputSchema,
  emptyAttemptCounts,
  createRow,
  applyPatch,
  findRowViolations,
  assertRowInvariants,
  type AttemptCounts,
  type PublishReceipt,
  type RowFailure,
  type Row,
  type RowPatch,
  type NewRowInput,
} from './row.js';

// Adapter Contracts
export type {
  WriteRowOptions,
  RecordStore,
  ContentGenerator,
  PublishRequest,
  ReceiptHint,
  Publisher,
} from './adapters.js';

// Outcome Types
export {
  BlockedReason,
  type CompletedOutcome,
  type BlockedOutcome,
  type FailedOutcome,
  type Outcome,
} from './outcome.js';

// Error Types
export {
  ErrorKind,
  PipelineErrorCode,
  PIPELINE_ERROR_DESCRIPTIONS,
  toPipelineErrorCode,
  PipelineError,
  TransientError,
  PermanentError,
  ConflictError,
  NotFoundError,
  MalformedRowError,
  TimeoutError,
  RateLimitedError,
  InvalidTemplateError,
  UpstreamError,
  AuthenticationFailedError,
  InterfaceElementNotFoundError,
  NetworkError,
  StoreUnavailableError,
  getErrorKind,
  getErrorCode,
  toError,
  type PipelineErrorOptions,
} from './pipeline-error.js';
