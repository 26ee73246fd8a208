/**
 * Structured pipeline errors.
 *
 * Every failure that crosses an adapter boundary is a PipelineError carrying a
 * code and a kind. The kind drives retry and outcome decisions; the code is what
 * operators see.
 */

import type { PostStatus } from './row.js';

/**
 * How an error is handled by the retry engine and the orchestrator.
 */
export const ErrorKind = {
  /** Retry-eligible: network, rate limiting, not-yet-rendered UI */
  TRANSIENT: 'transient',
  /** Not retry-eligible: bad credentials, invalid template, malformed row */
  PERMANENT: 'permanent',
  /** Benign concurrent-mutation signal from a compare-and-swap write */
  CONFLICT: 'conflict',
  /** Legitimate empty-work signal */
  NOT_FOUND: 'not_found',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export const PipelineErrorCode = {
  RATE_LIMITED: 'RATE_LIMITED',
  INVALID_TEMPLATE: 'INVALID_TEMPLATE',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  INTERFACE_ELEMENT_NOT_FOUND: 'INTERFACE_ELEMENT_NOT_FOUND',
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  MALFORMED_ROW: 'MALFORMED_ROW',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  CONFLICT: 'CONFLICT',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN: 'UNKNOWN',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

/**
 * Human-readable descriptions for each error code.
 */
export const PIPELINE_ERROR_DESCRIPTIONS: Record<PipelineErrorCode, string> = {
  [PipelineErrorCode.RATE_LIMITED]: 'The content generator rejected the call for rate limiting',
  [PipelineErrorCode.INVALID_TEMPLATE]: 'The prompt template is missing or malformed',
  [PipelineErrorCode.UPSTREAM_ERROR]: 'The content generator returned an error',
  [PipelineErrorCode.AUTHENTICATION_FAILED]: 'Credentials were rejected',
  [PipelineErrorCode.INTERFACE_ELEMENT_NOT_FOUND]: 'A required interface element did not appear',
  [PipelineErrorCode.NETWORK_ERROR]: 'A network call failed',
  [PipelineErrorCode.TIMEOUT]: 'The call exceeded its timeout',
  [PipelineErrorCode.MALFORMED_ROW]: 'The row data is malformed',
  [PipelineErrorCode.STORE_UNAVAILABLE]: 'The record store could not be reached',
  [PipelineErrorCode.CONFLICT]: 'The row was changed by another process',
  [PipelineErrorCode.NOT_FOUND]: 'No matching row exists',
  [PipelineErrorCode.UNKNOWN]: 'An unknown error occurred',
};

/**
 * Narrow a code read back from storage; codes this build does not know map to UNKNOWN.
 */
export function toPipelineErrorCode(code: string): PipelineErrorCode {
  return Object.values(PipelineErrorCode).find((candidate) => candidate === code) ?? PipelineErrorCode.UNKNOWN;
}

export interface PipelineErrorOptions {
  cause?: unknown;
  /** Transient until the retry budget runs out, then reported as permanent */
  escalatesWhenExhausted?: boolean;
  details?: Record<string, unknown>;
}

/**
 * Base class for all classified pipeline errors.
 */
export class PipelineError extends Error {
  readonly escalatesWhenExhausted: boolean;
  readonly details: Record<string, unknown>;

  constructor(
    public readonly code: PipelineErrorCode,
    public readonly kind: ErrorKind,
    message: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.escalatesWhenExhausted = options.escalatesWhenExhausted ?? false;
    this.details = options.details ?? {};
  }
}

export class TransientError extends PipelineError {
  constructor(code: PipelineErrorCode, message: string, options?: PipelineErrorOptions) {
    super(code, ErrorKind.TRANSIENT, message, options);
    this.name = 'TransientError';
  }
}

export class PermanentError extends PipelineError {
  constructor(code: PipelineErrorCode, message: string, options?: PipelineErrorOptions) {
    super(code, ErrorKind.PERMANENT, message, options);
    this.name = 'PermanentError';
  }
}

/**
 * Raised by compare-and-swap writes when the persisted status (or attempt
 * counter) no longer matches.
 */
export class ConflictError extends PipelineError {
  constructor(
    public readonly rowId: string,
    public readonly expected: PostStatus,
    public readonly actual: PostStatus | null,
    message?: string
  ) {
    super(
      PipelineErrorCode.CONFLICT,
      ErrorKind.CONFLICT,
      message ??
        (actual === null
          ? `Row ${rowId} is no longer in the active store (expected '${expected}')`
          : `Row ${rowId} is in '${actual}', expected '${expected}'`)
    );
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super(PipelineErrorCode.NOT_FOUND, ErrorKind.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

export class MalformedRowError extends PermanentError {
  constructor(
    public readonly rowId: string,
    public readonly violations: string[]
  ) {
    super(
      PipelineErrorCode.MALFORMED_ROW,
      `Row ${rowId} is malformed: ${violations.join('; ')}`,
      { details: { violations } }
    );
    this.name = 'MalformedRowError';
  }
}

export class TimeoutError extends TransientError {
  constructor(public readonly timeoutMs: number) {
    super(PipelineErrorCode.TIMEOUT, `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// Generator failure modes

export class RateLimitedError extends TransientError {
  constructor(message = 'Rate limited by the content generator', options?: PipelineErrorOptions) {
    super(PipelineErrorCode.RATE_LIMITED, message, options);
    this.name = 'RateLimitedError';
  }
}

export class InvalidTemplateError extends PermanentError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(PipelineErrorCode.INVALID_TEMPLATE, message, options);
    this.name = 'InvalidTemplateError';
  }
}

export class UpstreamError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions & { permanent?: boolean } = {}) {
    super(
      PipelineErrorCode.UPSTREAM_ERROR,
      options.permanent === true ? ErrorKind.PERMANENT : ErrorKind.TRANSIENT,
      message,
      options
    );
    this.name = 'UpstreamError';
  }
}

// Publisher failure modes

export class AuthenticationFailedError extends PermanentError {
  constructor(message = 'Authentication was rejected', options?: PipelineErrorOptions) {
    super(PipelineErrorCode.AUTHENTICATION_FAILED, message, options);
    this.name = 'AuthenticationFailedError';
  }
}

export class InterfaceElementNotFoundError extends TransientError {
  constructor(element: string, options?: PipelineErrorOptions) {
    super(PipelineErrorCode.INTERFACE_ELEMENT_NOT_FOUND, `Interface element not found: ${element}`, {
      ...options,
      escalatesWhenExhausted: true,
    });
    this.name = 'InterfaceElementNotFoundError';
  }
}

export class NetworkError extends TransientError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(PipelineErrorCode.NETWORK_ERROR, message, options);
    this.name = 'NetworkError';
  }
}

export class StoreUnavailableError extends TransientError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(PipelineErrorCode.STORE_UNAVAILABLE, message, options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Read the kind of any thrown value. Unclassified errors are treated as transient.
 */
export function getErrorKind(error: unknown): ErrorKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }
  return ErrorKind.TRANSIENT;
}

/**
 * Read the code of any thrown value.
 */
export function getErrorCode(error: unknown): PipelineErrorCode {
  if (error instanceof PipelineError) {
    return error.code;
  }
  return PipelineErrorCode.UNKNOWN;
}

/**
 * Normalize a thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
