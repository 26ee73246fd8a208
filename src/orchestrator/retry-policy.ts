/**
 * Retry Policy Engine
 *
 * Wraps a fallible external call with bounded retry and exponential backoff.
 * Transient errors are retried up to the attempt budget; permanent errors stop
 * immediately. Attempt numbering can start past zero so a restarted process
 * resumes the backoff schedule recorded on the row instead of resetting it.
 */

import {
  ErrorKind,
  TimeoutError,
  PipelineError,
  getErrorKind,
  toError,
} from '../types/pipeline-error.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Total number of attempts, first attempt included (minimum 1) */
  maxAttempts: number;

  /** Delay before the first retry in milliseconds */
  backoffMs: number;

  /** Backoff multiplier for exponential backoff */
  backoffMultiplier: number;

  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number;

  /** Whether to add jitter to backoff (0-25% of backoff value) */
  jitter: boolean;

  /** Per-attempt timeout in milliseconds (0 = no timeout) */
  timeoutMs: number;
}

export type ErrorClass = 'transient' | 'permanent';

export type ErrorClassifier = (error: Error) => ErrorClass;

/**
 * Record of a single attempt.
 */
export interface RetryAttempt {
  /** Attempt number (0 = first attempt, 1 = first retry, etc.) */
  attempt: number;

  /** Whether this attempt succeeded */
  success: boolean;

  /** Error if failed, null otherwise */
  error: Error | null;

  /** Classification of the error, null on success */
  errorClass: ErrorClass | null;

  /** Duration of this attempt in milliseconds */
  durationMs: number;

  /** Delay waited before this attempt in milliseconds */
  delayMs: number;
}

interface RetryResultBase {
  /** Attempt records for this execution */
  attempts: RetryAttempt[];

  /** Attempt number after the last attempt made (persisted counters resume from here) */
  nextAttempt: number;

  /** Total duration including all retries and delays */
  totalDurationMs: number;
}

export interface RetrySuccess<T> extends RetryResultBase {
  success: true;
  result: T;
  finalError: null;
  permanent: false;
}

export interface RetryFailure extends RetryResultBase {
  success: false;
  result: null;
  finalError: Error;
  /** True when the failure must not be retried automatically */
  permanent: boolean;
}

/**
 * Summary of all attempts for an operation.
 */
export type RetryResult<T> = RetrySuccess<T> | RetryFailure;

export interface ExecuteOptions {
  /** Attempt number to start from (attempts already made before a restart) */
  startAttempt?: number;

  /** Awaited before each attempt; throwing stops the execution with that error */
  beforeAttempt?: (attempt: number) => Promise<void>;

  /** Label used in log lines */
  label?: string;
}

export interface RetryPolicyEngineDeps {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Default retry policy - matches the configuration defaults.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 2000,
  backoffMultiplier: 2,
  maxBackoffMs: 60000,
  jitter: true,
  timeoutMs: 120000,
};

/**
 * No retry policy - for deterministic testing or when retries are undesirable.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  backoffMs: 0,
  backoffMultiplier: 1,
  maxBackoffMs: 0,
  jitter: false,
  timeoutMs: 0,
};

/**
 * Default classifier: reads the kind of a PipelineError, treats anything
 * unclassified as transient. Conflicts and not-found signals stop immediately.
 */
export function classifyError(error: Error): ErrorClass {
  return getErrorKind(error) === ErrorKind.TRANSIENT ? 'transient' : 'permanent';
}

/**
 * RetryPolicyEngine - Executes operations with configurable retry logic.
 */
export class RetryPolicyEngine {
  private readonly policy: RetryPolicy;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY, deps: RetryPolicyEngineDeps = {}) {
    if (policy.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${policy.maxAttempts}`);
    }
    this.policy = { ...policy };
    this.sleepFn = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = deps.random ?? Math.random;
  }

  /**
   * Get the current policy configuration.
   */
  getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Execute an operation with retry logic.
   *
   * The operation receives the attempt number and an AbortSignal that fires
   * when the attempt times out.
   */
  async execute<T>(
    operation: (attempt: number, signal: AbortSignal) => Promise<T>,
    classify: ErrorClassifier = classifyError,
    options: ExecuteOptions = {}
  ): Promise<RetryResult<T>> {
    const attempts: RetryAttempt[] = [];
    const startTime = Date.now();
    const label = options.label ?? 'operation';
    let attempt = options.startAttempt ?? 0;
    let lastError: Error | null = null;
    let lastClass: ErrorClass = 'transient';

    while (attempt < this.policy.maxAttempts) {
      const delayMs = attempt > 0 ? this.calculateBackoff(attempt - 1) : 0;
      if (delayMs > 0) {
        log.info(
          { label, attempt, maxAttempts: this.policy.maxAttempts, delayMs },
          'Waiting before retry'
        );
        await this.sleepFn(delayMs);
      }

      if (options.beforeAttempt) {
        try {
          await options.beforeAttempt(attempt);
        } catch (error) {
          // Bookkeeping failures end the execution without consuming the attempt
          lastError = toError(error);
          lastClass = classify(lastError);
          log.warn({ label, attempt, err: lastError }, 'Pre-attempt hook failed, stopping');
          break;
        }
      }

      const attemptStart = Date.now();
      log.debug({ label, attempt, maxAttempts: this.policy.maxAttempts }, 'Starting attempt');

      try {
        const result = await this.runWithTimeout(operation, attempt, label);
        attempts.push({
          attempt,
          success: true,
          error: null,
          errorClass: null,
          durationMs: Date.now() - attemptStart,
          delayMs,
        });

        return {
          success: true,
          result,
          finalError: null,
          permanent: false,
          attempts,
          nextAttempt: attempt + 1,
          totalDurationMs: Date.now() - startTime,
        };
      } catch (error) {
        lastError = toError(error);
        lastClass = classify(lastError);
        attempts.push({
          attempt,
          success: false,
          error: lastError,
          errorClass: lastClass,
          durationMs: Date.now() - attemptStart,
          delayMs,
        });
        attempt++;

        if (lastClass === 'permanent') {
          log.warn({ label, attempt, err: lastError }, 'Permanent error, not retrying');
          break;
        }

        if (attempt >= this.policy.maxAttempts) {
          log.warn(
            { label, attempt, maxAttempts: this.policy.maxAttempts, err: lastError },
            'No more retries, failing'
          );
        } else {
          log.info(
            { label, attempt, maxAttempts: this.policy.maxAttempts, err: lastError },
            'Transient error, will retry'
          );
        }
      }
    }

    // Budget may already be spent before this execution started
    const finalError =
      lastError ??
      new Error(
        `Attempt budget exhausted (${attempt}/${this.policy.maxAttempts}) before ${label} could run`
      );

    return {
      success: false,
      result: null,
      finalError,
      permanent: lastClass === 'permanent' || this.escalates(finalError),
      attempts,
      nextAttempt: attempt,
      totalDurationMs: Date.now() - startTime,
    };
  }

  /**
   * Calculate backoff delay for a given retry number.
   *
   * @param retryNumber - 0 for the first retry
   */
  calculateBackoff(retryNumber: number): number {
    // Base exponential backoff: initialDelay * multiplier^retry
    const base = this.policy.backoffMs * Math.pow(this.policy.backoffMultiplier, retryNumber);

    // Cap at maximum
    const capped = Math.min(base, this.policy.maxBackoffMs);

    // Add jitter if enabled (0-25% of capped value)
    if (this.policy.jitter) {
      const jitter = capped * 0.25 * this.random();
      return Math.round(capped + jitter);
    }

    return Math.round(capped);
  }

  private escalates(error: Error): boolean {
    return error instanceof PipelineError && error.escalatesWhenExhausted;
  }

  /**
   * Run one attempt under the policy timeout. On expiry the attempt's signal
   * is aborted and the engine waits for the operation to settle before
   * failing with a TimeoutError, so no two attempts ever overlap.
   */
  private async runWithTimeout<T>(
    operation: (attempt: number, signal: AbortSignal) => Promise<T>,
    attempt: number,
    label: string
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.policy.timeoutMs;

    if (timeoutMs <= 0) {
      return operation(attempt, controller.signal);
    }

    const running = operation(attempt, controller.signal);
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), timeoutMs);
    });

    let first: { value: T } | 'expired';
    try {
      first = await Promise.race([running.then((value) => ({ value })), expired]);
    } finally {
      clearTimeout(timer);
    }
    if (first !== 'expired') {
      return first.value;
    }

    const error = new TimeoutError(timeoutMs);
    controller.abort(error);
    const [late] = await Promise.allSettled([running]);
    log.warn({ label, attempt, timeoutMs, settled: late.status }, 'Attempt timed out');
    throw error;
  }
}

/**
 * Create a RetryPolicyEngine with custom policy.
 *
 * @param policy - Partial policy to merge with defaults
 */
export function createRetryPolicyEngine(
  policy?: Partial<RetryPolicy>,
  deps?: RetryPolicyEngineDeps
): RetryPolicyEngine {
  return new RetryPolicyEngine(
    {
      ...DEFAULT_RETRY_POLICY,
      ...policy,
    },
    deps
  );
}
