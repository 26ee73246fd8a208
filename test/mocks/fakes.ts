/**
 * In-process fakes for orchestrator tests.
 */

import type {
  ContentGenerator,
  PublishRequest,
  Publisher,
  ReceiptHint,
} from '../../src/types/adapters.js';
import {
  PostStatus,
  createRow,
  type PublishReceipt,
  type Row,
  type RowPatch,
} from '../../src/types/row.js';
import { NetworkError } from '../../src/types/pipeline-error.js';
import { MemoryRecordStore } from '../../src/store/memory-record-store.js';
import { RetryPolicyEngine, type RetryPolicy } from '../../src/orchestrator/retry-policy.js';

export const TEST_TEMPLATE = '<Input>\n<UserInput></UserInput>\n</Input>';

export const FIXED_NOW = new Date('2026-03-01T09:00:00.000Z');

/**
 * Retry engine with no waiting and no jitter.
 */
export function fastRetry(overrides: Partial<RetryPolicy> = {}): RetryPolicyEngine {
  return new RetryPolicyEngine(
    {
      maxAttempts: 3,
      backoffMs: 10,
      backoffMultiplier: 2,
      maxBackoffMs: 100,
      jitter: false,
      timeoutMs: 0,
      ...overrides,
    },
    { sleep: () => Promise.resolve() }
  );
}

/**
 * Build a row in any status with the fields that status requires.
 */
export function makeRow(id: string, status: PostStatus, fields: RowPatch & { topic?: string } = {}): Row {
  const base = createRow(id, { topic: fields.topic ?? `Topic ${id}` }, FIXED_NOW);
  const needsContent = status !== PostStatus.PENDING && status !== PostStatus.GENERATING;
  const needsReceipt =
    status === PostStatus.POSTED || status === PostStatus.ARCHIVING || status === PostStatus.ARCHIVED;

  return {
    ...base,
    status,
    content: fields.content !== undefined ? fields.content : needsContent ? `Content for ${id}` : null,
    receipt:
      fields.receipt !== undefined
        ? fields.receipt
        : needsReceipt
          ? {
              receiptId: `receipt-${id}`,
              idempotencyKey: `key-${id}`,
              publishedAt: FIXED_NOW.toISOString(),
              scheduledAt: null,
              url: null,
              verified: false,
            }
          : null,
    attemptCounts: fields.attemptCounts ?? base.attemptCounts,
    failure: fields.failure ?? null,
    scheduledAt: fields.scheduledAt ?? null,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Generator that plays back a script of results. Once the script is
 * used up it returns a post derived from the topic.
 */
export class ScriptedGenerator implements ContentGenerator {
  readonly calls: Array<{ topic: string; template: string }> = [];
  private readonly script: Array<string | Error>;
  private readonly gate: Promise<void> | null;

  constructor(script: Array<string | Error> = [], gate: Promise<void> | null = null) {
    this.script = [...script];
    this.gate = gate;
  }

  async generate(topic: string, template: string): Promise<string> {
    this.calls.push({ topic, template });
    const next = this.script.shift() ?? `Post about ${topic}`;
    if (this.gate !== null) {
      await this.gate;
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * Publish script steps:
 *   'ok'    publish succeeds
 *   'lost'  the publication lands but the call fails with a network error
 *   Error   publish throws without publishing
 */
export type PublishStep = 'ok' | 'lost' | Error;

export interface ScriptedPublisherOptions {
  /** Each publish takes this long and ignores its abort signal */
  delayMs?: number;
}

export class ScriptedPublisher implements Publisher {
  readonly publishCalls: PublishRequest[] = [];
  readonly verifyCalls: ReceiptHint[] = [];
  readonly published = new Map<string, PublishReceipt>();
  private readonly script: PublishStep[];
  private readonly delayMs: number;

  constructor(script: PublishStep[] = [], options: ScriptedPublisherOptions = {}) {
    this.script = [...script];
    this.delayMs = options.delayMs ?? 0;
  }

  async publish(request: PublishRequest): Promise<PublishReceipt> {
    this.publishCalls.push(request);
    const step = this.script.shift() ?? 'ok';
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (step instanceof Error) {
      throw step;
    }

    const receipt: PublishReceipt = {
      receiptId: `receipt-${this.publishCalls.length}`,
      idempotencyKey: request.idempotencyKey,
      publishedAt: FIXED_NOW.toISOString(),
      scheduledAt: request.scheduledAt,
      url: null,
      verified: false,
    };
    this.published.set(request.idempotencyKey, receipt);

    if (step === 'lost') {
      throw new NetworkError('Connection reset after submit');
    }
    return receipt;
  }

  async verifyPublished(hint: ReceiptHint): Promise<boolean> {
    this.verifyCalls.push(hint);
    return this.published.has(hint.idempotencyKey);
  }
}

type FaultyMethod = 'readActiveRow' | 'writeRow' | 'archiveRow';

/**
 * Memory store with injectable failures.
 */
export class FaultyStore extends MemoryRecordStore {
  private readonly faults = new Map<FaultyMethod, Error[]>();
  private readonly swapFaults = new Map<PostStatus, Error[]>();
  private readParties = 0;
  private heldReads: Array<() => void> = [];

  /**
   * Hold active-row reads until `parties` of them are waiting, so concurrent
   * runs all start from the same snapshot.
   */
  holdReads(parties: number): void {
    this.readParties = parties;
  }

  failNext(method: FaultyMethod, error: Error, times = 1): void {
    this.faults.set(method, [...(this.faults.get(method) ?? []), ...Array<Error>(times).fill(error)]);
  }

  /** Fail compare-and-swap writes that move a row into `next` */
  failSwapTo(next: PostStatus, error: Error, times = 1): void {
    this.swapFaults.set(next, [...(this.swapFaults.get(next) ?? []), ...Array<Error>(times).fill(error)]);
  }

  override async readActiveRow(): Promise<Row> {
    this.take(this.faults.get('readActiveRow'));
    const row = await super.readActiveRow();
    if (this.readParties > 0) {
      await new Promise<void>((resolve) => {
        this.heldReads.push(resolve);
        if (this.heldReads.length >= this.readParties) {
          const release = this.heldReads;
          this.heldReads = [];
          this.readParties = 0;
          release.forEach((resume) => resume());
        }
      });
    }
    return row;
  }

  override async writeRow(...args: Parameters<MemoryRecordStore['writeRow']>): Promise<Row> {
    this.take(this.faults.get('writeRow'));
    return super.writeRow(...args);
  }

  override async archiveRow(rowId: string): Promise<Row> {
    this.take(this.faults.get('archiveRow'));
    return super.archiveRow(rowId);
  }

  override async compareAndSwapStatus(
    rowId: string,
    expected: PostStatus,
    next: PostStatus,
    fields?: RowPatch
  ): Promise<Row> {
    this.take(this.swapFaults.get(next));
    return super.compareAndSwapStatus(rowId, expected, next, fields);
  }

  private take(queue: Error[] | undefined): void {
    const error = queue?.shift();
    if (error !== undefined) {
      throw error;
    }
  }
}
