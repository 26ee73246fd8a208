/**
 * Outbox publisher.
 *
 * Writes each publication as `<idempotencyKey>.json` into an outbox directory
 * that a downstream poster drains. The key makes publish idempotent: a second
 * publish of the same row and content returns the first receipt.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { PublishRequest, Publisher, ReceiptHint } from '../types/adapters.js';
import { publishReceiptSchema, type PublishReceipt } from '../types/row.js';
import { NetworkError } from '../types/pipeline-error.js';
import { createLogger } from '../utils/logger.js';
import { errnoCode } from '../utils/errno.js';

const log = createLogger('outbox-publisher');

const outboxEntrySchema = z.object({
  rowId: z.string(),
  topic: z.string(),
  content: z.string(),
  receipt: publishReceiptSchema,
});

export type OutboxEntry = z.infer<typeof outboxEntrySchema>;

export interface OutboxPublisherOptions {
  outboxDir: string;
  /** Base URL used to build receipt links; receipts carry no URL when omitted */
  publicBaseUrl?: string;
  now?: () => Date;
}

export class OutboxPublisher implements Publisher {
  private readonly outboxDir: string;
  private readonly publicBaseUrl: string | null;
  private readonly now: () => Date;

  constructor(options: OutboxPublisherOptions) {
    this.outboxDir = options.outboxDir;
    this.publicBaseUrl = options.publicBaseUrl ?? null;
    this.now = options.now ?? (() => new Date());
  }

  async publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishReceipt> {
    signal?.throwIfAborted();

    const existing = await this.readEntry(request.idempotencyKey);
    if (existing !== null) {
      log.info(
        { rowId: request.rowId, receiptId: existing.receipt.receiptId },
        'Outbox entry already present'
      );
      return existing.receipt;
    }

    const receiptId = nanoid();
    const receipt: PublishReceipt = {
      receiptId,
      idempotencyKey: request.idempotencyKey,
      publishedAt: this.now().toISOString(),
      scheduledAt: request.scheduledAt,
      url: this.publicBaseUrl === null ? null : `${this.publicBaseUrl.replace(/\/+$/, '')}/${receiptId}`,
      verified: false,
    };
    const entry: OutboxEntry = {
      rowId: request.rowId,
      topic: request.topic,
      content: request.content,
      receipt,
    };

    const path = this.entryPath(request.idempotencyKey);
    const tempPath = `${path}.${nanoid(8)}.tmp`;
    try {
      await mkdir(this.outboxDir, { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(entry, null, 2)}\n`, 'utf-8');
      signal?.throwIfAborted();
      await rename(tempPath, path);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new NetworkError(`Cannot write outbox entry ${path}`, { cause: error });
    }

    log.info({ rowId: request.rowId, receiptId, scheduledAt: request.scheduledAt }, 'Post queued in outbox');
    return receipt;
  }

  async verifyPublished(hint: ReceiptHint, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const entry = await this.readEntry(hint.idempotencyKey);
    const published = entry !== null && entry.content === hint.content;
    log.debug({ rowId: hint.rowId, published }, 'Verified outbox entry');
    return published;
  }

  /**
   * The outbox entry for a key, or null when there is none.
   */
  async readEntry(idempotencyKey: string): Promise<OutboxEntry | null> {
    const path = this.entryPath(idempotencyKey);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new NetworkError(`Cannot read outbox entry ${path}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new NetworkError(`Outbox entry ${path} is not valid JSON`, { cause: error });
    }
    const result = outboxEntrySchema.safeParse(data);
    if (!result.success) {
      throw new NetworkError(`Outbox entry ${path} is malformed: ${result.error.message}`);
    }
    return result.data;
  }

  private entryPath(idempotencyKey: string): string {
    return join(this.outboxDir, `${idempotencyKey}.json`);
  }
}
