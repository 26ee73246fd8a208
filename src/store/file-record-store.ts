/**
 * JSON file record store.
 *
 * Layout under the data directory:
 *   active.json   rows still moving through the pipeline, in processing order
 *   archive.json  archived rows, append-only
 *   .lock         held for the duration of every mutation, owned by a token
 *   .lock.break   held briefly while a stale lock is removed
 *
 * Files are replaced with a temp-file rename so readers never see a partial
 * write. Mutations take the lock, reload both files, apply the change and
 * write back, which makes compare-and-swap safe across processes.
 */

import { mkdir, open, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { RecordStore, WriteRowOptions } from '../types/adapters.js';
import {
  PostStatus,
  attemptCountsSchema,
  emptyAttemptCounts,
  findRowViolations,
  publishReceiptSchema,
  rowFailureSchema,
  type NewRowInput,
  type PublishReceipt,
  type Row,
  type RowPatch,
} from '../types/row.js';
import { MalformedRowError, StoreUnavailableError } from '../types/pipeline-error.js';
import {
  appendRowIn,
  archiveRowIn,
  findRow,
  firstActiveRow,
  swapStatusIn,
  writeRowIn,
  type RowTables,
} from './tables.js';
import { parseStatus } from './status-vocabulary.js';
import { createLogger } from '../utils/logger.js';
import { sha256Hex } from '../utils/hash.js';
import { errnoCode } from '../utils/errno.js';

const log = createLogger('file-store');

const ACTIVE_FILE = 'active.json';
const ARCHIVE_FILE = 'archive.json';
const LOCK_FILE = '.lock';
const EPOCH = new Date(0).toISOString();

const DEFAULT_LOCK_TIMEOUT_MS = 10000;
const DEFAULT_LOCK_RETRY_MS = 50;

export interface FileRecordStoreOptions {
  dataDir: string;
  /** How long to wait for the lock, and the age after which a lock file is stale */
  lockTimeoutMs?: number;
  lockRetryMs?: number;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * A stored row as found on disk. Only `topic` is required so hand-written
 * tables (topic, content, status) load.
 */
const storedRowSchema = z.object({
  id: z.string().min(1).optional(),
  topic: z.string(),
  content: z
    .string()
    .nullable()
    .optional()
    .transform((value) => (value === undefined || value === null || value.trim() === '' ? null : value)),
  status: z
    .string()
    .nullable()
    .optional()
    .transform((value, ctx) => {
      const status = parseStatus(value);
      if (status === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown status: ${String(value)}` });
        return z.NEVER;
      }
      return status;
    }),
  scheduledAt: z.string().nullable().default(null),
  attemptCounts: attemptCountsSchema.default(emptyAttemptCounts()),
  failure: rowFailureSchema.nullable().default(null),
  receipt: publishReceiptSchema.nullable().default(null),
  createdAt: z.string().default(EPOCH),
  updatedAt: z.string().default(EPOCH),
});

type StoredRow = z.infer<typeof storedRowSchema>;

const storedTableSchema = z.array(storedRowSchema);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw new StoreUnavailableError(`Cannot remove ${path}`, { cause: error });
    }
  }
}

/**
 * Rows marked posted through the display vocabulary predate receipts; they
 * get one rebuilt from the row itself.
 */
function importedReceipt(id: string, row: StoredRow): PublishReceipt {
  return {
    receiptId: `imported:${id}`,
    idempotencyKey: sha256Hex(`${id}\n${row.content ?? ''}`),
    publishedAt: row.updatedAt,
    scheduledAt: row.scheduledAt,
    url: null,
    verified: true,
  };
}

/**
 * Turn stored rows into rows. Rows without an id get one derived from the
 * topic so it stays the same across reads.
 */
function toRows(stored: StoredRow[]): Row[] {
  const seen = new Map<string, number>();

  return stored.map((row) => {
    let id = row.id;
    if (id === undefined) {
      const base = sha256Hex(row.topic.trim()).slice(0, 16);
      const occurrence = (seen.get(base) ?? 0) + 1;
      seen.set(base, occurrence);
      id = occurrence === 1 ? base : `${base}-${occurrence}`;
    }

    const needsImportedReceipt =
      row.receipt === null &&
      (row.status === PostStatus.POSTED || row.status === PostStatus.ARCHIVED);

    return {
      id,
      topic: row.topic,
      content: row.content,
      status: row.status,
      scheduledAt: row.scheduledAt,
      attemptCounts: row.attemptCounts,
      failure: row.failure,
      receipt: needsImportedReceipt ? importedReceipt(id, row) : row.receipt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  });
}

export class FileRecordStore implements RecordStore {
  private readonly dataDir: string;
  private readonly lockTimeoutMs: number;
  private readonly lockRetryMs: number;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: FileRecordStoreOptions) {
    this.dataDir = options.dataDir;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.lockRetryMs = options.lockRetryMs ?? DEFAULT_LOCK_RETRY_MS;
    this.generateId = options.generateId ?? (() => nanoid());
    this.now = options.now ?? (() => new Date());
  }

  async readActiveRow(): Promise<Row> {
    return firstActiveRow(await this.load());
  }

  async readRow(rowId: string): Promise<Row> {
    return findRow(await this.load(), rowId);
  }

  async writeRow(rowId: string, fields: RowPatch, options: WriteRowOptions = {}): Promise<Row> {
    return this.mutate((tables) => writeRowIn(tables, rowId, fields, options, this.now()));
  }

  async compareAndSwapStatus(
    rowId: string,
    expected: PostStatus,
    next: PostStatus,
    fields: RowPatch = {}
  ): Promise<Row> {
    return this.mutate((tables) => swapStatusIn(tables, rowId, expected, next, fields, this.now()));
  }

  async archiveRow(rowId: string): Promise<Row> {
    return this.withLock(async () => {
      const tables = await this.load();
      const archiveBefore = tables.archive.length;
      const { row, changed } = archiveRowIn(tables, rowId, this.now());

      if (changed) {
        // Archive first: a crash in between leaves the row in both files,
        // and the next archive call only removes it from the active table
        if (tables.archive.length !== archiveBefore) {
          await this.writeTable(ARCHIVE_FILE, tables.archive);
        }
        await this.writeTable(ACTIVE_FILE, tables.active);
        log.info({ rowId }, 'Row archived');
      }
      return row;
    });
  }

  async appendRow(input: NewRowInput): Promise<Row> {
    return this.mutate((tables) => appendRowIn(tables, input, this.generateId(), this.now()));
  }

  async listActiveRows(): Promise<Row[]> {
    return (await this.load()).active;
  }

  async listArchivedRows(): Promise<Row[]> {
    return (await this.load()).archive;
  }

  /**
   * Apply a change to the active table under the lock.
   */
  private async mutate(apply: (tables: RowTables) => Row): Promise<Row> {
    return this.withLock(async () => {
      const tables = await this.load();
      const row = apply(tables);
      await this.writeTable(ACTIVE_FILE, tables.active);
      return row;
    });
  }

  private async load(): Promise<RowTables> {
    const [active, archive] = await Promise.all([
      this.readTable(ACTIVE_FILE),
      this.readTable(ARCHIVE_FILE),
    ]);
    return { active, archive };
  }

  private async readTable(file: string): Promise<Row[]> {
    const path = join(this.dataDir, file);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw new StoreUnavailableError(`Cannot read ${path}`, { cause: error });
    }

    if (text.trim() === '') {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new MalformedRowError(file, [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`]);
    }

    const result = storedTableSchema.safeParse(data);
    if (!result.success) {
      throw new MalformedRowError(
        file,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    const rows = toRows(result.data);
    const violations = rows.flatMap((row, index) =>
      findRowViolations(row).map((violation) => `${index}: ${violation}`)
    );
    if (violations.length > 0) {
      throw new MalformedRowError(file, violations);
    }
    return rows;
  }

  private async writeTable(file: string, rows: Row[]): Promise<void> {
    const path = join(this.dataDir, file);
    const tempPath = `${path}.${process.pid}.${nanoid(8)}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(rows, null, 2)}\n`, 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      throw new StoreUnavailableError(`Cannot write ${path}`, { cause: error });
    }
    log.debug({ file, rows: rows.length }, 'Table written');
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await mkdir(this.dataDir, { recursive: true });
    const lockPath = join(this.dataDir, LOCK_FILE);
    const token = await this.acquireLock(lockPath);
    try {
      return await fn();
    } finally {
      await this.releaseLock(lockPath, token);
    }
  }

  /**
   * Create the lock file holding a token unique to this acquisition.
   */
  private async acquireLock(lockPath: string): Promise<string> {
    const token = `${process.pid}:${nanoid()}`;
    const deadline = Date.now() + this.lockTimeoutMs;

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        await handle.writeFile(`${token}\n`, 'utf-8');
        await handle.close();
        return token;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new StoreUnavailableError(`Cannot create lock ${lockPath}`, { cause: error });
        }
      }

      const owner = await this.readLockOwner(lockPath);
      if (owner !== null && (await this.isStale(lockPath)) && (await this.breakStaleLock(lockPath, owner))) {
        continue;
      }

      if (Date.now() >= deadline) {
        throw new StoreUnavailableError(
          `Timed out after ${this.lockTimeoutMs}ms waiting for ${lockPath}`
        );
      }
      await sleep(this.lockRetryMs);
    }
  }

  /**
   * Remove a stale lock, but only the one whose owner was observed. Waiters
   * take turns through a second lock file so a lock re-created by another
   * waiter in the meantime is left alone.
   */
  private async breakStaleLock(lockPath: string, staleOwner: string): Promise<boolean> {
    const breakPath = `${lockPath}.break`;
    try {
      const handle = await open(breakPath, 'wx');
      await handle.close();
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        throw new StoreUnavailableError(`Cannot create lock ${breakPath}`, { cause: error });
      }
      // Left behind by a waiter that died mid-takeover
      if (await this.isStale(breakPath)) {
        await removeIfPresent(breakPath);
      }
      return false;
    }

    try {
      if ((await this.readLockOwner(lockPath)) !== staleOwner || !(await this.isStale(lockPath))) {
        return false;
      }
      log.warn({ lockPath, owner: staleOwner }, 'Removing stale lock');
      await removeIfPresent(lockPath);
      return true;
    } finally {
      await removeIfPresent(breakPath);
    }
  }

  private async readLockOwner(lockPath: string): Promise<string | null> {
    try {
      return (await readFile(lockPath, 'utf-8')).trim();
    } catch (error) {
      // Released between our attempt and the read
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new StoreUnavailableError(`Cannot read lock ${lockPath}`, { cause: error });
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > this.lockTimeoutMs;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw new StoreUnavailableError(`Cannot inspect lock ${lockPath}`, { cause: error });
    }
  }

  private async releaseLock(lockPath: string, token: string): Promise<void> {
    const owner = await this.readLockOwner(lockPath);
    if (owner !== token) {
      log.warn({ lockPath, owner }, 'Lock was taken over while held, leaving it in place');
      return;
    }
    await removeIfPresent(lockPath);
  }
}
