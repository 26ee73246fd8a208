/**
 * File Record Store Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { writeFileSync } from 'node:fs';
import { FileRecordStore } from '../src/store/file-record-store.js';
import { PostStatus } from '../src/types/row.js';
import { ConflictError, MalformedRowError, StoreUnavailableError } from '../src/types/pipeline-error.js';
import { sha256Hex } from '../src/utils/hash.js';
import { FIXED_NOW, makeRow } from './mocks/fakes.js';

describe('FileRecordStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postline-store-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  function createStore(options: { lockTimeoutMs?: number } = {}): FileRecordStore {
    let next = 0;
    return new FileRecordStore({
      dataDir,
      lockRetryMs: 10,
      generateId: () => `row-${++next}`,
      now: () => FIXED_NOW,
      ...options,
    });
  }

  async function writeJson(file: string, data: unknown): Promise<void> {
    await fs.writeFile(path.join(dataDir, file), JSON.stringify(data), 'utf-8');
  }

  async function readJson(file: string): Promise<unknown> {
    return JSON.parse(await fs.readFile(path.join(dataDir, file), 'utf-8'));
  }

  it('should treat missing files as empty tables', async () => {
    const store = createStore();

    expect(await store.listActiveRows()).toEqual([]);
    expect(await store.listArchivedRows()).toEqual([]);
  });

  it('should persist appended rows across instances', async () => {
    await createStore().appendRow({ topic: 'Persisted topic', scheduledAt: '2026-04-01T08:30:00.000Z' });

    const row = await createStore().readActiveRow();

    expect(row.id).toBe('row-1');
    expect(row.topic).toBe('Persisted topic');
    expect(row.status).toBe('pending');
    expect(row.scheduledAt).toBe('2026-04-01T08:30:00.000Z');
  });

  it('should release the lock after each mutation', async () => {
    const store = createStore();

    await store.appendRow({ topic: 'one' });
    await store.appendRow({ topic: 'two' });

    await expect(fs.access(path.join(dataDir, '.lock'))).rejects.toThrow();
    expect((await store.listActiveRows()).map((row) => row.topic)).toEqual(['one', 'two']);
  });

  it('should load hand-written rows with display statuses', async () => {
    await writeJson('active.json', [
      { topic: 'Legacy', content: 'Old text', status: 'Yes' },
      { topic: 'Fresh', status: '' },
      { topic: 'Fresh', content: '   ' },
    ]);
    const legacyId = sha256Hex('Legacy').slice(0, 16);
    const freshId = sha256Hex('Fresh').slice(0, 16);

    const rows = await createStore().listActiveRows();

    expect(rows.map((row) => [row.id, row.status, row.content])).toEqual([
      [legacyId, 'posted', 'Old text'],
      [freshId, 'pending', null],
      [`${freshId}-2`, 'pending', null],
    ]);
    expect(rows[0]?.receipt).toEqual({
      receiptId: `imported:${legacyId}`,
      idempotencyKey: sha256Hex(`${legacyId}\nOld text`),
      publishedAt: '1970-01-01T00:00:00.000Z',
      scheduledAt: null,
      url: null,
      verified: true,
    });
    expect(rows[1]?.attemptCounts).toEqual({ generating: 0, posting: 0, archiving: 0 });
  });

  it('should keep derived ids stable so rows can be written back', async () => {
    await writeJson('active.json', [{ topic: 'No id yet', status: 'no' }]);
    const store = createStore();
    const { id } = await store.readActiveRow();

    const row = await store.compareAndSwapStatus(id, 'pending', 'generating');

    expect(row.id).toBe(id);
    expect(await readJson('active.json')).toMatchObject([{ id, topic: 'No id yet', status: 'generating' }]);
  });

  it('should reject unknown statuses', async () => {
    await writeJson('active.json', [{ topic: 'Odd', status: 'maybe' }]);

    const error = await createStore().readActiveRow().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedRowError);
    expect(error).toMatchObject({ message: 'Row active.json is malformed: 0.status: Unknown status: maybe' });
  });

  it('should reject hand-written rows that break row invariants', async () => {
    await writeJson('active.json', [{ topic: 'Fine' }, { topic: '  ', status: 'no' }, { topic: 'Legacy', status: 'Yes' }]);

    const error = await createStore().listActiveRows().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedRowError);
    expect(error).toMatchObject({
      message: "Row active.json is malformed: 1: topic is empty; 2: content is required in status 'posted'",
    });
  });

  it('should reject invalid JSON', async () => {
    await fs.writeFile(path.join(dataDir, 'active.json'), '[{"topic":', 'utf-8');

    await expect(createStore().readActiveRow()).rejects.toBeInstanceOf(MalformedRowError);
  });

  it('should detect a compare-and-swap race between two instances', async () => {
    await createStore().appendRow({ topic: 'Shared' });
    const first = createStore();
    const second = createStore();

    await first.compareAndSwapStatus('row-1', 'pending', 'generating');
    const error = await second.compareAndSwapStatus('row-1', 'pending', 'generating').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ message: "Row row-1 is in 'generating', expected 'pending'" });
  });

  it('should serialise concurrent writers through the lock', async () => {
    const store = createStore();

    await Promise.all([
      store.appendRow({ topic: 'a' }),
      store.appendRow({ topic: 'b' }),
      store.appendRow({ topic: 'c' }),
    ]);

    const topics = (await store.listActiveRows()).map((row) => row.topic).sort();
    expect(topics).toEqual(['a', 'b', 'c']);
  });

  it('should move archived rows between the files', async () => {
    await writeJson('active.json', [makeRow('a', PostStatus.POSTED), makeRow('b', PostStatus.PENDING)]);
    const store = createStore();

    const row = await store.archiveRow('a');

    expect(row.status).toBe('archived');
    expect(await readJson('active.json')).toMatchObject([{ id: 'b' }]);
    expect(await readJson('archive.json')).toMatchObject([{ id: 'a', status: 'archived' }]);
  });

  it('should finish an archive interrupted after the archive write', async () => {
    const row = makeRow('a', PostStatus.ARCHIVING);
    await writeJson('active.json', [row]);
    await writeJson('archive.json', [{ ...row, status: 'archived' }]);
    const store = createStore();

    await store.archiveRow('a');

    expect(await store.listActiveRows()).toEqual([]);
    expect(await store.listArchivedRows()).toHaveLength(1);
  });

  it('should time out while another process holds the lock', async () => {
    const lockPath = path.join(dataDir, '.lock');
    await fs.writeFile(lockPath, '12345\n', 'utf-8');
    // A future mtime keeps the lock from ever looking stale
    const future = new Date(Date.now() + 60 * 60 * 1000);
    await fs.utimes(lockPath, future, future);

    const error = await createStore({ lockTimeoutMs: 100 }).appendRow({ topic: 'blocked' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ message: `Timed out after 100ms waiting for ${lockPath}` });
  });

  it('should take over a stale lock', async () => {
    const lockPath = path.join(dataDir, '.lock');
    await fs.writeFile(lockPath, '12345\n', 'utf-8');
    const past = new Date(Date.now() - 60 * 60 * 1000);
    await fs.utimes(lockPath, past, past);

    const row = await createStore({ lockTimeoutMs: 1000 }).appendRow({ topic: 'after crash' });

    expect(row.topic).toBe('after crash');
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it('should let only one of two waiters take over a stale lock', async () => {
    await createStore().appendRow({ topic: 'Shared' });
    const lockPath = path.join(dataDir, '.lock');
    await fs.writeFile(lockPath, '12345\n', 'utf-8');
    const past = new Date(Date.now() - 60 * 60 * 1000);
    await fs.utimes(lockPath, past, past);

    const results = await Promise.allSettled([
      createStore({ lockTimeoutMs: 1000 }).compareAndSwapStatus('row-1', 'pending', 'generating'),
      createStore({ lockTimeoutMs: 1000 }).compareAndSwapStatus('row-1', 'pending', 'generating'),
    ]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.flatMap((result): unknown[] => (result.status === 'rejected' ? [result.reason] : []));
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(ConflictError);
    await expect(fs.access(lockPath)).rejects.toThrow();
    await expect(fs.access(`${lockPath}.break`)).rejects.toThrow();
  });

  it('should leave a lock in place once another owner has taken it', async () => {
    const lockPath = path.join(dataDir, '.lock');
    const store = new FileRecordStore({
      dataDir,
      lockRetryMs: 10,
      generateId: () => 'row-1',
      now: () => {
        writeFileSync(lockPath, 'other-owner\n', 'utf-8');
        return FIXED_NOW;
      },
    });

    await store.appendRow({ topic: 'taken over' });

    expect(await fs.readFile(lockPath, 'utf-8')).toBe('other-owner\n');
  });
});
