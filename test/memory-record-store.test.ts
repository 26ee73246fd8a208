/**
 * Memory Record Store Tests
 */

import { describe, it, expect } from 'vitest';
import { MemoryRecordStore } from '../src/store/memory-record-store.js';
import { PostStatus } from '../src/types/row.js';
import { ConflictError, MalformedRowError, NotFoundError } from '../src/types/pipeline-error.js';
import { FIXED_NOW, makeRow } from './mocks/fakes.js';

function createStore(rows = [makeRow('a', PostStatus.PENDING)]): MemoryRecordStore {
  let next = 0;
  return new MemoryRecordStore({ rows, generateId: () => `new-${++next}`, now: () => FIXED_NOW });
}

describe('MemoryRecordStore', () => {
  describe('appendRow', () => {
    it('should append a pending row with a generated id', async () => {
      const store = createStore([]);

      const row = await store.appendRow({ topic: '  Morning routines  ' });

      expect(row).toEqual({
        id: 'new-1',
        topic: 'Morning routines',
        content: null,
        status: 'pending',
        scheduledAt: null,
        attemptCounts: { generating: 0, posting: 0, archiving: 0 },
        failure: null,
        receipt: null,
        createdAt: '2026-03-01T09:00:00.000Z',
        updatedAt: '2026-03-01T09:00:00.000Z',
      });
      expect((await store.readActiveRow()).id).toBe('new-1');
    });

    it('should keep rows in insertion order', async () => {
      const store = createStore();

      await store.appendRow({ topic: 'second' });

      expect((await store.listActiveRows()).map((row) => row.id)).toEqual(['a', 'new-1']);
      expect((await store.readActiveRow()).id).toBe('a');
    });

    it('should reject an empty topic', async () => {
      const store = createStore([]);

      await expect(store.appendRow({ topic: '   ' })).rejects.toThrow(
        'Row new-1 is malformed: topic: Topic must not be empty'
      );
      expect(await store.listActiveRows()).toEqual([]);
    });

    it('should reject an unparseable schedule', async () => {
      const store = createStore([]);

      await expect(store.appendRow({ topic: 'later', scheduledAt: 'tomorrow' })).rejects.toThrow(
        'Row new-1 is malformed: scheduledAt: Expected an ISO 8601 date-time'
      );
    });
  });

  describe('reads', () => {
    it('should report an empty active table', async () => {
      const store = createStore([]);

      await expect(store.readActiveRow()).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.readActiveRow()).rejects.toThrow('The active table is empty');
    });

    it('should find archived rows by id', async () => {
      const store = new MemoryRecordStore({ archived: [makeRow('old', PostStatus.ARCHIVED)] });

      expect((await store.readRow('old')).status).toBe('archived');
      await expect(store.readRow('missing')).rejects.toThrow('Row missing not found');
    });

    it('should hand out copies', async () => {
      const store = createStore();

      const row = await store.readActiveRow();
      row.topic = 'changed';
      row.attemptCounts.generating = 9;

      const again = await store.readActiveRow();
      expect(again.topic).toBe('Topic a');
      expect(again.attemptCounts.generating).toBe(0);
    });
  });

  describe('writes', () => {
    it('should apply a field patch without changing the status', async () => {
      const store = createStore([makeRow('a', PostStatus.GENERATING)]);

      const row = await store.writeRow('a', { attemptCounts: { generating: 1, posting: 0, archiving: 0 } });

      expect(row.status).toBe('generating');
      expect(row.attemptCounts.generating).toBe(1);
    });

    it('should reject a write that breaks a row invariant', async () => {
      const store = createStore([makeRow('a', PostStatus.GENERATED)]);

      const error = await store.writeRow('a', { content: null }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MalformedRowError);
      expect(error).toMatchObject({ message: "Row a is malformed: content is required in status 'generated'" });
      expect((await store.readRow('a')).content).toBe('Content for a');
    });

    it('should honour the expected status of a write', async () => {
      const store = createStore([makeRow('a', PostStatus.POSTING)]);

      await expect(
        store.writeRow('a', { attemptCounts: { generating: 1, posting: 0, archiving: 0 } }, { expectedStatus: 'generating' })
      ).rejects.toThrow("Row a is in 'posting', expected 'generating'");
    });

    it('should honour the expected attempt count of a write', async () => {
      const store = createStore([makeRow('a', PostStatus.GENERATING)]);

      const error = await store
        .writeRow(
          'a',
          { attemptCounts: { generating: 2, posting: 0, archiving: 0 } },
          { expectedStatus: 'generating', expectedAttemptCount: { phase: 'generating', count: 1 } }
        )
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: 'Row a has 0 generating attempts recorded, expected 1' });
      expect((await store.readRow('a')).attemptCounts.generating).toBe(0);
    });

    it('should report a conflict when the row left the active table', async () => {
      const store = createStore([]);

      await expect(store.writeRow('gone', {}, { expectedStatus: 'posting' })).rejects.toThrow(
        "Row gone is no longer in the active store (expected 'posting')"
      );
      await expect(store.writeRow('gone', {})).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should swap the status only from the expected one', async () => {
      const store = createStore();

      const row = await store.compareAndSwapStatus('a', 'pending', 'generating');
      expect(row.status).toBe('generating');

      await expect(store.compareAndSwapStatus('a', 'pending', 'generating')).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('archiveRow', () => {
    it('should move a posted row to the archive', async () => {
      const store = createStore([
        makeRow('a', PostStatus.POSTED, { attemptCounts: { generating: 0, posting: 0, archiving: 2 } }),
        makeRow('b', PostStatus.PENDING),
      ]);

      const row = await store.archiveRow('a');

      expect(row.status).toBe('archived');
      expect(row.attemptCounts.archiving).toBe(0);
      expect((await store.listActiveRows()).map((r) => r.id)).toEqual(['b']);
      expect((await store.listArchivedRows()).map((r) => r.id)).toEqual(['a']);
      expect((await store.readActiveRow()).id).toBe('b');
    });

    it('should refuse to archive a row that was not published', async () => {
      const store = createStore([makeRow('a', PostStatus.GENERATED)]);

      await expect(store.archiveRow('a')).rejects.toThrow("Row a is in 'generated', expected 'archiving'");
      expect(await store.listArchivedRows()).toEqual([]);
    });

    it('should not append a row to the archive twice', async () => {
      const store = createStore([makeRow('a', PostStatus.ARCHIVING)]);

      await store.archiveRow('a');
      const again = await store.archiveRow('a');

      expect(again.status).toBe('archived');
      expect(await store.listArchivedRows()).toHaveLength(1);
    });
  });
});
