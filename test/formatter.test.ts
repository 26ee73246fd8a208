/**
 * CLI formatter and exit code tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  formatOutcome,
  formatRelativeTime,
  formatRowDetail,
  formatRowList,
  formatStatus,
  truncate,
} from '../src/control-plane/formatter.js';
import { ExitCode, exitCodeFor } from '../src/control-plane/exit-codes.js';
import { PostStatus } from '../src/types/row.js';
import type { FailedOutcome } from '../src/types/outcome.js';
import { makeRow } from './mocks/fakes.js';

const rateLimited: FailedOutcome = {
  type: 'failed',
  rowId: 'a',
  phase: 'generating',
  permanent: false,
  error: { code: 'RATE_LIMITED', kind: 'transient', message: 'Rate limited by the content generator' },
  status: 'failed',
  attempts: 3,
};

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('formatOutcome', () => {
    it('should describe a completed phase', () => {
      expect(formatOutcome({ type: 'completed', rowId: 'a', phase: 'posting', status: 'posted' })).toBe(
        '✓ posting finished: row a is posted'
      );
    });

    it('should describe a blocked run', () => {
      expect(
        formatOutcome({
          type: 'blocked',
          reason: 'no_active_row',
          message: 'The active table is empty',
          rowId: null,
        })
      ).toBe('i Nothing to do (no_active_row): The active table is empty');
    });

    it('should describe a failed phase', () => {
      expect(formatOutcome(rateLimited)).toBe(
        '✗ Failed while generating after 3 attempt(s) [RATE_LIMITED, retryable]: Rate limited by the content generator'
      );
      expect(
        formatOutcome({
          ...rateLimited,
          permanent: true,
          error: { code: 'AUTHENTICATION_FAILED', kind: 'permanent', message: 'Authentication was rejected' },
          attempts: 1,
          phase: 'posting',
        })
      ).toBe('✗ Failed while posting after 1 attempt(s) [AUTHENTICATION_FAILED, permanent]: Authentication was rejected');
    });

    it('should describe a failed read', () => {
      expect(
        formatOutcome({
          ...rateLimited,
          rowId: null,
          phase: null,
          status: null,
          error: { code: 'STORE_UNAVAILABLE', kind: 'transient', message: 'Sheet unavailable' },
        })
      ).toBe('✗ Failed while reading the active row after 3 attempt(s) [STORE_UNAVAILABLE, retryable]: Sheet unavailable');
    });
  });

  describe('formatRelativeTime', () => {
    const now = Date.parse('2026-03-01T12:00:00.000Z');

    it('should pick the largest whole unit', () => {
      expect(formatRelativeTime('2026-03-01T11:59:50.000Z', now)).toBe('just now');
      expect(formatRelativeTime('2026-03-01T11:59:00.000Z', now)).toBe('1 minute ago');
      expect(formatRelativeTime('2026-03-01T09:00:00.000Z', now)).toBe('3 hours ago');
      expect(formatRelativeTime('2026-02-27T12:00:00.000Z', now)).toBe('2 days ago');
    });
  });

  it('should truncate with an ellipsis', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });

  it('should print statuses in upper case', () => {
    expect(formatStatus(PostStatus.ARCHIVED)).toBe('ARCHIVED');
  });

  describe('formatRowList', () => {
    it('should show the empty message', () => {
      expect(formatRowList([], 'No archived rows.')).toBe('No archived rows.');
    });

    it('should lay rows out in columns', () => {
      const lines = formatRowList([makeRow('a', PostStatus.PENDING)], 'unused').split('\n');

      expect(lines).toHaveLength(3);
      expect(lines[0]?.split(/\s{2,}/).filter((cell) => cell !== '')).toEqual(['ID', 'STATUS', 'UPDATED', 'TOPIC']);
      const cells = lines[2]?.split(/\s{2,}/) ?? [];
      expect(cells[0]).toBe('a');
      expect(cells[1]).toBe('PENDING');
      expect(cells[3]).toBe('Topic a');
    });
  });

  describe('formatRowDetail', () => {
    it('should show the row and its progress', () => {
      const lines = formatRowDetail(makeRow('a', PostStatus.GENERATED, { content: 'Line one\nLine two' })).split('\n');

      expect(lines).toContain('ID:           a');
      expect(lines).toContain('Topic:        Topic a');
      expect(lines).toContain('Status:       GENERATED');
      expect(lines).toContain('Progress:     Content generated, waiting to publish');
      expect(lines.slice(-3)).toEqual(['Content:', '  Line one', '  Line two']);
    });

    it('should show the receipt and a permanent failure', () => {
      const lines = formatRowDetail(
        makeRow('a', PostStatus.FAILED, {
          receipt: {
            receiptId: 'receipt-a',
            idempotencyKey: 'key-a',
            publishedAt: '2026-03-01T09:00:00.000Z',
            scheduledAt: null,
            url: 'https://posts.example.test/receipt-a',
            verified: true,
          },
          failure: {
            phase: 'archiving',
            code: 'STORE_UNAVAILABLE',
            message: 'Archive sheet busy',
            permanent: true,
            failedAt: '2026-03-01T09:00:00.000Z',
          },
        })
      ).split('\n');

      expect(lines).toContain('Receipt:      receipt-a (verified)');
      expect(lines).toContain('URL:          https://posts.example.test/receipt-a');
      expect(lines.slice(-4)).toEqual([
        'Failure:',
        '  STORE_UNAVAILABLE: Archive sheet busy',
        '  The record store could not be reached',
        '  Permanent; run `postline retry` once fixed',
      ]);
    });

    it('should describe a failure code it does not know as unknown', () => {
      const lines = formatRowDetail(
        makeRow('a', PostStatus.FAILED, {
          failure: {
            phase: 'generating',
            code: 'LEGACY_CODE',
            message: 'Recorded by an older release',
            permanent: false,
            failedAt: '2026-03-01T09:00:00.000Z',
          },
        })
      ).split('\n');

      expect(lines.slice(-3)).toEqual([
        '  LEGACY_CODE: Recorded by an older release',
        '  An unknown error occurred',
        '  Retried on the next run',
      ]);
    });
  });
});

describe('exitCodeFor', () => {
  it('should map outcomes to exit codes', () => {
    expect(exitCodeFor({ type: 'completed', rowId: 'a', phase: 'archiving', status: 'archived' })).toBe(
      ExitCode.SUCCESS
    );
    expect(exitCodeFor({ type: 'blocked', reason: 'conflict', message: 'lost', rowId: 'a' })).toBe(0);
    expect(exitCodeFor(rateLimited)).toBe(3);
    expect(exitCodeFor({ ...rateLimited, permanent: true })).toBe(2);
  });
});
