/**
 * In-process record store. Each operation runs to completion within one
 * event-loop turn, so compare-and-swap writes are atomic.
 */

import { nanoid } from 'nanoid';
import type { RecordStore, WriteRowOptions } from '../types/adapters.js';
import type { NewRowInput, PostStatus, Row, RowPatch } from '../types/row.js';
import {
  appendRowIn,
  archiveRowIn,
  findRow,
  firstActiveRow,
  swapStatusIn,
  writeRowIn,
  type RowTables,
} from './tables.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('memory-store');

export interface MemoryRecordStoreOptions {
  /** Initial active rows, in processing order */
  rows?: Row[];
  archived?: Row[];
  generateId?: () => string;
  now?: () => Date;
}

export class MemoryRecordStore implements RecordStore {
  private readonly tables: RowTables;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: MemoryRecordStoreOptions = {}) {
    this.tables = {
      active: (options.rows ?? []).map((row) => structuredClone(row)),
      archive: (options.archived ?? []).map((row) => structuredClone(row)),
    };
    this.generateId = options.generateId ?? (() => nanoid());
    this.now = options.now ?? (() => new Date());
  }

  async readActiveRow(): Promise<Row> {
    return firstActiveRow(this.tables);
  }

  async readRow(rowId: string): Promise<Row> {
    return findRow(this.tables, rowId);
  }

  async writeRow(rowId: string, fields: RowPatch, options: WriteRowOptions = {}): Promise<Row> {
    return writeRowIn(this.tables, rowId, fields, options, this.now());
  }

  async compareAndSwapStatus(
    rowId: string,
    expected: PostStatus,
    next: PostStatus,
    fields: RowPatch = {}
  ): Promise<Row> {
    return swapStatusIn(this.tables, rowId, expected, next, fields, this.now());
  }

  async archiveRow(rowId: string): Promise<Row> {
    const { row, changed } = archiveRowIn(this.tables, rowId, this.now());
    if (changed) {
      log.debug({ rowId }, 'Row archived');
    }
    return row;
  }

  async appendRow(input: NewRowInput): Promise<Row> {
    return appendRowIn(this.tables, input, this.generateId(), this.now());
  }

  async listActiveRows(): Promise<Row[]> {
    return this.tables.active.map((row) => structuredClone(row));
  }

  async listArchivedRows(): Promise<Row[]> {
    return this.tables.archive.map((row) => structuredClone(row));
  }
}
