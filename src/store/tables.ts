/**
 * Row table operations shared by the record stores.
 *
 * Each function mutates the tables it is given and returns a copy of the
 * affected row. Stores decide how the tables are loaded and persisted.
 */

import {
  PostStatus,
  applyPatch,
  assertRowInvariants,
  createRow,
  newRowInputSchema,
  type NewRowInput,
  type Row,
  type RowPatch,
} from '../types/row.js';
import type { WriteRowOptions } from '../types/adapters.js';
import { ConflictError, MalformedRowError, NotFoundError } from '../types/pipeline-error.js';

export interface RowTables {
  active: Row[];
  archive: Row[];
}

/** Statuses from which a row may be archived */
const ARCHIVABLE_STATUSES: readonly PostStatus[] = [PostStatus.POSTED, PostStatus.ARCHIVING];

function copy(row: Row): Row {
  return structuredClone(row);
}

export function firstActiveRow(tables: RowTables): Row {
  const row = tables.active[0];
  if (row === undefined) {
    throw new NotFoundError('The active table is empty');
  }
  return copy(row);
}

export function findRow(tables: RowTables, rowId: string): Row {
  const row =
    tables.active.find((candidate) => candidate.id === rowId) ??
    tables.archive.find((candidate) => candidate.id === rowId);
  if (row === undefined) {
    throw new NotFoundError(`Row ${rowId} not found`);
  }
  return copy(row);
}

function activeIndex(tables: RowTables, rowId: string, expected: PostStatus | undefined): number {
  const index = tables.active.findIndex((candidate) => candidate.id === rowId);
  if (index === -1) {
    if (expected !== undefined) {
      throw new ConflictError(rowId, expected, null);
    }
    throw new NotFoundError(`Row ${rowId} is not in the active table`);
  }
  return index;
}

function replaceAt(tables: RowTables, index: number, row: Row): Row {
  assertRowInvariants(row);
  tables.active[index] = row;
  return copy(row);
}

export function writeRowIn(
  tables: RowTables,
  rowId: string,
  fields: RowPatch,
  options: WriteRowOptions,
  now: Date
): Row {
  const index = activeIndex(tables, rowId, options.expectedStatus);
  const current = tables.active[index];
  if (current === undefined) {
    throw new NotFoundError(`Row ${rowId} is not in the active table`);
  }
  if (options.expectedStatus !== undefined && current.status !== options.expectedStatus) {
    throw new ConflictError(rowId, options.expectedStatus, current.status);
  }
  const guard = options.expectedAttemptCount;
  if (guard !== undefined && current.attemptCounts[guard.phase] !== guard.count) {
    throw new ConflictError(
      rowId,
      current.status,
      current.status,
      `Row ${rowId} has ${current.attemptCounts[guard.phase]} ${guard.phase} attempts recorded, expected ${guard.count}`
    );
  }
  return replaceAt(tables, index, applyPatch(current, current.status, fields, now));
}

export function swapStatusIn(
  tables: RowTables,
  rowId: string,
  expected: PostStatus,
  next: PostStatus,
  fields: RowPatch,
  now: Date
): Row {
  const index = activeIndex(tables, rowId, expected);
  const current = tables.active[index];
  if (current === undefined || current.status !== expected) {
    throw new ConflictError(rowId, expected, current?.status ?? null);
  }
  return replaceAt(tables, index, applyPatch(current, next, fields, now));
}

/**
 * Move a row to the archive. A row already archived is returned unchanged.
 */
export function archiveRowIn(
  tables: RowTables,
  rowId: string,
  now: Date
): { row: Row; changed: boolean } {
  const index = tables.active.findIndex((candidate) => candidate.id === rowId);
  const alreadyArchived = tables.archive.find((candidate) => candidate.id === rowId);

  if (index === -1) {
    if (alreadyArchived !== undefined) {
      return { row: copy(alreadyArchived), changed: false };
    }
    throw new NotFoundError(`Row ${rowId} not found`);
  }

  const current = tables.active[index];
  if (current === undefined) {
    throw new NotFoundError(`Row ${rowId} not found`);
  }
  if (!ARCHIVABLE_STATUSES.includes(current.status)) {
    throw new ConflictError(rowId, PostStatus.ARCHIVING, current.status);
  }

  const archived = applyPatch(
    current,
    PostStatus.ARCHIVED,
    { attemptCounts: { ...current.attemptCounts, archiving: 0 } },
    now
  );
  assertRowInvariants(archived);

  // An earlier archive write may have landed without the active removal
  if (alreadyArchived === undefined) {
    tables.archive.push(archived);
  }
  tables.active.splice(index, 1);
  return { row: copy(alreadyArchived ?? archived), changed: true };
}

export function appendRowIn(tables: RowTables, input: NewRowInput, rowId: string, now: Date): Row {
  const parsed = newRowInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedRowError(
      rowId,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    );
  }

  const row = createRow(rowId, parsed.data, now);
  assertRowInvariants(row);
  tables.active.push(row);
  return copy(row);
}
