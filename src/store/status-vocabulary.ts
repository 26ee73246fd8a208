/**
 * Display vocabulary for the status column.
 *
 * Hand-maintained tables mark rows with yes/no style values. They are mapped
 * to canonical statuses when a file is read; the core never sees them.
 */

import { ALL_STATUSES, PostStatus } from '../types/row.js';

export const STATUS_ALIASES: ReadonlyMap<string, PostStatus> = new Map<string, PostStatus>([
  ['yes', PostStatus.POSTED],
  ['oui', PostStatus.POSTED],
  ['no', PostStatus.PENDING],
  ['non', PostStatus.PENDING],
  ['', PostStatus.PENDING],
]);

function normalize(raw: string | null | undefined): string {
  return (raw ?? '').trim().toLowerCase();
}

function asCanonical(normalized: string): PostStatus | undefined {
  return ALL_STATUSES.find((status) => status === normalized);
}

/**
 * Map a raw status cell to a canonical status.
 * Returns null for values that are neither canonical nor a known alias.
 */
export function parseStatus(raw: string | null | undefined): PostStatus | null {
  const normalized = normalize(raw);
  return asCanonical(normalized) ?? STATUS_ALIASES.get(normalized) ?? null;
}

/**
 * Whether the raw value was an alias rather than a canonical status.
 */
export function isStatusAlias(raw: string | null | undefined): boolean {
  const normalized = normalize(raw);
  return asCanonical(normalized) === undefined && STATUS_ALIASES.has(normalized);
}
