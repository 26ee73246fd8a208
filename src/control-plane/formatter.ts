import { PostStatus, type Row } from '../types/row.js';
import type { Outcome } from '../types/outcome.js';
import { PIPELINE_ERROR_DESCRIPTIONS, toPipelineErrorCode } from '../types/pipeline-error.js';
import { getProgressDescription } from '../orchestrator/status-ledger.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a row status with appropriate color.
 */
export function formatStatus(status: PostStatus): string {
  const statusColors: Record<PostStatus, keyof typeof colors> = {
    [PostStatus.PENDING]: 'yellow',
    [PostStatus.GENERATING]: 'blue',
    [PostStatus.GENERATED]: 'cyan',
    [PostStatus.POSTING]: 'blue',
    [PostStatus.POSTED]: 'cyan',
    [PostStatus.ARCHIVING]: 'blue',
    [PostStatus.ARCHIVED]: 'green',
    [PostStatus.FAILED]: 'red',
  };

  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(iso: string, now: number = Date.now()): string {
  const diff = now - Date.parse(iso);

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format data as a table. Values are truncated before coloring.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  lines.push(columns.map((col) => bold(col.header.padEnd(col.width))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    lines.push(
      columns
        .map((col) => truncate(col.value(item), col.width).padEnd(col.width))
        .join('  ')
        .trimEnd()
    );
  }

  return lines.join('\n');
}

/**
 * Format a row for detailed display.
 */
export function formatRowDetail(row: Row): string {
  const lines: string[] = [];

  lines.push(bold('Active Row'));
  lines.push('');
  lines.push(`${bold('ID:')}           ${row.id}`);
  lines.push(`${bold('Topic:')}        ${row.topic}`);
  lines.push(`${bold('Status:')}       ${formatStatus(row.status)}`);
  lines.push(`${bold('Progress:')}     ${getProgressDescription(row)}`);
  lines.push(`${bold('Created:')}      ${row.createdAt} (${dim(formatRelativeTime(row.createdAt))})`);

  if (row.scheduledAt !== null) {
    lines.push(`${bold('Scheduled:')}    ${row.scheduledAt}`);
  }

  if (row.receipt !== null) {
    lines.push(`${bold('Receipt:')}      ${row.receipt.receiptId}${row.receipt.verified ? dim(' (verified)') : ''}`);
    if (row.receipt.url !== null) {
      lines.push(`${bold('URL:')}          ${cyan(row.receipt.url)}`);
    }
  }

  if (row.content !== null) {
    lines.push('');
    lines.push(bold('Content:'));
    lines.push(...row.content.split('\n').map((line) => `  ${line}`));
  }

  if (row.failure !== null) {
    lines.push('');
    lines.push(`${bold(red('Failure:'))}`);
    lines.push(`  ${red(`${row.failure.code}: ${row.failure.message}`)}`);
    lines.push(`  ${dim(PIPELINE_ERROR_DESCRIPTIONS[toPipelineErrorCode(row.failure.code)])}`);
    lines.push(`  ${dim(row.failure.permanent ? 'Permanent; run `postline retry` once fixed' : 'Retried on the next run')}`);
  }

  return lines.join('\n');
}

/**
 * Format a list of rows as a table.
 */
export function formatRowList(rows: Row[], emptyMessage: string): string {
  if (rows.length === 0) {
    return dim(emptyMessage);
  }

  const columns: TableColumn<Row>[] = [
    { header: 'ID', width: 21, value: (row) => row.id },
    { header: 'STATUS', width: 10, value: (row) => row.status.toUpperCase() },
    { header: 'UPDATED', width: 16, value: (row) => formatRelativeTime(row.updatedAt) },
    { header: 'TOPIC', width: 40, value: (row) => row.topic },
  ];

  return formatTable(rows, columns);
}

/**
 * Format a run outcome as one line.
 */
export function formatOutcome(outcome: Outcome): string {
  switch (outcome.type) {
    case 'completed':
      return formatSuccess(`${outcome.phase} finished: row ${outcome.rowId} is ${outcome.status}`);
    case 'blocked':
      return formatInfo(`Nothing to do (${outcome.reason}): ${outcome.message}`);
    case 'failed': {
      const where = outcome.phase === null ? 'reading the active row' : outcome.phase;
      const kind = outcome.permanent ? 'permanent' : 'retryable';
      return formatError(
        `Failed while ${where} after ${outcome.attempts} attempt(s) [${outcome.error.code}, ${kind}]: ${outcome.error.message}`
      );
    }
  }
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
