/**
 * Read the errno code (ENOENT, EEXIST, ...) of a filesystem error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
