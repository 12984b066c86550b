/**
 * Narrowing for Node.js system errors (`ENOENT`, `EEXIST`, ...).
 *
 * @module storage/fs-errors
 */

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
