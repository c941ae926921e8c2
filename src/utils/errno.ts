/**
 * Helpers for Node system errors.
 */

/**
 * True when `err` is a Node system error with the given code
 * (e.g. "ENOENT", "EEXIST").
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
