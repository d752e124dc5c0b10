/**
 * Narrowing helpers for values caught from Node, SQLite and our own services.
 */

/** `code` of a Node system error or a SQLite error, if the value carries one. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
