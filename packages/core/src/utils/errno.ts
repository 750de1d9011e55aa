/**
 * Narrows an unknown thrown value to a Node.js system error.
 *
 * Checked structurally: errors raised by `fs` come from the host realm, so
 * `instanceof Error` is false for them inside a sandboxed context such as Jest.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * Returns the errno code of a thrown value, or undefined when it carries none.
 */
export function errnoCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}

/**
 * Message of a thrown value, whichever realm it came from.
 */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
