/**
 * Error helpers shared by the services and the command line.
 */

/**
 * Extract a message string from an unknown error.
 *
 * @param error - The error to extract a message from
 * @returns The error message as a string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap a thrown non-Error value so it can be passed to `Logger.error`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
