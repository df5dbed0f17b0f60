/**
 * Error Utilities
 *
 * Error classification and message extraction for the daemon.
 */

/**
 * Check if an error is a "file not found" error (ENOENT).
 */
export function isNotFoundError(err: unknown): boolean {
  return getErrorCode(err) === "ENOENT";
}

/**
 * Check if an error is a permission error (EACCES or EPERM).
 */
export function isPermissionError(err: unknown): boolean {
  const code = getErrorCode(err);
  return code === "EACCES" || code === "EPERM";
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}

function getErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
