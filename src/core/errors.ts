/**
 * @file src/core/errors.ts
 * @summary Error types raised by the engine. Each carries a machine-readable `code` and
 * the underlying cause; the engine logs the error object and publishes only
 * `userMessage` on its observable state.
 *
 * @exports
 *   - TriageErrorCode - union of error codes
 *   - TriageError - base error class
 *   - errorMessage - best-effort message extraction from an unknown thrown value
 */

export type TriageErrorCode = "write-failed" | "undo-failed" | "reload-failed" | "page-failed";

const USER_MESSAGES: Record<TriageErrorCode, string> = {
  "write-failed": "Could not save classification",
  "undo-failed": "Could not undo",
  "reload-failed": "Could not load photos",
  "page-failed": "Could not load more photos",
};

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export class TriageError extends Error {
  readonly code: TriageErrorCode;

  constructor(code: TriageErrorCode, cause?: unknown) {
    super(cause === undefined ? USER_MESSAGES[code] : `${USER_MESSAGES[code]}: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "TriageError";
    this.code = code;
  }

  /** Short text suitable for a dismissable toast. */
  get userMessage(): string {
    return USER_MESSAGES[this.code];
  }
}
