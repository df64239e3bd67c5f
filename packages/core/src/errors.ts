/**
 * packages/core/src/errors.ts — Deterministic error type for listnav.
 *
 * Configuration problems are thrown eagerly as ListNavError before any
 * interactive session starts. Fetch failures are never thrown across the
 * input loop; they surface as page-load outcomes instead.
 */

/**
 * Error codes for every deterministic violation surfaced by the engine.
 */
export type ListNavErrorCode =
  | "LISTNAV_INVALID_OPTIONS"
  | "LISTNAV_INVALID_KEYBINDINGS"
  | "LISTNAV_INVALID_PAGE_REQUEST"
  | "LISTNAV_INVALID_PAGE"
  | "LISTNAV_SESSION_CLOSED";

/**
 * Error class for all deterministic violations.
 * The `code` property identifies the specific violation.
 */
export class ListNavError extends Error {
  override readonly name = "ListNavError";
  readonly code: ListNavErrorCode;

  constructor(code: ListNavErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ListNavError);
    }
  }
}

/** Narrow an unknown thrown value to a ListNavError with the given code. */
export function isListNavError(value: unknown, code?: ListNavErrorCode): value is ListNavError {
  if (!(value instanceof ListNavError)) return false;
  return code === undefined || value.code === code;
}

/** Render an unknown thrown value as a single-line description. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  if (typeof error === "string") return error;
  try {
    return String(error);
  } catch {
    return "<unprintable error>";
  }
}
