import type { LogSink } from "../diagnostics/log.js";
import type { PickerOptions } from "../config/pickerOptions.js";
import type { FuzzyMatchResult, KeyExtractor } from "../matching/fuzzy.js";
import type { PagedDataSource } from "../paging/types.js";

export type CancelReason = "user" | "timeout" | "aborted" | "empty";

/**
 * How a picker session ended. Cancellation is a neutral outcome and carries
 * no error.
 */
export type PickerOutcome<T> =
  | Readonly<{ kind: "confirmed"; item: T }>
  | Readonly<{ kind: "cancelled"; reason: CancelReason }>;

/**
 *   - "active": accepting input
 *   - "confirmed" / "cancelled": the session has ended
 */
export type PickerStatus = "active" | "confirmed" | "cancelled";

/**
 * Read-only view of the selection handed to the render callback.
 *
 * When `filtered` is non-empty: windowStart <= index < windowEnd and
 * windowEnd - windowStart <= maxVisibleItems. Otherwise index is -1.
 */
export type PickerSnapshot<T> = Readonly<{
  query: string;
  filtered: readonly FuzzyMatchResult<T>[];
  index: number;
  windowStart: number;
  windowEnd: number;
  /** Candidates loaded so far (before filtering). */
  totalLoaded: number;
  /** A page fetch is in flight. */
  loading: boolean;
  /** More pages may be fetched. */
  hasMore: boolean;
  /** Error of the most recent failed fetch, if it has not been retried successfully. */
  lastError: unknown;
  status: PickerStatus;
}>;

export type PickerRender<T> = (snapshot: PickerSnapshot<T>) => void;

export type PickerEngineOptions<T> = Readonly<{
  /** Candidates known up front. */
  items?: readonly T[];
  /** Remote listing; pages are appended after `items`. */
  source?: PagedDataSource<T>;
  keyOf: KeyExtractor<T>;
  options: PickerOptions;
  render?: PickerRender<T>;
  log?: LogSink;
}>;
