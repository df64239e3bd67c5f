/**
 * packages/core/src/paging/types.ts — Paged listing contract.
 *
 * Why: The picker consumes remote listings through this narrow contract only;
 * whatever enumeration API the host uses sits behind a PagedDataSource.
 */

/** Largest page a request may ask for. */
export const MAX_PAGE_SIZE = 5000;

/** Page size used when none is configured. */
export const DEFAULT_PAGE_SIZE = 100;

/**
 * One page of results.
 * `hasMore` is true exactly when `continuationToken` is a non-empty string.
 */
export type PagedResult<T> = Readonly<{
  items: readonly T[];
  continuationToken: string | null;
  hasMore: boolean;
}>;

/**
 * Request for one page. A null token asks for the first page.
 */
export type PageRequest = Readonly<{
  pageSize: number;
  continuationToken: string | null;
}>;

/**
 * Backend listing provider.
 *
 * Implementations must stop work and reject (or resolve; the result is
 * ignored either way) once `signal` is aborted.
 */
export interface PagedDataSource<T> {
  fetchPage(request: PageRequest, signal: AbortSignal): Promise<PagedResult<T>>;
}

/**
 * Outcome of PageLoader.loadNext().
 *
 *   - "loaded": a page arrived and was accepted
 *   - "busy": a fetch is already in flight; no request was issued
 *   - "exhausted": the last page has been loaded
 *   - "failed": the fetch failed; the same token is retried next time
 *   - "cancelled": the loader was cancelled while the fetch was in flight
 */
export type PageLoadOutcome<T> =
  | Readonly<{ kind: "loaded"; page: PagedResult<T>; request: PageRequest }>
  | Readonly<{ kind: "busy" }>
  | Readonly<{ kind: "exhausted" }>
  | Readonly<{ kind: "failed"; error: unknown; request: PageRequest }>
  | Readonly<{ kind: "cancelled"; request: PageRequest }>;
