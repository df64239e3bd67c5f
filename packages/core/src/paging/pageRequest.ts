/**
 * packages/core/src/paging/pageRequest.ts — Page request/result constructors.
 */

import { ListNavError } from "../errors.js";
import {
  MAX_PAGE_SIZE,
  type PageRequest,
  type PagedDataSource,
  type PagedResult,
} from "./types.js";

/**
 * Build a validated page request.
 *
 * @throws ListNavError LISTNAV_INVALID_PAGE_REQUEST when pageSize is not an
 *   integer in [1, MAX_PAGE_SIZE]
 */
export function createPageRequest(
  pageSize: number,
  continuationToken: string | null = null,
): PageRequest {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new ListNavError(
      "LISTNAV_INVALID_PAGE_REQUEST",
      `page size must be a positive integer (got ${String(pageSize)})`,
    );
  }
  if (pageSize > MAX_PAGE_SIZE) {
    throw new ListNavError(
      "LISTNAV_INVALID_PAGE_REQUEST",
      `page size cannot exceed ${MAX_PAGE_SIZE} (got ${pageSize})`,
    );
  }
  return Object.freeze({ pageSize, continuationToken });
}

/** Request for the page after `continuationToken`, keeping the page size. */
export function nextPageRequest(request: PageRequest, continuationToken: string): PageRequest {
  return Object.freeze({ pageSize: request.pageSize, continuationToken });
}

/**
 * Build a page; `hasMore` is derived from the token.
 */
export function createPagedResult<T>(
  items: readonly T[],
  continuationToken: string | null = null,
): PagedResult<T> {
  const token =
    continuationToken !== null && continuationToken.length > 0 ? continuationToken : null;
  return Object.freeze({
    items: Object.freeze(items.slice()),
    continuationToken: token,
    hasMore: token !== null,
  });
}

/** A page with no items and no continuation. */
export function emptyPagedResult<T>(): PagedResult<T> {
  return createPagedResult<T>([], null);
}

/**
 * Serve an in-memory array as pages, for hosts whose data is already loaded.
 * Tokens are decimal offsets.
 */
export function createArrayDataSource<T>(items: readonly T[]): PagedDataSource<T> {
  const snapshot = Object.freeze(items.slice());
  return {
    fetchPage: async (request) => {
      const start = request.continuationToken === null ? 0 : Number(request.continuationToken);
      const offset = Number.isInteger(start) && start >= 0 ? start : 0;
      const end = Math.min(snapshot.length, offset + request.pageSize);
      const token = end < snapshot.length ? String(end) : null;
      return createPagedResult(snapshot.slice(offset, end), token);
    },
  };
}
