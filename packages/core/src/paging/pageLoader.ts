/**
 * packages/core/src/paging/pageLoader.ts — Incremental page loading for one session.
 *
 * Why: Owns the continuation token and the single in-flight fetch of a picker
 * session. Loading is lazy (the picker asks when the cursor nears the loaded
 * boundary) and never overlaps: a second request while one is in flight is
 * answered with "busy" instead of issuing a duplicate fetch.
 *
 * Cancellation is cooperative: cancel() aborts the request's AbortSignal and
 * anything the source returns afterwards is discarded. A failed fetch keeps
 * the token so the next loadNext() retries the same page.
 */

import { type LogSink, type Logger, createLogger } from "../diagnostics/log.js";
import { ListNavError, describeError } from "../errors.js";
import { createPageRequest, nextPageRequest } from "./pageRequest.js";
import type { PageLoadOutcome, PageRequest, PagedDataSource, PagedResult } from "./types.js";

export type PageLoaderOptions<T> = Readonly<{
  source: PagedDataSource<T>;
  pageSize: number;
  log?: LogSink;
}>;

type InFlight = Readonly<{
  request: PageRequest;
  controller: AbortController;
  runId: number;
}>;

export class PageLoader<T> {
  private readonly source: PagedDataSource<T>;
  private readonly logger: Logger;

  private request: PageRequest;
  private more = true;
  private started = false;
  private cancelled = false;
  private inFlightFetch: InFlight | null = null;
  private runId = 0;
  private error: unknown = undefined;
  private pages = 0;

  constructor(options: PageLoaderOptions<T>) {
    this.source = options.source;
    this.request = createPageRequest(options.pageSize);
    this.logger = createLogger("paging", options.log);
  }

  /** True until a page without a continuation token has been accepted. */
  get hasMore(): boolean {
    return this.more && !this.cancelled;
  }

  get inFlight(): boolean {
    return this.inFlightFetch !== null;
  }

  /** Token the next fetch will send (null before the first page). */
  get continuationToken(): string | null {
    return this.request.continuationToken;
  }

  /** Error of the most recent failed fetch; cleared by the next success. */
  get lastError(): unknown {
    return this.error;
  }

  /** Number of pages accepted so far. */
  get pagesLoaded(): number {
    return this.pages;
  }

  /** Whether loadNext() has ever issued a request. */
  get hasStarted(): boolean {
    return this.started;
  }

  /**
   * Fetch the next page, unless one is already in flight or none remain.
   */
  async loadNext(): Promise<PageLoadOutcome<T>> {
    if (this.inFlightFetch !== null) return Object.freeze({ kind: "busy" });
    if (this.cancelled || !this.more) return Object.freeze({ kind: "exhausted" });

    const request = this.request;
    const controller = new AbortController();
    const runId = ++this.runId;
    this.inFlightFetch = Object.freeze({ request, controller, runId });
    this.started = true;
    this.logger.info("page requested", {
      pageSize: request.pageSize,
      continuationToken: request.continuationToken,
    });

    let page: PagedResult<T>;
    try {
      page = await this.source.fetchPage(request, controller.signal);
    } catch (error: unknown) {
      if (this.isStale(runId, controller)) return this.discard(request);
      this.inFlightFetch = null;
      this.error = error;
      this.logger.warn("page fetch failed", {
        continuationToken: request.continuationToken,
        error: describeError(error),
      });
      return Object.freeze({ kind: "failed", error, request });
    }

    if (this.isStale(runId, controller)) return this.discard(request);
    this.inFlightFetch = null;

    const invalid = validatePage(page, request);
    if (invalid !== null) {
      this.error = invalid;
      this.logger.warn("page rejected", {
        continuationToken: request.continuationToken,
        error: invalid.message,
      });
      return Object.freeze({ kind: "failed", error: invalid, request });
    }

    this.error = undefined;
    this.pages++;
    if (page.hasMore && page.continuationToken !== null) {
      this.request = nextPageRequest(request, page.continuationToken);
    } else {
      this.more = false;
    }
    this.logger.info("page loaded", { items: page.items.length, hasMore: this.more });
    return Object.freeze({ kind: "loaded", page, request });
  }

  /**
   * Abort the in-flight fetch (if any) and stop loading for good.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const current = this.inFlightFetch;
    if (current === null) return;
    this.inFlightFetch = null;
    current.controller.abort();
    this.logger.info("page fetch cancelled", {
      continuationToken: current.request.continuationToken,
    });
  }

  private isStale(runId: number, controller: AbortController): boolean {
    return this.cancelled || controller.signal.aborted || runId !== this.runId;
  }

  private discard(request: PageRequest): PageLoadOutcome<T> {
    return Object.freeze({ kind: "cancelled", request });
  }
}

function validatePage<T>(page: PagedResult<T>, request: PageRequest): ListNavError | null {
  if (!Array.isArray(page.items)) {
    return new ListNavError("LISTNAV_INVALID_PAGE", "page items must be an array");
  }
  if (
    page.hasMore &&
    page.continuationToken !== null &&
    page.continuationToken === request.continuationToken
  ) {
    return new ListNavError(
      "LISTNAV_INVALID_PAGE",
      `source returned the requested continuation token "${page.continuationToken}" again`,
    );
  }
  return null;
}
