/**
 * packages/core/src/picker/engine.ts — Selection state for one interactive pick.
 *
 * Why: Owns the query, the ranked candidate list, the cursor and the visible
 * window, and pulls further pages from a PagedDataSource as the cursor nears
 * the end of what has been loaded. The engine never draws; the host's render
 * callback receives a frozen snapshot after every state change.
 *
 * Invariants (whenever the filtered list is non-empty):
 *   - 0 <= index < filtered.length
 *   - windowStart <= index < windowEnd
 *   - windowEnd - windowStart === min(maxVisibleItems, filtered.length)
 *
 * Paging is lazy and single-flight: a page is requested when the cursor comes
 * within prefetchThreshold rows of the end of the filtered list, never while
 * another fetch is outstanding, and not again after a failure until
 * retryLoad() is called.
 */

import type { PickerOptions } from "../config/pickerOptions.js";
import { type Logger, createLogger } from "../diagnostics/log.js";
import { ListNavError, describeError } from "../errors.js";
import type { PickerAction } from "../keybindings/types.js";
import {
  type HighlightRange,
  type KeyExtractor,
  type RankedCandidate,
  computeMatchHighlights,
  mergeRanked,
  rankCandidates,
} from "../matching/fuzzy.js";
import { PageLoader } from "../paging/pageLoader.js";
import type { PageLoadOutcome } from "../paging/types.js";
import type {
  CancelReason,
  PickerEngineOptions,
  PickerOutcome,
  PickerRender,
  PickerSnapshot,
  PickerStatus,
} from "./types.js";
import {
  type VisibleWindow,
  clampIndex,
  scrollWindowTo,
  windowAtBottom,
  windowAtTop,
} from "./window.js";

const NO_HIGHLIGHTS: readonly HighlightRange[] = Object.freeze([]);

function isControlText(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 0x20 || code === 0x7f) return true;
  }
  return false;
}

export class PickerEngine<T> {
  private readonly keyOf: KeyExtractor<T>;
  private readonly options: PickerOptions;
  private readonly render: PickerRender<T> | undefined;
  private readonly logger: Logger;
  private readonly loader: PageLoader<T> | null;

  private readonly candidates: T[];
  private ranked: readonly RankedCandidate<T>[];
  private query = "";
  private index: number;
  private window: VisibleWindow;
  private status: PickerStatus = "active";
  private started = false;
  private loading: Promise<void> | null = null;

  private resolveOutcome: (outcome: PickerOutcome<T>) => void = () => {};
  /** Settles once, when the session is confirmed or cancelled. */
  readonly outcome: Promise<PickerOutcome<T>>;

  constructor(opts: PickerEngineOptions<T>) {
    this.keyOf = opts.keyOf;
    this.options = opts.options;
    this.render = opts.render;
    this.logger = createLogger("picker", opts.log);
    this.loader =
      opts.source === undefined
        ? null
        : new PageLoader<T>({
            source: opts.source,
            pageSize: opts.options.pageSize,
            ...(opts.log === undefined ? {} : { log: opts.log }),
          });

    this.candidates = opts.items === undefined ? [] : opts.items.slice();
    this.ranked = this.rank(this.candidates, 0);
    this.index = this.ranked.length > 0 ? 0 : -1;
    this.window = windowAtTop(this.ranked.length, this.options.maxVisibleItems);

    this.outcome = new Promise<PickerOutcome<T>>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  get isActive(): boolean {
    return this.status === "active";
  }

  /**
   * Render the initial state and request the first page when a source is set.
   * Resolves once paging triggered so far has settled. A session that already
   * ended (e.g. cancelled by the host before start) resolves immediately.
   */
  start(): Promise<void> {
    if (!this.isActive) return Promise.resolve();
    if (this.started) return this.whenIdle();
    this.started = true;
    this.logger.info("session started", {
      items: this.candidates.length,
      paged: this.loader !== null,
    });

    if (this.loader === null && this.candidates.length === 0) {
      this.cancel("empty");
      return Promise.resolve();
    }

    if (this.loader === null) {
      this.emit();
    } else {
      void this.loadMore();
    }
    return this.whenIdle();
  }

  /** Resolves when no page fetch (or chained prefetch) is outstanding. */
  async whenIdle(): Promise<void> {
    while (this.loading !== null) await this.loading;
  }

  /**
   * Append printable text to the query and re-rank.
   * Control characters are ignored, as is all input when fuzzy search is off.
   */
  typeChar(c: string): void {
    this.assertActive("typeChar");
    if (!this.options.enableFuzzySearch) return;
    if (c.length === 0 || isControlText(c)) return;
    this.query += c;
    this.refilter();
  }

  /** Remove the last query character (by code point). */
  backspace(): void {
    this.assertActive("backspace");
    if (!this.options.enableFuzzySearch || this.query.length === 0) return;
    const chars = Array.from(this.query);
    chars.pop();
    this.query = chars.join("");
    this.refilter();
  }

  moveUp(): void {
    this.assertActive("moveUp");
    this.moveTo(this.index - 1);
  }

  moveDown(): void {
    this.assertActive("moveDown");
    this.moveTo(this.index + 1);
  }

  pageUp(): void {
    this.assertActive("pageUp");
    this.moveTo(this.index - this.options.maxVisibleItems);
  }

  pageDown(): void {
    this.assertActive("pageDown");
    this.moveTo(this.index + this.options.maxVisibleItems);
  }

  top(): void {
    this.assertActive("top");
    const count = this.ranked.length;
    if (count === 0) return;
    this.index = 0;
    this.window = windowAtTop(count, this.options.maxVisibleItems);
    this.changed();
  }

  bottom(): void {
    this.assertActive("bottom");
    const count = this.ranked.length;
    if (count === 0) return;
    this.index = count - 1;
    this.window = windowAtBottom(count, this.options.maxVisibleItems);
    this.changed();
  }

  visibleWindow(): VisibleWindow {
    return this.window;
  }

  /** Item under the cursor, or undefined when nothing matches. */
  current(): T | undefined {
    return this.ranked[this.index]?.item;
  }

  /**
   * Confirm the item under the cursor and end the session.
   * With nothing to select the session stays open and undefined is returned.
   */
  confirm(): T | undefined {
    this.assertActive("confirm");
    const entry = this.ranked[this.index];
    if (entry === undefined) return undefined;
    this.finish(Object.freeze({ kind: "confirmed", item: entry.item }));
    return entry.item;
  }

  /** End the session without a selection. No-op once ended. */
  cancel(reason: CancelReason = "user"): void {
    if (this.status !== "active") return;
    this.finish(Object.freeze({ kind: "cancelled", reason }));
  }

  /**
   * Apply a logical action.
   *
   * @returns false for actions the engine does not handle (left to the host)
   */
  dispatch(action: PickerAction): boolean {
    this.assertActive("dispatch");
    switch (action) {
      case "moveUp":
        this.moveUp();
        return true;
      case "moveDown":
        this.moveDown();
        return true;
      case "pageUp":
        this.pageUp();
        return true;
      case "pageDown":
        this.pageDown();
        return true;
      case "top":
        this.top();
        return true;
      case "bottom":
        this.bottom();
        return true;
      case "enter":
        this.confirm();
        return true;
      case "cancel":
        this.cancel("user");
        return true;
      case "back":
      case "search":
      case "command":
      case "download":
      case "refresh":
      case "info":
      case "help":
        return false;
    }
  }

  /**
   * Retry paging after a failure, with the continuation token that failed.
   */
  retryLoad(): Promise<void> {
    this.assertActive("retryLoad");
    if (this.loader === null || this.loading !== null) return this.whenIdle();
    void this.loadMore();
    return this.whenIdle();
  }

  snapshot(): PickerSnapshot<T> {
    return Object.freeze({
      query: this.query,
      filtered: this.ranked,
      index: this.index,
      windowStart: this.window.start,
      windowEnd: this.window.end,
      totalLoaded: this.candidates.length,
      loading: this.loader?.inFlight ?? false,
      hasMore: this.loader?.hasMore ?? false,
      lastError: this.loader?.lastError,
      status: this.status,
    });
  }

  /** Ranges of `text` matched by the current query, for highlighting. */
  highlights(text: string): readonly HighlightRange[] {
    if (!this.options.highlightMatches || !this.options.enableFuzzySearch) return NO_HIGHLIGHTS;
    return computeMatchHighlights(text, this.query);
  }

  private rank(items: readonly T[], firstOrdinal: number): readonly RankedCandidate<T>[] {
    const query = this.options.enableFuzzySearch ? this.query : "";
    return rankCandidates(items, this.keyOf, query, firstOrdinal);
  }

  private refilter(): void {
    this.ranked = this.rank(this.candidates, 0);
    this.index = this.ranked.length > 0 ? 0 : -1;
    this.window = windowAtTop(this.ranked.length, this.options.maxVisibleItems);
    this.changed();
  }

  private moveTo(target: number): void {
    const count = this.ranked.length;
    if (count === 0) return;
    const next = clampIndex(target, count);
    if (next === this.index) return;
    this.index = next;
    this.window = scrollWindowTo(next, this.window.start, count, this.options.maxVisibleItems);
    this.changed();
  }

  private changed(): void {
    this.emit();
    this.maybePrefetch();
  }

  private maybePrefetch(): void {
    const loader = this.loader;
    if (loader === null || !this.started || this.status !== "active") return;
    if (!loader.hasMore || loader.inFlight || loader.lastError !== undefined) return;

    const count = this.ranked.length;
    const remaining = count - 1 - this.index;
    if (remaining > this.options.prefetchThreshold && this.window.end < count) return;
    void this.loadMore();
  }

  private loadMore(): Promise<void> {
    const loader = this.loader;
    if (loader === null) return Promise.resolve();

    const run: Promise<void> = loader
      .loadNext()
      .then((outcome) => this.applyLoad(outcome))
      .catch((error: unknown) => {
        this.logger.error("page handling failed", { error: describeError(error) });
      })
      .finally(() => {
        if (this.loading === run) this.loading = null;
      });
    this.loading = run;
    this.emit();
    return run;
  }

  private applyLoad(outcome: PageLoadOutcome<T>): void {
    if (this.status !== "active") return;

    switch (outcome.kind) {
      case "busy":
      case "cancelled":
        return;
      case "exhausted":
        this.emit();
        return;
      case "failed":
        this.emit();
        return;
      case "loaded":
        break;
    }

    const items = outcome.page.items;
    const firstOrdinal = this.candidates.length;
    for (const item of items) this.candidates.push(item);

    const selected = this.ranked[this.index];
    this.ranked = mergeRanked(this.ranked, this.rank(items, firstOrdinal));
    const count = this.ranked.length;

    if (selected === undefined) {
      this.index = count > 0 ? 0 : -1;
      this.window = windowAtTop(count, this.options.maxVisibleItems);
    } else {
      this.index = this.ranked.findIndex((r) => r.ordinal === selected.ordinal);
      this.window = scrollWindowTo(
        this.index,
        this.window.start,
        count,
        this.options.maxVisibleItems,
      );
    }

    if (this.candidates.length === 0 && this.loader?.hasMore === false) {
      this.cancel("empty");
      return;
    }
    this.changed();
  }

  private finish(outcome: PickerOutcome<T>): void {
    this.status = outcome.kind;
    this.loader?.cancel();
    const fields =
      outcome.kind === "cancelled"
        ? { outcome: outcome.kind, reason: outcome.reason }
        : { outcome: outcome.kind };
    this.logger.info("session ended", fields);
    this.emit();
    this.resolveOutcome(outcome);
  }

  private emit(): void {
    if (this.render === undefined) return;
    try {
      this.render(this.snapshot());
    } catch (error: unknown) {
      this.logger.error("render callback threw", { error: describeError(error) });
    }
  }

  private assertActive(operation: string): void {
    if (this.status !== "active") {
      throw new ListNavError(
        "LISTNAV_SESSION_CLOSED",
        `${operation}() called after the picker session ended (${this.status})`,
      );
    }
  }
}
