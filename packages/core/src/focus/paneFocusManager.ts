/**
 * packages/core/src/focus/paneFocusManager.ts — Focus traversal across panes.
 *
 * Regions are traversed in registration order and wrap around at both ends.
 * A region is focusable only while it reports canAcceptFocus() and
 * isVisible(); the predicates are re-evaluated on every traversal.
 */

export interface FocusRegion {
  canAcceptFocus(): boolean;
  isVisible(): boolean;
}

function isFocusable(region: FocusRegion): boolean {
  return region.canAcceptFocus() && region.isVisible();
}

export class PaneFocusManager<R extends FocusRegion = FocusRegion> {
  private readonly regions: R[] = [];
  /** Index into `regions`, or -1 when nothing has focus. */
  private cursor = -1;

  get size(): number {
    return this.regions.length;
  }

  /** Registered regions in traversal order. */
  list(): readonly R[] {
    return Object.freeze(this.regions.slice());
  }

  /** Append a region. Registering the same region twice is a no-op. */
  register(region: R): void {
    if (this.regions.includes(region)) return;
    this.regions.push(region);
  }

  /**
   * Remove a region. Removing the focused region leaves nothing focused.
   */
  unregister(region: R): void {
    const at = this.regions.indexOf(region);
    if (at < 0) return;
    this.regions.splice(at, 1);

    if (at === this.cursor) {
      this.cursor = -1;
    } else if (at < this.cursor) {
      this.cursor--;
    }
  }

  current(): R | null {
    return this.regions[this.cursor] ?? null;
  }

  /**
   * Move to a registered region.
   *
   * @returns false (and leaves the cursor unchanged) for an unknown region
   */
  setCurrent(region: R): boolean {
    const at = this.regions.indexOf(region);
    if (at < 0) return false;
    this.cursor = at;
    return true;
  }

  /** Focus the first focusable region. */
  tryGetFirst(): R | null {
    return this.scan(-1, 1);
  }

  /** Focus the next focusable region after the cursor, wrapping. */
  tryGetNext(): R | null {
    return this.scan(this.cursor, 1);
  }

  /** Focus the previous focusable region before the cursor, wrapping. */
  tryGetPrevious(): R | null {
    const from = this.cursor < 0 ? this.regions.length : this.cursor;
    return this.scan(from, -1);
  }

  private scan(from: number, step: 1 | -1): R | null {
    const n = this.regions.length;
    for (let k = 1; k <= n; k++) {
      const at = (((from + step * k) % n) + n) % n;
      const region = this.regions[at];
      if (region !== undefined && isFocusable(region)) {
        this.cursor = at;
        return region;
      }
    }
    return null;
  }
}
