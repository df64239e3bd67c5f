/**
 * packages/core/src/config/pickerOptions.ts — Picker option defaults and validation.
 */

import { ListNavError } from "../errors.js";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../paging/types.js";

export type PickerOptions = Readonly<{
  /** When false, typing does not filter and candidates stay unranked. */
  enableFuzzySearch: boolean;
  /** Rows in the visible window. */
  maxVisibleItems: number;
  highlightMatches: boolean;
  /** Inactivity timeout in ms; null disables it. */
  pickerTimeoutMs: number | null;
  pageSize: number;
  /** Rows from the loaded end at which the next page is requested. */
  prefetchThreshold: number;
}>;

export const DEFAULT_PICKER_OPTIONS: PickerOptions = Object.freeze({
  enableFuzzySearch: true,
  maxVisibleItems: 15,
  highlightMatches: true,
  pickerTimeoutMs: null,
  pageSize: DEFAULT_PAGE_SIZE,
  prefetchThreshold: 5,
});

function invalid(detail: string): ListNavError {
  return new ListNavError("LISTNAV_INVALID_OPTIONS", `invalid picker options: ${detail}`);
}

function requireInteger(name: string, value: number, min: number, max?: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw invalid(`${name} must be an integer >= ${min} (got ${String(value)})`);
  }
  if (max !== undefined && value > max) {
    throw invalid(`${name} must be <= ${max} (got ${value})`);
  }
}

/**
 * Merge a partial option set over DEFAULT_PICKER_OPTIONS and validate it.
 *
 * @throws ListNavError LISTNAV_INVALID_OPTIONS
 */
export function resolvePickerOptions(partial: Partial<PickerOptions> = {}): PickerOptions {
  const merged: PickerOptions = { ...DEFAULT_PICKER_OPTIONS, ...partial };

  if (typeof merged.enableFuzzySearch !== "boolean") {
    throw invalid("enableFuzzySearch must be a boolean");
  }
  if (typeof merged.highlightMatches !== "boolean") {
    throw invalid("highlightMatches must be a boolean");
  }
  requireInteger("maxVisibleItems", merged.maxVisibleItems, 1);
  requireInteger("pageSize", merged.pageSize, 1, MAX_PAGE_SIZE);
  requireInteger("prefetchThreshold", merged.prefetchThreshold, 0);

  const timeout = merged.pickerTimeoutMs;
  if (timeout !== null && (!Number.isFinite(timeout) || timeout <= 0)) {
    throw invalid(`pickerTimeoutMs must be null or a positive number (got ${String(timeout)})`);
  }

  return Object.freeze(merged);
}
