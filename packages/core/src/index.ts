/**
 * @listnav/core
 *
 * Runtime-agnostic selection and navigation engine for large paged lists.
 * This package MUST NOT use Node-specific APIs (Buffer, process, node:* imports).
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export {
  ListNavError,
  describeError,
  isListNavError,
  type ListNavErrorCode,
} from "./errors.js";

export {
  createLogger,
  fanOut,
  isLogLevel,
  makeLogSink,
  withMinLevel,
  type LogEvent,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./diagnostics/log.js";

export { createSystemTimerHost, type TimerHost, type TimerId } from "./timers.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_PICKER_OPTIONS,
  resolvePickerOptions,
  type PickerOptions,
} from "./config/pickerOptions.js";

// =============================================================================
// Matching
// =============================================================================

export {
  computeMatchHighlights,
  matchFuzzy,
  mergeRanked,
  rankCandidates,
  rankFuzzy,
  scoreItem,
  scoreKey,
  sortRanked,
  type FuzzyMatchResult,
  type HighlightRange,
  type KeyExtractor,
  type RankedCandidate,
} from "./matching/fuzzy.js";

// =============================================================================
// Key sequences
// =============================================================================

export * from "./keybindings/index.js";

// =============================================================================
// Paging
// =============================================================================

export {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type PageLoadOutcome,
  type PageRequest,
  type PagedDataSource,
  type PagedResult,
} from "./paging/types.js";

export {
  createArrayDataSource,
  createPageRequest,
  createPagedResult,
  emptyPagedResult,
  nextPageRequest,
} from "./paging/pageRequest.js";

export { PageLoader, type PageLoaderOptions } from "./paging/pageLoader.js";

// =============================================================================
// Picker
// =============================================================================

export type {
  CancelReason,
  PickerEngineOptions,
  PickerOutcome,
  PickerRender,
  PickerSnapshot,
  PickerStatus,
} from "./picker/types.js";

export {
  clampIndex,
  scrollWindowTo,
  windowAtBottom,
  windowAtTop,
  windowSize,
  type VisibleWindow,
} from "./picker/window.js";

export { PickerEngine } from "./picker/engine.js";

export {
  PickerSession,
  type InputMode,
  type KeyInput,
  type NamedKey,
  type PickerSessionOptions,
} from "./picker/session.js";

// =============================================================================
// Focus
// =============================================================================

export { PaneFocusManager, type FocusRegion } from "./focus/paneFocusManager.js";
