/**
 * packages/core/src/keybindings/types.ts — Key sequence type definitions.
 *
 * Why: Defines the logical actions, the binding configuration and the states
 * of the key-sequence machine. These types form the contract between the
 * validator, the sequence buffer and the picker session.
 */

/**
 * Logical navigation commands, decoupled from the keys that trigger them.
 */
export type PickerAction =
  | "moveUp"
  | "moveDown"
  | "pageUp"
  | "pageDown"
  | "top"
  | "bottom"
  | "enter"
  | "back"
  | "cancel"
  | "search"
  | "command"
  | "download"
  | "refresh"
  | "info"
  | "help";

/** All actions in declaration order (used for validation and introspection). */
export const PICKER_ACTIONS: readonly PickerAction[] = Object.freeze([
  "moveUp",
  "moveDown",
  "pageUp",
  "pageDown",
  "top",
  "bottom",
  "enter",
  "back",
  "cancel",
  "search",
  "command",
  "download",
  "refresh",
  "info",
  "help",
]);

/**
 * How a binding that is a strict prefix of another binding is treated.
 *
 *   - "reject": configuration error (the longer binding would be unreachable)
 *   - "defer": an exact match keeps waiting for the longer binding and is
 *     emitted when the sequence times out
 */
export type OverlapPolicy = "reject" | "defer";

/**
 * Logical action -> literal key sequence (one or more characters).
 * Unbound actions are simply absent.
 */
export type ActionBindings = Readonly<Partial<Record<PickerAction, string>>>;

export type KeyBindingsConfig = Readonly<{
  bindings: ActionBindings;
  /** Time allowed from the first key of a sequence until it resolves. */
  sequenceTimeoutMs: number;
  overlapPolicy: OverlapPolicy;
}>;

/**
 * State of the key-sequence machine.
 *
 * Discriminated union:
 *   - "empty": nothing buffered
 *   - "pending": a strict prefix of at least one binding is buffered
 */
export type SequenceState =
  | Readonly<{ kind: "empty" }>
  | Readonly<{
      kind: "pending";
      /** Keys typed so far, concatenated. */
      buffer: string;
      /** Timestamp (ms) of the first key in the buffer. */
      startedAtMs: number;
      /** startedAtMs + sequenceTimeoutMs */
      deadlineMs: number;
    }>;

/**
 * Result of pushing one key.
 *
 *   - "matched": a complete binding resolved
 *   - "pending": buffering, waiting for more keys or the timeout
 *   - "none": the key resolved to nothing and was discarded
 */
export type SequenceResult =
  | Readonly<{ kind: "matched"; action: PickerAction; sequence: string }>
  | Readonly<{ kind: "pending"; buffer: string }>
  | Readonly<{ kind: "none" }>;

/**
 * Validation failure for a key binding configuration.
 */
export type KeyBindingsError = Readonly<{
  code: "EMPTY_SEQUENCE" | "DUPLICATE_SEQUENCE" | "PREFIX_OVERLAP" | "INVALID_VALUE";
  /** Config path of the offending value, e.g. "bindings.top". */
  path: string;
  detail: string;
}>;

export type ValidateKeyBindingsResult =
  | Readonly<{ ok: true; value: KeyBindingsConfig }>
  | Readonly<{ ok: false; error: KeyBindingsError }>;
