/**
 * packages/core/src/keybindings/config.ts — Binding defaults and validation.
 *
 * Why: Ambiguous bindings silently break prefix resolution (a binding that is
 * a strict prefix of another makes the longer one unreachable), so binding
 * sets are validated eagerly, before any session starts, with path-specific
 * error details.
 */

import { ListNavError } from "../errors.js";
import {
  type ActionBindings,
  type KeyBindingsConfig,
  type KeyBindingsError,
  type OverlapPolicy,
  PICKER_ACTIONS,
  type PickerAction,
  type ValidateKeyBindingsResult,
} from "./types.js";

/** Default time from the first key of a sequence until it resolves. */
export const DEFAULT_SEQUENCE_TIMEOUT_MS = 1000;

export const DEFAULT_ACTION_BINDINGS: ActionBindings = Object.freeze({
  moveDown: "j",
  moveUp: "k",
  enter: "l",
  back: "h",
  top: "gg",
  bottom: "G",
  pageDown: "\u0006",
  pageUp: "\u0002",
  cancel: "q",
  search: "/",
  command: ":",
  download: "d",
  refresh: "r",
  info: "i",
  help: "?",
});

export const DEFAULT_KEY_BINDINGS: KeyBindingsConfig = Object.freeze({
  bindings: DEFAULT_ACTION_BINDINGS,
  sequenceTimeoutMs: DEFAULT_SEQUENCE_TIMEOUT_MS,
  overlapPolicy: "reject",
});

/**
 * Overrides accepted by resolveKeyBindings.
 * A null binding unbinds the action.
 */
export type KeyBindingsOverrides = Readonly<{
  bindings?: Readonly<Partial<Record<PickerAction, string | null>>>;
  sequenceTimeoutMs?: number;
  overlapPolicy?: OverlapPolicy;
}>;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ACTION_NAMES: ReadonlySet<string> = new Set(PICKER_ACTIONS);

function isPickerAction(value: string): value is PickerAction {
  return ACTION_NAMES.has(value);
}

function fail(
  code: KeyBindingsError["code"],
  path: string,
  detail: string,
): ValidateKeyBindingsResult {
  return Object.freeze({ ok: false, error: Object.freeze({ code, path, detail }) });
}

/**
 * Validate an untrusted binding configuration (e.g. parsed from a config file).
 *
 * Checks, in order: shape, per-action values, timeout, policy, duplicate
 * sequences, then prefix overlaps (under the "reject" policy only).
 */
export function validateKeyBindings(raw: unknown): ValidateKeyBindingsResult {
  if (!isRecord(raw)) return fail("INVALID_VALUE", "", "key bindings must be an object");

  const rawBindings = raw["bindings"];
  if (!isRecord(rawBindings)) {
    return fail("INVALID_VALUE", "bindings", "bindings must be an object");
  }

  const bindings: Partial<Record<PickerAction, string>> = {};
  for (const [action, sequence] of Object.entries(rawBindings)) {
    if (!isPickerAction(action)) {
      return fail("INVALID_VALUE", `bindings.${action}`, `unknown action "${action}"`);
    }
    if (sequence === undefined) continue;
    if (typeof sequence !== "string") {
      return fail("INVALID_VALUE", `bindings.${action}`, "key sequence must be a string");
    }
    if (sequence.length === 0) {
      return fail("EMPTY_SEQUENCE", `bindings.${action}`, "key sequence must not be empty");
    }
    bindings[action] = sequence;
  }

  const timeout = raw["sequenceTimeoutMs"];
  if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout <= 0) {
    return fail(
      "INVALID_VALUE",
      "sequenceTimeoutMs",
      "sequenceTimeoutMs must be a positive finite number",
    );
  }

  const policy = raw["overlapPolicy"] ?? "reject";
  if (policy !== "reject" && policy !== "defer") {
    return fail("INVALID_VALUE", "overlapPolicy", 'overlapPolicy must be "reject" or "defer"');
  }

  const bound: [PickerAction, string][] = [];
  for (const action of PICKER_ACTIONS) {
    const sequence = bindings[action];
    if (sequence !== undefined) bound.push([action, sequence]);
  }

  for (let i = 0; i < bound.length; i++) {
    const a = bound[i];
    if (!a) continue;
    for (let j = i + 1; j < bound.length; j++) {
      const b = bound[j];
      if (!b) continue;
      if (a[1] === b[1]) {
        return fail(
          "DUPLICATE_SEQUENCE",
          `bindings.${b[0]}`,
          `"${displaySequence(b[1])}" is already bound to ${a[0]}`,
        );
      }
    }
  }

  if (policy === "reject") {
    for (const [shortAction, shortSeq] of bound) {
      for (const [longAction, longSeq] of bound) {
        if (longSeq.length > shortSeq.length && longSeq.startsWith(shortSeq)) {
          const shortText = `"${displaySequence(shortSeq)}" (${shortAction})`;
          const longText = `"${displaySequence(longSeq)}" (${longAction})`;
          return fail(
            "PREFIX_OVERLAP",
            `bindings.${longAction}`,
            `${shortText} is a prefix of ${longText}`,
          );
        }
      }
    }
  }

  return Object.freeze({
    ok: true,
    value: Object.freeze({
      bindings: Object.freeze(bindings),
      sequenceTimeoutMs: timeout,
      overlapPolicy: policy,
    }),
  });
}

/**
 * Validate a config, throwing LISTNAV_INVALID_KEYBINDINGS on failure.
 */
export function assertValidKeyBindings(raw: unknown): KeyBindingsConfig {
  const result = validateKeyBindings(raw);
  if (!result.ok) {
    const where = result.error.path.length > 0 ? `${result.error.path}: ` : "";
    throw new ListNavError(
      "LISTNAV_INVALID_KEYBINDINGS",
      `invalid key bindings (${result.error.code}) ${where}${result.error.detail}`,
    );
  }
  return result.value;
}

/**
 * Merge overrides over DEFAULT_KEY_BINDINGS and validate the result.
 *
 * @throws ListNavError LISTNAV_INVALID_KEYBINDINGS when the merged set is ambiguous
 */
export function resolveKeyBindings(overrides?: KeyBindingsOverrides): KeyBindingsConfig {
  const bindings: Partial<Record<PickerAction, string>> = { ...DEFAULT_ACTION_BINDINGS };
  const overrideBindings = overrides?.bindings;
  if (overrideBindings !== undefined) {
    for (const action of PICKER_ACTIONS) {
      const next = overrideBindings[action];
      if (next === undefined) continue;
      if (next === null) {
        delete bindings[action];
      } else {
        bindings[action] = next;
      }
    }
  }

  return assertValidKeyBindings({
    bindings,
    sequenceTimeoutMs: overrides?.sequenceTimeoutMs ?? DEFAULT_SEQUENCE_TIMEOUT_MS,
    overlapPolicy: overrides?.overlapPolicy ?? "reject",
  });
}

/**
 * Render a literal key sequence for help text: control characters become
 * "C-x", space becomes "Space", keys are separated by spaces.
 */
export function displaySequence(sequence: string): string {
  const parts: string[] = [];
  for (const ch of sequence) {
    const code = ch.charCodeAt(0);
    if (code === 0x20) {
      parts.push("Space");
    } else if (code === 0x1b) {
      parts.push("Esc");
    } else if (code >= 1 && code <= 26) {
      parts.push(`C-${String.fromCharCode(code + 96)}`);
    } else {
      parts.push(ch);
    }
  }
  return parts.join(" ");
}

/** Introspection record for a bound action. */
export type DescribedBinding = Readonly<{
  action: PickerAction;
  sequence: string;
  display: string;
}>;

/**
 * List bound actions in declaration order (for help overlays).
 */
export function describeBindings(config: KeyBindingsConfig): readonly DescribedBinding[] {
  const out: DescribedBinding[] = [];
  for (const action of PICKER_ACTIONS) {
    const sequence = config.bindings[action];
    if (sequence === undefined) continue;
    out.push(Object.freeze({ action, sequence, display: displaySequence(sequence) }));
  }
  return Object.freeze(out);
}
