/**
 * packages/node/src/input/decodeKeys.ts — Raw terminal input to key events.
 *
 * Handles what a terminal in raw mode sends for the keys the picker uses:
 * printable text, C0 control characters, and CSI ("ESC [") / SS3 ("ESC O")
 * sequences for arrows, Home/End and PageUp/PageDown. Unknown sequences are
 * dropped whole. A sequence cut off at the end of a chunk is returned in
 * `rest` and should be prepended to the next chunk. That includes a lone
 * trailing ESC: the caller decides when it stands for the Escape key
 * (see `flushEscape`).
 */

import type { KeyInput, NamedKey } from "@listnav/core";

export type DecodeResult = Readonly<{
  events: readonly KeyInput[];
  /** Incomplete trailing escape sequence. */
  rest: string;
}>;

const ESC = "\u001b";

/** CSI/SS3 final byte -> key, for sequences without a numeric parameter. */
const FINAL_KEYS: Readonly<Record<string, NamedKey>> = Object.freeze({
  A: "up",
  B: "down",
  H: "home",
  F: "end",
});

/** "ESC [ n ~" parameter -> key. */
const TILDE_KEYS: Readonly<Record<string, NamedKey>> = Object.freeze({
  "1": "home",
  "4": "end",
  "5": "pageUp",
  "6": "pageDown",
  "7": "home",
  "8": "end",
});

function named(name: NamedKey): KeyInput {
  return Object.freeze({ kind: "named", name });
}

function char(value: string): KeyInput {
  return Object.freeze({ kind: "char", char: value });
}

function controlKey(code: number): KeyInput | null {
  switch (code) {
    case 0x03:
      return named("ctrlC");
    case 0x09:
      return named("tab");
    case 0x0a:
    case 0x0d:
      return named("enter");
    case 0x08:
    case 0x7f:
      return named("backspace");
    default:
      return null;
  }
}

function isFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

function decodeCsi(params: string, final: string): KeyInput | null {
  if (final === "~") {
    const key = TILDE_KEYS[params.split(";")[0] ?? ""];
    return key === undefined ? null : named(key);
  }
  const key = FINAL_KEYS[final];
  return key === undefined ? null : named(key);
}

export function decodeTerminalInput(input: string | Uint8Array): DecodeResult {
  const text = typeof input === "string" ? input : Buffer.from(input).toString("utf8");
  const events: KeyInput[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i] ?? "";

    if (ch !== ESC) {
      const code = ch.charCodeAt(0);
      const control = controlKey(code);
      if (control !== null) {
        events.push(control);
        i++;
        continue;
      }
      const cp = text.codePointAt(i) ?? code;
      const value = String.fromCodePoint(cp);
      events.push(char(value));
      i += value.length;
      continue;
    }

    const next = text[i + 1];
    if (next === undefined) {
      return Object.freeze({ events: Object.freeze(events), rest: ESC });
    }

    if (next === "[") {
      let j = i + 2;
      while (j < text.length && !isFinalByte(text.charCodeAt(j))) j++;
      if (j >= text.length) {
        return Object.freeze({ events: Object.freeze(events), rest: text.slice(i) });
      }
      const key = decodeCsi(text.slice(i + 2, j), text[j] ?? "");
      if (key !== null) events.push(key);
      i = j + 1;
      continue;
    }

    if (next === "O") {
      const final = text[i + 2];
      if (final === undefined) {
        return Object.freeze({ events: Object.freeze(events), rest: text.slice(i) });
      }
      const key = FINAL_KEYS[final];
      if (key !== undefined) events.push(named(key));
      i += 3;
      continue;
    }

    events.push(named("escape"));
    i++;
  }

  return Object.freeze({ events: Object.freeze(events), rest: "" });
}

/**
 * Resolve a carried `rest` once no more input is coming: a lone ESC is the
 * Escape key, a truncated sequence is dropped.
 */
export function flushEscape(rest: string): readonly KeyInput[] {
  return rest === ESC ? Object.freeze([named("escape")]) : Object.freeze([]);
}
