/**
 * packages/node/src/runPicker.ts — Drive a picker session from a terminal.
 *
 * Puts a TTY input into raw mode, decodes keys into a PickerSession and
 * resolves with the session outcome. Raw mode and listeners are restored on
 * every exit path, including an abort through `signal`.
 */

import { StringDecoder } from "node:string_decoder";
import type { Readable } from "node:stream";
import {
  type PickerOutcome,
  PickerSession,
  type PickerSessionOptions,
  type TimerId,
  createSystemTimerHost,
} from "@listnav/core";
import { createEnvLogSink } from "./diagnostics/ndjsonLog.js";
import { decodeTerminalInput, flushEscape } from "./input/decodeKeys.js";

/** How long a trailing ESC waits for the rest of an escape sequence. */
export const ESCAPE_TIMEOUT_MS = 50;

/** Readable key source; TTY streams additionally support raw mode. */
export type PickerInput = Readable & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type RunPickerOptions<T> = PickerSessionOptions<T> &
  Readonly<{
    /** Defaults to process.stdin. */
    input?: PickerInput;
    /** Aborting cancels the session with reason "aborted". */
    signal?: AbortSignal;
    /** Called with the session once it exists, e.g. to expose it to a renderer. */
    onSession?: (session: PickerSession<T>) => void;
  }>;

function enterRawMode(input: PickerInput): () => void {
  if (input.isTTY !== true || typeof input.setRawMode !== "function") return () => {};
  const setRawMode = input.setRawMode.bind(input);
  const wasRaw = input.isRaw === true;
  if (!wasRaw) setRawMode(true);
  return () => {
    if (wasRaw) return;
    try {
      setRawMode(false);
    } catch {
      // no-op
    }
  };
}

export async function runPicker<T>(opts: RunPickerOptions<T>): Promise<PickerOutcome<T>> {
  const input: PickerInput = opts.input ?? process.stdin;
  // Without an explicit sink, LISTNAV_LOG decides whether diagnostics are written.
  const log = opts.log ?? createEnvLogSink();
  const timers = opts.timers ?? createSystemTimerHost();
  const session = new PickerSession<T>({
    ...opts,
    timers,
    ...(log === undefined ? {} : { log }),
  });
  opts.onSession?.(session);

  const signal = opts.signal;
  if (signal?.aborted === true) {
    session.cancel("aborted");
    return session.outcome;
  }

  const decoder = new StringDecoder("utf8");
  let carry = "";
  let escapeTimer: TimerId | null = null;

  const clearEscapeTimer = (): void => {
    if (escapeTimer === null) return;
    timers.clearTimeout(escapeTimer);
    escapeTimer = null;
  };

  const onData = (chunk: Buffer | string): void => {
    clearEscapeTimer();
    const text = carry + (typeof chunk === "string" ? chunk : decoder.write(chunk));
    const { events, rest } = decodeTerminalInput(text);
    carry = rest;
    for (const event of events) session.handleKey(event);
    if (carry === "") return;
    // Nothing followed within the timeout: a held ESC was the Escape key.
    escapeTimer = timers.setTimeout(() => {
      escapeTimer = null;
      const held = flushEscape(carry);
      carry = "";
      for (const event of held) session.handleKey(event);
    }, ESCAPE_TIMEOUT_MS);
  };
  const onEnd = (): void => session.cancel("aborted");
  const onAbort = (): void => session.cancel("aborted");

  const restoreRawMode = enterRawMode(input);
  input.on("data", onData);
  input.on("end", onEnd);
  signal?.addEventListener("abort", onAbort, { once: true });
  input.resume();

  try {
    await session.start();
    return await session.outcome;
  } finally {
    clearEscapeTimer();
    input.off("data", onData);
    input.off("end", onEnd);
    signal?.removeEventListener("abort", onAbort);
    input.pause();
    restoreRawMode();
  }
}
