/**
 * packages/core/src/keybindings/sequenceBuffer.ts — Multi-key sequence resolution.
 *
 * Why: Resolves raw keystrokes into logical actions while supporting bindings
 * of different lengths side by side (e.g. "G" -> bottom next to "gg" -> top).
 *
 * State machine:
 *   empty   --key--> matched (exact binding)      -> empty
 *           --key--> pending (strict prefix)      -> schedule deadline
 *           --key--> none                         -> empty
 *   pending --key--> buffer+key evaluated as above; when it matches nothing
 *                    the new key is evaluated alone as a fresh buffer
 *   pending --deadline--> empty (emits the buffer's own binding under the
 *                    "defer" overlap policy, otherwise discards silently)
 *
 * The deadline is measured from the first key in the buffer. Every key
 * cancels the scheduled deadline before it is processed and timers carry a
 * generation number, so a stale deadline can never fire into a newer sequence.
 */

import { type LogSink, type Logger, createLogger } from "../diagnostics/log.js";
import { type TimerHost, type TimerId, createSystemTimerHost } from "../timers.js";
import { assertValidKeyBindings } from "./config.js";
import {
  type KeyBindingsConfig,
  PICKER_ACTIONS,
  type PickerAction,
  type SequenceResult,
  type SequenceState,
} from "./types.js";

const EMPTY_STATE: SequenceState = Object.freeze({ kind: "empty" });
const NO_MATCH: SequenceResult = Object.freeze({ kind: "none" });

export type KeySequenceBufferOptions = Readonly<{
  /** Validated eagerly; an ambiguous set throws LISTNAV_INVALID_KEYBINDINGS. */
  config: KeyBindingsConfig;
  timers?: TimerHost;
  /** Receives actions resolved by a deadline rather than by a keystroke. */
  onAction?: (action: PickerAction, sequence: string) => void;
  log?: LogSink;
}>;

export class KeySequenceBuffer {
  private readonly config: KeyBindingsConfig;
  private readonly timers: TimerHost;
  private readonly bySequence: ReadonlyMap<string, PickerAction>;
  private readonly prefixes: ReadonlySet<string>;
  private readonly onAction: ((action: PickerAction, sequence: string) => void) | undefined;
  private readonly logger: Logger;

  private current: SequenceState = EMPTY_STATE;
  private timerId: TimerId | null = null;
  private generation = 0;
  private disposed = false;

  constructor(options: KeySequenceBufferOptions) {
    this.config = assertValidKeyBindings(options.config);
    this.timers = options.timers ?? createSystemTimerHost();
    this.onAction = options.onAction;
    this.logger = createLogger("keys", options.log);

    const bySequence = new Map<string, PickerAction>();
    const prefixes = new Set<string>();
    for (const action of PICKER_ACTIONS) {
      const sequence = this.config.bindings[action];
      if (sequence === undefined) continue;
      bySequence.set(sequence, action);
      // Strict prefixes end on whole keys (code points), never mid-surrogate.
      const keys = Array.from(sequence);
      for (let n = 1; n < keys.length; n++) {
        prefixes.add(keys.slice(0, n).join(""));
      }
    }
    this.bySequence = bySequence;
    this.prefixes = prefixes;
  }

  /** Current machine state. */
  get state(): SequenceState {
    return this.current;
  }

  /** Buffered keys, or null when nothing is pending. */
  get pending(): string | null {
    return this.current.kind === "pending" ? this.current.buffer : null;
  }

  get timeoutMs(): number {
    return this.config.sequenceTimeoutMs;
  }

  /**
   * Feed one keystroke (a single character).
   */
  push(key: string): SequenceResult {
    if (this.disposed || key.length === 0) return NO_MATCH;

    this.cancelTimer();
    const now = this.timers.now();

    // A key that arrives after the deadline but before the timer callback ran
    // still sees the old sequence expire first.
    if (this.current.kind === "pending" && now >= this.current.deadlineMs) {
      this.expire();
    }

    const prev = this.current;
    if (prev.kind === "pending") {
      const combined = this.evaluate(prev.buffer + key, prev.startedAtMs, now);
      if (combined.kind !== "none") return combined;
      this.logger.trace("sequence abandoned", { buffer: prev.buffer, key });
    }

    return this.evaluate(key, now, now);
  }

  /** Drop pending keys without emitting anything. */
  reset(): void {
    this.cancelTimer();
    this.current = EMPTY_STATE;
  }

  /** Release the timer; further keys resolve to nothing. */
  dispose(): void {
    this.reset();
    this.disposed = true;
  }

  private evaluate(buffer: string, startedAtMs: number, now: number): SequenceResult {
    const action = this.bySequence.get(buffer);
    const extendable = this.prefixes.has(buffer);

    if (action !== undefined && !(extendable && this.config.overlapPolicy === "defer")) {
      this.current = EMPTY_STATE;
      return Object.freeze({ kind: "matched", action, sequence: buffer });
    }

    if (extendable) {
      const deadlineMs = startedAtMs + this.config.sequenceTimeoutMs;
      this.current = Object.freeze({ kind: "pending", buffer, startedAtMs, deadlineMs });
      this.scheduleTimer(deadlineMs - now);
      return Object.freeze({ kind: "pending", buffer });
    }

    this.current = EMPTY_STATE;
    return NO_MATCH;
  }

  private scheduleTimer(delayMs: number): void {
    const generation = ++this.generation;
    this.timerId = this.timers.setTimeout(() => {
      if (generation !== this.generation) return;
      this.timerId = null;
      this.expire();
    }, delayMs);
  }

  private cancelTimer(): void {
    this.generation++;
    if (this.timerId === null) return;
    this.timers.clearTimeout(this.timerId);
    this.timerId = null;
  }

  private expire(): void {
    const state = this.current;
    if (state.kind !== "pending") return;
    this.current = EMPTY_STATE;

    const action = this.bySequence.get(state.buffer);
    if (action === undefined) {
      this.logger.trace("sequence timed out", { buffer: state.buffer });
      return;
    }

    this.logger.trace("sequence resolved by timeout", { buffer: state.buffer, action });
    if (this.onAction === undefined) return;
    try {
      this.onAction(action, state.buffer);
    } catch (error: unknown) {
      this.logger.error("onAction callback threw", { action, error });
    }
  }
}
