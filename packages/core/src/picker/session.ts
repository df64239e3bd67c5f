/**
 * packages/core/src/picker/session.ts — Keyboard input routing for a picker.
 *
 * Why: Connects decoded keys to a PickerEngine. Characters either build key
 * sequences (navigate mode) or edit the query (search mode); named keys such
 * as arrows work in both. Actions the engine does not own are handed to the
 * host.
 *
 * Mode transitions:
 *   navigate --search action / tab--> search   (fuzzy search enabled only)
 *   search   --escape / tab---------> navigate (query is kept)
 * Every transition drops any half-typed key sequence.
 */

import type { PickerOptions } from "../config/pickerOptions.js";
import { type Logger, createLogger } from "../diagnostics/log.js";
import { DEFAULT_KEY_BINDINGS } from "../keybindings/config.js";
import { KeySequenceBuffer } from "../keybindings/sequenceBuffer.js";
import type { KeyBindingsConfig, PickerAction } from "../keybindings/types.js";
import { type TimerHost, type TimerId, createSystemTimerHost } from "../timers.js";
import { PickerEngine } from "./engine.js";
import type { PickerEngineOptions, PickerOutcome } from "./types.js";

/** Keys that arrive as a whole rather than as text. */
export type NamedKey =
  | "up"
  | "down"
  | "pageUp"
  | "pageDown"
  | "home"
  | "end"
  | "enter"
  | "escape"
  | "backspace"
  | "tab"
  | "ctrlC";

export type KeyInput =
  | Readonly<{ kind: "char"; char: string }>
  | Readonly<{ kind: "named"; name: NamedKey }>;

export type InputMode = "navigate" | "search";

export type PickerSessionOptions<T> = PickerEngineOptions<T> &
  Readonly<{
    keyBindings?: KeyBindingsConfig;
    timers?: TimerHost;
    /** Receives actions the engine does not handle (back, info, help, ...). */
    onAction?: (action: PickerAction, session: PickerSession<T>) => void;
    onModeChange?: (mode: InputMode) => void;
  }>;

export class PickerSession<T> {
  readonly engine: PickerEngine<T>;

  private readonly options: PickerOptions;
  private readonly timers: TimerHost;
  private readonly keys: KeySequenceBuffer;
  private readonly logger: Logger;
  private readonly onAction: PickerSessionOptions<T>["onAction"];
  private readonly onModeChange: PickerSessionOptions<T>["onModeChange"];

  private inputMode: InputMode = "navigate";
  private idleTimer: TimerId | null = null;
  private released = false;

  constructor(opts: PickerSessionOptions<T>) {
    this.options = opts.options;
    this.timers = opts.timers ?? createSystemTimerHost();
    this.logger = createLogger("session", opts.log);
    this.onAction = opts.onAction;
    this.onModeChange = opts.onModeChange;
    this.engine = new PickerEngine<T>(opts);
    this.keys = new KeySequenceBuffer({
      config: opts.keyBindings ?? DEFAULT_KEY_BINDINGS,
      timers: this.timers,
      onAction: (action) => {
        if (this.engine.isActive) this.apply(action);
      },
      ...(opts.log === undefined ? {} : { log: opts.log }),
    });

    void this.engine.outcome.then(() => this.release());
  }

  get mode(): InputMode {
    return this.inputMode;
  }

  get outcome(): Promise<PickerOutcome<T>> {
    return this.engine.outcome;
  }

  /** Start the engine and the inactivity timer. */
  start(): Promise<void> {
    const ready = this.engine.start();
    if (this.engine.isActive) this.armIdleTimer();
    return ready;
  }

  /**
   * Route one key. Keys arriving after the session ended are ignored.
   */
  handleKey(input: KeyInput): void {
    if (!this.engine.isActive) return;
    this.armIdleTimer();

    if (input.kind === "char") {
      this.handleChar(input.char);
    } else {
      this.handleNamed(input.name);
    }
  }

  /** Cancel the session (e.g. when the host is shutting down). */
  cancel(reason: "user" | "timeout" | "aborted" = "user"): void {
    this.engine.cancel(reason);
  }

  private handleChar(char: string): void {
    if (this.inputMode === "search") {
      this.engine.typeChar(char);
      return;
    }
    const result = this.keys.push(char);
    if (result.kind === "matched") this.apply(result.action);
  }

  private handleNamed(name: NamedKey): void {
    const engine = this.engine;
    switch (name) {
      case "ctrlC":
        engine.cancel("user");
        return;
      case "enter":
        this.keys.reset();
        engine.confirm();
        return;
      case "escape":
        if (this.inputMode === "search") {
          this.setMode("navigate");
        } else {
          engine.cancel("user");
        }
        return;
      case "tab":
        if (this.inputMode === "search") {
          this.setMode("navigate");
        } else if (this.options.enableFuzzySearch) {
          this.setMode("search");
        }
        return;
      case "backspace":
        this.keys.reset();
        if (this.inputMode === "search") engine.backspace();
        return;
      case "up":
        this.keys.reset();
        engine.moveUp();
        return;
      case "down":
        this.keys.reset();
        engine.moveDown();
        return;
      case "pageUp":
        this.keys.reset();
        engine.pageUp();
        return;
      case "pageDown":
        this.keys.reset();
        engine.pageDown();
        return;
      case "home":
        this.keys.reset();
        engine.top();
        return;
      case "end":
        this.keys.reset();
        engine.bottom();
        return;
    }
  }

  private apply(action: PickerAction): void {
    if (action === "search" && this.options.enableFuzzySearch) {
      this.setMode("search");
      return;
    }
    if (this.engine.dispatch(action)) return;
    if (this.onAction === undefined) {
      this.logger.trace("unhandled action", { action });
      return;
    }
    try {
      this.onAction(action, this);
    } catch (error: unknown) {
      this.logger.error("onAction callback threw", { action, error });
    }
  }

  private setMode(mode: InputMode): void {
    if (this.inputMode === mode) return;
    this.keys.reset();
    this.inputMode = mode;
    this.logger.trace("mode changed", { mode });
    this.onModeChange?.(mode);
  }

  private armIdleTimer(): void {
    const timeoutMs = this.options.pickerTimeoutMs;
    if (timeoutMs === null || this.released) return;
    this.clearIdleTimer();
    this.idleTimer = this.timers.setTimeout(() => {
      this.idleTimer = null;
      this.logger.info("inactivity timeout", { timeoutMs });
      this.engine.cancel("timeout");
    }, timeoutMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer === null) return;
    this.timers.clearTimeout(this.idleTimer);
    this.idleTimer = null;
  }

  private release(): void {
    this.released = true;
    this.clearIdleTimer();
    this.keys.dispose();
  }
}
