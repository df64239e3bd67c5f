import { assert, createFakeTimerHost, describe, test } from "@listnav/testkit";
import { type PickerOptions, resolvePickerOptions } from "../../config/pickerOptions.js";
import { resolveKeyBindings } from "../../keybindings/config.js";
import type { KeyBindingsConfig, PickerAction } from "../../keybindings/types.js";
import { type InputMode, type KeyInput, type NamedKey, PickerSession } from "../session.js";

const self = (s: string): readonly string[] => [s];

function names(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `item-${String(i).padStart(2, "0")}`);
}

function setup(
  opts: {
    options?: Partial<PickerOptions>;
    keyBindings?: KeyBindingsConfig;
    items?: readonly string[];
  } = {},
) {
  const timers = createFakeTimerHost();
  const hostActions: PickerAction[] = [];
  const modes: InputMode[] = [];
  const session = new PickerSession<string>({
    items: opts.items ?? names(30),
    keyOf: self,
    options: resolvePickerOptions({ maxVisibleItems: 5, ...opts.options }),
    timers,
    ...(opts.keyBindings === undefined ? {} : { keyBindings: opts.keyBindings }),
    onAction: (action) => hostActions.push(action),
    onModeChange: (mode) => modes.push(mode),
  });
  return { session, timers, hostActions, modes };
}

function type(session: PickerSession<string>, text: string): void {
  for (const char of text) session.handleKey({ kind: "char", char });
}

function press(session: PickerSession<string>, name: NamedKey): void {
  const key: KeyInput = { kind: "named", name };
  session.handleKey(key);
}

describe("PickerSession navigate mode", () => {
  test("bound characters drive the engine", async () => {
    const { session } = setup();
    await session.start();
    type(session, "jjj");
    assert.equal(session.engine.snapshot().index, 3);
    type(session, "k");
    assert.equal(session.engine.snapshot().index, 2);
    type(session, "\u0006");
    assert.equal(session.engine.snapshot().index, 7);
  });

  test("G jumps to the bottom and g g back to the top", async () => {
    const { session } = setup();
    await session.start();
    type(session, "G");
    assert.equal(session.engine.snapshot().index, 29);
    type(session, "gg");
    assert.equal(session.engine.snapshot().index, 0);
  });

  test("named keys navigate", async () => {
    const { session } = setup();
    await session.start();
    press(session, "end");
    assert.equal(session.engine.snapshot().index, 29);
    press(session, "up");
    press(session, "pageUp");
    assert.equal(session.engine.snapshot().index, 23);
    press(session, "home");
    press(session, "down");
    press(session, "pageDown");
    assert.equal(session.engine.snapshot().index, 6);
  });

  test("actions the engine does not own go to the host", async () => {
    const { session, hostActions } = setup();
    await session.start();
    type(session, "i?h");
    assert.deepEqual(hostActions, ["info", "help", "back"]);
  });

  test("enter confirms the current item", async () => {
    const { session } = setup();
    await session.start();
    type(session, "jj");
    press(session, "enter");
    assert.deepEqual(await session.outcome, { kind: "confirmed", item: "item-02" });
  });

  test("q, escape and ctrl-c cancel", async () => {
    for (const cancel of [
      (s: PickerSession<string>) => type(s, "q"),
      (s: PickerSession<string>) => press(s, "escape"),
      (s: PickerSession<string>) => press(s, "ctrlC"),
    ]) {
      const { session } = setup();
      await session.start();
      cancel(session);
      assert.deepEqual(await session.outcome, { kind: "cancelled", reason: "user" });
    }
  });

  test("a deferred single-key binding fires on timeout", async () => {
    const { session, timers } = setup({
      keyBindings: resolveKeyBindings({ bindings: { bottom: "g" }, overlapPolicy: "defer" }),
    });
    await session.start();
    type(session, "g");
    assert.equal(session.engine.snapshot().index, 0);
    timers.tick(1000);
    assert.equal(session.engine.snapshot().index, 29);
  });
});

describe("PickerSession search mode", () => {
  test("slash enters search mode where characters edit the query", async () => {
    const { session, modes } = setup();
    await session.start();
    type(session, "/");
    assert.equal(session.mode, "search");
    type(session, "item-2");
    const snap = session.engine.snapshot();
    assert.equal(snap.query, "item-2");
    assert.equal(snap.filtered.length, 12);
    assert.equal(snap.filtered[0]?.item, "item-20");

    type(session, "j");
    assert.equal(session.engine.snapshot().query, "item-2j");
    press(session, "backspace");
    assert.equal(session.engine.snapshot().query, "item-2");

    press(session, "escape");
    assert.equal(session.mode, "navigate");
    assert.equal(session.engine.snapshot().query, "item-2");
    assert.deepEqual(modes, ["search", "navigate"]);
  });

  test("switching modes drops a half-typed sequence", async () => {
    const { session } = setup();
    await session.start();
    type(session, "G");
    type(session, "g");
    press(session, "tab");
    press(session, "escape");
    type(session, "g");
    assert.equal(session.engine.snapshot().index, 29);
    type(session, "g");
    assert.equal(session.engine.snapshot().index, 0);
  });

  test("search is left to the host when fuzzy search is disabled", async () => {
    const { session, hostActions } = setup({ options: { enableFuzzySearch: false } });
    await session.start();
    type(session, "/");
    press(session, "tab");
    assert.equal(session.mode, "navigate");
    assert.deepEqual(hostActions, ["search"]);
  });
});

describe("PickerSession inactivity timeout", () => {
  test("cancels with reason timeout when no key arrives in time", async () => {
    const { session, timers } = setup({ options: { pickerTimeoutMs: 5000 } });
    await session.start();
    timers.tick(4999);
    type(session, "j");
    timers.tick(4999);
    assert.equal(session.engine.isActive, true);
    timers.tick(1);
    assert.deepEqual(await session.outcome, { kind: "cancelled", reason: "timeout" });
  });

  test("keys after the session ended are ignored", async () => {
    const { session, timers } = setup({ options: { pickerTimeoutMs: 100 } });
    await session.start();
    type(session, "q");
    await session.outcome;
    type(session, "j");
    press(session, "enter");
    assert.equal(timers.pendingCount(), 0);
    assert.equal(session.engine.snapshot().status, "cancelled");
  });
});
