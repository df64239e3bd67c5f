import { assert, describe, flushMicrotasks, test } from "@listnav/testkit";
import { type PickerOptions, resolvePickerOptions } from "../../config/pickerOptions.js";
import type { LogEvent } from "../../diagnostics/log.js";
import { createPagedResult } from "../../paging/pageRequest.js";
import { callAt, createScriptedSource } from "../../paging/__tests__/scriptedSource.js";
import { PickerEngine } from "../engine.js";
import type { PickerSnapshot } from "../types.js";

const self = (s: string): readonly string[] => [s];

function setup(overrides: Partial<PickerOptions> = {}) {
  const { source, calls } = createScriptedSource<string>();
  const renders: PickerSnapshot<string>[] = [];
  const events: LogEvent[] = [];
  const engine = new PickerEngine<string>({
    source,
    keyOf: self,
    options: resolvePickerOptions({
      pageSize: 3,
      maxVisibleItems: 2,
      prefetchThreshold: 1,
      ...overrides,
    }),
    render: (snapshot) => renders.push(snapshot),
    log: (event) => events.push(event),
  });
  return { engine, calls, renders, events };
}

function filteredItems(engine: PickerEngine<string>): string[] {
  return engine.snapshot().filtered.map((r) => r.item);
}

describe("PickerEngine paging", () => {
  test("loads the first page on start and the next near the end", async () => {
    const { engine, calls } = setup();

    const started = engine.start();
    assert.equal(engine.snapshot().loading, true);
    assert.deepEqual(callAt(calls, 0).request, { pageSize: 3, continuationToken: null });
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b", "c"], "t1"));
    await started;

    let snap = engine.snapshot();
    assert.equal(snap.totalLoaded, 3);
    assert.equal(snap.index, 0);
    assert.equal(snap.hasMore, true);
    assert.equal(snap.loading, false);
    assert.equal(calls.length, 1);

    engine.moveDown();
    assert.equal(calls.length, 2);
    assert.equal(callAt(calls, 1).request.continuationToken, "t1");
    assert.equal(engine.snapshot().loading, true);

    callAt(calls, 1).reply.resolve(createPagedResult(["d", "e"]));
    await engine.whenIdle();

    snap = engine.snapshot();
    assert.deepEqual(filteredItems(engine), ["a", "b", "c", "d", "e"]);
    assert.equal(snap.index, 1);
    assert.equal(snap.hasMore, false);
    assert.deepEqual(engine.visibleWindow(), { start: 0, end: 2 });
  });

  test("crossing the boundary again during a fetch requests nothing new", async () => {
    const { engine, calls } = setup();
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b", "c"], "t1"));
    await started;

    engine.moveDown();
    assert.equal(calls.length, 2);
    engine.moveDown();
    assert.equal(engine.snapshot().index, 2);
    assert.equal(engine.snapshot().loading, true);
    assert.equal(calls.length, 2);

    callAt(calls, 1).reply.resolve(createPagedResult(["d"]));
    await engine.whenIdle();
    assert.equal(calls.length, 2);
    assert.equal(engine.snapshot().totalLoaded, 4);
  });

  test("a fetch cancelled mid-flight leaves candidates and index unchanged", async () => {
    const { engine, calls } = setup();
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b", "c"], "t1"));
    await started;

    engine.moveDown();
    engine.cancel();
    assert.equal(callAt(calls, 1).signal.aborted, true);
    callAt(calls, 1).reply.resolve(createPagedResult(["d"]));
    await flushMicrotasks();

    const snap = engine.snapshot();
    assert.equal(snap.totalLoaded, 3);
    assert.equal(snap.index, 1);
    assert.deepEqual(await engine.outcome, { kind: "cancelled", reason: "user" });
  });

  test("a failed fetch is reported and retried with the same token", async () => {
    const { engine, calls, renders, events } = setup();
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b", "c"], "t1"));
    await started;

    engine.moveDown();
    const offline = new Error("offline");
    callAt(calls, 1).reply.reject(offline);
    await engine.whenIdle();

    const snap = engine.snapshot();
    assert.equal(snap.lastError, offline);
    assert.equal(snap.loading, false);
    assert.equal(snap.hasMore, true);
    assert.equal(renders[renders.length - 1]?.lastError, offline);
    assert.equal(
      events.some((e) => e.level === "warn" && e.message === "page fetch failed"),
      true,
    );

    // No automatic retry after a failure.
    engine.moveDown();
    assert.equal(calls.length, 2);

    const retried = engine.retryLoad();
    assert.equal(callAt(calls, 2).request.continuationToken, "t1");
    callAt(calls, 2).reply.resolve(createPagedResult(["d"]));
    await retried;
    assert.equal(engine.snapshot().lastError, undefined);
    assert.equal(engine.snapshot().totalLoaded, 4);
  });

  test("later pages merge into the ranking without moving the selection", async () => {
    const { engine, calls } = setup({ prefetchThreshold: 0 });
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult(["alpha-1", "beta", "alpha-2"], "t1"));
    await started;

    for (const c of "alpha") engine.typeChar(c);
    assert.deepEqual(filteredItems(engine), ["alpha-1", "alpha-2"]);
    assert.equal(calls.length, 2);

    callAt(calls, 1).reply.resolve(createPagedResult(["alpha", "gamma"]));
    await engine.whenIdle();

    assert.deepEqual(filteredItems(engine), ["alpha", "alpha-1", "alpha-2"]);
    assert.equal(engine.snapshot().index, 1);
    assert.equal(engine.current(), "alpha-1");
    assert.equal(engine.snapshot().totalLoaded, 5);
  });

  test("keeps loading while the window shows the whole loaded list", async () => {
    const { engine, calls } = setup({ pageSize: 2, maxVisibleItems: 5, prefetchThreshold: 0 });
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult(["aa", "bb"], "t1"));
    await flushMicrotasks();
    assert.equal(calls.length, 2);

    callAt(calls, 1).reply.resolve(createPagedResult(["cc"]));
    await started;
    assert.equal(engine.snapshot().totalLoaded, 3);
    assert.equal(engine.snapshot().hasMore, false);
  });

  test("an empty listing cancels the session as empty", async () => {
    const { engine, calls } = setup();
    const started = engine.start();
    callAt(calls, 0).reply.resolve(createPagedResult([]));
    await started;
    assert.deepEqual(await engine.outcome, { kind: "cancelled", reason: "empty" });
  });
});
