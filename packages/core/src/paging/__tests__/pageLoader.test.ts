import { assert, describe, flushMicrotasks, test } from "@listnav/testkit";
import type { LogEvent } from "../../diagnostics/log.js";
import { isListNavError } from "../../errors.js";
import { PageLoader } from "../pageLoader.js";
import { createPagedResult } from "../pageRequest.js";
import type { PagedResult } from "../types.js";
import { callAt, createScriptedSource } from "./scriptedSource.js";

describe("PageLoader", () => {
  test("walks pages by continuation token until exhausted", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });

    const first = loader.loadNext();
    assert.equal(loader.inFlight, true);
    assert.deepEqual(callAt(calls, 0).request, { pageSize: 2, continuationToken: null });
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b"], "t1"));
    const firstOutcome = await first;
    assert.equal(firstOutcome.kind, "loaded");
    assert.equal(loader.continuationToken, "t1");
    assert.equal(loader.hasMore, true);
    assert.equal(loader.inFlight, false);

    const second = loader.loadNext();
    assert.equal(callAt(calls, 1).request.continuationToken, "t1");
    callAt(calls, 1).reply.resolve(createPagedResult(["c"]));
    const secondOutcome = await second;
    assert.equal(secondOutcome.kind, "loaded");
    if (secondOutcome.kind === "loaded") assert.deepEqual(secondOutcome.page.items, ["c"]);
    assert.equal(loader.hasMore, false);
    assert.equal(loader.pagesLoaded, 2);

    assert.deepEqual(await loader.loadNext(), { kind: "exhausted" });
    assert.equal(calls.length, 2);
  });

  test("a second request while one is in flight is busy", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 10 });

    const first = loader.loadNext();
    assert.deepEqual(await loader.loadNext(), { kind: "busy" });
    assert.equal(calls.length, 1);
    callAt(calls, 0).reply.resolve(createPagedResult(["a"]));
    assert.equal((await first).kind, "loaded");
  });

  test("a failed fetch keeps the token and the next call retries it", async () => {
    const { source, calls } = createScriptedSource<string>();
    const events: LogEvent[] = [];
    const loader = new PageLoader({ source, pageSize: 2, log: (e) => events.push(e) });

    const first = loader.loadNext();
    callAt(calls, 0).reply.resolve(createPagedResult(["a", "b"], "t1"));
    await first;

    const failing = loader.loadNext();
    const boom = new Error("boom");
    callAt(calls, 1).reply.reject(boom);
    const failed = await failing;
    assert.equal(failed.kind, "failed");
    if (failed.kind === "failed") assert.equal(failed.error, boom);
    assert.equal(loader.lastError, boom);
    assert.equal(loader.continuationToken, "t1");
    assert.equal(loader.hasMore, true);
    assert.deepEqual(
      events.filter((e) => e.level === "warn").map((e) => [e.source, e.message]),
      [["paging", "page fetch failed"]],
    );

    const retry = loader.loadNext();
    assert.equal(callAt(calls, 2).request.continuationToken, "t1");
    callAt(calls, 2).reply.resolve(createPagedResult(["c"]));
    assert.equal((await retry).kind, "loaded");
    assert.equal(loader.lastError, undefined);
  });

  test("cancel aborts the request and discards its result", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });

    const pending = loader.loadNext();
    loader.cancel();
    assert.equal(callAt(calls, 0).signal.aborted, true);
    assert.equal(loader.inFlight, false);

    callAt(calls, 0).reply.resolve(createPagedResult(["late"]));
    const outcome = await pending;
    assert.equal(outcome.kind, "cancelled");
    assert.equal(loader.pagesLoaded, 0);
    assert.equal(loader.hasMore, false);
    assert.deepEqual(await loader.loadNext(), { kind: "exhausted" });
  });

  test("a rejection caused by the abort is reported as cancelled", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });

    const pending = loader.loadNext();
    loader.cancel();
    callAt(calls, 0).reply.reject(new Error("aborted"));
    assert.equal((await pending).kind, "cancelled");
    assert.equal(loader.lastError, undefined);
  });

  test("a page repeating the requested token is invalid", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });

    const first = loader.loadNext();
    callAt(calls, 0).reply.resolve(createPagedResult(["a"], "t1"));
    await first;

    const second = loader.loadNext();
    callAt(calls, 1).reply.resolve(createPagedResult(["b"], "t1"));
    const outcome = await second;
    assert.equal(outcome.kind, "failed");
    if (outcome.kind !== "failed") return;
    assert.equal(isListNavError(outcome.error, "LISTNAV_INVALID_PAGE"), true);
    assert.equal(loader.continuationToken, "t1");
  });

  test("a page without an items array is invalid", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });
    const malformed: PagedResult<string> = JSON.parse(
      '{"items":"nope","continuationToken":null,"hasMore":false}',
    );

    const pending = loader.loadNext();
    callAt(calls, 0).reply.resolve(malformed);
    const outcome = await pending;
    assert.equal(outcome.kind, "failed");
    if (outcome.kind !== "failed") return;
    assert.equal(isListNavError(outcome.error, "LISTNAV_INVALID_PAGE"), true);
    assert.equal(loader.hasMore, true);
  });

  test("page size is validated at construction", () => {
    const { source } = createScriptedSource<string>();
    for (const pageSize of [0, 5001, 1.5]) {
      assert.throws(
        () => new PageLoader({ source, pageSize }),
        (error: unknown) => isListNavError(error, "LISTNAV_INVALID_PAGE_REQUEST"),
      );
    }
  });

  test("cancel is idempotent and safe without a fetch", async () => {
    const { source, calls } = createScriptedSource<string>();
    const loader = new PageLoader({ source, pageSize: 2 });
    loader.cancel();
    loader.cancel();
    await flushMicrotasks();
    assert.deepEqual(await loader.loadNext(), { kind: "exhausted" });
    assert.equal(calls.length, 0);
  });
});
