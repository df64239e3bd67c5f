export { assert, describe, test } from "./nodeTest.js";
export { createFakeTimerHost, type FakeTimerHost } from "./fakeTimers.js";
export { createDeferred, flushMicrotasks, type Deferred } from "./deferred.js";
