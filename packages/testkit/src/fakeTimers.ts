type TimerId = number;

/**
 * Timer host with a manual clock (structurally a core TimerHost).
 * Callbacks run synchronously inside tick(), in due-time order, ties by
 * creation order.
 */
export type FakeTimerHost = Readonly<{
  now: () => number;
  setTimeout: (callback: () => void, delayMs: number) => TimerId;
  clearTimeout: (id: TimerId) => void;
  /** Advance the clock by `ms`, firing every timer that comes due. */
  tick: (ms: number) => void;
  /** Timers scheduled and not yet fired or cleared. */
  pendingCount: () => number;
}>;

type Entry = { id: TimerId; at: number; callback: () => void };

export function createFakeTimerHost(startMs = 0): FakeTimerHost {
  const queue: Entry[] = [];
  let now = startMs;
  let nextId = 1;

  return Object.freeze({
    now: () => now,
    setTimeout: (callback: () => void, delayMs: number): TimerId => {
      const id = nextId++;
      queue.push({ id, at: now + Math.max(0, delayMs), callback });
      return id;
    },
    clearTimeout: (id: TimerId): void => {
      const idx = queue.findIndex((entry) => entry.id === id);
      if (idx >= 0) queue.splice(idx, 1);
    },
    tick: (ms: number): void => {
      const target = now + Math.max(0, ms);
      while (true) {
        queue.sort((a, b) => (a.at === b.at ? a.id - b.id : a.at - b.at));
        const entry = queue[0];
        if (!entry || entry.at > target) break;
        queue.shift();
        now = entry.at;
        entry.callback();
      }
      now = target;
    },
    pendingCount: () => queue.length,
  });
}
