/**
 * packages/core/src/timers.ts — Injectable clock and single-shot timers.
 *
 * Key-sequence deadlines and the picker inactivity timeout run on the event
 * loop. Components take a TimerHost instead of touching globals so tests can
 * drive time explicitly.
 */

/** Opaque timer id issued by a TimerHost. */
export type TimerId = number;

export type TimerHost = Readonly<{
  /** Wall clock in milliseconds. */
  now: () => number;
  setTimeout: (callback: () => void, delayMs: number) => TimerId;
  clearTimeout: (id: TimerId) => void;
}>;

/**
 * Create a TimerHost backed by the runtime's global timers.
 * Where the runtime supports it, timers are unref'd so a pending sequence
 * never keeps the process alive.
 */
export function createSystemTimerHost(): TimerHost {
  const live = new Map<TimerId, ReturnType<typeof setTimeout>>();
  let nextId = 1;

  return Object.freeze({
    now: () => Date.now(),
    setTimeout: (callback: () => void, delayMs: number): TimerId => {
      const id = nextId++;
      const handle = setTimeout(
        () => {
          live.delete(id);
          callback();
        },
        Math.max(0, delayMs),
      );
      // Plain numbers outside Node.
      if (typeof handle === "object" && typeof handle.unref === "function") handle.unref();
      live.set(id, handle);
      return id;
    },
    clearTimeout: (id: TimerId): void => {
      const handle = live.get(id);
      if (handle === undefined) return;
      live.delete(id);
      clearTimeout(handle);
    },
  });
}
