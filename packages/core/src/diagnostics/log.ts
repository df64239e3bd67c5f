/**
 * packages/core/src/diagnostics/log.ts — Structured log events.
 *
 * Components never write to the terminal themselves: the picker owns the
 * screen while a session is active. Instead every component takes an optional
 * `log` callback and emits structured events; hosts decide where they go
 * (the Node adapter writes NDJSON to a file).
 */

/**
 * Severity levels (low to high):
 *   - trace: per-keystroke detail (disabled by default in hosts)
 *   - info: session and paging lifecycle
 *   - warn: recoverable problems (failed page fetch)
 *   - error: a callback supplied by the host threw
 */
export type LogLevel = "trace" | "info" | "warn" | "error";

export type LogEvent = Readonly<{
  level: LogLevel;
  /** Emitting component, e.g. "picker", "paging", "keys". */
  source: string;
  message: string;
  fields?: Readonly<Record<string, unknown>>;
}>;

export type LogSink = (event: LogEvent) => void;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

const noopSink: LogSink = () => {};

/** Normalize an optional callback into a sink that is always callable. */
export function makeLogSink(log: LogSink | undefined): LogSink {
  if (typeof log === "function") return log;
  return noopSink;
}

/** Drop events below `minLevel`. */
export function withMinLevel(sink: LogSink, minLevel: LogLevel): LogSink {
  const threshold = LEVEL_RANK[minLevel];
  return (event) => {
    if (LEVEL_RANK[event.level] < threshold) return;
    sink(event);
  };
}

/** Send every event to each sink in order. */
export function fanOut(...sinks: readonly LogSink[]): LogSink {
  return (event) => {
    for (const sink of sinks) sink(event);
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "trace" || value === "info" || value === "warn" || value === "error";
}

/**
 * Bind a source name so call sites only pass level/message/fields.
 */
export type Logger = Readonly<{
  trace: (message: string, fields?: Readonly<Record<string, unknown>>) => void;
  info: (message: string, fields?: Readonly<Record<string, unknown>>) => void;
  warn: (message: string, fields?: Readonly<Record<string, unknown>>) => void;
  error: (message: string, fields?: Readonly<Record<string, unknown>>) => void;
}>;

export function createLogger(source: string, log: LogSink | undefined): Logger {
  const sink = makeLogSink(log);
  const emit = (
    level: LogLevel,
    message: string,
    fields: Readonly<Record<string, unknown>> | undefined,
  ): void => {
    // A throwing sink must not break the input loop.
    try {
      sink(
        fields === undefined
          ? Object.freeze({ level, source, message })
          : Object.freeze({ level, source, message, fields }),
      );
    } catch {
      // no-op
    }
  };

  return Object.freeze({
    trace: (message, fields) => emit("trace", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  });
}
