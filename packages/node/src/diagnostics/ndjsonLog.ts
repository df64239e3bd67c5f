/**
 * packages/node/src/diagnostics/ndjsonLog.ts — NDJSON file sink for log events.
 *
 * Enable with:
 *   LISTNAV_LOG=1
 *
 * Optional:
 *   LISTNAV_LOG_FILE=/tmp/listnav.ndjson
 *   LISTNAV_LOG_LEVEL=trace|info|warn|error   (default: info)
 *
 * Records go to a file, never to the terminal the picker is drawing on.
 */

import { appendFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  type LogEvent,
  type LogLevel,
  type LogSink,
  isLogLevel,
  withMinLevel,
} from "@listnav/core";
import { type Env, envFlag, readEnv } from "../env.js";

export const DEFAULT_LOG_FILE_NAME = "listnav.ndjson";

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (typeof value === "bigint") return value.toString();
  return value;
}

/** Serialize one event as a single NDJSON line (without the newline). */
export function formatLogRecord(
  event: LogEvent,
  ts: Date = new Date(),
  pid: number = process.pid,
): string {
  return JSON.stringify(
    {
      ts: ts.toISOString(),
      pid,
      level: event.level,
      source: event.source,
      message: event.message,
      ...(event.fields ?? {}),
    },
    jsonReplacer,
  );
}

/**
 * Append every event to `path` as one JSON object per line.
 */
export function createNdjsonLogSink(path: string): LogSink {
  return (event) => {
    try {
      appendFileSync(path, `${formatLogRecord(event)}\n`, "utf8");
    } catch {
      // no-op
    }
  };
}

/**
 * Sink configured from LISTNAV_LOG*, or undefined when logging is off.
 */
export function createEnvLogSink(env: Env = process.env): LogSink | undefined {
  if (envFlag(env, "LISTNAV_LOG") !== true) return undefined;
  const path = readEnv(env, "LISTNAV_LOG_FILE") ?? join(tmpdir(), DEFAULT_LOG_FILE_NAME);
  const level = readEnv(env, "LISTNAV_LOG_LEVEL");
  const minLevel: LogLevel = isLogLevel(level) ? level : "info";
  return withMinLevel(createNdjsonLogSink(path), minLevel);
}
