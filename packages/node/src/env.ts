/**
 * packages/node/src/env.ts — Picker settings from environment variables.
 *
 * Variables (unset or invalid values fall back to the defaults):
 *   LISTNAV_MAX_VISIBLE=<rows>
 *   LISTNAV_PAGE_SIZE=<1..5000>
 *   LISTNAV_FUZZY=0|1
 *   LISTNAV_PICKER_TIMEOUT_MS=<ms>
 *   LISTNAV_SEQUENCE_TIMEOUT_MS=<ms>
 */

import { type KeyBindingsOverrides, MAX_PAGE_SIZE, type PickerOptions } from "@listnav/core";

export type Env = Readonly<Record<string, string | undefined>>;

export type PickerEnv = Readonly<{
  options: Partial<PickerOptions>;
  keyBindings: KeyBindingsOverrides;
}>;

export function readEnv(env: Env, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

/** "1/true/yes/on" or "0/false/no/off"; null for anything else. */
export function envFlag(env: Env, name: string): boolean | null {
  const value = readEnv(env, name);
  if (value === null) return null;
  const norm = value.toLowerCase();
  if (norm === "1" || norm === "true" || norm === "yes" || norm === "on") return true;
  if (norm === "0" || norm === "false" || norm === "no" || norm === "off") return false;
  return null;
}

export function envPositiveInt(env: Env, name: string, max?: number): number | null {
  const value = readEnv(env, name);
  if (value === null) return null;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

export function readPickerEnv(env: Env = process.env): PickerEnv {
  const options: {
    -readonly [K in keyof PickerOptions]?: PickerOptions[K];
  } = {};

  const maxVisible = envPositiveInt(env, "LISTNAV_MAX_VISIBLE");
  if (maxVisible !== null) options.maxVisibleItems = maxVisible;

  const pageSize = envPositiveInt(env, "LISTNAV_PAGE_SIZE", MAX_PAGE_SIZE);
  if (pageSize !== null) options.pageSize = pageSize;

  const fuzzy = envFlag(env, "LISTNAV_FUZZY");
  if (fuzzy !== null) options.enableFuzzySearch = fuzzy;

  const pickerTimeout = envPositiveInt(env, "LISTNAV_PICKER_TIMEOUT_MS");
  if (pickerTimeout !== null) options.pickerTimeoutMs = pickerTimeout;

  const sequenceTimeout = envPositiveInt(env, "LISTNAV_SEQUENCE_TIMEOUT_MS");

  return Object.freeze({
    options: Object.freeze(options),
    keyBindings: Object.freeze(
      sequenceTimeout === null ? {} : { sequenceTimeoutMs: sequenceTimeout },
    ),
  });
}
