/**
 * @listnav/node
 *
 * Node.js host adapter: terminal key decoding, environment-driven settings,
 * NDJSON diagnostics and the interactive picker loop.
 */

export { decodeTerminalInput, flushEscape, type DecodeResult } from "./input/decodeKeys.js";
export {
  envFlag,
  envPositiveInt,
  readEnv,
  readPickerEnv,
  type Env,
  type PickerEnv,
} from "./env.js";
export {
  DEFAULT_LOG_FILE_NAME,
  createEnvLogSink,
  createNdjsonLogSink,
  formatLogRecord,
} from "./diagnostics/ndjsonLog.js";
export {
  ESCAPE_TIMEOUT_MS,
  runPicker,
  type PickerInput,
  type RunPickerOptions,
} from "./runPicker.js";
