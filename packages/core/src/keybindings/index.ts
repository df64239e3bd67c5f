export type {
  ActionBindings,
  KeyBindingsConfig,
  KeyBindingsError,
  OverlapPolicy,
  PickerAction,
  SequenceResult,
  SequenceState,
  ValidateKeyBindingsResult,
} from "./types.js";

export { PICKER_ACTIONS } from "./types.js";

export {
  DEFAULT_ACTION_BINDINGS,
  DEFAULT_KEY_BINDINGS,
  DEFAULT_SEQUENCE_TIMEOUT_MS,
  assertValidKeyBindings,
  describeBindings,
  displaySequence,
  resolveKeyBindings,
  validateKeyBindings,
  type DescribedBinding,
  type KeyBindingsOverrides,
} from "./config.js";

export { KeySequenceBuffer, type KeySequenceBufferOptions } from "./sequenceBuffer.js";
