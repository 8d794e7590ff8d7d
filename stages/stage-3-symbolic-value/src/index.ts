export { createValueRuntime, typeName } from "./value.js";
export { applyNative, applyNativeUnary, ABSENCE_TOLERANT, isMapping } from "./native.js";
export {
  BINARY_TEMPLATES,
  DEFAULT_INTERPRET_INSTRUCTION,
  ITEM_TEMPLATES,
  parseBooleanReply,
  UNARY_TEMPLATES,
  type OperationTemplate,
  type ReplyKind,
} from "./prompts.js";
export { outputText, recoverReply, serializePayload, toPayload } from "./serialize.js";
export {
  BackendDisabledError,
  UnsupportedOperandError,
  UnsupportedOperationError,
} from "./errors.js";
export { BINARY_OPERATIONS, NOT_APPLICABLE, UNARY_OPERATIONS } from "./types.js";
export type {
  BinaryOperation,
  EngineLimits,
  ItemKey,
  ItemOperation,
  NotApplicable,
  Operand,
  Payload,
  PayloadMapping,
  ResolutionStrategy,
  SemanticOptions,
  SymbolicValue,
  UnaryOperation,
  ValueFlags,
  ValueMetadata,
  ValueRuntime,
  ValueRuntimeConfig,
} from "./types.js";
