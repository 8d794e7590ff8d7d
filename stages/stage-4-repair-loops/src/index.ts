export { runWithCorrection } from "./self-correction.js";
export {
  buildRemedyPrompt,
  JSON_FIX_CONTEXT,
  normalizeCandidate,
  validateWithSchema,
} from "./validation-loop.js";
export { enforceConstraints } from "./constraint-loop.js";
export {
  checkConstraints,
  checkLength,
  customConstraint,
  describeConstraint,
  isPassVerdict,
  lengthConstraint,
  renderContent,
  wrapTask,
} from "./constraints.js";
export {
  ConstraintExhaustedError,
  ConstraintFieldError,
  UnexpectedResponseShapeError,
  ValidationExhaustedError,
} from "./errors.js";
export type {
  AttemptHook,
  Constraint,
  ConstraintLoopOptions,
  ConstraintOutcome,
  CorrectableOperation,
  CorrectionOptions,
  CorrectionState,
  CustomConstraint,
  LengthConstraint,
  LoopName,
  OperationContext,
  RetryAttempt,
  ValidationLoopOptions,
  ValidationOutcome,
} from "./types.js";
