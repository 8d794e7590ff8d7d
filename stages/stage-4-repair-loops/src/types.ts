/**
 * Stage 4 Repair Loops types.
 * Every loop is bounded, records one RetryAttempt per iteration through an
 * optional hook and keeps nothing once it returns or throws.
 */

import type { Logger } from "../../stage-0-engine/src/index.js";
import type { SchemaModel } from "../../stage-2-output-control/src/index.js";
import type {
  SemanticOptions,
  SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";

export type LoopName = "self-correction" | "schema-validation" | "constraint-enforcement";

export interface RetryAttempt {
  /** 1-based. */
  attempt: number;
  /** Prompt or payload sent to repair this attempt, if any. */
  prompt?: string;
  analysis?: string;
  error?: unknown;
  result?: SymbolicValue;
}

export type AttemptHook = (attempt: RetryAttempt) => void;

// --- self-correction ---

export type CorrectionState = "running" | "correcting" | "success" | "exhausted";

export interface OperationContext {
  attempt: number;
  /** Record the last textual output produced before a failure. */
  reportOutput(output: string): void;
}

export interface CorrectableOperation {
  run(input: SymbolicValue, context: OperationContext): Promise<SymbolicValue>;
  /** Original instruction, quoted back to the backend when correcting. */
  instruction?: string;
  constraints?: string[];
}

export interface CorrectionOptions {
  /** Extra attempts after the first failure (default 1). */
  retries?: number;
  logger?: Logger;
  onAttempt?: (attempt: RetryAttempt, state: CorrectionState) => void;
}

// --- schema validation ---

export interface ValidationLoopOptions {
  retryCount?: number;
  seed?: number;
  /** Replaces the initial candidate text. */
  prompt?: string;
  logger?: Logger;
  onAttempt?: AttemptHook;
  /** Forwarded to each regeneration call. */
  generation?: Omit<SemanticOptions, "seed" | "staticContext" | "responseFormat">;
}

export interface ValidationOutcome<T> {
  value: SymbolicValue;
  data: T;
  attempts: number;
}

// --- constraints ---

export interface LengthConstraint {
  kind: "length";
  /** Field of a structured candidate; a ".items" suffix checks each element. */
  fieldName?: string;
  minLength: number;
  maxLength: number;
}

export interface CustomConstraint {
  kind: "custom";
  rule: string;
}

export type Constraint = LengthConstraint | CustomConstraint;

export interface ConstraintLoopOptions<T = unknown> {
  retryCount?: number;
  seed?: number;
  /** Replaces the initial candidate. */
  prompt?: string;
  /** Original task restated in every remedy; defaults to the value's text. */
  task?: string;
  /** Strict parser for structured candidates. */
  model?: SchemaModel<T>;
  logger?: Logger;
  onAttempt?: AttemptHook;
  generation?: Omit<SemanticOptions, "seed">;
}

export interface ConstraintOutcome {
  value: SymbolicValue;
  attempts: number;
}
