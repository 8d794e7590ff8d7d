/**
 * Stage 3 Symbolic Value types.
 * A SymbolicValue wraps a payload and resolves every operation through exactly
 * one of two strategies: native (deterministic, local) or semantic (backend).
 */

import type {
  EngineRegistry,
  Logger,
  Tokenizer,
  Usage,
} from "../../stage-0-engine/src/index.js";
import type {
  DistanceOptions,
  SimilarityOptions,
  Vector,
} from "../../stage-1-similarity/src/index.js";

export interface PayloadMapping {
  [key: string]: Payload;
}

export type Payload =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Uint8Array
  | Payload[]
  | PayloadMapping;

export type ResolutionStrategy = "native" | "semantic";

/** Returned by the native table when an operation has no local meaning. */
export const NOT_APPLICABLE: unique symbol = Symbol("not-applicable");
export type NotApplicable = typeof NOT_APPLICABLE;

export const BINARY_OPERATIONS = [
  "equals",
  "notEquals",
  "greaterThan",
  "lessThan",
  "greaterOrEqual",
  "lessOrEqual",
  "contains",
  "add",
  "subtract",
  "multiply",
  "divide",
  "modulo",
  "power",
  "and",
  "or",
  "xor",
] as const;

export type BinaryOperation = (typeof BINARY_OPERATIONS)[number];

export const UNARY_OPERATIONS = ["negate", "invert"] as const;

export type UnaryOperation = (typeof UNARY_OPERATIONS)[number];

export type ItemOperation = "getItem" | "setItem" | "deleteItem";

export type ItemKey = string | number;

export interface ValueFlags {
  /** Resolve operations through the backend even when a native result exists. */
  semantic: boolean;
  /** Forbid every backend call; semantic resolution then fails. */
  disableBackendCalls: boolean;
  /** Let absent payloads through instead of failing fast. */
  disableNoneShortcut: boolean;
}

/**
 * Side channel of a value. `embedding` is computed at most once; mutating
 * `value` after it has been cached leaves a stale embedding in place and is
 * a caller contract violation.
 */
export interface ValueMetadata {
  embedding?: Vector | Vector[];
  /** Raw backend response of the call that produced this value. */
  raw?: unknown;
  usage?: Usage;
  engineId?: string;
  requestId?: string;
  /** Last native-path failure, captured instead of thrown. */
  lastError?: unknown;
}

/** Per-call options for operations that always go to the backend. */
export interface SemanticOptions {
  seed?: number;
  temperature?: number;
  maxTokens?: number;
  staticContext?: string;
  responseFormat?: "text" | "json_object";
  constraints?: string[];
  /** Extra context block sent next to the operands. */
  payload?: string;
  /** Render the request only; the result holds the rendered prompt. */
  preview?: boolean;
  abortSignal?: AbortSignal;
}

export type Operand = SymbolicValue | Payload;

export interface SymbolicValue {
  value: Payload;
  readonly flags: Readonly<ValueFlags>;
  readonly metadata: ValueMetadata;
  readonly strategy: ResolutionStrategy;
  readonly runtime: ValueRuntime;

  equals(other: Operand): Promise<SymbolicValue>;
  notEquals(other: Operand): Promise<SymbolicValue>;
  greaterThan(other: Operand): Promise<SymbolicValue>;
  lessThan(other: Operand): Promise<SymbolicValue>;
  greaterOrEqual(other: Operand): Promise<SymbolicValue>;
  lessOrEqual(other: Operand): Promise<SymbolicValue>;
  contains(other: Operand): Promise<SymbolicValue>;
  add(other: Operand): Promise<SymbolicValue>;
  subtract(other: Operand): Promise<SymbolicValue>;
  multiply(other: Operand): Promise<SymbolicValue>;
  divide(other: Operand): Promise<SymbolicValue>;
  modulo(other: Operand): Promise<SymbolicValue>;
  power(other: Operand): Promise<SymbolicValue>;
  and(other: Operand): Promise<SymbolicValue>;
  or(other: Operand): Promise<SymbolicValue>;
  xor(other: Operand): Promise<SymbolicValue>;
  negate(): Promise<SymbolicValue>;
  invert(): Promise<SymbolicValue>;

  toBoolean(): boolean;
  toString(): string;

  getItem(key: ItemKey): Promise<SymbolicValue>;
  /** Mutates `value` in place. */
  setItem(key: ItemKey, item: Operand): Promise<void>;
  /** Mutates `value` in place. */
  deleteItem(key: ItemKey): Promise<void>;

  /** Copy with semantic resolution off. */
  syn(): SymbolicValue;
  /** Copy with semantic resolution on. */
  sem(): SymbolicValue;

  interpret(instruction?: string, options?: SemanticOptions): Promise<SymbolicValue>;
  query(context: string, options?: SemanticOptions): Promise<SymbolicValue>;
  analyze(error: unknown, query?: string, options?: SemanticOptions): Promise<SymbolicValue>;
  correct(context: string, error: unknown, options?: SemanticOptions): Promise<SymbolicValue>;

  embedding(): Promise<Vector | Vector[]>;
  similarity(
    other: Operand | Vector[],
    metric?: string,
    options?: SimilarityOptions
  ): Promise<number | number[]>;
  distance(
    other: Operand | Vector[],
    kernel?: string,
    options?: DistanceOptions
  ): Promise<number | number[]>;
}

export interface EngineLimits {
  tokenizer: Tokenizer;
  maxContextTokens: number;
}

export interface ValueRuntimeConfig {
  registry: EngineRegistry;
  logger?: Logger;
  /** Capability ids to resolve adapters by. */
  engines?: {
    neurosymbolic?: string;
    embedding?: string;
  };
  /** Flags applied to every value unless overridden at creation. */
  defaults?: Partial<ValueFlags>;
}

export interface ValueRuntime {
  readonly registry: EngineRegistry;
  readonly logger: Logger;
  readonly neurosymbolicEngine: string;
  readonly embeddingEngine: string;
  value(payload: Operand, flags?: Partial<ValueFlags>): SymbolicValue;
  isValue(candidate: unknown): candidate is SymbolicValue;
  engineLimits(): EngineLimits;
}
