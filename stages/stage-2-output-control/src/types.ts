/**
 * Stage 2 Output Control types.
 * Backend output is untrusted: it is extracted, parsed and validated before use.
 */

/** JSON Schema (draft-07 style) describing a structured output. */
export type JsonSchema = Record<string, unknown>;

/** One schema violation, located by its path inside the instance. */
export interface SchemaViolation {
  /** Path segments joined by " -> ", or "(root)". */
  path: string;
  message: string;
  expectedType: string;
  /** Rendered offending value; "missing" for absent required fields. */
  received: string;
}

/**
 * Typed schema boundary used by the validation and constraint loops.
 * `validate` throws SchemaValidationError listing every violation.
 */
export interface SchemaModel<T = unknown> {
  readonly schema: JsonSchema;
  validate(text: string): T;
  is(value: unknown): value is T;
  serialize(instance: T): string;
  describeSchema(): string;
}
