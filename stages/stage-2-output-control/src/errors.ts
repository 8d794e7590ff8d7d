import type { SchemaViolation } from "./types.js";
import { renderViolations } from "./validate.js";

export class SchemaValidationError extends Error {
  readonly violations: SchemaViolation[];

  constructor(violations: SchemaViolation[], options?: { cause?: unknown }) {
    super(
      `Schema validation failed with ${violations.length} violation(s):\n${renderViolations(violations)}`,
      { cause: options?.cause }
    );
    this.name = "SchemaValidationError";
    this.violations = violations;
  }
}
