import type { SchemaViolation } from "../../stage-2-output-control/src/index.js";

export class ValidationExhaustedError extends Error {
  readonly violations: SchemaViolation[];
  readonly attempts: number;

  constructor(violations: SchemaViolation[], rendered: string, attempts: number) {
    super(`Failed to retrieve valid JSON after ${attempts} attempt(s): ${rendered}`);
    this.name = "ValidationExhaustedError";
    this.violations = violations;
    this.attempts = attempts;
  }
}

export class ConstraintExhaustedError extends Error {
  readonly violations: string[];
  readonly attempts: number;

  constructor(violations: string[], attempts: number) {
    super(
      `Failed to enforce constraints after ${attempts} attempt(s): ${violations.join(" | ")}`
    );
    this.name = "ConstraintExhaustedError";
    this.violations = violations;
    this.attempts = attempts;
  }
}

/** A non-validation failure while parsing; never retried. */
export class UnexpectedResponseShapeError extends Error {
  constructor(message: string, options: { cause: unknown }) {
    super(message, { cause: options.cause });
    this.name = "UnexpectedResponseShapeError";
  }
}

export class ConstraintFieldError extends Error {
  readonly fieldName: string;

  constructor(fieldName: string) {
    super(`Field ${fieldName} not found in model`);
    this.name = "ConstraintFieldError";
    this.fieldName = fieldName;
  }
}
