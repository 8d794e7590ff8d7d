export class UnsupportedOperandError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(message);
    this.name = "UnsupportedOperandError";
    this.operation = operation;
  }
}

export class UnsupportedOperationError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export class BackendDisabledError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`Backend calls are disabled; cannot resolve '${operation}' semantically.`);
    this.name = "BackendDisabledError";
    this.operation = operation;
  }
}
