export class BackendCallError extends Error {
  readonly engineId: string;
  readonly status?: number;
  readonly code?: string;

  constructor(options: {
    engineId: string;
    message: string;
    status?: number;
    code?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "BackendCallError";
    this.engineId = options.engineId;
    this.status = options.status;
    this.code = options.code;
  }
}

export class EngineNotRegisteredError extends Error {
  readonly engineId: string;

  constructor(engineId: string, available: string[]) {
    super(
      `Engine not registered: ${engineId}. Registered engines: ${
        available.length > 0 ? available.join(", ") : "(none)"
      }`
    );
    this.name = "EngineNotRegisteredError";
    this.engineId = engineId;
  }
}

/** Shape-safe view of an unknown thrown value, for logs. */
export function describeError(error: unknown): {
  name: string;
  message: string;
  status?: number;
  code?: string;
} {
  if (error instanceof BackendCallError) {
    return {
      name: error.name,
      message: error.message,
      status: error.status,
      code: error.code,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}
