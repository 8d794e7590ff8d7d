export class RetrievalModeError extends Error {
  readonly mode: string;

  constructor(mode: string, available: readonly string[]) {
    super(
      `Invalid retrieval mode ${mode}. Available: ${available
        .map((name) => `'${name}'`)
        .join(", ")}`
    );
    this.name = "RetrievalModeError";
    this.mode = mode;
  }
}
