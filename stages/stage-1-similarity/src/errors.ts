export class MetricNotImplementedError extends Error {
  readonly metric: string;
  readonly available: readonly string[];

  constructor(kind: string, metric: string, available: readonly string[]) {
    super(
      `${kind} ${metric} not implemented. Available: ${available
        .map((name) => `'${name}'`)
        .join(", ")}`
    );
    this.name = "MetricNotImplementedError";
    this.metric = metric;
    this.available = available;
  }
}

export class VectorShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VectorShapeError";
  }
}
