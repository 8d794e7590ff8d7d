export { similarity, isSimilarityMetric } from "./similarity.js";
export { distance, isDistanceKernel } from "./kernels.js";
export { frechetDistance, maximumMeanDiscrepancy } from "./measures.js";
export { MetricNotImplementedError, VectorShapeError } from "./errors.js";
export { DISTANCE_KERNELS, SIMILARITY_METRICS } from "./types.js";
export type {
  DistanceKernel,
  DistanceOptions,
  Matrix,
  MetricOptions,
  SimilarityMetric,
  SimilarityOptions,
  Vector,
} from "./types.js";
