/**
 * Stage 1 Similarity types.
 * Vectors are plain number arrays; a "set" operand is an array of vectors
 * and is reduced pair by pair against the left vector.
 */

export type Vector = number[];
export type Matrix = number[][];

export const SIMILARITY_METRICS = [
  "cosine",
  "angular-cosine",
  "product",
  "manhattan",
  "euclidean",
  "minkowski",
  "jaccard",
] as const;

export type SimilarityMetric = (typeof SIMILARITY_METRICS)[number];

export const DISTANCE_KERNELS = [
  "gaussian",
  "rbf",
  "laplacian",
  "polynomial",
  "sigmoid",
  "linear",
  "cauchy",
  "t-distribution",
  "inverse-multiquadric",
  "cosine",
  "angular-cosine",
  "frechet",
  "mmd",
] as const;

export type DistanceKernel = (typeof DISTANCE_KERNELS)[number];

export interface MetricOptions {
  /** Guards divisions by zero (default 1e-8). */
  eps?: number;
  /** Applied to every resulting value. */
  normalize?: (value: number) => number;
}

export interface SimilarityOptions extends MetricOptions {
  /** Angular-cosine scale (default 1). */
  c?: number;
  /** Minkowski order (default 3). */
  p?: number;
}

export interface DistanceOptions extends MetricOptions {
  gamma?: number;
  /** RBF bandwidths; each contributes exp(-d / (2a)). */
  bandwidth?: number[];
  degree?: number;
  coef?: number;
  c?: number;
  /** Covariance matrices, required by the frechet kernel. */
  sigma1?: Matrix;
  sigma2?: Matrix;
}
