import { MetricNotImplementedError, VectorShapeError } from "./errors.js";
import { frechetDistance, maximumMeanDiscrepancy } from "./measures.js";
import {
  DISTANCE_KERNELS,
  type DistanceKernel,
  type DistanceOptions,
  type Vector,
} from "./types.js";
import {
  assertSameLength,
  clampUnit,
  cosine,
  dot,
  isVectorSet,
  l1Distance,
  squaredDistance,
} from "./vector.js";

const DEFAULT_EPS = 1e-8;

type PairKernel = (v: Vector, o: Vector, options: DistanceOptions, eps: number) => number;

const PAIR_KERNELS: Record<Exclude<DistanceKernel, "mmd">, PairKernel> = {
  gaussian: (v, o, { gamma = 1 }) => Math.exp(-gamma * squaredDistance(v, o)),
  rbf: (v, o, { gamma = 1, bandwidth }) => {
    const d = squaredDistance(v, o);
    if (!bandwidth) {
      return Math.exp(-gamma * d);
    }
    return bandwidth.reduce((sum, a) => sum + Math.exp((-1 / (2 * a)) * d), 0);
  },
  laplacian: (v, o, { gamma = 1 }) => Math.exp(-gamma * l1Distance(v, o)),
  polynomial: (v, o, { gamma = 1, degree = 3, coef = 1 }) =>
    Math.pow(gamma * dot(v, o) + coef, degree),
  sigmoid: (v, o, { gamma = 1, coef = 1 }) => Math.tanh(gamma * dot(v, o) + coef),
  linear: (v, o) => dot(v, o),
  cauchy: (v, o, { gamma = 1 }) => 1 / (1 + squaredDistance(v, o) / gamma),
  "t-distribution": (v, o, { gamma = 1, degree = 1 }) =>
    1 / (1 + Math.pow(squaredDistance(v, o) / (gamma * degree), degree + 1) / 2),
  "inverse-multiquadric": (v, o, { gamma = 1 }) =>
    1 / Math.sqrt(squaredDistance(v, o) / (gamma * gamma) + 1),
  cosine: (v, o, _options, eps) => 1 - cosine(v, o, eps),
  "angular-cosine": (v, o, { c = 1 }, eps) =>
    (c * Math.acos(clampUnit(cosine(v, o, eps)))) / Math.PI,
  frechet: (v, o, { sigma1, sigma2 }, eps) => {
    if (!sigma1 || !sigma2) {
      throw new VectorShapeError(
        "Frechet distance requires covariance matrices for both inputs"
      );
    }
    return frechetDistance(v, sigma1, o, sigma2, eps);
  },
};

export function isDistanceKernel(name: string): name is DistanceKernel {
  return DISTANCE_KERNELS.some((kernel) => kernel === name);
}

/**
 * Kernel value between `v` and `other`. A set operand yields one value per
 * member, except "mmd", which treats the set as one sample and returns a
 * single discrepancy.
 */
export function distance(v: Vector, other: Vector, kernel?: string, options?: DistanceOptions): number;
export function distance(v: Vector, others: Vector[], kernel?: string, options?: DistanceOptions): number | number[];
export function distance(
  v: Vector,
  other: Vector | Vector[],
  kernel?: string,
  options?: DistanceOptions
): number | number[];
export function distance(
  v: Vector,
  other: Vector | Vector[],
  kernel: string = "gaussian",
  options: DistanceOptions = {}
): number | number[] {
  if (!isDistanceKernel(kernel)) {
    throw new MetricNotImplementedError("Kernel function", kernel, DISTANCE_KERNELS);
  }
  const eps = options.eps ?? DEFAULT_EPS;
  const finish = (value: number): number =>
    options.normalize ? options.normalize(value) : value;

  if (kernel === "mmd") {
    const samples = isVectorSet(other) ? other : [other];
    return finish(maximumMeanDiscrepancy([v], samples));
  }

  const fn = PAIR_KERNELS[kernel];
  const apply = (o: Vector): number => {
    assertSameLength(v, o);
    return finish(fn(v, o, options, eps));
  };

  if (isVectorSet(other)) {
    return other.map(apply);
  }
  return apply(other);
}
