/**
 * Similarity metrics between a vector and another vector or a set of vectors.
 */

import { MetricNotImplementedError } from "./errors.js";
import {
  SIMILARITY_METRICS,
  type SimilarityMetric,
  type SimilarityOptions,
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

type PairMetric = (v: Vector, o: Vector, options: SimilarityOptions, eps: number) => number;

const METRICS: Record<SimilarityMetric, PairMetric> = {
  cosine: (v, o, _options, eps) => cosine(v, o, eps),
  "angular-cosine": (v, o, options, eps) => {
    const c = options.c ?? 1;
    return 1 - (c * Math.acos(clampUnit(cosine(v, o, eps)))) / Math.PI;
  },
  product: (v, o) => dot(v, o),
  manhattan: (v, o) => l1Distance(v, o),
  euclidean: (v, o) => Math.sqrt(squaredDistance(v, o)),
  minkowski: (v, o, options) => {
    const p = options.p ?? 3;
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
      sum += Math.pow(Math.abs(v[i] - o[i]), p);
    }
    return Math.pow(sum, 1 / p);
  },
  jaccard: (v, o, _options, eps) => {
    let intersection = 0;
    let union = 0;
    for (let i = 0; i < v.length; i++) {
      intersection += Math.min(v[i], o[i]);
      union += Math.max(v[i], o[i]);
    }
    return intersection / (union + eps);
  },
};

export function isSimilarityMetric(name: string): name is SimilarityMetric {
  return SIMILARITY_METRICS.some((metric) => metric === name);
}

function resolveMetric(name: string): PairMetric {
  if (!isSimilarityMetric(name)) {
    throw new MetricNotImplementedError("Similarity metric", name, SIMILARITY_METRICS);
  }
  return METRICS[name];
}

export function similarity(v: Vector, other: Vector, metric?: string, options?: SimilarityOptions): number;
export function similarity(v: Vector, others: Vector[], metric?: string, options?: SimilarityOptions): number[];
export function similarity(
  v: Vector,
  other: Vector | Vector[],
  metric?: string,
  options?: SimilarityOptions
): number | number[];
export function similarity(
  v: Vector,
  other: Vector | Vector[],
  metric: string = "cosine",
  options: SimilarityOptions = {}
): number | number[] {
  const fn = resolveMetric(metric);
  const eps = options.eps ?? DEFAULT_EPS;
  const apply = (o: Vector): number => {
    assertSameLength(v, o);
    const value = fn(v, o, options, eps);
    return options.normalize ? options.normalize(value) : value;
  };

  if (isVectorSet(other)) {
    return other.map(apply);
  }
  return apply(other);
}
