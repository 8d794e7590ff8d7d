/**
 * Distributional distances that need more than a single pair of vectors.
 */

import { VectorShapeError } from "./errors.js";
import type { Matrix, Vector } from "./types.js";
import {
  assertSameLength,
  assertSquare,
  multiply,
  squaredDistance,
  symmetricEigen,
  symmetricSqrt,
  trace,
} from "./vector.js";

const MMD_BANDWIDTHS = [10, 15, 20, 50];

/**
 * Fréchet distance between N(mu1, sigma1) and N(mu2, sigma2):
 * |mu1 - mu2|^2 + Tr(s1) + Tr(s2) - 2 Tr(sqrt(s1 s2)).
 */
export function frechetDistance(
  mu1: Vector,
  sigma1: Matrix,
  mu2: Vector,
  sigma2: Matrix,
  eps: number = 1e-8
): number {
  assertSameLength(mu1, mu2);
  assertSquare(sigma1, "sigma1", mu1.length);
  assertSquare(sigma2, "sigma2", mu2.length);

  // Tr(sqrt(s1 s2)) == Tr(sqrt(sqrt(s1) s2 sqrt(s1))), and the inner product is symmetric.
  const root1 = symmetricSqrt(sigma1);
  const inner = multiply(multiply(root1, sigma2), root1);
  const { values } = symmetricEigen(inner);
  const traceCovMean = values.reduce(
    (sum, x) => sum + Math.sqrt(x > -eps ? Math.max(x, 0) : Number.NaN),
    0
  );
  if (Number.isNaN(traceCovMean)) {
    throw new VectorShapeError("Covariance product is not positive semi-definite");
  }

  return (
    squaredDistance(mu1, mu2) + trace(sigma1) + trace(sigma2) - 2 * traceCovMean
  );
}

function meanKernel(a: Vector[], b: Vector[]): number {
  let sum = 0;
  for (const x of a) {
    for (const y of b) {
      const d = squaredDistance(x, y);
      for (const bandwidth of MMD_BANDWIDTHS) {
        sum += Math.exp((-0.5 * d) / bandwidth);
      }
    }
  }
  return sum / (a.length * b.length);
}

/** Maximum mean discrepancy with a multi-bandwidth RBF kernel. */
export function maximumMeanDiscrepancy(x: Vector[], y: Vector[]): number {
  if (x.length === 0 || y.length === 0) {
    throw new VectorShapeError("MMD needs at least one sample on each side");
  }
  for (const sample of [...x, ...y]) {
    assertSameLength(x[0], sample);
  }
  return meanKernel(x, x) + meanKernel(y, y) - 2 * meanKernel(x, y);
}
