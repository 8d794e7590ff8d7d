import { describe, expect, it } from "vitest";
import {
  distance,
  frechetDistance,
  MetricNotImplementedError,
  similarity,
  VectorShapeError,
} from "../src/index.js";

describe("similarity", () => {
  it("scores identical vectors as maximally similar", () => {
    const v = [0.3, -1.2, 4];
    expect(similarity(v, v)).toBeCloseTo(1, 6);
    expect(similarity(v, v, "euclidean")).toBe(0);
    expect(similarity(v, v, "angular-cosine")).toBeCloseTo(1, 3);
  });

  it("computes minkowski with the default order 3", () => {
    expect(similarity([0, 0], [3, 4], "minkowski")).toBeCloseTo(Math.cbrt(91), 10);
    expect(similarity([0, 0], [3, 4], "minkowski", { p: 2 })).toBeCloseTo(5, 10);
  });

  it("computes product, manhattan and jaccard", () => {
    expect(similarity([1, 2], [3, 4], "product")).toBe(11);
    expect(similarity([1, 2], [3, 5], "manhattan")).toBe(5);
    expect(similarity([1, 2], [2, 1], "jaccard")).toBeCloseTo(0.5, 6);
  });

  it("returns one value per member of a set operand", () => {
    const scores = similarity([1, 0], [[1, 0], [0, 1]]);
    expect(scores).toHaveLength(2);
    expect(scores[0]).toBeCloseTo(1, 6);
    expect(scores[1]).toBe(0);
  });

  it("applies normalize to every value", () => {
    expect(
      similarity([0, 0], [3, 4], "euclidean", { normalize: (x) => x / 10 })
    ).toBeCloseTo(0.5, 10);
  });

  it("lists available metrics for an unknown name", () => {
    expect(() => similarity([1], [1], "hamming")).toThrow(MetricNotImplementedError);
    expect(() => similarity([1], [1], "hamming")).toThrow(
      "Similarity metric hamming not implemented. Available: 'cosine', 'angular-cosine', 'product', 'manhattan', 'euclidean', 'minkowski', 'jaccard'"
    );
  });

  it("rejects vectors of different lengths", () => {
    expect(() => similarity([1, 2], [1, 2, 3])).toThrow(
      "Vector length mismatch: 2 vs 3"
    );
  });
});

describe("distance", () => {
  it("evaluates pairwise kernels", () => {
    expect(distance([1, 1], [1, 1])).toBe(1);
    expect(distance([0, 0], [1, 1], "rbf", { bandwidth: [1] })).toBeCloseTo(Math.exp(-1), 12);
    expect(distance([0, 0], [1, 2], "laplacian")).toBeCloseTo(Math.exp(-3), 12);
    expect(distance([1, 2], [3, 4], "linear")).toBe(11);
    expect(distance([0, 0], [1, 1], "cauchy")).toBeCloseTo(1 / 3, 12);
    expect(distance([1, 0], [0, 1], "cosine")).toBe(1);
  });

  it("computes the Frechet distance between two Gaussians", () => {
    const sigma1 = [
      [1, 0],
      [0, 4],
    ];
    const sigma2 = [
      [4, 0],
      [0, 1],
    ];
    expect(distance([1, 0], [0, 0], "frechet", { sigma1, sigma2 })).toBeCloseTo(3, 8);
    expect(frechetDistance([0, 0], sigma1, [0, 0], sigma1)).toBeCloseTo(0, 8);
  });

  it("requires covariance matrices for frechet", () => {
    expect(() => distance([1, 0], [0, 0], "frechet")).toThrow(VectorShapeError);
  });

  it("reduces a sample set to a single mmd value", () => {
    expect(distance([1, 2], [[1, 2]], "mmd")).toBe(0);
    expect(distance([0, 0], [[10, 10], [12, 9]], "mmd")).toBeGreaterThan(0);
  });

  it("lists available kernels for an unknown name", () => {
    expect(() => distance([1], [1], "spline")).toThrow(
      /^Kernel function spline not implemented\. Available: 'gaussian', 'rbf'/
    );
  });
});
