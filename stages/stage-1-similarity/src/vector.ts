import { VectorShapeError } from "./errors.js";
import type { Matrix, Vector } from "./types.js";

export function isVectorSet(value: Vector | Vector[]): value is Vector[] {
  const entries: ReadonlyArray<number | Vector> = value;
  return entries.some((entry) => Array.isArray(entry));
}

export function assertSameLength(v: Vector, o: Vector): void {
  if (v.length === 0 || o.length === 0) {
    throw new VectorShapeError("Cannot compare empty vectors");
  }
  if (v.length !== o.length) {
    throw new VectorShapeError(
      `Vector length mismatch: ${v.length} vs ${o.length}`
    );
  }
}

export function dot(v: Vector, o: Vector): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    sum += v[i] * o[i];
  }
  return sum;
}

export function norm(v: Vector): number {
  return Math.sqrt(dot(v, v));
}

export function squaredDistance(v: Vector, o: Vector): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    const d = v[i] - o[i];
    sum += d * d;
  }
  return sum;
}

export function l1Distance(v: Vector, o: Vector): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    sum += Math.abs(v[i] - o[i]);
  }
  return sum;
}

export function cosine(v: Vector, o: Vector, eps: number): number {
  return dot(v, o) / (norm(v) * norm(o) + eps);
}

/** arccos input clamped to [-1, 1] against rounding drift. */
export function clampUnit(x: number): number {
  return Math.min(1, Math.max(-1, x));
}

// --- matrices ---

export function assertSquare(m: Matrix, name: string, size: number): void {
  if (m.length !== size || m.some((row) => row.length !== size)) {
    throw new VectorShapeError(`${name} must be a ${size}x${size} matrix`);
  }
}

export function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
  );
}

export function multiply(a: Matrix, b: Matrix): Matrix {
  const rows = a.length;
  const inner = b.length;
  const cols = b[0]?.length ?? 0;
  const out: Matrix = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
  for (let i = 0; i < rows; i++) {
    for (let k = 0; k < inner; k++) {
      const aik = a[i][k];
      for (let j = 0; j < cols; j++) {
        out[i][j] += aik * b[k][j];
      }
    }
  }
  return out;
}

export function trace(m: Matrix): number {
  return m.reduce((sum, row, i) => sum + row[i], 0);
}

/**
 * Eigen-decomposition of a symmetric matrix by cyclic Jacobi rotations.
 * `vectors` holds eigenvectors as columns.
 */
export function symmetricEigen(
  matrix: Matrix,
  maxSweeps: number = 100
): { values: number[]; vectors: Matrix } {
  const n = matrix.length;
  const a = matrix.map((row) => [...row]);
  const v = identity(n);

  for (let sweep = 0; sweep < maxSweeps; sweep++) {
    let off = 0;
    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        off += a[p][q] * a[p][q];
      }
    }
    if (off < 1e-22) {
      break;
    }

    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = a[p][q];
        if (Math.abs(apq) < 1e-300) {
          continue;
        }
        const theta = (a[q][q] - a[p][p]) / (2 * apq);
        const sign = theta >= 0 ? 1 : -1;
        const t = sign / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < n; k++) {
          const akp = a[k][p];
          const akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k];
          const aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k][p];
          const vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  return { values: a.map((row, i) => row[i]), vectors: v };
}

/** Principal square root of a symmetric positive semi-definite matrix. */
export function symmetricSqrt(matrix: Matrix): Matrix {
  const { values, vectors } = symmetricEigen(matrix);
  const n = matrix.length;
  const roots = values.map((x) => Math.sqrt(Math.max(x, 0)));
  const out: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      let sum = 0;
      for (let k = 0; k < n; k++) {
        sum += vectors[i][k] * roots[k] * vectors[j][k];
      }
      out[i][j] = sum;
    }
  }
  return out;
}
