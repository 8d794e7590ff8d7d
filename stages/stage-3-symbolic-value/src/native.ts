/**
 * Native operation table: pure functions over payloads.
 * Each entry returns a result or NOT_APPLICABLE; it never calls a backend.
 */

import { isDeepStrictEqual } from "node:util";
import {
  NOT_APPLICABLE,
  type BinaryOperation,
  type NotApplicable,
  type Payload,
  type PayloadMapping,
  type ResolutionStrategy,
  type UnaryOperation,
} from "./types.js";

type NativeResult = Payload | NotApplicable;
type BinaryFn = (left: Payload, right: Payload) => NativeResult;
type UnaryFn = (value: Payload) => NativeResult;

export function isMapping(value: Payload): value is PayloadMapping {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

function isInteger(value: Payload): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function payloadEquals(left: Payload, right: Payload): boolean {
  if (typeof left !== "object" || typeof right !== "object" || left === null || right === null) {
    return left === right;
  }
  return isDeepStrictEqual(left, right);
}

function indexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  if (needle.length === 0) {
    return 0;
  }
  outer: for (let i = 0; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) {
        continue outer;
      }
    }
    return i;
  }
  return -1;
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

function order<T extends number | bigint | string>(left: T, right: T): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function compare(
  left: Payload,
  right: Payload,
  test: (order: number) => boolean
): NativeResult {
  if (typeof left === "number" && typeof right === "number") {
    return test(order(left, right));
  }
  if (typeof left === "bigint" && typeof right === "bigint") {
    return test(order(left, right));
  }
  if (typeof left === "string" && typeof right === "string") {
    return test(order(left, right));
  }
  return NOT_APPLICABLE;
}

function arithmetic(
  numberFn: (a: number, b: number) => number,
  bigintFn: (a: bigint, b: bigint) => bigint
): BinaryFn {
  return (left, right) => {
    if (typeof left === "number" && typeof right === "number") {
      return numberFn(left, right);
    }
    if (typeof left === "bigint" && typeof right === "bigint") {
      return bigintFn(left, right);
    }
    return NOT_APPLICABLE;
  };
}

function nonZero<T extends number | bigint>(divisor: T): T {
  if (divisor === 0 || divisor === 0n) {
    throw new RangeError("division by zero");
  }
  return divisor;
}

function logical(
  boolFn: (a: boolean, b: boolean) => boolean,
  intFn: (a: number, b: number) => number
): BinaryFn {
  return (left, right) => {
    if (typeof left === "boolean" && typeof right === "boolean") {
      return boolFn(left, right);
    }
    if (isInteger(left) && isInteger(right)) {
      return intFn(left, right);
    }
    return NOT_APPLICABLE;
  };
}

const BINARY: Record<BinaryOperation, BinaryFn> = {
  equals: (l, r) => payloadEquals(l, r),
  notEquals: (l, r) => !payloadEquals(l, r),
  greaterThan: (l, r) => compare(l, r, (o) => o > 0),
  lessThan: (l, r) => compare(l, r, (o) => o < 0),
  greaterOrEqual: (l, r) => compare(l, r, (o) => o >= 0),
  lessOrEqual: (l, r) => compare(l, r, (o) => o <= 0),

  contains: (l, r) => {
    if (typeof l === "string" && typeof r === "string") {
      return l.includes(r);
    }
    if (Array.isArray(l)) {
      return l.some((item) => payloadEquals(item, r));
    }
    if (l instanceof Uint8Array) {
      if (typeof r === "number") return l.includes(r);
      if (r instanceof Uint8Array) return indexOfBytes(l, r) >= 0;
      return NOT_APPLICABLE;
    }
    if (isMapping(l) && (typeof r === "string" || typeof r === "number")) {
      return Object.hasOwn(l, String(r));
    }
    return NOT_APPLICABLE;
  },

  add: (l, r) => {
    if (typeof l === "number" && typeof r === "number") return l + r;
    if (typeof l === "bigint" && typeof r === "bigint") return l + r;
    if (typeof l === "string" && typeof r === "string") return l + r;
    if (Array.isArray(l) && Array.isArray(r)) return [...l, ...r];
    if (l instanceof Uint8Array && r instanceof Uint8Array) return concatBytes(l, r);
    return NOT_APPLICABLE;
  },
  subtract: arithmetic((a, b) => a - b, (a, b) => a - b),
  multiply: arithmetic((a, b) => a * b, (a, b) => a * b),
  divide: arithmetic((a, b) => a / nonZero(b), (a, b) => a / nonZero(b)),
  modulo: arithmetic((a, b) => a % nonZero(b), (a, b) => a % nonZero(b)),
  power: arithmetic((a, b) => a ** b, (a, b) => a ** b),

  and: logical((a, b) => a && b, (a, b) => a & b),
  or: (l, r) => {
    if (isMapping(l) && isMapping(r)) {
      return { ...l, ...r };
    }
    return logical((a, b) => a || b, (a, b) => a | b)(l, r);
  },
  xor: logical((a, b) => a !== b, (a, b) => a ^ b),
};

const UNARY: Record<UnaryOperation, UnaryFn> = {
  negate: (v) => {
    if (typeof v === "number") return -v;
    if (typeof v === "bigint") return -v;
    return NOT_APPLICABLE;
  },
  invert: (v) => {
    if (typeof v === "boolean") return !v;
    if (isInteger(v)) return ~v;
    if (typeof v === "bigint") return ~v;
    return NOT_APPLICABLE;
  },
};

/** Operations that accept an absent operand without tripping the None shortcut. */
export const ABSENCE_TOLERANT: ReadonlySet<BinaryOperation> = new Set([
  "equals",
  "notEquals",
]);

/** Semantic strategy disables the native table entirely. */
export function applyNative(
  operation: BinaryOperation,
  left: Payload,
  right: Payload,
  strategy: ResolutionStrategy
): NativeResult {
  if (strategy === "semantic") {
    return NOT_APPLICABLE;
  }
  return BINARY[operation](left, right);
}

export function applyNativeUnary(
  operation: UnaryOperation,
  value: Payload,
  strategy: ResolutionStrategy
): NativeResult {
  if (strategy === "semantic") {
    return NOT_APPLICABLE;
  }
  return UNARY[operation](value);
}
