/**
 * Drains a chunk stream into one answer. Reassembly only starts once the
 * caller asks for it, so plain iteration stays lazy.
 */

import type { SymbolicValue } from "../../stage-3-symbolic-value/src/index.js";
import { RetrievalModeError } from "./errors.js";
import { RETRIEVAL_MODES, type RetrievalMode, type RetrievalOptions } from "./types.js";

export function isRetrievalMode(mode: string): mode is RetrievalMode {
  return RETRIEVAL_MODES.some((name) => name === mode);
}

function longest(results: SymbolicValue[]): SymbolicValue {
  let best: SymbolicValue | undefined;
  let bestLength = -1;
  for (const result of results) {
    // 按码点计数；并列时保留先出现的块
    const length = [...result.toString()].length;
    if (length > bestLength) {
      best = result;
      bestLength = length;
    }
  }
  if (!best) {
    throw new RangeError("Cannot pick the longest result of an empty stream");
  }
  return best;
}

export async function collectChunks(
  stream: AsyncIterable<SymbolicValue>,
  mode: "longest"
): Promise<SymbolicValue>;
export async function collectChunks(
  stream: AsyncIterable<SymbolicValue>,
  mode: "all" | "contains",
  options?: RetrievalOptions
): Promise<SymbolicValue[]>;
export async function collectChunks(
  stream: AsyncIterable<SymbolicValue>,
  mode: string,
  options?: RetrievalOptions
): Promise<SymbolicValue | SymbolicValue[]>;
export async function collectChunks(
  stream: AsyncIterable<SymbolicValue>,
  mode: string,
  options: RetrievalOptions = {}
): Promise<SymbolicValue | SymbolicValue[]> {
  if (!isRetrievalMode(mode)) {
    throw new RetrievalModeError(mode, RETRIEVAL_MODES);
  }
  const { needle } = options;
  if (mode === "contains" && needle === undefined) {
    throw new TypeError("Retrieval mode 'contains' needs a needle");
  }

  const results: SymbolicValue[] = [];
  for await (const result of stream) {
    results.push(result);
  }

  switch (mode) {
    case "all":
      return results;
    case "longest":
      return longest(results);
    case "contains":
      return results.filter((result) => result.toString().includes(needle ?? ""));
  }
}
