/**
 * Token-budgeted streaming: preview the rendered request, and when it does
 * not fit the engine's context window, split the input into contiguous token
 * windows and run the operation once per window, lazily, in order.
 */

import type { SymbolicValue } from "../../stage-3-symbolic-value/src/index.js";
import type { ChunkOperation, ChunkPlan, StreamOptions } from "./types.js";

const DEFAULT_TOKEN_RATIO = 0.6;

function resolveRatio(options: StreamOptions): number {
  const ratio = options.tokenRatio ?? DEFAULT_TOKEN_RATIO;
  if (!(ratio > 0 && ratio <= 1)) {
    throw new RangeError(`tokenRatio must be in (0, 1], got ${ratio}`);
  }
  return ratio;
}

/** Measure the request without calling the backend. */
export async function planChunks(
  value: SymbolicValue,
  operation: ChunkOperation,
  options: StreamOptions = {}
): Promise<ChunkPlan> {
  const ratio = resolveRatio(options);
  const { tokenizer, maxContextTokens } = value.runtime.engineLimits();
  const maxChunkTokens = Math.floor(maxContextTokens * ratio);
  if (maxChunkTokens < 1) {
    throw new RangeError(
      `A ratio of ${ratio} leaves no room in a ${maxContextTokens}-token context window`
    );
  }

  const preview = await operation(value, { preview: true });
  const promptTokens = tokenizer.encode(preview.toString()).length;
  const chunkCount =
    promptTokens <= maxContextTokens
      ? 1
      : Math.ceil(tokenizer.encode(value.toString()).length / maxChunkTokens);

  return { promptTokens, maxContextTokens, maxChunkTokens, chunkCount };
}

/**
 * Yields one result per chunk. Nothing is prefetched: each backend call
 * happens when the consumer asks for the next item, and a failing chunk
 * ends the stream with that error. No retries.
 */
export async function* streamChunks(
  value: SymbolicValue,
  operation: ChunkOperation,
  options: StreamOptions = {}
): AsyncGenerator<SymbolicValue, void, undefined> {
  const plan = await planChunks(value, operation, options);
  if (plan.chunkCount === 1) {
    yield await operation(value, {});
    return;
  }

  const { tokenizer } = value.runtime.engineLimits();
  const tokens = tokenizer.encode(value.toString());
  for (let start = 0; start < tokens.length; start += plan.maxChunkTokens) {
    const window = tokens.slice(start, start + plan.maxChunkTokens);
    const chunk = value.runtime.value(tokenizer.decode(window), value.flags);
    yield await operation(chunk, {});
  }
}
