import type {
  SemanticOptions,
  SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";

/**
 * A semantic operation over one input. Must forward `options.preview` to the
 * backend call so the chunker can measure the rendered prompt.
 */
export type ChunkOperation = (
  input: SymbolicValue,
  options: SemanticOptions
) => Promise<SymbolicValue>;

export interface StreamOptions {
  /** Share of the context window one chunk may fill, in (0, 1]. */
  tokenRatio?: number;
}

export interface ChunkPlan {
  promptTokens: number;
  maxContextTokens: number;
  maxChunkTokens: number;
  /** 1 when the whole input fits. */
  chunkCount: number;
}

export const RETRIEVAL_MODES = ["all", "longest", "contains"] as const;

/**
 * all: every chunk result in order. longest: the result with the most
 * characters. contains: the results whose text includes `needle`.
 */
export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

export interface RetrievalOptions {
  /** Required by the contains mode. */
  needle?: string;
}
