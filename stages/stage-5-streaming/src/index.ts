export { planChunks, streamChunks } from "./chunker.js";
export { collectChunks, isRetrievalMode } from "./retrieval.js";
export { RetrievalModeError } from "./errors.js";
export { RETRIEVAL_MODES } from "./types.js";
export type {
  ChunkOperation,
  ChunkPlan,
  RetrievalMode,
  RetrievalOptions,
  StreamOptions,
} from "./types.js";
