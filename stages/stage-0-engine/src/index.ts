export { createEngineRegistry } from "./registry.js";
export {
  createConsoleLogger,
  createSilentLogger,
  isLogLevel,
  type LogLevel,
} from "./logger.js";
export { createDefaultCostTable, estimateCost } from "./cost.js";
export { createUsageTracker } from "./usage.js";
export { backoffDelay, isRetryableError, withRetry } from "./retry.js";
export {
  createApproximateTokenizer,
  createTiktokenTokenizer,
  estimateTokens,
} from "./tokenizer.js";
export { buildMessages, renderMessages } from "./prompt.js";
export {
  BackendCallError,
  describeError,
  EngineNotRegisteredError,
} from "./errors.js";
export {
  createOpenAIEmbeddingEngine,
  createOpenAIEngine,
  type ChatPrepared,
  type EmbeddingPrepared,
  type OpenAIEngineConfig,
} from "./engines/openai.js";
export {
  createScriptedEngine,
  type ScriptedEngine,
  type ScriptedEngineConfig,
  type ScriptedResponse,
} from "./engines/scripted.js";
export type {
  AttemptLog,
  AttemptStatus,
  CostEstimate,
  CostTable,
  EngineAdapter,
  EngineCapability,
  EngineCommandOptions,
  EngineMetadata,
  EngineOutput,
  EngineRegistry,
  EngineRegistryConfig,
  EngineRequest,
  EngineResult,
  ErrorLog,
  JsonValue,
  Logger,
  Message,
  RemedyHandler,
  RequestLog,
  ResponseLog,
  RetryOptions,
  Role,
  Tokenizer,
  Usage,
  UsageSnapshot,
  UsageTracker,
} from "./types.js";
