import "dotenv/config";

import {
  createConsoleLogger,
  createEngineRegistry,
  createOpenAIEmbeddingEngine,
  createOpenAIEngine,
  isLogLevel,
  type EngineRegistry,
  type LogLevel,
  type Logger,
  type UsageTracker,
} from "../stages/stage-0-engine/src/index.js";

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
}

const DEFAULT_ENDPOINT = "https://api.openai.com/v1";

export const NEUROSYMBOLIC_MODEL_MAP: ModelMap = {
  model: process.env.NEUROSYMBOLIC_MODEL?.trim() || "gpt-4o-mini",
  endpoint: process.env.OPENAI_BASE_URL?.trim() || DEFAULT_ENDPOINT,
  apiKey: process.env.OPENAI_API_KEY,
};

export const EMBEDDING_MODEL_MAP: ModelMap = {
  model: process.env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
  endpoint: process.env.OPENAI_BASE_URL?.trim() || DEFAULT_ENDPOINT,
  apiKey: process.env.OPENAI_API_KEY,
};

export interface GlobalConfig {
  openaiApiKey?: string;
  baseUrl: string;
  neurosymbolicModel: string;
  embeddingModel: string;
  maxContextTokens?: number;
  defaultSeed: number;
  logLevel: LogLevel;
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (!raw?.trim()) {
    return undefined;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

// 从 .env 读取统一配置，避免在调用处直接读取环境变量
export function loadGlobalConfig(): GlobalConfig {
  const logLevel = process.env.LOG_LEVEL?.trim();
  return {
    openaiApiKey: process.env.OPENAI_API_KEY?.trim() || undefined,
    baseUrl: NEUROSYMBOLIC_MODEL_MAP.endpoint,
    neurosymbolicModel: NEUROSYMBOLIC_MODEL_MAP.model,
    embeddingModel: EMBEDDING_MODEL_MAP.model,
    maxContextTokens: parseInteger("MAX_CONTEXT_TOKENS", process.env.MAX_CONTEXT_TOKENS),
    defaultSeed: parseInteger("DEFAULT_SEED", process.env.DEFAULT_SEED) ?? 42,
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}

export interface RegistryBuildOptions {
  /** Throw when no API key is configured instead of returning an empty registry. */
  requireEngines?: boolean;
  logger?: Logger;
  usageTracker?: UsageTracker;
}

// 组合根：进程启动时构建一次 registry，之后显式传递
export function buildEngineRegistryFromConfig(
  config: GlobalConfig,
  options: RegistryBuildOptions = {}
): EngineRegistry {
  const registry = createEngineRegistry({
    logger: options.logger ?? createConsoleLogger(config.logLevel),
    usageTracker: options.usageTracker,
  });

  if (!config.openaiApiKey) {
    if (options.requireEngines) {
      throw new Error(
        "No API key found. Set OPENAI_API_KEY in .env to register the neurosymbolic and embedding engines."
      );
    }
    return registry;
  }

  registry.register(
    createOpenAIEngine({
      apiKey: config.openaiApiKey,
      baseUrl: config.baseUrl,
      model: config.neurosymbolicModel,
      maxContextTokens: config.maxContextTokens,
    })
  );
  registry.register(
    createOpenAIEmbeddingEngine({
      apiKey: config.openaiApiKey,
      baseUrl: config.baseUrl,
      model: config.embeddingModel,
    })
  );
  return registry;
}
