/**
 * Engine Registry: explicit, injected map from capability id to adapter.
 * Built once at process start and passed by reference; there is no global
 * lookup. `call` runs prepare -> forward with request/response logging and
 * usage accounting.
 */

import { randomUUID } from "node:crypto";
import { describeError, EngineNotRegisteredError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type {
  EngineAdapter,
  EngineCommandOptions,
  EngineRegistry,
  EngineRegistryConfig,
  EngineRequest,
  EngineResult,
  Logger,
} from "./types.js";

function createLogger(config: EngineRegistryConfig): Logger {
  if (config.logger) {
    return config.logger;
  }
  return createConsoleLogger("info");
}

async function invoke<TPrepared>(
  adapter: EngineAdapter<TPrepared>,
  request: EngineRequest & { requestId: string },
  logger: Logger
): Promise<EngineResult> {
  const engineId = adapter.id();
  const prepared = adapter.prepare(request);

  logger.logRequest({
    timestamp: new Date().toISOString(),
    requestId: request.requestId,
    engineId,
    operation: request.operation,
    preview: request.preview,
  });

  if (request.preview) {
    const output = adapter.render
      ? adapter.render(prepared)
      : JSON.stringify(prepared);
    return {
      output,
      metadata: {
        engineId,
        requestId: request.requestId,
        durationMs: 0,
        preview: true,
      },
    };
  }

  const start = Date.now();
  try {
    const result = await adapter.forward(prepared);

    logger.logResponse({
      timestamp: new Date().toISOString(),
      requestId: request.requestId,
      engineId,
      operation: request.operation,
      model: result.metadata.model,
      durationMs: Date.now() - start,
      usage: result.metadata.usage,
      cost: result.metadata.cost,
      finishReason: result.metadata.finishReason,
    });

    return result;
  } catch (error) {
    logger.logError({
      timestamp: new Date().toISOString(),
      requestId: request.requestId,
      engineId,
      operation: request.operation,
      durationMs: Date.now() - start,
      error: describeError(error),
    });
    throw error;
  }
}

export function createEngineRegistry(
  config: EngineRegistryConfig = {}
): EngineRegistry {
  const adapters = new Map<string, EngineAdapter>();
  const logger = createLogger(config);

  function resolve(id: string): EngineAdapter {
    const adapter = adapters.get(id);
    if (!adapter) {
      throw new EngineNotRegisteredError(id, Array.from(adapters.keys()));
    }
    return adapter;
  }

  return {
    register(adapter: EngineAdapter): void {
      const id = adapter.id().trim();
      if (!id) {
        throw new Error("Engine id is required");
      }
      adapters.set(id, adapter);
    },

    has(id: string): boolean {
      return adapters.has(id);
    },

    resolve,

    list(): string[] {
      return Array.from(adapters.keys());
    },

    command(id: string, options: EngineCommandOptions): void {
      if (id === "all") {
        for (const adapter of adapters.values()) {
          adapter.command(options);
        }
        return;
      }
      resolve(id).command(options);
    },

    async call(id: string, request: EngineRequest): Promise<EngineResult> {
      const adapter = resolve(id);
      const result = await invoke(
        adapter,
        { ...request, requestId: request.requestId ?? randomUUID() },
        logger
      );
      config.usageTracker?.record(result.metadata);
      return result;
    },
  };
}
