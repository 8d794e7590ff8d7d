import { createDefaultCostTable, estimateCost } from "../cost.js";
import { BackendCallError } from "../errors.js";
import { buildMessages, renderMessages } from "../prompt.js";
import { withRetry } from "../retry.js";
import { createTiktokenTokenizer } from "../tokenizer.js";
import type {
  CostTable,
  EngineAdapter,
  EngineCommandOptions,
  EngineRequest,
  EngineResult,
  JsonValue,
  Message,
  RemedyHandler,
  RetryOptions,
  Tokenizer,
  Usage,
} from "../types.js";

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_MAX_CONTEXT_TOKENS = 128_000;

export interface OpenAIEngineConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  organization?: string;
  /** Capability id to register under. */
  id?: string;
  maxContextTokens?: number;
  tokenizer?: Tokenizer;
  retry?: Partial<RetryOptions>;
  timeoutMs?: number;
  costTable?: CostTable;
}

export interface ChatPrepared {
  request: EngineRequest;
  messages: Message[];
  model: string;
  seed?: number;
  temperature?: number;
}

export interface EmbeddingPrepared {
  request: EngineRequest;
  inputs: string[];
  model: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function buildHeaders(config: OpenAIEngineConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${config.apiKey}`,
  };

  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  try {
    const payload: unknown = JSON.parse(text);
    const error = isRecord(payload) ? payload.error : undefined;
    if (isRecord(error) && typeof error.message === "string") {
      const code =
        typeof error.code === "string"
          ? error.code
          : typeof error.type === "string"
            ? error.type
            : undefined;
      return { message: error.message, code };
    }
  } catch {
    // body is not JSON; the raw text is the message
  }
  return { message: text || `Request failed with status ${response.status}` };
}

function readUsage(data: Record<string, unknown>): Usage | undefined {
  const usage = data.usage;
  if (!isRecord(usage)) {
    return undefined;
  }
  const num = (value: unknown) => (typeof value === "number" ? value : 0);
  return {
    inputTokens: num(usage.prompt_tokens),
    outputTokens: num(usage.completion_tokens),
    totalTokens: num(usage.total_tokens),
  };
}

function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal?: AbortSignal; cancel?: () => void } {
  if (!abortSignal && !timeoutMs) {
    return {};
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  if (timeoutMs) {
    timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  }

  if (abortSignal) {
    if (abortSignal.aborted) {
      controller.abort();
    } else {
      abortSignal.addEventListener("abort", () => controller.abort(), {
        once: true,
      });
    }
  }

  return {
    signal: controller.signal,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    },
  };
}

async function postJson(
  engineId: string,
  config: OpenAIEngineConfig,
  path: string,
  body: Record<string, unknown>,
  request: EngineRequest
): Promise<Record<string, unknown>> {
  if (!config.apiKey) {
    throw new BackendCallError({
      engineId,
      message: "API key is required for OpenAI-compatible engines.",
    });
  }

  const baseUrl = config.baseUrl ?? DEFAULT_OPENAI_BASE_URL;
  const attempt = async () => {
    const { signal, cancel } = createMergedSignal(
      request.abortSignal,
      request.timeoutMs ?? config.timeoutMs
    );
    try {
      const response = await fetch(`${baseUrl}${path}`, {
        method: "POST",
        headers: buildHeaders(config),
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        const errorDetails = await parseErrorMessage(response);
        throw new BackendCallError({
          engineId,
          message: errorDetails.message,
          status: response.status,
          code: errorDetails.code,
        });
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        throw new BackendCallError({
          engineId,
          message: "Engine returned a non-object response body.",
        });
      }
      return data;
    } finally {
      if (cancel) {
        cancel();
      }
    }
  };

  return withRetry(attempt, config.retry);
}

async function runWithRemedy(
  remedy: RemedyHandler | undefined,
  request: EngineRequest,
  fn: () => Promise<EngineResult>
): Promise<EngineResult> {
  try {
    return await fn();
  } catch (error) {
    if (!remedy) {
      throw error;
    }
    const recovered = await remedy(error, request);
    if (!recovered) {
      throw error;
    }
    return recovered;
  }
}

/** Chat-completions engine serving the "neurosymbolic" capability. */
export function createOpenAIEngine(
  config: OpenAIEngineConfig
): EngineAdapter<ChatPrepared> {
  const engineId = config.id ?? "neurosymbolic";
  const costTable = config.costTable ?? createDefaultCostTable();
  const tokenizer = config.tokenizer ?? createTiktokenTokenizer();
  const maxContextTokens = config.maxContextTokens ?? DEFAULT_MAX_CONTEXT_TOKENS;
  const state: EngineCommandOptions = { model: config.model };

  function render(prepared: ChatPrepared): string {
    return renderMessages(prepared.messages);
  }

  return {
    tokenizer,
    maxContextTokens,

    id: () => engineId,

    command(options: EngineCommandOptions): void {
      Object.assign(state, options);
    },

    prepare(request: EngineRequest): ChatPrepared {
      return {
        request,
        messages: buildMessages(request),
        model: state.model ?? config.model,
        seed: request.seed ?? state.seed,
        temperature: request.temperature ?? state.temperature,
      };
    },

    render,

    forward(prepared: ChatPrepared): Promise<EngineResult> {
      const { request } = prepared;
      return runWithRemedy(state.remedy, request, async () => {
        const promptTokens = tokenizer.encode(render(prepared)).length;
        if (promptTokens > maxContextTokens) {
          throw new BackendCallError({
            engineId,
            message: `Prompt has ~${promptTokens} tokens, exceeding the ${maxContextTokens}-token context window.`,
            code: "context_length_exceeded",
          });
        }

        const start = Date.now();
        const data = await postJson(
          engineId,
          config,
          "/chat/completions",
          {
            model: prepared.model,
            messages: prepared.messages,
            temperature: prepared.temperature,
            max_tokens: request.maxTokens,
            seed: prepared.seed,
            response_format:
              request.responseFormat === "json_object"
                ? { type: "json_object" }
                : undefined,
          },
          request
        );

        const choices = Array.isArray(data.choices) ? data.choices : [];
        const choice: unknown = choices[0];
        const message = isRecord(choice) ? choice.message : undefined;
        const content =
          isRecord(message) && typeof message.content === "string"
            ? message.content
            : "";
        const finishReason =
          isRecord(choice) && typeof choice.finish_reason === "string"
            ? choice.finish_reason
            : undefined;
        const usage = readUsage(data);

        return {
          output: content,
          metadata: {
            engineId,
            model: prepared.model,
            requestId: request.requestId ?? "",
            durationMs: Date.now() - start,
            usage,
            cost: estimateCost(usage, prepared.model, costTable),
            finishReason,
            raw: data,
          },
        };
      });
    },
  };
}

/** Embeddings engine serving the "embedding" capability. */
export function createOpenAIEmbeddingEngine(
  config: OpenAIEngineConfig
): EngineAdapter<EmbeddingPrepared> {
  const engineId = config.id ?? "embedding";
  const costTable = config.costTable ?? createDefaultCostTable();
  const state: EngineCommandOptions = { model: config.model };

  return {
    id: () => engineId,

    command(options: EngineCommandOptions): void {
      Object.assign(state, options);
    },

    prepare(request: EngineRequest): EmbeddingPrepared {
      return {
        request,
        inputs: request.operands,
        model: state.model ?? config.model,
      };
    },

    render(prepared: EmbeddingPrepared): string {
      return prepared.inputs.join("\n");
    },

    forward(prepared: EmbeddingPrepared): Promise<EngineResult> {
      const { request } = prepared;
      return runWithRemedy(state.remedy, request, async () => {
        const start = Date.now();
        const data = await postJson(
          engineId,
          config,
          "/embeddings",
          { model: prepared.model, input: prepared.inputs },
          request
        );

        const rows = Array.isArray(data.data) ? data.data : [];
        const vectors: JsonValue[] = rows.map((row: unknown) => {
          const embedding = isRecord(row) ? row.embedding : undefined;
          if (
            !Array.isArray(embedding) ||
            !embedding.every((x: unknown) => typeof x === "number")
          ) {
            throw new BackendCallError({
              engineId,
              message: "Embedding response is missing numeric vectors.",
            });
          }
          return embedding.filter((x: unknown): x is number => typeof x === "number");
        });
        const usage = readUsage(data);

        return {
          output: vectors,
          metadata: {
            engineId,
            model: prepared.model,
            requestId: request.requestId ?? "",
            durationMs: Date.now() - start,
            usage,
            cost: estimateCost(usage, prepared.model, costTable),
            raw: data,
          },
        };
      });
    },
  };
}
