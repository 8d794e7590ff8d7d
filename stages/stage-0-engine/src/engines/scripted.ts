/**
 * Scripted engine: replays a fixed list of outputs in order.
 * Deterministic stand-in for a real backend in tests and offline examples.
 */

import { BackendCallError } from "../errors.js";
import { buildMessages, renderMessages } from "../prompt.js";
import { createApproximateTokenizer } from "../tokenizer.js";
import type {
  EngineAdapter,
  EngineCommandOptions,
  EngineOutput,
  EngineRequest,
  EngineResult,
  Message,
  Tokenizer,
} from "../types.js";

export type ScriptedResponse =
  | EngineOutput
  | Error
  | ((request: EngineRequest) => EngineOutput);

export interface ScriptedEngineConfig {
  id?: string;
  responses?: ScriptedResponse[];
  /** Used once `responses` runs out; without it the engine throws. */
  fallback?: (request: EngineRequest) => EngineOutput;
  tokenizer?: Tokenizer;
  maxContextTokens?: number;
  model?: string;
}

export interface ScriptedPrepared {
  request: EngineRequest;
  messages: Message[];
}

export interface ScriptedEngine extends EngineAdapter<ScriptedPrepared> {
  /** Every forwarded request, in call order. */
  readonly calls: EngineRequest[];
  readonly commands: EngineCommandOptions[];
}

export function createScriptedEngine(
  config: ScriptedEngineConfig = {}
): ScriptedEngine {
  const engineId = config.id ?? "neurosymbolic";
  const queue = [...(config.responses ?? [])];
  const tokenizer = config.tokenizer ?? createApproximateTokenizer();
  const calls: EngineRequest[] = [];
  const commands: EngineCommandOptions[] = [];
  const state: EngineCommandOptions = { model: config.model ?? "scripted" };

  function next(request: EngineRequest): EngineOutput {
    const response = queue.shift();
    if (response === undefined) {
      if (config.fallback) {
        return config.fallback(request);
      }
      throw new BackendCallError({
        engineId,
        message: `Scripted engine has no response left for call #${calls.length}.`,
        code: "script_exhausted",
      });
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === "function") {
      return response(request);
    }
    return response;
  }

  async function respond(prepared: ScriptedPrepared): Promise<EngineResult> {
    const rendered = renderMessages(prepared.messages);
    const promptTokens = tokenizer.encode(rendered).length;
    if (
      config.maxContextTokens !== undefined &&
      promptTokens > config.maxContextTokens
    ) {
      throw new BackendCallError({
        engineId,
        message: `Prompt has ~${promptTokens} tokens, exceeding the ${config.maxContextTokens}-token context window.`,
        code: "context_length_exceeded",
      });
    }

    calls.push(prepared.request);
    const output = next(prepared.request);
    const outputTokens =
      typeof output === "string" ? tokenizer.encode(output).length : 0;

    return {
      output,
      metadata: {
        engineId,
        model: state.model,
        requestId: prepared.request.requestId ?? `scripted-${calls.length}`,
        durationMs: 0,
        usage: {
          inputTokens: promptTokens,
          outputTokens,
          totalTokens: promptTokens + outputTokens,
        },
        raw: { output, call: calls.length },
      },
    };
  }

  return {
    calls,
    commands,
    tokenizer,
    maxContextTokens: config.maxContextTokens,

    id: () => engineId,

    command(options: EngineCommandOptions): void {
      commands.push(options);
      Object.assign(state, options);
    },

    prepare(request: EngineRequest): ScriptedPrepared {
      return {
        request: { ...request, seed: request.seed ?? state.seed },
        messages: buildMessages(request),
      };
    },

    render(prepared: ScriptedPrepared): string {
      return renderMessages(prepared.messages);
    },

    async forward(prepared: ScriptedPrepared): Promise<EngineResult> {
      try {
        return await respond(prepared);
      } catch (error) {
        if (!state.remedy) {
          throw error;
        }
        const recovered = await state.remedy(error, prepared.request);
        if (!recovered) {
          throw error;
        }
        return recovered;
      }
    },
  };
}
