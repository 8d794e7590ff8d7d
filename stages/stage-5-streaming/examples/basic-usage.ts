/**
 * Stage 5 Streaming 基础用法：
 * 输入超出上下文窗口时，按 token 预算切块，每消费一项才调用一次后端。
 */

import {
  createEngineRegistry,
  createScriptedEngine,
  createSilentLogger,
} from "../../stage-0-engine/src/index.js";
import { createValueRuntime } from "../../stage-3-symbolic-value/src/index.js";
import { planChunks, streamChunks, type ChunkOperation } from "../src/index.js";

async function main() {
  const engine = createScriptedEngine({
    maxContextTokens: 200,
    fallback: (request) => `summary of ${request.operands[0].length} chars`,
  });
  const registry = createEngineRegistry({ logger: createSilentLogger() });
  registry.register(engine);
  const runtime = createValueRuntime({ registry });

  const summarize: ChunkOperation = (input, options) =>
    input.interpret("Summarize in one line.", options);
  const document = runtime.value("Lorem ipsum dolor sit amet. ".repeat(60));

  const plan = await planChunks(document, summarize, { tokenRatio: 0.6 });
  console.log("plan:", plan);

  let index = 0;
  for await (const part of streamChunks(document, summarize, { tokenRatio: 0.6 })) {
    index += 1;
    console.log(`chunk ${index}:`, part.value, `(backend calls so far: ${engine.calls.length})`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
