/**
 * Stage 0 Engine 基础用法：
 * 从全局配置组装 Engine Registry，发一次 interpret 请求，展示 preview / usage / cost。
 * 没有 OPENAI_API_KEY 时改用 scripted engine，示例完全离线。
 */

import {
  buildEngineRegistryFromConfig,
  loadGlobalConfig,
} from "../../../config/index.js";
import {
  createScriptedEngine,
  createSilentLogger,
  createUsageTracker,
  type EngineRequest,
} from "../src/index.js";

/** 打印 Stage 0 知识点. */
function printKnowledgePoints() {
  console.log("\n========== Stage 0 知识点 ==========");
  console.log(
    "1. EngineAdapter：id / prepare / forward / command，可选 render、tokenizer、maxContextTokens。"
  );
  console.log(
    "2. Engine Registry：进程启动时构建一次，显式传给每个组件（没有全局查找）。"
  );
  console.log(
    "3. preview：只渲染请求、不调用后端；usage tracker 只统计真正 forward 的调用。"
  );
  console.log("====================================\n");
}

async function main() {
  printKnowledgePoints();

  const config = loadGlobalConfig();
  const usageTracker = createUsageTracker();
  const registry = buildEngineRegistryFromConfig(config, {
    logger: createSilentLogger(),
    usageTracker,
  });
  if (!registry.has("neurosymbolic")) {
    console.log("未配置 OPENAI_API_KEY，使用 scripted engine。\n");
    registry.register(
      createScriptedEngine({ fallback: () => "Paris", maxContextTokens: 4096 })
    );
  }

  const request: EngineRequest = {
    operation: "interpret",
    instruction: "Answer with the capital city only.",
    operands: ["France"],
    seed: config.defaultSeed,
  };

  const preview = await registry.call("neurosymbolic", { ...request, preview: true });
  console.log("Preview:\n" + String(preview.output) + "\n");

  const result = await registry.call("neurosymbolic", request);
  console.log("Output:", result.output);
  console.log("Usage:", result.metadata.usage);
  console.log("Cost:", result.metadata.cost ?? "-");
  console.log("Tracked:", usageTracker.getTotalUsage());
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
