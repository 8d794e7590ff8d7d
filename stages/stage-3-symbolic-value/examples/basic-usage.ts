/**
 * Stage 3 Symbolic Value 基础用法：
 * 同一个运算符，native 模式走本地逻辑，semantic 模式走 neurosymbolic engine。
 * scripted engine 代替真实后端，示例离线运行。
 */

import {
  createEngineRegistry,
  createScriptedEngine,
  createSilentLogger,
} from "../../stage-0-engine/src/index.js";
import { createValueRuntime } from "../src/index.js";

function printKnowledgePoints() {
  console.log("\n========== Stage 3 知识点 ==========");
  console.log("1. 每个运算只走一种策略：native（确定性、本地）或 semantic（后端）。");
  console.log("2. sem() / syn() 切换策略；disableBackendCalls 时 semantic 直接失败。");
  console.log("3. native 失败记录在 metadata.lastError，而不是直接抛出。");
  console.log("====================================\n");
}

async function main() {
  printKnowledgePoints();

  const engine = createScriptedEngine({
    responses: ["true", '["apple", "banana"]', "A yellow fruit."],
  });
  const registry = createEngineRegistry({ logger: createSilentLogger() });
  registry.register(engine);
  const runtime = createValueRuntime({ registry });

  const native = await runtime.value("5").equals(5);
  console.log("native  '5' == 5      ->", native.value);

  const semantic = await runtime.value("five").sem().equals(5);
  console.log("semantic 'five' == 5  ->", semantic.value);

  const fruits = await runtime.value(["apple", "banana", "carrot"]).sem().subtract("vegetables");
  console.log("semantic list - 'vegetables' ->", fruits.value);

  const described = await runtime.value("banana").interpret("Describe it in four words.");
  console.log("interpret ->", described.value);

  try {
    await runtime.value("a").greaterThan(1);
  } catch (error) {
    console.log("\nnative failure:", error instanceof Error ? error.message : error);
  }

  console.log("\nbackend calls:", engine.calls.map((call) => call.operation));
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
