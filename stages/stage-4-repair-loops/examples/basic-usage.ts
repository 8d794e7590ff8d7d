/**
 * Stage 4 Repair Loops 基础用法：
 * - runWithCorrection：失败 → analyze → correct → 重跑
 * - validateWithSchema：按 schema 校验，失败则带违规列表和种子重新生成
 * - enforceConstraints：长度 / 自定义规则约束，违规时重述全部约束
 * 所有循环都有上限，耗尽时抛出带 attempts 和 violations 的错误。
 */

import {
  createConsoleLogger,
  createEngineRegistry,
  createScriptedEngine,
} from "../../stage-0-engine/src/index.js";
import { createSchemaModel } from "../../stage-2-output-control/src/index.js";
import { createValueRuntime } from "../../stage-3-symbolic-value/src/index.js";
import {
  customConstraint,
  enforceConstraints,
  lengthConstraint,
  runWithCorrection,
  validateWithSchema,
} from "../src/index.js";

interface Person {
  name: string;
  age: number;
}

async function main() {
  const engine = createScriptedEngine({
    responses: [
      // self-correction: analyze, correct
      "The number is written in words.",
      "42",
      // schema loop: one regeneration
      '{"name": "Ada", "age": 36}',
      // constraint loop: custom verdict, regeneration, verdict
      "It does not mention a year.",
      "Ada Lovelace published her notes in 1843.",
      "PASS",
    ],
  });
  const logger = createConsoleLogger("info");
  const registry = createEngineRegistry({ logger });
  registry.register(engine);
  const runtime = createValueRuntime({ registry, logger });

  console.log("\n---------- runWithCorrection ----------");
  const parsed = await runWithCorrection(
    {
      instruction: "Parse the number.",
      run: async (input, context) => {
        const n = Number(input.toString());
        if (Number.isNaN(n)) {
          context.reportOutput(input.toString());
          throw new Error(`not a number: ${input.toString()}`);
        }
        return runtime.value(n);
      },
    },
    runtime.value("forty-two")
  );
  console.log("result:", parsed.value);

  console.log("\n---------- validateWithSchema ----------");
  const model = createSchemaModel<Person>({
    type: "object",
    properties: { name: { type: "string" }, age: { type: "integer" } },
    required: ["name", "age"],
    additionalProperties: false,
  });
  const outcome = await validateWithSchema(runtime.value('{"name": "Ada"}'), model, { seed: 42 });
  console.log(`data after ${outcome.attempts} attempt(s):`, outcome.data);

  console.log("\n---------- enforceConstraints ----------");
  const constrained = await enforceConstraints(
    runtime.value("Ada Lovelace wrote notes."),
    [lengthConstraint({ minLength: 10, maxLength: 80 }), customConstraint("Must mention a year")],
    { task: "Write one sentence about Ada Lovelace." }
  );
  console.log(`text after ${constrained.attempts} attempt(s):`, constrained.value.value);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
