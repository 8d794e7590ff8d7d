/**
 * Stage 2 Output Control 基础用法：
 * - LLM 输出视为不可信：先清洗（代码块、不可见字符），再严格解析
 * - SchemaModel 按 JSON Schema 校验，收集全部违规并渲染成可回喂模型的文本
 * - prepareSeeds 为重试循环生成确定性的种子序列
 * 本示例不调用模型。
 */

import {
  cleanCandidate,
  createSchemaModel,
  extractJson,
  prepareSeeds,
  renderViolations,
  SchemaValidationError,
  type JsonSchema,
} from "../src/index.js";

/** 示例 schema：name 和 age 必填，禁止额外字段 */
const PERSON_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    name: { type: "string", description: "Person name" },
    age: { type: "integer", description: "Age in years" },
  },
  required: ["name", "age"],
  additionalProperties: false,
};

interface PersonOutput {
  name: string;
  age: number;
}

function main() {
  const model = createSchemaModel<PersonOutput>(PERSON_SCHEMA);

  // ---------- 好样例 ----------
  const rawGood = '```json\n{"name": "Alice", "age": 30}\n```';
  console.log("Parsed (good):", model.validate(cleanCandidate(rawGood)));

  // ---------- 坏样例：缺字段 + 类型错 ----------
  const rawBad = '{"name": 42, "nickname": "Al"}';
  try {
    model.validate(cleanCandidate(rawBad));
  } catch (error) {
    if (!(error instanceof SchemaValidationError)) {
      throw error;
    }
    console.log("\nViolations:\n" + renderViolations(error.violations));
  }

  // ---------- 前后带说明的回复 ----------
  const chatty = 'Sure! Here it is: {"name": "Bob", "age": 41} Hope that helps.';
  const extracted = extractJson(chatty);
  console.log("\nExtracted:", extracted.found ? extracted.json : extracted.reason);

  console.log("\nSeeds for 5 attempts (seed=42):", prepareSeeds(5, 42));
}

main();
