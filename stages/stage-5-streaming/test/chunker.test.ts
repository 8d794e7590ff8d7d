import { describe, expect, it } from "vitest";
import {
  createEngineRegistry,
  createScriptedEngine,
  createSilentLogger,
  type ScriptedResponse,
} from "../../stage-0-engine/src/index.js";
import {
  createValueRuntime,
  type SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";
import {
  collectChunks,
  planChunks,
  RetrievalModeError,
  streamChunks,
  type ChunkOperation,
} from "../src/index.js";

function setup(responses: ScriptedResponse[], maxContextTokens = 100) {
  const engine = createScriptedEngine({ responses, maxContextTokens });
  const registry = createEngineRegistry({ logger: createSilentLogger() });
  registry.register(engine);
  return { engine, runtime: createValueRuntime({ registry }) };
}

const summarize: ChunkOperation = (input, options) => input.interpret("Summarize", options);

/** Four-character pieces "0000", "0001", ..., one approximate token each. */
function numberedText(count: number): { text: string; pieces: string[] } {
  const pieces = Array.from({ length: count }, (_, i) => String(i).padStart(4, "0"));
  return { text: pieces.join(""), pieces };
}

async function collect(stream: AsyncIterable<SymbolicValue>): Promise<unknown[]> {
  const out: unknown[] = [];
  for await (const item of stream) {
    out.push(item.value);
  }
  return out;
}

describe("streamChunks", () => {
  it("runs once when the rendered request fits the context window", async () => {
    const { engine, runtime } = setup(["short summary"]);

    const results = await collect(
      streamChunks(runtime.value("short text"), summarize, { tokenRatio: 0.5 })
    );

    expect(results).toEqual(["short summary"]);
    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].operands).toEqual(["short text"]);
  });

  it("splits an oversized input into ceil(n / maxChunkTokens) ordered windows", async () => {
    const { text, pieces } = numberedText(260);
    const { engine, runtime } = setup(["s1", "s2", "s3", "s4", "s5", "s6"]);

    const results = await collect(streamChunks(runtime.value(text), summarize, { tokenRatio: 0.5 }));

    expect(results).toEqual(["s1", "s2", "s3", "s4", "s5", "s6"]);
    expect(engine.calls).toHaveLength(6);
    expect(engine.calls.map((call) => call.operands[0])).toEqual([
      pieces.slice(0, 50).join(""),
      pieces.slice(50, 100).join(""),
      pieces.slice(100, 150).join(""),
      pieces.slice(150, 200).join(""),
      pieces.slice(200, 250).join(""),
      pieces.slice(250).join(""),
    ]);
  });

  it("calls the backend only for consumed chunks", async () => {
    const { text } = numberedText(260);
    const { engine, runtime } = setup(["s1", "s2"]);

    const stream = streamChunks(runtime.value(text), summarize, { tokenRatio: 0.5 });
    const first = await stream.next();

    expect(first.done).toBe(false);
    expect(engine.calls).toHaveLength(1);
    await stream.return(undefined);
    expect(engine.calls).toHaveLength(1);
  });

  it("propagates a chunk failure without retrying", async () => {
    const { text } = numberedText(260);
    const { engine, runtime } = setup(["s1", new Error("backend down"), "s3"]);

    await expect(
      collect(streamChunks(runtime.value(text), summarize, { tokenRatio: 0.5 }))
    ).rejects.toThrow("backend down");
    expect(engine.calls).toHaveLength(2);
  });

  it("reports the plan from the preview", async () => {
    const { text } = numberedText(260);
    const { engine, runtime } = setup([]);

    const plan = await planChunks(runtime.value(text), summarize, { tokenRatio: 0.5 });

    expect(plan.maxChunkTokens).toBe(50);
    expect(plan.chunkCount).toBe(6);
    expect(plan.promptTokens).toBeGreaterThan(100);
    expect(engine.calls).toHaveLength(0);
  });

  it("rejects a ratio outside (0, 1]", async () => {
    const { runtime } = setup([]);
    await expect(
      collect(streamChunks(runtime.value("x"), summarize, { tokenRatio: 1.5 }))
    ).rejects.toThrow(RangeError);
  });
});

describe("collectChunks", () => {
  const summaries = [
    "alpha",
    "a much longer summary",
    "beta",
    "gamma",
    "another long summary!",
    "delta",
  ];

  function chunkStream() {
    const { text } = numberedText(260);
    const { engine, runtime } = setup(summaries);
    return { engine, stream: streamChunks(runtime.value(text), summarize, { tokenRatio: 0.5 }) };
  }

  it("returns every chunk result in order", async () => {
    const { engine, stream } = chunkStream();

    const results = await collectChunks(stream, "all");

    expect(results.map((result) => result.value)).toEqual(summaries);
    expect(engine.calls).toHaveLength(6);
  });

  it("picks the longest result, keeping the first on a tie", async () => {
    const { stream } = chunkStream();

    const result = await collectChunks(stream, "longest");

    expect(result.value).toBe("a much longer summary");
  });

  it("keeps the results that contain the needle", async () => {
    const { stream } = chunkStream();

    const results = await collectChunks(stream, "contains", { needle: "summary" });

    expect(results.map((result) => result.value)).toEqual([
      "a much longer summary",
      "another long summary!",
    ]);
  });

  it("rejects an unknown mode before calling the backend", async () => {
    const { engine, stream } = chunkStream();

    const failure = await collectChunks(stream, "first").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RetrievalModeError);
    if (failure instanceof RetrievalModeError) {
      expect(failure.message).toBe(
        "Invalid retrieval mode first. Available: 'all', 'longest', 'contains'"
      );
    }
    expect(engine.calls).toHaveLength(0);
  });

  it("needs a needle for the contains mode", async () => {
    const { engine, stream } = chunkStream();

    await expect(collectChunks(stream, "contains")).rejects.toThrow(
      "Retrieval mode 'contains' needs a needle"
    );
    expect(engine.calls).toHaveLength(0);
  });
});
