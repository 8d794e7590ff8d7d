import { describe, expect, it, vi } from "vitest";
import {
  BackendCallError,
  createEngineRegistry,
  createScriptedEngine,
  createUsageTracker,
  EngineNotRegisteredError,
  type Logger,
} from "../src/index.js";

function createRecordingLogger() {
  return {
    logRequest: vi.fn(),
    logResponse: vi.fn(),
    logError: vi.fn(),
    logAttempt: vi.fn(),
  } satisfies Logger;
}

describe("createEngineRegistry", () => {
  it("renders a preview without forwarding to the engine", async () => {
    const engine = createScriptedEngine();
    const registry = createEngineRegistry({ logger: createRecordingLogger() });
    registry.register(engine);

    const result = await registry.call("neurosymbolic", {
      operation: "equals",
      instruction: "Compare",
      operands: ["a", "b"],
      preview: true,
    });

    expect(result.output).toBe(
      "user:\n[INSTRUCTION]\nCompare\n\n[OPERAND 1]\na\n\n[OPERAND 2]\nb"
    );
    expect(result.metadata.preview).toBe(true);
    expect(engine.calls).toHaveLength(0);
  });

  it("forwards, logs and records usage", async () => {
    const engine = createScriptedEngine({ responses: ["done"] });
    const logger = createRecordingLogger();
    const usageTracker = createUsageTracker();
    const registry = createEngineRegistry({ logger, usageTracker });
    registry.register(engine);

    const result = await registry.call("neurosymbolic", {
      operation: "interpret",
      instruction: "Echo",
      operands: ["hi"],
      requestId: "req-1",
    });

    expect(result.output).toBe("done");
    expect(result.metadata.requestId).toBe("req-1");
    // "user:\n[INSTRUCTION]\nEcho\n\n[DATA]\nhi" is 35 chars -> 9 tokens
    expect(result.metadata.usage).toEqual({
      inputTokens: 9,
      outputTokens: 1,
      totalTokens: 10,
    });
    expect(logger.logRequest).toHaveBeenCalledTimes(1);
    expect(logger.logResponse).toHaveBeenCalledTimes(1);
    expect(usageTracker.getEngineUsage("neurosymbolic")).toEqual({
      callCount: 1,
      inputTokens: 9,
      outputTokens: 1,
      totalTokens: 10,
      totalCents: 0,
    });
  });

  it("logs and rethrows engine failures unchanged", async () => {
    const failure = new BackendCallError({
      engineId: "neurosymbolic",
      message: "boom",
      status: 500,
    });
    const engine = createScriptedEngine({ responses: [failure] });
    const logger = createRecordingLogger();
    const registry = createEngineRegistry({ logger });
    registry.register(engine);

    await expect(
      registry.call("neurosymbolic", {
        operation: "query",
        instruction: "x",
        operands: [],
      })
    ).rejects.toBe(failure);
    expect(logger.logError).toHaveBeenCalledTimes(1);
    expect(logger.logResponse).not.toHaveBeenCalled();
  });

  it("throws EngineNotRegisteredError for unknown ids", async () => {
    const registry = createEngineRegistry({ logger: createRecordingLogger() });
    registry.register(createScriptedEngine());

    await expect(
      registry.call("embedding", { operation: "embed", instruction: "", operands: [] })
    ).rejects.toThrow(
      new EngineNotRegisteredError("embedding", ["neurosymbolic"]).message
    );
    expect(() => registry.resolve("embedding")).toThrow(EngineNotRegisteredError);
  });

  it("sends command options to every engine with 'all'", () => {
    const chat = createScriptedEngine();
    const embed = createScriptedEngine({ id: "embedding" });
    const registry = createEngineRegistry({ logger: createRecordingLogger() });
    registry.register(chat);
    registry.register(embed);

    registry.command("all", { seed: 7 });
    registry.command("embedding", { model: "text-embedding-3-small" });

    expect(registry.list()).toEqual(["neurosymbolic", "embedding"]);
    expect(chat.commands).toEqual([{ seed: 7 }]);
    expect(embed.commands).toEqual([
      { seed: 7 },
      { model: "text-embedding-3-small" },
    ]);
  });
});
