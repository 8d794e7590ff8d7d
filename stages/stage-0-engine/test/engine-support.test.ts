import { afterEach, describe, expect, it, vi } from "vitest";
import {
  BackendCallError,
  createApproximateTokenizer,
  createConsoleLogger,
  createDefaultCostTable,
  createScriptedEngine,
  createTiktokenTokenizer,
  estimateCost,
  estimateTokens,
  backoffDelay,
  isRetryableError,
  withRetry,
} from "../src/index.js";

describe("createApproximateTokenizer", () => {
  it("round-trips text losslessly", () => {
    const tokenizer = createApproximateTokenizer();
    const text = "naïve café 🙂 tokens";
    expect(tokenizer.decode(tokenizer.encode(text))).toBe(text);
  });

  it("packs four UTF-8 bytes per token", () => {
    const tokenizer = createApproximateTokenizer();
    expect(tokenizer.encode("abcdefghij")).toEqual([
      3 * 2 ** 32 + 0x61626364,
      3 * 2 ** 32 + 0x65666768,
      1 * 2 ** 32 + 0x696a0000,
    ]);
    expect(estimateTokens("abcdefghij")).toBe(3);
  });

  it("keeps no state between instances", () => {
    const ids = createApproximateTokenizer().encode("context window");
    expect(createApproximateTokenizer().decode(ids)).toBe("context window");
  });

  it("rejects ids outside the packed range", () => {
    expect(() => createApproximateTokenizer().decode([-1])).toThrow("Unknown token id: -1");
    expect(() => createApproximateTokenizer().decode([1.5])).toThrow("Unknown token id: 1.5");
  });
});

describe("createTiktokenTokenizer", () => {
  it("round-trips through the o200k_base encoding", () => {
    const tokenizer = createTiktokenTokenizer();
    const text = "Self-correcting execution layer";
    const tokens = tokenizer.encode(text);
    expect(tokens.length).toBeGreaterThan(0);
    expect(tokens.length).toBeLessThan(text.length);
    expect(tokenizer.decode(tokens)).toBe(text);
  });

  it("counts special-token text as plain text", () => {
    const tokenizer = createTiktokenTokenizer();
    expect(tokenizer.decode(tokenizer.encode("<|endoftext|>"))).toBe("<|endoftext|>");
  });
});

describe("withRetry", () => {
  it("retries transport errors and then succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(
        new BackendCallError({ engineId: "e", message: "busy", status: 503 })
      )
      .mockResolvedValueOnce("ok");

    const onRetry = vi.fn();

    await expect(withRetry(fn, { backoffMs: 0, jitter: 0, onRetry })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, delayMs: 0 });
  });

  it("doubles the backoff up to the cap", () => {
    const retry = { maxRetries: 5, backoffMs: 300, maxBackoffMs: 1000 };
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, retry))).toEqual([
      300, 600, 1000, 1000,
    ]);
    expect(backoffDelay(1, { ...retry, jitter: 0.5 }, () => 1)).toBe(450);
    expect(backoffDelay(1, { ...retry, jitter: 0.5 }, () => 0)).toBe(150);
  });

  it("does not retry client errors", async () => {
    const failure = new BackendCallError({ engineId: "e", message: "bad", status: 400 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(fn, { backoffMs: 0 })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("classifies retryable errors", () => {
    expect(isRetryableError({ code: "ECONNRESET" })).toBe(true);
    expect(isRetryableError({ name: "AbortError" })).toBe(true);
    expect(
      isRetryableError(
        new BackendCallError({
          engineId: "e",
          message: "too long",
          status: 500,
          code: "context_length_exceeded",
        })
      )
    ).toBe(false);
    expect(isRetryableError("nope")).toBe(false);
  });
});

describe("estimateCost", () => {
  it("prices known models in cents", () => {
    expect(
      estimateCost(
        { inputTokens: 1000, outputTokens: 500, totalTokens: 1500 },
        "gpt-4o",
        createDefaultCostTable()
      )
    ).toEqual({ inputCents: 0.25, outputCents: 0.5, totalCents: 0.75, currency: "USD" });
  });

  it("returns undefined for unknown models", () => {
    expect(
      estimateCost(
        { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
        "unknown-model",
        createDefaultCostTable()
      )
    ).toBeUndefined();
  });

  it("prices only the OpenAI-compatible chat and embedding models", () => {
    expect(Object.keys(createDefaultCostTable())).toEqual([
      "gpt-4o",
      "gpt-4o-mini",
      "gpt-4.1",
      "gpt-4.1-mini",
      "text-embedding-3-small",
      "text-embedding-3-large",
    ]);
  });
});

describe("createScriptedEngine", () => {
  const request = { operation: "query", instruction: "q", operands: ["x"] };

  it("throws once the script is exhausted", async () => {
    const engine = createScriptedEngine({ responses: ["one"] });
    await expect(engine.forward(engine.prepare(request))).resolves.toMatchObject({
      output: "one",
    });
    await expect(engine.forward(engine.prepare(request))).rejects.toMatchObject({
      code: "script_exhausted",
    });
  });

  it("hands failures to the remedy hook", async () => {
    const engine = createScriptedEngine({ responses: [new Error("fail")] });
    engine.command({
      remedy: async () => ({
        output: "recovered",
        metadata: { engineId: "neurosymbolic", requestId: "r", durationMs: 0 },
      }),
    });

    const result = await engine.forward(engine.prepare(request));
    expect(result.output).toBe("recovered");
  });

  it("enforces its context window", async () => {
    const engine = createScriptedEngine({ responses: ["x"], maxContextTokens: 2 });
    await expect(engine.forward(engine.prepare(request))).rejects.toMatchObject({
      code: "context_length_exceeded",
    });
    expect(engine.calls).toHaveLength(0);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints only exhausted attempts at error level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger("error");
    const base = { timestamp: "t", loop: "schema-validation" };

    logger.logAttempt({ ...base, attempt: 1, status: "failed" });
    logger.logAttempt({ ...base, attempt: 2, status: "exhausted" });

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      JSON.stringify({ ...base, attempt: 2, status: "exhausted" })
    );
  });
});
