/**
 * Value runtime: creates SymbolicValues bound to an injected engine registry.
 * Each binary or unary operation resolves through exactly one strategy:
 * the native table, or a capability-tagged request to the neurosymbolic engine.
 */

import {
  BackendCallError,
  createSilentLogger,
  createTiktokenTokenizer,
  describeError,
  type EngineOutput,
  type EngineResult,
} from "../../stage-0-engine/src/index.js";
import {
  distance as kernelDistance,
  similarity as metricSimilarity,
  type Vector,
} from "../../stage-1-similarity/src/index.js";
import {
  BackendDisabledError,
  UnsupportedOperandError,
  UnsupportedOperationError,
} from "./errors.js";
import {
  ABSENCE_TOLERANT,
  applyNative,
  applyNativeUnary,
  isMapping,
} from "./native.js";
import {
  BINARY_TEMPLATES,
  DEFAULT_INTERPRET_INSTRUCTION,
  ITEM_TEMPLATES,
  parseBooleanReply,
  UNARY_TEMPLATES,
  type OperationTemplate,
} from "./prompts.js";
import { outputText, recoverReply, serializePayload } from "./serialize.js";
import {
  NOT_APPLICABLE,
  type BinaryOperation,
  type EngineLimits,
  type ItemKey,
  type NotApplicable,
  type Operand,
  type Payload,
  type ResolutionStrategy,
  type SemanticOptions,
  type SymbolicValue,
  type UnaryOperation,
  type ValueFlags,
  type ValueMetadata,
  type ValueRuntime,
  type ValueRuntimeConfig,
} from "./types.js";

const created = new WeakSet<object>();

function isAbsent(payload: Payload): boolean {
  return payload === null || payload === undefined;
}

export function typeName(payload: Payload): string {
  if (payload === null) return "null";
  if (payload === undefined) return "undefined";
  if (Array.isArray(payload)) return "array";
  if (payload instanceof Uint8Array) return "bytes";
  if (typeof payload === "object") return "mapping";
  return typeof payload;
}

function isVector(value: unknown): value is Vector {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((x) => typeof x === "number")
  );
}

function isVectorList(value: unknown): value is Vector[] {
  return Array.isArray(value) && value.length > 0 && value.every(isVector);
}

function isStringList(value: Payload): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((x) => typeof x === "string")
  );
}

function resolveIndex(length: number, key: ItemKey): number | undefined {
  if (typeof key !== "number" || !Number.isInteger(key)) {
    return undefined;
  }
  const index = key < 0 ? length + key : key;
  if (index < 0 || index >= length) {
    throw new RangeError(`index ${key} out of range`);
  }
  return index;
}

function nativeGet(container: Payload, key: ItemKey): Payload | NotApplicable {
  if (Array.isArray(container) || typeof container === "string" || container instanceof Uint8Array) {
    const index = resolveIndex(container.length, key);
    if (index === undefined) {
      return NOT_APPLICABLE;
    }
    return container[index];
  }
  if (isMapping(container)) {
    const name = String(key);
    if (!Object.hasOwn(container, name)) {
      throw new RangeError(`key '${name}' not found`);
    }
    return container[name];
  }
  return NOT_APPLICABLE;
}

function nativeSet(container: Payload, key: ItemKey, item: Payload): boolean {
  if (Array.isArray(container)) {
    const index = resolveIndex(container.length, key);
    if (index === undefined) {
      return false;
    }
    container[index] = item;
    return true;
  }
  if (isMapping(container)) {
    container[String(key)] = item;
    return true;
  }
  return false;
}

function nativeDelete(container: Payload, key: ItemKey): boolean {
  if (Array.isArray(container)) {
    const index = resolveIndex(container.length, key);
    if (index === undefined) {
      return false;
    }
    container.splice(index, 1);
    return true;
  }
  if (isMapping(container)) {
    const name = String(key);
    if (!Object.hasOwn(container, name)) {
      throw new RangeError(`key '${name}' not found`);
    }
    delete container[name];
    return true;
  }
  return false;
}

function assertMutable(operation: string, payload: Payload): void {
  if (typeof payload === "string" || Array.isArray(payload) || isMapping(payload)) {
    return;
  }
  throw new UnsupportedOperandError(
    operation,
    `Setting item is not supported for ${typeName(payload)}. Supported types are string, mapping, and array.`
  );
}

function metadataFrom(result: EngineResult): ValueMetadata {
  return {
    raw: result.metadata.raw ?? result.output,
    usage: result.metadata.usage,
    engineId: result.metadata.engineId,
    requestId: result.metadata.requestId,
  };
}

function isMatrix(output: EngineOutput): output is number[][] {
  return isVectorList(output);
}

export function createValueRuntime(config: ValueRuntimeConfig): ValueRuntime {
  const logger = config.logger ?? createSilentLogger();
  const neurosymbolicEngine = config.engines?.neurosymbolic ?? "neurosymbolic";
  const embeddingEngine = config.engines?.embedding ?? "embedding";
  const defaults: ValueFlags = {
    semantic: false,
    disableBackendCalls: false,
    disableNoneShortcut: false,
    ...config.defaults,
  };

  function isValue(candidate: unknown): candidate is SymbolicValue {
    return typeof candidate === "object" && candidate !== null && created.has(candidate);
  }

  function coerce(operand: Operand): SymbolicValue {
    return isValue(operand) ? operand : createValue(operand, defaults);
  }

  function createValue(
    initial: Payload,
    flags: ValueFlags,
    metadata: ValueMetadata = {}
  ): SymbolicValue {
    const ownStrategy: ResolutionStrategy = flags.semantic ? "semantic" : "native";

    function derive(payload: Payload, extra: ValueMetadata = {}): SymbolicValue {
      return createValue(payload, { ...flags }, extra);
    }

    function tryNative<T>(fn: () => T | NotApplicable): T | NotApplicable {
      try {
        return fn();
      } catch (error) {
        self.metadata.lastError = error;
        return NOT_APPLICABLE;
      }
    }

    async function callBackend(
      operation: string,
      instruction: string,
      operands: string[],
      participants: SymbolicValue[],
      options: SemanticOptions = {},
      attributes?: Record<string, string>
    ): Promise<EngineResult> {
      if (participants.some((v) => v.flags.disableBackendCalls)) {
        throw new BackendDisabledError(operation);
      }
      return runtime.registry.call(neurosymbolicEngine, {
        operation,
        instruction,
        operands,
        attributes,
        payload: options.payload,
        staticContext: options.staticContext,
        constraints: options.constraints,
        seed: options.seed,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        responseFormat: options.responseFormat,
        preview: options.preview,
        abortSignal: options.abortSignal,
      });
    }

    function wrapReply(
      result: EngineResult,
      template: OperationTemplate | undefined,
      shape: Payload
    ): SymbolicValue {
      const extra = metadataFrom(result);
      if (result.metadata.preview) {
        return derive(outputText(result.output), extra);
      }
      if (template?.reply === "boolean") {
        const answer =
          typeof result.output === "boolean"
            ? result.output
            : parseBooleanReply(outputText(result.output));
        return derive(answer, extra);
      }
      return derive(recoverReply(result.output, shape), extra);
    }

    function unsupported(symbol: string, other?: SymbolicValue): string {
      const operands = other
        ? `'${typeName(self.value)}' and '${typeName(other.value)}'`
        : `'${typeName(self.value)}'`;
      return `unsupported operand type(s) for ${symbol}: ${operands}`;
    }

    async function binary(operation: BinaryOperation, operand: Operand): Promise<SymbolicValue> {
      const other = coerce(operand);
      const template = BINARY_TEMPLATES[operation];
      const shortcut = !flags.disableNoneShortcut && !other.flags.disableNoneShortcut;
      if (
        shortcut &&
        !ABSENCE_TOLERANT.has(operation) &&
        (isAbsent(self.value) || isAbsent(other.value))
      ) {
        throw new UnsupportedOperandError(operation, unsupported(template.symbol, other));
      }

      const strategy: ResolutionStrategy =
        ownStrategy === "semantic" || other.strategy === "semantic" ? "semantic" : "native";
      const native = tryNative(() => applyNative(operation, self.value, other.value, strategy));

      if (strategy === "native") {
        if (native === NOT_APPLICABLE) {
          throw new UnsupportedOperationError(
            operation,
            unsupported(template.symbol, other),
            { cause: self.metadata.lastError }
          );
        }
        return derive(native);
      }

      const result = await callBackend(
        operation,
        template.instruction,
        [serializePayload(self.value), serializePayload(other.value)],
        [self, other],
        {},
        { operator: template.symbol }
      );
      return wrapReply(result, template, self.value);
    }

    async function unary(operation: UnaryOperation): Promise<SymbolicValue> {
      const template = UNARY_TEMPLATES[operation];
      if (!flags.disableNoneShortcut && isAbsent(self.value)) {
        throw new UnsupportedOperandError(operation, unsupported(template.symbol));
      }
      const native = tryNative(() => applyNativeUnary(operation, self.value, ownStrategy));

      if (ownStrategy === "native") {
        if (native === NOT_APPLICABLE) {
          throw new UnsupportedOperationError(
            operation,
            unsupported(template.symbol),
            { cause: self.metadata.lastError }
          );
        }
        return derive(native);
      }

      const result = await callBackend(
        operation,
        template.instruction,
        [serializePayload(self.value)],
        [self],
        {},
        { operator: template.symbol }
      );
      return wrapReply(result, template, self.value);
    }

    function keyNotFound(operation: string, key: ItemKey): UnsupportedOperationError {
      return new UnsupportedOperationError(
        operation,
        `Key ${String(key)} not found in ${serializePayload(self.value)}`,
        { cause: self.metadata.lastError }
      );
    }

    async function semantic(
      operation: string,
      instruction: string,
      options: SemanticOptions = {}
    ): Promise<SymbolicValue> {
      const result = await callBackend(
        operation,
        instruction,
        [serializePayload(self.value)],
        [self],
        options
      );
      return wrapReply(result, undefined, undefined);
    }

    function withError(options: SemanticOptions, error: unknown): SemanticOptions {
      const { name, message } = describeError(error);
      const block = `[ERROR]\n${name}: ${message}`;
      return {
        ...options,
        payload: options.payload ? `${options.payload}\n\n${block}` : block,
      };
    }

    let pendingEmbedding: Promise<Vector | Vector[]> | undefined;

    async function embedPayload(): Promise<Vector | Vector[]> {
      const payload = self.value;
      if (isVector(payload)) {
        return [...payload];
      }
      if (Array.isArray(payload) && payload.length === 0) {
        throw new UnsupportedOperandError("embedding", "Cannot compute embedding of an empty list");
      }
      if (self.flags.disableBackendCalls) {
        throw new BackendDisabledError("embedding");
      }

      const batch = isStringList(payload);
      const inputs = batch ? payload : [serializePayload(payload)];
      const result = await runtime.registry.call(embeddingEngine, {
        operation: "embedding",
        instruction: "",
        operands: inputs,
      });
      if (!isMatrix(result.output) || result.output.length !== inputs.length) {
        throw new BackendCallError({
          engineId: result.metadata.engineId,
          message: `Embedding engine returned no vector for each of the ${inputs.length} input(s).`,
          code: "invalid_output",
        });
      }
      self.metadata.usage = result.metadata.usage;
      return batch ? result.output : result.output[0];
    }

    async function singleEmbedding(operation: string): Promise<Vector> {
      const embedded = await self.embedding();
      if (isVectorList(embedded)) {
        throw new UnsupportedOperandError(
          operation,
          `Cannot compute ${operation} from a set of ${embedded.length} embeddings; use a single value on the left.`
        );
      }
      return embedded;
    }

    async function otherEmbedding(other: Operand | Vector[]): Promise<Vector | Vector[]> {
      if (isValue(other)) {
        return other.embedding();
      }
      if (isVector(other) || isVectorList(other)) {
        return other;
      }
      return coerce(other).embedding();
    }

    const self: SymbolicValue = {
      value: initial,
      flags: Object.freeze({ ...flags }),
      metadata,
      strategy: ownStrategy,
      runtime,

      equals: (other) => binary("equals", other),
      notEquals: (other) => binary("notEquals", other),
      greaterThan: (other) => binary("greaterThan", other),
      lessThan: (other) => binary("lessThan", other),
      greaterOrEqual: (other) => binary("greaterOrEqual", other),
      lessOrEqual: (other) => binary("lessOrEqual", other),
      contains: (other) => binary("contains", other),
      add: (other) => binary("add", other),
      subtract: (other) => binary("subtract", other),
      multiply: (other) => binary("multiply", other),
      divide: (other) => binary("divide", other),
      modulo: (other) => binary("modulo", other),
      power: (other) => binary("power", other),
      and: (other) => binary("and", other),
      or: (other) => binary("or", other),
      xor: (other) => binary("xor", other),
      negate: () => unary("negate"),
      invert: () => unary("invert"),

      toBoolean(): boolean {
        const payload = self.value;
        if (typeof payload === "boolean") {
          return payload;
        }
        if (isAbsent(payload)) {
          return false;
        }
        return Boolean(payload);
      },

      toString(): string {
        return serializePayload(self.value);
      },

      async getItem(key: ItemKey): Promise<SymbolicValue> {
        const native = tryNative(() => nativeGet(self.value, key));
        if (native !== NOT_APPLICABLE) {
          return derive(native);
        }
        if (!flags.semantic) {
          throw keyNotFound("getItem", key);
        }
        const template = ITEM_TEMPLATES.getItem;
        const result = await callBackend(
          "getItem",
          template.instruction,
          [serializePayload(self.value), String(key)],
          [self],
          {},
          { operator: template.symbol }
        );
        return wrapReply(result, template, undefined);
      },

      async setItem(key: ItemKey, item: Operand): Promise<void> {
        assertMutable("setItem", self.value);
        const payload = isValue(item) ? item.value : item;
        if (tryNative(() => nativeSet(self.value, key, payload)) === true) {
          return;
        }
        if (!flags.semantic) {
          throw keyNotFound("setItem", key);
        }
        const template = ITEM_TEMPLATES.setItem;
        const result = await callBackend(
          "setItem",
          template.instruction,
          [serializePayload(self.value), String(key), serializePayload(payload)],
          [self],
          {},
          { operator: template.symbol }
        );
        self.value = recoverReply(result.output, self.value);
        Object.assign(self.metadata, metadataFrom(result));
      },

      async deleteItem(key: ItemKey): Promise<void> {
        assertMutable("deleteItem", self.value);
        if (tryNative(() => nativeDelete(self.value, key)) === true) {
          return;
        }
        if (!flags.semantic) {
          throw keyNotFound("deleteItem", key);
        }
        const template = ITEM_TEMPLATES.deleteItem;
        const result = await callBackend(
          "deleteItem",
          template.instruction,
          [serializePayload(self.value), String(key)],
          [self],
          {},
          { operator: template.symbol }
        );
        self.value = recoverReply(result.output, self.value);
        Object.assign(self.metadata, metadataFrom(result));
      },

      syn: () => createValue(self.value, { ...flags, semantic: false }),
      sem: () => createValue(self.value, { ...flags, semantic: true }),

      interpret: (instruction = DEFAULT_INTERPRET_INSTRUCTION, options) =>
        semantic("interpret", instruction, options),

      query: (context, options) => semantic("query", context, options),

      analyze: (error, query = "", options = {}) =>
        semantic("analyze", query || "Analyze the error.", withError(options, error)),

      correct: (context, error, options = {}) =>
        semantic("correct", context, withError(options, error)),

      async embedding(): Promise<Vector | Vector[]> {
        if (self.metadata.embedding !== undefined) {
          return self.metadata.embedding;
        }
        // concurrent callers share one in-flight request; a failure is not cached
        if (!pendingEmbedding) {
          pendingEmbedding = embedPayload().then(
            (embedded) => {
              self.metadata.embedding = embedded;
              pendingEmbedding = undefined;
              return embedded;
            },
            (error: unknown) => {
              pendingEmbedding = undefined;
              throw error;
            }
          );
        }
        return pendingEmbedding;
      },

      async similarity(other, metric = "cosine", options = {}) {
        const left = await singleEmbedding("similarity");
        return metricSimilarity(left, await otherEmbedding(other), metric, options);
      },

      async distance(other, kernel = "gaussian", options = {}) {
        const left = await singleEmbedding("distance");
        return kernelDistance(left, await otherEmbedding(other), kernel, options);
      },
    };

    created.add(self);
    return self;
  }

  const runtime: ValueRuntime = {
    registry: config.registry,
    logger,
    neurosymbolicEngine,
    embeddingEngine,

    value(payload: Operand, flags?: Partial<ValueFlags>): SymbolicValue {
      if (isValue(payload)) {
        return flags ? createValue(payload.value, { ...payload.flags, ...flags }) : payload;
      }
      return createValue(payload, { ...defaults, ...flags });
    },

    isValue,

    engineLimits(): EngineLimits {
      const adapter = config.registry.resolve(neurosymbolicEngine);
      if (adapter.maxContextTokens === undefined) {
        throw new UnsupportedOperationError(
          "engineLimits",
          `Engine ${neurosymbolicEngine} does not report maxContextTokens.`
        );
      }
      return {
        tokenizer: adapter.tokenizer ?? createTiktokenTokenizer(),
        maxContextTokens: adapter.maxContextTokens,
      };
    },
  };

  return runtime;
}
