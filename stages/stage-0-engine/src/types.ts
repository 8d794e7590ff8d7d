/**
 * Stage 0 Engine types.
 * An engine adapter wraps one generative backend behind a uniform
 * prepare -> forward contract; the core never sees provider wire formats.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Capability ids the core resolves adapters by. */
export type EngineCapability = "neurosymbolic" | "embedding";

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

/** Capability-tagged request issued by the core. */
export interface EngineRequest {
  /** Operation tag, e.g. "compare", "getitem", "interpret". */
  operation: string;
  /** Task instruction rendered by the core. */
  instruction: string;
  /** Serialized operand payloads, in order. */
  operands: string[];
  /** Extra context block (diagnostic payloads, remedy material). */
  payload?: string;
  /** Task-level rules prepended as a system message. */
  staticContext?: string;
  /** Output constraints the backend should respect. */
  constraints?: string[];
  /** Operation attributes such as the comparison operator. */
  attributes?: Record<string, string>;
  seed?: number;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "text" | "json_object";
  /** Render the request without calling the backend. */
  preview?: boolean;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CostEstimate {
  inputCents: number;
  outputCents: number;
  totalCents: number;
  currency: "USD";
}

export interface EngineMetadata {
  engineId: string;
  model?: string;
  requestId: string;
  durationMs: number;
  usage?: Usage;
  cost?: CostEstimate;
  finishReason?: string;
  preview?: boolean;
  /**
   * Raw backend response, kept for usage accounting and replay only.
   */
  raw?: unknown;
}

export type EngineOutput = string | JsonValue;

export interface EngineResult {
  output: EngineOutput;
  metadata: EngineMetadata;
}

/** Fallback invoked when a backend call raises and nothing else handles it. */
export type RemedyHandler = (
  error: unknown,
  request: EngineRequest
) => Promise<EngineResult | undefined>;

export interface EngineCommandOptions {
  model?: string;
  seed?: number;
  remedy?: RemedyHandler;
  temperature?: number;
}

/** Tokenizer boundary used for chunking and context checks. */
export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export interface EngineAdapter<TPrepared = unknown> {
  id(): string;
  command(options: EngineCommandOptions): void;
  prepare(request: EngineRequest): TPrepared;
  forward(prepared: TPrepared): Promise<EngineResult>;
  /** Text form of a prepared request, used for preview runs. */
  render?(prepared: TPrepared): string;
  readonly tokenizer?: Tokenizer;
  readonly maxContextTokens?: number;
}

export interface RetryOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  /** Fraction of the delay added or removed at random. */
  jitter?: number;
  onRetry?: (event: { attempt: number; delayMs: number; error: unknown }) => void;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  engineId: string;
  operation: string;
  model?: string;
  preview?: boolean;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  engineId: string;
  operation: string;
  model?: string;
  durationMs: number;
  usage?: Usage;
  cost?: CostEstimate;
  finishReason?: string;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  engineId: string;
  operation: string;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export type AttemptStatus = "passed" | "failed" | "exhausted";

export interface AttemptLog {
  timestamp: string;
  loop: string;
  attempt: number;
  status: AttemptStatus;
  detail?: string;
}

export interface Logger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
  logAttempt(entry: AttemptLog): void;
}

export interface CostTableEntry {
  inputCentsPer1k: number;
  outputCentsPer1k: number;
  currency?: "USD";
}

export type CostTable = Record<string, CostTableEntry>;

export interface UsageSnapshot {
  callCount: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  totalCents: number;
}

export interface UsageTracker {
  record(metadata: EngineMetadata): void;
  getEngineUsage(engineId: string): UsageSnapshot;
  getTotalUsage(): UsageSnapshot;
  reset(): void;
}

export interface EngineRegistryConfig {
  logger?: Logger;
  usageTracker?: UsageTracker;
}

/** Explicit registry handed to every component that resolves adapters. */
export interface EngineRegistry {
  register(adapter: EngineAdapter): void;
  has(id: string): boolean;
  resolve(id: string): EngineAdapter;
  list(): string[];
  /** Forward `options` to one adapter, or to every adapter when `id` is "all". */
  command(id: string, options: EngineCommandOptions): void;
  call(id: string, request: EngineRequest): Promise<EngineResult>;
}
