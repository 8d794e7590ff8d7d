/**
 * Schema validation loop: parse a candidate into a schema-typed instance,
 * regenerating from a remedy prompt with per-attempt seeds until it fits.
 */

import { describeError } from "../../stage-0-engine/src/index.js";
import {
  cleanCandidate,
  prepareSeeds,
  renderViolations,
  SchemaValidationError,
  type SchemaModel,
  type SchemaViolation,
} from "../../stage-2-output-control/src/index.js";
import {
  isMapping,
  serializePayload,
  toPayload,
  type Payload,
  type SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";
import { UnexpectedResponseShapeError, ValidationExhaustedError } from "./errors.js";
import { logAttempt } from "./log.js";
import type { ValidationLoopOptions, ValidationOutcome } from "./types.js";

export const JSON_FIX_CONTEXT = `[Task]
You are tasked with fixing a string that is meant to be JSON but contains errors.
Correct the errors so the string is valid JSON that satisfies the given JSON schema.

1. Parse the provided string and use the list of validation errors to find what needs fixing.
2. Correct those errors to produce well-formed JSON.
3. Make sure the corrected JSON complies fully with the JSON schema.
4. Keep the original keys and values wherever they already comply with the schema.
5. Change structure or values only where the schema requires it.
6. Return only the corrected JSON.

[Requirements]
- The output must be valid, well-formatted JSON.
- Do not add data or change the intent of the original content unless the schema requires it.
- Keep every change minimal.`;

type ValidationStep<T> =
  | { ok: true; data: T }
  | { ok: false; error: SchemaValidationError };

/** Canonical text for a candidate, before strict parsing. */
export function normalizeCandidate<T>(payload: Payload, model: SchemaModel<T>): string {
  if (typeof payload === "string") {
    return cleanCandidate(payload);
  }
  if (model.is(payload)) {
    return model.serialize(payload);
  }
  if (isMapping(payload)) {
    return serializePayload(payload);
  }
  return cleanCandidate(serializePayload(payload));
}

export function buildRemedyPrompt(
  text: string,
  rendered: string,
  schemaText: string
): string {
  return (
    `[Original Input]\n\`\`\`json\n${text}\n\`\`\`\n` +
    `[Validation Errors]\n${rendered}\n` +
    `[JSON Schema]\n${schemaText}\n`
  );
}

function tryValidate<T>(model: SchemaModel<T>, text: string, attempt: number): ValidationStep<T> {
  try {
    return { ok: true, data: model.validate(text) };
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      return { ok: false, error };
    }
    throw new UnexpectedResponseShapeError(
      `Unexpected response shape on attempt ${attempt}: ${describeError(error).message}`,
      { cause: error }
    );
  }
}

export async function validateWithSchema<T>(
  value: SymbolicValue,
  model: SchemaModel<T>,
  options: ValidationLoopOptions = {}
): Promise<ValidationOutcome<T>> {
  const retryCount = options.retryCount ?? 5;
  if (!Number.isInteger(retryCount) || retryCount < 1) {
    throw new RangeError(`retryCount must be a positive integer, got ${retryCount}`);
  }
  const logger = options.logger ?? value.runtime.logger;
  const seeds = prepareSeeds(retryCount, options.seed);
  const schemaText = model.describeSchema();

  let candidate =
    options.prompt !== undefined ? value.runtime.value(options.prompt, value.flags) : value;
  let lastViolations: SchemaViolation[] = [];
  let lastRendered = "";

  for (let i = 0; i < retryCount; i++) {
    const attempt = i + 1;
    const text = normalizeCandidate(candidate.value, model);
    const step = tryValidate(model, text, attempt);

    if (step.ok) {
      logAttempt(logger, "schema-validation", attempt, "passed");
      const validated = value.runtime.value(toPayload(step.data), value.flags);
      Object.assign(validated.metadata, {
        raw: candidate.metadata.raw,
        usage: candidate.metadata.usage,
      });
      options.onAttempt?.({ attempt, result: validated });
      return { value: validated, data: step.data, attempts: attempt };
    }

    lastViolations = step.error.violations;
    lastRendered = renderViolations(lastViolations);
    const remedy = buildRemedyPrompt(text, lastRendered, schemaText);
    options.onAttempt?.({ attempt, prompt: remedy, error: step.error });

    // 最后一次失败后不再重新生成
    if (attempt === retryCount) {
      break;
    }
    logAttempt(logger, "schema-validation", attempt, "failed", `${lastViolations.length} violation(s)`);

    candidate = await value.interpret(remedy, {
      ...options.generation,
      staticContext: JSON_FIX_CONTEXT,
      seed: seeds[i],
      responseFormat: "json_object",
    });
  }

  logAttempt(logger, "schema-validation", retryCount, "exhausted", lastRendered);
  throw new ValidationExhaustedError(lastViolations, lastRendered, retryCount);
}
