/**
 * Constraint enforcement loop: evaluate every constraint, and while any is
 * violated, regenerate from a task that restates all of them.
 */

import { describeError } from "../../stage-0-engine/src/index.js";
import {
  cleanCandidate,
  prepareSeeds,
  renderViolations,
  SchemaValidationError,
  type SchemaModel,
} from "../../stage-2-output-control/src/index.js";
import {
  toPayload,
  type SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";
import { checkConstraints, renderContent, wrapTask } from "./constraints.js";
import { ConstraintExhaustedError, UnexpectedResponseShapeError } from "./errors.js";
import { logAttempt } from "./log.js";
import type {
  Constraint,
  ConstraintLoopOptions,
  ConstraintOutcome,
} from "./types.js";

type Reparsed =
  | { ok: true; candidate: SymbolicValue }
  | { ok: false; candidate: SymbolicValue; violation: string };

/** Strictly parse regenerated text back into the structured type. */
function reparse<T>(
  regenerated: SymbolicValue,
  model: SchemaModel<T>,
  attempt: number
): Reparsed {
  const text = typeof regenerated.value === "string" ? regenerated.value : "";
  try {
    const data = model.validate(cleanCandidate(text));
    return { ok: true, candidate: regenerated.runtime.value(toPayload(data), regenerated.flags) };
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      return {
        ok: false,
        candidate: regenerated,
        violation: `Output is not valid for the schema: ${renderViolations(error.violations)}`,
      };
    }
    throw new UnexpectedResponseShapeError(
      `Unexpected response shape on attempt ${attempt}: ${describeError(error).message}`,
      { cause: error }
    );
  }
}

export async function enforceConstraints<T = unknown>(
  value: SymbolicValue,
  constraints: Constraint | Constraint[],
  options: ConstraintLoopOptions<T> = {}
): Promise<ConstraintOutcome> {
  const all = Array.isArray(constraints) ? constraints : [constraints];
  const retryCount = options.retryCount ?? 5;
  if (!Number.isInteger(retryCount) || retryCount < 1) {
    throw new RangeError(`retryCount must be a positive integer, got ${retryCount}`);
  }
  const logger = options.logger ?? value.runtime.logger;
  const seeds = prepareSeeds(retryCount, options.seed);
  const { model } = options;
  const task = options.task ?? renderContent(value.value, model);

  let candidate =
    options.prompt !== undefined ? value.runtime.value(options.prompt, value.flags) : value;
  // 结构化候选的回复需要按 model 重新解析
  const structured = model !== undefined && typeof candidate.value !== "string";
  let parseViolation: string | undefined;
  let lastViolations: string[] = [];

  for (let i = 0; i < retryCount; i++) {
    const attempt = i + 1;
    // an unparseable reply is not checked against the constraints
    const violations =
      parseViolation !== undefined
        ? [parseViolation]
        : await checkConstraints(candidate, all, model);

    if (violations.length === 0) {
      logAttempt(logger, "constraint-enforcement", attempt, "passed");
      options.onAttempt?.({ attempt, result: candidate });
      return { value: candidate, attempts: attempt };
    }

    lastViolations = violations;
    const remedy = wrapTask(task, renderContent(candidate.value, model), violations, all);
    options.onAttempt?.({ attempt, prompt: remedy });

    if (attempt === retryCount) {
      break;
    }
    logAttempt(logger, "constraint-enforcement", attempt, "failed", violations.join(" | "));

    const regenerated = await value.interpret(remedy, {
      ...options.generation,
      seed: seeds[i],
    });
    parseViolation = undefined;
    candidate = regenerated;
    if (model && structured && typeof regenerated.value === "string") {
      const reparsed = reparse(regenerated, model, attempt + 1);
      candidate = reparsed.candidate;
      if (!reparsed.ok) {
        parseViolation = reparsed.violation;
      }
    }
  }

  logAttempt(
    logger,
    "constraint-enforcement",
    retryCount,
    "exhausted",
    lastViolations.join(" | ")
  );
  throw new ConstraintExhaustedError(lastViolations, retryCount);
}
