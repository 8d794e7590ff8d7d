/**
 * Bounded self-correction: run, and on failure ask the backend what went
 * wrong, have it correct the original input, then run again.
 *
 * running -> success
 * running -> correcting -> running
 * running -> exhausted (rethrows the original error unchanged)
 */

import { describeError } from "../../stage-0-engine/src/index.js";
import type { SymbolicValue } from "../../stage-3-symbolic-value/src/index.js";
import { logAttempt } from "./log.js";
import type { CorrectableOperation, CorrectionOptions } from "./types.js";

const ANALYSIS_QUERY = "What is the issue in this expression?";

export async function runWithCorrection(
  operation: CorrectableOperation,
  input: SymbolicValue,
  options: CorrectionOptions = {}
): Promise<SymbolicValue> {
  const retries = options.retries ?? 1;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new RangeError(`retries must be a non-negative integer, got ${retries}`);
  }
  const logger = options.logger ?? input.runtime.logger;
  const onAttempt = options.onAttempt ?? (() => undefined);
  const promptBlock = operation.instruction
    ? `[ORIGINAL_USER_PROMPT]\n${operation.instruction}\n\n`
    : "";

  let current = input;
  let lastOutput: string;
  let failures = 0;

  while (true) {
    const attempt = failures + 1;
    lastOutput = "";
    onAttempt({ attempt }, "running");
    try {
      const result = await operation.run(current, {
        attempt,
        reportOutput: (output) => {
          lastOutput = output;
        },
      });
      logAttempt(logger, "self-correction", attempt, "passed");
      onAttempt({ attempt, result }, "success");
      return result;
    } catch (error) {
      failures += 1;
      const detail = describeError(error).message;
      if (failures > retries) {
        logAttempt(logger, "self-correction", attempt, "exhausted", detail);
        onAttempt({ attempt, error }, "exhausted");
        throw error;
      }
      logAttempt(logger, "self-correction", attempt, "failed", detail);

      const diagnostic =
        `${promptBlock}[ORIGINAL_USER_DATA]\n${input.toString()}\n\n` +
        `[ORIGINAL_GENERATED_OUTPUT]\n${lastOutput}`;
      const analysis = await current.analyze(error, ANALYSIS_QUERY, { payload: diagnostic });

      const payload = `${promptBlock}[ANALYSIS]\n${analysis.toString()}\n\n`;
      const context =
        "Try to correct the error of the original user request based on the analysis above: \n" +
        ` [GENERATED_OUTPUT]\n${lastOutput}\n\n`;
      onAttempt({ attempt, prompt: payload, analysis: analysis.toString(), error }, "correcting");

      current = await input.correct(context, error, {
        payload,
        constraints: operation.constraints,
      });
    }
  }
}
