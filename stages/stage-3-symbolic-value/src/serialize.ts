/**
 * Payload <-> text conversion at the backend boundary.
 */

import { recoverStructure } from "../../stage-2-output-control/src/index.js";
import type { EngineOutput } from "../../stage-0-engine/src/index.js";
import { isMapping } from "./native.js";
import type { Payload, PayloadMapping } from "./types.js";

function replacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Array.from(value);
  }
  return value;
}

/** Text form sent to the backend: strings verbatim, everything else as JSON. */
export function serializePayload(payload: Payload): string {
  if (typeof payload === "string") {
    return payload;
  }
  if (payload === undefined || payload === null) {
    return "None";
  }
  if (typeof payload === "bigint") {
    return payload.toString();
  }
  return JSON.stringify(payload, replacer);
}

/** Narrow parsed JSON (or any plain data) into a Payload. */
export function toPayload(data: unknown): Payload {
  if (
    data === null ||
    data === undefined ||
    typeof data === "string" ||
    typeof data === "number" ||
    typeof data === "boolean" ||
    typeof data === "bigint"
  ) {
    return data;
  }
  if (data instanceof Uint8Array) {
    return data;
  }
  if (Array.isArray(data)) {
    return data.map(toPayload);
  }
  if (typeof data === "object") {
    const out: PayloadMapping = {};
    for (const [key, item] of Object.entries(data)) {
      out[key] = toPayload(item);
    }
    return out;
  }
  return String(data);
}

/**
 * Parse a backend reply back into the shape of `template`: arrays and
 * mappings are recovered from embedded JSON, numbers from numeric text.
 * Falls back to the reply text.
 */
export function recoverReply(output: EngineOutput, template: Payload): Payload {
  if (typeof output !== "string") {
    return toPayload(output);
  }
  if (Array.isArray(template)) {
    return toPayload(recoverStructure(output, "array") ?? output);
  }
  if (isMapping(template)) {
    return toPayload(recoverStructure(output, "object") ?? output);
  }
  if (typeof template === "number") {
    const trimmed = output.trim();
    const parsed = Number(trimmed);
    if (trimmed !== "" && Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return output;
}

export function outputText(output: EngineOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}
