/**
 * Declarative output constraints: length bounds on text, on a field, or on
 * each element of a list field, plus free-form rules judged by the backend.
 */

import type { SchemaModel } from "../../stage-2-output-control/src/index.js";
import {
  isMapping,
  serializePayload,
  type Payload,
  type SymbolicValue,
} from "../../stage-3-symbolic-value/src/index.js";
import { ConstraintFieldError } from "./errors.js";
import type { Constraint, CustomConstraint, LengthConstraint } from "./types.js";

const ITEMS_SUFFIX = ".items";

export function lengthConstraint(options: {
  fieldName?: string;
  minLength: number;
  maxLength: number;
}): LengthConstraint {
  if (options.minLength > options.maxLength) {
    throw new RangeError(
      `minLength (${options.minLength}) must not exceed maxLength (${options.maxLength})`
    );
  }
  return { kind: "length", ...options };
}

export function customConstraint(rule: string): CustomConstraint {
  return { kind: "custom", rule };
}

/** Length in characters (code points). */
function charLength(text: string): number {
  return Array.from(text).length;
}

function outOfRange(length: number, c: LengthConstraint): boolean {
  return length < c.minLength || length > c.maxLength;
}

function checkText(text: string, c: LengthConstraint): string[] {
  const length = charLength(text);
  if (!outOfRange(length, c)) {
    return [];
  }
  const parts = [
    `The text must have between ${c.minLength} and ${c.maxLength} characters, but has ${length}.`,
  ];
  if (length < c.minLength) {
    parts.push(`Increase the length by at least ${c.minLength - length} characters.`);
  } else {
    parts.push(`Decrease the length by at least ${length - c.maxLength} characters.`);
  }
  return [parts.join(" ")];
}

function checkField(name: string, text: string, c: LengthConstraint): string[] {
  const length = charLength(text);
  if (!outOfRange(length, c)) {
    return [];
  }
  const parts = [
    `The field ${name} must have between ${c.minLength} and ${c.maxLength} characters, but has ${length}.`,
  ];
  if (length < c.minLength) {
    parts.push(`Increase the length of ${name} by at least ${c.minLength - length} characters.`);
  } else {
    parts.push(`Decrease the length of ${name} by at least ${length - c.maxLength} characters.`);
  }
  return [parts.join(" ")];
}

function checkItems(name: string, items: Payload[], c: LengthConstraint): string[] {
  const violations: string[] = [];
  items.forEach((item, idx) => {
    const length = charLength(serializePayload(item));
    if (!outOfRange(length, c)) {
      return;
    }
    const parts = [
      `Item ${idx} in list field ${name} must have between ${c.minLength} and ${c.maxLength} characters, but has ${length}.`,
    ];
    if (length < c.minLength) {
      parts.push(`Increase the length of item ${idx} by at least ${c.minLength - length} characters.`);
    } else {
      parts.push(`Decrease the length of item ${idx} by at least ${length - c.maxLength} characters.`);
    }
    violations.push(parts.join(" "));
  });
  return violations;
}

function checkCardinality(name: string, count: number, c: LengthConstraint): string[] {
  if (!outOfRange(count, c)) {
    return [];
  }
  const parts = [
    `The list field ${name} must have between ${c.minLength} and ${c.maxLength} items, but has ${count}.`,
  ];
  if (count < c.minLength) {
    parts.push(`Add at least ${c.minLength - count} more items to ${name}.`);
  } else {
    parts.push(`Remove at least ${count - c.maxLength} items from ${name}.`);
  }
  return [parts.join(" ")];
}

/**
 * Text candidates are always measured whole. Structured candidates are
 * measured on the named field; without a field name, on their serialized text.
 * A list field is checked per item (".items" suffix) or by its item count.
 */
export function checkLength(payload: Payload, c: LengthConstraint): string[] {
  if (typeof payload === "string") {
    return checkText(payload, c);
  }
  if (!isMapping(payload) || !c.fieldName) {
    return checkText(serializePayload(payload), c);
  }

  const itemsConstraint = c.fieldName.endsWith(ITEMS_SUFFIX);
  const name = itemsConstraint ? c.fieldName.slice(0, -ITEMS_SUFFIX.length) : c.fieldName;
  if (!Object.hasOwn(payload, name)) {
    throw new ConstraintFieldError(name);
  }

  const field = payload[name];
  if (Array.isArray(field)) {
    return itemsConstraint ? checkItems(name, field, c) : checkCardinality(name, field.length, c);
  }
  // scalars and nested mappings are measured by their serialized text
  return checkField(name, serializePayload(field), c);
}

export function renderContent<T>(payload: Payload, model?: SchemaModel<T>): string {
  if (typeof payload === "string") {
    return payload;
  }
  if (model && model.is(payload)) {
    return model.serialize(payload);
  }
  return serializePayload(payload);
}

const PASS_VERDICT = /^\W*PASS\W*$/i;

/** Only a bare PASS counts, optionally quoted or punctuated. */
export function isPassVerdict(reply: string): boolean {
  return PASS_VERDICT.test(reply.trim());
}

async function checkCustom<T>(
  candidate: SymbolicValue,
  c: CustomConstraint,
  model?: SchemaModel<T>
): Promise<string[]> {
  const content = renderContent(candidate.value, model);
  const instruction =
    `Validate if the content in [DATA] meets this rule: "${c.rule}"\n\n` +
    `Respond with only "PASS" if the content meets the rule, or provide a specific explanation of why it fails.`;
  const verdict = await candidate.runtime
    .value(content, candidate.flags)
    .interpret(instruction, { temperature: 0 });
  const reply = verdict.toString();
  if (isPassVerdict(reply)) {
    return [];
  }
  return [`Custom constraint violation: ${c.rule} - ${reply}`];
}

/** Every constraint is evaluated; all violations are returned. */
export async function checkConstraints<T>(
  candidate: SymbolicValue,
  constraints: Constraint[],
  model?: SchemaModel<T>
): Promise<string[]> {
  const violations: string[] = [];
  for (const constraint of constraints) {
    if (constraint.kind === "length") {
      violations.push(...checkLength(candidate.value, constraint));
    } else {
      violations.push(...(await checkCustom(candidate, constraint, model)));
    }
  }
  return violations;
}

export function describeConstraint(c: Constraint): string {
  if (c.kind === "custom") {
    return `The content must satisfy this rule: "${c.rule}"`;
  }
  const subject = c.fieldName ? `field '${c.fieldName}'` : "text";
  return `The ${subject} must have between ${c.minLength} and ${c.maxLength} characters.`;
}

export function wrapTask(
  task: string,
  output: string,
  violations: string[],
  constraints: Constraint[]
): string {
  const lines = [
    `Your task was the following: \n\n${task}\n`,
    `Your output was the following: \n\n${output}\n`,
    "You must adhere to ALL of the following constraints:",
    ...constraints.map((c) => `- ${describeConstraint(c)}`),
  ];
  if (violations.length > 0) {
    lines.push("\nThe following constraints were violated:");
    lines.push(...violations.map((v) => `- ${v}`));
  } else {
    lines.push("\nNo constraints were violated, but you must continue to adhere to all constraints.");
  }
  lines.push("\nFollow the original task and make sure to adhere to ALL constraints listed above.");
  return lines.join("\n");
}
