/**
 * Semantic request templates. Every backend-resolved operation carries its
 * operation tag, operator symbol and an instruction; operands travel as text.
 */

import type { BinaryOperation, ItemOperation, UnaryOperation } from "./types.js";

export type ReplyKind = "boolean" | "value";

export interface OperationTemplate {
  symbol: string;
  instruction: string;
  reply: ReplyKind;
}

const BOOLEAN_SUFFIX = "Answer only with 'true' or 'false'.";

export const BINARY_TEMPLATES: Record<BinaryOperation, OperationTemplate> = {
  equals: {
    symbol: "==",
    instruction: `Decide whether OPERAND 1 and OPERAND 2 are equal in meaning. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  notEquals: {
    symbol: "!=",
    instruction: `Decide whether OPERAND 1 and OPERAND 2 differ in meaning. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  greaterThan: {
    symbol: ">",
    instruction: `Decide whether OPERAND 1 is greater than OPERAND 2 in context. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  lessThan: {
    symbol: "<",
    instruction: `Decide whether OPERAND 1 is less than OPERAND 2 in context. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  greaterOrEqual: {
    symbol: ">=",
    instruction: `Decide whether OPERAND 1 is greater than or equal to OPERAND 2 in context. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  lessOrEqual: {
    symbol: "<=",
    instruction: `Decide whether OPERAND 1 is less than or equal to OPERAND 2 in context. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  contains: {
    symbol: "in",
    instruction: `Decide whether OPERAND 1 contains OPERAND 2, literally or by meaning. ${BOOLEAN_SUFFIX}`,
    reply: "boolean",
  },
  add: {
    symbol: "+",
    instruction: "Combine OPERAND 1 and OPERAND 2 into one coherent result. Return only the result.",
    reply: "value",
  },
  subtract: {
    symbol: "-",
    instruction: "Remove the content of OPERAND 2 from OPERAND 1. Return only the result.",
    reply: "value",
  },
  multiply: {
    symbol: "*",
    instruction: "Find what OPERAND 1 and OPERAND 2 have in common. Return only the result.",
    reply: "value",
  },
  divide: {
    symbol: "/",
    instruction: "Split OPERAND 1 by OPERAND 2. Return only the resulting parts.",
    reply: "value",
  },
  modulo: {
    symbol: "%",
    instruction: "Return what is left of OPERAND 1 after removing every part described by OPERAND 2.",
    reply: "value",
  },
  power: {
    symbol: "**",
    instruction: "Apply OPERAND 2 to OPERAND 1 repeatedly and return only the result.",
    reply: "value",
  },
  and: {
    symbol: "&",
    instruction: "Return the logical conjunction of the statements in OPERAND 1 and OPERAND 2.",
    reply: "value",
  },
  or: {
    symbol: "|",
    instruction: "Return the logical disjunction of the statements in OPERAND 1 and OPERAND 2.",
    reply: "value",
  },
  xor: {
    symbol: "^",
    instruction: "Return the exclusive disjunction of the statements in OPERAND 1 and OPERAND 2.",
    reply: "value",
  },
};

export const UNARY_TEMPLATES: Record<UnaryOperation, OperationTemplate> = {
  negate: {
    symbol: "-",
    instruction: "Return the negation of the statement. Return only the result.",
    reply: "value",
  },
  invert: {
    symbol: "~",
    instruction: "Return the opposite meaning of the statement. Return only the result.",
    reply: "value",
  },
};

export const ITEM_TEMPLATES: Record<ItemOperation, OperationTemplate> = {
  getItem: {
    symbol: "[]",
    instruction: "Return only the entry of OPERAND 1 addressed by the key in OPERAND 2.",
    reply: "value",
  },
  setItem: {
    symbol: "[]=",
    instruction:
      "Set the entry of OPERAND 1 addressed by the key in OPERAND 2 to OPERAND 3. Return the complete updated OPERAND 1 in the same format.",
    reply: "value",
  },
  deleteItem: {
    symbol: "del",
    instruction:
      "Remove the entry of OPERAND 1 addressed by the key in OPERAND 2. Return the complete updated OPERAND 1 in the same format.",
    reply: "value",
  },
};

export const DEFAULT_INTERPRET_INSTRUCTION =
  "Evaluate the symbolic expressions and return only the result:";

const TRUE_REPLY = /^\s*["'`]?(true|yes)\b/i;

export function parseBooleanReply(reply: string): boolean {
  return TRUE_REPLY.test(reply);
}
