/**
 * Validate parsed data against JSON Schema (using ajv), reporting every violation.
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";
import type { JsonSchema, SchemaViolation } from "./types.js";

interface AjvOptions {
  allErrors?: boolean;
  verbose?: boolean;
  strict?: boolean;
}

interface AjvInstance {
  compile<T = unknown>(schema: JsonSchema): ValidateFunction<T>;
}

const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (
        AjvImport as unknown as {
          default: new (opts?: AjvOptions) => AjvInstance;
        }
      ).default
) as new (opts?: AjvOptions) => AjvInstance;

const MAX_RECEIVED_LENGTH = 200;

export function compileSchema<T>(schema: JsonSchema): ValidateFunction<T> {
  const ajv = new AjvConstructor({ allErrors: true, verbose: true, strict: false });
  return ajv.compile<T>(schema);
}

function schemaType(schema: unknown): string | undefined {
  if (typeof schema !== "object" || schema === null) {
    return undefined;
  }
  const type: unknown = Reflect.get(schema, "type");
  if (typeof type === "string") {
    return type;
  }
  if (Array.isArray(type)) {
    return type.map(String).join(" | ");
  }
  return undefined;
}

export function renderReceived(value: unknown): string {
  let text: string;
  if (value === undefined) {
    text = "undefined";
  } else if (typeof value === "string") {
    text = JSON.stringify(value);
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length > MAX_RECEIVED_LENGTH
    ? `${text.slice(0, MAX_RECEIVED_LENGTH)}...`
    : text;
}

function toPath(segments: string[]): string {
  return segments.length > 0 ? segments.join(" -> ") : "(root)";
}

function pointerSegments(instancePath: string): string[] {
  if (!instancePath) {
    return [];
  }
  return instancePath
    .split("/")
    .slice(1)
    .map((s) => s.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function toViolation(error: ErrorObject): SchemaViolation {
  const segments = pointerSegments(error.instancePath);
  const params: Record<string, unknown> = error.params;

  if (error.keyword === "required" && typeof params.missingProperty === "string") {
    const missing = params.missingProperty;
    const properties: unknown = error.parentSchema
      ? Reflect.get(error.parentSchema, "properties")
      : undefined;
    const propertySchema: unknown =
      typeof properties === "object" && properties !== null
        ? Reflect.get(properties, missing)
        : undefined;
    return {
      path: toPath([...segments, missing]),
      message: "Field required",
      expectedType: schemaType(propertySchema) ?? "unknown",
      received: "missing",
    };
  }

  const expectedType =
    error.keyword === "type"
      ? schemaType({ type: params.type }) ?? "unknown"
      : schemaType(error.parentSchema) ?? error.keyword;

  return {
    path: toPath(segments),
    message: error.message ?? error.keyword,
    expectedType,
    received: renderReceived(error.data),
  };
}

export function collectViolations(
  errors: ErrorObject[] | null | undefined
): SchemaViolation[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map(toViolation);
}

/** `Field '<path>': <message>. Expected type: <type>. Provided value: <value>.` */
export function renderViolation(violation: SchemaViolation): string {
  return `Field '${violation.path}': ${violation.message}. Expected type: ${violation.expectedType}. Provided value: ${violation.received}.`;
}

export function renderViolations(violations: SchemaViolation[]): string {
  return violations.map(renderViolation).join("\n");
}
