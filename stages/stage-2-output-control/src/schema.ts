/**
 * ajv-backed schema model: strict JSON parse, full violation list, typed result.
 */

import { SchemaValidationError } from "./errors.js";
import type { JsonSchema, SchemaModel } from "./types.js";
import { collectViolations, compileSchema, renderReceived } from "./validate.js";

export function createSchemaModel<T = unknown>(schema: JsonSchema): SchemaModel<T> {
  const check = compileSchema<T>(schema);

  return {
    schema,

    validate(text: string): T {
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (err) {
        const message = err instanceof Error ? err.message : "JSON parse failed";
        throw new SchemaValidationError(
          [
            {
              path: "(root)",
              message: `Invalid JSON: ${message}`,
              expectedType: "json",
              received: renderReceived(text),
            },
          ],
          { cause: err }
        );
      }
      if (check(data)) {
        return data;
      }
      throw new SchemaValidationError(collectViolations(check.errors));
    },

    is(value: unknown): value is T {
      return check(value);
    },

    serialize(instance: T): string {
      return JSON.stringify(instance);
    },

    describeSchema(): string {
      return JSON.stringify(schema, null, 2);
    },
  };
}
