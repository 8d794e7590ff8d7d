import { describe, expect, it, vi } from "vitest";
import {
  createEngineRegistry,
  createScriptedEngine,
  createSilentLogger,
  type ScriptedResponse,
} from "../../stage-0-engine/src/index.js";
import {
  createSchemaModel,
  prepareSeeds,
  type SchemaModel,
} from "../../stage-2-output-control/src/index.js";
import { createValueRuntime } from "../../stage-3-symbolic-value/src/index.js";
import {
  checkLength,
  ConstraintExhaustedError,
  ConstraintFieldError,
  customConstraint,
  enforceConstraints,
  isPassVerdict,
  JSON_FIX_CONTEXT,
  lengthConstraint,
  runWithCorrection,
  UnexpectedResponseShapeError,
  validateWithSchema,
  ValidationExhaustedError,
  type CorrectionState,
} from "../src/index.js";

function setup(responses: ScriptedResponse[] = []) {
  const engine = createScriptedEngine({ responses });
  const registry = createEngineRegistry({ logger: createSilentLogger() });
  registry.register(engine);
  return { engine, runtime: createValueRuntime({ registry }) };
}

interface Person {
  name: string;
  age: number;
}

const personModel: SchemaModel<Person> = createSchemaModel<Person>({
  type: "object",
  properties: {
    name: { type: "string" },
    age: { type: "integer" },
  },
  required: ["name", "age"],
  additionalProperties: false,
});

describe("runWithCorrection", () => {
  it("rethrows immediately when no retries are allowed", async () => {
    const { engine, runtime } = setup();
    const failure = new Error("boom");
    const run = vi.fn(async () => {
      throw failure;
    });

    await expect(
      runWithCorrection({ run }, runtime.value("x"), { retries: 0 })
    ).rejects.toBe(failure);
    expect(run).toHaveBeenCalledTimes(1);
    expect(engine.calls).toHaveLength(0);
  });

  it("analyzes, corrects and succeeds on the second attempt", async () => {
    const { engine, runtime } = setup(["missing FROM clause", "SELECT * FROM t"]);
    const states: CorrectionState[] = [];

    const result = await runWithCorrection(
      {
        instruction: "Write SQL",
        run: async (input, context) => {
          if (context.attempt === 1) {
            context.reportOutput("SELECT *");
            throw new Error("syntax error");
          }
          return input;
        },
      },
      runtime.value("list users"),
      { onAttempt: (_attempt, state) => states.push(state) }
    );

    expect(result.value).toBe("SELECT * FROM t");
    expect(states).toEqual(["running", "correcting", "running", "success"]);
    expect(engine.calls).toHaveLength(2);

    const [analysis, correction] = engine.calls;
    expect(analysis.operation).toBe("analyze");
    expect(analysis.instruction).toBe("What is the issue in this expression?");
    expect(analysis.operands).toEqual(["list users"]);
    expect(analysis.payload).toBe(
      "[ORIGINAL_USER_PROMPT]\nWrite SQL\n\n" +
        "[ORIGINAL_USER_DATA]\nlist users\n\n" +
        "[ORIGINAL_GENERATED_OUTPUT]\nSELECT *\n\n" +
        "[ERROR]\nError: syntax error"
    );

    expect(correction.operation).toBe("correct");
    expect(correction.instruction).toBe(
      "Try to correct the error of the original user request based on the analysis above: \n" +
        " [GENERATED_OUTPUT]\nSELECT *\n\n"
    );
    expect(correction.operands).toEqual(["list users"]);
    expect(correction.payload).toBe(
      "[ORIGINAL_USER_PROMPT]\nWrite SQL\n\n" +
        "[ANALYSIS]\nmissing FROM clause\n\n" +
        "\n\n[ERROR]\nError: syntax error"
    );
  });

  it("rethrows the last error once retries are used up", async () => {
    const { engine, runtime } = setup(["analysis", "corrected"]);

    await expect(
      runWithCorrection(
        {
          run: async (_input, context) => {
            throw new Error(`fail ${context.attempt}`);
          },
        },
        runtime.value("input")
      )
    ).rejects.toThrow("fail 2");
    expect(engine.calls).toHaveLength(2);
  });

  it("does not carry a reported output into a later attempt", async () => {
    const { engine, runtime } = setup(["analysis 1", "corrected 1", "analysis 2", "corrected 2"]);

    const result = await runWithCorrection(
      {
        run: async (input, context) => {
          if (context.attempt === 1) {
            context.reportOutput("first");
          }
          if (context.attempt < 3) {
            throw new Error(`fail ${context.attempt}`);
          }
          return input;
        },
      },
      runtime.value("input"),
      { retries: 2 }
    );

    expect(result.value).toBe("corrected 2");
    expect(engine.calls).toHaveLength(4);
    expect(engine.calls[0].payload).toBe(
      "[ORIGINAL_USER_DATA]\ninput\n\n[ORIGINAL_GENERATED_OUTPUT]\nfirst\n\n[ERROR]\nError: fail 1"
    );
    expect(engine.calls[2].payload).toBe(
      "[ORIGINAL_USER_DATA]\ninput\n\n[ORIGINAL_GENERATED_OUTPUT]\n\n\n[ERROR]\nError: fail 2"
    );
    expect(engine.calls[3].instruction).toBe(
      "Try to correct the error of the original user request based on the analysis above: \n" +
        " [GENERATED_OUTPUT]\n\n\n"
    );
  });

  it("rejects a negative retry count", async () => {
    const { runtime } = setup();
    await expect(
      runWithCorrection({ run: async (input) => input }, runtime.value("x"), { retries: -1 })
    ).rejects.toThrow(RangeError);
  });
});

describe("validateWithSchema", () => {
  it("accepts a fenced candidate without calling the backend", async () => {
    const { engine, runtime } = setup();
    const outcome = await validateWithSchema(
      runtime.value('```json\n{"name": "Ada", "age": 36}\n```'),
      personModel
    );

    expect(outcome.attempts).toBe(1);
    expect(outcome.data).toEqual({ name: "Ada", age: 36 });
    expect(outcome.value.value).toEqual({ name: "Ada", age: 36 });
    expect(engine.calls).toHaveLength(0);
  });

  it("regenerates with per-attempt seeds until the candidate fits", async () => {
    const { engine, runtime } = setup([
      '{"name": "Ada", "age": "x"}',
      '{"name": "Ada", "age": 36}',
      "unused",
    ]);
    const seeds = prepareSeeds(5, 7);

    const outcome = await validateWithSchema(runtime.value('{"name": "Ada"}'), personModel, {
      seed: 7,
    });

    expect(outcome.attempts).toBe(3);
    expect(outcome.data).toEqual({ name: "Ada", age: 36 });
    expect(outcome.value.metadata.raw).toEqual({ output: '{"name": "Ada", "age": 36}', call: 2 });
    expect(engine.calls).toHaveLength(2);

    const [first, second] = engine.calls;
    expect(first.operation).toBe("interpret");
    expect(first.seed).toBe(seeds[0]);
    expect(second.seed).toBe(seeds[1]);
    expect(first.staticContext).toBe(JSON_FIX_CONTEXT);
    expect(first.responseFormat).toBe("json_object");
    expect(first.instruction).toBe(
      '[Original Input]\n```json\n{"name": "Ada"}\n```\n' +
        "[Validation Errors]\nField 'age': Field required. Expected type: integer. Provided value: missing.\n" +
        `[JSON Schema]\n${personModel.describeSchema()}\n`
    );
    expect(second.instruction).toContain(
      "Field 'age': must be integer. Expected type: integer. Provided value: \"x\"."
    );
  });

  it("fails after the last attempt without regenerating again", async () => {
    const { engine, runtime } = setup(["still not json"]);

    const failure = await validateWithSchema(runtime.value("not json"), personModel, {
      retryCount: 2,
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ValidationExhaustedError);
    if (failure instanceof ValidationExhaustedError) {
      expect(failure.attempts).toBe(2);
      expect(failure.violations[0].path).toBe("(root)");
      expect(failure.message).toMatch(
        /^Failed to retrieve valid JSON after 2 attempt\(s\): Field '\(root\)': Invalid JSON/
      );
    }
    expect(engine.calls).toHaveLength(1);
  });

  it("does not retry failures that are not schema violations", async () => {
    const { engine, runtime } = setup(["unused"]);
    const broken: SchemaModel<Person> = {
      ...personModel,
      validate: () => {
        throw new TypeError("bad shape");
      },
    };

    await expect(validateWithSchema(runtime.value("{}"), broken)).rejects.toThrow(
      new UnexpectedResponseShapeError("Unexpected response shape on attempt 1: bad shape", {
        cause: undefined,
      }).message
    );
    expect(engine.calls).toHaveLength(0);
  });
});

describe("checkLength", () => {
  it("checks each item of a list field", () => {
    const violations = checkLength(
      { tags: ["ab", "abcdef", "abcd"] },
      lengthConstraint({ fieldName: "tags.items", minLength: 3, maxLength: 5 })
    );
    expect(violations).toEqual([
      "Item 0 in list field tags must have between 3 and 5 characters, but has 2. Increase the length of item 0 by at least 1 characters.",
      "Item 1 in list field tags must have between 3 and 5 characters, but has 6. Decrease the length of item 1 by at least 1 characters.",
    ]);
  });

  it("checks the cardinality of a list field", () => {
    expect(
      checkLength(
        { tags: ["a", "b"] },
        lengthConstraint({ fieldName: "tags", minLength: 3, maxLength: 4 })
      )
    ).toEqual([
      "The list field tags must have between 3 and 4 items, but has 2. Add at least 1 more items to tags.",
    ]);
  });

  it("checks a text field and counts code points", () => {
    expect(
      checkLength({ title: "Hi" }, lengthConstraint({ fieldName: "title", minLength: 3, maxLength: 10 }))
    ).toEqual([
      "The field title must have between 3 and 10 characters, but has 2. Increase the length of title by at least 1 characters.",
    ]);
    expect(checkLength("😀😀😀", lengthConstraint({ minLength: 3, maxLength: 3 }))).toEqual([]);
  });

  it("measures a scalar field by its serialized text", () => {
    expect(
      checkLength({ age: 123456 }, lengthConstraint({ fieldName: "age", minLength: 1, maxLength: 3 }))
    ).toEqual([
      "The field age must have between 1 and 3 characters, but has 6. Decrease the length of age by at least 3 characters.",
    ]);
    expect(
      checkLength({ done: true }, lengthConstraint({ fieldName: "done", minLength: 1, maxLength: 4 }))
    ).toEqual([]);
  });

  it("raises when the named field is missing", () => {
    expect(() =>
      checkLength({ title: "x" }, lengthConstraint({ fieldName: "summary", minLength: 1, maxLength: 5 }))
    ).toThrow(new ConstraintFieldError("summary").message);
  });

  it("rejects inverted bounds", () => {
    expect(() => lengthConstraint({ minLength: 5, maxLength: 1 })).toThrow(RangeError);
  });
});

describe("enforceConstraints", () => {
  it("restates every constraint in the remedy and returns the fixed candidate", async () => {
    const { engine, runtime } = setup(["hello there world"]);
    const constraint = lengthConstraint({ minLength: 10, maxLength: 20 });

    const outcome = await enforceConstraints(runtime.value("hello"), constraint);

    expect(outcome.attempts).toBe(2);
    expect(outcome.value.value).toBe("hello there world");
    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].seed).toBe(prepareSeeds(5)[0]);
    expect(engine.calls[0].instruction).toBe(
      "Your task was the following: \n\nhello\n\n" +
        "Your output was the following: \n\nhello\n\n" +
        "You must adhere to ALL of the following constraints:\n" +
        "- The text must have between 10 and 20 characters.\n\n" +
        "The following constraints were violated:\n" +
        "- The text must have between 10 and 20 characters, but has 5. Increase the length by at least 5 characters.\n\n" +
        "Follow the original task and make sure to adhere to ALL constraints listed above."
    );
  });

  it("asks the backend to judge a custom rule", async () => {
    const { engine, runtime } = setup(["PASS"]);

    const outcome = await enforceConstraints(
      runtime.value("The sky is blue."),
      customConstraint("Must mention a color")
    );

    expect(outcome.attempts).toBe(1);
    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].operands).toEqual(["The sky is blue."]);
    expect(engine.calls[0].temperature).toBe(0);
    expect(engine.calls[0].instruction).toBe(
      'Validate if the content in [DATA] meets this rule: "Must mention a color"\n\n' +
        'Respond with only "PASS" if the content meets the rule, or provide a specific explanation of why it fails.'
    );
  });

  it("feeds a failed custom verdict back into the remedy", async () => {
    const { engine, runtime } = setup(["No color is mentioned.", "The sky is blue.", "pass"]);

    const outcome = await enforceConstraints(
      runtime.value("The sky."),
      [customConstraint("Must mention a color")]
    );

    expect(outcome.attempts).toBe(2);
    expect(outcome.value.value).toBe("The sky is blue.");
    expect(engine.calls).toHaveLength(3);
    expect(engine.calls[1].instruction).toContain(
      '- The content must satisfy this rule: "Must mention a color"'
    );
    expect(engine.calls[1].instruction).toContain(
      "- Custom constraint violation: Must mention a color - No color is mentioned."
    );
  });

  it("does not read a word containing PASS as a passing verdict", async () => {
    const { engine, runtime } = setup([
      "The passage never mentions a color.",
      "The passage mentions a blue sky.",
      "PASS",
    ]);

    const outcome = await enforceConstraints(
      runtime.value("A quiet passage."),
      customConstraint("Must mention a color")
    );

    expect(outcome.attempts).toBe(2);
    expect(outcome.value.value).toBe("The passage mentions a blue sky.");
    expect(engine.calls).toHaveLength(3);
    expect(engine.calls[1].instruction).toContain(
      "- Custom constraint violation: Must mention a color - The passage never mentions a color."
    );
  });

  it("parses regenerated structured candidates through the model", async () => {
    const { runtime } = setup(['```json\n{"name": "Ada Lovelace", "age": 36}\n```']);

    const outcome = await enforceConstraints(
      runtime.value({ name: "A", age: 36 }),
      lengthConstraint({ fieldName: "name", minLength: 3, maxLength: 20 }),
      { model: personModel }
    );

    expect(outcome.attempts).toBe(2);
    expect(outcome.value.value).toEqual({ name: "Ada Lovelace", age: 36 });
  });

  it("records an unparseable regenerated reply as a violation and keeps going", async () => {
    const { engine, runtime } = setup(["Sure! name: Ada Lovelace", '{"name": "Ada Lovelace"}']);
    const nameModel = createSchemaModel<{ name: string }>({
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name"],
    });

    const outcome = await enforceConstraints(
      runtime.value({ name: "A" }),
      lengthConstraint({ fieldName: "name", minLength: 3, maxLength: 20 }),
      { model: nameModel }
    );

    expect(outcome.attempts).toBe(3);
    expect(outcome.value.value).toEqual({ name: "Ada Lovelace" });
    expect(engine.calls).toHaveLength(2);
    expect(engine.calls[1].instruction).toContain(
      "Your output was the following: \n\nSure! name: Ada Lovelace\n\n"
    );
    expect(engine.calls[1].instruction).toContain(
      "- Output is not valid for the schema: Field '(root)': Invalid JSON: "
    );
  });

  it("surfaces an unparseable last reply only as exhaustion", async () => {
    const { runtime } = setup(["Sure! name: Ada Lovelace"]);
    const nameModel = createSchemaModel<{ name: string }>({
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name"],
    });

    const failure = await enforceConstraints(
      runtime.value({ name: "A" }),
      lengthConstraint({ fieldName: "name", minLength: 3, maxLength: 20 }),
      { model: nameModel, retryCount: 2 }
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ConstraintExhaustedError);
    if (failure instanceof ConstraintExhaustedError) {
      expect(failure.message).toMatch(
        /^Failed to enforce constraints after 2 attempt\(s\): Output is not valid for the schema: Field '\(root\)': Invalid JSON/
      );
    }
  });

  it("throws with every violation once attempts are exhausted", async () => {
    const { engine, runtime } = setup();

    await expect(
      enforceConstraints(runtime.value("hello"), lengthConstraint({ minLength: 10, maxLength: 20 }), {
        retryCount: 1,
      })
    ).rejects.toThrow(
      "Failed to enforce constraints after 1 attempt(s): " +
        "The text must have between 10 and 20 characters, but has 5. Increase the length by at least 5 characters."
    );
    expect(engine.calls).toHaveLength(0);
  });
});

describe("isPassVerdict", () => {
  it("accepts only a bare PASS", () => {
    expect(isPassVerdict("PASS")).toBe(true);
    expect(isPassVerdict(" pass. ")).toBe(true);
    expect(isPassVerdict('"PASS"')).toBe(true);
    expect(isPassVerdict("The passage never mentions a color.")).toBe(false);
    expect(isPassVerdict("PASSES")).toBe(false);
  });
});
