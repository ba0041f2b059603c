import { describe, expect, it } from "vitest";
import { z } from "zod";

import { ValidationError } from "../src/errors";
import {
  createValidationError,
  requireNonEmpty,
  validateArgument,
} from "../src/errors/validation";

describe("validateArgument", () => {
  const schema = z.number().int().nonnegative();

  it("returns the parsed value", () => {
    expect(
      validateArgument(schema, 10, { command: "LIMIT", argument: "rows" }),
    ).toBe(10);
  });

  it("throws ValidationError naming command and argument", () => {
    let caught: unknown;
    try {
      validateArgument(schema, -1, { command: "LIMIT", argument: "rows" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message.startsWith("Invalid rows for LIMIT: ")).toBe(true);
    expect(caught.details.command).toBe("LIMIT");
    expect(caught.details.issues).toHaveLength(1);
    expect(caught.details.issues[0]?.path).toBe("rows");
    expect(caught.details.issues[0]?.code).toBe("too_small");
    expect(caught.cause).toBeInstanceOf(z.ZodError);
  });

  it("prefixes nested issue paths with the argument name", () => {
    const listSchema = z.array(z.string());
    let caught: unknown;
    try {
      validateArgument(listSchema, ["a", 2], {
        command: "KEEP",
        argument: "columns",
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.details.issues[0]?.path).toBe("columns.1");
  });
});

describe("createValidationError", () => {
  it("includes the command when given", () => {
    const error = createValidationError(
      "bad",
      [{ path: "x", message: "nope" }],
      "ROW",
    );
    expect(error.details).toEqual({
      command: "ROW",
      issues: [{ path: "x", message: "nope" }],
    });
  });

  it("omits the command otherwise", () => {
    const error = createValidationError("bad", []);
    expect(error.details).toEqual({ issues: [] });
  });
});

describe("requireNonEmpty", () => {
  it("accepts non-empty lists", () => {
    expect(() => {
      requireNonEmpty(["a"], { command: "KEEP", argument: "column" });
    }).not.toThrow();
  });

  it("rejects empty lists", () => {
    expect(() => {
      requireNonEmpty([], { command: "KEEP", argument: "column" });
    }).toThrow("KEEP requires at least one column");
  });
});
