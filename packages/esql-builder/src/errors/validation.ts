/**
 * Argument Validation Utilities
 *
 * Zod validation wrappers that report which command and argument
 * were rejected.
 *
 * @example
 * ```typescript
 * const probability = validateArgument(probabilitySchema, input, {
 *   command: "SAMPLE",
 *   argument: "probability",
 * });
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

// ============================================================
// Types
// ============================================================

/**
 * Context for validation operations.
 */
export type ArgumentContext = Readonly<{
  /** ES|QL command keyword (e.g. "SAMPLE") */
  command: string;
  /** Name of the argument being validated */
  argument: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

function zodIssuesToValidationIssues(
  error: ZodError,
  argument: string,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: [argument, ...issue.path.map(String)].join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates a command argument against a Zod schema.
 *
 * @returns The parsed argument
 * @throws ValidationError naming the command and argument if validation fails
 */
export function validateArgument<T>(
  schema: ZodType<T>,
  value: unknown,
  context: ArgumentContext,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error, context.argument);
  const summary = issues.map((issue) => issue.message).join("; ");

  throw new ValidationError(
    `Invalid ${context.argument} for ${context.command}: ${summary}`,
    { command: context.command, issues },
    { cause: result.error },
  );
}

/**
 * Creates a ValidationError for rules that aren't part of a Zod schema.
 *
 * @example
 * ```typescript
 * if (values.length === 0) {
 *   throw createValidationError("ROW requires at least one column", [
 *     { path: "values", message: "Must not be empty" },
 *   ], "ROW");
 * }
 * ```
 */
export function createValidationError(
  message: string,
  issues: ValidationIssue[],
  command?: string,
): ValidationError {
  return new ValidationError(message, {
    ...(command !== undefined && { command }),
    issues,
  });
}

/**
 * Throws unless at least one value was supplied.
 */
export function requireNonEmpty(
  values: readonly unknown[],
  context: ArgumentContext,
): void {
  if (values.length > 0) return;
  throw createValidationError(
    `${context.command} requires at least one ${context.argument}`,
    [{ path: context.argument, message: "Must not be empty" }],
    context.command,
  );
}
