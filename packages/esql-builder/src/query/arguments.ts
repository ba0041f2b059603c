/**
 * Positional vs. named argument handling.
 *
 * STATS, EVAL, ENRICH ... WITH and COMPLETION take either a list of
 * values or named values. Callers pass both shapes through one rest
 * parameter; plain objects other than column references are the named
 * form.
 */
import { ConflictingArgumentsError } from "../errors";
import { EsqlExpression } from "./expressions";
import { type ArgumentList, type NamedArguments } from "./types";

function isNamedColumn(argument: object): boolean {
  return "columnName" in argument && typeof argument.columnName === "string";
}

/**
 * Tells named arguments (plain objects) apart from values.
 */
function isNamedArguments<T>(
  argument: T | NamedArguments<T>,
): argument is NamedArguments<T> {
  return (
    typeof argument === "object" &&
    argument !== null &&
    !Array.isArray(argument) &&
    !(argument instanceof EsqlExpression) &&
    !isNamedColumn(argument)
  );
}

/**
 * Sorts arguments into the positional or named form.
 *
 * Several named objects are merged left to right.
 *
 * @throws ConflictingArgumentsError when both forms are present
 */
export function splitArguments<T>(
  command: string,
  args: readonly (T | NamedArguments<T>)[],
): ArgumentList<T> {
  const values: T[] = [];
  const entries: (readonly [string, T])[] = [];

  for (const argument of args) {
    if (isNamedArguments(argument)) {
      entries.push(...Object.entries(argument));
    } else {
      values.push(argument);
    }
  }

  if (values.length > 0 && entries.length > 0) {
    throw new ConflictingArgumentsError(command);
  }

  return entries.length > 0 ?
      { kind: "named", entries }
    : { kind: "positional", values };
}

/**
 * Number of values held by an argument list.
 */
export function argumentCount<T>(list: ArgumentList<T>): number {
  return list.kind === "named" ? list.entries.length : list.values.length;
}
