/**
 * Identifier and index formatting.
 *
 * ES|QL accepts unquoted identifiers made of letters, digits, underscores
 * and dots (starting with a letter, underscore or `@`). Anything else must
 * be wrapped in backticks, with embedded backticks doubled.
 */
import { type IdentifierInput, type IndexReference } from "./types";

/**
 * Identifiers that need no quoting.
 */
const SIMPLE_IDENTIFIER_PATTERN = /^[a-zA-Z_@][a-zA-Z0-9_.]*$/;

/**
 * Whether a name can be written without backticks.
 */
export function isSimpleIdentifier(name: string): boolean {
  return SIMPLE_IDENTIFIER_PATTERN.test(name);
}

/**
 * Returns the raw name of an identifier input.
 */
export function identifierName(id: IdentifierInput): string {
  return typeof id === "string" ? id : id.columnName;
}

/**
 * Renders a column, parameter or policy name.
 *
 * With `allowPatterns`, names containing `*` are returned as-is: a
 * wildcard pattern cannot be quoted without turning it into a literal
 * name, so pattern identifiers bypass quoting entirely.
 *
 * @example
 * formatId("first_name") // first_name
 * formatId("first name") // `first name`
 * formatId("a`b")        // `a``b`
 * formatId("h*", true)   // h*
 */
export function formatId(id: IdentifierInput, allowPatterns = false): string {
  const name = identifierName(id);
  if (allowPatterns && name.includes("*")) {
    return name;
  }
  if (isSimpleIdentifier(name)) {
    return name;
  }
  return `\`${name.replaceAll("`", "``")}\``;
}

/**
 * Resolves an index reference to its name.
 *
 * Index sources are read here, at render time, so a mapped document's
 * index can be reassigned after the query was built.
 */
export function formatIndex(index: IndexReference): string {
  return typeof index === "string" ? index : index.indexName;
}
