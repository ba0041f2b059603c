/**
 * Shared input types for the query builder.
 */

/**
 * Anything that names a column without being plain text, such as a
 * field reference taken from a mapped document.
 */
export type NamedColumn = Readonly<{
  columnName: string;
}>;

/**
 * A column, parameter or policy name.
 */
export type IdentifierInput = string | NamedColumn;

/**
 * A handle whose index name is looked up when the query is rendered.
 *
 * Classes with a static `indexName` satisfy this structurally:
 *
 * @example
 * ```typescript
 * class Employee {
 *   static indexName = "employees";
 * }
 *
 * const query = esql.from(Employee);
 * Employee.indexName = "employees-v2";
 * query.render(); // FROM employees-v2
 * ```
 */
export type IndexSource = Readonly<{
  indexName: string;
}>;

/**
 * An index, data stream or alias: a name or a handle resolved at render time.
 */
export type IndexReference = string | IndexSource;

/**
 * Named arguments keyed by output column name.
 */
export type NamedArguments<T> = Readonly<Record<string, T>>;

/**
 * Arguments of a command that takes either positional or named values.
 *
 * The two shapes are mutually exclusive; see `splitArguments`.
 */
export type ArgumentList<T> =
  | Readonly<{ kind: "positional"; values: readonly T[] }>
  | Readonly<{ kind: "named"; entries: readonly (readonly [string, T])[] }>;
