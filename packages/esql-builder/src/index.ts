/**
 * esql-builder: Typed ES|QL Query Builder for TypeScript
 *
 * @example
 * ```typescript
 * import { createEsqlClient, esql, field } from "esql-builder";
 *
 * const query = esql
 *   .from("employees")
 *   .where(field("still_hired").eq(true))
 *   .stats({ avg_salary: "AVG(salary)" })
 *   .by("languages")
 *   .sort(field("avg_salary").desc())
 *   .limit(5);
 *
 * query.render();
 * // FROM employees
 * // | WHERE still_hired == true
 * // | STATS avg_salary = AVG(salary)
 * //         BY languages
 * // | SORT avg_salary DESC
 * // | LIMIT 5
 *
 * const client = createEsqlClient({
 *   executor: (request) => es.esql.query(request),
 * });
 * const response = await client.query(query);
 * ```
 */

// ============================================================
// Query Builder
// ============================================================

export {
  Branch,
  ChangePoint,
  Completion,
  Dissect,
  Drop,
  Enrich,
  esql,
  EsqlQuery,
  Eval,
  type ExpressionArgument,
  type FieldArgument,
  Fork,
  From,
  Grok,
  Keep,
  Limit,
  LookupJoin,
  MvExpand,
  Rename,
  Row,
  Sample,
  Show,
  Sort,
  type SortColumn,
  Stats,
  Where,
} from "./query";

// ============================================================
// Expressions and Identifiers
// ============================================================

export {
  EsqlExpression,
  expr,
  type ExpressionInput,
  ExpressionPrecedence,
  field,
  FieldReference,
  formatCondition,
  formatExpr,
  formatId,
  formatIndex,
  formatLiteral,
  type IdentifierInput,
  identifierName,
  type IndexReference,
  type IndexSource,
  type LiteralValue,
  type NamedArguments,
  type NamedColumn,
} from "./query";

// ============================================================
// Client
// ============================================================

export {
  createEsqlClient,
  EsqlClient,
  type EsqlClientOptions,
  type EsqlExecutor,
  type EsqlHooks,
  type EsqlRequest,
  type QueryDefaults,
  type QueryHookContext,
  type QueryOptions,
} from "./client";

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  ConflictingArgumentsError,
  DuplicateForkError,
  type ErrorCategory,
  EsqlError,
  type EsqlErrorOptions,
  ExecutionError,
  getErrorSuggestion,
  isEsqlError,
  isSystemError,
  isUserRecoverable,
  MissingClauseError,
  QueryStructureError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";
