export {
  ChangePoint,
  Completion,
  Dissect,
  Drop,
  Enrich,
  EsqlQuery,
  Eval,
  type ExpressionArgument,
  type FieldArgument,
  Fork,
  Grok,
  Keep,
  Limit,
  LookupJoin,
  MvExpand,
  Rename,
  Sample,
  Sort,
  type SortColumn,
  Stats,
  Where,
} from "./commands";
export { esql } from "./esql";
export {
  EsqlExpression,
  expr,
  ExpressionPrecedence,
  type ExpressionInput,
  field,
  FieldReference,
  formatCondition,
  formatExpr,
  formatLiteral,
  type LiteralValue,
} from "./expressions";
export { formatId, formatIndex, identifierName } from "./identifiers";
export { Branch, From, Row, Show } from "./source-commands";
export {
  type IdentifierInput,
  type IndexReference,
  type IndexSource,
  type NamedArguments,
  type NamedColumn,
} from "./types";
