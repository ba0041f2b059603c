/**
 * Expression values for ES|QL commands.
 *
 * A value placed in a command is either a literal (serialized with JSON
 * rules) or an EsqlExpression carrying text that is already valid ES|QL.
 * Plain strings in expression positions (WHERE, EVAL, STATS, ...) are
 * treated as pre-rendered expression text; in literal positions (ROW,
 * right-hand sides of comparisons) they are string literals.
 */
import { createValidationError, requireNonEmpty } from "../errors/validation";
import { formatId, isSimpleIdentifier } from "./identifiers";
import { type NamedColumn } from "./types";

// ============================================================
// Types
// ============================================================

/**
 * A value ES|QL can express as a literal.
 */
export type LiteralValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | readonly LiteralValue[];

/**
 * Anything accepted where a command expects an expression.
 */
export type ExpressionInput = LiteralValue | EsqlExpression;

/**
 * Binding strength of the outermost operator of an expression.
 * Higher binds tighter; `suffix` marks sort and aggregate modifiers,
 * which only ever end an expression.
 */
export const ExpressionPrecedence = {
  suffix: 0,
  or: 1,
  and: 2,
  not: 3,
  comparison: 4,
  additive: 5,
  multiplicative: 6,
  unary: 7,
  atom: 8,
} as const;

export type ExpressionPrecedence =
  (typeof ExpressionPrecedence)[keyof typeof ExpressionPrecedence];

type Operand = Readonly<{ text: string; precedence: ExpressionPrecedence }>;

// ============================================================
// Literal Rendering
// ============================================================

/**
 * Renders a value in a literal position.
 *
 * @example
 * formatLiteral("two")      // "two" (quoted)
 * formatLiteral([1, 2])     // [1, 2]
 * formatLiteral(null)       // null
 * formatLiteral(field("a")) // a
 */
export function formatLiteral(value: ExpressionInput): string {
  if (value instanceof EsqlExpression) {
    return value.toString();
  }
  if (value === null) {
    return "null";
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw createValidationError(
        `Cannot render ${String(value)} as an ES|QL literal`,
        [{ path: "value", message: "Number must be finite" }],
      );
    }
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return `[${value.map((item) => formatLiteral(item)).join(", ")}]`;
}

/**
 * Renders a value in an expression position.
 *
 * Strings pass through verbatim: they are expression text such as
 * `"salary > 50000"` or `"AVG(height)"`.
 */
export function formatExpr(value: ExpressionInput): string {
  return typeof value === "string" ? value : formatLiteral(value);
}

/**
 * Renders one operand of an `AND` list, parenthesizing `OR` expressions
 * and raw condition text.
 */
export function formatCondition(value: ExpressionInput): string {
  const operand = conditionOperand(value);
  return wrap(operand, operand.precedence < ExpressionPrecedence.and);
}

/**
 * Renders a condition list joined with `AND`. A single condition is
 * rendered as it is.
 */
export function formatConditions(values: readonly ExpressionInput[]): string {
  const [first] = values;
  if (values.length === 1 && first !== undefined) {
    return conditionOperand(first).text;
  }
  return values.map((value) => formatCondition(value)).join(" AND ");
}

function literalOperand(value: ExpressionInput): Operand {
  if (value instanceof EsqlExpression) {
    return { text: value.toString(), precedence: value.precedence };
  }
  return { text: formatLiteral(value), precedence: ExpressionPrecedence.atom };
}

function conditionOperand(value: ExpressionInput): Operand {
  if (value instanceof EsqlExpression) {
    return { text: value.toString(), precedence: value.precedence };
  }
  if (typeof value === "string" && !isSimpleIdentifier(value)) {
    // raw text may hold any operator
    return { text: value, precedence: ExpressionPrecedence.or };
  }
  return { text: formatExpr(value), precedence: ExpressionPrecedence.atom };
}

function isBooleanPrecedence(precedence: ExpressionPrecedence): boolean {
  return (
    precedence === ExpressionPrecedence.and ||
    precedence === ExpressionPrecedence.or
  );
}

function wrap(operand: Operand, needsParentheses: boolean): string {
  return needsParentheses ? `(${operand.text})` : operand.text;
}

// ============================================================
// Expression
// ============================================================

/**
 * A pre-rendered ES|QL expression.
 *
 * Operator methods return new expressions and never modify the receiver.
 * Operands are parenthesized only where ES|QL precedence requires it.
 *
 * @example
 * ```typescript
 * field("salary").gt(50000).and(field("still_hired").eq(true))
 * // salary > 50000 AND still_hired == true
 *
 * expr("COUNT(*)").where(field("height").gt(2))
 * // COUNT(*) WHERE height > 2
 * ```
 */
export class EsqlExpression {
  readonly #text: string;
  readonly precedence: ExpressionPrecedence;

  constructor(
    text: string,
    precedence: ExpressionPrecedence = ExpressionPrecedence.atom,
  ) {
    this.#text = text;
    this.precedence = precedence;
  }

  toString(): string {
    return this.#text;
  }

  // === Comparison ===

  eq(value: ExpressionInput): EsqlExpression {
    return this.#binary("==", ExpressionPrecedence.comparison, value, false);
  }

  ne(value: ExpressionInput): EsqlExpression {
    return this.#binary("!=", ExpressionPrecedence.comparison, value, false);
  }

  lt(value: ExpressionInput): EsqlExpression {
    return this.#binary("<", ExpressionPrecedence.comparison, value, false);
  }

  lte(value: ExpressionInput): EsqlExpression {
    return this.#binary("<=", ExpressionPrecedence.comparison, value, false);
  }

  gt(value: ExpressionInput): EsqlExpression {
    return this.#binary(">", ExpressionPrecedence.comparison, value, false);
  }

  gte(value: ExpressionInput): EsqlExpression {
    return this.#binary(">=", ExpressionPrecedence.comparison, value, false);
  }

  // === Arithmetic ===

  add(value: ExpressionInput): EsqlExpression {
    return this.#binary("+", ExpressionPrecedence.additive, value, true);
  }

  sub(value: ExpressionInput): EsqlExpression {
    return this.#binary("-", ExpressionPrecedence.additive, value, false);
  }

  mul(value: ExpressionInput): EsqlExpression {
    return this.#binary("*", ExpressionPrecedence.multiplicative, value, true);
  }

  div(value: ExpressionInput): EsqlExpression {
    return this.#binary("/", ExpressionPrecedence.multiplicative, value, false);
  }

  mod(value: ExpressionInput): EsqlExpression {
    return this.#binary("%", ExpressionPrecedence.multiplicative, value, false);
  }

  neg(): EsqlExpression {
    const operand = this.#operand();
    return new EsqlExpression(
      `-${wrap(operand, operand.precedence < ExpressionPrecedence.unary)}`,
      ExpressionPrecedence.unary,
    );
  }

  // === Boolean ===

  and(condition: ExpressionInput): EsqlExpression {
    return this.#logical("AND", ExpressionPrecedence.and, condition);
  }

  or(condition: ExpressionInput): EsqlExpression {
    return this.#logical("OR", ExpressionPrecedence.or, condition);
  }

  not(): EsqlExpression {
    const operand = this.#operand();
    return new EsqlExpression(
      `NOT ${wrap(operand, operand.precedence < ExpressionPrecedence.comparison)}`,
      ExpressionPrecedence.not,
    );
  }

  // === Predicates ===

  isNull(): EsqlExpression {
    return this.#postfix("IS NULL");
  }

  isNotNull(): EsqlExpression {
    return this.#postfix("IS NOT NULL");
  }

  in(...values: ExpressionInput[]): EsqlExpression {
    requireNonEmpty(values, { command: "IN", argument: "value" });
    const list = values.map((value) => formatLiteral(value)).join(", ");
    return this.#postfix(`IN (${list})`);
  }

  like(...patterns: ExpressionInput[]): EsqlExpression {
    return this.#patternMatch("LIKE", patterns);
  }

  rlike(...patterns: ExpressionInput[]): EsqlExpression {
    return this.#patternMatch("RLIKE", patterns);
  }

  /**
   * Full-text match operator (`field:"query"`).
   */
  match(query: ExpressionInput): EsqlExpression {
    const operand = this.#operand();
    return new EsqlExpression(
      `${wrap(operand, operand.precedence < ExpressionPrecedence.atom)}:${formatLiteral(query)}`,
      ExpressionPrecedence.comparison,
    );
  }

  // === Modifiers ===

  asc(): EsqlExpression {
    return this.#suffix("ASC");
  }

  desc(): EsqlExpression {
    return this.#suffix("DESC");
  }

  nullsFirst(): EsqlExpression {
    return this.#suffix("NULLS FIRST");
  }

  nullsLast(): EsqlExpression {
    return this.#suffix("NULLS LAST");
  }

  /**
   * Restricts the rows an aggregate function sees. Only valid inside STATS.
   *
   * @example
   * expr("AVG(salary)").where('birth_date < "1960-01-01"')
   * // AVG(salary) WHERE birth_date < "1960-01-01"
   */
  where(...conditions: ExpressionInput[]): EsqlExpression {
    requireNonEmpty(conditions, { command: "WHERE", argument: "condition" });
    return this.#suffix(`WHERE ${formatConditions(conditions)}`);
  }

  // === Internals ===

  #operand(): Operand {
    return { text: this.#text, precedence: this.precedence };
  }

  #binary(
    operator: string,
    precedence: ExpressionPrecedence,
    value: ExpressionInput,
    associative: boolean,
  ): EsqlExpression {
    const left = this.#operand();
    const right = literalOperand(value);
    // comparisons do not chain
    const wrapLeft =
      precedence === ExpressionPrecedence.comparison ?
        left.precedence <= precedence
      : left.precedence < precedence;
    return new EsqlExpression(
      `${wrap(left, wrapLeft)} ${operator} ${wrap(
        right,
        right.precedence < precedence ||
          (!associative && right.precedence === precedence),
      )}`,
      precedence,
    );
  }

  #logical(
    operator: "AND" | "OR",
    precedence: ExpressionPrecedence,
    condition: ExpressionInput,
  ): EsqlExpression {
    const left = this.#operand();
    const right = conditionOperand(condition);
    // mixed AND/OR operands are always parenthesized
    const needsParentheses = (operand: Operand) =>
      operand.precedence < precedence ||
      (isBooleanPrecedence(operand.precedence) &&
        operand.precedence !== precedence);
    return new EsqlExpression(
      `${wrap(left, needsParentheses(left))} ${operator} ${wrap(
        right,
        needsParentheses(right),
      )}`,
      precedence,
    );
  }

  #postfix(clause: string): EsqlExpression {
    const operand = this.#operand();
    return new EsqlExpression(
      `${wrap(operand, operand.precedence <= ExpressionPrecedence.comparison)} ${clause}`,
      ExpressionPrecedence.comparison,
    );
  }

  #patternMatch(
    operator: "LIKE" | "RLIKE",
    patterns: readonly ExpressionInput[],
  ): EsqlExpression {
    requireNonEmpty(patterns, { command: operator, argument: "pattern" });
    const rendered = patterns.map((pattern) => formatLiteral(pattern));
    const target =
      rendered.length === 1 ? rendered.join("") : `(${rendered.join(", ")})`;
    return this.#postfix(`${operator} ${target}`);
  }

  #suffix(clause: string): EsqlExpression {
    return new EsqlExpression(
      `${this.#text} ${clause}`,
      ExpressionPrecedence.suffix,
    );
  }
}

/**
 * A reference to a column.
 *
 * Renders as an identifier (quoted when needed) in expression positions
 * and contributes its raw name where a command formats identifiers itself.
 */
export class FieldReference extends EsqlExpression implements NamedColumn {
  readonly columnName: string;

  constructor(name: string) {
    super(formatId(name));
    this.columnName = name;
  }

  /**
   * References a sub-field (`address.city`).
   */
  child(name: string): FieldReference {
    return new FieldReference(`${this.columnName}.${name}`);
  }
}

// ============================================================
// Factories
// ============================================================

/**
 * Creates a column reference.
 */
export function field(name: string): FieldReference {
  return new FieldReference(name);
}

/**
 * Wraps expression text produced elsewhere (for example by a function
 * helper) so it can be combined with operator methods.
 */
export function expr(text: string): EsqlExpression {
  return new EsqlExpression(text);
}
