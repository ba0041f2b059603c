/**
 * EsqlQuery - the command chain and its processing commands.
 *
 * A query is a backward-linked list of commands. Each fluent call returns
 * a new command whose parent is the receiver; rendering walks back to the
 * source command and joins every stage with `"\n| "`.
 */
import { z } from "zod";

import {
  DuplicateForkError,
  MissingClauseError,
  QueryStructureError,
} from "../errors";
import {
  createValidationError,
  requireNonEmpty,
  validateArgument,
} from "../errors/validation";
import { argumentCount, splitArguments } from "./arguments";
import {
  EsqlExpression,
  type ExpressionInput,
  formatConditions,
  formatExpr,
} from "./expressions";
import { formatId, formatIndex } from "./identifiers";
import {
  type ArgumentList,
  type IdentifierInput,
  type IndexReference,
  type NamedArguments,
  type NamedColumn,
} from "./types";

// ============================================================
// Argument Schemas
// ============================================================

const limitSchema = z.number().int().nonnegative();
const probabilitySchema = z.number().gt(0).lt(1);
const nameSchema = z.string().min(1);
const branchesSchema = z.array(z.unknown()).min(2).max(8);

const STAGE_SEPARATOR = "\n| ";
const FORK_BRANCH_SEPARATOR = "\n       ";

/**
 * Positional expression or an object of named expressions.
 */
export type ExpressionArgument = ExpressionInput | NamedArguments<ExpressionInput>;

/**
 * Positional field name or an object mapping new names to fields.
 */
export type FieldArgument = IdentifierInput | NamedArguments<IdentifierInput>;

/**
 * A SORT column: `"name DESC NULLS LAST"`, a field, or an expression
 * built with `asc()`/`desc()`.
 */
export type SortColumn = string | NamedColumn | EsqlExpression;

function renderArguments(
  list: ArgumentList<ExpressionInput>,
  render: (value: ExpressionInput) => string,
): string[] {
  if (list.kind === "named") {
    return list.entries.map(([name, value]) => `${formatId(name)} = ${render(value)}`);
  }
  return list.values.map((value) => render(value));
}

function renderSortColumn(column: SortColumn): string {
  if (column instanceof EsqlExpression) {
    return column.toString();
  }
  if (typeof column !== "string") {
    return formatId(column);
  }
  // Direction and NULLS keywords pass formatId unchanged.
  return column
    .split(" ")
    .map((token) => formatId(token))
    .join(" ");
}

// ============================================================
// Base Command
// ============================================================

/**
 * Base class of every ES|QL command.
 *
 * Commands are never modified once a later command has been derived from
 * them. Continuation methods (`on()`, `by()`, `with()`, ...) configure the
 * command they are called on and are rejected after that point. Calling
 * two fluent methods on the same command is allowed: both chains share the
 * prefix, which is never modified again.
 *
 * @example
 * ```typescript
 * const query = esql
 *   .from("employees")
 *   .keep("first_name", "last_name")
 *   .sort("first_name ASC");
 *
 * query.render();
 * // FROM employees
 * // | KEEP first_name, last_name
 * // | SORT first_name ASC
 * ```
 */
export abstract class EsqlQuery {
  /** Command keyword, used in error messages */
  abstract readonly command: string;

  readonly parent: EsqlQuery | undefined;

  #extended = false;

  protected constructor(parent?: EsqlQuery) {
    this.parent = parent;
    if (parent !== undefined) {
      parent.#extended = true;
    }
  }

  /**
   * Renders this command's own stage.
   */
  protected abstract renderStage(): string;

  /**
   * True when the chain starts with `esql.branch()`.
   */
  protected isBranchStart(): boolean {
    return false;
  }

  // === Rendering ===

  /**
   * Renders the whole chain, from the source command to this one.
   *
   * @throws MissingClauseError if a command lacks a mandatory continuation
   * @throws QueryStructureError if the chain is a fork branch
   */
  render(): string {
    const root = this.#root();
    if (root.isBranchStart()) {
      throw new QueryStructureError(
        "A branch can only be rendered as part of a FORK command",
        { command: this.command },
        { suggestion: `Pass the branch to fork() on a query that starts with esql.from() or esql.row().` },
      );
    }
    return this.#renderChain();
  }

  /**
   * Stage texts from the source command to this one.
   */
  stages(): string[] {
    const own = this.renderStage();
    return this.parent === undefined ? [own] : [...this.parent.stages(), own];
  }

  toString(): string {
    return this.render();
  }

  /**
   * Whether this command or any ancestor is a FORK.
   */
  isForked(): boolean {
    for (
      let node: EsqlQuery | undefined = this;
      node !== undefined;
      node = node.parent
    ) {
      if (node instanceof Fork) return true;
    }
    return false;
  }

  /**
   * Whether a later command has been derived from this one.
   */
  get isExtended(): boolean {
    return this.#extended;
  }

  #root(): EsqlQuery {
    let node: EsqlQuery = this;
    while (node.parent !== undefined) {
      node = node.parent;
    }
    return node;
  }

  #renderChain(): string {
    const stage = this.renderStage();
    return this.parent === undefined ? stage : (
        `${this.parent.#renderChain()}${STAGE_SEPARATOR}${stage}`
      );
  }

  /**
   * Guards continuation methods.
   */
  protected assertModifiable(clause: string): void {
    if (!this.#extended) return;
    throw new QueryStructureError(
      `Cannot call ${clause}() on ${this.command}: later commands already build on it`,
      { command: this.command, clause },
      { suggestion: `Call ${clause}() before chaining the next command.` },
    );
  }

  // === Processing Commands ===

  /**
   * Detects change points in a metric column.
   *
   * @example
   * esql.from("k8s").changePoint("count").on("@timestamp").as("type", "pvalue")
   */
  changePoint(value: IdentifierInput): ChangePoint {
    return new ChangePoint(this, value);
  }

  /**
   * Sends a prompt to an inference endpoint and stores the answer.
   *
   * Takes exactly one prompt: positional, or as `{ column: prompt }` to
   * name the output column. `with(inferenceId)` is required.
   *
   * @example
   * esql.row({ question: "What is ES|QL?" })
   *   .completion({ answer: field("question") })
   *   .with("test_completion_model")
   */
  completion(...prompt: ExpressionArgument[]): Completion {
    return new Completion(this, ...prompt);
  }

  /**
   * Extracts structured fields from a string with a dissect pattern.
   *
   * @example
   * esql.row({ a: "2023-01-23T12:15:00.000Z - some text - 127.0.0.1" })
   *   .dissect("a", "%{date} - %{msg} - %{ip}")
   */
  dissect(input: IdentifierInput, pattern: string): Dissect {
    return new Dissect(this, input, pattern);
  }

  /**
   * Removes columns. Supports wildcards.
   */
  drop(...columns: IdentifierInput[]): Drop {
    return new Drop(this, ...columns);
  }

  /**
   * Adds columns from an enrich policy.
   *
   * @example
   * esql.row({ a: "1" }).enrich("languages_policy").on("a").with({ name: "language_name" })
   */
  enrich(policy: string): Enrich {
    return new Enrich(this, policy);
  }

  /**
   * Appends computed columns.
   *
   * @example
   * query.eval({ height_feet: "height * 3.281", height_cm: "height * 100" })
   * query.eval("height * 3.281")
   */
  eval(...columns: ExpressionArgument[]): Eval {
    return new Eval(this, ...columns);
  }

  /**
   * Runs up to eight branches over the same input and merges their rows.
   *
   * A chain may contain one fork only.
   *
   * @example
   * esql.from("employees").fork(
   *   esql.branch().where("emp_no == 10001"),
   *   esql.branch().where("emp_no == 10002"),
   * )
   *
   * @throws DuplicateForkError if the chain or a branch already contains a fork
   */
  fork(...branches: EsqlQuery[]): Fork {
    if (this.isForked()) {
      throw new DuplicateForkError();
    }
    validateArgument(branchesSchema, branches, {
      command: "FORK",
      argument: "branches",
    });
    for (const [index, branch] of branches.entries()) {
      const root = branch.#root();
      if (!root.isBranchStart() || root === branch) {
        throw new QueryStructureError(
          `FORK branch ${index + 1} must start with esql.branch() and contain at least one command`,
          { command: "FORK", branch: index },
          { suggestion: `Build each branch as esql.branch().where(...).` },
        );
      }
      if (branch.isForked()) {
        throw new DuplicateForkError();
      }
    }
    for (const branch of branches) {
      branch.#extended = true;
    }
    return new Fork(this, branches);
  }

  /**
   * Extracts structured fields from a string with a grok pattern.
   */
  grok(input: IdentifierInput, pattern: string): Grok {
    return new Grok(this, input, pattern);
  }

  /**
   * Selects and orders the returned columns. Supports wildcards.
   */
  keep(...columns: IdentifierInput[]): Keep {
    return new Keep(this, ...columns);
  }

  /**
   * Caps the number of returned rows.
   */
  limit(maxNumberOfRows: number): Limit {
    return new Limit(this, maxNumberOfRows);
  }

  /**
   * Joins rows from a lookup index. Requires `on(field)`.
   *
   * @example
   * esql.from("system_metrics").lookupJoin("host_inventory").on("host.name")
   */
  lookupJoin(lookupIndex: IndexReference): LookupJoin {
    return new LookupJoin(this, lookupIndex);
  }

  /**
   * Expands a multivalued column into one row per value.
   */
  mvExpand(column: IdentifierInput): MvExpand {
    return new MvExpand(this, column);
  }

  /**
   * Renames columns, given as `{ oldName: newName }`.
   */
  rename(columns: NamedArguments<IdentifierInput>): Rename {
    return new Rename(this, columns);
  }

  /**
   * Keeps a random sample of rows with the given probability.
   */
  sample(probability: number): Sample {
    return new Sample(this, probability);
  }

  /**
   * Sorts rows.
   *
   * @example
   * query.sort("height DESC", "first_name ASC NULLS FIRST")
   * query.sort(field("height").desc())
   */
  sort(...columns: SortColumn[]): Sort {
    return new Sort(this, ...columns);
  }

  /**
   * Groups rows and computes aggregates. Add grouping with `by()`.
   *
   * @example
   * query.stats({ count: "COUNT(emp_no)" }).by("languages")
   */
  stats(...expressions: ExpressionArgument[]): Stats {
    return new Stats(this, ...expressions);
  }

  /**
   * Filters rows. Several conditions are combined with AND.
   */
  where(...conditions: ExpressionInput[]): Where {
    return new Where(this, ...conditions);
  }
}

// ============================================================
// Processing Commands
// ============================================================

export class ChangePoint extends EsqlQuery {
  readonly command = "CHANGE_POINT";
  readonly #value: IdentifierInput;
  #key: IdentifierInput | undefined;
  #names: readonly [string, string] | undefined;

  constructor(parent: EsqlQuery, value: IdentifierInput) {
    super(parent);
    this.#value = value;
  }

  /**
   * Column with the key to order values by. Defaults to `@timestamp`.
   */
  on(key: IdentifierInput): this {
    this.assertModifiable("on");
    this.#key = key;
    return this;
  }

  /**
   * Names of the output columns.
   */
  as(typeName = "type", pvalueName = "pvalue"): this {
    this.assertModifiable("as");
    this.#names = [typeName, pvalueName];
    return this;
  }

  protected renderStage(): string {
    const key = this.#key;
    const names = this.#names;
    const on = key === undefined ? "" : ` ON ${formatId(key)}`;
    const as =
      names === undefined ? "" : (
        ` AS ${formatId(names[0])}, ${formatId(names[1])}`
      );
    return `CHANGE_POINT ${formatId(this.#value)}${on}${as}`;
  }
}

export class Completion extends EsqlQuery {
  readonly command = "COMPLETION";
  readonly #prompt: ArgumentList<ExpressionInput>;
  #inferenceId: string | undefined;

  constructor(parent: EsqlQuery, ...prompt: ExpressionArgument[]) {
    const list = splitArguments("COMPLETION", prompt);
    const count = argumentCount(list);
    if (count !== 1) {
      throw createValidationError(
        `COMPLETION requires exactly one prompt, got ${count}`,
        [{ path: "prompt", message: "Expected one positional or one named prompt" }],
        "COMPLETION",
      );
    }
    super(parent);
    this.#prompt = list;
  }

  /**
   * The inference endpoint to use.
   */
  with(inferenceId: string): this {
    this.assertModifiable("with");
    this.#inferenceId = validateArgument(nameSchema, inferenceId, {
      command: "COMPLETION",
      argument: "inferenceId",
    });
    return this;
  }

  protected renderStage(): string {
    const inferenceId = this.#inferenceId;
    if (inferenceId === undefined) {
      throw new MissingClauseError("COMPLETION", "WITH", {
        suggestion: `Call with(inferenceId) to choose the inference endpoint.`,
      });
    }
    const options = `{"inference_id": ${JSON.stringify(inferenceId)}}`;
    const [prompt] = renderArguments(this.#prompt, formatExpr);
    return `COMPLETION ${prompt} WITH ${options}`;
  }
}

export class Dissect extends EsqlQuery {
  readonly command = "DISSECT";
  readonly #input: IdentifierInput;
  readonly #pattern: string;
  #separator: string | undefined;

  constructor(parent: EsqlQuery, input: IdentifierInput, pattern: string) {
    super(parent);
    this.#input = input;
    this.#pattern = pattern;
  }

  /**
   * Separator placed between values joined by the append modifier.
   */
  appendSeparator(separator: string): this {
    this.assertModifiable("appendSeparator");
    this.#separator = separator;
    return this;
  }

  protected renderStage(): string {
    const appendSeparator = this.#separator;
    const separator =
      appendSeparator === undefined ? "" : (
        ` APPEND_SEPARATOR=${JSON.stringify(appendSeparator)}`
      );
    return `DISSECT ${formatId(this.#input)} ${JSON.stringify(this.#pattern)}${separator}`;
  }
}

export class Drop extends EsqlQuery {
  readonly command = "DROP";
  readonly #columns: readonly IdentifierInput[];

  constructor(parent: EsqlQuery, ...columns: IdentifierInput[]) {
    requireNonEmpty(columns, { command: "DROP", argument: "column" });
    super(parent);
    this.#columns = columns;
  }

  protected renderStage(): string {
    return `DROP ${this.#columns.map((column) => formatId(column, true)).join(", ")}`;
  }
}

export class Enrich extends EsqlQuery {
  readonly command = "ENRICH";
  readonly #policy: string;
  #matchField: IdentifierInput | undefined;
  #fields: ArgumentList<IdentifierInput> | undefined;

  constructor(parent: EsqlQuery, policy: string) {
    const validated = validateArgument(nameSchema, policy, {
      command: "ENRICH",
      argument: "policy",
    });
    super(parent);
    this.#policy = validated;
  }

  /**
   * The column matched against the policy's match field.
   */
  on(matchField: IdentifierInput): this {
    this.assertModifiable("on");
    this.#matchField = matchField;
    return this;
  }

  /**
   * Enrich fields to add, positionally or as `{ newName: enrichField }`.
   */
  with(...fields: FieldArgument[]): this {
    this.assertModifiable("with");
    const list = splitArguments("ENRICH WITH", fields);
    requireNonEmpty(list.kind === "named" ? list.entries : list.values, {
      command: "ENRICH",
      argument: "field",
    });
    this.#fields = list;
    return this;
  }

  protected renderStage(): string {
    const matchField = this.#matchField;
    const on = matchField === undefined ? "" : ` ON ${formatId(matchField)}`;
    const fields = this.#fields;
    let withClause = "";
    if (fields?.kind === "named") {
      withClause = ` WITH ${fields.entries
        .map(([name, value]) => `${formatId(name)} = ${formatId(value)}`)
        .join(", ")}`;
    } else if (fields !== undefined) {
      withClause = ` WITH ${fields.values.map((value) => formatId(value)).join(", ")}`;
    }
    return `ENRICH ${this.#policy}${on}${withClause}`;
  }
}

export class Eval extends EsqlQuery {
  readonly command = "EVAL";
  readonly #columns: ArgumentList<ExpressionInput>;

  constructor(parent: EsqlQuery, ...columns: ExpressionArgument[]) {
    const list = splitArguments("EVAL", columns);
    requireNonEmpty(list.kind === "named" ? list.entries : list.values, {
      command: "EVAL",
      argument: "column",
    });
    super(parent);
    this.#columns = list;
  }

  protected renderStage(): string {
    return `EVAL ${renderArguments(this.#columns, formatExpr).join(", ")}`;
  }
}

export class Fork extends EsqlQuery {
  readonly command = "FORK";
  readonly #branches: readonly EsqlQuery[];

  /**
   * Use `fork()` on a query: it checks the one-fork rule and the branches.
   */
  constructor(parent: EsqlQuery, branches: readonly EsqlQuery[]) {
    super(parent);
    this.#branches = branches;
  }

  protected renderStage(): string {
    const rendered = this.#branches.map((branch) => {
      // drop the empty branch-start stage and fold the branch onto one line
      const text = branch.stages().slice(1).join(STAGE_SEPARATOR);
      return `( ${text.replaceAll("\n", "")} )`;
    });
    return `FORK ${rendered.join(FORK_BRANCH_SEPARATOR)}`;
  }
}

export class Grok extends EsqlQuery {
  readonly command = "GROK";
  readonly #input: IdentifierInput;
  readonly #pattern: string;

  constructor(parent: EsqlQuery, input: IdentifierInput, pattern: string) {
    super(parent);
    this.#input = input;
    this.#pattern = pattern;
  }

  protected renderStage(): string {
    return `GROK ${formatId(this.#input)} ${JSON.stringify(this.#pattern)}`;
  }
}

export class Keep extends EsqlQuery {
  readonly command = "KEEP";
  readonly #columns: readonly IdentifierInput[];

  constructor(parent: EsqlQuery, ...columns: IdentifierInput[]) {
    requireNonEmpty(columns, { command: "KEEP", argument: "column" });
    super(parent);
    this.#columns = columns;
  }

  protected renderStage(): string {
    return `KEEP ${this.#columns.map((column) => formatId(column, true)).join(", ")}`;
  }
}

export class Limit extends EsqlQuery {
  readonly command = "LIMIT";
  readonly #maxNumberOfRows: number;

  constructor(parent: EsqlQuery, maxNumberOfRows: number) {
    const validated = validateArgument(limitSchema, maxNumberOfRows, {
      command: "LIMIT",
      argument: "maxNumberOfRows",
    });
    super(parent);
    this.#maxNumberOfRows = validated;
  }

  protected renderStage(): string {
    return `LIMIT ${this.#maxNumberOfRows}`;
  }
}

export class LookupJoin extends EsqlQuery {
  readonly command = "LOOKUP JOIN";
  readonly #lookupIndex: IndexReference;
  #field: IdentifierInput | undefined;

  constructor(parent: EsqlQuery, lookupIndex: IndexReference) {
    super(parent);
    this.#lookupIndex = lookupIndex;
  }

  /**
   * The field to join on; it must exist on both sides.
   */
  on(field: IdentifierInput): this {
    this.assertModifiable("on");
    this.#field = field;
    return this;
  }

  protected renderStage(): string {
    const field = this.#field;
    if (field === undefined) {
      throw new MissingClauseError("LOOKUP JOIN", "ON", {
        suggestion: `Call on(field) with the field to join on.`,
      });
    }
    return `LOOKUP JOIN ${formatIndex(this.#lookupIndex)} ON ${formatId(field)}`;
  }
}

export class MvExpand extends EsqlQuery {
  readonly command = "MV_EXPAND";
  readonly #column: IdentifierInput;

  constructor(parent: EsqlQuery, column: IdentifierInput) {
    super(parent);
    this.#column = column;
  }

  protected renderStage(): string {
    return `MV_EXPAND ${formatId(this.#column)}`;
  }
}

export class Rename extends EsqlQuery {
  readonly command = "RENAME";
  readonly #columns: readonly (readonly [string, IdentifierInput])[];

  constructor(parent: EsqlQuery, columns: NamedArguments<IdentifierInput>) {
    const entries = Object.entries(columns);
    requireNonEmpty(entries, { command: "RENAME", argument: "column" });
    super(parent);
    this.#columns = entries;
  }

  protected renderStage(): string {
    const pairs = this.#columns.map(
      ([oldName, newName]) => `${formatId(oldName)} AS ${formatId(newName)}`,
    );
    return `RENAME ${pairs.join(", ")}`;
  }
}

export class Sample extends EsqlQuery {
  readonly command = "SAMPLE";
  readonly #probability: number;

  constructor(parent: EsqlQuery, probability: number) {
    const validated = validateArgument(probabilitySchema, probability, {
      command: "SAMPLE",
      argument: "probability",
    });
    super(parent);
    this.#probability = validated;
  }

  protected renderStage(): string {
    return `SAMPLE ${this.#probability}`;
  }
}

export class Sort extends EsqlQuery {
  readonly command = "SORT";
  readonly #columns: readonly SortColumn[];

  constructor(parent: EsqlQuery, ...columns: SortColumn[]) {
    requireNonEmpty(columns, { command: "SORT", argument: "column" });
    super(parent);
    this.#columns = columns;
  }

  protected renderStage(): string {
    return `SORT ${this.#columns.map((column) => renderSortColumn(column)).join(", ")}`;
  }
}

export class Stats extends EsqlQuery {
  readonly command = "STATS";
  readonly #expressions: ArgumentList<ExpressionInput>;
  #groups: readonly ExpressionInput[] | undefined;

  constructor(parent: EsqlQuery, ...expressions: ExpressionArgument[]) {
    const list = splitArguments("STATS", expressions);
    super(parent);
    this.#expressions = list;
  }

  /**
   * Grouping expressions.
   */
  by(...groups: ExpressionInput[]): this {
    this.assertModifiable("by");
    requireNonEmpty(groups, { command: "STATS", argument: "grouping expression" });
    this.#groups = groups;
    return this;
  }

  protected renderStage(): string {
    const expressions = renderArguments(this.#expressions, formatExpr);
    const groups = this.#groups;
    const by =
      groups === undefined ? "" : (
        `\n        BY ${groups.map((group) => formatExpr(group)).join(", ")}`
      );
    if (expressions.length === 0) {
      if (groups === undefined) {
        throw new MissingClauseError("STATS", "BY", {
          suggestion: `Pass at least one aggregation to stats() or call by().`,
        });
      }
      return `STATS${by}`;
    }
    return `STATS ${expressions.join(", ")}${by}`;
  }
}

export class Where extends EsqlQuery {
  readonly command = "WHERE";
  readonly #conditions: readonly ExpressionInput[];

  constructor(parent: EsqlQuery, ...conditions: ExpressionInput[]) {
    requireNonEmpty(conditions, { command: "WHERE", argument: "condition" });
    super(parent);
    this.#conditions = conditions;
  }

  protected renderStage(): string {
    return `WHERE ${formatConditions(this.#conditions)}`;
  }
}
