/**
 * Source commands: the first stage of every query.
 */
import { z } from "zod";

import { requireNonEmpty, validateArgument } from "../errors/validation";
import { EsqlQuery } from "./commands";
import { type ExpressionInput, formatLiteral } from "./expressions";
import { formatId, formatIndex } from "./identifiers";
import {
  type IdentifierInput,
  type IndexReference,
  type NamedArguments,
} from "./types";

const showItemSchema = z.string().min(1);

/**
 * `FROM` - reads rows from indices, data streams or aliases.
 */
export class From extends EsqlQuery {
  readonly command = "FROM";
  readonly #indices: readonly IndexReference[];
  #metadataFields: readonly IdentifierInput[] = [];

  constructor(...indices: IndexReference[]) {
    requireNonEmpty(indices, { command: "FROM", argument: "index" });
    super();
    this.#indices = indices;
  }

  /**
   * Metadata fields to retrieve, such as `_id` or `_index`.
   */
  metadata(...fields: IdentifierInput[]): this {
    this.assertModifiable("metadata");
    requireNonEmpty(fields, { command: "FROM", argument: "metadata field" });
    this.#metadataFields = fields;
    return this;
  }

  protected renderStage(): string {
    const indices = this.#indices.map((index) => formatIndex(index)).join(", ");
    if (this.#metadataFields.length === 0) {
      return `FROM ${indices}`;
    }
    const fields = this.#metadataFields.map((field) => formatId(field));
    return `FROM ${indices} METADATA ${fields.join(", ")}`;
  }
}

/**
 * `ROW` - produces one row from literal values.
 */
export class Row extends EsqlQuery {
  readonly command = "ROW";
  readonly #values: readonly (readonly [string, ExpressionInput])[];

  constructor(values: NamedArguments<ExpressionInput>) {
    const entries = Object.entries(values);
    requireNonEmpty(entries, { command: "ROW", argument: "column" });
    super();
    this.#values = entries;
  }

  protected renderStage(): string {
    const columns = this.#values.map(
      ([name, value]) => `${formatId(name)} = ${formatLiteral(value)}`,
    );
    return `ROW ${columns.join(", ")}`;
  }
}

/**
 * `SHOW` - returns deployment information.
 */
export class Show extends EsqlQuery {
  readonly command = "SHOW";
  readonly #item: string;

  constructor(item: string) {
    const validated = validateArgument(showItemSchema, item, {
      command: "SHOW",
      argument: "item",
    });
    super();
    this.#item = validated;
  }

  protected renderStage(): string {
    return `SHOW ${this.#item}`;
  }
}

/**
 * Start of a FORK branch. Has no stage text of its own and cannot be
 * rendered outside a fork.
 */
export class Branch extends EsqlQuery {
  readonly command = "BRANCH";

  constructor() {
    super();
  }

  protected renderStage(): string {
    return "";
  }

  protected override isBranchStart(): boolean {
    return true;
  }
}
