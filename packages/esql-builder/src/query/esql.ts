import { type ExpressionInput } from "./expressions";
import { Branch, From, Row, Show } from "./source-commands";
import { type IndexReference, type NamedArguments } from "./types";

/**
 * Entry point for building ES|QL queries.
 *
 * Each method returns a source command; processing commands are chained
 * from there.
 *
 * @example
 * esql.from("employees").metadata("_id")
 *   .where("still_hired == true")
 *   .stats({ count: "COUNT(*)" }).by("languages")
 *
 * esql.row({ a: 1, b: "two", c: null })
 * esql.show("INFO")
 */
export const esql = {
  /**
   * `FROM` - reads from indices, data streams or aliases.
   * Index names may use wildcards, date math and cluster prefixes.
   */
  from(...indices: IndexReference[]): From {
    return new From(...indices);
  },

  /**
   * `ROW` - one row of literal values, keyed by column name.
   */
  row(values: NamedArguments<ExpressionInput>): Row {
    return new Row(values);
  },

  /**
   * `SHOW` - deployment information. The only item is `INFO`.
   */
  show(item: string): Show {
    return new Show(item);
  },

  /**
   * Starts a branch for `fork()`.
   */
  branch(): Branch {
    return new Branch();
  },
};
