/**
 * Rendering tests for source and processing commands.
 */
import { describe, expect, it } from "vitest";

import {
  ConflictingArgumentsError,
  MissingClauseError,
  QueryStructureError,
  ValidationError,
} from "../src/errors";
import { esql } from "../src/query/esql";
import { expr, field } from "../src/query/expressions";

describe("source commands", () => {
  it("renders FROM with several indices", () => {
    expect(esql.from("employees", "logs-*").render()).toBe(
      "FROM employees, logs-*",
    );
  });

  it("renders FROM with metadata fields", () => {
    expect(esql.from("employees").metadata("_id", "_index").render()).toBe(
      "FROM employees METADATA _id, _index",
    );
  });

  it("reads index sources", () => {
    class Employee {
      static indexName = "employees";
    }
    expect(esql.from(Employee).render()).toBe("FROM employees");
  });

  it("rejects FROM without indices", () => {
    expect(() => esql.from()).toThrow("FROM requires at least one index");
  });

  it("renders ROW values as literals", () => {
    expect(esql.row({ a: 1, b: "two", c: null }).render()).toBe(
      'ROW a = 1, b = "two", c = null',
    );
  });

  it("renders ROW lists and expressions", () => {
    expect(
      esql.row({ "a b": [1, 2], now: expr("NOW()") }).render(),
    ).toBe("ROW `a b` = [1, 2], now = NOW()");
  });

  it("rejects an empty ROW", () => {
    expect(() => esql.row({})).toThrow("ROW requires at least one column");
  });

  it("renders SHOW", () => {
    expect(esql.show("INFO").render()).toBe("SHOW INFO");
    expect(() => esql.show("")).toThrow(ValidationError);
  });
});

describe("chaining", () => {
  it("joins stages with a newline and pipe", () => {
    const query = esql
      .from("employees")
      .keep("first_name", "last_name")
      .sort("first_name ASC");
    expect(query.render()).toBe(
      "FROM employees\n| KEEP first_name, last_name\n| SORT first_name ASC",
    );
    expect(query.toString()).toBe(query.render());
  });

  it("lists stages in order", () => {
    expect(esql.from("e").where("a").limit(1).stages()).toEqual([
      "FROM e",
      "WHERE a",
      "LIMIT 1",
    ]);
  });

  it("exposes command keywords and parents", () => {
    const from = esql.from("e");
    const limit = from.limit(1);
    expect(limit.command).toBe("LIMIT");
    expect(limit.parent).toBe(from);
    expect(from.parent).toBeUndefined();
  });

  it("shares a prefix between chains", () => {
    const base = esql.from("employees");
    const filtered = base.where("salary > 50000");
    const limited = base.limit(5);
    expect(filtered.render()).toBe("FROM employees\n| WHERE salary > 50000");
    expect(limited.render()).toBe("FROM employees\n| LIMIT 5");
    expect(base.render()).toBe("FROM employees");
    expect(base.isExtended).toBe(true);
    expect(filtered.isExtended).toBe(false);
  });

  it("rejects continuations on extended commands", () => {
    const from = esql.from("employees");
    from.limit(1);
    expect(() => from.metadata("_id")).toThrow(
      "Cannot call metadata() on FROM: later commands already build on it",
    );
    expect(() => from.metadata("_id")).toThrow(QueryStructureError);

    const stats = esql.from("e").stats("COUNT(*)");
    stats.limit(1);
    expect(() => stats.by("x")).toThrow(QueryStructureError);
  });
});

describe("WHERE", () => {
  it("combines conditions with AND", () => {
    expect(
      esql.from("e").where("a > 1", field("b").eq(2)).stages()[1],
    ).toBe("WHERE (a > 1) AND b == 2");
  });

  it("parenthesizes OR conditions", () => {
    expect(
      esql
        .from("e")
        .where(field("a").eq(1).or(field("b").eq(2)), "c")
        .stages()[1],
    ).toBe("WHERE (a == 1 OR b == 2) AND c");
  });

  it("renders a single condition as written", () => {
    expect(esql.from("e").where("a > 1 OR b < 0").stages()[1]).toBe(
      "WHERE a > 1 OR b < 0",
    );
  });

  it("parenthesizes raw text combined with other conditions", () => {
    expect(
      esql.from("e").where(field("a").eq(1), "b > 2 OR c < 1").stages()[1],
    ).toBe("WHERE a == 1 AND (b > 2 OR c < 1)");
  });

  it("requires a condition", () => {
    expect(() => esql.from("e").where()).toThrow(
      "WHERE requires at least one condition",
    );
  });
});

describe("KEEP and DROP", () => {
  it("allows patterns and quotes other names", () => {
    expect(esql.from("e").keep("h*", "first name").stages()[1]).toBe(
      "KEEP h*, `first name`",
    );
    expect(esql.from("e").drop("height*", field("x")).stages()[1]).toBe(
      "DROP height*, x",
    );
  });

  it("requires at least one column", () => {
    expect(() => esql.from("e").keep()).toThrow(
      "KEEP requires at least one column",
    );
    expect(() => esql.from("e").drop()).toThrow(
      "DROP requires at least one column",
    );
  });
});

describe("RENAME", () => {
  it("renders old AS new pairs", () => {
    expect(
      esql
        .from("e")
        .rename({ first_name: "fn", last_name: "last name" })
        .stages()[1],
    ).toBe("RENAME first_name AS fn, last_name AS `last name`");
  });

  it("requires a mapping", () => {
    expect(() => esql.from("e").rename({})).toThrow(
      "RENAME requires at least one column",
    );
  });
});

describe("SORT", () => {
  it("formats each token of a textual column", () => {
    expect(
      esql.from("e").sort("height DESC", "first_name ASC NULLS FIRST").stages()[1],
    ).toBe("SORT height DESC, first_name ASC NULLS FIRST");
  });

  it("accepts expressions and column references", () => {
    expect(
      esql
        .from("e")
        .sort(field("h").desc().nullsLast(), { columnName: "first name" })
        .stages()[1],
    ).toBe("SORT h DESC NULLS LAST, `first name`");
  });

  it("requires a column", () => {
    expect(() => esql.from("e").sort()).toThrow(
      "SORT requires at least one column",
    );
  });
});

describe("LIMIT", () => {
  it("renders the row count", () => {
    expect(esql.from("e").limit(10).stages()[1]).toBe("LIMIT 10");
    expect(esql.from("e").limit(0).stages()[1]).toBe("LIMIT 0");
  });

  it("rejects negative and fractional counts", () => {
    expect(() => esql.from("e").limit(-1)).toThrow(ValidationError);
    expect(() => esql.from("e").limit(1.5)).toThrow(ValidationError);
  });
});

describe("STATS", () => {
  it("renders named aggregations with BY on its own line", () => {
    expect(
      esql.from("e").stats({ count: "COUNT(emp_no)" }).by("languages").stages()[1],
    ).toBe("STATS count = COUNT(emp_no)\n        BY languages");
  });

  it("renders positional aggregations", () => {
    expect(
      esql.from("e").stats("AVG(salary)", "MAX(salary)").stages()[1],
    ).toBe("STATS AVG(salary), MAX(salary)");
  });

  it("renders grouping alone", () => {
    expect(
      esql.from("e").stats().by(field("languages"), "gender").stages()[1],
    ).toBe("STATS\n        BY languages, gender");
  });

  it("quotes names and keeps aggregate filters", () => {
    expect(
      esql
        .from("e")
        .stats({
          "avg salary": "AVG(salary)",
          hired: expr("COUNT(*)").where("still_hired == true"),
        })
        .stages()[1],
    ).toBe(
      "STATS `avg salary` = AVG(salary), hired = COUNT(*) WHERE still_hired == true",
    );
  });

  it("rejects mixed positional and named aggregations", () => {
    expect(() => esql.from("e").stats("COUNT(*)", { avg: "AVG(x)" })).toThrow(
      ConflictingArgumentsError,
    );
  });

  it("requires aggregations or grouping at render time", () => {
    const query = esql.from("e").stats();
    expect(() => query.render()).toThrow(MissingClauseError);
    expect(() => query.render()).toThrow("STATS is missing its BY clause");
  });

  it("requires at least one grouping expression in by()", () => {
    expect(() => esql.from("e").stats("COUNT(*)").by()).toThrow(
      "STATS requires at least one grouping expression",
    );
  });
});

describe("EVAL", () => {
  it("renders named columns", () => {
    expect(
      esql
        .from("e")
        .eval({ height_feet: "height * 3.281", height_cm: "height * 100" })
        .stages()[1],
    ).toBe("EVAL height_feet = height * 3.281, height_cm = height * 100");
  });

  it("renders positional columns and expressions", () => {
    expect(esql.from("e").eval("height * 3.281").stages()[1]).toBe(
      "EVAL height * 3.281",
    );
    expect(esql.from("e").eval({ a: field("b").add(1) }).stages()[1]).toBe(
      "EVAL a = b + 1",
    );
  });

  it("merges several named objects", () => {
    expect(esql.from("e").eval({ a: "1" }, { b: "2" }).stages()[1]).toBe(
      "EVAL a = 1, b = 2",
    );
  });

  it("rejects empty and mixed arguments", () => {
    expect(() => esql.from("e").eval()).toThrow(
      "EVAL requires at least one column",
    );
    expect(() => esql.from("e").eval("a", { b: "c" })).toThrow(
      "EVAL accepts positional or named arguments but not both",
    );
  });
});

describe("ENRICH", () => {
  it("renders ON and named WITH", () => {
    const query = esql
      .row({ a: "1" })
      .enrich("languages_policy")
      .on("a")
      .with({ name: "language_name" });
    expect(query.render()).toBe(
      'ROW a = "1"\n| ENRICH languages_policy ON a WITH name = language_name',
    );
  });

  it("renders positional WITH and bare policies", () => {
    expect(
      esql.from("e").enrich("p").with("language_name", "x").stages()[1],
    ).toBe("ENRICH p WITH language_name, x");
    expect(esql.from("e").enrich("p").stages()[1]).toBe("ENRICH p");
  });

  it("treats column references as positional fields", () => {
    expect(
      esql.from("e").enrich("p").with({ columnName: "language_name" }).stages()[1],
    ).toBe("ENRICH p WITH language_name");
    expect(
      esql
        .from("e")
        .enrich("p")
        .with(field("language name"), { columnName: "code" })
        .stages()[1],
    ).toBe("ENRICH p WITH `language name`, code");
  });

  it("validates the policy and fields", () => {
    expect(() => esql.from("e").enrich("")).toThrow(ValidationError);
    expect(() => esql.from("e").enrich("p").with()).toThrow(
      "ENRICH requires at least one field",
    );
    expect(() => esql.from("e").enrich("p").with("a", { b: "c" })).toThrow(
      ConflictingArgumentsError,
    );
  });
});

describe("LOOKUP JOIN", () => {
  it("renders the index and join field", () => {
    expect(
      esql
        .from("system_metrics")
        .lookupJoin("host_inventory")
        .on("host.name")
        .stages()[1],
    ).toBe("LOOKUP JOIN host_inventory ON host.name");
  });

  it("accepts index sources", () => {
    expect(
      esql.from("m").lookupJoin({ indexName: "hosts" }).on("h").stages()[1],
    ).toBe("LOOKUP JOIN hosts ON h");
  });

  it("reads index sources when rendering", () => {
    const source = { indexName: "employees" };
    const lookup = { indexName: "hosts" };
    const query = esql.from(source).lookupJoin(lookup).on("h");
    source.indexName = "employees-v2";
    lookup.indexName = "hosts-v2";
    expect(query.render()).toBe("FROM employees-v2\n| LOOKUP JOIN hosts-v2 ON h");
  });

  it("fails at render time without ON", () => {
    const query = esql.from("m").lookupJoin("hosts");
    expect(() => query.render()).toThrow("LOOKUP JOIN is missing its ON clause");
  });
});

describe("MV_EXPAND and SAMPLE", () => {
  it("renders MV_EXPAND", () => {
    expect(esql.from("e").mvExpand("tags").stages()[1]).toBe("MV_EXPAND tags");
  });

  it("renders SAMPLE inside the open interval", () => {
    expect(esql.from("e").sample(0.5).stages()[1]).toBe("SAMPLE 0.5");
    expect(() => esql.from("e").sample(0)).toThrow(ValidationError);
    expect(() => esql.from("e").sample(1)).toThrow(ValidationError);
  });
});

describe("DISSECT and GROK", () => {
  it("renders DISSECT with a quoted pattern", () => {
    expect(
      esql.from("e").dissect("a", "%{date} - %{msg} - %{ip}").stages()[1],
    ).toBe('DISSECT a "%{date} - %{msg} - %{ip}"');
  });

  it("renders the append separator", () => {
    expect(
      esql.from("e").dissect("a", "%{+x} %{+x}").appendSeparator(",").stages()[1],
    ).toBe('DISSECT a "%{+x} %{+x}" APPEND_SEPARATOR=","');
  });

  it("renders GROK", () => {
    expect(
      esql.from("e").grok("a", "%{TIMESTAMP_ISO8601:date} %{IP:ip}").stages()[1],
    ).toBe('GROK a "%{TIMESTAMP_ISO8601:date} %{IP:ip}"');
  });
});

describe("CHANGE_POINT", () => {
  it("renders optional clauses only when set", () => {
    expect(esql.from("k8s").changePoint("count").stages()[1]).toBe(
      "CHANGE_POINT count",
    );
    expect(
      esql
        .from("k8s")
        .changePoint("count")
        .on("@timestamp")
        .as("type", "pvalue")
        .stages()[1],
    ).toBe("CHANGE_POINT count ON @timestamp AS type, pvalue");
  });

  it("defaults output names", () => {
    expect(esql.from("k8s").changePoint("count").as().stages()[1]).toBe(
      "CHANGE_POINT count AS type, pvalue",
    );
  });
});

describe("COMPLETION", () => {
  it("renders a named prompt with the inference endpoint", () => {
    const query = esql
      .row({ question: "What is ES|QL?" })
      .completion({ answer: field("question") })
      .with("test_completion_model");
    expect(query.render()).toBe(
      'ROW question = "What is ES|QL?"\n| COMPLETION answer = question WITH {"inference_id": "test_completion_model"}',
    );
  });

  it("renders a positional prompt", () => {
    expect(
      esql.from("e").completion("question").with("model").stages()[1],
    ).toBe('COMPLETION question WITH {"inference_id": "model"}');
  });

  it("takes exactly one prompt", () => {
    expect(() => esql.from("e").completion()).toThrow(
      "COMPLETION requires exactly one prompt, got 0",
    );
    expect(() => esql.from("e").completion("a", "b")).toThrow(
      "COMPLETION requires exactly one prompt, got 2",
    );
    expect(() => esql.from("e").completion({ a: "x", b: "y" })).toThrow(
      "COMPLETION requires exactly one prompt, got 2",
    );
  });

  it("requires the inference endpoint", () => {
    const query = esql.from("e").completion("q");
    expect(() => query.render()).toThrow("COMPLETION is missing its WITH clause");
    expect(() => esql.from("e").completion("q").with("")).toThrow(
      ValidationError,
    );
  });
});
