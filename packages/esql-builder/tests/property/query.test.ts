import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { type EsqlQuery } from "../../src/query/commands";
import { esql } from "../../src/query/esql";
import { commandChainArb, type CommandStep, simpleIdentifierArb } from "./arbitraries";

function build(index: string, steps: readonly CommandStep[]): EsqlQuery {
  let query: EsqlQuery = esql.from(index);
  for (const step of steps) {
    query = step.apply(query);
  }
  return query;
}

describe("Query Rendering Properties", () => {
  it("renders stages in call order", () => {
    fc.assert(
      fc.property(simpleIdentifierArb, commandChainArb, (index, steps) => {
        const query = build(index, steps);
        expect(query.stages()).toEqual([
          `FROM ${index}`,
          ...steps.map((step) => step.expected),
        ]);
      }),
      { numRuns: 100 },
    );
  });

  it("joins stages with the pipe separator", () => {
    fc.assert(
      fc.property(simpleIdentifierArb, commandChainArb, (index, steps) => {
        const query = build(index, steps);
        expect(query.render()).toBe(query.stages().join("\n| "));
      }),
    );
  });

  it("rendering is idempotent", () => {
    fc.assert(
      fc.property(simpleIdentifierArb, commandChainArb, (index, steps) => {
        const query = build(index, steps);
        expect(query.render()).toBe(query.render());
      }),
    );
  });

  it("extending a query never changes the prefix", () => {
    fc.assert(
      fc.property(
        simpleIdentifierArb,
        commandChainArb,
        commandChainArb,
        (index, prefix, suffix) => {
          const base = build(index, prefix);
          const before = base.render();
          let extended = base;
          for (const step of suffix) {
            extended = step.apply(extended);
          }
          expect(base.render()).toBe(before);
          if (suffix.length > 0) {
            expect(extended.render().startsWith(`${before}\n| `)).toBe(true);
          }
        },
      ),
      { numRuns: 100 },
    );
  });
});
