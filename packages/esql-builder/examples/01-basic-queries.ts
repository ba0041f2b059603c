/**
 * Example 01: Basic Queries
 *
 * This example demonstrates the fundamentals of the builder:
 * - Starting a query with FROM, ROW and SHOW
 * - Chaining processing commands
 * - Reusing a shared prefix for several queries
 */
import { esql, field } from "esql-builder";

export async function main(): Promise<void> {
  // ============================================================
  // Source Commands
  // ============================================================

  const employees = esql.from("employees").metadata("_id");
  console.log("FROM with metadata:\n" + employees.render());

  const row = esql.row({ a: 1, b: "two", c: null });
  console.log("\nROW:\n" + row.render());

  console.log("\nSHOW:\n" + esql.show("INFO").render());

  // ============================================================
  // Processing Commands
  // ============================================================

  const query = employees
    .where(field("still_hired").eq(true))
    .eval({ height_feet: field("height").mul(3.281) })
    .keep("first_name", "last_name", "height*")
    .sort(field("height_feet").desc().nullsLast())
    .limit(10);
  console.log("\nFiltered and sorted:\n" + query.render());

  // ============================================================
  // Shared Prefixes
  // ============================================================

  // Both queries build on the same FROM command without changing it
  const base = esql.from("employees");
  const senior = base.where(field("hire_date").lt("1990-01-01"));
  const recent = base.where("hire_date >= \"2020-01-01\"").limit(5);
  console.log("\nSenior:\n" + senior.render());
  console.log("\nRecent:\n" + recent.render());
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
