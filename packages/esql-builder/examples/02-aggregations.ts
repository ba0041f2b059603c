/**
 * Example 02: Aggregations
 *
 * This example demonstrates STATS and friends:
 * - Named and positional aggregations
 * - Grouping with by()
 * - Filtered aggregates
 * - Handling builder errors
 */
import {
  ConflictingArgumentsError,
  esql,
  expr,
  field,
  isEsqlError,
} from "esql-builder";

export async function main(): Promise<void> {
  const byLanguage = esql
    .from("employees")
    .stats({
      avg_salary: "AVG(salary)",
      count: "COUNT(*)",
    })
    .by("languages")
    .sort("avg_salary DESC");
  console.log("Grouped:\n" + byLanguage.render());

  const filtered = esql.from("employees").stats({
    avg_old: expr("AVG(salary)").where(field("birth_date").lt("1960-01-01")),
    avg_young: expr("AVG(salary)").where(field("birth_date").gte("1960-01-01")),
  });
  console.log("\nFiltered aggregates:\n" + filtered.render());

  // Positional and named aggregations cannot be mixed
  try {
    esql.from("employees").stats("COUNT(*)", { avg: "AVG(salary)" });
  } catch (error) {
    if (error instanceof ConflictingArgumentsError) {
      console.log("\nRejected: " + error.message);
    }
  }

  // STATS needs at least an aggregation or a grouping
  try {
    esql.from("employees").stats().render();
  } catch (error) {
    if (isEsqlError(error)) {
      console.log("\n" + error.toUserMessage());
    }
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
