/**
 * Example 04: Fork and Completion
 *
 * This example demonstrates:
 * - Running several branches over the same rows with FORK
 * - Change point detection
 * - Asking an inference endpoint with COMPLETION
 */
import { esql, field } from "esql-builder";

export async function main(): Promise<void> {
  const forked = esql
    .from("employees")
    .fork(
      esql.branch().where(field("emp_no").eq(10001)),
      esql.branch().where(field("emp_no").eq(10002)),
      esql.branch().stats({ total: "COUNT(*)" }),
    )
    .keep("emp_no", "total", "_fork")
    .sort("emp_no");
  console.log("FORK:\n" + forked.render());

  const changes = esql
    .from("k8s")
    .stats({ count: "COUNT()" })
    .by("@timestamp = BUCKET(@timestamp, 1 minute)")
    .changePoint("count")
    .on("@timestamp")
    .as("type", "pvalue");
  console.log("\nCHANGE_POINT:\n" + changes.render());

  const completion = esql
    .row({ question: "What is Elasticsearch?" })
    .completion({ answer: field("question") })
    .with("test_completion_model")
    .keep("question", "answer");
  console.log("\nCOMPLETION:\n" + completion.render());
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
