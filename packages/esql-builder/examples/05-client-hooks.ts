/**
 * Example 05: Client and Hooks
 *
 * This example demonstrates executing queries through a client:
 * - Plugging in an executor
 * - Observing execution with hooks
 * - Handling executor failures
 *
 * The executor here answers from memory; in an application it would call
 * the cluster's `_query` endpoint.
 */
import {
  createEsqlClient,
  esql,
  type EsqlRequest,
  ExecutionError,
} from "esql-builder";

type EsqlResponse = Readonly<{
  columns: readonly Readonly<{ name: string; type: string }>[];
  values: readonly (readonly unknown[])[];
}>;

function inMemoryExecutor(request: EsqlRequest): Promise<EsqlResponse> {
  if (request.query.includes("missing_index")) {
    return Promise.reject(new Error("index_not_found_exception"));
  }
  return Promise.resolve({
    columns: [{ name: "count", type: "long" }],
    values: [[42]],
  });
}

export async function main(): Promise<void> {
  const client = createEsqlClient({
    executor: inMemoryExecutor,
    hooks: {
      onQueryStart: (ctx) => {
        console.log(`[${ctx.operationId}] Query:\n${ctx.query}`);
      },
      onQueryEnd: (ctx, { durationMs }) => {
        console.log(`[${ctx.operationId}] Completed in ${durationMs}ms`);
      },
      onError: (ctx, error) => {
        console.error(`[${ctx.operationId}] Failed: ${error.message}`);
      },
    },
    defaults: { columnar: false },
  });

  const response = await client.query(
    esql.from("employees").where("emp_no > ?").stats({ count: "COUNT(*)" }),
    { params: [10000] },
  );
  console.log("Values:", response.values);

  try {
    await client.query(esql.from("missing_index").limit(1));
  } catch (error) {
    if (error instanceof ExecutionError) {
      console.log("Wrapped failure:", error.code, error.details.query);
    }
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
