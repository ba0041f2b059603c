/**
 * EsqlClient - hands rendered queries to an executor.
 *
 * The client owns no connection. It renders, reports to hooks and
 * delegates to the executor it was created with.
 */
import { z } from "zod";

import { ConfigurationError, ExecutionError } from "../errors";
import { validateArgument } from "../errors/validation";
import { type EsqlQuery } from "../query/commands";
import { type LiteralValue } from "../query/expressions";
import { generateId } from "../utils/id";
import {
  type EsqlClientOptions,
  type EsqlExecutor,
  type EsqlHooks,
  type EsqlRequest,
  type QueryDefaults,
  type QueryHookContext,
  type QueryOptions,
} from "./types";

// ============================================================
// Option Schemas
// ============================================================

const literalSchema: z.ZodType<LiteralValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.bigint(),
    z.boolean(),
    z.null(),
    z.array(literalSchema),
  ]),
);

const hookSchema = z
  .custom<(...args: never[]) => void>((value) => typeof value === "function", {
    message: "Hook must be a function",
  })
  .optional();

const defaultsSchema = z.object({
  columnar: z.boolean().optional(),
  locale: z.string().min(1).optional(),
});

const clientOptionsSchema = z.object({
  executor: z.custom<EsqlExecutor<unknown>>(
    (value) => typeof value === "function",
    { message: "Executor must be a function" },
  ),
  hooks: z
    .object({
      onQueryStart: hookSchema,
      onQueryEnd: hookSchema,
      onError: hookSchema,
    })
    .optional(),
  defaults: defaultsSchema.optional(),
});

const queryOptionsSchema = defaultsSchema.extend({
  params: z.array(literalSchema).optional(),
});

// ============================================================
// Client
// ============================================================

/**
 * Runs queries through an executor with observability hooks.
 *
 * @example
 * ```typescript
 * const client = createEsqlClient({
 *   executor: (request) => es.esql.query(request),
 *   hooks: {
 *     onQueryEnd: (ctx, { durationMs }) => {
 *       console.log(`[${ctx.operationId}] ${durationMs}ms`);
 *     },
 *   },
 * });
 *
 * const response = await client.query(
 *   esql.from("employees").where("emp_no == ?").limit(1),
 *   { params: [10001] },
 * );
 * ```
 */
export class EsqlClient<TResult> {
  readonly #executor: EsqlExecutor<TResult>;
  readonly #hooks: EsqlHooks;
  readonly #defaults: QueryDefaults;

  constructor(options: EsqlClientOptions<TResult>) {
    const result = clientOptionsSchema.safeParse(options);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid client options: ${result.error.issues
          .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
        { issues: result.error.issues.map((issue) => issue.message) },
        { cause: result.error },
      );
    }
    this.#executor = options.executor;
    this.#hooks = options.hooks ?? {};
    this.#defaults = options.defaults ?? {};
  }

  /**
   * Renders a query without executing it.
   */
  render(query: EsqlQuery): string {
    return query.render();
  }

  /**
   * Renders and executes a query.
   *
   * Render errors reject before the executor is called. Executor failures
   * are reported to `onError` and rethrown as ExecutionError.
   */
  async query(
    query: EsqlQuery | string,
    options: QueryOptions = {},
  ): Promise<TResult> {
    const text = typeof query === "string" ? query : query.render();
    validateArgument(queryOptionsSchema, options, {
      command: "query",
      argument: "options",
    });

    const params = options.params ?? [];
    const columnar = options.columnar ?? this.#defaults.columnar;
    const locale = options.locale ?? this.#defaults.locale;
    const request: EsqlRequest = {
      query: text,
      ...(params.length > 0 && { params }),
      ...(columnar !== undefined && { columnar }),
      ...(locale !== undefined && { locale }),
    };

    const ctx: QueryHookContext = {
      operationId: generateId(),
      startedAt: new Date(),
      query: text,
      params,
    };

    this.#hooks.onQueryStart?.(ctx);
    const startTime = Date.now();
    let result: TResult;
    try {
      result = await this.#executor(request);
    } catch (error) {
      const reported = error instanceof Error ? error : new Error(String(error));
      this.#hooks.onError?.(ctx, reported);
      throw new ExecutionError(
        `ES|QL query ${ctx.operationId} failed: ${reported.message}`,
        { operationId: ctx.operationId, query: text },
        { cause: error },
      );
    }
    this.#hooks.onQueryEnd?.(ctx, { durationMs: Date.now() - startTime });
    return result;
  }
}

/**
 * Creates a client bound to an executor.
 *
 * @throws ConfigurationError if the options are invalid
 */
export function createEsqlClient<TResult>(
  options: EsqlClientOptions<TResult>,
): EsqlClient<TResult> {
  return new EsqlClient(options);
}
