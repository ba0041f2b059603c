import { type LiteralValue } from "../query/expressions";

// ============================================================
// Executor
// ============================================================

/**
 * What the executor receives: the rendered query and request options.
 */
export type EsqlRequest = Readonly<{
  /** Rendered ES|QL text */
  query: string;
  /** Values for `?` placeholders in the query */
  params?: readonly LiteralValue[];
  /** Ask for column-oriented results */
  columnar?: boolean;
  /** Locale for date and number formatting */
  locale?: string;
}>;

/**
 * Sends a rendered query to a cluster and returns its response.
 *
 * Transport, authentication and response decoding belong to the executor.
 *
 * @example
 * ```typescript
 * const executor: EsqlExecutor<EsqlResponse> = (request) =>
 *   es.esql.query(request);
 * ```
 */
export type EsqlExecutor<TResult> = (request: EsqlRequest) => Promise<TResult>;

// ============================================================
// Hooks
// ============================================================

/**
 * Context passed to every hook.
 */
export type QueryHookContext = Readonly<{
  /** Unique ID for this execution */
  operationId: string;
  /** Timestamp when execution started */
  startedAt: Date;
  /** Rendered ES|QL text */
  query: string;
  /** Placeholder values */
  params: readonly LiteralValue[];
}>;

/**
 * Observability hooks for monitoring query execution.
 *
 * @example
 * ```typescript
 * const hooks: EsqlHooks = {
 *   onQueryStart: (ctx) => {
 *     console.log(`[${ctx.operationId}] Query: ${ctx.query}`);
 *   },
 *   onQueryEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] Completed in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 * ```
 */
export type EsqlHooks = Readonly<{
  /** Called before the executor is invoked */
  onQueryStart?: (ctx: QueryHookContext) => void;
  /** Called after the executor resolves */
  onQueryEnd?: (
    ctx: QueryHookContext,
    result: Readonly<{ durationMs: number }>,
  ) => void;
  /** Called when the executor rejects */
  onError?: (ctx: QueryHookContext, error: Error) => void;
}>;

// ============================================================
// Configuration
// ============================================================

/**
 * Request options applied to every query unless overridden per call.
 */
export type QueryDefaults = Readonly<{
  columnar?: boolean;
  locale?: string;
}>;

/**
 * Per-call request options.
 */
export type QueryOptions = QueryDefaults &
  Readonly<{
    params?: readonly LiteralValue[];
  }>;

/**
 * Options for creating a client.
 */
export type EsqlClientOptions<TResult> = Readonly<{
  /** Transport that runs rendered queries */
  executor: EsqlExecutor<TResult>;
  /** Observability hooks for monitoring */
  hooks?: EsqlHooks;
  /** Request defaults */
  defaults?: QueryDefaults;
}>;
