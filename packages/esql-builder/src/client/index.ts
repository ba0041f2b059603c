export { createEsqlClient, EsqlClient } from "./client";
export {
  type EsqlClientOptions,
  type EsqlExecutor,
  type EsqlHooks,
  type EsqlRequest,
  type QueryDefaults,
  type QueryHookContext,
  type QueryOptions,
} from "./types";
