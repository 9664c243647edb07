export type { QueryExecutor, QueryResult, QueryRow } from "./executors/query-executor.js";
export { createPgQueryExecutor, type PgQueryable } from "./executors/pg-query-executor.js";
export {
  PostgresTransactionManager,
  type PgTransactionClient,
  type PgTransactionPool,
  type TransactionCallback,
  type TransactionManagerOptions,
} from "./transactions/transaction-manager.js";
export {
  createPostgresTelemetry,
  type PostgresTelemetryContext,
  type PostgresTelemetryMetrics,
  type PostgresTelemetryOptions,
} from "./telemetry.js";
export { translatePostgresError } from "./errors.js";
export { defaultLoginTableName, resolveLoginTableName } from "./tables.js";
export { setupLoginTable, clearLoginTable, dropLoginTable, type LoginTableOptions } from "./schema.js";
export {
  PostgresLoginStore,
  createPostgresLoginStore,
  type PostgresLoginStoreOptions,
} from "./postgres-login-store.js";
