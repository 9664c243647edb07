import { ConfigurationError } from "@relogin/contracts";
import { describeError, runWithSpan } from "@relogin/telemetry";

import { createPgQueryExecutor, type PgQueryable } from "../executors/pg-query-executor.js";
import type { QueryExecutor } from "../executors/query-executor.js";
import type { PostgresTelemetryContext } from "../telemetry.js";

export type TransactionCallback<T> = (executor: QueryExecutor) => Promise<T> | T;

/** A checked-out connection, as handed out by `pg.Pool#connect`. */
export interface PgTransactionClient extends PgQueryable {
  release(error?: Error | boolean): void;
}

export interface PgTransactionPool {
  connect(): Promise<PgTransactionClient>;
}

export interface TransactionManagerOptions {
  readonly pool?: PgTransactionPool;
  readonly executor?: QueryExecutor;
  readonly telemetry: PostgresTelemetryContext;
}

/**
 * Runs each callback in its own `BEGIN`/`COMMIT` block on a pooled client.
 *
 * Without a pool the callback runs inline on the given executor, which then
 * owns any transaction boundaries itself.
 */
export class PostgresTransactionManager {
  private readonly pool?: PgTransactionPool;
  private readonly executor?: QueryExecutor;
  private readonly telemetry: PostgresTelemetryContext;

  constructor(options: TransactionManagerOptions) {
    if (!options.pool && !options.executor) {
      throw new ConfigurationError("no_postgres_handle");
    }
    this.pool = options.pool;
    this.executor = options.executor;
    this.telemetry = options.telemetry;
  }

  async runInTransaction<T>(operation: string, callback: TransactionCallback<T>): Promise<T> {
    const { pool, executor, telemetry } = this;

    if (!pool) {
      if (!executor) {
        throw new ConfigurationError("no_postgres_handle");
      }
      return runWithSpan(
        telemetry.tracer,
        "postgres.transaction",
        async (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.operation", operation);
          telemetry.logger.debug("postgres.transaction.inline", { operation });
          return await callback(executor);
        },
      );
    }

    const client = await pool.connect();
    const start = performance.now();
    let outcome: "ok" | "error" = "ok";
    try {
      return await runWithSpan(
        telemetry.tracer,
        "postgres.transaction",
        async (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.operation", operation);
          await client.query("BEGIN");
          const result = await callback(createPgQueryExecutor(client, telemetry));
          await client.query("COMMIT");
          telemetry.logger.debug("postgres.transaction.commit", {
            operation,
            durationMs: performance.now() - start,
          });
          return result;
        },
      );
    } catch (error) {
      outcome = "error";
      try {
        await client.query("ROLLBACK");
        telemetry.logger.warn("postgres.transaction.rollback", { operation, error: describeError(error) });
      } catch (rollbackError) {
        telemetry.logger.error("postgres.transaction.rollback_failed", {
          operation,
          error: describeError(rollbackError),
        });
      }
      throw error;
    } finally {
      const duration = performance.now() - start;
      telemetry.metrics.transactionCounter.add(1, { outcome, operation });
      telemetry.metrics.transactionDuration.record(duration, { outcome, operation });
      client.release();
    }
  }
}
