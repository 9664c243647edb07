import type { QueryResultRow } from "pg";

import { runWithSpan } from "@relogin/telemetry";

import type { PostgresTelemetryContext } from "../telemetry.js";
import type { QueryExecutor, QueryResult } from "./query-executor.js";

/** The part of `pg.Pool` and `pg.PoolClient` the executor needs. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ readonly rows: ReadonlyArray<QueryResultRow> }>;
}

const truncateStatement = (sql: string, limit = 200): string => {
  const flattened = sql.replace(/\s+/g, " ").trim();
  return flattened.length > limit ? `${flattened.slice(0, limit)}…` : flattened;
};

export const createPgQueryExecutor = (
  queryable: PgQueryable,
  telemetry: PostgresTelemetryContext,
): QueryExecutor => ({
  async query(sql: string, params: ReadonlyArray<unknown> = []): Promise<QueryResult> {
    const statement = truncateStatement(sql);
    const start = performance.now();
    let outcome: "ok" | "error" = "ok";

    try {
      const result = await runWithSpan(
        telemetry.tracer,
        "postgres.query",
        async (span) => {
          span.setAttribute("db.system", "postgresql");
          span.setAttribute("db.statement", statement);
          span.setAttribute("db.sql.parameters_length", params.length);
          const queryResult = await queryable.query(sql, [...params]);
          span.setAttribute("db.rows_returned", queryResult.rows.length);
          return queryResult;
        },
        {
          onError: (error) => {
            telemetry.logger.debug("postgres.query.failed", {
              statement,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        },
      );

      telemetry.logger.debug("postgres.query.success", {
        statement,
        rows: result.rows.length,
        durationMs: performance.now() - start,
      });
      return { rows: result.rows };
    } catch (error) {
      outcome = "error";
      throw error;
    } finally {
      const duration = performance.now() - start;
      telemetry.metrics.queryCounter.add(1, { outcome });
      telemetry.metrics.queryDuration.record(duration, { outcome });
    }
  },
});
