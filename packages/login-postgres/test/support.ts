import { newDb } from "pg-mem";

import {
  createPgQueryExecutor,
  createPostgresTelemetry,
  type PgTransactionPool,
  type QueryExecutor,
} from "../src/index.js";

export interface MemoryDatabase {
  /** Runs statements directly, outside any transaction. */
  readonly executor: QueryExecutor;
  /** Hands out clients the transaction manager wraps in BEGIN/COMMIT. */
  readonly pool: PgTransactionPool;
}

export const createMemoryDatabase = (): MemoryDatabase => {
  const db = newDb({ noAstCoverageCheck: true });
  const { Pool } = db.adapters.createPg();
  return {
    executor: createPgQueryExecutor(new Pool(), createPostgresTelemetry()),
    pool: new Pool(),
  };
};

export const createMemoryExecutor = (): QueryExecutor => createMemoryDatabase().executor;
